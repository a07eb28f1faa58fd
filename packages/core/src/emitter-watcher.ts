import type {
  BinaryState,
  SourceWatcher,
  StateEvent,
  StateEventHandler,
  Unsubscribe,
} from '@occupancy-meter/types';

/**
 * In-process SourceWatcher for hosts that already deliver state changes as
 * callbacks. `push` resolves once every subscriber has handled the event.
 */
export class EmitterWatcher implements SourceWatcher {
  private handlers = new Set<StateEventHandler>();

  subscribe(handler: StateEventHandler): Unsubscribe {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async push(event: StateEvent): Promise<void> {
    for (const handler of Array.from(this.handlers)) {
      await handler(event);
    }
  }

  async report(sourceId: string, state: BinaryState, timestamp: number): Promise<void> {
    await this.push({ sourceId, state, timestamp });
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }
}
