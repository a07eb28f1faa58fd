import { describe, it, expect, vi } from 'vitest';
import { EmitterWatcher } from './emitter-watcher';

describe('EmitterWatcher', () => {
  it('should deliver events to every subscriber', async () => {
    const watcher = new EmitterWatcher();
    const first = vi.fn();
    const second = vi.fn();
    watcher.subscribe(first);
    watcher.subscribe(second);

    await watcher.report('hall', 'on', 1_000);

    const event = { sourceId: 'hall', state: 'on', timestamp: 1_000 };
    expect(first).toHaveBeenCalledWith(event);
    expect(second).toHaveBeenCalledWith(event);
  });

  it('should wait for async handlers', async () => {
    const watcher = new EmitterWatcher();
    const handled: string[] = [];
    watcher.subscribe(async (event) => {
      await Promise.resolve();
      handled.push(event.sourceId);
    });

    await watcher.push({ sourceId: 'hall', state: 'off', timestamp: 0 });

    expect(handled).toEqual(['hall']);
  });

  it('should stop delivering after unsubscribe', async () => {
    const watcher = new EmitterWatcher();
    const handler = vi.fn();
    const unsubscribe = watcher.subscribe(handler);

    await unsubscribe();
    await watcher.report('hall', 'on', 1);

    expect(handler).not.toHaveBeenCalled();
    expect(watcher.subscriberCount).toBe(0);
  });
});
