import { EventEmitter } from 'events';
import type {
  BinaryState,
  Clock,
  EngineWarning,
  MetricPublisher,
  MetricSnapshot,
  OccupancyRecord,
  PersistenceStore,
  TrackerOptions,
  TrackerStats,
} from '@occupancy-meter/types';
import { systemClock } from './clock';
import { comparePositions, decodeRecord, emptyRecord, encodeRecord, recordKey } from './record';

export type TrackerCounters = Omit<TrackerStats, 'trackedSources' | 'droppedEvents'>;

/**
 * Accumulates occupied time and activation count for one binary source.
 *
 * The record is an immutable object swapped on every mutation, so `snapshot`
 * always sees a consistent state. Store writes run one at a time through a
 * promise chain and never hold up `handleEvent`; a failed write leaves the
 * tracker dirty and is retried by the next mutation or by `flush()`.
 *
 * Emits:
 * - `snapshot` after every mutation
 * - `warn` for recoverable conditions (store failures, clamped intervals)
 */
export class OccupancyTracker extends EventEmitter {
  readonly sourceId: string;

  private record: Readonly<OccupancyRecord>;
  private readonly store: PersistenceStore;
  private readonly publisher: MetricPublisher | undefined;
  private readonly clock: Clock;
  private readonly key: string;

  private queue: Promise<void> = Promise.resolve();
  private dirty = false;
  private writeQueued = false;
  private closed = false;

  private counters: TrackerCounters = {
    eventsProcessed: 0,
    duplicatesIgnored: 0,
    clampedIntervals: 0,
    persistFailures: 0,
  };

  constructor(options: TrackerOptions) {
    super();
    this.sourceId = options.sourceId;
    this.store = options.store;
    this.publisher = options.publisher;
    this.clock = options.clock ?? systemClock;
    this.key = recordKey(options.sourceId, options.keyPrefix);
    this.record = emptyRecord(options.sourceId);
  }

  /** Construct a tracker and restore its record before returning it. */
  static async create(options: TrackerOptions): Promise<OccupancyTracker> {
    const tracker = new OccupancyTracker(options);
    await tracker.restoreFromStore();
    return tracker;
  }

  get state(): BinaryState {
    return this.record.state;
  }

  /** Copy of the current record, closed intervals only. */
  getRecord(): OccupancyRecord {
    return { ...this.record };
  }

  getStats(): Readonly<TrackerCounters> {
    return { ...this.counters };
  }

  /**
   * Apply one state observation. Resolves once the new record is in place;
   * its store write is queued behind earlier ones, so a slow store never
   * holds up the caller. Use `flush()` to wait for the write.
   *
   * An event whose `position` is at or below the last applied one is a
   * replay and is skipped.
   */
  async handleEvent(state: BinaryState, eventTime: number, position?: string): Promise<void> {
    if (this.closed) {
      this.warn({ message: 'Dropped event for closed tracker', state, eventTime });
      return;
    }
    if (!Number.isFinite(eventTime)) {
      this.warn({ message: 'Dropped event with invalid timestamp', state, eventTime });
      return;
    }

    const current = this.record;
    if (
      state === current.state ||
      (position !== undefined &&
        current.lastPosition !== null &&
        comparePositions(position, current.lastPosition) <= 0)
    ) {
      this.counters.duplicatesIgnored++;
      return;
    }

    const lastPosition = position ?? current.lastPosition;
    if (state === 'on') {
      this.record = {
        ...current,
        state: 'on',
        intervalStart: eventTime,
        lastTrigger: eventTime,
        activationCount: current.activationCount + 1,
        lastPosition,
      };
    } else {
      this.record = {
        ...current,
        state: 'off',
        intervalStart: null,
        totalDuration: current.totalDuration + this.closedSeconds(current, eventTime),
        lastPosition,
      };
    }

    this.counters.eventsProcessed++;
    this.publishSnapshot();
    this.queueWrite();
  }

  /**
   * Current metrics with the open interval folded in as of `now`.
   * Pure read; safe to call at any time.
   */
  snapshot(now = this.clock.now()): MetricSnapshot {
    const record = this.record;
    let currentDuration: number | null = null;
    if (record.state === 'on' && record.intervalStart !== null) {
      currentDuration = Math.max(0, (now - record.intervalStart) / 1000);
    }

    return {
      sourceId: this.sourceId,
      totalDuration: record.totalDuration + (currentDuration ?? 0),
      activationCount: record.activationCount,
      state: record.state,
      lastTrigger: record.lastTrigger,
      intervalStart: record.intervalStart,
      currentDuration,
      takenAt: now,
    };
  }

  /**
   * Zero the counters. An active source stays active, with its interval
   * reopened at the current time. Resolves once the write has landed.
   */
  async reset(): Promise<void> {
    if (this.closed) return;

    const now = this.clock.now();
    const wasOn = this.record.state === 'on';
    this.record = {
      ...emptyRecord(this.sourceId),
      state: this.record.state,
      intervalStart: wasOn ? now : null,
      lastPosition: this.record.lastPosition,
    };
    this.publishSnapshot();
    this.dirty = true;
    await this.enqueue(() => this.write());
  }

  /**
   * Load the persisted record. A missing, unreadable or malformed record
   * leaves the tracker at zero state.
   */
  async restoreFromStore(): Promise<void> {
    await this.enqueue(async () => {
      let raw: string | null;
      try {
        raw = await this.store.get(this.key);
      } catch (error) {
        this.counters.persistFailures++;
        this.record = emptyRecord(this.sourceId);
        this.warn({ message: 'Restore failed', error });
        return;
      }

      if (raw === null) {
        this.record = emptyRecord(this.sourceId);
        return;
      }

      const decoded = decodeRecord(this.sourceId, raw, this.clock.now());
      if (!decoded) {
        this.record = emptyRecord(this.sourceId);
        this.warn({ message: 'Discarded malformed record', key: this.key });
        return;
      }

      this.record = decoded;
      this.dirty = false;
    });
  }

  /** Write the current record. Resolves true on success. */
  async persistToStore(): Promise<boolean> {
    return this.enqueue(() => this.write());
  }

  /** Wait for queued work, then retry a write that previously failed. */
  async flush(): Promise<void> {
    await this.enqueue(async () => {
      if (this.dirty) await this.write();
    });
  }

  /** Push the current snapshot to the publisher and `snapshot` listeners. */
  publishSnapshot(): MetricSnapshot {
    const snapshot = this.snapshot();
    if (this.publisher) {
      try {
        this.publisher.publish(snapshot);
      } catch (error) {
        this.warn({ message: 'Publisher failed', error });
      }
    }
    this.emit('snapshot', snapshot);
    return snapshot;
  }

  /** Stop accepting events and flush pending state. */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  /**
   * Stop accepting events, wait for in-flight writes, then delete the
   * persisted record so a late write cannot resurrect it.
   */
  async discard(): Promise<void> {
    this.closed = true;
    await this.enqueue(async () => {
      try {
        await this.store.delete(this.key);
        this.dirty = false;
      } catch (error) {
        this.counters.persistFailures++;
        this.warn({ message: 'Delete failed', error });
      }
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private closedSeconds(record: Readonly<OccupancyRecord>, eventTime: number): number {
    if (record.intervalStart === null) return 0;

    if (eventTime < record.intervalStart) {
      this.counters.clampedIntervals++;
      this.warn({
        message: 'Clamped negative interval',
        intervalStart: record.intervalStart,
        eventTime,
      });
      return 0;
    }
    return (eventTime - record.intervalStart) / 1000;
  }

  // At most one write waits in the queue; it encodes whatever record is current when it runs
  private queueWrite(): void {
    this.dirty = true;
    if (this.writeQueued) return;
    this.writeQueued = true;

    this.enqueue(() => {
      this.writeQueued = false;
      return this.write();
    }).catch((error: unknown) => {
      this.warn({ message: 'Persist failed', error });
    });
  }

  private async write(): Promise<boolean> {
    try {
      await this.store.set(this.key, encodeRecord(this.record));
      this.dirty = false;
      return true;
    } catch (error) {
      this.counters.persistFailures++;
      this.dirty = true;
      this.warn({ message: 'Persist failed', error });
      return false;
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private warn(warning: EngineWarning): void {
    this.emit('warn', { ...warning, sourceId: this.sourceId });
  }
}
