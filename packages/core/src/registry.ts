import { EventEmitter } from 'events';
import type {
  Clock,
  EngineWarning,
  MetricPublisher,
  MetricSnapshot,
  PersistenceStore,
  RegistryConfig,
  SourceWatcher,
  StateEvent,
  TrackerStats,
  Unsubscribe,
} from '@occupancy-meter/types';
import { systemClock } from './clock';
import { OccupancyTracker, type TrackerCounters } from './tracker';

/**
 * Owns one OccupancyTracker per source and routes watcher events to them.
 *
 * Emits:
 * - `added` / `removed` with the source id
 * - `snapshot` for every tracker snapshot
 * - `warn` for recoverable conditions, including events for unknown sources
 */
export class TrackerRegistry extends EventEmitter {
  private trackers = new Map<string, OccupancyTracker>();
  private adding = new Map<string, Promise<OccupancyTracker>>();
  private removing = new Map<string, Promise<void>>();
  private unsubscribe: Unsubscribe | null = null;

  private readonly store: PersistenceStore;
  private readonly watcher: SourceWatcher | undefined;
  private readonly publisher: MetricPublisher | undefined;
  private readonly clock: Clock;
  private readonly keyPrefix: string | undefined;

  private droppedEvents = 0;

  // Counters of trackers that have since been removed
  private retired: TrackerCounters = {
    eventsProcessed: 0,
    duplicatesIgnored: 0,
    clampedIntervals: 0,
    persistFailures: 0,
  };

  constructor(config: RegistryConfig) {
    super();
    this.store = config.store;
    this.watcher = config.watcher;
    this.publisher = config.publisher;
    this.clock = config.clock ?? systemClock;
    this.keyPrefix = config.keyPrefix;
  }

  /** Subscribe to the watcher, if one was configured. */
  async start(): Promise<void> {
    if (this.unsubscribe || !this.watcher) return;
    this.unsubscribe = await this.watcher.subscribe((event) => this.dispatch(event));
    this.emit('started');
  }

  /** Unsubscribe and flush every tracker. */
  async stop(): Promise<void> {
    if (this.unsubscribe) {
      const unsubscribe = this.unsubscribe;
      this.unsubscribe = null;
      await unsubscribe();
    }

    await Promise.all(this.adding.values());
    await Promise.all(this.removing.values());
    await Promise.all(Array.from(this.trackers.values(), (tracker) => tracker.close()));
    this.emit('stopped');
  }

  /**
   * Start tracking a source. Re-adding a tracked source returns the
   * existing tracker.
   */
  async addSource(sourceId: string): Promise<OccupancyTracker> {
    const existing = this.trackers.get(sourceId);
    if (existing) return existing;

    const inFlight = this.adding.get(sourceId);
    if (inFlight) return inFlight;

    const creation = this.createTracker(sourceId);
    this.adding.set(sourceId, creation);
    try {
      return await creation;
    } finally {
      this.adding.delete(sourceId);
    }
  }

  /**
   * Stop tracking a source and delete its persisted record, after any
   * in-flight event for it has been written.
   */
  async removeSource(sourceId: string): Promise<void> {
    const inFlight = this.adding.get(sourceId);
    if (inFlight) await inFlight;

    const tracker = this.trackers.get(sourceId);
    if (!tracker) {
      await this.removing.get(sourceId);
      return;
    }

    // Unroute first so no new event reaches a tracker being torn down
    this.trackers.delete(sourceId);

    const removal = this.destroyTracker(tracker);
    this.removing.set(sourceId, removal);
    try {
      await removal;
    } finally {
      this.removing.delete(sourceId);
    }
  }

  /** Reconcile the tracked set against a fresh list of source ids. */
  async onDiscoveryChanged(currentIds: Iterable<string>): Promise<void> {
    const next = new Set(currentIds);
    const tracked = new Set([...this.trackers.keys(), ...this.adding.keys()]);

    const toRemove = [...tracked].filter((id) => !next.has(id));
    const toAdd = [...next].filter((id) => !tracked.has(id));

    await Promise.all([
      ...toRemove.map((id) => this.removeSource(id)),
      ...toAdd.map((id) => this.addSource(id)),
    ]);
  }

  /** Route an event to its tracker. Events for unknown sources are dropped. */
  async dispatch(event: StateEvent): Promise<void> {
    const tracker = this.trackers.get(event.sourceId) ?? (await this.adding.get(event.sourceId));
    if (!tracker) {
      this.droppedEvents++;
      this.warn({ message: 'Dropped event for unknown source', sourceId: event.sourceId });
      return;
    }
    await tracker.handleEvent(event.state, event.timestamp, event.position);
  }

  get(sourceId: string): OccupancyTracker | undefined {
    return this.trackers.get(sourceId);
  }

  has(sourceId: string): boolean {
    return this.trackers.has(sourceId);
  }

  sourceIds(): string[] {
    return Array.from(this.trackers.keys());
  }

  /** Live snapshots of every tracked source, taken at one instant. */
  snapshots(now = this.clock.now()): MetricSnapshot[] {
    return Array.from(this.trackers.values(), (tracker) => tracker.snapshot(now));
  }

  getStats(): Readonly<TrackerStats> {
    const totals = { ...this.retired };
    for (const tracker of this.trackers.values()) {
      addCounters(totals, tracker.getStats());
    }
    return {
      ...totals,
      trackedSources: this.trackers.size,
      droppedEvents: this.droppedEvents,
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private async createTracker(sourceId: string): Promise<OccupancyTracker> {
    // A removal of the same id must finish deleting before we read the store
    const pendingRemoval = this.removing.get(sourceId);
    if (pendingRemoval) await pendingRemoval;

    const tracker = new OccupancyTracker({
      sourceId,
      store: this.store,
      publisher: this.publisher,
      clock: this.clock,
      keyPrefix: this.keyPrefix,
    });
    tracker.on('warn', (warning: EngineWarning) => this.warn(warning));
    tracker.on('snapshot', (snapshot: MetricSnapshot) => this.emit('snapshot', snapshot));

    await tracker.restoreFromStore();
    this.trackers.set(sourceId, tracker);
    tracker.publishSnapshot();
    this.emit('added', sourceId);
    return tracker;
  }

  private async destroyTracker(tracker: OccupancyTracker): Promise<void> {
    await tracker.discard();
    if (this.publisher?.retract) {
      try {
        this.publisher.retract(tracker.sourceId);
      } catch (error) {
        this.warn({ message: 'Publisher failed', sourceId: tracker.sourceId, error });
      }
    }
    addCounters(this.retired, tracker.getStats());
    tracker.removeAllListeners();
    this.emit('removed', tracker.sourceId);
  }

  private warn(warning: EngineWarning): void {
    this.emit('warn', warning);
  }
}

function addCounters(target: TrackerCounters, source: Readonly<TrackerCounters>): void {
  target.eventsProcessed += source.eventsProcessed;
  target.duplicatesIgnored += source.duplicatesIgnored;
  target.clampedIntervals += source.clampedIntervals;
  target.persistFailures += source.persistFailures;
}
