import type {
  Clock,
  MetricPublisher,
  PersistenceStore,
  SourceWatcher,
} from './provider';

/** Binary state of a monitored source. */
export type BinaryState = 'off' | 'on';

/**
 * Accumulated occupancy for one source.
 * Timestamps are epoch ms, durations are seconds.
 */
export interface OccupancyRecord {
  sourceId: string;

  /** Seconds of closed ON intervals. */
  totalDuration: number;

  /** Number of observed off→on transitions. */
  activationCount: number;

  state: BinaryState;

  /** Start of the open interval; set iff state is 'on'. */
  intervalStart: number | null;

  /** Most recent off→on transition, kept while off. */
  lastTrigger: number | null;

  /** Watcher position of the last applied event, if the watcher has one. */
  lastPosition: string | null;
}

/**
 * A single state observation for a source
 */
export interface StateEvent {
  /** Source identifier (e.g., 'binary_sensor.hallway_motion') */
  sourceId: string;

  state: BinaryState;

  /** Event timestamp (epoch ms) */
  timestamp: number;

  /**
   * Monotonic delivery position, e.g. a stream entry id. Events at or
   * below a tracker's last applied position are replays and are skipped.
   */
  position?: string;
}

/**
 * Point-in-time view of a tracker, pushed to MetricPublisher
 */
export interface MetricSnapshot {
  sourceId: string;

  /** Live total: closed intervals plus the open one, in seconds */
  totalDuration: number;

  activationCount: number;

  state: BinaryState;

  lastTrigger: number | null;

  intervalStart: number | null;

  /** Seconds elapsed in the open interval, null while off */
  currentDuration: number | null;

  /** Time the snapshot was taken (epoch ms) */
  takenAt: number;
}

/**
 * Wiring for a single OccupancyTracker
 */
export interface TrackerOptions {
  sourceId: string;

  store: PersistenceStore;

  /** Sink for snapshots after every mutation. */
  publisher?: MetricPublisher;

  /** Default: system clock */
  clock?: Clock;

  /** Prefix for the persisted record key. Default: "occupancy:" */
  keyPrefix?: string;
}

/**
 * Configuration for the TrackerRegistry
 */
export interface RegistryConfig {
  store: PersistenceStore;

  /** Event source. Optional when events are dispatched directly. */
  watcher?: SourceWatcher;

  publisher?: MetricPublisher;

  clock?: Clock;

  keyPrefix?: string;
}

/**
 * Engine statistics for monitoring
 */
export interface TrackerStats {
  /** Sources currently tracked */
  trackedSources: number;

  /** Events that changed a tracker's state */
  eventsProcessed: number;

  /** Events repeating the current state or an already applied position */
  duplicatesIgnored: number;

  /** ON→OFF events older than their interval start */
  clampedIntervals: number;

  /** Events for sources that are not tracked */
  droppedEvents: number;

  /** Failed store reads and writes */
  persistFailures: number;
}

/**
 * Recoverable diagnostic emitted on the 'warn' channel
 */
export interface EngineWarning {
  message: string;
  sourceId?: string;
  error?: unknown;
  [key: string]: unknown;
}
