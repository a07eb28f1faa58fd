export { OccupancyTracker } from './tracker';
export type { TrackerCounters } from './tracker';
export { TrackerRegistry } from './registry';
export { MemoryStore } from './memory-store';
export { EmitterWatcher } from './emitter-watcher';
export { RedisStreamWatcher, STREAM_DEFAULTS } from './stream-watcher';
export type { StreamWatcherConfig } from './stream-watcher';
export {
  StaticDiscovery,
  RedisSetDiscovery,
  PollingDiscovery,
  DEFAULT_SOURCES_KEY,
  DEFAULT_RESCAN_MS,
} from './discovery';
export type {
  RedisSetDiscoveryConfig,
  PollingDiscoveryConfig,
  DiscoveryTarget,
} from './discovery';
export { systemClock, ManualClock } from './clock';
export {
  encodeRecord,
  decodeRecord,
  emptyRecord,
  recordKey,
  normalizeState,
  comparePositions,
  RECORD_VERSION,
  DEFAULT_KEY_PREFIX,
} from './record';

// Re-export types consumers need
export type {
  BinaryState,
  OccupancyRecord,
  StateEvent,
  MetricSnapshot,
  TrackerOptions,
  RegistryConfig,
  TrackerStats,
  EngineWarning,
  PersistenceStore,
  Clock,
  Unsubscribe,
  StateEventHandler,
  SourceWatcher,
  MetricPublisher,
  SourceDiscovery,
} from '@occupancy-meter/types';
