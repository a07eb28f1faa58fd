export type {
  BinaryState,
  OccupancyRecord,
  StateEvent,
  MetricSnapshot,
  TrackerOptions,
  RegistryConfig,
  TrackerStats,
  EngineWarning,
} from './core';

export type {
  PersistenceStore,
  Clock,
  Unsubscribe,
  StateEventHandler,
  SourceWatcher,
  MetricPublisher,
  SourceDiscovery,
} from './provider';
