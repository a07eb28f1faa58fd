import mongoose from 'mongoose';
import Redis from 'ioredis';
import {
  PollingDiscovery,
  RedisSetDiscovery,
  RedisStreamWatcher,
  TrackerRegistry,
  type EngineWarning,
} from '@occupancy-meter/core';
import { MongoStore } from '@occupancy-meter/provider-mongo';
import { loadConfig } from './config';
import { Logger } from './logger';
import { createHealthServer } from './health';
import { SnapshotBoard } from './publisher';
import { setupSignalHandlers } from './signals';

function logWarnings(logger: Logger) {
  return ({ message, ...details }: EngineWarning) => logger.warn(message, details);
}

async function main(): Promise<void> {
  const config = loadConfig(process.argv[2]);
  const logger = new Logger(config.logging.level, { service: 'occupancy-meter' });

  logger.info('Starting occupancy meter', {
    streamKey: config.stream.key,
    consumerGroup: config.stream.consumerGroup,
    consumerId: config.stream.consumerId,
  });

  await mongoose.connect(config.mongodb.uri);
  logger.info('Connected to MongoDB');

  const store = new MongoStore({ collectionName: config.mongodb.collectionName });
  await store.initialize();

  const board = new SnapshotBoard();

  // Blocking stream reads get their own connection
  const watcher = new RedisStreamWatcher({
    redis: config.redis.url,
    streamKey: config.stream.key,
    consumerGroup: config.stream.consumerGroup,
    consumerId: config.stream.consumerId,
    blockMs: config.stream.blockMs,
    batchSize: config.stream.batchSize,
  });

  const registry = new TrackerRegistry({
    store,
    watcher,
    publisher: board,
    keyPrefix: config.store.keyPrefix,
  });

  const redis = new Redis(config.redis.url);
  const discovery = new PollingDiscovery({
    discovery: new RedisSetDiscovery({
      redis,
      key: config.discovery.sourcesKey,
      sources: config.discovery.sources,
    }),
    target: registry,
    intervalMs: config.discovery.rescanIntervalMs,
  });

  const watcherLog = logger.child({ component: 'watcher' });
  watcher.on('started', () => watcherLog.info('Watcher started'));
  watcher.on('stopped', () => watcherLog.info('Watcher stopped'));
  watcher.on('recovery', (info: { messageCount: number }) =>
    watcherLog.info('PEL recovery', info)
  );
  watcher.on('warn', logWarnings(watcherLog));
  watcher.on('error', (err: unknown) => watcherLog.error('Watcher error', { error: err }));

  const registryLog = logger.child({ component: 'registry' });
  registry.on('added', (sourceId: string) => registryLog.info('Tracker added', { sourceId }));
  registry.on('removed', (sourceId: string) => registryLog.info('Tracker removed', { sourceId }));
  registry.on('warn', logWarnings(registryLog));

  const discoveryLog = logger.child({ component: 'discovery' });
  discovery.on('rescan', (ids: string[]) => discoveryLog.debug('Rescan completed', { sources: ids.length }));
  discovery.on('warn', logWarnings(discoveryLog));

  let healthServer: ReturnType<typeof createHealthServer> | undefined;
  if (config.health.enabled) {
    healthServer = createHealthServer({ port: config.health.port, registry, board });
    logger.info('Health server listening', { port: config.health.port });
  }

  setupSignalHandlers({
    logger,
    onShutdown: async () => {
      logger.info('Shutting down...');
      await discovery.stop();
      await registry.stop();
      const server = healthServer;
      if (server) {
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
      await redis.quit();
      await store.close();
      await mongoose.disconnect();
      logger.info('Shutdown complete');
    },
  });

  // Restore every known source before the watcher starts routing events
  await discovery.start();
  await registry.start();
  logger.info('Occupancy meter is running', { sources: registry.sourceIds().length });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
