import Redis from 'ioredis';
import type { BinaryState } from '@occupancy-meter/types';

const DEFAULT_STREAM_KEY = 'occupancy:events';
const DEFAULT_SOURCES_KEY = 'occupancy:sources';
const DEFAULT_MAX_LEN = 100_000;

export interface StateClientConfig {
  /** Redis connection URL or ioredis instance. */
  redis: string | Redis;
  /** Stream key name. Default: "occupancy:events". */
  streamKey?: string;
  /** Discovery set key. Default: "occupancy:sources". */
  sourcesKey?: string;
  /** Approximate max stream length for auto-trimming. Default: 100000. Set to 0 to disable. */
  maxStreamLength?: number;
}

/**
 * Lightweight producer for binary state changes.
 *
 * Usage:
 * ```ts
 * const sensors = new StateClient({ redis: 'redis://localhost:6379' });
 * await sensors.addSource('binary_sensor.hallway_motion');
 * await sensors.on('binary_sensor.hallway_motion');
 * await sensors.off('binary_sensor.hallway_motion');
 * await sensors.close();
 * ```
 */
export class StateClient {
  private redis: Redis;
  private streamKey: string;
  private sourcesKey: string;
  private maxStreamLength: number;
  private ownsConnection: boolean;

  constructor(config: StateClientConfig) {
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.streamKey = config.streamKey ?? DEFAULT_STREAM_KEY;
    this.sourcesKey = config.sourcesKey ?? DEFAULT_SOURCES_KEY;
    this.maxStreamLength = config.maxStreamLength ?? DEFAULT_MAX_LEN;
  }

  /** Report a source as active. */
  async on(sourceId: string, timestamp?: number): Promise<void> {
    await this.report(sourceId, 'on', timestamp);
  }

  /** Report a source as inactive. */
  async off(sourceId: string, timestamp?: number): Promise<void> {
    await this.report(sourceId, 'off', timestamp);
  }

  /** Append a state observation. Timestamp defaults to now (epoch ms). */
  async report(sourceId: string, state: BinaryState, timestamp = Date.now()): Promise<void> {
    const fields: string[] = [
      'source', sourceId,
      'state', state,
      'timestamp', String(timestamp),
    ];

    if (this.maxStreamLength > 0) {
      // Approximate trimming (~) is O(1) and keeps the stream bounded
      await this.redis.xadd(
        this.streamKey, 'MAXLEN', '~', String(this.maxStreamLength), '*', ...fields
      );
    } else {
      await this.redis.xadd(this.streamKey, '*', ...fields);
    }
  }

  /** Register a source for tracking. */
  async addSource(sourceId: string): Promise<void> {
    await this.redis.sadd(this.sourcesKey, sourceId);
  }

  /** Deregister a source; the service drops its tracker and record. */
  async removeSource(sourceId: string): Promise<void> {
    await this.redis.srem(this.sourcesKey, sourceId);
  }

  /** Close the Redis connection (only if this client created it). */
  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
  }
}
