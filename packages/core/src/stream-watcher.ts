import Redis from 'ioredis';
import { EventEmitter } from 'events';
import type {
  Clock,
  SourceWatcher,
  StateEvent,
  StateEventHandler,
  Unsubscribe,
} from '@occupancy-meter/types';
import { systemClock } from './clock';
import { normalizeState } from './record';

export const STREAM_DEFAULTS = {
  STREAM_KEY: 'occupancy:events',
  GROUP_NAME: 'occupancy-group',
  BLOCK_MS: 500,
  BATCH_SIZE: 100,
};

type StreamReply = [string, [string, string[]][]][] | null;

export interface StreamWatcherConfig {
  /** Redis connection URL or ioredis instance. Blocking reads need a dedicated connection. */
  redis: string | Redis;

  /** Stream key name. Default: "occupancy:events" */
  streamKey?: string;

  /** Consumer group name. Default: "occupancy-group" */
  consumerGroup?: string;

  /** Unique consumer ID within the group. Default: auto-generated */
  consumerId?: string;

  /** How long one XREADGROUP blocks (ms). Default: 500 */
  blockMs?: number;

  /** Maximum entries per read. Default: 100 */
  batchSize?: number;

  /** Fallback time for entries without a timestamp. */
  clock?: Clock;
}

/**
 * SourceWatcher over a Redis Stream consumer group.
 *
 * Entries carry `source`, `state` and an optional `timestamp` field, and the
 * entry id becomes the event's `position`. Each entry is ACK'd once the
 * handler settles, so entries in flight during a crash are redelivered on
 * the next start; trackers skip positions they have already applied.
 *
 * Emits `started`, `stopped`, `recovery`, `warn` and `error`.
 */
export class RedisStreamWatcher extends EventEmitter implements SourceWatcher {
  private redis: Redis;
  private ownsConnection: boolean;
  private handler: StateEventHandler | null = null;
  private running = false;
  private loop: Promise<void> | null = null;

  private readonly streamKey: string;
  private readonly groupName: string;
  private readonly consumerName: string;
  private readonly blockMs: number;
  private readonly batchSize: number;
  private readonly clock: Clock;

  constructor(config: StreamWatcherConfig) {
    super();
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }

    this.streamKey = config.streamKey ?? STREAM_DEFAULTS.STREAM_KEY;
    this.groupName = config.consumerGroup ?? STREAM_DEFAULTS.GROUP_NAME;
    this.consumerName = config.consumerId ?? `consumer-${process.pid}-${Date.now()}`;
    this.blockMs = config.blockMs ?? STREAM_DEFAULTS.BLOCK_MS;
    this.batchSize = config.batchSize ?? STREAM_DEFAULTS.BATCH_SIZE;
    this.clock = config.clock ?? systemClock;
  }

  /** Start delivering events to `handler`. Only one subscriber is supported. */
  async subscribe(handler: StateEventHandler): Promise<Unsubscribe> {
    if (this.handler) {
      throw new Error('RedisStreamWatcher already has a subscriber');
    }
    this.handler = handler;
    await this.start();
    return () => this.stop();
  }

  /** Start consuming from the Redis Stream. */
  async start(): Promise<void> {
    if (this.running) return;

    // Ensure consumer group exists (MKSTREAM creates the stream if needed)
    try {
      await this.redis.xgroup('CREATE', this.streamKey, this.groupName, '0', 'MKSTREAM');
    } catch (err) {
      if (!(err instanceof Error) || !err.message.includes('BUSYGROUP')) throw err;
    }

    this.running = true;
    this.emit('started');

    // Entries delivered but never ACK'd by a previous run come first
    await this.recoverPending();

    this.loop = this.readLoop();
  }

  /** Stop reading and wait for the current batch to finish. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.loop) {
      await this.loop;
      this.loop = null;
    }

    this.handler = null;

    if (this.ownsConnection) {
      await this.redis.quit();
    }
    this.emit('stopped');
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private async recoverPending(): Promise<void> {
    try {
      const results = await this.redis.xreadgroup(
        'GROUP', this.groupName, this.consumerName,
        'COUNT', this.batchSize,
        'STREAMS', this.streamKey, '0'
      ) as StreamReply;

      const delivered = await this.deliver(results);
      if (delivered > 0) {
        this.emit('recovery', { messageCount: delivered });
      }
    } catch (err) {
      this.emit('error', err);
    }
  }

  private async readLoop(): Promise<void> {
    while (this.running) {
      try {
        const results = await this.redis.xreadgroup(
          'GROUP', this.groupName, this.consumerName,
          'COUNT', this.batchSize,
          'BLOCK', this.blockMs,
          'STREAMS', this.streamKey, '>'
        ) as StreamReply;

        await this.deliver(results);
      } catch (err) {
        this.emit('error', err);
        await this.sleep(1000);
      }
    }
  }

  /**
   * Hand each entry to the subscriber in order and ACK the ones that were
   * handled or unusable. Returns the number of events delivered.
   */
  private async deliver(results: StreamReply): Promise<number> {
    if (!results || !this.handler) return 0;

    const idsToAck: string[] = [];
    let delivered = 0;

    for (const [, messages] of results) {
      for (const [id, fields] of messages) {
        const event = this.parseEvent(id, fields);
        if (!event) {
          // Redelivery would fail the same way
          idsToAck.push(id);
          continue;
        }

        try {
          await this.handler(event);
          idsToAck.push(id);
          delivered++;
        } catch (err) {
          // Left pending for redelivery on the next start
          this.emit('error', err);
        }
      }
    }

    if (idsToAck.length > 0) {
      await this.redis.xack(this.streamKey, this.groupName, ...idsToAck);
    }
    return delivered;
  }

  private parseEvent(id: string, fields: string[]): StateEvent | null {
    let source: string | undefined;
    let state: string | undefined;
    let timestamp: string | undefined;

    for (let i = 0; i < fields.length; i += 2) {
      switch (fields[i]) {
        case 'source': source = fields[i + 1]; break;
        case 'state': state = fields[i + 1]; break;
        case 'timestamp': timestamp = fields[i + 1]; break;
      }
    }

    const normalized = state === undefined ? null : normalizeState(state);
    if (!source || !normalized) {
      this.emit('warn', { message: 'Dropped malformed event', fields });
      return null;
    }

    const time = timestamp === undefined ? this.clock.now() : Number(timestamp);
    if (!Number.isFinite(time)) {
      this.emit('warn', { message: 'Dropped malformed event', fields });
      return null;
    }

    return { sourceId: source, state: normalized, timestamp: time, position: id };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
