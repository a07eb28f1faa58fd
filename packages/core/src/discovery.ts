import type Redis from 'ioredis';
import { EventEmitter } from 'events';
import type { SourceDiscovery } from '@occupancy-meter/types';

export const DEFAULT_SOURCES_KEY = 'occupancy:sources';
export const DEFAULT_RESCAN_MS = 60_000;

/** Fixed list of sources, e.g. from configuration. */
export class StaticDiscovery implements SourceDiscovery {
  private readonly sources: string[];

  constructor(sources: Iterable<string>) {
    this.sources = Array.from(new Set(sources));
  }

  async listSources(): Promise<string[]> {
    return [...this.sources];
  }
}

export interface RedisSetDiscoveryConfig {
  redis: Redis;
  /** Set holding the source ids. Default: "occupancy:sources" */
  key?: string;
  /** Sources tracked regardless of the set's contents. */
  sources?: string[];
}

/**
 * Sources registered in a Redis set (see StateClient.addSource), merged
 * with a static list.
 */
export class RedisSetDiscovery implements SourceDiscovery {
  private readonly redis: Redis;
  private readonly key: string;
  private readonly sources: string[];

  constructor(config: RedisSetDiscoveryConfig) {
    this.redis = config.redis;
    this.key = config.key ?? DEFAULT_SOURCES_KEY;
    this.sources = config.sources ?? [];
  }

  async listSources(): Promise<string[]> {
    const members = await this.redis.smembers(this.key);
    return Array.from(new Set([...this.sources, ...members])).sort();
  }
}

export interface DiscoveryTarget {
  onDiscoveryChanged(currentIds: Iterable<string>): Promise<void>;
}

export interface PollingDiscoveryConfig {
  discovery: SourceDiscovery;
  target: DiscoveryTarget;
  /** Rescan period. Default: 60000 */
  intervalMs?: number;
}

/**
 * Rescans a SourceDiscovery on a timer and reconciles the target with the
 * result. A failed listing leaves the tracked set untouched.
 *
 * Emits `rescan` with the listed ids and `warn` on failure.
 */
export class PollingDiscovery extends EventEmitter {
  private readonly discovery: SourceDiscovery;
  private readonly target: DiscoveryTarget;
  private readonly intervalMs: number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;

  constructor(config: PollingDiscoveryConfig) {
    super();
    this.discovery = config.discovery;
    this.target = config.target;
    this.intervalMs = config.intervalMs ?? DEFAULT_RESCAN_MS;
  }

  /** Run the first scan, then keep rescanning until stopped. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    await this.rescan();
    this.schedule();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /** Reconcile now. Concurrent calls share one scan. */
  async rescan(): Promise<void> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.scan();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async scan(): Promise<void> {
    let ids: string[];
    try {
      ids = await this.discovery.listSources();
    } catch (error) {
      this.emit('warn', { message: 'Discovery failed', error });
      return;
    }
    await this.target.onDiscoveryChanged(ids);
    this.emit('rescan', ids);
  }

  private schedule(): void {
    if (!this.running) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.rescan().then(
        () => this.schedule(),
        (error: unknown) => {
          this.emit('warn', { message: 'Discovery failed', error });
          this.schedule();
        }
      );
    }, this.intervalMs);
  }
}
