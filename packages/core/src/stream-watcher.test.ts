import { describe, it, expect, vi, beforeEach } from 'vitest';
import type Redis from 'ioredis';
import type { StateEvent } from '@occupancy-meter/types';
import { RedisStreamWatcher } from './stream-watcher';
import { ManualClock } from './clock';

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Stand-in for a BLOCK read that times out with nothing new. */
function idle(): Promise<null> {
  return new Promise((resolve) => setTimeout(() => resolve(null), 5));
}

function createMockRedis() {
  return {
    xgroup: vi.fn().mockResolvedValue('OK'),
    // First call (PEL recovery) returns null, then idle reads
    xreadgroup: vi.fn().mockResolvedValueOnce(null).mockImplementation(idle),
    xack: vi.fn().mockResolvedValue(1),
    quit: vi.fn().mockResolvedValue('OK'),
  };
}

describe('RedisStreamWatcher', () => {
  let redis: ReturnType<typeof createMockRedis>;
  let received: StateEvent[];
  const handler = (event: StateEvent) => {
    received.push(event);
  };

  beforeEach(() => {
    redis = createMockRedis();
    received = [];
  });

  function createWatcher(overrides = {}) {
    const watcher = new RedisStreamWatcher({
      redis: redis as unknown as Redis,
      streamKey: 'test:stream',
      consumerGroup: 'test-group',
      consumerId: 'test-consumer',
      clock: new ManualClock(42_000),
      ...overrides,
    });
    watcher.on('error', () => {});
    return watcher;
  }

  describe('subscribe', () => {
    it('should create a consumer group', async () => {
      const watcher = createWatcher();
      const unsubscribe = await watcher.subscribe(handler);

      expect(redis.xgroup).toHaveBeenCalledWith(
        'CREATE', 'test:stream', 'test-group', '0', 'MKSTREAM'
      );
      await unsubscribe();
    });

    it('should tolerate BUSYGROUP error (group already exists)', async () => {
      redis.xgroup.mockRejectedValueOnce(new Error('BUSYGROUP Consumer Group name already exists'));
      const watcher = createWatcher();

      const unsubscribe = await watcher.subscribe(handler);
      await unsubscribe();
    });

    it('should re-throw non-BUSYGROUP errors', async () => {
      redis.xgroup.mockRejectedValueOnce(new Error('Connection refused'));
      const watcher = createWatcher();

      await expect(watcher.subscribe(handler)).rejects.toThrow('Connection refused');
    });

    it('should refuse a second subscriber', async () => {
      const watcher = createWatcher();
      const unsubscribe = await watcher.subscribe(handler);

      await expect(watcher.subscribe(handler)).rejects.toThrow(
        'RedisStreamWatcher already has a subscriber'
      );
      await unsubscribe();
    });
  });

  describe('recovery', () => {
    it('should deliver and ACK pending entries on start', async () => {
      redis.xreadgroup.mockReset()
        .mockResolvedValueOnce([
          ['test:stream', [
            ['1-0', ['source', 'binary_sensor.hall', 'state', 'on', 'timestamp', '1000']],
          ]],
        ])
        .mockImplementation(idle);

      const watcher = createWatcher();
      const recovery = vi.fn();
      watcher.on('recovery', recovery);
      const unsubscribe = await watcher.subscribe(handler);

      expect(received).toEqual([
        { sourceId: 'binary_sensor.hall', state: 'on', timestamp: 1000, position: '1-0' },
      ]);
      expect(redis.xack).toHaveBeenCalledWith('test:stream', 'test-group', '1-0');
      expect(recovery).toHaveBeenCalledWith({ messageCount: 1 });

      await unsubscribe();
    });

    it('should read pending entries with ID 0', async () => {
      const watcher = createWatcher();
      const unsubscribe = await watcher.subscribe(handler);

      expect(redis.xreadgroup.mock.calls[0]).toEqual([
        'GROUP', 'test-group', 'test-consumer',
        'COUNT', 100,
        'STREAMS', 'test:stream', '0',
      ]);
      await unsubscribe();
    });
  });

  describe('read loop', () => {
    it('should deliver new entries in order', async () => {
      redis.xreadgroup.mockReset()
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce([
          ['test:stream', [
            ['2-0', ['source', 'a', 'state', 'on', 'timestamp', '100']],
            ['3-0', ['source', 'a', 'state', 'off', 'timestamp', '200']],
          ]],
        ])
        .mockImplementation(idle);

      const watcher = createWatcher();
      const unsubscribe = await watcher.subscribe(handler);

      await vi.waitFor(() => expect(redis.xack).toHaveBeenCalled());
      expect(received.map((e) => e.state)).toEqual(['on', 'off']);
      expect(redis.xack).toHaveBeenCalledWith('test:stream', 'test-group', '2-0', '3-0');

      await unsubscribe();
    });

    it('should fall back to the clock when an entry has no timestamp', async () => {
      redis.xreadgroup.mockReset()
        .mockResolvedValueOnce([
          ['test:stream', [['4-0', ['source', 'a', 'state', 'off']]]],
        ])
        .mockImplementation(idle);

      const watcher = createWatcher();
      const unsubscribe = await watcher.subscribe(handler);

      expect(received).toEqual([{ sourceId: 'a', state: 'off', timestamp: 42_000, position: '4-0' }]);
      await unsubscribe();
    });
  });

  describe('malformed entries', () => {
    it('should warn and ACK entries that cannot be parsed', async () => {
      redis.xreadgroup.mockReset()
        .mockResolvedValueOnce([
          ['test:stream', [
            ['7-0', ['bad', 'data']],
            ['8-0', ['source', 'a', 'state', 'unavailable']],
            ['9-0', ['source', 'a', 'state', 'on', 'timestamp', 'soon']],
          ]],
        ])
        .mockImplementation(idle);

      const watcher = createWatcher();
      const warns: { message: string }[] = [];
      watcher.on('warn', (w: { message: string }) => warns.push(w));
      const unsubscribe = await watcher.subscribe(handler);

      expect(received).toEqual([]);
      expect(warns.map((w) => w.message)).toEqual([
        'Dropped malformed event',
        'Dropped malformed event',
        'Dropped malformed event',
      ]);
      expect(redis.xack).toHaveBeenCalledWith('test:stream', 'test-group', '7-0', '8-0', '9-0');

      await unsubscribe();
    });
  });

  describe('at-least-once delivery', () => {
    it('should NOT ACK entries whose handler failed', async () => {
      redis.xreadgroup.mockReset()
        .mockResolvedValueOnce([
          ['test:stream', [['5-0', ['source', 'a', 'state', 'on', 'timestamp', '1']]]],
        ])
        .mockImplementation(idle);

      const watcher = createWatcher();
      const errors: unknown[] = [];
      watcher.on('error', (err: unknown) => errors.push(err));

      const unsubscribe = await watcher.subscribe(() => {
        throw new Error('tracker busy');
      });

      expect(redis.xack).not.toHaveBeenCalled();
      expect(errors).toHaveLength(1);

      await unsubscribe();
    });
  });

  describe('stop', () => {
    it('should emit started and stopped events', async () => {
      const watcher = createWatcher();
      const started = vi.fn();
      const stopped = vi.fn();
      watcher.on('started', started);
      watcher.on('stopped', stopped);

      const unsubscribe = await watcher.subscribe(handler);
      expect(started).toHaveBeenCalledOnce();

      await unsubscribe();
      expect(stopped).toHaveBeenCalledOnce();
    });

    it('should not quit redis when connection was passed in', async () => {
      const watcher = createWatcher();
      const unsubscribe = await watcher.subscribe(handler);
      await unsubscribe();

      expect(redis.quit).not.toHaveBeenCalled();
    });

    it('should accept a new subscriber after unsubscribe', async () => {
      const watcher = createWatcher();
      const first = await watcher.subscribe(handler);
      await first();

      const second = await watcher.subscribe(handler);
      await second();
    });
  });
});
