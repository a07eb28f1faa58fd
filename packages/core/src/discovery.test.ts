import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Redis from 'ioredis';
import { PollingDiscovery, RedisSetDiscovery, StaticDiscovery } from './discovery';

function createTarget() {
  return {
    onDiscoveryChanged: vi.fn().mockResolvedValue(undefined),
  };
}

describe('StaticDiscovery', () => {
  it('should list each configured source once', async () => {
    const discovery = new StaticDiscovery(['a', 'b', 'a']);
    expect(await discovery.listSources()).toEqual(['a', 'b']);
  });
});

describe('RedisSetDiscovery', () => {
  it('should merge set members with static sources', async () => {
    const redis = { smembers: vi.fn().mockResolvedValue(['b', 'a']) };
    const discovery = new RedisSetDiscovery({
      redis: redis as unknown as Redis,
      sources: ['c', 'a'],
    });

    expect(await discovery.listSources()).toEqual(['a', 'b', 'c']);
    expect(redis.smembers).toHaveBeenCalledWith('occupancy:sources');
  });
});

describe('PollingDiscovery', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reconcile on start and on every interval', async () => {
    const listSources = vi.fn()
      .mockResolvedValueOnce(['a'])
      .mockResolvedValueOnce(['a', 'b']);
    const target = createTarget();
    const polling = new PollingDiscovery({ discovery: { listSources }, target, intervalMs: 60_000 });

    await polling.start();
    expect(target.onDiscoveryChanged).toHaveBeenCalledWith(['a']);

    await vi.advanceTimersByTimeAsync(60_000);
    // stop() waits for the scan the timer started
    await polling.stop();

    expect(listSources).toHaveBeenCalledTimes(2);
    expect(target.onDiscoveryChanged).toHaveBeenLastCalledWith(['a', 'b']);
  });

  it('should leave the tracked set alone when listing fails', async () => {
    const listSources = vi.fn().mockRejectedValue(new Error('registry offline'));
    const target = createTarget();
    const polling = new PollingDiscovery({ discovery: { listSources }, target });
    const warns: { message: string }[] = [];
    polling.on('warn', (w: { message: string }) => warns.push(w));

    await polling.start();

    expect(target.onDiscoveryChanged).not.toHaveBeenCalled();
    expect(warns.map((w) => w.message)).toEqual(['Discovery failed']);
    await polling.stop();
  });

  it('should stop rescanning once stopped', async () => {
    const listSources = vi.fn().mockResolvedValue(['a']);
    const target = createTarget();
    const polling = new PollingDiscovery({ discovery: { listSources }, target, intervalMs: 1_000 });

    await polling.start();
    await polling.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(listSources).toHaveBeenCalledOnce();
  });

  it('should share one scan between concurrent rescans', async () => {
    const listSources = vi.fn().mockResolvedValue(['a']);
    const target = createTarget();
    const polling = new PollingDiscovery({ discovery: { listSources }, target });

    await Promise.all([polling.rescan(), polling.rescan()]);

    expect(listSources).toHaveBeenCalledOnce();
  });
});
