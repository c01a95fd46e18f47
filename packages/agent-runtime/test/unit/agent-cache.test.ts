/**
 * Tests for Agent Cache
 */
import { describe, it, expect, vi } from 'vitest';
import { ServiceUnavailableError } from '@pedibot/core';
import { AgentCache } from '../../src/core/agent-cache.js';
import { T0, hoursAfter, minutesAfter } from './mocks.js';

interface FakeAgent {
  userId: string;
  builtAt: Date;
}

function createCache() {
  const factory = vi.fn(async (userId: string, now: Date, _context: void): Promise<FakeAgent> => ({ userId, builtAt: now }));
  return { cache: new AgentCache<FakeAgent>(factory), factory };
}

describe('AgentCache', () => {
  it('should build an agent once and reuse it', async () => {
    const { cache, factory } = createCache();

    const first = await cache.getOrCreate('user-1', T0, undefined);
    const second = await cache.getOrCreate('user-1', minutesAfter(T0, 5), undefined);

    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.lastSeen('user-1')).toEqual(minutesAfter(T0, 5));
  });

  it('should build only once for concurrent first requests', async () => {
    const { cache, factory } = createCache();

    const [a, b] = await Promise.all([
      cache.getOrCreate('user-1', T0, undefined),
      cache.getOrCreate('user-1', T0, undefined),
    ]);

    expect(a).toBe(b);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('should evict agents idle for more than 24 hours', async () => {
    const { cache } = createCache();
    await cache.getOrCreate('idle', T0, undefined);
    await cache.getOrCreate('active', T0, undefined);
    cache.touch('active', hoursAfter(T0, 20));

    const evicted = cache.sweep(minutesAfter(T0, 24 * 60 + 1));

    expect(evicted).toBe(1);
    expect(cache.has('idle')).toBe(false);
    expect(cache.has('active')).toBe(true);
  });

  it('should keep an agent idle for exactly 24 hours', async () => {
    const { cache } = createCache();
    await cache.getOrCreate('user-1', T0, undefined);

    expect(cache.sweep(hoursAfter(T0, 24))).toBe(0);
    expect(cache.size).toBe(1);
  });

  it('should cache nothing when the agent cannot be built', async () => {
    const factory = vi.fn(async (): Promise<FakeAgent> => {
      throw new ServiceUnavailableError('Catalog unavailable');
    });
    const cache = new AgentCache<FakeAgent>(factory);

    await expect(cache.getOrCreate('user-1', T0, undefined)).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(cache.has('user-1')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should report touching an unknown user', () => {
    const { cache } = createCache();

    expect(cache.touch('nobody', T0)).toBe(false);
  });
});
