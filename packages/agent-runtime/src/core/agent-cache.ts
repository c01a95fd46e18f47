/**
 * Agent Cache
 * One conversational agent per user, evicted after a day without activity
 */
import { CONVERSATION_WINDOWS } from '@pedibot/shared';
import { KeyedMutex, createChildLogger } from '@pedibot/core';

const log = createChildLogger({ component: 'agent-cache' });

export type AgentFactory<T, C> = (userId: string, now: Date, context: C, signal?: AbortSignal) => Promise<T>;

interface AgentHandle<T> {
  agent: T;
  lastSeen: Date;
}

export interface AgentCacheOptions {
  idleTtlMs?: number;
}

export class AgentCache<T, C = void> {
  private handles = new Map<string, AgentHandle<T>>();
  private locks = new KeyedMutex();
  private idleTtlMs: number;

  constructor(
    private factory: AgentFactory<T, C>,
    options: AgentCacheOptions = {}
  ) {
    this.idleTtlMs = options.idleTtlMs ?? CONVERSATION_WINDOWS.AGENT_IDLE_TTL_MS;
  }

  /**
   * Cached agent for the user, built from `context` on first use. A failed
   * build caches nothing and rethrows.
   */
  async getOrCreate(userId: string, now: Date, context: C, signal?: AbortSignal): Promise<T> {
    return this.locks.runExclusive(userId, async () => {
      const existing = this.handles.get(userId);
      if (existing) {
        existing.lastSeen = now;
        return existing.agent;
      }

      const agent = await this.factory(userId, now, context, signal);
      this.handles.set(userId, { agent, lastSeen: now });
      log.debug({ userId }, 'Agent created');
      return agent;
    });
  }

  /**
   * Mark activity; returns false when no agent is cached
   */
  touch(userId: string, now: Date): boolean {
    const handle = this.handles.get(userId);
    if (!handle) return false;
    handle.lastSeen = now;
    return true;
  }

  /**
   * Evict handles idle for longer than the TTL. Returns the number evicted.
   */
  sweep(now: Date): number {
    let evicted = 0;
    for (const [userId, handle] of this.handles) {
      if (now.getTime() - handle.lastSeen.getTime() > this.idleTtlMs) {
        this.handles.delete(userId);
        evicted++;
      }
    }
    if (evicted > 0) {
      log.info({ evicted, remaining: this.handles.size }, 'Swept idle agents');
    }
    return evicted;
  }

  has(userId: string): boolean {
    return this.handles.has(userId);
  }

  lastSeen(userId: string): Date | undefined {
    return this.handles.get(userId)?.lastSeen;
  }

  get size(): number {
    return this.handles.size;
  }
}
