/**
 * Session Tracker
 * Groups a user's messages into sessions split by an inactivity gap
 */
import { randomUUID } from 'crypto';
import { CONVERSATION_WINDOWS } from '@pedibot/shared';
import { KeyedMutex, createChildLogger, withDeadline } from '@pedibot/core';
import type { LedgerMessage, MessageLedger } from '../types/index.js';

const log = createChildLogger({ component: 'session-tracker' });

export interface SessionTrackerOptions {
  /** Deadline for each ledger read */
  ioTimeoutMs: number;
  sessionTimeoutMs?: number;
  newSessionId?: () => string;
}

export interface SessionCount {
  count: number;
  sessionId: string | null;
}

export class SessionTracker {
  private locks = new KeyedMutex();
  private sessionTimeoutMs: number;
  private newSessionId: () => string;

  constructor(
    private ledger: MessageLedger,
    private options: SessionTrackerOptions
  ) {
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? CONVERSATION_WINDOWS.SESSION_TIMEOUT_MS;
    this.newSessionId = options.newSessionId ?? randomUUID;
  }

  /**
   * Session id for a message arriving at `now`: the previous user message's
   * session when it is less than the timeout old, a fresh id otherwise.
   */
  async resolveSession(userId: string, now: Date, signal?: AbortSignal): Promise<string> {
    const latest = await this.readLatest(userId, signal);
    if (latest && this.isFresh(latest, now)) {
      return latest.sessionId;
    }
    const sessionId = this.newSessionId();
    log.debug({ userId, sessionId }, 'Minted session');
    return sessionId;
  }

  /**
   * User messages stamped with the active session. No active session counts zero.
   */
  async countInCurrentSession(userId: string, now: Date, signal?: AbortSignal): Promise<SessionCount> {
    const latest = await this.readLatest(userId, signal);
    if (!latest || !this.isFresh(latest, now)) {
      return { count: 0, sessionId: null };
    }

    try {
      const count = await withDeadline(
        'ledger.countUserMessages',
        () => this.ledger.countUserMessages(userId, latest.sessionId),
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );
      return { count, sessionId: latest.sessionId };
    } catch (error) {
      log.warn({ userId, err: error }, 'Could not count session messages, assuming zero');
      return { count: 0, sessionId: latest.sessionId };
    }
  }

  /**
   * Resolve the session and run `write` with it while holding the user's
   * session lock, so two concurrent messages cannot mint two sessions.
   */
  async stamp<T>(
    userId: string,
    now: Date,
    write: (sessionId: string) => Promise<T>,
    signal?: AbortSignal
  ): Promise<{ sessionId: string; result: T }> {
    return this.locks.runExclusive(userId, async () => {
      const sessionId = await this.resolveSession(userId, now, signal);
      const result = await write(sessionId);
      return { sessionId, result };
    });
  }

  private isFresh(message: LedgerMessage, now: Date): boolean {
    return now.getTime() - message.createdAt.getTime() < this.sessionTimeoutMs;
  }

  private async readLatest(userId: string, signal?: AbortSignal): Promise<LedgerMessage | null> {
    try {
      return await withDeadline(
        'ledger.latestUserMessage',
        () => this.ledger.latestUserMessage(userId),
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );
    } catch (error) {
      log.warn({ userId, err: error }, 'Could not read session history, starting fresh');
      return null;
    }
  }
}
