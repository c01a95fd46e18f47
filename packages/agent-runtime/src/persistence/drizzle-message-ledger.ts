/**
 * Message Ledger on Postgres
 */
import { and, desc, eq, gte, sql } from 'drizzle-orm';
import { schema } from '@pedibot/core';
import type { Database } from '@pedibot/core';
import type { LedgerMessage, MessageLedger, NewLedgerMessage } from '../types/index.js';
import { toLedgerMessage } from './rows.js';

const { messages } = schema;

export class DrizzleMessageLedger implements MessageLedger {
  constructor(private db: Database) {}

  async append(message: NewLedgerMessage): Promise<string> {
    const [row] = await this.db
      .insert(messages)
      .values({
        userId: message.userId,
        role: message.role,
        body: message.body,
        createdAt: message.createdAt,
        channel: message.channel,
        sessionId: message.sessionId,
        handoff: message.handoff,
        releasesHandoff: message.releasesHandoff ?? false,
        externalId: message.externalId ?? null,
        orderId: message.orderId ?? null,
        mediaRef: message.mediaRef ?? null,
        tokens: message.tokens ?? null,
      })
      .returning({ id: messages.id });
    if (!row) {
      throw new Error('Message insert returned no row');
    }
    return row.id;
  }

  async findByExternalId(userId: string, externalId: string): Promise<LedgerMessage | null> {
    const [row] = await this.db
      .select()
      .from(messages)
      .where(and(eq(messages.userId, userId), eq(messages.externalId, externalId)))
      .limit(1);
    return row ? toLedgerMessage(row) : null;
  }

  async latestUserMessage(userId: string): Promise<LedgerMessage | null> {
    const [row] = await this.db
      .select()
      .from(messages)
      .where(and(eq(messages.userId, userId), eq(messages.role, 'user')))
      .orderBy(desc(messages.createdAt))
      .limit(1);
    return row ? toLedgerMessage(row) : null;
  }

  async countUserMessages(userId: string, sessionId: string): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(messages)
      .where(and(eq(messages.userId, userId), eq(messages.sessionId, sessionId), eq(messages.role, 'user')));
    return row?.count ?? 0;
  }

  async latestFlaggedAt(userId: string, since: Date): Promise<Date | null> {
    const [row] = await this.db
      .select({ createdAt: messages.createdAt })
      .from(messages)
      .where(and(eq(messages.userId, userId), eq(messages.handoff, true), gte(messages.createdAt, since)))
      .orderBy(desc(messages.createdAt))
      .limit(1);
    return row?.createdAt ?? null;
  }

  async latestReleaseAt(userId: string, since: Date): Promise<Date | null> {
    const [row] = await this.db
      .select({ createdAt: messages.createdAt })
      .from(messages)
      .where(and(eq(messages.userId, userId), eq(messages.releasesHandoff, true), gte(messages.createdAt, since)))
      .orderBy(desc(messages.createdAt))
      .limit(1);
    return row?.createdAt ?? null;
  }
}
