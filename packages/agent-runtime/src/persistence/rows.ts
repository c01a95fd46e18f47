/**
 * Row → domain mapping shared by the drizzle stores
 */
import { isChannel } from '@pedibot/shared';
import type { Channel } from '@pedibot/shared';
import type { schema } from '@pedibot/core';
import type { LedgerMessage, UserRecord } from '../types/index.js';

export function toChannel(value: string): Channel {
  if (!isChannel(value)) {
    throw new Error(`Unknown channel "${value}" in stored row`);
  }
  return value;
}

export function toUserRecord(row: typeof schema.users.$inferSelect): UserRecord {
  return {
    id: row.id,
    phone: row.phone,
    channel: toChannel(row.channel),
    name: row.name,
    email: row.email,
    registeredAt: row.registeredAt,
  };
}

export function toLedgerMessage(row: typeof schema.messages.$inferSelect): LedgerMessage {
  return {
    id: row.id,
    userId: row.userId,
    role: row.role,
    body: row.body,
    createdAt: row.createdAt,
    channel: toChannel(row.channel),
    sessionId: row.sessionId,
    handoff: row.handoff,
    releasesHandoff: row.releasesHandoff,
    externalId: row.externalId,
    orderId: row.orderId,
    mediaRef: row.mediaRef,
    tokens: row.tokens,
  };
}
