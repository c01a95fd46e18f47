/**
 * User Directory on Postgres
 */
import { and, desc, eq, isNotNull } from 'drizzle-orm';
import { schema } from '@pedibot/core';
import type { Database } from '@pedibot/core';
import type { UserDirectory, UserKey, UserProfileChanges, UserRecord } from '../types/index.js';
import { toUserRecord } from './rows.js';

const { users, orders } = schema;

export class DrizzleUserDirectory implements UserDirectory {
  constructor(private db: Database) {}

  /**
   * Insert-or-read on the (phone, channel) unique index, so concurrent first
   * messages end up with the same row
   */
  async ensureUser(key: UserKey, now: Date): Promise<{ user: UserRecord; created: boolean }> {
    const [inserted] = await this.db
      .insert(users)
      .values({ phone: key.phone, channel: key.channel, registeredAt: now })
      .onConflictDoNothing({ target: [users.phone, users.channel] })
      .returning();
    if (inserted) {
      return { user: toUserRecord(inserted), created: true };
    }

    const existing = await this.findUser(key);
    if (!existing) {
      throw new Error('User vanished after insert conflict');
    }
    return { user: existing, created: false };
  }

  async findUser(key: UserKey): Promise<UserRecord | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(and(eq(users.phone, key.phone), eq(users.channel, key.channel)))
      .limit(1);
    return row ? toUserRecord(row) : null;
  }

  async updateProfile(userId: string, changes: UserProfileChanges): Promise<void> {
    const values: Partial<typeof users.$inferInsert> = {};
    if (changes.name !== undefined) values.name = changes.name;
    if (changes.email !== undefined) values.email = changes.email;
    if (Object.keys(values).length === 0) return;

    await this.db.update(users).set(values).where(eq(users.id, userId));
  }

  async lastKnownAddress(userId: string): Promise<string | null> {
    const [row] = await this.db
      .select({ address: orders.deliveryAddress })
      .from(orders)
      .where(and(eq(orders.userId, userId), isNotNull(orders.deliveryAddress)))
      .orderBy(desc(orders.createdAt))
      .limit(1);
    return row?.address ?? null;
  }
}
