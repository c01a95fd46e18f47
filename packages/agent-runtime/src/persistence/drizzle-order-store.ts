/**
 * Order Store on Postgres
 *
 * The duplicate check and the inserts share one transaction. A transaction
 * scoped advisory lock on the user serializes concurrent commits across
 * worker processes, so two deliveries of the same order cannot both pass
 * the check.
 */
import { and, eq, gt, sql } from 'drizzle-orm';
import { PersistenceError, errorMessage, schema } from '@pedibot/core';
import type { Database } from '@pedibot/core';
import type { NewOrder, OrderInsertOutcome, OrderStore } from '../types/index.js';

const { orders, orderItems } = schema;

export class DrizzleOrderStore implements OrderStore {
  constructor(private db: Database) {}

  async insertUnlessDuplicate(order: NewOrder, duplicateSince: Date): Promise<OrderInsertOutcome> {
    try {
      return await this.db.transaction(async (tx): Promise<OrderInsertOutcome> => {
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${`order:${order.userId}`}))`);

        const [existing] = await tx
          .select({ id: orders.id })
          .from(orders)
          .where(
            and(
              eq(orders.userId, order.userId),
              eq(orders.channel, order.channel),
              eq(orders.total, order.total),
              gt(orders.createdAt, duplicateSince)
            )
          )
          .limit(1);
        if (existing) {
          return { status: 'duplicate', existingOrderId: existing.id };
        }

        const [created] = await tx
          .insert(orders)
          .values({
            userId: order.userId,
            locationId: order.locationId,
            channel: order.channel,
            createdAt: order.createdAt,
            status: 'pending',
            total: order.total,
            paymentMethod: order.paymentMethod,
            fulfillment: order.fulfillment,
            deliveryAddress: order.deliveryAddress,
            deliveryTime: order.deliveryTime,
            notes: order.notes,
            idempotencyKey: order.idempotencyKey,
          })
          .returning({ id: orders.id });
        if (!created) {
          throw new Error('Order insert returned no row');
        }

        await tx.insert(orderItems).values(
          order.items.map((item) => ({
            orderId: created.id,
            productId: item.productId,
            productName: item.productName,
            quantity: item.quantity,
            unitPrice: item.unitPrice,
            subtotal: item.subtotal,
          }))
        );

        return { status: 'inserted', orderId: created.id };
      });
    } catch (error) {
      throw new PersistenceError(`Order transaction rolled back: ${errorMessage(error)}`, error);
    }
  }
}
