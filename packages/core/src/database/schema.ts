/**
 * Postgres schema (drizzle-orm)
 * Amounts are whole currency units stored as integers.
 */
import {
  pgTable,
  uuid,
  text,
  integer,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    phone: text('phone').notNull(),
    channel: text('channel').notNull(),
    name: text('name'),
    email: text('email'),
    registeredAt: timestamp('registered_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    uqUserIdentity: uniqueIndex('uq_users_phone_channel').on(t.phone, t.channel),
  })
);

export const locations = pgTable('locations', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  address: text('address'),
  phone: text('phone'),
  active: boolean('active').notNull().default(true),
});

export const products = pgTable(
  'products',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: text('name').notNull(),
    description: text('description'),
    basePrice: integer('base_price').notNull(),
    isCombo: boolean('is_combo').notNull().default(false),
    category: text('category'),
    active: boolean('active').notNull().default(true),
  },
  (t) => ({
    idxProductsActive: index('idx_products_active').on(t.active),
  })
);

export const orders = pgTable(
  'orders',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    locationId: uuid('location_id')
      .notNull()
      .references(() => locations.id),
    channel: text('channel').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    status: text('status').notNull().default('pending'),
    total: integer('total').notNull(),
    paymentMethod: text('payment_method').notNull(),
    fulfillment: text('fulfillment', { enum: ['pickup', 'delivery'] }).notNull(),
    deliveryAddress: text('delivery_address'),
    deliveryTime: text('delivery_time').notNull(),
    notes: text('notes').notNull().default(''),
    idempotencyKey: text('idempotency_key').notNull(),
  },
  (t) => ({
    idxOrdersUserCreated: index('idx_orders_user_created').on(t.userId, t.createdAt),
  })
);

export const orderItems = pgTable(
  'order_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    orderId: uuid('order_id')
      .notNull()
      .references(() => orders.id, { onDelete: 'cascade' }),
    productId: uuid('product_id')
      .notNull()
      .references(() => products.id),
    productName: text('product_name').notNull(),
    quantity: integer('quantity').notNull(),
    unitPrice: integer('unit_price').notNull(),
    subtotal: integer('subtotal').notNull(),
  },
  (t) => ({
    idxOrderItemsOrder: index('idx_order_items_order').on(t.orderId),
  })
);

export const messages = pgTable(
  'messages',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    orderId: uuid('order_id').references(() => orders.id),
    role: text('role', { enum: ['user', 'agent', 'system'] }).notNull(),
    body: text('body').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    channel: text('channel').notNull(),
    sessionId: uuid('session_id').notNull(),
    handoff: boolean('handoff').notNull().default(false),
    releasesHandoff: boolean('releases_handoff').notNull().default(false),
    externalId: text('external_id'),
    mediaRef: text('media_ref'),
    tokens: integer('tokens'),
  },
  (t) => ({
    idxMessagesUserCreated: index('idx_messages_user_created').on(t.userId, t.createdAt),
    idxMessagesSession: index('idx_messages_session').on(t.userId, t.sessionId),
    uqMessagesExternal: uniqueIndex('uq_messages_user_external').on(t.userId, t.externalId),
  })
);
