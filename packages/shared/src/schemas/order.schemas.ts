/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ORDER SCHEMAS
 * Zod schemas for the order and profile payloads produced by the reply generator
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { z } from 'zod';
import { DEFAULT_DELIVERY_TIME } from '../constants/conversation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COMMON SCHEMAS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export const ORDER_RULES = {
  /** Maximum lines per order */
  MAX_ITEMS_PER_ORDER: 50,
  /** Maximum quantity per line */
  MAX_QUANTITY_PER_ITEM: 100,
  /** Payment method recorded when none is given */
  DEFAULT_PAYMENT_METHOD: 'pendiente',
} as const;

/**
 * Whole currency amount. The model sometimes sends "1200" or 1200.0, which
 * are accepted; a fractional amount is rejected.
 */
const amountSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/, 'Expected a numeric amount')])
  .transform((value) => Number(value))
  .pipe(z.number().finite().int('Amounts must be whole numbers').nonnegative());

const quantitySchema = z
  .union([z.number().finite(), z.string().trim().regex(/^\d+$/, 'Expected an integer quantity')])
  .transform((value) => Number(value))
  .pipe(
    z
      .number()
      .int()
      .positive()
      .max(ORDER_RULES.MAX_QUANTITY_PER_ITEM, `Maximum ${ORDER_RULES.MAX_QUANTITY_PER_ITEM} units per item`)
  );

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// ═══════════════════════════════════════════════════════════════════════════════
// ORDER PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════════

export const OrderLineSchema = z.object({
  /** Catalog product name */
  product: z.string().trim().min(1, 'Product name is required'),
  quantity: quantitySchema,
  /** Unit price the customer was quoted */
  precio_unitario: amountSchema,
  subtotal: amountSchema,
});

/**
 * Order as proposed in conversation.
 *
 * `observaciones` must be present (it may be empty). Delivery orders
 * (`is_takeaway: false`) need `direccion`.
 */
export const OrderPayloadSchema = z
  .object({
    items: z
      .array(OrderLineSchema)
      .min(1, 'Order must contain at least one item')
      .max(ORDER_RULES.MAX_ITEMS_PER_ORDER, `Maximum ${ORDER_RULES.MAX_ITEMS_PER_ORDER} items per order`),
    is_takeaway: z.boolean().default(false),
    medio_pago: optionalText,
    observaciones: z.string({ required_error: 'observaciones is required (may be empty)' }),
    direccion: optionalText,
    horario_entrega: optionalText,
    /** Location name; defaults to the configured store */
    local: optionalText,
    /** Total as computed by the model; informative only */
    total: amountSchema.optional(),
  })
  .superRefine((data, ctx) => {
    if (!data.is_takeaway && !data.direccion) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['direccion'],
        message: 'Delivery orders require a delivery address',
      });
    }
  });

export type OrderPayload = z.output<typeof OrderPayloadSchema>;

export type FulfillmentMode = 'pickup' | 'delivery';

export interface OrderDraftLine {
  productName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

export interface OrderDraft {
  items: OrderDraftLine[];
  fulfillment: FulfillmentMode;
  paymentMethod: string;
  notes: string;
  deliveryAddress: string | null;
  deliveryTime: string;
  locationName: string | null;
}

/**
 * Normalize a parsed payload into the camelCase draft used by the pipeline
 */
export function toOrderDraft(payload: OrderPayload): OrderDraft {
  const fulfillment: FulfillmentMode = payload.is_takeaway ? 'pickup' : 'delivery';
  return {
    items: payload.items.map((item) => ({
      productName: item.product,
      quantity: item.quantity,
      unitPrice: item.precio_unitario,
      subtotal: item.subtotal,
    })),
    fulfillment,
    paymentMethod: payload.medio_pago ?? ORDER_RULES.DEFAULT_PAYMENT_METHOD,
    notes: payload.observaciones,
    deliveryAddress: fulfillment === 'delivery' ? payload.direccion ?? null : null,
    deliveryTime: payload.horario_entrega ?? DEFAULT_DELIVERY_TIME,
    locationName: payload.local ?? null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE UPDATE
// ═══════════════════════════════════════════════════════════════════════════════

export const ProfileUpdateSchema = z
  .object({
    nombre: optionalText,
    email: z.preprocess(
      (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value ?? undefined),
      z.string().trim().email().optional()
    ),
    direccion: optionalText,
  })
  .refine((data) => Boolean(data.nombre || data.email || data.direccion), {
    message: 'Profile update must contain at least one field',
  });

export type ProfileUpdate = z.output<typeof ProfileUpdateSchema>;
