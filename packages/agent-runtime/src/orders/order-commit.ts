/**
 * Order Commit Pipeline
 * Validates a proposed order against the catalog, adds the delivery fee,
 * and persists it unless the same order was placed moments ago.
 *
 * Every outcome is returned as an OrderCommitResult; nothing throws.
 */
import { CONVERSATION_WINDOWS, OrderPayloadSchema, toOrderDraft } from '@pedibot/shared';
import type { OrderDraft, OrderDraftLine } from '@pedibot/shared';
import {
  PersistenceError,
  ServiceUnavailableError,
  createChildLogger,
  errorMessage,
  withDeadline,
} from '@pedibot/core';
import type { ZodIssue } from 'zod';
import type { CatalogSnapshot, RefreshingCatalog } from '../catalog/catalog-snapshot.js';
import type {
  CatalogLocation,
  OrderCommitResult,
  OrderStore,
  OrderValidationIssue,
  NewOrderItem,
  UserDirectory,
  UserKey,
} from '../types/index.js';
import { formatAmount, formatOrderConfirmation } from './confirmation.js';
import {
  DUPLICATE_ORDER_MESSAGE,
  GENERIC_APOLOGY,
  ORDER_FAILED_MESSAGE,
  formatValidationReply,
} from '../prompts/customer-messages.js';

const log = createChildLogger({ component: 'order-commit' });

/**
 * `<channel>:<phone>:<total>:<bucket>` where the bucket is the duplicate
 * window the commit falls in
 */
export function orderIdempotencyKey(
  user: UserKey,
  total: number,
  now: Date,
  windowMs: number = CONVERSATION_WINDOWS.DUPLICATE_ORDER_WINDOW_MS
): string {
  const bucket = Math.floor(now.getTime() / windowMs);
  return `${user.channel}:${user.phone}:${total}:${bucket}`;
}

export interface OrderCommitOptions {
  ioTimeoutMs: number;
  duplicateWindowMs?: number;
  /** Location used when the order names none */
  defaultLocationName?: string | null;
}

export interface CommitRequest {
  payload: unknown;
  user: UserKey;
  now: Date;
  signal?: AbortSignal;
}

interface PricedOrder {
  draft: OrderDraft;
  location: CatalogLocation;
  lines: Array<OrderDraftLine & { productId: string }>;
  total: number;
}

type PricingOutcome =
  | { ok: true; order: PricedOrder }
  | { ok: false; status: 'validation_error'; issue: OrderValidationIssue }
  | { ok: false; status: 'unavailable'; message: string };

function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let field = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      field += `[${segment}]`;
    } else {
      field += field ? `.${segment}` : segment;
    }
  }
  return field || 'payload';
}

function rawLineProduct(payload: unknown, index: number): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('items' in payload)) return undefined;
  const items = payload.items;
  if (!Array.isArray(items)) return undefined;
  const line: unknown = items[index];
  if (typeof line === 'object' && line !== null && 'product' in line && typeof line.product === 'string') {
    return line.product;
  }
  return undefined;
}

function issueFromZod(issue: ZodIssue, payload: unknown): OrderValidationIssue {
  const [head, index] = issue.path;
  const product = head === 'items' && typeof index === 'number' ? rawLineProduct(payload, index) : undefined;
  return { field: formatIssuePath(issue.path), product, message: issue.message };
}

export class OrderCommitPipeline {
  private duplicateWindowMs: number;

  constructor(
    private catalog: RefreshingCatalog,
    private users: UserDirectory,
    private orders: OrderStore,
    private options: OrderCommitOptions
  ) {
    this.duplicateWindowMs = options.duplicateWindowMs ?? CONVERSATION_WINDOWS.DUPLICATE_ORDER_WINDOW_MS;
  }

  async commit(request: CommitRequest): Promise<OrderCommitResult> {
    try {
      return await this.run(request);
    } catch (error) {
      log.error({ err: error, channel: request.user.channel }, 'Unexpected order commit failure');
      return this.unavailable(false, errorMessage(error));
    }
  }

  private async run({ payload, user, now, signal }: CommitRequest): Promise<OrderCommitResult> {
    const parsed = OrderPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const issue = first
        ? issueFromZod(first, payload)
        : { field: 'payload', message: 'Invalid order payload' };
      return this.rejected(false, issue);
    }
    const draft = toOrderDraft(parsed.data);

    let snapshot: CatalogSnapshot;
    try {
      snapshot = await this.catalog.current(now, signal);
    } catch (error) {
      return this.unavailable(false, errorMessage(error));
    }

    const priced = this.price(draft, snapshot);
    if (!priced.ok) {
      return priced.status === 'validation_error'
        ? this.rejected(false, priced.issue)
        : this.unavailable(false, priced.message);
    }
    const { order } = priced;
    if (parsed.data.total !== undefined && parsed.data.total !== order.total) {
      log.warn({ quoted: parsed.data.total, computed: order.total }, 'Quoted total differs from computed total');
    }

    let userId: string;
    let isNewUser: boolean;
    try {
      const ensured = await withDeadline('users.ensureUser', () => this.users.ensureUser(user, now), {
        timeoutMs: this.options.ioTimeoutMs,
        signal,
      });
      userId = ensured.user.id;
      isNewUser = ensured.created;
    } catch (error) {
      log.error({ err: error }, 'Could not resolve user for order');
      return this.unavailable(false, errorMessage(error));
    }

    const idempotencyKey = orderIdempotencyKey(user, order.total, now, this.duplicateWindowMs);
    const items: NewOrderItem[] = order.lines.map((line) => ({
      productId: line.productId,
      productName: line.productName,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      subtotal: line.subtotal,
    }));

    try {
      const outcome = await withDeadline(
        'orders.insertUnlessDuplicate',
        () =>
          this.orders.insertUnlessDuplicate(
            {
              userId,
              locationId: order.location.id,
              channel: user.channel,
              createdAt: now,
              total: order.total,
              paymentMethod: draft.paymentMethod,
              fulfillment: draft.fulfillment,
              deliveryAddress: draft.deliveryAddress,
              deliveryTime: draft.deliveryTime,
              notes: draft.notes,
              idempotencyKey,
              items,
            },
            new Date(now.getTime() - this.duplicateWindowMs)
          ),
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );

      if (outcome.status === 'duplicate') {
        log.warn({ userId, idempotencyKey, existingOrderId: outcome.existingOrderId }, 'Duplicate order suppressed');
        return {
          status: 'duplicate',
          success: false,
          isNewUser,
          confirmationText: DUPLICATE_ORDER_MESSAGE,
          orderId: outcome.existingOrderId,
        };
      }

      log.info(
        { userId, orderId: outcome.orderId, idempotencyKey, total: order.total, items: items.length },
        'Order committed'
      );
      return {
        status: 'committed',
        success: true,
        isNewUser,
        orderId: outcome.orderId,
        total: order.total,
        idempotencyKey,
        confirmationText: formatOrderConfirmation({ draft, lines: order.lines, total: order.total }),
      };
    } catch (error) {
      if (error instanceof ServiceUnavailableError) {
        log.error({ userId, idempotencyKey, err: error }, 'Order store unavailable');
        return this.unavailable(isNewUser, error.message);
      }
      const message = error instanceof PersistenceError ? error.message : errorMessage(error);
      log.error({ userId, idempotencyKey, err: error }, 'Order persistence failed');
      return {
        status: 'persistence_error',
        success: false,
        isNewUser,
        confirmationText: ORDER_FAILED_MESSAGE,
        error: { message },
      };
    }
  }

  /**
   * Resolve every line against the catalog, pick the location and add the
   * delivery fee
   */
  private price(draft: OrderDraft, snapshot: CatalogSnapshot): PricingOutcome {
    const lines: PricedOrder['lines'] = [];
    const delivery = snapshot.deliveryProduct();
    let hasDeliveryLine = false;

    for (const [index, line] of draft.items.entries()) {
      const product = snapshot.findProduct(line.productName);
      if (!product) {
        return this.invalid(`items[${index}].product`, 'Unknown or inactive product', line.productName);
      }
      if (line.unitPrice !== product.price) {
        return this.invalid(
          `items[${index}].precio_unitario`,
          `Unit price ${formatAmount(line.unitPrice)} does not match catalog price ${formatAmount(product.price)}`,
          line.productName
        );
      }
      if (line.subtotal !== line.unitPrice * line.quantity) {
        return this.invalid(
          `items[${index}].subtotal`,
          `Subtotal ${formatAmount(line.subtotal)} should be ${formatAmount(line.unitPrice * line.quantity)}`,
          line.productName
        );
      }
      if (delivery && product.id === delivery.id) {
        if (draft.fulfillment === 'pickup') {
          return this.invalid(`items[${index}].product`, 'Pickup orders carry no delivery fee', line.productName);
        }
        if (hasDeliveryLine || line.quantity !== 1) {
          return this.invalid(
            `items[${index}].quantity`,
            'The delivery fee is charged once per order',
            line.productName
          );
        }
        hasDeliveryLine = true;
      }
      lines.push({ ...line, productName: product.name, productId: product.id });
    }

    let location: CatalogLocation | undefined;
    if (draft.locationName) {
      location = snapshot.findLocation(draft.locationName);
      if (!location) {
        return this.invalid('local', `Unknown or inactive location "${draft.locationName}"`);
      }
    } else {
      location = snapshot.defaultLocation(this.options.defaultLocationName ?? null);
      if (!location) {
        return { ok: false, status: 'unavailable', message: 'No active location to take orders' };
      }
    }

    if (draft.fulfillment === 'delivery' && !hasDeliveryLine) {
      if (!delivery) {
        return { ok: false, status: 'unavailable', message: 'Delivery fee is not configured in the catalog' };
      }
      lines.push({
        productId: delivery.id,
        productName: delivery.name,
        quantity: 1,
        unitPrice: delivery.price,
        subtotal: delivery.price,
      });
    }

    const total = lines.reduce((sum, line) => sum + line.subtotal, 0);
    return { ok: true, order: { draft, location, lines, total } };
  }

  private invalid(field: string, message: string, product?: string): PricingOutcome {
    return { ok: false, status: 'validation_error', issue: { field, product, message } };
  }

  private rejected(isNewUser: boolean, issue: OrderValidationIssue): OrderCommitResult {
    log.info({ field: issue.field, product: issue.product }, 'Order rejected');
    return {
      status: 'validation_error',
      success: false,
      isNewUser,
      confirmationText: formatValidationReply(issue.message, issue.product),
      error: issue,
    };
  }

  private unavailable(isNewUser: boolean, message: string): OrderCommitResult {
    return {
      status: 'unavailable',
      success: false,
      isNewUser,
      confirmationText: GENERIC_APOLOGY,
      error: { message },
    };
  }
}
