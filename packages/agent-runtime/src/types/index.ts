/**
 * Agent Runtime Types
 */
import type { Channel, FulfillmentMode } from '@pedibot/shared';
import type { CatalogSnapshot } from '../catalog/catalog-snapshot.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDOFF STATES
// ═══════════════════════════════════════════════════════════════════════════════

export const HandoffState = {
  AUTOMATED: 'AUTOMATED',
  HUMAN_ACTIVE: 'HUMAN_ACTIVE',
} as const;

export type HandoffStateType = (typeof HandoffState)[keyof typeof HandoffState];

// ═══════════════════════════════════════════════════════════════════════════════
// USERS
// ═══════════════════════════════════════════════════════════════════════════════

/** A user is identified by phone and the channel they write from */
export interface UserKey {
  phone: string;
  channel: Channel;
}

export interface UserRecord {
  id: string;
  phone: string;
  channel: Channel;
  name: string | null;
  email: string | null;
  registeredAt: Date;
}

export interface UserProfileChanges {
  name?: string;
  email?: string;
}

export interface UserDirectory {
  /** Get-or-create by (phone, channel); `created` is true on first sight */
  ensureUser(key: UserKey, now: Date): Promise<{ user: UserRecord; created: boolean }>;
  findUser(key: UserKey): Promise<UserRecord | null>;
  updateProfile(userId: string, changes: UserProfileChanges): Promise<void>;
  /** Address of the newest order that has one */
  lastKnownAddress(userId: string): Promise<string | null>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MESSAGE LEDGER
// ═══════════════════════════════════════════════════════════════════════════════

export const MessageRole = {
  USER: 'user',
  AGENT: 'agent',
  SYSTEM: 'system',
} as const;

export type MessageRoleType = (typeof MessageRole)[keyof typeof MessageRole];

export interface LedgerMessage {
  id: string;
  userId: string;
  role: MessageRoleType;
  body: string;
  createdAt: Date;
  channel: Channel;
  sessionId: string;
  handoff: boolean;
  /** Set only on the entry that ends an operator intervention */
  releasesHandoff: boolean;
  /** Channel message id of an inbound user message */
  externalId: string | null;
  orderId: string | null;
  mediaRef: string | null;
  tokens: number | null;
}

export interface NewLedgerMessage {
  userId: string;
  role: MessageRoleType;
  body: string;
  createdAt: Date;
  channel: Channel;
  sessionId: string;
  handoff: boolean;
  releasesHandoff?: boolean;
  externalId?: string | null;
  orderId?: string | null;
  mediaRef?: string | null;
  tokens?: number | null;
}

/**
 * Append-only record of conversation turns. Entries are never updated.
 */
export interface MessageLedger {
  append(message: NewLedgerMessage): Promise<string>;
  /** The user message recorded for a channel event, if it was recorded already */
  findByExternalId(userId: string, externalId: string): Promise<LedgerMessage | null>;
  latestUserMessage(userId: string): Promise<LedgerMessage | null>;
  countUserMessages(userId: string, sessionId: string): Promise<number>;
  /** Newest handoff-flagged message at or after `since` */
  latestFlaggedAt(userId: string, since: Date): Promise<Date | null>;
  /** Newest end-of-intervention entry at or after `since` */
  latestReleaseAt(userId: string, since: Date): Promise<Date | null>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════════

export interface CatalogProduct {
  id: string;
  name: string;
  description: string | null;
  price: number;
  isCombo: boolean;
  category: string | null;
}

export interface CatalogLocation {
  id: string;
  name: string;
  address: string | null;
  phone: string | null;
}

export interface CatalogProvider {
  activeProducts(): Promise<CatalogProduct[]>;
  activeLocations(): Promise<CatalogLocation[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORDER STORE
// ═══════════════════════════════════════════════════════════════════════════════

export interface NewOrderItem {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

export interface NewOrder {
  userId: string;
  locationId: string;
  channel: Channel;
  createdAt: Date;
  total: number;
  paymentMethod: string;
  fulfillment: FulfillmentMode;
  deliveryAddress: string | null;
  deliveryTime: string;
  notes: string;
  idempotencyKey: string;
  items: NewOrderItem[];
}

export type OrderInsertOutcome =
  | { status: 'inserted'; orderId: string }
  | { status: 'duplicate'; existingOrderId: string };

export interface OrderStore {
  /**
   * Atomically: look for an order from the same user and channel with the
   * same total created after `duplicateSince`; insert order + items only when
   * none exists. Throws PersistenceError after rolling back.
   */
  insertUnlessDuplicate(order: NewOrder, duplicateSince: Date): Promise<OrderInsertOutcome>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORDER COMMIT RESULT
// ═══════════════════════════════════════════════════════════════════════════════

export interface OrderValidationIssue {
  /** Payload path, e.g. `items[1].precio_unitario` */
  field: string;
  /** Offending product, when the issue is on a line */
  product?: string;
  message: string;
}

interface OrderCommitBase {
  isNewUser: boolean;
  confirmationText: string;
}

export type OrderCommitResult =
  | (OrderCommitBase & {
      status: 'committed';
      success: true;
      orderId: string;
      total: number;
      idempotencyKey: string;
    })
  | (OrderCommitBase & { status: 'duplicate'; success: false; orderId: string })
  | (OrderCommitBase & { status: 'validation_error'; success: false; orderId?: undefined; error: OrderValidationIssue })
  | (OrderCommitBase & { status: 'unavailable'; success: false; orderId?: undefined; error: { message: string } })
  | (OrderCommitBase & { status: 'persistence_error'; success: false; orderId?: undefined; error: { message: string } });

// ═══════════════════════════════════════════════════════════════════════════════
// REPLY GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface AgentProfile {
  name: string | null;
  email: string | null;
  /** From the newest order with an address, or a pending profile update */
  address: string | null;
}

export interface ReplyContext {
  userId: string;
  channel: Channel;
  profile: AgentProfile;
  catalog: CatalogSnapshot;
  transcript: ConversationTurn[];
  message: string;
  mediaRef?: string;
}

/**
 * Typed reply from the generation provider. Payloads are unvalidated; the
 * order pipeline and profile update parse them.
 */
export interface ReplyResult {
  displayText: string;
  orderPayload?: unknown;
  profileUpdate?: unknown;
  tokensUsed?: number;
}

export interface ReplyGenerator {
  generate(context: ReplyContext, signal: AbortSignal): Promise<ReplyResult>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export interface InboundMessage {
  phone: string;
  channel: Channel;
  body: string;
  mediaRef?: string;
  /** Channel message id; a redelivered event reuses its recorded message */
  externalId?: string;
  /** Defaults to the orchestrator clock */
  now?: Date;
  signal?: AbortSignal;
}

export type HandlingOutcome =
  | { kind: 'automated_reply'; text: string; sessionId: string; order?: OrderCommitResult }
  | { kind: 'handoff_notice'; text: string; sessionId: string }
  | { kind: 'human_mode_silent'; sessionId: string }
  | { kind: 'session_limit_reached'; text: string; sessionId: string }
  | { kind: 'unavailable'; text: string; reason: string };

export type HandlingOutcomeKind = HandlingOutcome['kind'];

export interface OperationOptions {
  now?: Date;
  signal?: AbortSignal;
}
