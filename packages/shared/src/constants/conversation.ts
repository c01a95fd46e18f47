/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CONVERSATION CONSTANTS
 * Time windows and limits shared by the session, handoff and order pipeline
 * ═══════════════════════════════════════════════════════════════════════════════
 */

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export const CONVERSATION_WINDOWS = {
  /** Gap between user messages that starts a new session */
  SESSION_TIMEOUT_MS: 12 * HOUR_MS,
  /** How long a handoff-flagged message keeps the conversation with a human */
  HANDOFF_WINDOW_MS: 2 * HOUR_MS,
  /** Repeated order with the same total inside this window is a duplicate */
  DUPLICATE_ORDER_WINDOW_MS: 5 * MINUTE_MS,
  /** Agent handles untouched for longer than this are evicted */
  AGENT_IDLE_TTL_MS: 24 * HOUR_MS,
} as const;

export const CONVERSATION_LIMITS = {
  /** User messages per session before automated replies stop */
  DEFAULT_SESSION_MESSAGE_CAP: 50,
  /** Turns kept in an agent's in-memory transcript */
  AGENT_TRANSCRIPT_TURNS: 20,
} as const;

export const DEFAULT_DELIVERY_TIME = 'immediate';

/** Catalog product whose price is charged on delivery orders */
export const DELIVERY_PRODUCT_NAME = 'Delivery';

/**
 * Inbound bodies that request a human operator.
 * Exact phrases are compared case-insensitively after trimming.
 */
export const HANDOFF_TRIGGERS = {
  EXACT: ['#human', 'hablar con humano', 'operador', 'ayuda humana'],
  SUBSTRING: 'hablar con',
} as const;

export const CHANNELS = ['whatsapp', 'console', 'web'] as const;

export type Channel = (typeof CHANNELS)[number];

export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}
