/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * QUEUE PAYLOAD TYPES
 * Type definitions for BullMQ job payloads
 * ═══════════════════════════════════════════════════════════════════════════════
 */
import type { Channel } from '../constants/conversation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// inbound-message
// ═══════════════════════════════════════════════════════════════════════════════

export interface InboundMessagePayload {
  /** External message ID from the channel (also used as job id) */
  externalId: string;
  /** Sender phone number as delivered by the channel */
  phone: string;
  /** Channel the message arrived on */
  channel: Channel;
  /** Message text; media messages carry a placeholder such as "[Imagen]" */
  body: string;
  /** Media URL resolved by the transport */
  mediaRef?: string;
  /** ISO timestamp of reception */
  receivedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// message-send
// ═══════════════════════════════════════════════════════════════════════════════

export interface MessageSendPayload {
  /** Recipient phone number */
  to: string;
  channel: Channel;
  text: string;
  /** Inbound message this reply answers */
  replyToExternalId?: string;
}
