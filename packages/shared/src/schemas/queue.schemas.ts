/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * QUEUE PAYLOAD SCHEMAS
 * Job data is validated before processing; Redis holds whatever was enqueued
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { z } from 'zod';
import { CHANNELS } from '../constants/conversation.js';

export const InboundMessagePayloadSchema = z.object({
  externalId: z.string().min(1),
  phone: z.string().trim().min(1),
  channel: z.enum(CHANNELS),
  body: z.string(),
  mediaRef: z.string().min(1).optional(),
  receivedAt: z.string().datetime({ offset: true }),
});
