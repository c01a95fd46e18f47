/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * QUEUE DEFINITIONS
 * BullMQ queue configurations and constants
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export interface QueueConfig {
  name: string;
  /** Jobs one worker runs at once; queues without a worker here omit it */
  concurrency?: number;
  attempts: number;
  backoff: {
    type: 'exponential' | 'fixed';
    delay: number;
  };
}

export const QUEUES = {
  // ═══════════════════════════════════════════════════════════════════════════
  // INBOUND PROCESSING
  // ═══════════════════════════════════════════════════════════════════════════
  INBOUND_MESSAGE: {
    name: 'inbound-message',
    concurrency: 5,
    attempts: 3,
    backoff: { type: 'exponential' as const, delay: 1000 },
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // MESSAGE SENDING
  // ═══════════════════════════════════════════════════════════════════════════
  MESSAGE_SEND: {
    name: 'message-send',
    attempts: 5,
    backoff: { type: 'exponential' as const, delay: 2000 },
  },
} as const satisfies Record<string, QueueConfig>;
