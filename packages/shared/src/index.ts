/**
 * @pedibot/shared
 * Shared schemas, constants and queue payload types
 */

// Schemas (Zod)
export * from './schemas/order.schemas.js';
export * from './schemas/queue.schemas.js';

// Types
export * from './types/queue-payloads.js';

// Constants
export * from './constants/conversation.js';
export * from './constants/queues.js';
