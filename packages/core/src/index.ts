/**
 * @pedibot/core
 * Core services: Observability, Errors, Concurrency, Database, Queue
 */

// Observability
export { logger, createChildLogger } from './observability/logger.js';
export type { Logger, LogContext } from './observability/logger.js';

// Errors
export {
  ServiceUnavailableError,
  DeadlineExceededError,
  PersistenceError,
  errorMessage,
} from './errors/service-errors.js';
export type { ServiceErrorCode } from './errors/service-errors.js';

// Concurrency
export { KeyedMutex } from './concurrency/keyed-mutex.js';
export { withDeadline } from './concurrency/deadline.js';
export type { DeadlineOptions } from './concurrency/deadline.js';

// Database
export { createDatabase, schema } from './database/client.js';
export type { Database, DatabaseHandle } from './database/client.js';
export { applyMigrations } from './database/migrate.js';

// Queue
export { QueueService } from './queue/queue.service.js';
export type { QueueConnection } from './queue/queue.service.js';
