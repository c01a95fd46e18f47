/**
 * Error taxonomy shared by the conversation core
 */

export type ServiceErrorCode = 'SERVICE_UNAVAILABLE' | 'DEADLINE_EXCEEDED' | 'PERSISTENCE_ERROR';

/**
 * A collaborator (catalog, ledger, order store, reply generator) could not be
 * reached. The caller apologizes and may retry the whole inbound event.
 */
export class ServiceUnavailableError extends Error {
  constructor(
    message: string,
    public code: ServiceErrorCode = 'SERVICE_UNAVAILABLE',
    public cause?: unknown
  ) {
    super(message);
    this.name = 'ServiceUnavailableError';
  }
}

export class DeadlineExceededError extends ServiceUnavailableError {
  constructor(
    public operation: string,
    public timeoutMs: number
  ) {
    super(`${operation} did not complete within ${timeoutMs}ms`, 'DEADLINE_EXCEEDED');
    this.name = 'DeadlineExceededError';
  }
}

/**
 * A write transaction failed and was rolled back.
 */
export class PersistenceError extends Error {
  public code = 'PERSISTENCE_ERROR' as const;

  constructor(
    message: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
