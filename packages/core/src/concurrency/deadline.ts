/**
 * Deadlines for collaborator I/O
 * Every call into the catalog, ledger, order store or reply generator runs
 * under a timeout combined with the caller's AbortSignal.
 */
import { DeadlineExceededError, ServiceUnavailableError } from '../errors/service-errors.js';
import { createChildLogger } from '../observability/logger.js';

const log = createChildLogger({ component: 'deadline' });

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export async function withDeadline<T>(
  operation: string,
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  if (options.signal?.aborted) {
    throw new ServiceUnavailableError(`${operation} was cancelled by the caller`);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onCallerAbort: (() => void) | undefined;

  const expiry = new Promise<never>((_, reject) => {
    const fail = (error: Error): void => {
      controller.abort(error);
      reject(error);
    };
    timer = setTimeout(() => fail(new DeadlineExceededError(operation, options.timeoutMs)), options.timeoutMs);
    onCallerAbort = () => fail(new ServiceUnavailableError(`${operation} was cancelled by the caller`));
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  });

  const pending = task(controller.signal);
  // A task that loses the race may still reject later
  pending.catch((error: unknown) => {
    if (controller.signal.aborted) {
      log.debug({ operation, err: error }, 'Late failure after deadline');
    }
  });

  try {
    return await Promise.race([pending, expiry]);
  } finally {
    clearTimeout(timer);
    if (onCallerAbort) {
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
