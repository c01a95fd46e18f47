import { describe, it, expect, vi, afterEach } from 'vitest';
import { withDeadline } from '../../src/concurrency/deadline.js';
import { DeadlineExceededError, ServiceUnavailableError } from '../../src/errors/service-errors.js';

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the task result when it finishes in time', async () => {
    const result = await withDeadline('catalog.load', async () => 'ok', { timeoutMs: 1000 });
    expect(result).toBe('ok');
  });

  it('rejects with DeadlineExceededError and aborts the task signal on expiry', async () => {
    vi.useFakeTimers();
    let taskSignal: AbortSignal | undefined;

    const pending = withDeadline(
      'ledger.append',
      (signal) => {
        taskSignal = signal;
        return new Promise<string>(() => undefined);
      },
      { timeoutMs: 50 }
    );
    const assertion = expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(taskSignal?.aborted).toBe(true);
  });

  it('reports the operation name and timeout', async () => {
    vi.useFakeTimers();
    const pending = withDeadline('orders.insert', () => new Promise<void>(() => undefined), {
      timeoutMs: 20,
    });
    const assertion = expect(pending).rejects.toMatchObject({
      code: 'DEADLINE_EXCEEDED',
      operation: 'orders.insert',
      timeoutMs: 20,
    });
    await vi.advanceTimersByTimeAsync(20);
    await assertion;
  });

  it('fails fast when the caller signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn(async () => 'never');

    await expect(
      withDeadline('catalog.load', task, { timeoutMs: 1000, signal: controller.signal })
    ).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(task).not.toHaveBeenCalled();
  });

  it('propagates task errors unchanged', async () => {
    await expect(
      withDeadline('ledger.read', async () => {
        throw new Error('connection reset');
      }, { timeoutMs: 1000 })
    ).rejects.toThrow('connection reset');
  });
});
