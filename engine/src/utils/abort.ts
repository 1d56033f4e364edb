/**
 * Cancellable, timeout-bounded execution of long-running collaborator calls.
 */

import { OperationCancelledError, OperationTimeoutError } from '@repairgate/shared-types';

export function throwIfAborted(signal: AbortSignal | undefined, operation = 'operation'): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(`${operation} cancelled`);
  }
}

/**
 * Run `fn` with its own AbortSignal that fires when `timeoutMs` elapses or the
 * parent signal aborts. The returned promise rejects with OperationTimeoutError
 * or OperationCancelledError in those cases, even if `fn` ignores its signal or
 * rejects with its own error once aborted.
 *
 * A non-positive or non-finite timeout disables the timer.
 */
export async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
  operation = 'operation'
): Promise<T> {
  throwIfAborted(parentSignal, operation);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new OperationTimeoutError(timeoutMs, operation);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }

    if (parentSignal) {
      onAbort = () => {
        const error = new OperationCancelledError(`${operation} cancelled`);
        controller.abort(error);
        reject(error);
      };
      parentSignal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } catch (error) {
    // fn may reject on its own abort before the guard settles
    const reason: unknown = controller.signal.reason;
    if (reason instanceof OperationTimeoutError || reason instanceof OperationCancelledError) {
      throw reason;
    }
    throw error;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    if (onAbort) {
      parentSignal?.removeEventListener('abort', onAbort);
    }
  }
}
