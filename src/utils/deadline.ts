/**
 * Deadlines for async work.
 *
 * `withDeadline` races a task against a timer. The task receives an
 * AbortSignal that fires when the deadline passes or the parent signal
 * aborts, so well-behaved work (fetch, model clients) stops early. The race
 * settles at the deadline even when the task ignores its signal.
 */

import { DeadlineError } from './errors.js';

export interface DeadlineOptions {
  /** Milliseconds before the deadline fires */
  timeoutMs: number;
  /** Error code for the DeadlineError. Default: 'DEADLINE_EXCEEDED' */
  code?: string;
  /** Label used in the error message */
  label?: string;
  /** Parent signal; aborting it aborts the task as well */
  signal?: AbortSignal;
}

/**
 * Run `task` with a deadline. Rejects with DeadlineError on timeout, or with
 * the parent's reason when the parent aborts first.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { timeoutMs, code = 'DEADLINE_EXCEEDED', label = 'operation', signal: parent } = options;
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      fn();
    };

    const onParentAbort = (): void => {
      const reason = abortReason(parent, label);
      controller.abort(reason);
      finish(() => reject(reason));
    };

    const timer = setTimeout(() => {
      const error = new DeadlineError(`${label} exceeded ${timeoutMs}ms`, code);
      controller.abort(error);
      finish(() => reject(error));
    }, Math.max(0, timeoutMs));

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error)),
    );
  });
}

/**
 * Normalize an abort reason into an Error.
 */
export function abortReason(signal: AbortSignal | undefined, label = 'operation'): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  return new DeadlineError(`${label} aborted`, 'ABORTED', reason);
}
