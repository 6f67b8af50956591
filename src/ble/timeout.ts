/**
 * Race an abortable operation against a timer.
 *
 * Whichever settles first decides the result; the loser is cancelled (the
 * operation's signal is aborted, or the timer is cleared).
 *
 * @module ble/timeout
 */

import { BleError } from './errors';

export interface TimeoutOptions {
  /** Used in the timeout / cancellation message */
  label?: string;
  /** Outer cancellation; aborting it rejects with `cancelled` */
  signal?: AbortSignal;
}

export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions = {}
): Promise<T> {
  const label = options.label ?? 'Operation';
  const outer = options.signal;

  if (outer?.aborted) {
    return Promise.reject(BleError.cancelled(label));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
      controller.abort();
      settle();
    };

    const onAbort = (): void => finish(() => reject(BleError.cancelled(label)));

    const timer = setTimeout(() => finish(() => reject(BleError.operationTimeout(label, timeoutMs))), timeoutMs);
    outer?.addEventListener('abort', onAbort, { once: true });

    new Promise<T>((run) => run(operation(controller.signal))).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}

/**
 * Resolve after `ms`, or reject with `cancelled` when `signal` aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(BleError.cancelled('Delay'));

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(BleError.cancelled('Delay'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
