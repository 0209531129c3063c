/**
 * Sleepers pace the polling loops of waits. A sleeper is stateful: each
 * call may wait longer than the last.
 */

import { WaitCanceledError } from './errors.js';

export type Sleeper = (signal?: AbortSignal) => Promise<void>;

export type SleeperFactory = () => Sleeper;

export interface BackoffOptions {
  /** First delay in ms. Default: 100 */
  initial?: number;
  /** Upper bound for any delay in ms. Default: 1000 */
  max?: number;
  /** Growth factor between delays. Default: 2 */
  multiplier?: number;
}

/**
 * Sleep for `ms`, rejecting with {@link WaitCanceledError} if the signal is
 * already aborted or aborts while sleeping.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new WaitCanceledError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new WaitCanceledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Exponential backoff: the nth sleep waits `min(initial * multiplier^n, max)`.
 */
export function backoffSleeper(options: BackoffOptions = {}): Sleeper {
  const initial = options.initial ?? 100;
  const max = options.max ?? 1000;
  const multiplier = options.multiplier ?? 2;
  let delay = initial;

  return async (signal) => {
    const current = Math.min(delay, max);
    delay = Math.min(delay * multiplier, max);
    await sleep(current, signal);
  };
}

/**
 * Fixed delay between every attempt.
 */
export function intervalSleeper(ms: number): Sleeper {
  return (signal) => sleep(ms, signal);
}

/**
 * Throw {@link WaitCanceledError} if the signal has been aborted.
 */
export function throwIfCanceled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new WaitCanceledError(signal.reason);
  }
}
