/**
 * Condition polling.
 *
 * Waits are the only retrying construct in the driver. Every tick runs the
 * check to completion, then looks at the cancellation signal, then sleeps.
 */

import type { Sleeper } from './sleeper.js';
import { throwIfCanceled } from './sleeper.js';

/**
 * Call `check` until it reports true. Errors from `check` propagate at once;
 * cancellation surfaces as `WaitCanceledError`.
 */
export async function retry(
  signal: AbortSignal | undefined,
  sleeper: Sleeper,
  check: () => Promise<boolean>
): Promise<void> {
  for (;;) {
    if (await check()) return;
    throwIfCanceled(signal);
    await sleeper(signal);
  }
}

/**
 * Sample a value on every tick until two consecutive samples are equal.
 * Resolves with the settled value.
 */
export async function settle<T>(
  signal: AbortSignal | undefined,
  sleeper: Sleeper,
  sample: () => Promise<T>,
  equal: (a: T, b: T) => boolean
): Promise<T> {
  throwIfCanceled(signal);
  let previous = await sample();
  for (;;) {
    await sleeper(signal);
    throwIfCanceled(signal);
    const current = await sample();
    if (equal(previous, current)) return current;
    previous = current;
  }
}
