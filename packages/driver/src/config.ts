/**
 * Driver configuration.
 *
 * Explicit options win, then environment variables, then defaults:
 * - HANDRAIL_SLOW_MOTION: delay in ms before each traced input
 * - HANDRAIL_TRACE: `1` or `true` to log traced inputs to stderr
 * - HANDRAIL_CDP_TIMEOUT: per-request protocol timeout in ms
 */

import type { SleeperFactory } from './sleeper.js';
import { backoffSleeper } from './sleeper.js';

export interface DriverOptions {
  /** Delay before each traced input, in milliseconds. */
  slowMotion?: number;
  /** Log traced inputs to stderr. */
  trace?: boolean;
  /** Protocol request timeout in milliseconds. */
  timeout?: number;
  /** Creates the sleeper each wait polls with. */
  sleeper?: SleeperFactory;
}

export type ResolvedDriverOptions = Required<DriverOptions>;

export const DEFAULT_TIMEOUT = 30_000;

function readNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

/**
 * Protocol request timeout: `timeout`, else HANDRAIL_CDP_TIMEOUT, else 30s.
 */
export function resolveTimeout(timeout?: number, env: NodeJS.ProcessEnv = process.env): number {
  return timeout ?? readNumber(env.HANDRAIL_CDP_TIMEOUT, 'HANDRAIL_CDP_TIMEOUT') ?? DEFAULT_TIMEOUT;
}

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

export function resolveDriverOptions(
  options: DriverOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedDriverOptions {
  return {
    slowMotion:
      options.slowMotion ?? readNumber(env.HANDRAIL_SLOW_MOTION, 'HANDRAIL_SLOW_MOTION') ?? 0,
    trace: options.trace ?? readFlag(env.HANDRAIL_TRACE) ?? false,
    timeout: resolveTimeout(options.timeout, env),
    sleeper: options.sleeper ?? (() => backoffSleeper()),
  };
}
