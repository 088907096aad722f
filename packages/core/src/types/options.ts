/**
 * Options accepted by `validate`, `validateOrThrow` and `RuleContext.create`.
 *
 * All options are optional. `CORRAL_DEBUG=1` in the environment turns on
 * debug output when the caller does not set `debug` explicitly.
 */

import { ConfigError } from './errors.js';
import { MetricsCollector } from '../util/metrics.js';
import type { DebugWriter } from '../util/debug.js';

export interface ValidateOptions {
  /** Cancels evaluation; already-running field tasks still finish. */
  signal?: AbortSignal;
  /** Deadline in milliseconds; reported as a TIMEOUT error when exceeded. */
  timeoutMs?: number;
  /** Collector shared across calls; no metrics are kept when omitted. */
  metrics?: MetricsCollector;
  /** `true` writes debug events to stderr; a function receives each line. */
  debug?: boolean | DebugWriter;
}

export interface ResolvedValidateOptions {
  signal: AbortSignal | undefined;
  timeoutMs: number | undefined;
  metrics: MetricsCollector | undefined;
  debug: boolean | DebugWriter;
}

export const DEFAULT_OPTIONS: Readonly<ResolvedValidateOptions> = {
  signal: undefined,
  timeoutMs: undefined,
  metrics: undefined,
  debug: false,
};

function debugFromEnv(): boolean {
  const raw = process.env.CORRAL_DEBUG;
  return raw === '1' || raw === 'true';
}

/**
 * Throws ConfigError for values that cannot be honoured.
 */
export function validateOptions(options: Partial<ValidateOptions>): void {
  const { signal, timeoutMs, metrics, debug } = options;

  if (signal !== undefined && !(signal instanceof AbortSignal)) {
    throw new ConfigError({
      message: 'signal must be an AbortSignal',
      context: { setting: 'signal' },
    });
  }

  if (
    timeoutMs !== undefined &&
    (typeof timeoutMs !== 'number' ||
      !Number.isFinite(timeoutMs) ||
      timeoutMs <= 0)
  ) {
    throw new ConfigError({
      message: `timeoutMs must be a positive finite number, got ${String(timeoutMs)}`,
      context: { setting: 'timeoutMs', value: timeoutMs },
    });
  }

  if (metrics !== undefined && !(metrics instanceof MetricsCollector)) {
    throw new ConfigError({
      message: 'metrics must be a MetricsCollector',
      context: { setting: 'metrics' },
    });
  }

  if (
    debug !== undefined &&
    typeof debug !== 'boolean' &&
    typeof debug !== 'function'
  ) {
    throw new ConfigError({
      message: 'debug must be a boolean or a line writer',
      context: { setting: 'debug' },
    });
  }
}

export function resolveOptions(
  userOptions: Partial<ValidateOptions> = {}
): ResolvedValidateOptions {
  validateOptions(userOptions);
  return {
    signal: userOptions.signal ?? DEFAULT_OPTIONS.signal,
    timeoutMs: userOptions.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
    debug: userOptions.debug ?? (debugFromEnv() || DEFAULT_OPTIONS.debug),
  };
}
