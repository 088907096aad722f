/**
 * Evaluation context: the field path being evaluated plus state shared by
 * every task of one top-level evaluation (abort signal, metrics, debug).
 */

import { ErrorCode } from '../errors/codes.js';
import {
  ValidationError,
  type PathSource,
} from '../errors/validation-error.js';
import {
  resolveOptions,
  type ValidateOptions,
} from '../types/options.js';
import { createDebugSink, silentSink, type DebugSink } from '../util/debug.js';
import type { MetricsCollector } from '../util/metrics.js';
import { defaultPath, type PathSegment } from './path.js';

export type AbortKind = 'cancelled' | 'timeout';

interface ContextScope {
  readonly signal: AbortSignal;
  readonly metrics: MetricsCollector | undefined;
  readonly debug: DebugSink;
  kind: AbortKind | undefined;
  dispose(): void;
}

function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  );
}

function createScope(options: ValidateOptions): ContextScope {
  const resolved = resolveOptions(options);
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  const scope: ContextScope = {
    signal: controller.signal,
    metrics: resolved.metrics,
    debug: createDebugSink(resolved.debug),
    kind: undefined,
    dispose() {
      for (const cleanup of cleanups.splice(0)) cleanup();
    },
  };

  const abort = (kind: AbortKind): void => {
    if (scope.kind) return;
    scope.kind = kind;
    controller.abort();
  };

  const upstream = resolved.signal;
  if (upstream) {
    if (upstream.aborted) {
      abort(isTimeoutReason(upstream.reason) ? 'timeout' : 'cancelled');
    } else {
      const onAbort = (): void =>
        abort(isTimeoutReason(upstream.reason) ? 'timeout' : 'cancelled');
      upstream.addEventListener('abort', onAbort, { once: true });
      cleanups.push(() => upstream.removeEventListener('abort', onAbort));
    }
  }

  if (resolved.timeoutMs !== undefined && !scope.kind) {
    const timer = setTimeout(() => abort('timeout'), resolved.timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return scope;
}

export class RuleContext implements PathSource {
  private constructor(
    private readonly scope: ContextScope,
    public readonly segments: readonly PathSegment[]
  ) {}

  /** A context that is never cancelled and records nothing. */
  static background(): RuleContext {
    const controller = new AbortController();
    return new RuleContext(
      {
        signal: controller.signal,
        metrics: undefined,
        debug: silentSink,
        kind: undefined,
        dispose: () => undefined,
      },
      []
    );
  }

  /** Root context for one evaluation; call `dispose()` when done. */
  static create(options: ValidateOptions = {}): RuleContext {
    return new RuleContext(createScope(options), []);
  }

  withPath(key: string): RuleContext {
    return new RuleContext(this.scope, [...this.segments, key]);
  }

  withIndex(index: number): RuleContext {
    return new RuleContext(this.scope, [...this.segments, index]);
  }

  get path(): string {
    return defaultPath(this.segments);
  }

  get signal(): AbortSignal {
    return this.scope.signal;
  }

  get aborted(): boolean {
    return this.scope.kind !== undefined;
  }

  get abortKind(): AbortKind | undefined {
    return this.scope.kind;
  }

  get metrics(): MetricsCollector | undefined {
    return this.scope.metrics;
  }

  get debug(): DebugSink {
    return this.scope.debug;
  }

  /** The TIMEOUT or CANCELLED error for this path, once aborted. */
  contextError(): ValidationError | undefined {
    switch (this.scope.kind) {
      case 'timeout':
        return new ValidationError(
          ErrorCode.TIMEOUT,
          this.segments,
          'validation timed out before completing'
        );
      case 'cancelled':
        return new ValidationError(
          ErrorCode.CANCELLED,
          this.segments,
          'validation was cancelled'
        );
      default:
        return undefined;
    }
  }

  /** Clears the deadline timer and detaches from the caller's signal. */
  dispose(): void {
    this.scope.dispose();
  }
}
