import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  DECODE: 'decodeMs',
  KEY_RULES: 'keyRulesMs',
  OBJECT_RULES: 'objectRulesMs',
} as const;

export const METRIC_COUNTERS = [
  'applyCalls',
  'fieldTasks',
  'conditionsSkipped',
  'bucketWrites',
  'unknownFields',
  'cancellations',
  'internalErrors',
] as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
export type MetricCounter = (typeof METRIC_COUNTERS)[number];
export type MetricsVerbosity = 'runtime' | 'ci';

type PhaseField = (typeof METRIC_PHASES)[MetricPhase];

export type MetricsSnapshot = Record<PhaseField, number> &
  Record<MetricCounter, number> & {
    /** Field tasks per path; only reported at `ci` verbosity. */
    fieldTasksByPath?: Record<string, number>;
  };

function emptySnapshot(): MetricsSnapshot {
  return {
    decodeMs: 0,
    keyRulesMs: 0,
    objectRulesMs: 0,
    applyCalls: 0,
    fieldTasks: 0,
    conditionsSkipped: 0,
    bucketWrites: 0,
    unknownFields: 0,
    cancellations: 0,
    internalErrors: 0,
  };
}

export interface MetricsCollectorOptions {
  now?: () => number;
  verbosity?: MetricsVerbosity;
  enabled?: boolean;
}

/**
 * Accumulates timings and counters across `apply` calls.
 *
 * Applies run concurrently and nest (an object field holding another
 * object), so phases are measured with independent stop handles rather
 * than a single begin/end pair per phase.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private snapshot: MetricsSnapshot;
  private fieldTasksByPath: Map<string, number>;
  private verbosity: MetricsVerbosity;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.verbosity = options.verbosity ?? 'runtime';
    this.snapshot = emptySnapshot();
    this.fieldTasksByPath = new Map();
  }

  public setVerbosity(mode: MetricsVerbosity): void {
    this.verbosity = mode;
  }

  public getVerbosity(): MetricsVerbosity {
    return this.verbosity;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  /** Start timing `phase`; the returned function records the elapsed time. */
  public startTimer(phase: MetricPhase): () => void {
    if (!this.enabled) {
      return () => undefined;
    }
    const startedAt = this.now();
    let stopped = false;
    return () => {
      if (stopped) return;
      stopped = true;
      this.recordDuration(phase, this.now() - startedAt);
    };
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[METRIC_PHASES[phase]] += safeDuration;
  }

  public increment(counter: MetricCounter, by = 1): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot[counter] += by;
  }

  public trackFieldTask(path: string): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.fieldTasks += 1;
    this.fieldTasksByPath.set(path, (this.fieldTasksByPath.get(path) ?? 0) + 1);
  }

  public reset(): void {
    this.snapshot = emptySnapshot();
    this.fieldTasksByPath = new Map();
  }

  public snapshotMetrics(
    options: { verbosity?: MetricsVerbosity } = {}
  ): MetricsSnapshot {
    const mode = options.verbosity ?? this.verbosity;
    const copy: MetricsSnapshot = { ...this.snapshot };
    if (mode === 'ci') {
      copy.fieldTasksByPath = Object.fromEntries(this.fieldTasksByPath);
    }
    return copy;
  }
}
