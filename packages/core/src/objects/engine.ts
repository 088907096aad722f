/**
 * Object evaluation engine.
 *
 * One `apply` runs every field rule as its own task, ordered only by the
 * per-field counters (same-field serialisation and conditional waits),
 * then runs the whole-record rules against the assembled output.
 */

import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationError,
  ValidationErrorCollection,
  createError,
  isContextError,
} from '../errors/validation-error.js';
import { chainRules, type ConstraintNode } from '../rules/chain.js';
import type { Rule, RuleResult } from '../rules/rule.js';
import type { Conditional, OutputRef, RuleSet } from '../rules/rule-set.js';
import { Mutex } from '../util/mutex.js';
import { CounterSet } from './counter.js';
import {
  accessInput,
  decodeJsonObject,
  nonStringKeyType,
  type InputAccessor,
} from './input.js';
import { KnownKeys } from './known-keys.js';
import { constantKey, type RefTracker } from './ref-tracker.js';
import type { Setter } from './setter.js';
import { describeValueType, type OutputShape } from './shape.js';

export interface FieldSpec<T> {
  /** Constant key or predicate over candidate keys. */
  readonly key: Rule<string>;
  /** Absent for bucket entries. */
  readonly ruleSet?: RuleSet<unknown>;
  readonly condition?: Conditional<T>;
  /** Present for bucket entries. */
  readonly bucket?: string;
}

/** Chain entry for a field rule or a bucket declaration. */
export class FieldEntry<T> implements Rule<T> {
  constructor(
    public readonly spec: FieldSpec<T>,
    private readonly label: string
  ) {}

  evaluate(): RuleResult {
    return undefined;
  }

  conflictsWith(): boolean {
    return false;
  }

  describe(): string {
    return this.label;
  }
}

export type ObjectFlagKind = 'unknown' | 'required' | 'json';

/** Chain entry recording a builder flag. */
export class ObjectFlag<T> implements Rule<T> {
  constructor(public readonly kind: ObjectFlagKind) {}

  evaluate(): RuleResult {
    return undefined;
  }

  conflictsWith(): boolean {
    return false;
  }

  describe(): string {
    switch (this.kind) {
      case 'unknown':
        return 'WithUnknown()';
      case 'required':
        return 'WithRequired()';
      default:
        return 'WithJson()';
    }
  }
}

export interface ObjectState<T> {
  readonly shape: OutputShape<T>;
  readonly chain: ConstraintNode<T> | undefined;
  readonly allowUnknown: boolean;
  readonly required: boolean;
  readonly json: boolean;
  readonly refs: RefTracker | undefined;
}

interface Plan<T> {
  fields: FieldSpec<T>[];
  buckets: FieldSpec<T>[];
  objectRules: Rule<T>[];
}

function plan<T>(chain: ConstraintNode<T> | undefined): Plan<T> {
  const result: Plan<T> = { fields: [], buckets: [], objectRules: [] };
  for (const rule of chainRules(chain)) {
    if (rule instanceof FieldEntry) {
      if (rule.spec.bucket !== undefined) result.buckets.push(rule.spec);
      if (rule.spec.ruleSet) result.fields.push(rule.spec);
    } else if (!(rule instanceof ObjectFlag)) {
      result.objectRules.push(rule);
    }
  }
  return result;
}

/** Field specs that carry a rule set, in the order they were added. */
export function fieldSpecs<T>(chain: ConstraintNode<T> | undefined): FieldSpec<T>[] {
  return plan(chain).fields;
}

interface FieldTask<T> {
  spec: FieldSpec<T>;
  key: string;
  dynamic: boolean;
}

interface Run<T> {
  ctx: RuleContext;
  input: InputAccessor;
  setter: Setter;
  target: T;
  mutex: Mutex;
  counters: CounterSet;
  buckets: FieldSpec<T>[];
}

function single(error: ValidationError): ValidationErrorCollection {
  return ValidationErrorCollection.of(error);
}

/** Nested applies report their own cancellation; keep only ours. */
function dropContextErrors(
  errors: RuleResult
): ValidationErrorCollection | undefined {
  if (!errors) return undefined;
  const kept = errors.all().filter((error) => !isContextError(error));
  return kept.length > 0 ? new ValidationErrorCollection(kept) : undefined;
}

function thrownToError(ctx: RuleContext, thrown: unknown): ValidationError {
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  ctx.metrics?.increment('internalErrors');
  ctx.debug.emit('rule-threw', { path: ctx.path, message });
  return createError(ErrorCode.INTERNAL_ERROR, ctx, `rule failed: ${message}`);
}

async function passes<V>(
  rule: Rule<V>,
  ctx: RuleContext,
  value: V
): Promise<boolean> {
  return (await rule.evaluate(ctx, value)) === undefined;
}

async function bucketMatches<T>(
  bucket: FieldSpec<T>,
  ctx: RuleContext,
  key: string,
  target: T
): Promise<boolean> {
  if (!(await passes(bucket.key, ctx, key))) return false;
  return !bucket.condition || passes(bucket.condition, ctx, target);
}

async function evaluateFieldTask<T>(
  run: Run<T>,
  task: FieldTask<T>,
  ctx: RuleContext
): Promise<RuleResult> {
  if (ctx.aborted) return undefined;

  ctx.metrics?.trackFieldTask(ctx.path);
  ctx.debug.emit('dispatch', { path: ctx.path, dynamic: task.dynamic });

  const { condition, ruleSet } = task.spec;
  if (!ruleSet) return undefined;

  if (condition) {
    const dependsOn: string[] = [];
    for (const keyRule of condition.keyRules()) {
      const key = constantKey(keyRule);
      if (key !== undefined) dependsOn.push(key);
    }
    await run.counters.wait(dependsOn);
    if (ctx.aborted) return undefined;

    const satisfied = await run.mutex.runExclusive(() =>
      passes(condition, ctx, run.target)
    );
    if (!satisfied) {
      ctx.metrics?.increment('conditionsSkipped');
      ctx.debug.emit('condition-skipped', { path: ctx.path });
      return undefined;
    }
  }

  if (!run.input.has(task.key)) {
    return ruleSet.isRequired()
      ? single(createError(ErrorCode.REQUIRED, ctx, 'field is required'))
      : undefined;
  }

  const box: OutputRef<unknown> = {};
  const errors = await ruleSet.apply(ctx, run.input.get(task.key), box);
  if (errors) return errors;

  return run.mutex.runExclusive(async () => {
    let claimed = false;
    if (task.dynamic) {
      for (const bucket of run.buckets) {
        if (
          bucket.bucket !== undefined &&
          (await bucketMatches(bucket, ctx, task.key, run.target))
        ) {
          if (!run.setter.setInBucket(bucket.bucket, task.key, box.value)) {
            return single(
              createError(
                ErrorCode.INTERNAL_ERROR,
                ctx,
                `cannot write to bucket "${bucket.bucket}"`
              )
            );
          }
          ctx.metrics?.increment('bucketWrites');
          claimed = true;
        }
      }
    }
    if (!claimed && !run.setter.set(task.key, box.value)) {
      return single(
        createError(
          ErrorCode.INTERNAL_ERROR,
          ctx,
          `no destination for field "${task.key}"`
        )
      );
    }
    return undefined;
  });
}

async function runFieldTask<T>(
  run: Run<T>,
  task: FieldTask<T>
): Promise<RuleResult> {
  const ctx = run.ctx.withPath(task.key);
  await run.counters.lock(task.key);
  try {
    return dropContextErrors(await evaluateFieldTask(run, task, ctx));
  } catch (thrown) {
    return single(thrownToError(ctx, thrown));
  } finally {
    run.counters.unlock(task.key);
  }
}

interface TaskPlan<T> {
  tasks: FieldTask<T>[];
  errors: ValidationError[];
  /** Keys whose matcher threw; reported once, never as unexpected. */
  faulted: string[];
}

/** Evaluate a key matcher, turning a throw into an error at the key's path. */
async function tryMatch(
  ctx: RuleContext,
  match: () => Promise<boolean>
): Promise<boolean | ValidationError> {
  try {
    return await match();
  } catch (thrown) {
    return thrownToError(ctx, thrown);
  }
}

async function planTasks<T>(
  ctx: RuleContext,
  fields: FieldSpec<T>[],
  input: InputAccessor,
  counters: CounterSet
): Promise<TaskPlan<T>> {
  const result: TaskPlan<T> = { tasks: [], errors: [], faulted: [] };
  const inputKeys = input.shape === 'map' ? input.keys() : [];
  for (const spec of fields) {
    const key = constantKey(spec.key);
    if (key !== undefined) {
      counters.increment(key);
      result.tasks.push({ spec, key, dynamic: false });
      continue;
    }
    for (const candidate of inputKeys) {
      const keyCtx = ctx.withPath(candidate);
      const matched = await tryMatch(keyCtx, () =>
        passes(spec.key, keyCtx, candidate)
      );
      if (matched instanceof ValidationError) {
        result.errors.push(matched);
        result.faulted.push(candidate);
      } else if (matched) {
        counters.increment(candidate);
        result.tasks.push({ spec, key: candidate, dynamic: true });
      }
    }
  }
  return result;
}

async function evaluateKeyRules<T>(
  ctx: RuleContext,
  state: ObjectState<T>,
  fields: FieldSpec<T>[],
  buckets: FieldSpec<T>[],
  input: InputAccessor,
  setter: Setter,
  target: T,
  mutex: Mutex
): Promise<RuleResult> {
  const fromMap = input.shape === 'map';
  const known = new KnownKeys(
    fromMap && (!state.allowUnknown || setter.isMap || buckets.length > 0)
  );
  const counters = new CounterSet();
  const { tasks, errors: matchErrors, faulted } = await planTasks(
    ctx,
    fields,
    input,
    counters
  );
  for (const key of faulted) known.add(key);
  const run: Run<T> = { ctx, input, setter, target, mutex, counters, buckets };

  const running: Array<Promise<RuleResult>> = [];
  for (const [index, task] of tasks.entries()) {
    if (ctx.aborted) {
      for (const skipped of tasks.slice(index)) counters.abandon(skipped.key);
      break;
    }
    known.add(task.key);
    running.push(runFieldTask(run, task));
  }
  const ruleErrors = ValidationErrorCollection.merge(
    matchErrors.length > 0 ? new ValidationErrorCollection(matchErrors) : undefined,
    ...(await Promise.all(running))
  );

  // Unclaimed keys cannot be told apart from keys that were never dispatched.
  if (ctx.aborted || !fromMap) return ruleErrors;

  const bucketErrors: ValidationError[] = [];
  if (buckets.length > 0) {
    await mutex.runExclusive(async () => {
      for (const key of known.unknown(input.keys())) {
        const keyCtx = ctx.withPath(key);
        for (const bucket of buckets) {
          if (bucket.bucket === undefined) continue;
          const matched = await tryMatch(keyCtx, () =>
            bucketMatches(bucket, keyCtx, key, target)
          );
          if (matched instanceof ValidationError) {
            bucketErrors.push(matched);
            known.add(key);
          } else if (matched) {
            known.add(key);
            if (setter.setInBucket(bucket.bucket, key, input.get(key))) {
              ctx.metrics?.increment('bucketWrites');
            }
          }
        }
      }
    });
  }

  let unknownErrors: RuleResult;
  if (!state.allowUnknown) {
    unknownErrors = known.check(ctx, input.keys());
    if (unknownErrors) {
      ctx.metrics?.increment('unknownFields', unknownErrors.length);
      ctx.debug.emit('unknown-field', {
        path: ctx.path,
        keys: unknownErrors.all().map((error) => error.path),
      });
    }
  } else if (setter.isMap) {
    await mutex.runExclusive(() => {
      for (const key of known.unknown(input.keys())) {
        setter.set(key, input.get(key));
      }
    });
  }

  return ValidationErrorCollection.merge(
    unknownErrors,
    ruleErrors,
    bucketErrors.length > 0 ? new ValidationErrorCollection(bucketErrors) : undefined
  );
}

async function evaluateObjectRules<T>(
  ctx: RuleContext,
  rules: Rule<T>[],
  target: T,
  mutex: Mutex
): Promise<RuleResult> {
  const running: Array<Promise<RuleResult>> = [];
  for (const rule of rules) {
    if (ctx.aborted) break;
    running.push(
      mutex.runExclusive(async () => {
        if (ctx.aborted) return undefined;
        try {
          return dropContextErrors(await rule.evaluate(ctx, target));
        } catch (thrown) {
          return single(thrownToError(ctx, thrown));
        }
      })
    );
  }
  return ValidationErrorCollection.merge(...(await Promise.all(running)));
}

function resolveInput<T>(
  ctx: RuleContext,
  state: ObjectState<T>,
  value: unknown
): InputAccessor | ValidationErrorCollection {
  let source = value;
  if (state.json && (typeof value === 'string' || value instanceof Uint8Array)) {
    const stop = ctx.metrics?.startTimer('DECODE');
    const decoded = decodeJsonObject(value);
    stop?.();
    if (!decoded) {
      return single(
        createError(
          ErrorCode.TYPE,
          ctx,
          `expected object, map, or JSON string but got ${describeValueType(value)}`,
          'object, map, or JSON string',
          describeValueType(value)
        )
      );
    }
    source = decoded;
  }

  if (source instanceof Map) {
    const keyType = nonStringKeyType(source);
    if (keyType !== undefined) {
      return single(
        createError(
          ErrorCode.TYPE,
          ctx,
          `expected map with string keys but got ${keyType} key`,
          'string',
          keyType
        )
      );
    }
  }

  const accessor = accessInput(
    source,
    state.shape.accepts(source) ? state.shape.mapping : undefined
  );
  if (!accessor) {
    const expected = state.json ? 'object, map, or JSON string' : 'object or map';
    const actual = describeValueType(source);
    return single(
      createError(
        ErrorCode.TYPE,
        ctx,
        `expected ${expected} but got ${actual}`,
        expected,
        actual
      )
    );
  }
  return accessor;
}

/**
 * Apply an object rule set. The output is reused when `out.value` already
 * holds a value of the right shape; otherwise a new one is assigned, and
 * only when no errors were found.
 */
export async function applyObject<T>(
  ctx: RuleContext,
  state: ObjectState<T>,
  value: unknown,
  out: OutputRef<T>
): Promise<RuleResult> {
  if (typeof out !== 'object' || out === null) {
    return single(
      createError(ErrorCode.INTERNAL_ERROR, ctx, 'output must be a non-null object')
    );
  }

  if (value === undefined) {
    return state.required
      ? single(createError(ErrorCode.REQUIRED, ctx, 'value is required'))
      : undefined;
  }
  if (value === null) {
    return single(createError(ErrorCode.NULL, ctx, 'value cannot be null'));
  }

  const input = resolveInput(ctx, state, value);
  if (input instanceof ValidationErrorCollection) return input;

  const existing = out.value;
  let target: T;
  if (existing === undefined) {
    target = state.shape.create();
  } else if (state.shape.accepts(existing)) {
    target = existing;
  } else {
    return single(
      createError(
        ErrorCode.INTERNAL_ERROR,
        ctx,
        `cannot assign ${state.shape.name} to ${describeValueType(existing)}`
      )
    );
  }

  const { fields, buckets, objectRules } = plan(state.chain);
  const mutex = new Mutex();
  const setter = state.shape.setter(target);

  const stopKeys = ctx.metrics?.startTimer('KEY_RULES');
  const keyErrors = await evaluateKeyRules(
    ctx,
    state,
    fields,
    buckets,
    input,
    setter,
    target,
    mutex
  );
  stopKeys?.();

  const stopObject = ctx.metrics?.startTimer('OBJECT_RULES');
  const objectErrors = await evaluateObjectRules(ctx, objectRules, target, mutex);
  stopObject?.();

  let contextError: ValidationError | undefined;
  if (ctx.aborted) {
    contextError = ctx.contextError();
    ctx.metrics?.increment('cancellations');
    ctx.debug.emit('cancelled', { path: ctx.path, kind: ctx.abortKind });
  }

  const errors = ValidationErrorCollection.merge(
    keyErrors,
    objectErrors,
    contextError ? single(contextError) : undefined
  );
  if (errors) return errors;

  if (existing === undefined) out.value = target;
  return undefined;
}
