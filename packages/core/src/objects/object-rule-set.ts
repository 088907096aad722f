import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import { constant } from '../rules/constant.js';
import { describeChain, withRule, type ConstraintNode } from '../rules/chain.js';
import { ruleFunc, type Rule, type RuleFn, type RuleResult } from '../rules/rule.js';
import type { Conditional, OutputRef, RuleSet } from '../rules/rule-set.js';
import { SchemaDefinitionError } from '../types/errors.js';
import { isErr } from '../types/result.js';
import {
  FieldEntry,
  ObjectFlag,
  applyObject,
  fieldSpecs,
  type FieldSpec,
  type ObjectFlagKind,
  type ObjectState,
} from './engine.js';
import { RefTracker, constantKey } from './ref-tracker.js';
import { mapShape, recordShape, type OutputShape } from './shape.js';

function quote(key: string): string {
  return JSON.stringify(key);
}

/**
 * Rule set for map- and record-shaped values.
 *
 * Immutable: every builder returns a new rule set, or the same one when the
 * call changes nothing. Builders throw SchemaDefinitionError for definitions
 * that could never evaluate.
 */
export class ObjectRuleSet<T> implements RuleSet<T>, Conditional<T> {
  private constructor(private readonly state: ObjectState<T>) {}

  /** @internal */
  static fromShape<T>(shape: OutputShape<T>): ObjectRuleSet<T> {
    return new ObjectRuleSet<T>({
      shape,
      chain: undefined,
      allowUnknown: false,
      required: false,
      json: false,
      refs: undefined,
    });
  }

  private derive(
    rule: Rule<T>,
    changes: Partial<Omit<ObjectState<T>, 'shape' | 'chain'>> = {}
  ): ObjectRuleSet<T> {
    return new ObjectRuleSet<T>({
      ...this.state,
      ...changes,
      chain: withRule(this.state.chain, rule),
    });
  }

  private withFlag(
    kind: ObjectFlagKind,
    changes: Partial<Omit<ObjectState<T>, 'shape' | 'chain'>>
  ): ObjectRuleSet<T> {
    return this.derive(new ObjectFlag<T>(kind), changes);
  }

  private requireMapping(key: string, what: string): void {
    const { mapping } = this.state.shape;
    if (mapping && !mapping.has(key)) {
      throw new SchemaDefinitionError({
        message: `missing mapping for ${what} ${quote(key)} on ${this.state.shape.name}`,
        errorCode: ErrorCode.MISSING_MAPPING,
        context: { key },
      });
    }
  }

  private withField(
    spec: FieldSpec<T>,
    label: string,
    refs: RefTracker | undefined = this.state.refs
  ): ObjectRuleSet<T> {
    return this.derive(new FieldEntry<T>(spec, label), { refs });
  }

  /** Allow input keys no rule claims; map outputs receive them as-is. */
  withUnknown(): ObjectRuleSet<T> {
    if (this.state.allowUnknown) return this;
    return this.withFlag('unknown', { allowUnknown: true });
  }

  withRequired(): ObjectRuleSet<T> {
    if (this.state.required) return this;
    return this.withFlag('required', { required: true });
  }

  /** Accept JSON text (string or UTF-8 bytes) holding an object. */
  withJson(): ObjectRuleSet<T> {
    if (this.state.json) return this;
    return this.withFlag('json', { json: true });
  }

  withKey(key: string, ruleSet: RuleSet<unknown>): ObjectRuleSet<T> {
    this.requireMapping(key, 'key');
    return this.withField(
      { key: constant(key), ruleSet },
      `WithKey(${quote(key)}, ${ruleSet.describe()})`
    );
  }

  /**
   * Apply `ruleSet` to `key` only when `condition` passes against the output,
   * evaluated once every key the condition reads has settled.
   */
  withConditionalKey(
    key: string,
    condition: Conditional<T>,
    ruleSet: RuleSet<unknown>
  ): ObjectRuleSet<T> {
    this.requireMapping(key, 'key');
    const refs = this.state.refs ? this.state.refs.clone() : new RefTracker();
    const keyRule = constant(key);
    for (const dependsOn of condition.keyRules()) {
      const added = refs.add(keyRule, dependsOn);
      if (isErr(added)) throw added.error;
    }
    return this.withField(
      { key: keyRule, ruleSet, condition },
      `WithConditionalKey(${quote(key)}, ${condition.describe()}, ${ruleSet.describe()})`,
      refs
    );
  }

  /** Apply `ruleSet` to every input key `matcher` accepts. Map inputs only. */
  withDynamicKey(matcher: Rule<string>, ruleSet: RuleSet<unknown>): ObjectRuleSet<T> {
    return this.withField(
      { key: matcher, ruleSet },
      `WithDynamicKey(${matcher.describe()}, ${ruleSet.describe()})`
    );
  }

  /**
   * Route keys accepted by `matcher` into the sub-collection `bucket`
   * instead of the top level of the output.
   */
  withDynamicBucket(matcher: Rule<string>, bucket: string): ObjectRuleSet<T> {
    this.requireMapping(bucket, 'bucket');
    return this.withField(
      { key: matcher, bucket },
      `WithDynamicBucket(${matcher.describe()}, ${quote(bucket)})`
    );
  }

  withConditionalDynamicBucket(
    matcher: Rule<string>,
    condition: Conditional<T>,
    bucket: string
  ): ObjectRuleSet<T> {
    this.requireMapping(bucket, 'bucket');
    return this.withField(
      { key: matcher, bucket, condition },
      `WithConditionalDynamicBucket(${matcher.describe()}, ${condition.describe()}, ${quote(bucket)})`
    );
  }

  /** Whole-record rule, run after all field rules. */
  withRule(rule: Rule<T>): ObjectRuleSet<T> {
    return this.derive(rule);
  }

  withRuleFunc(fn: RuleFn<T>): ObjectRuleSet<T> {
    return this.derive(ruleFunc(fn));
  }

  /** Distinct key matchers of the field rules, for use as a condition. */
  keyRules(): Rule<string>[] {
    const seen = new Set<string>();
    const seenRules = new Set<Rule<string>>();
    const out: Rule<string>[] = [];
    for (const spec of fieldSpecs(this.state.chain)) {
      const key = constantKey(spec.key);
      if (key !== undefined) {
        if (seen.has(key)) continue;
        seen.add(key);
      } else {
        if (seenRules.has(spec.key)) continue;
        seenRules.add(spec.key);
      }
      out.push(spec.key);
    }
    return out;
  }

  isRequired(): boolean {
    return this.state.required;
  }

  allowsUnknown(): boolean {
    return this.state.allowUnknown;
  }

  apply(ctx: RuleContext, input: unknown, out: OutputRef<T>): Promise<RuleResult> {
    return applyObject(ctx, this.state, input, out);
  }

  /** Validate an existing value; the result is discarded. */
  evaluate(ctx: RuleContext, value: T): Promise<RuleResult> {
    return applyObject(ctx, this.state, value, {});
  }

  conflictsWith(): boolean {
    return false;
  }

  describe(): string {
    return `ObjectRuleSet[${this.state.shape.name}]${describeChain(this.state.chain)}`;
  }

  toString(): string {
    return this.describe();
  }
}

/** Rules for plain-object outputs. */
export function objectMap<V = unknown>(): ObjectRuleSet<Record<string, V>> {
  return ObjectRuleSet.fromShape(mapShape<V>());
}

export interface ObjectOptions {
  /** Field key → property name; defaults to the factory's own properties. */
  keys?: Readonly<Record<string, string>>;
}

/** Rules for record outputs built by `factory`. */
export function object<T extends object>(
  factory: () => T,
  options: ObjectOptions = {}
): ObjectRuleSet<T> {
  return ObjectRuleSet.fromShape(recordShape(factory, options.keys));
}
