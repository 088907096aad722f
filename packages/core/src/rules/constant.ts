import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationErrorCollection,
  createError,
} from '../errors/validation-error.js';
import type { RuleResult } from './rule.js';
import { typeMismatch, type OutputRef, type RuleSet } from './rule-set.js';

export type ConstantValue = string | number | boolean;

/**
 * Matches exactly one value. Used as the field matcher behind `withKey`.
 * Always conflicts, so a constant never shares a chain with another rule.
 */
export class ConstantRuleSet<T extends ConstantValue> implements RuleSet<T> {
  constructor(
    public readonly value: T,
    private readonly required = false
  ) {}

  withRequired(): ConstantRuleSet<T> {
    if (this.required) return this;
    return new ConstantRuleSet(this.value, true);
  }

  isRequired(): boolean {
    return this.required;
  }

  apply(ctx: RuleContext, input: unknown, out: OutputRef<T>): RuleResult {
    if (input === undefined) {
      return this.required
        ? ValidationErrorCollection.of(
            createError(ErrorCode.REQUIRED, ctx, 'value is required')
          )
        : undefined;
    }
    if (typeof input !== typeof this.value) {
      return typeMismatch(ctx, typeof this.value, input);
    }
    if (input !== this.value) return this.#mismatch(ctx);
    out.value = this.value;
    return undefined;
  }

  evaluate(ctx: RuleContext, value: T): RuleResult {
    return value === this.value ? undefined : this.#mismatch(ctx);
  }

  #mismatch(ctx: RuleContext): ValidationErrorCollection {
    return ValidationErrorCollection.of(
      createError(ErrorCode.PATTERN, ctx, 'value does not match', this.value)
    );
  }

  conflictsWith(): boolean {
    return true;
  }

  describe(): string {
    const base = `ConstantRuleSet(${String(this.value)})`;
    return this.required ? `${base}.WithRequired()` : base;
  }

  toString(): string {
    return this.describe();
  }
}

const stringCache = new Map<string, ConstantRuleSet<string>>();
const numberCache = new Map<number, ConstantRuleSet<number>>();
const booleanCache = new Map<boolean, ConstantRuleSet<boolean>>();

function cached<V extends ConstantValue>(
  cache: Map<V, ConstantRuleSet<V>>,
  value: V
): ConstantRuleSet<V> {
  let ruleSet = cache.get(value);
  if (!ruleSet) {
    ruleSet = new ConstantRuleSet(value);
    cache.set(value, ruleSet);
  }
  return ruleSet;
}

/** The same value always yields the same instance. */
export function constant(value: string): ConstantRuleSet<string>;
export function constant(value: number): ConstantRuleSet<number>;
export function constant(value: boolean): ConstantRuleSet<boolean>;
export function constant(
  value: ConstantValue
): ConstantRuleSet<string> | ConstantRuleSet<number> | ConstantRuleSet<boolean> {
  switch (typeof value) {
    case 'string':
      return cached(stringCache, value);
    case 'number':
      return cached(numberCache, value);
    default:
      return cached(booleanCache, value);
  }
}
