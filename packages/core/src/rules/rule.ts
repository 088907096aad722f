import type { RuleContext } from '../context/rule-context.js';
import type { ValidationErrorCollection } from '../errors/validation-error.js';

export type Awaitable<T> = T | Promise<T>;

/** `undefined` means the value passed. */
export type RuleResult = ValidationErrorCollection | undefined;

/**
 * One constraint on a value of type T.
 */
export interface Rule<T> {
  evaluate(ctx: RuleContext, value: T): Awaitable<RuleResult>;
  /** True when adding `other` to a chain should replace this rule. */
  conflictsWith(other: Rule<T>): boolean;
  describe(): string;
}

export type RuleFn<T> = (ctx: RuleContext, value: T) => Awaitable<RuleResult>;

class FunctionRule<T> implements Rule<T> {
  constructor(
    private readonly fn: RuleFn<T>,
    private readonly label: string
  ) {}

  evaluate(ctx: RuleContext, value: T): Awaitable<RuleResult> {
    return this.fn(ctx, value);
  }

  conflictsWith(): boolean {
    return false;
  }

  describe(): string {
    return this.label;
  }
}

/** Adapt a function to a Rule that never conflicts. */
export function ruleFunc<T>(
  fn: RuleFn<T>,
  label = 'WithRuleFunc(<function>)'
): Rule<T> {
  return new FunctionRule(fn, label);
}

/**
 * A rule identified by a kind string. Two exclusive rules of the same kind
 * conflict, so `withMinLen(3).withMinLen(5)` keeps only the latter.
 */
export class KindedRule<T> implements Rule<T> {
  constructor(
    public readonly kind: string,
    private readonly label: string,
    private readonly check?: RuleFn<T>,
    private readonly exclusive = true
  ) {}

  evaluate(ctx: RuleContext, value: T): Awaitable<RuleResult> {
    return this.check ? this.check(ctx, value) : undefined;
  }

  conflictsWith(other: Rule<T>): boolean {
    return (
      this.exclusive && other instanceof KindedRule && other.kind === this.kind
    );
  }

  describe(): string {
    return this.label;
  }
}

/** A label-only chain entry recording a builder flag such as `WithRequired()`. */
export function flagRule<T>(kind: string, label: string): KindedRule<T> {
  return new KindedRule<T>(kind, label);
}
