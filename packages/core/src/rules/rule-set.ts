import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationErrorCollection,
  createError,
} from '../errors/validation-error.js';
import {
  ConstraintNode,
  describeChain,
  evaluateChain,
  withRule,
} from './chain.js';
import {
  flagRule,
  ruleFunc,
  type Awaitable,
  type Rule,
  type RuleFn,
  type RuleResult,
} from './rule.js';

/** Box the coerced value is written through. */
export interface OutputRef<T> {
  value?: T;
}

/**
 * A Rule that can also coerce an untyped input into a T.
 */
export interface RuleSet<T> extends Rule<T> {
  apply(ctx: RuleContext, input: unknown, out: OutputRef<T>): Awaitable<RuleResult>;
  isRequired(): boolean;
}

/**
 * A whole-record rule that only runs once the listed keys have settled.
 */
export interface Conditional<T> extends Rule<T> {
  keyRules(): Rule<string>[];
}

export type Coerced<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationErrorCollection };

export interface ChainParts<T, C> {
  readonly chain: ConstraintNode<T> | undefined;
  readonly required: boolean;
  /** Rule-set specific settings such as strict coercion. */
  readonly config: C;
}

/**
 * Shared shape of the leaf rule sets: coerce, then run the chain.
 *
 * Instances are immutable; every builder call returns a new rule set
 * built through `derive`, or the same instance when nothing changes.
 */
export abstract class ChainedRuleSet<T, C, Self> implements RuleSet<T> {
  protected constructor(
    protected readonly parts: ChainParts<T, C>,
    private readonly label: string
  ) {}

  protected abstract derive(parts: ChainParts<T, C>): Self;
  protected abstract self(): Self;
  protected abstract coerce(
    ctx: RuleContext,
    input: unknown
  ): Awaitable<Coerced<T>>;

  /** Whether `null` reaches `coerce` instead of failing with NULL. */
  protected acceptsNull(): boolean {
    return false;
  }

  protected withChainRule(
    rule: Rule<T>,
    changes: { required?: boolean; config?: C } = {}
  ): Self {
    return this.derive({
      chain: withRule(this.parts.chain, rule),
      required: changes.required ?? this.parts.required,
      config: changes.config ?? this.parts.config,
    });
  }

  withRequired(): Self {
    if (this.parts.required) return this.self();
    return this.withChainRule(flagRule('required', 'WithRequired()'), {
      required: true,
    });
  }

  withRule(rule: Rule<T>): Self {
    return this.withChainRule(rule);
  }

  withRuleFunc(fn: RuleFn<T>): Self {
    return this.withChainRule(ruleFunc(fn));
  }

  isRequired(): boolean {
    return this.parts.required;
  }

  async apply(
    ctx: RuleContext,
    input: unknown,
    out: OutputRef<T>
  ): Promise<RuleResult> {
    if (input === undefined) {
      return this.parts.required
        ? ValidationErrorCollection.of(
            createError(ErrorCode.REQUIRED, ctx, 'value is required')
          )
        : undefined;
    }
    if (input === null && !this.acceptsNull()) {
      return ValidationErrorCollection.of(
        createError(ErrorCode.NULL, ctx, 'value cannot be null')
      );
    }
    const coerced = await this.coerce(ctx, input);
    if (!coerced.ok) return coerced.errors;
    const errors = await this.evaluate(ctx, coerced.value);
    if (errors) return errors;
    out.value = coerced.value;
    return undefined;
  }

  evaluate(ctx: RuleContext, value: T): Promise<RuleResult> {
    return evaluateChain(this.parts.chain, ctx, value);
  }

  conflictsWith(): boolean {
    return false;
  }

  describe(): string {
    return `${this.label}${describeChain(this.parts.chain)}`;
  }

  toString(): string {
    return this.describe();
  }
}

export function typeMismatch(
  ctx: RuleContext,
  expected: string,
  input: unknown
): ValidationErrorCollection {
  const actual =
    input === null ? 'null' : Array.isArray(input) ? 'array' : typeof input;
  return ValidationErrorCollection.of(
    createError(
      ErrorCode.TYPE,
      ctx,
      `expected ${expected} but got ${actual}`,
      expected,
      actual
    )
  );
}
