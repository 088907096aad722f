import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationErrorCollection,
  createError,
} from '../errors/validation-error.js';
import { KindedRule, flagRule } from './rule.js';
import {
  ChainedRuleSet,
  typeMismatch,
  type ChainParts,
  type Coerced,
} from './rule-set.js';

interface NumberConfig {
  readonly strict: boolean;
  readonly integer: boolean;
}

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export class NumberRuleSet extends ChainedRuleSet<
  number,
  NumberConfig,
  NumberRuleSet
> {
  constructor(parts: ChainParts<number, NumberConfig>) {
    super(parts, parts.config.integer ? 'IntRuleSet' : 'FloatRuleSet');
  }

  protected derive(parts: ChainParts<number, NumberConfig>): NumberRuleSet {
    return new NumberRuleSet(parts);
  }

  protected self(): NumberRuleSet {
    return this;
  }

  protected coerce(ctx: RuleContext, input: unknown): Coerced<number> {
    const { strict, integer } = this.parts.config;
    const expected = integer ? 'integer' : 'number';
    let value: number | undefined;

    if (typeof input === 'number') {
      value = input;
    } else if (!strict && typeof input === 'string' && NUMERIC.test(input.trim())) {
      value = Number(input.trim());
    }

    if (value === undefined || !Number.isFinite(value)) {
      return { ok: false, errors: typeMismatch(ctx, expected, input) };
    }
    if (integer && !Number.isInteger(value)) {
      return {
        ok: false,
        errors: ValidationErrorCollection.of(
          createError(
            ErrorCode.TYPE,
            ctx,
            'expected integer but got fractional number',
            expected,
            'number'
          )
        ),
      };
    }
    return { ok: true, value };
  }

  withStrict(): NumberRuleSet {
    if (this.parts.config.strict) return this;
    return this.withChainRule(flagRule('strict', 'WithStrict()'), {
      config: { ...this.parts.config, strict: true },
    });
  }

  withMin(min: number): NumberRuleSet {
    return this.withChainRule(
      new KindedRule<number>('min', `WithMin(${min})`, (ctx, value) =>
        value < min
          ? ValidationErrorCollection.of(
              createError(
                ErrorCode.MIN,
                ctx,
                `value must be at least ${min}`,
                min
              )
            )
          : undefined
      )
    );
  }

  withMax(max: number): NumberRuleSet {
    return this.withChainRule(
      new KindedRule<number>('max', `WithMax(${max})`, (ctx, value) =>
        value > max
          ? ValidationErrorCollection.of(
              createError(ErrorCode.MAX, ctx, `value must be at most ${max}`, max)
            )
          : undefined
      )
    );
  }
}

export function numbers(): NumberRuleSet {
  return new NumberRuleSet({
    chain: undefined,
    required: false,
    config: { strict: false, integer: false },
  });
}

export function integers(): NumberRuleSet {
  return new NumberRuleSet({
    chain: undefined,
    required: false,
    config: { strict: false, integer: true },
  });
}
