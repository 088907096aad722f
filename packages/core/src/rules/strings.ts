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

interface StringConfig {
  readonly strict: boolean;
}

function fail(
  ctx: RuleContext,
  code: ErrorCode,
  message: string,
  ...params: unknown[]
): ValidationErrorCollection {
  return ValidationErrorCollection.of(createError(code, ctx, message, ...params));
}

/**
 * Strings, coerced from numbers, booleans and bigints unless strict.
 */
export class StringRuleSet extends ChainedRuleSet<
  string,
  StringConfig,
  StringRuleSet
> {
  constructor(
    parts: ChainParts<string, StringConfig> = {
      chain: undefined,
      required: false,
      config: { strict: false },
    }
  ) {
    super(parts, 'StringRuleSet');
  }

  protected derive(parts: ChainParts<string, StringConfig>): StringRuleSet {
    return new StringRuleSet(parts);
  }

  protected self(): StringRuleSet {
    return this;
  }

  protected coerce(ctx: RuleContext, input: unknown): Coerced<string> {
    if (typeof input === 'string') return { ok: true, value: input };
    if (!this.parts.config.strict) {
      if (typeof input === 'number' && Number.isFinite(input)) {
        return { ok: true, value: String(input) };
      }
      if (typeof input === 'boolean' || typeof input === 'bigint') {
        return { ok: true, value: String(input) };
      }
    }
    return { ok: false, errors: typeMismatch(ctx, 'string', input) };
  }

  withStrict(): StringRuleSet {
    if (this.parts.config.strict) return this;
    return this.withChainRule(flagRule('strict', 'WithStrict()'), {
      config: { strict: true },
    });
  }

  withMinLen(min: number): StringRuleSet {
    return this.withChainRule(
      new KindedRule<string>('minLen', `WithMinLen(${min})`, (ctx, value) =>
        value.length < min
          ? fail(
              ctx,
              ErrorCode.MIN_LEN,
              `value must be at least ${min} characters long`,
              min
            )
          : undefined
      )
    );
  }

  withMaxLen(max: number): StringRuleSet {
    return this.withChainRule(
      new KindedRule<string>('maxLen', `WithMaxLen(${max})`, (ctx, value) =>
        value.length > max
          ? fail(
              ctx,
              ErrorCode.MAX_LEN,
              `value must be at most ${max} characters long`,
              max
            )
          : undefined
      )
    );
  }

  /** Patterns accumulate: every added pattern must match. */
  withRegex(pattern: RegExp): StringRuleSet {
    const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    return this.withChainRule(
      new KindedRule<string>(
        'regex',
        `WithRegex(${String(pattern)})`,
        (ctx, value) =>
          matcher.test(value)
            ? undefined
            : fail(
                ctx,
                ErrorCode.PATTERN,
                'value does not match pattern',
                pattern.source
              ),
        false
      )
    );
  }

  withAllowedValues(...values: string[]): StringRuleSet {
    const allowed = new Set(values);
    const label = values.map((v) => JSON.stringify(v)).join(', ');
    return this.withChainRule(
      new KindedRule<string>(
        'allowedValues',
        `WithAllowedValues(${label})`,
        (ctx, value) =>
          allowed.has(value)
            ? undefined
            : fail(
                ctx,
                ErrorCode.NOT_ALLOWED,
                'value is not one of the allowed options'
              )
      )
    );
  }
}

export function strings(): StringRuleSet {
  return new StringRuleSet();
}
