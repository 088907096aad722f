import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationError,
  ValidationErrorCollection,
  createError,
  isContextError,
} from '../errors/validation-error.js';
import { KindedRule } from './rule.js';
import {
  ChainedRuleSet,
  typeMismatch,
  type ChainParts,
  type Coerced,
  type OutputRef,
  type RuleSet,
} from './rule-set.js';

interface ArrayConfig<T> {
  readonly items: RuleSet<T>;
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
 * Lists whose items are each applied through one item rule set.
 *
 * Items are applied in order at their index path and every item error is
 * collected. List rules such as `withMinLen` run once all items pass.
 */
export class ArrayRuleSet<T> extends ChainedRuleSet<
  T[],
  ArrayConfig<T>,
  ArrayRuleSet<T>
> {
  constructor(parts: ChainParts<T[], ArrayConfig<T>>) {
    super(parts, 'ArrayRuleSet');
  }

  protected derive(parts: ChainParts<T[], ArrayConfig<T>>): ArrayRuleSet<T> {
    return new ArrayRuleSet(parts);
  }

  protected self(): ArrayRuleSet<T> {
    return this;
  }

  protected async coerce(ctx: RuleContext, input: unknown): Promise<Coerced<T[]>> {
    if (!Array.isArray(input)) {
      return { ok: false, errors: typeMismatch(ctx, 'array', input) };
    }
    const list: readonly unknown[] = input;
    const { items } = this.parts.config;
    const values: T[] = [];
    const errors: ValidationError[] = [];

    for (const [index, item] of list.entries()) {
      if (ctx.aborted) break;
      const itemCtx = ctx.withIndex(index);
      if (item === undefined) {
        errors.push(createError(ErrorCode.REQUIRED, itemCtx, 'value is required'));
        continue;
      }
      const box: OutputRef<T> = {};
      const itemErrors = await items.apply(itemCtx, item, box);
      if (itemErrors) {
        // Nested objects report their own cancellation; one is added below.
        errors.push(...itemErrors.all().filter((error) => !isContextError(error)));
      } else if (box.value === undefined) {
        errors.push(
          createError(ErrorCode.INTERNAL_ERROR, itemCtx, 'item rule set produced no value')
        );
      } else {
        values.push(box.value);
      }
    }

    const contextError = ctx.contextError();
    if (contextError) errors.push(contextError);
    if (errors.length > 0) {
      return { ok: false, errors: new ValidationErrorCollection(errors) };
    }
    return { ok: true, value: values };
  }

  /** Replaces any earlier item rule set. */
  withItemRuleSet(items: RuleSet<T>): ArrayRuleSet<T> {
    return this.withChainRule(
      new KindedRule<T[]>('itemRuleSet', `WithItemRuleSet(${items.describe()})`),
      { config: { items } }
    );
  }

  withMinLen(min: number): ArrayRuleSet<T> {
    return this.withChainRule(
      new KindedRule<T[]>('minLen', `WithMinLen(${min})`, (ctx, value) =>
        value.length < min
          ? fail(ctx, ErrorCode.MIN_LEN, `list must be at least ${min} items long`, min)
          : undefined
      )
    );
  }

  withMaxLen(max: number): ArrayRuleSet<T> {
    return this.withChainRule(
      new KindedRule<T[]>('maxLen', `WithMaxLen(${max})`, (ctx, value) =>
        value.length > max
          ? fail(
              ctx,
              ErrorCode.MAX_LEN,
              `list cannot be more than ${max} items long`,
              max
            )
          : undefined
      )
    );
  }
}

/** List rule set applying `items` to every element. */
export function arrays<T>(items: RuleSet<T>): ArrayRuleSet<T> {
  return new ArrayRuleSet<T>({
    chain: undefined,
    required: false,
    config: { items },
  }).withItemRuleSet(items);
}
