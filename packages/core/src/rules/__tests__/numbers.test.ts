import { describe, expect, it } from 'vitest';

import { RuleContext } from '../../context/rule-context.js';
import { ErrorCode } from '../../errors/codes.js';
import {
  ValidationErrorCollection,
  createError,
} from '../../errors/validation-error.js';
import { integers, numbers } from '../numbers.js';
import type { OutputRef } from '../rule-set.js';

const ctx = RuleContext.background();

describe('NumberRuleSet', () => {
  it('parses numeric strings unless strict', async () => {
    const out: OutputRef<number> = {};
    expect(await numbers().apply(ctx, ' 2.5 ', out)).toBeUndefined();
    expect(out.value).toBe(2.5);

    const errors = await numbers().withStrict().apply(ctx, '2.5', {});
    expect(errors?.first()?.message).toBe('expected number but got string');
  });

  it('rejects non-numeric input', async () => {
    const errors = await numbers().apply(ctx, 'abc', {});
    expect(errors?.first()?.code).toBe(ErrorCode.TYPE);
    expect(errors?.first()?.params).toEqual(['number', 'string']);
    expect((await numbers().apply(ctx, Number.NaN, {}))?.first()?.code).toBe(
      ErrorCode.TYPE
    );
  });

  it('integers reject fractions', async () => {
    const errors = await integers().apply(ctx, 1.5, {});
    expect(errors?.first()?.message).toBe('expected integer but got fractional number');
    const out: OutputRef<number> = {};
    await integers().apply(ctx, '12', out);
    expect(out.value).toBe(12);
  });

  it('checks bounds', async () => {
    const rs = integers().withMin(2).withMax(4);
    expect(await rs.apply(ctx, 3, {})).toBeUndefined();
    expect((await rs.apply(ctx, 1, {}))?.first()?.message).toBe('value must be at least 2');
    expect((await rs.apply(ctx, 9, {}))?.first()?.code).toBe(ErrorCode.MAX);
  });

  it('describes itself by kind', () => {
    expect(integers().withMin(1).withMin(2).describe()).toBe('IntRuleSet.WithMin(2)');
    expect(numbers().withMax(1).withRequired().describe()).toBe(
      'FloatRuleSet.WithMax(1).WithRequired()'
    );
  });

  it('runs custom rule functions', async () => {
    const even = integers().withRuleFunc((ruleCtx, value) =>
      value % 2 === 0
        ? undefined
        : ValidationErrorCollection.of(
            createError(ErrorCode.RANGE, ruleCtx, 'value must be even')
          )
    );
    expect(even.describe()).toBe('IntRuleSet.WithRuleFunc(<function>)');
    expect(await even.apply(ctx, 4, {})).toBeUndefined();
    expect((await even.apply(ctx, 3, {}))?.first()?.message).toBe('value must be even');
  });
});
