import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  ErrorCode,
  MetricsCollector,
  ValidationFailedError,
  any,
  integers,
  isErr,
  isOk,
  object,
  objectMap,
  strings,
  validate,
  validateOrThrow,
} from '../../src/index.js';

class Signup {
  email = '';
  age = 0;
  plan = 'free';
}

const signup = object(() => new Signup())
  .withKey('email', strings().withRequired().withRegex(/^[^@\s]+@[^@\s]+$/))
  .withKey('age', integers().withMin(13))
  .withKey('plan', strings().withAllowedValues('free', 'pro'));

describe('validate', () => {
  it('resolves Ok with the coerced output', async () => {
    const result = await validate(signup, { email: 'a@b.test', age: '21', plan: 'pro' });
    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value).toBeInstanceOf(Signup);
      expect(result.value).toEqual({ email: 'a@b.test', age: 21, plan: 'pro' });
    }
  });

  it('resolves Err with every violation', async () => {
    const result = await validate(signup, { email: 'nope', age: 9, plan: 'gold', x: 1 });
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.for('/x')?.codes()).toEqual([ErrorCode.UNEXPECTED]);
      expect(result.error.for('/email')?.codes()).toEqual([ErrorCode.PATTERN]);
      expect(result.error.for('/age')?.codes()).toEqual([ErrorCode.MIN]);
      expect(result.error.for('/plan')?.codes()).toEqual([ErrorCode.NOT_ALLOWED]);
      expect(result.error.length).toBe(4);
    }
  });

  it('resolves Ok(undefined) for an optional missing value', async () => {
    const result = await validate(any(), undefined);
    expect(isOk(result) && result.value).toBeUndefined();
  });

  it('counts apply calls in the supplied collector', async () => {
    const metrics = new MetricsCollector();
    await validate(objectMap().withKey('a', any()), { a: 1 }, { metrics });
    await validate(objectMap().withKey('a', any()), { a: 1 }, { metrics });
    const snapshot = metrics.snapshotMetrics();
    expect(snapshot.applyCalls).toBe(2);
    expect(snapshot.fieldTasks).toBe(2);
  });

  it('throws ConfigError for invalid options before evaluating', async () => {
    await expect(validate(any(), 1, { timeoutMs: 0 })).rejects.toBeInstanceOf(ConfigError);
  });

  it('writes debug lines to a supplied writer', async () => {
    const lines: string[] = [];
    await validate(objectMap().withKey('a', any()), { a: 1 }, {
      debug: (line) => lines.push(line),
    });
    expect(lines).toEqual(['[corral] dispatch {"path":"/a","dynamic":false}']);
  });
});

describe('validateOrThrow', () => {
  it('returns the output on success', async () => {
    await expect(
      validateOrThrow(objectMap().withKey('n', integers()), { n: '5' })
    ).resolves.toEqual({ n: 5 });
  });

  it('throws ValidationFailedError carrying the collection', async () => {
    const schema = objectMap()
      .withKey('a', strings().withRequired())
      .withKey('b', strings().withRequired());
    try {
      await validateOrThrow(schema, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationFailedError);
      if (error instanceof ValidationFailedError) {
        expect(error.errors.length).toBe(2);
        expect(error.errorCode).toBe(ErrorCode.REQUIRED);
        expect(error.message).toBe('field is required (and 1 more)');
      }
    }
  });
});
