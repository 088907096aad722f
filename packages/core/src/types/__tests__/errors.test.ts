import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import {
  ValidationError,
  ValidationErrorCollection,
} from '../../errors/validation-error.js';
import {
  ConfigError,
  CorralError,
  SchemaDefinitionError,
  ValidationFailedError,
  isCorralError,
} from '../errors.js';

describe('CorralError hierarchy', () => {
  it('SchemaDefinitionError carries its code and key', () => {
    const error = new SchemaDefinitionError({
      message: 'circular reference detected: a -> b -> a',
      errorCode: ErrorCode.CIRCULAR_REFERENCE,
      context: { key: 'a' },
    });
    expect(error).toBeInstanceOf(CorralError);
    expect(error.name).toBe('SchemaDefinitionError');
    expect(error.errorCode).toBe(ErrorCode.CIRCULAR_REFERENCE);
    expect(error.key).toBe('a');
    expect(isCorralError(error)).toBe(true);
    expect(isCorralError(new Error('x'))).toBe(false);
  });

  it('ConfigError uses the configuration code', () => {
    const error = new ConfigError({ message: 'bad', context: { setting: 'timeoutMs' } });
    expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
    expect(error.setting).toBe('timeoutMs');
  });

  it('toJSON keeps the stack in dev and redacts in prod', () => {
    const cause = new Error('root cause');
    const error = new ConfigError({
      message: 'bad',
      context: { value: { apiKey: 'test-key', keep: 1 } },
      cause,
    });
    const dev = error.toJSON('dev');
    expect(dev.stack).toBeDefined();
    expect(dev.context?.value).toEqual({ apiKey: 'test-key', keep: 1 });
    expect(dev.cause).toEqual({ name: 'Error', message: 'root cause' });

    const prod = error.toJSON('prod');
    expect(prod.stack).toBeUndefined();
    expect(prod.context?.value).toEqual({ apiKey: '[REDACTED]', keep: 1 });
  });

  it('ValidationFailedError wraps the collection', () => {
    const errors = ValidationErrorCollection.of(
      new ValidationError(ErrorCode.REQUIRED, ['b'], 'field is required'),
      new ValidationError(ErrorCode.MIN, ['a'], 'value must be at least 2')
    );
    const error = new ValidationFailedError(errors);
    expect(error.message).toBe('field is required (and 1 more)');
    expect(error.errorCode).toBe(ErrorCode.REQUIRED);
    expect(error.errors).toBe(errors);
    expect(error.toUserError()).toEqual({
      message: 'field is required (and 1 more)',
      code: ErrorCode.REQUIRED,
      severity: 'error',
      path: '/b',
    });
  });
});
