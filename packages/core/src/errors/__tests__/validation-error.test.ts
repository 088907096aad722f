import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../codes.js';
import {
  ValidationError,
  ValidationErrorCollection,
  createError,
} from '../validation-error.js';

const required = new ValidationError(ErrorCode.REQUIRED, ['user', 'name'], 'field is required');
const tooShort = new ValidationError(
  ErrorCode.MIN_LEN,
  ['items', 0, 'a.b'],
  'value must be at least 3 characters long',
  [3]
);
const cancelled = new ValidationError(ErrorCode.CANCELLED, [], 'validation was cancelled');

describe('ValidationError', () => {
  it('renders the slash-delimited path and other formats', () => {
    expect(required.path).toBe('/user/name');
    expect(tooShort.path).toBe('/items/0/a.b');
    expect(tooShort.pathAs('dotNotation')).toBe("items[0]['a.b']");
    expect(tooShort.pathAs('jsonPath')).toBe("$.items[0]['a.b']");
    expect(tooShort.pathAs((segments) => segments.join('|'))).toBe('items|0|a.b');
  });

  it('serializes to JSON with params only when present', () => {
    expect(required.toJSON()).toEqual({
      code: ErrorCode.REQUIRED,
      path: '/user/name',
      message: 'field is required',
    });
    expect(tooShort.toJSON().params).toEqual([3]);
  });

  it('createError stamps the source path', () => {
    const error = createError(ErrorCode.MAX, { segments: ['n'] }, 'too big', 10);
    expect(error.path).toBe('/n');
    expect(error.params).toEqual([10]);
    expect(error.isValidation()).toBe(true);
  });
});

describe('ValidationErrorCollection', () => {
  const collection = ValidationErrorCollection.of(required, tooShort);

  it('is iterable and reports its length', () => {
    expect(collection.length).toBe(2);
    expect([...collection]).toEqual([required, tooShort]);
    expect(collection.first()).toBe(required);
  });

  it('filters by path in any format', () => {
    expect(collection.for('/user/name')?.all()).toEqual([required]);
    expect(collection.for("items[0]['a.b']", 'dotNotation')?.all()).toEqual([tooShort]);
    expect(collection.for('/missing')).toBeUndefined();
  });

  it('summarizes the first message', () => {
    expect(collection.message).toBe('field is required (and 1 more)');
    expect(ValidationErrorCollection.of(required).message).toBe('field is required');
  });

  it('classifies internal versus validation collections', () => {
    expect(collection.isValidation()).toBe(true);
    expect(collection.isInternal()).toBe(false);
    const mixed = collection.concat(ValidationErrorCollection.of(cancelled));
    expect(mixed.isInternal()).toBe(true);
    expect(mixed.isValidation()).toBe(false);
    expect(new ValidationErrorCollection().isValidation()).toBe(false);
  });

  it('merge returns undefined when nothing was collected', () => {
    expect(ValidationErrorCollection.merge(undefined, undefined)).toBeUndefined();
    expect(
      ValidationErrorCollection.merge(undefined, collection)?.codes()
    ).toEqual([ErrorCode.REQUIRED, ErrorCode.MIN_LEN]);
  });
});
