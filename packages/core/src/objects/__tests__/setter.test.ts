import { describe, expect, it } from 'vitest';

import { MapSetter, RecordSetter } from '../setter.js';

class Account {
  id = '';
  extras: Record<string, unknown> | undefined = undefined;
}

describe('MapSetter', () => {
  it('writes own data properties', () => {
    const target: Record<string, unknown> = {};
    const setter = new MapSetter(target);
    expect(setter.set('__proto__', 1)).toBe(true);
    expect(Object.keys(target)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(target)).toBe(Object.prototype);
  });

  it('creates bucket containers on demand', () => {
    const target: Record<string, unknown> = {};
    const setter = new MapSetter(target);
    setter.setInBucket('extra', 'a', 1);
    setter.setInBucket('extra', 'b', 2);
    expect(target).toEqual({ extra: { a: 1, b: 2 } });
  });

  it('writes into an existing Map bucket', () => {
    const bucket = new Map<string, unknown>();
    const setter = new MapSetter({ extra: bucket });
    setter.setInBucket('extra', 'a', 1);
    expect([...bucket.entries()]).toEqual([['a', 1]]);
  });

  it('replaces a scalar where a bucket belongs', () => {
    const target: Record<string, unknown> = { extra: 5 };
    new MapSetter(target).setInBucket('extra', 'a', 1);
    expect(target.extra).toEqual({ a: 1 });
  });
});

describe('RecordSetter', () => {
  const mapping = new Map([
    ['ID', 'id'],
    ['Extras', 'extras'],
  ]);

  it('writes mapped properties only', () => {
    const account = new Account();
    const setter = new RecordSetter(account, mapping);
    expect(setter.set('ID', 'abc')).toBe(true);
    expect(setter.set('unmapped', 1)).toBe(false);
    expect(account.id).toBe('abc');
  });

  it('fills bucket properties', () => {
    const account = new Account();
    const setter = new RecordSetter(account, mapping);
    expect(setter.setInBucket('Extras', 'k', 1)).toBe(true);
    expect(setter.setInBucket('Missing', 'k', 1)).toBe(false);
    expect(account.extras).toEqual({ k: 1 });
  });
});
