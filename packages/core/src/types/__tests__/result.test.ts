import { describe, expect, it } from 'vitest';

import { Err, Ok, err, isErr, isOk, ok, type Result } from '../result.js';

function parsePort(raw: string): Result<number, string> {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? ok(value) : err(`bad port: ${raw}`);
}

describe('Result', () => {
  it('narrows with isOk/isErr', () => {
    const good = parsePort('8080');
    const bad = parsePort('x');
    expect(isOk(good)).toBe(true);
    expect(isErr(good)).toBe(false);
    expect(isErr(bad)).toBe(true);
    expect(isOk(bad)).toBe(false);
    if (isOk(good)) expect(good.value).toBe(8080);
    if (isErr(bad)) expect(bad.error).toBe('bad port: x');
  });

  it('tags each variant', () => {
    expect(ok(1)).toBeInstanceOf(Ok);
    expect(ok(1)._tag).toBe('Ok');
    expect(err('e')).toBeInstanceOf(Err);
    expect(err('e')._tag).toBe('Err');
  });
});
