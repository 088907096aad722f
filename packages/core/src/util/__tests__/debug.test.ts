import { describe, expect, it } from 'vitest';

import { createDebugSink, silentSink } from '../debug.js';

describe('createDebugSink', () => {
  it('returns the silent sink when disabled', () => {
    expect(createDebugSink(false)).toBe(silentSink);
    expect(silentSink.enabled).toBe(false);
  });

  it('writes one prefixed line per event', () => {
    const lines: string[] = [];
    const sink = createDebugSink(true, (line) => lines.push(line));
    sink.emit('dispatch', { path: '/a', key: 'a' });
    sink.emit('cancelled');
    expect(sink.enabled).toBe(true);
    expect(lines).toEqual([
      '[corral] dispatch {"path":"/a","key":"a"}',
      '[corral] cancelled',
    ]);
  });

  it('accepts the writer as the enable flag and renders bigint', () => {
    const lines: string[] = [];
    const sink = createDebugSink((line) => lines.push(line));
    sink.emit('rule-threw', { size: 10n });
    expect(lines).toEqual(['[corral] rule-threw {"size":"10"}']);
  });

  it('survives values JSON cannot render', () => {
    const lines: string[] = [];
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    createDebugSink(true, (line) => lines.push(line)).emit('dispatch', cyclic);
    expect(lines).toEqual(['[corral] dispatch {"unserializable":true}']);
  });
});
