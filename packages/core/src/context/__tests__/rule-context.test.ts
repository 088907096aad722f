import { afterEach, describe, expect, it, vi } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../../types/errors.js';
import { MetricsCollector } from '../../util/metrics.js';
import { RuleContext } from '../rule-context.js';

describe('RuleContext', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('extends the path without touching the parent', () => {
    const root = RuleContext.background();
    const child = root.withPath('items').withIndex(2).withPath('name');
    expect(root.path).toBe('');
    expect(child.path).toBe('/items/2/name');
    expect(child.segments).toEqual(['items', 2, 'name']);
  });

  it('background contexts are never aborted', () => {
    const ctx = RuleContext.background();
    expect(ctx.aborted).toBe(false);
    expect(ctx.contextError()).toBeUndefined();
    expect(ctx.debug.enabled).toBe(false);
  });

  it('reports cancellation from the caller signal', () => {
    const controller = new AbortController();
    const ctx = RuleContext.create({ signal: controller.signal }).withPath('a');
    expect(ctx.aborted).toBe(false);
    controller.abort();
    expect(ctx.aborted).toBe(true);
    expect(ctx.abortKind).toBe('cancelled');
    const error = ctx.contextError();
    expect(error?.code).toBe(ErrorCode.CANCELLED);
    expect(error?.path).toBe('/a');
    expect(error?.message).toBe('validation was cancelled');
    ctx.dispose();
  });

  it('treats an already-aborted TimeoutError signal as a timeout', () => {
    const controller = new AbortController();
    const reason = new Error('deadline');
    reason.name = 'TimeoutError';
    controller.abort(reason);
    const ctx = RuleContext.create({ signal: controller.signal });
    expect(ctx.abortKind).toBe('timeout');
    expect(ctx.contextError()?.message).toBe(
      'validation timed out before completing'
    );
  });

  it('aborts with a timeout once timeoutMs elapses', () => {
    vi.useFakeTimers();
    const ctx = RuleContext.create({ timeoutMs: 50 });
    vi.advanceTimersByTime(49);
    expect(ctx.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(ctx.abortKind).toBe('timeout');
    expect(ctx.signal.aborted).toBe(true);
    ctx.dispose();
  });

  it('dispose clears the deadline', () => {
    vi.useFakeTimers();
    const ctx = RuleContext.create({ timeoutMs: 10 });
    ctx.dispose();
    vi.advanceTimersByTime(100);
    expect(ctx.aborted).toBe(false);
  });

  it('shares metrics with child contexts', () => {
    const metrics = new MetricsCollector();
    const ctx = RuleContext.create({ metrics });
    expect(ctx.withPath('x').metrics).toBe(metrics);
  });

  it('rejects invalid options', () => {
    expect(() => RuleContext.create({ timeoutMs: -1 })).toThrow(ConfigError);
  });
});
