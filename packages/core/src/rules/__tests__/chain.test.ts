import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { RuleContext } from '../../context/rule-context.js';
import { ErrorCode } from '../../errors/codes.js';
import {
  ValidationErrorCollection,
  createError,
} from '../../errors/validation-error.js';
import {
  ConstraintNode,
  chainRules,
  describeChain,
  evaluateChain,
  pruneConflicts,
  withRule,
} from '../chain.js';
import { KindedRule, ruleFunc } from '../rule.js';

const SEED = Number(process.env.TEST_SEED ?? 424242);

function kinded(kind: string, label = kind): KindedRule<string> {
  return new KindedRule<string>(kind, label);
}

function build(...rules: KindedRule<string>[]): ConstraintNode<string> | undefined {
  let chain: ConstraintNode<string> | undefined;
  for (const rule of rules) chain = withRule(chain, rule);
  return chain;
}

describe('constraint chain', () => {
  it('describes rules root first', () => {
    expect(describeChain(build(kinded('a', 'A()'), kinded('b', 'B()')))).toBe(
      '.A().B()'
    );
    expect(describeChain(undefined)).toBe('');
  });

  it('a conflicting rule replaces the earlier one', () => {
    const chain = build(kinded('min', 'Min(1)'), kinded('max', 'Max(9)'), kinded('min', 'Min(3)'));
    expect(describeChain(chain)).toBe('.Max(9).Min(3)');
  });

  it('never mutates the chain it extends', () => {
    const base = build(kinded('a', 'A()'), kinded('b', 'B()'));
    const left = withRule(base, kinded('a', 'A2()'));
    const right = withRule(base, kinded('c', 'C()'));
    expect(describeChain(base)).toBe('.A().B()');
    expect(describeChain(left)).toBe('.B().A2()');
    expect(describeChain(right)).toBe('.A().B().C()');
    expect(right.parent).toBe(base);
  });

  it('pruning shares untouched prefixes', () => {
    const root = new ConstraintNode(kinded('a'));
    const mid = new ConstraintNode(kinded('b'), root);
    const top = new ConstraintNode(kinded('c'), mid);
    expect(pruneConflicts(top, kinded('z'))).toBe(top);
    const pruned = pruneConflicts(top, kinded('c'));
    expect(pruned).toBe(mid);
    const withoutRoot = pruneConflicts(top, kinded('a'));
    expect(withoutRoot?.parent?.parent).toBeUndefined();
    expect(pruneConflicts(root, kinded('a'))).toBeUndefined();
  });

  it('non-exclusive rules accumulate', () => {
    const pattern = (label: string): KindedRule<string> =>
      new KindedRule<string>('regex', label, undefined, false);
    expect(describeChain(build(pattern('R1'), pattern('R2')))).toBe('.R1.R2');
  });

  it('keeps one rule per kind, ordered by its last addition', () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom('a', 'b', 'c', 'd'), { maxLength: 12 }), (kinds) => {
        const chain = build(...kinds.map((kind, i) => kinded(kind, `${kind}${i}`)));
        const lastIndex = new Map<string, number>();
        kinds.forEach((kind, i) => lastIndex.set(kind, i));
        const expected = [...lastIndex.entries()]
          .sort((x, y) => x[1] - y[1])
          .map(([kind, i]) => `.${kind}${i}`)
          .join('');
        expect(describeChain(chain)).toBe(expected);
        expect(chainRules(chain)).toHaveLength(lastIndex.size);
      }),
      { seed: SEED, numRuns: Number(process.env.FC_NUM_RUNS ?? 100) }
    );
  });

  it('evaluates every rule in order and merges the errors', async () => {
    const seen: string[] = [];
    const failing = (label: string) =>
      ruleFunc<string>((ctx) => {
        seen.push(label);
        return ValidationErrorCollection.of(
          createError(ErrorCode.PATTERN, ctx, `${label} failed`)
        );
      });
    let chain = withRule(undefined, failing('first'));
    chain = withRule(chain, ruleFunc<string>(() => {
      seen.push('passing');
      return undefined;
    }));
    chain = withRule(chain, failing('second'));

    const errors = await evaluateChain(chain, RuleContext.background(), 'x');
    expect(seen).toEqual(['first', 'passing', 'second']);
    expect(errors?.all().map((e) => e.message)).toEqual([
      'first failed',
      'second failed',
    ]);
  });

  it('an empty chain passes', async () => {
    expect(await evaluateChain(undefined, RuleContext.background(), 1)).toBeUndefined();
  });
});
