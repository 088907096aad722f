/**
 * Persistent constraint chain.
 *
 * Each node holds one rule and a link to the chain it was built on. Nodes
 * are never mutated, so chains built from a common prefix share it.
 */

import type { RuleContext } from '../context/rule-context.js';
import { ValidationErrorCollection } from '../errors/validation-error.js';
import type { Rule } from './rule.js';

export class ConstraintNode<T> {
  constructor(
    public readonly rule: Rule<T>,
    public readonly parent?: ConstraintNode<T>
  ) {}
}

/**
 * Remove every node whose rule conflicts with `added`.
 *
 * Returns the same node object when nothing under it was removed, and
 * `undefined` when every node was removed.
 */
export function pruneConflicts<T>(
  node: ConstraintNode<T> | undefined,
  added: Rule<T>
): ConstraintNode<T> | undefined {
  if (!node) return undefined;
  if (node.rule.conflictsWith(added)) {
    return pruneConflicts(node.parent, added);
  }
  const parent = pruneConflicts(node.parent, added);
  if (parent === node.parent) return node;
  return new ConstraintNode(node.rule, parent);
}

export function withRule<T>(
  chain: ConstraintNode<T> | undefined,
  rule: Rule<T>
): ConstraintNode<T> {
  return new ConstraintNode(rule, pruneConflicts(chain, rule));
}

/** Rules in the order they were added (root first). */
export function chainRules<T>(chain: ConstraintNode<T> | undefined): Rule<T>[] {
  const rules: Rule<T>[] = [];
  for (let node = chain; node; node = node.parent) {
    rules.push(node.rule);
  }
  return rules.reverse();
}

export async function evaluateChain<T>(
  chain: ConstraintNode<T> | undefined,
  ctx: RuleContext,
  value: T
): Promise<ValidationErrorCollection | undefined> {
  const collected: Array<ValidationErrorCollection | undefined> = [];
  for (const rule of chainRules(chain)) {
    collected.push(await rule.evaluate(ctx, value));
  }
  return ValidationErrorCollection.merge(...collected);
}

/** `.A().B()` for a chain built by adding A then B. */
export function describeChain<T>(chain: ConstraintNode<T> | undefined): string {
  return chainRules(chain)
    .map((rule) => `.${rule.describe()}`)
    .join('');
}
