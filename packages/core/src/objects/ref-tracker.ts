import { ErrorCode } from '../errors/codes.js';
import { SchemaDefinitionError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Rule } from '../rules/rule.js';
import { ConstantRuleSet } from '../rules/constant.js';

/** Narrow a field matcher to a constant (non-predicate) key. */
export function constantKey(rule: Rule<string>): string | undefined {
  if (rule instanceof ConstantRuleSet && typeof rule.value === 'string') {
    return rule.value;
  }
  return undefined;
}

/**
 * Dependency graph between field keys of conditional rules.
 * An edge `a → b` means a's conditional rule waits for every rule on b.
 */
export class RefTracker {
  private readonly edges: Map<string, Set<string>>;

  constructor(edges?: ReadonlyMap<string, ReadonlySet<string>>) {
    this.edges = new Map();
    if (edges) {
      for (const [key, targets] of edges) {
        this.edges.set(key, new Set(targets));
      }
    }
  }

  /**
   * Register `key → dependsOn`. On failure the graph is left unchanged.
   */
  add(
    key: Rule<string>,
    dependsOn: Rule<string>
  ): Result<void, SchemaDefinitionError> {
    const from = constantKey(key);
    const to = constantKey(dependsOn);
    if (from === undefined || to === undefined) {
      return err(
        new SchemaDefinitionError({
          message: 'conditional rules do not support dynamic keys',
          errorCode: ErrorCode.DYNAMIC_KEY_IN_CONDITIONAL,
          context: { key: key.describe(), dependsOn: dependsOn.describe() },
        })
      );
    }

    const targets = this.edges.get(from) ?? new Set<string>();
    const existed = targets.has(to);
    targets.add(to);
    this.edges.set(from, targets);

    const cycle = this.findCycle(from);
    if (cycle) {
      if (!existed) targets.delete(to);
      if (targets.size === 0) this.edges.delete(from);
      return err(
        new SchemaDefinitionError({
          message: `circular reference detected: ${cycle.join(' -> ')}`,
          errorCode: ErrorCode.CIRCULAR_REFERENCE,
          context: { key: from, dependsOn: to, cycle },
        })
      );
    }
    return ok(undefined);
  }

  clone(): RefTracker {
    return new RefTracker(this.edges);
  }

  /** Depth-first search from `start`; returns the cycle path if one exists. */
  private findCycle(start: string): string[] | undefined {
    const visited = new Set<string>();
    const stack: string[] = [];
    const onStack = new Set<string>();

    const visit = (node: string): string[] | undefined => {
      if (onStack.has(node)) {
        return [...stack.slice(stack.indexOf(node)), node];
      }
      if (visited.has(node)) return undefined;
      visited.add(node);
      stack.push(node);
      onStack.add(node);
      for (const next of this.edges.get(node) ?? []) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
      stack.pop();
      onStack.delete(node);
      return undefined;
    };

    return visit(start);
  }
}
