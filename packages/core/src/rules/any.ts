import type { RuleContext } from '../context/rule-context.js';
import {
  ChainedRuleSet,
  type ChainParts,
  type Coerced,
} from './rule-set.js';

/**
 * Accepts any defined value, including `null`, and passes it through.
 */
export class AnyRuleSet extends ChainedRuleSet<unknown, null, AnyRuleSet> {
  constructor(
    parts: ChainParts<unknown, null> = {
      chain: undefined,
      required: false,
      config: null,
    }
  ) {
    super(parts, 'AnyRuleSet');
  }

  protected derive(parts: ChainParts<unknown, null>): AnyRuleSet {
    return new AnyRuleSet(parts);
  }

  protected self(): AnyRuleSet {
    return this;
  }

  protected override acceptsNull(): boolean {
    return true;
  }

  protected coerce(_ctx: RuleContext, input: unknown): Coerced<unknown> {
    return { ok: true, value: input };
  }
}

export function any(): AnyRuleSet {
  return new AnyRuleSet();
}
