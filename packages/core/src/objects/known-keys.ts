import type { RuleContext } from '../context/rule-context.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationErrorCollection,
  createError,
} from '../errors/validation-error.js';

/**
 * Input keys claimed by some field rule during one `apply`.
 * When inactive nothing is recorded and `check` reports nothing.
 */
export class KnownKeys {
  private readonly keys = new Set<string>();

  constructor(public readonly active: boolean) {}

  add(key: string): void {
    if (this.active) this.keys.add(key);
  }

  unknown(inputKeys: Iterable<string>): string[] {
    const out: string[] = [];
    for (const key of inputKeys) {
      if (!this.keys.has(key)) out.push(key);
    }
    return out;
  }

  check(
    ctx: RuleContext,
    inputKeys: Iterable<string>
  ): ValidationErrorCollection | undefined {
    if (!this.active) return undefined;
    const errors = this.unknown(inputKeys).map((key) =>
      createError(ErrorCode.UNEXPECTED, ctx.withPath(key), 'unexpected field')
    );
    return errors.length > 0 ? new ValidationErrorCollection(errors) : undefined;
  }
}
