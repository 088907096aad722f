/**
 * High-level facades over `RuleSet.apply`.
 *
 * Both build a root RuleContext from the options, apply the rule set to a
 * fresh output, and dispose the context afterwards.
 */

import { RuleContext } from './context/rule-context.js';
import type { ValidationErrorCollection } from './errors/validation-error.js';
import type { OutputRef, RuleSet } from './rules/rule-set.js';
import { ValidationFailedError } from './types/errors.js';
import type { ValidateOptions } from './types/options.js';
import { err, isErr, ok, type Result } from './types/result.js';

/**
 * Coerce and validate `input`.
 *
 * Resolves to Ok with the populated output, or Err with every violation.
 * Invalid options throw ConfigError before anything is evaluated.
 */
export async function validate<T>(
  ruleSet: RuleSet<T>,
  input: unknown,
  options: ValidateOptions = {}
): Promise<Result<T | undefined, ValidationErrorCollection>> {
  const ctx = RuleContext.create(options);
  try {
    ctx.metrics?.increment('applyCalls');
    const out: OutputRef<T> = {};
    const errors = await ruleSet.apply(ctx, input, out);
    return errors ? err(errors) : ok(out.value);
  } finally {
    ctx.dispose();
  }
}

/**
 * Like `validate`, but throws ValidationFailedError on failure.
 */
export async function validateOrThrow<T>(
  ruleSet: RuleSet<T>,
  input: unknown,
  options: ValidateOptions = {}
): Promise<T | undefined> {
  const result = await validate(ruleSet, input, options);
  if (isErr(result)) {
    throw new ValidationFailedError(result.error);
  }
  return result.value;
}
