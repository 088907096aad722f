/**
 * A Rule backed by a compiled JSON Schema.
 *
 * Useful as a whole-record rule on an object rule set, or on `any()`
 * for values whose shape is described elsewhere as JSON Schema.
 */

import AjvModule, {
  type AnySchema,
  type ErrorObject,
  type Options as AjvOptions,
  type ValidateFunction,
} from 'ajv';
import addFormatsModule from 'ajv-formats';

import type { RuleContext } from '../context/rule-context.js';
import type { PathSegment } from '../context/path.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ValidationError,
  ValidationErrorCollection,
} from '../errors/validation-error.js';
import type { Rule, RuleResult } from './rule.js';

// Both packages are CommonJS; their classes hang off `default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const DEFAULT_AJV_OPTIONS: AjvOptions = {
  allErrors: true,
  strict: false,
};

function createAjv(options: AjvOptions): InstanceType<typeof Ajv> {
  const ajv = new Ajv({ ...DEFAULT_AJV_OPTIONS, ...options });
  addFormats(ajv);
  return ajv;
}

/** `/items/0/a~1b` → ['items', 0, 'a/b'] */
export function instancePathSegments(instancePath: string): PathSegment[] {
  if (instancePath === '') return [];
  return instancePath
    .slice(1)
    .split('/')
    .map((raw) => raw.replace(/~1/g, '/').replace(/~0/g, '~'))
    .map((segment) => (/^(?:0|[1-9]\d*)$/.test(segment) ? Number(segment) : segment));
}

function toValidationError(
  ctx: RuleContext,
  error: ErrorObject
): ValidationError {
  return new ValidationError(
    ErrorCode.PATTERN,
    [...ctx.segments, ...instancePathSegments(error.instancePath)],
    error.message ?? 'value does not match schema',
    [error.keyword]
  );
}

export class JsonSchemaRule<T = unknown> implements Rule<T> {
  readonly #validate: ValidateFunction;

  constructor(
    private readonly schema: AnySchema,
    options: AjvOptions = {}
  ) {
    this.#validate = createAjv(options).compile(schema);
  }

  evaluate(ctx: RuleContext, value: T): RuleResult {
    if (this.#validate(value)) return undefined;
    const errors = this.#validate.errors ?? [];
    if (errors.length === 0) {
      return ValidationErrorCollection.of(
        new ValidationError(
          ErrorCode.PATTERN,
          ctx.segments,
          'value does not match schema'
        )
      );
    }
    return new ValidationErrorCollection(
      errors.map((error) => toValidationError(ctx, error))
    );
  }

  /** A later schema replaces an earlier one. */
  conflictsWith(other: Rule<T>): boolean {
    return other instanceof JsonSchemaRule;
  }

  describe(): string {
    const id =
      typeof this.schema === 'object' &&
      this.schema !== null &&
      '$id' in this.schema &&
      typeof this.schema.$id === 'string'
        ? this.schema.$id
        : '<schema>';
    return `WithJsonSchema(${id})`;
  }
}

export function jsonSchema<T = unknown>(
  schema: AnySchema,
  options?: AjvOptions
): JsonSchemaRule<T> {
  return new JsonSchemaRule<T>(schema, options);
}
