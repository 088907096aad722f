/**
 * Thrown-error hierarchy.
 *
 * Per-input problems are returned as a ValidationErrorCollection and never
 * thrown; the classes here cover defects in rule-set definitions, invalid
 * options, and the `validateOrThrow` facade.
 */

import { ErrorCode, type Severity } from '../errors/codes.js';
import type { ValidationErrorCollection } from '../errors/validation-error.js';

export interface ErrorContext {
  path?: string; // Field path the problem relates to (e.g. '/users/0/name')
  key?: string; // Field key involved in a definition error
  dependsOn?: string; // Dependency key for conditional-rule errors
  setting?: string; // Option name for configuration errors
  value?: unknown; // Problematic value (may contain PII)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
}

export interface CorralErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

export function redactValue(
  val: unknown,
  keys: ReadonlySet<string> = SENSITIVE_KEYS
): unknown {
  if (val instanceof Map) {
    return new Map(
      [...val.entries()].map(([k, v]) => [
        k,
        typeof k === 'string' && keys.has(k) ? '[REDACTED]' : redactValue(v, keys),
      ])
    );
  }
  if (val && typeof val === 'object') {
    if (Array.isArray(val)) return val.map((item) => redactValue(item, keys));
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactValue(v, keys);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all thrown errors
 */
export abstract class CorralError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: CorralErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
    };
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * A rule-set definition that cannot be evaluated: dependency cycles,
 * predicate keys in conditions, record fields without a mapping.
 */
export class SchemaDefinitionError extends CorralError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get key(): string | undefined {
    return this.context?.key;
  }
}

/**
 * Invalid validation options
 */
export class ConfigError extends CorralError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Thrown by `validateOrThrow`; carries every collected violation.
 */
export class ValidationFailedError extends CorralError {
  public readonly errors: ValidationErrorCollection;

  constructor(errors: ValidationErrorCollection) {
    const first = errors.first();
    super({
      message: errors.message,
      errorCode: first ? first.code : ErrorCode.UNKNOWN,
      context: {
        path: first?.path,
        errorCount: errors.length,
      },
    });
    this.errors = errors;
  }
}

export function isCorralError(error: unknown): error is CorralError {
  return error instanceof CorralError;
}
