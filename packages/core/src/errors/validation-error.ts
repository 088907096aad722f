import {
  ErrorCode,
  type ErrorKind,
  getErrorKind,
} from './codes.js';
import {
  PATH_SERIALIZERS,
  defaultPath,
  type PathFormat,
  type PathSegment,
  type PathSerializer,
} from '../context/path.js';

export interface ValidationErrorJSON {
  code: ErrorCode;
  path: string;
  message: string;
  params?: unknown[];
}

/** Anything that knows the field path an error belongs to. */
export interface PathSource {
  readonly segments: readonly PathSegment[];
}

function resolveSerializer(format: PathFormat | PathSerializer): PathSerializer {
  return typeof format === 'function' ? format : PATH_SERIALIZERS[format];
}

/**
 * A single rule violation at a field path.
 * Not thrown by the engine: errors are collected and returned.
 */
export class ValidationError extends Error {
  public readonly code: ErrorCode;
  public readonly segments: readonly PathSegment[];
  public readonly params: readonly unknown[];

  constructor(
    code: ErrorCode,
    segments: readonly PathSegment[],
    message: string,
    params: readonly unknown[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.segments = [...segments];
    this.params = [...params];
  }

  /** Slash-delimited path, e.g. `/items/0/name`. */
  get path(): string {
    return defaultPath(this.segments);
  }

  get kind(): ErrorKind {
    return getErrorKind(this.code);
  }

  pathAs(format: PathFormat | PathSerializer): string {
    return resolveSerializer(format)(this.segments);
  }

  isInternal(): boolean {
    return this.kind === 'internal';
  }

  isPermission(): boolean {
    return this.kind === 'permission';
  }

  isValidation(): boolean {
    return this.kind === 'validation';
  }

  toJSON(): ValidationErrorJSON {
    const json: ValidationErrorJSON = {
      code: this.code,
      path: this.path,
      message: this.message,
    };
    if (this.params.length > 0) json.params = [...this.params];
    return json;
  }
}

export function createError(
  code: ErrorCode,
  source: PathSource,
  message: string,
  ...params: unknown[]
): ValidationError {
  return new ValidationError(code, source.segments, message, params);
}

/** Timeout or cancellation, as opposed to a rule violation. */
export function isContextError(error: ValidationError): boolean {
  return error.code === ErrorCode.TIMEOUT || error.code === ErrorCode.CANCELLED;
}

/**
 * Immutable, ordered list of validation errors.
 *
 * Rules return `undefined` rather than an empty collection when a value
 * passes, so most call sites only need a truthiness check.
 */
export class ValidationErrorCollection implements Iterable<ValidationError> {
  readonly #errors: readonly ValidationError[];

  constructor(errors: readonly ValidationError[] = []) {
    this.#errors = [...errors];
  }

  static of(...errors: ValidationError[]): ValidationErrorCollection {
    return new ValidationErrorCollection(errors);
  }

  /** Merge collections, returning `undefined` when nothing was collected. */
  static merge(
    ...collections: Array<ValidationErrorCollection | undefined>
  ): ValidationErrorCollection | undefined {
    const all: ValidationError[] = [];
    for (const collection of collections) {
      if (collection) all.push(...collection.#errors);
    }
    return all.length > 0 ? new ValidationErrorCollection(all) : undefined;
  }

  get length(): number {
    return this.#errors.length;
  }

  [Symbol.iterator](): Iterator<ValidationError> {
    return this.#errors[Symbol.iterator]();
  }

  all(): readonly ValidationError[] {
    return this.#errors;
  }

  first(): ValidationError | undefined {
    return this.#errors[0];
  }

  concat(
    ...others: Array<ValidationErrorCollection | undefined>
  ): ValidationErrorCollection {
    return (
      ValidationErrorCollection.merge(this, ...others) ??
      new ValidationErrorCollection()
    );
  }

  /**
   * Errors whose path equals `path` when rendered with `format`
   * (the slash-delimited form by default); `undefined` when none match.
   */
  for(
    path: string,
    format: PathFormat | PathSerializer = 'default'
  ): ValidationErrorCollection | undefined {
    const serialize = resolveSerializer(format);
    const matching = this.#errors.filter(
      (error) => serialize(error.segments) === path
    );
    return matching.length > 0
      ? new ValidationErrorCollection(matching)
      : undefined;
  }

  codes(): ErrorCode[] {
    return this.#errors.map((error) => error.code);
  }

  isInternal(): boolean {
    return this.#errors.some((error) => error.isInternal());
  }

  isPermission(): boolean {
    if (this.isInternal()) return false;
    return this.#errors.some((error) => error.isPermission());
  }

  isValidation(): boolean {
    if (this.#errors.length === 0) return false;
    return !this.isInternal() && !this.isPermission();
  }

  /** `first message (and N more)`. */
  get message(): string {
    const [first] = this.#errors;
    if (!first) return 'no errors';
    if (this.#errors.length === 1) return first.message;
    return `${first.message} (and ${this.#errors.length - 1} more)`;
  }

  toString(): string {
    return this.message;
  }

  toJSON(): ValidationErrorJSON[] {
    return this.#errors.map((error) => error.toJSON());
  }
}
