/**
 * ErrorPresenter - formats validation results and thrown errors for
 * terminals, HTTP APIs and production logs. No validation logic.
 */

import { getHttpStatus, type ErrorCode } from './codes.js';
import {
  PATH_SERIALIZERS,
  type PathFormat,
} from '../context/path.js';
import type {
  ValidationError,
  ValidationErrorCollection,
} from './validation-error.js';
import {
  redactValue,
  type CorralError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  /** Path rendering used in every view (default: slash-delimited). */
  pathFormat?: PathFormat;
  redactKeys?: string[];
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  lines: string[];
  colors: boolean;
}

export interface APIFieldError {
  code: ErrorCode;
  path: string;
  message: string;
}

export interface APIErrorView {
  status: number;
  type: string;
  title: string;
  detail: string;
  instance?: string;
  errors: APIFieldError[];
}

export type ProductionView = SerializedError & { requestId?: string };

const DEFAULT_REDACT_KEYS = [
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
];

const RED = '\u001b[31m';
const DIM = '\u001b[2m';
const RESET = '\u001b[0m';

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(errors: ValidationErrorCollection): CLIErrorView {
    const colors = this.#shouldUseColors(this.options.colors);
    const count = errors.length;
    return {
      title: `Validation failed with ${count} error${count === 1 ? '' : 's'}`,
      lines: errors.all().map((error) => this.#formatLine(error, colors)),
      colors,
    };
  }

  formatForAPI(errors: ValidationErrorCollection): APIErrorView {
    const first = errors.first();
    const status = this.#statusFor(errors);
    return {
      status,
      type: first ? `urn:corral:error:${first.code}` : 'about:blank',
      title: errors.isInternal() ? 'Validation could not complete' : 'Validation failed',
      detail: errors.message,
      instance: this.#getRequestId(),
      errors: errors.all().map((error) => ({
        code: error.code,
        path: this.#path(error),
        message: error.message,
      })),
    };
  }

  formatForProduction(error: CorralError): ProductionView {
    const base = error.toJSON('prod');
    const redacted = this.#applyAdditionalRedaction(base);
    return { ...redacted, requestId: this.#getRequestId() };
  }

  #path(error: ValidationError): string {
    const serializer = PATH_SERIALIZERS[this.options.pathFormat ?? 'default'];
    return serializer(error.segments);
  }

  #formatLine(error: ValidationError, colors: boolean): string {
    const path = this.#path(error) || '(root)';
    const code = colors ? `${RED}${error.code}${RESET}` : error.code;
    const where = colors ? `${DIM}${path}${RESET}` : path;
    return `${code} ${where}: ${error.message}`;
  }

  /** Internal errors dominate; otherwise the first error decides. */
  #statusFor(errors: ValidationErrorCollection): number {
    const internal = errors.all().find((error) => error.isInternal());
    const decisive = internal ?? errors.first();
    return decisive ? getHttpStatus(decisive.code) : 200;
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    if (!view.context || !('value' in view.context)) return view;
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    return {
      ...view,
      context: { ...view.context, value: redactValue(view.context.value, keys) },
    };
  }
}
