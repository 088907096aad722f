/**
 * Error Code Infrastructure
 * Stable error codes, error kinds, and HTTP status mappings.
 */

export type Severity = 'info' | 'warn' | 'error';

/**
 * Classification of an error code.
 * - validation: caused by user input
 * - permission: input is well formed but not allowed
 * - internal: programmer or runtime defect, including cancellation
 * - schema: defect in a rule-set definition, raised while building it
 */
export type ErrorKind = 'validation' | 'permission' | 'internal' | 'schema';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Validation errors (V100–V199)
  TYPE = 'V100',
  RANGE = 'V101',
  REQUIRED = 'V102',
  UNEXPECTED = 'V103',
  MIN = 'V104',
  MAX = 'V105',
  MIN_LEN = 'V106',
  MAX_LEN = 'V107',
  PATTERN = 'V108',
  NULL = 'V109',

  // Permission errors (V150–V199)
  NOT_ALLOWED = 'V150',

  // Context errors (V200–V299)
  TIMEOUT = 'V200',
  CANCELLED = 'V201',

  // Schema definition errors (S300–S399)
  CIRCULAR_REFERENCE = 'S300',
  DYNAMIC_KEY_IN_CONDITIONAL = 'S301',
  MISSING_MAPPING = 'S302',
  CONFIGURATION_ERROR = 'S310',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
  UNKNOWN = 'E501',
}

export const KIND_BY_CODE = {
  [ErrorCode.TYPE]: 'validation',
  [ErrorCode.RANGE]: 'validation',
  [ErrorCode.REQUIRED]: 'validation',
  [ErrorCode.UNEXPECTED]: 'validation',
  [ErrorCode.MIN]: 'validation',
  [ErrorCode.MAX]: 'validation',
  [ErrorCode.MIN_LEN]: 'validation',
  [ErrorCode.MAX_LEN]: 'validation',
  [ErrorCode.PATTERN]: 'validation',
  [ErrorCode.NULL]: 'validation',
  [ErrorCode.NOT_ALLOWED]: 'permission',
  [ErrorCode.TIMEOUT]: 'internal',
  [ErrorCode.CANCELLED]: 'internal',
  [ErrorCode.CIRCULAR_REFERENCE]: 'schema',
  [ErrorCode.DYNAMIC_KEY_IN_CONDITIONAL]: 'schema',
  [ErrorCode.MISSING_MAPPING]: 'schema',
  [ErrorCode.CONFIGURATION_ERROR]: 'schema',
  [ErrorCode.INTERNAL_ERROR]: 'internal',
  [ErrorCode.UNKNOWN]: 'internal',
} satisfies Record<ErrorCode, ErrorKind>;

// HTTP status mapping for API responses
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.TYPE]: 400,
  [ErrorCode.RANGE]: 400,
  [ErrorCode.REQUIRED]: 400,
  [ErrorCode.UNEXPECTED]: 400,
  [ErrorCode.MIN]: 400,
  [ErrorCode.MAX]: 400,
  [ErrorCode.MIN_LEN]: 400,
  [ErrorCode.MAX_LEN]: 400,
  [ErrorCode.PATTERN]: 400,
  [ErrorCode.NULL]: 400,
  [ErrorCode.NOT_ALLOWED]: 403,
  [ErrorCode.TIMEOUT]: 504,
  [ErrorCode.CANCELLED]: 499,
  [ErrorCode.CIRCULAR_REFERENCE]: 500,
  [ErrorCode.DYNAMIC_KEY_IN_CONDITIONAL]: 500,
  [ErrorCode.MISSING_MAPPING]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.UNKNOWN]: 500,
} satisfies Record<ErrorCode, number>;

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}

export function getErrorKind(code: ErrorCode): ErrorKind {
  return KIND_BY_CODE[code];
}

export function isInternalCode(code: ErrorCode): boolean {
  return KIND_BY_CODE[code] === 'internal';
}
