/**
 * ERROR TAXONOMY
 *
 * Three kinds of failure matter to callers:
 * - validation: the input is wrong; retrying cannot help
 * - transient: the backend hiccuped; worth retrying
 * - fatal: permission, missing data, or anything we cannot recognise
 *
 * Every error also carries a short message that is safe to show to a user.
 * Backend error strings stay in logs.
 */

export type ErrorCategory = 'validation' | 'transient' | 'fatal';

export type FatalCode =
  | 'permission-denied'
  | 'unauthenticated'
  | 'not-found'
  | 'already-exists'
  | 'internal';

const TRANSIENT_USER_MESSAGE = 'Service is temporarily unavailable. Please try again later.';
const GENERIC_USER_MESSAGE = 'Something went wrong. Please try again later.';

const FATAL_USER_MESSAGES: Record<FatalCode, string> = {
  'permission-denied': "You don't have permission to access this data. Please sign in and try again.",
  'unauthenticated': 'Authentication required. Please sign in and try again.',
  'not-found': 'The requested data was not found.',
  'already-exists': 'This data already exists.',
  'internal': 'An internal error occurred. Please try again later.',
};

export abstract class AppError extends Error {
  abstract readonly category: ErrorCategory;

  protected constructor(message: string, readonly userMessage: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : {cause});
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly category = 'validation';

  constructor(readonly details: readonly string[]) {
    const message = details.join('; ');
    super(message, message);
  }
}

export class TransientError extends AppError {
  readonly category = 'transient';

  constructor(message: string, cause?: unknown) {
    super(message, TRANSIENT_USER_MESSAGE, cause);
  }
}

export class FatalError extends AppError {
  readonly category = 'fatal';

  constructor(readonly code: FatalCode, message: string, cause?: unknown) {
    super(message, FATAL_USER_MESSAGES[code], cause);
  }
}

export class RateLimitError extends AppError {
  readonly category = 'validation';

  constructor(message: string, readonly retryAfterMs: number) {
    super(message, message);
  }
}

// ============================================================================
// Classification of foreign errors
// ============================================================================

// Node socket/DNS failures and PostgreSQL connection, serialization and overload states
const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  '08000',
  '08001',
  '08003',
  '08006',
  '40001',
  '40P01',
  '53300',
  '57P01',
  '57P03',
]);

const TRANSIENT_AWS_NAMES = new Set([
  'ThrottlingException',
  'Throttling',
  'TooManyRequestsException',
  'RequestTimeout',
  'RequestTimeoutException',
  'ServiceUnavailable',
  'SlowDown',
  'InternalError',
  'TimeoutError',
]);

const FATAL_AWS_NAMES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'AuthorizationError',
  'UnrecognizedClientException',
  'InvalidAccessKeyId',
  'NoSuchBucket',
  'NotFoundException',
]);

const TRANSIENT_MESSAGE = /network|timeout|timed out|connection|unavailable|unreachable/i;

// AWS SDK v3 service exceptions carry the response status in $metadata
function httpStatusOf(error: object): number | undefined {
  if (!('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  const status = metadata.httpStatusCode;
  return typeof status === 'number' ? status : undefined;
}

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AppError) {
    return error.category;
  }
  if (typeof error !== 'object' || error === null) {
    return 'fatal';
  }
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code)) {
    return 'transient';
  }
  if ('$retryable' in error && error.$retryable) {
    return 'transient';
  }
  if (error instanceof Error) {
    if (TRANSIENT_AWS_NAMES.has(error.name)) return 'transient';
    if (FATAL_AWS_NAMES.has(error.name)) return 'fatal';
  }
  const status = httpStatusOf(error);
  if (status !== undefined) {
    return status === 429 || status >= 500 ? 'transient' : 'fatal';
  }
  if (error instanceof Error && TRANSIENT_MESSAGE.test(error.message)) {
    return 'transient';
  }
  return 'fatal';
}

export function isRetryable(error: unknown): boolean {
  return classifyError(error) === 'transient';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Text for end users; never the backend's own message. */
export function toUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage;
  }
  return classifyError(error) === 'transient' ? TRANSIENT_USER_MESSAGE : GENERIC_USER_MESSAGE;
}
