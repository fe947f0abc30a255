/**
 * Typed error model.
 *
 * Every failure that crosses a module boundary is a TypedError with a
 * namespaced code. User-facing routes map the code onto an HTTP status; the
 * callback path only logs it.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'PROVIDER'
  | 'QUEUE'
  | 'STORAGE'
  | 'DELIVERY'
  | 'TASK'
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'VALIDATION'
  | 'SYSTEM';

/** Remediation hint attached to an error. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

export interface TypedError {
  /** Namespaced error code (e.g., "PROVIDER.TIMEOUT"). */
  code: string;
  message: string;
  taskId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

export function createTypedError(params: {
  code: string;
  message: string;
  taskId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    taskId: params.taskId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Thrown wrapper so typed errors can travel through async call chains. */
export class ServiceError extends Error {
  constructor(public typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'ServiceError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

export function isServiceError(err: unknown, codePrefix?: string): err is ServiceError {
  if (!(err instanceof ServiceError)) return false;
  return codePrefix === undefined || err.code.startsWith(codePrefix);
}

// --- Factories ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code: 'VALIDATION.SCHEMA', message, details });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    details: { resourceType, resourceId },
  });
}

export function unauthenticatedError(message: string): TypedError {
  return createTypedError({ code: 'AUTH.UNAUTHENTICATED', message });
}

export function rateLimitError(retryAfterMs: number): TypedError {
  return createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    message: 'Rate limit exceeded',
    retryable: true,
    details: { retryAfterMs },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs } }],
  });
}

/**
 * Submission or transport failure against the generation provider.
 * 429 and 5xx are worth retrying later; 4xx means the request or key is wrong.
 */
export function providerError(message: string, statusCode?: number): TypedError {
  const retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
  const fixes: SuggestedFix[] = [];
  if (statusCode === 401 || statusCode === 403) {
    fixes.push({
      type: 'CHECK_API_KEY',
      params: { statusCode },
      description: 'The provider rejected the API key.',
    });
  } else if (retryable) {
    fixes.push({ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } });
  }
  return createTypedError({
    code: 'PROVIDER.REQUEST_FAILED',
    message,
    retryable,
    details: statusCode === undefined ? undefined : { statusCode },
    suggestedFixes: fixes,
  });
}

export function providerTimeoutError(timeoutMs: number): TypedError {
  return createTypedError({
    code: 'PROVIDER.TIMEOUT',
    message: `Provider did not answer within ${timeoutMs}ms`,
    retryable: true,
    details: { timeoutMs },
  });
}

/** The provider answered, but without a task identifier. */
export function providerProtocolError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code: 'PROVIDER.BAD_RESPONSE', message, details });
}

export function queueUnavailableError(message: string, taskId?: string): TypedError {
  return createTypedError({
    code: 'QUEUE.UNAVAILABLE',
    message,
    taskId,
    retryable: true,
    suggestedFixes: [
      {
        type: 'REPLAY_JOBS',
        params: taskId ? { taskId } : {},
        description: 'Re-publish the missing variant jobs once the queue is reachable.',
      },
    ],
  });
}

export function storageError(operation: string, key: string, message: string): TypedError {
  return createTypedError({
    code: 'STORAGE.UNAVAILABLE',
    message: `Object storage ${operation} failed for ${key}: ${message}`,
    retryable: true,
    details: { operation, key },
  });
}

export function thumbnailDerivationError(taskId: string, message: string): TypedError {
  return createTypedError({
    code: 'DELIVERY.THUMBNAIL_FAILED',
    message: `Thumbnail derivation failed: ${message}`,
    taskId,
    retryable: true,
  });
}

export function taskConflictError(taskId: string): TypedError {
  return createTypedError({
    code: 'TASK.CONFLICT',
    message: `Task already registered: ${taskId}`,
    taskId,
  });
}

export function invalidTransitionError(taskId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'TASK.INVALID_TRANSITION',
    message: `Cannot transition task from "${from}" to "${to}"`,
    taskId,
    details: { from, to },
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({ code: 'SYSTEM.INTERNAL', message });
}

/**
 * Mask a secret, keeping the last 4 characters for identification.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in `message` with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** HTTP status for a typed error at the API boundary. */
export function httpStatusFor(error: TypedError): number {
  const { code } = error;
  if (code === 'PROVIDER.TIMEOUT') return 504;
  if (code.startsWith('PROVIDER.')) return 502;
  if (code.startsWith('QUEUE.') || code.startsWith('STORAGE.')) return 503;
  if (code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (code.startsWith('AUTH.')) return 403;
  if (code.includes('NOT_FOUND')) return 404;
  if (code.startsWith('VALIDATION.')) return 400;
  if (code.startsWith('RATE_LIMIT.')) return 429;
  if (code === 'TASK.CONFLICT') return 409;
  return 500;
}

export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
