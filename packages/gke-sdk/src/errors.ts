/**
 * Base SDK error
 */
export class GkeSdkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GkeSdkError';
  }
}

/**
 * Resource not found
 */
export class NotFoundError extends GkeSdkError {
  constructor(kind: string, name: string) {
    super(`${kind} "${name}" not found`, 'NOT_FOUND', 404, { kind, name });
    this.name = 'NotFoundError';
  }
}

/**
 * Resource already exists
 */
export class AlreadyExistsError extends GkeSdkError {
  constructor(kind: string, name: string) {
    super(`${kind} "${name}" already exists`, 'ALREADY_EXISTS', 409, { kind, name });
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Timeout waiting for a resource to settle
 */
export class TimeoutError extends GkeSdkError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', 408, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Wait aborted through the caller's signal
 */
export class CancelledError extends GkeSdkError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, 'CANCELLED', 499, { operation });
    this.name = 'CancelledError';
  }
}

/**
 * Credential source could not be turned into client options
 */
export class CredentialsError extends GkeSdkError {
  constructor(message: string) {
    super(message, 'CREDENTIALS_INVALID', 400);
    this.name = 'CredentialsError';
  }
}
