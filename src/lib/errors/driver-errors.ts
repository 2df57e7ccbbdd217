import {
  CancelledError,
  CredentialsError,
  GkeSdkError,
  TimeoutError,
} from 'gke-cluster-sdk';
import type { AppError } from './base.js';
import { createError } from './base.js';

export type DriverError = AppError;

export const DriverErrors = {
  VALIDATION_FAILED: (field: string, message: string) =>
    createError('DRIVER_VALIDATION_FAILED', message, 400, { field }),

  CONFIG_INVALID: (issues: string[]) =>
    createError('DRIVER_CONFIG_INVALID', `Invalid driver configuration: ${issues.join('; ')}`, 400, {
      issues,
    }),

  STATE_ENCODE_FAILED: (message: string) =>
    createError('DRIVER_STATE_ENCODE_FAILED', `Failed to encode cluster state: ${message}`, 500),

  STATE_RESTORE_FAILED: (message: string) =>
    createError('DRIVER_STATE_RESTORE_FAILED', `Failed to restore cluster state: ${message}`, 422),

  CREDENTIALS_INVALID: (message: string) =>
    createError('DRIVER_CREDENTIALS_INVALID', message, 400),

  PROVIDER_ERROR: (context: string, message: string, details?: Record<string, unknown>) =>
    createError('DRIVER_PROVIDER_ERROR', `${context}: ${message}`, 502, details),

  WAIT_TIMEOUT: (operation: string, timeoutMs: number) =>
    createError('DRIVER_WAIT_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, 504, {
      operation,
      timeoutMs,
    }),

  WAIT_CANCELLED: (operation: string) =>
    createError('DRIVER_WAIT_CANCELLED', `${operation} was cancelled`, 499, { operation }),

  NODE_POOL_NOT_FOUND: (clusterName: string) =>
    createError('DRIVER_NODE_POOL_NOT_FOUND', `Cluster ${clusterName} has no node pools`, 404, {
      clusterName,
    }),

  SERVICE_ACCOUNT_TOKEN_FAILED: (message: string) =>
    createError(
      'DRIVER_SERVICE_ACCOUNT_TOKEN_FAILED',
      `Failed to generate service account token: ${message}`,
      500
    ),
};

/**
 * Map an SDK or library error onto the driver catalog.
 * `context` prefixes provider errors, e.g. "error getting cluster info".
 */
export function toDriverError(context: string, error: unknown): DriverError {
  if (error instanceof CredentialsError) {
    return DriverErrors.CREDENTIALS_INVALID(error.message);
  }
  if (error instanceof TimeoutError) {
    return DriverErrors.WAIT_TIMEOUT(
      String(error.details?.operation ?? context),
      Number(error.details?.timeoutMs ?? 0)
    );
  }
  if (error instanceof CancelledError) {
    return DriverErrors.WAIT_CANCELLED(String(error.details?.operation ?? context));
  }
  if (error instanceof GkeSdkError) {
    return DriverErrors.PROVIDER_ERROR(context, error.message, {
      code: error.code,
      statusCode: error.statusCode,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return DriverErrors.PROVIDER_ERROR(context, message);
}
