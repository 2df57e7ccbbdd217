export interface AppError {
  code: string;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

export const createError = (
  code: string,
  message: string,
  status: number,
  details?: Record<string, unknown>
): AppError => ({
  code,
  message,
  status,
  details,
});

export const isAppError = (value: unknown): value is AppError =>
  typeof value === 'object' &&
  value !== null &&
  'code' in value &&
  typeof value.code === 'string' &&
  'message' in value &&
  typeof value.message === 'string' &&
  'status' in value &&
  typeof value.status === 'number';
