export type { AppError } from './base.js';
export { createError, isAppError } from './base.js';
export type { DriverError } from './driver-errors.js';
export { DriverErrors, toDriverError } from './driver-errors.js';
