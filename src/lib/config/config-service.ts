import type { DriverError } from '../errors/driver-errors.js';
import { DriverErrors } from '../errors/driver-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { DRIVER_CONFIG_ENV, driverConfigSchema } from './schemas.js';
import { DEFAULT_DRIVER_CONFIG, type DriverConfig } from './types.js';

type Env = Record<string, string | undefined>;

/**
 * Load driver settings from the environment on top of the defaults.
 * Unset or empty variables keep the default; malformed ones are an error.
 */
export const loadDriverConfig = (env: Env = process.env): Result<DriverConfig, DriverError> => {
  const raw: Record<string, string> = {};
  for (const [key, variable] of Object.entries(DRIVER_CONFIG_ENV)) {
    const value = env[variable];
    if (value) {
      raw[key] = value;
    }
  }

  const parsed = driverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      DriverErrors.CONFIG_INVALID(
        parsed.error.issues.map((issue) => {
          const key = String(issue.path[0]);
          const variable = Object.entries(DRIVER_CONFIG_ENV).find(([name]) => name === key)?.[1];
          return `${variable ?? key}: ${issue.message}`;
        })
      )
    );
  }

  const overrides = Object.fromEntries(
    Object.entries(parsed.data).filter(([, value]) => value !== undefined)
  );

  return ok({ ...DEFAULT_DRIVER_CONFIG, ...overrides });
};
