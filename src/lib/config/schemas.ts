import { z } from 'zod';

const durationMs = z.coerce.number().int().positive();

export const driverConfigSchema = z.object({
  pollIntervalMs: durationMs.optional(),
  waitTimeoutMs: durationMs.optional(),
  serviceAccountNamespace: z.string().min(1).optional(),
  tokenTimeoutMs: durationMs.optional(),
});

/** Environment variable backing each config key */
export const DRIVER_CONFIG_ENV = {
  pollIntervalMs: 'GKE_DRIVER_POLL_INTERVAL_MS',
  waitTimeoutMs: 'GKE_DRIVER_WAIT_TIMEOUT_MS',
  serviceAccountNamespace: 'GKE_DRIVER_SERVICE_ACCOUNT_NAMESPACE',
  tokenTimeoutMs: 'GKE_DRIVER_TOKEN_TIMEOUT_MS',
} as const;
