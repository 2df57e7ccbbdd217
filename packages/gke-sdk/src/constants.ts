/**
 * GKE API constants
 */
export const GKE_API = {
  /** OAuth scope required by the cluster manager API */
  scope: 'https://www.googleapis.com/auth/cloud-platform',

  /** API version used for resource names */
  version: 'v1',
} as const;

/**
 * Resource status values reported by the provider.
 * Only `running` ends a wait; every other value counts as in progress.
 */
export const GKE_STATUS = {
  running: 'RUNNING',
  unspecified: 'STATUS_UNSPECIFIED',
} as const;

/**
 * gRPC status codes surfaced on provider errors
 */
export const GRPC_CODES = {
  notFound: 5,
  alreadyExists: 6,
} as const;

/**
 * Values the provider treats specially on create requests
 */
export const GKE_SENTINELS = {
  /** Disables Stackdriver logging or monitoring */
  none: 'none',

  /** Master auth user; the provider mints the password */
  adminUsername: 'admin',

  /** Resource label carrying the lower-cased display name */
  displayNameLabel: 'display-name',
} as const;

export const WAIT_DEFAULTS = {
  pollIntervalMs: 5_000,
  timeoutMs: 60 * 60_000,
} as const;
