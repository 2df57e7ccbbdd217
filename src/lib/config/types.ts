export type DriverConfig = {
  /** Delay between status polls while waiting on a cluster or node pool */
  pollIntervalMs: number;
  /** Upper bound on a single wait */
  waitTimeoutMs: number;
  /** Namespace that receives the driver's service account */
  serviceAccountNamespace: string;
  /** Upper bound on waiting for the service account token secret */
  tokenTimeoutMs: number;
};

export const DEFAULT_DRIVER_CONFIG: DriverConfig = {
  pollIntervalMs: 5_000,
  waitTimeoutMs: 60 * 60_000,
  serviceAccountNamespace: 'kube-system',
  tokenTimeoutMs: 60_000,
};
