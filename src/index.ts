export type { DriverConfig } from './lib/config/types.js';
export { DEFAULT_DRIVER_CONFIG } from './lib/config/types.js';
export { loadDriverConfig } from './lib/config/config-service.js';
export { DRIVER_CAPABILITIES, hasCapability } from './lib/driver/capabilities.js';
export { buildCreateClusterRequest } from './lib/driver/cluster-request.js';
export { getCreateOptions, getUpdateOptions, OPTION_FIELDS } from './lib/driver/options.js';
export type { ServiceAccountTokenOptions } from './lib/driver/service-account.js';
export {
  kubeConfigForCluster,
  mintServiceAccountToken,
  ServiceAccountTokenMinter,
} from './lib/driver/service-account.js';
export type { ClusterState, RestoreOptions } from './lib/driver/state.js';
export { decodeState, parseState, restoreState, storeState } from './lib/driver/state.js';
export type {
  Capability,
  ClusterInfo,
  DriverFlag,
  DriverFlags,
  DriverOptions,
  KubernetesVersion,
  NodeCount,
  Toggle,
} from './lib/driver/types.js';
export { METADATA_KEYS } from './lib/driver/types.js';
export type { AppError, DriverError } from './lib/errors/index.js';
export { DriverErrors, isAppError, toDriverError } from './lib/errors/index.js';
export type { Logger } from './lib/logging/logger.js';
export { createLogger } from './lib/logging/logger.js';
export type { Result } from './lib/utils/result.js';
export { err, isErr, isOk, ok } from './lib/utils/result.js';
export type {
  GkeClientFactory,
  GkeDriverServiceOptions,
  OperationContext,
  ServiceAccountTokenMintFn,
} from './services/gke-driver.service.js';
export { createGkeDriverService, GkeDriverService } from './services/gke-driver.service.js';
