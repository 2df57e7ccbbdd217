// Builders
export type { DisabledAddons } from './builders/cluster.js';
export { ClusterBuilder } from './builders/cluster.js';
// Client
export type { GkeClientOptions } from './client.js';
export { clusterName, GkeClient, locationName, nodePoolName } from './client.js';
// Constants
export { GKE_API, GKE_SENTINELS, GKE_STATUS, GRPC_CODES, WAIT_DEFAULTS } from './constants.js';
// Credentials
export type { CredentialSource, ResolvedCredentials } from './credentials.js';
export { resolveCredentials } from './credentials.js';
// Errors
export {
  AlreadyExistsError,
  CancelledError,
  CredentialsError,
  GkeSdkError,
  NotFoundError,
  TimeoutError,
} from './errors.js';
// Operations
export type { ClusterWaitOptions, WaitOptions } from './operations/wait.js';
export { awaitStatus, statusOf, waitForCluster, waitForNodePool } from './operations/wait.js';
// Schemas
export type { ServiceAccountKey } from './schemas/credentials.js';
export { serviceAccountKeySchema } from './schemas/credentials.js';
// Types
export type {
  AddonsConfig,
  Cluster,
  ClusterIdentity,
  CreateClusterRequest,
  GkeClusterApi,
  NodeConfig,
  NodePool,
  NodePoolIdentity,
  Operation,
} from './types/cluster.js';
