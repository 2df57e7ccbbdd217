import type {
  Cluster,
  ClusterIdentity,
  ClusterWaitOptions,
  CredentialSource,
  GkeClusterApi,
  NodePool,
  NodePoolIdentity,
} from 'gke-cluster-sdk';
import { AlreadyExistsError, GkeClient, NotFoundError, waitForCluster, waitForNodePool } from 'gke-cluster-sdk';
import { loadDriverConfig } from '../lib/config/config-service.js';
import type { DriverConfig } from '../lib/config/types.js';
import { DEFAULT_DRIVER_CONFIG } from '../lib/config/types.js';
import { DRIVER_CAPABILITIES } from '../lib/driver/capabilities.js';
import { buildCreateClusterRequest } from '../lib/driver/cluster-request.js';
import { getCreateOptions, getUpdateOptions } from '../lib/driver/options.js';
import type { ServiceAccountTokenOptions } from '../lib/driver/service-account.js';
import { mintServiceAccountToken } from '../lib/driver/service-account.js';
import type { ClusterState } from '../lib/driver/state.js';
import { decodeState, readState, restoreState, storeState } from '../lib/driver/state.js';
import type {
  Capability,
  ClusterInfo,
  DriverFlags,
  DriverOptions,
  KubernetesVersion,
  NodeCount,
} from '../lib/driver/types.js';
import { METADATA_KEYS } from '../lib/driver/types.js';
import type { DriverError } from '../lib/errors/driver-errors.js';
import { DriverErrors, toDriverError } from '../lib/errors/driver-errors.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok, tryAsync } from '../lib/utils/result.js';

const log = createLogger('GkeDriverService');

export type GkeClientFactory = (source: CredentialSource) => GkeClusterApi;

export type ServiceAccountTokenMintFn = (
  cluster: Cluster,
  accessToken: string,
  options: ServiceAccountTokenOptions
) => Promise<string>;

export type GkeDriverServiceOptions = {
  config?: Partial<DriverConfig>;
  /** Builds a provider client for one operation (default: GkeClient) */
  clientFactory?: GkeClientFactory;
  mintToken?: ServiceAccountTokenMintFn;
};

export type OperationContext = {
  /** Cancels any wait in progress */
  signal?: AbortSignal;
};

type DriverResult<T> = Promise<Result<T, DriverError>>;

const defaultClientFactory: GkeClientFactory = (credentials) => new GkeClient({ credentials });

export function clusterIdentity(state: ClusterState): ClusterIdentity {
  return { projectId: state.projectId, zone: state.zone, clusterName: state.name };
}

/**
 * Drives cluster lifecycle operations against GKE on behalf of the control
 * plane. Every operation builds its own provider client and closes it when done.
 */
export class GkeDriverService {
  private readonly config: DriverConfig;
  private readonly clientFactory: GkeClientFactory;
  private readonly mintToken: ServiceAccountTokenMintFn;

  constructor(options: GkeDriverServiceOptions = {}) {
    this.config = { ...DEFAULT_DRIVER_CONFIG, ...options.config };
    this.clientFactory = options.clientFactory ?? defaultClientFactory;
    this.mintToken = options.mintToken ?? mintServiceAccountToken;
  }

  getCreateOptions(): DriverFlags {
    return getCreateOptions();
  }

  getUpdateOptions(): DriverFlags {
    return getUpdateOptions();
  }

  getCapabilities(): Capability[] {
    return [...DRIVER_CAPABILITIES];
  }

  async create(options: DriverOptions, ctx: OperationContext = {}): DriverResult<ClusterInfo> {
    const decoded = decodeState(options);
    if (!decoded.ok) {
      return decoded;
    }
    const state = decoded.value;

    return this.withClient(state, async (client) => {
      const id = clusterIdentity(state);

      try {
        const operation = await client.createCluster(id, buildCreateClusterRequest(state));
        log.debug('Cluster create requested', {
          cluster: state.name,
          data: { projectId: state.projectId, zone: state.zone, operation: operation.name },
        });
      } catch (error) {
        if (!(error instanceof AlreadyExistsError)) {
          return err(toDriverError('error creating cluster', error));
        }
        log.info('Cluster already exists, waiting for it', { cluster: state.name });
      }

      const waited = await this.waitCluster(client, state, ctx);
      if (!waited.ok) {
        return waited;
      }

      return storeState({ metadata: {} }, state);
    });
  }

  async update(
    info: ClusterInfo,
    options: DriverOptions,
    ctx: OperationContext = {}
  ): DriverResult<ClusterInfo> {
    const previous = restoreState(info);
    if (!previous.ok) {
      return previous;
    }
    const incoming = readState(options);

    return this.withClient(previous.value, async (client) => {
      const state: ClusterState = { ...previous.value };
      const id = clusterIdentity(state);

      if (!state.nodePoolId) {
        const poolName = await this.firstNodePool(client, state);
        if (!poolName.ok) {
          return poolName;
        }
        state.nodePoolId = poolName.value;
      }
      const handle: ClusterInfo = {
        ...info,
        metadata: { ...info.metadata, [METADATA_KEYS.nodePool]: state.nodePoolId },
      };
      const poolId: NodePoolIdentity = { ...id, nodePoolId: state.nodePoolId };

      log.debug('Updating config', {
        cluster: state.name,
        data: {
          masterVersion: incoming.masterVersion,
          nodeVersion: incoming.nodeVersion,
          nodeCount: incoming.nodeCount,
        },
      });

      if (incoming.masterVersion) {
        log.info(`Updating master to ${incoming.masterVersion}`, { cluster: state.name });
        const updated = await this.callProvider('error updating master version', () =>
          client.updateMasterVersion(id, incoming.masterVersion)
        );
        if (!updated.ok) return updated;

        const waited = await this.waitCluster(client, state, ctx);
        if (!waited.ok) return waited;
        state.masterVersion = incoming.masterVersion;
      }

      if (incoming.nodeVersion) {
        log.info(`Updating node version to ${incoming.nodeVersion}`, { cluster: state.name });
        const updated = await this.callProvider('error updating node version', () =>
          client.updateNodePoolVersion(
            poolId,
            incoming.nodeVersion,
            state.nodeConfig.imageType || undefined
          )
        );
        if (!updated.ok) return updated;

        const waited = await this.waitNodePool(client, poolId, ctx);
        if (!waited.ok) return waited;
        state.nodeVersion = incoming.nodeVersion;
      }

      if (incoming.nodeCount !== 0) {
        log.info(`Updating node number to ${incoming.nodeCount}`, { cluster: state.name });
        const resized = await this.callProvider('error setting node pool size', () =>
          client.setNodePoolSize(poolId, incoming.nodeCount)
        );
        if (!resized.ok) return resized;

        const waited = await this.waitCluster(client, state, ctx);
        if (!waited.ok) return waited;
        state.nodeCount = incoming.nodeCount;
      }

      return storeState(handle, state);
    });
  }

  async postCheck(info: ClusterInfo, ctx: OperationContext = {}): DriverResult<ClusterInfo> {
    const restored = restoreState(info);
    if (!restored.ok) {
      return restored;
    }
    const state = restored.value;

    return this.withClient(state, async (client) => {
      const waited = await this.waitCluster(client, state, ctx);
      if (!waited.ok) {
        return waited;
      }

      const fetched = await this.callProvider('error getting cluster info', () =>
        client.getCluster(clusterIdentity(state))
      );
      if (!fetched.ok) {
        return fetched;
      }
      const cluster = fetched.value;

      const token = await tryAsync(
        async () => this.mintToken(cluster, await client.getAccessToken(), this.tokenOptions()),
        (error) =>
          DriverErrors.SERVICE_ACCOUNT_TOKEN_FAILED(
            error instanceof Error ? error.message : String(error)
          )
      );
      if (!token.ok) {
        return token;
      }

      const metadata = { ...info.metadata };
      const nodePool = cluster.nodePools?.[0]?.name;
      if (nodePool) {
        metadata[METADATA_KEYS.nodePool] = nodePool;
      }

      return ok({
        ...info,
        endpoint: cluster.endpoint ?? undefined,
        version: cluster.currentMasterVersion ?? undefined,
        username: cluster.masterAuth?.username ?? undefined,
        password: cluster.masterAuth?.password ?? undefined,
        rootCaCertificate: cluster.masterAuth?.clusterCaCertificate ?? undefined,
        clientCertificate: cluster.masterAuth?.clientCertificate ?? undefined,
        clientKey: cluster.masterAuth?.clientKey ?? undefined,
        nodeCount: cluster.currentNodeCount ?? 0,
        status: typeof cluster.status === 'string' ? cluster.status : undefined,
        serviceAccountToken: token.value,
        metadata,
      });
    });
  }

  async remove(info: ClusterInfo): DriverResult<void> {
    const restored = restoreState(info);
    if (!restored.ok) {
      return restored;
    }
    const state = restored.value;

    return this.withClient(state, async (client) => {
      log.debug('Removing cluster', {
        cluster: state.name,
        data: { projectId: state.projectId, zone: state.zone },
      });

      try {
        const operation = await client.deleteCluster(clusterIdentity(state));
        log.debug('Cluster delete requested', {
          cluster: state.name,
          data: { operation: operation.name },
        });
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          return err(toDriverError('error removing cluster', error));
        }
        log.debug(`Cluster ${state.name} doesn't exist`, { cluster: state.name });
      }

      return ok(undefined);
    });
  }

  async getClusterSize(info: ClusterInfo): DriverResult<NodeCount> {
    return this.withCluster(info, async (_client, state, cluster) => {
      const pool = cluster.nodePools?.[0];
      if (!pool) {
        return err(DriverErrors.NODE_POOL_NOT_FOUND(state.name));
      }
      return ok({ count: pool.initialNodeCount ?? 0 });
    });
  }

  async setClusterSize(
    info: ClusterInfo,
    count: NodeCount,
    ctx: OperationContext = {}
  ): DriverResult<void> {
    return this.withCluster(info, async (client, state, cluster) => {
      const poolName = cluster.nodePools?.[0]?.name;
      if (!poolName) {
        return err(DriverErrors.NODE_POOL_NOT_FOUND(state.name));
      }

      log.info('Updating cluster size', { cluster: state.name, data: { count: count.count } });
      const resized = await this.callProvider('error setting node pool size', () =>
        client.setNodePoolSize({ ...clusterIdentity(state), nodePoolId: poolName }, count.count)
      );
      if (!resized.ok) {
        return resized;
      }

      const waited = await this.waitCluster(client, state, ctx);
      if (!waited.ok) {
        return waited;
      }

      log.info('Cluster size updated successfully', { cluster: state.name });
      return ok(undefined);
    });
  }

  async getVersion(info: ClusterInfo): DriverResult<KubernetesVersion> {
    return this.withCluster(info, async (_client, _state, cluster) =>
      ok({ version: cluster.currentMasterVersion ?? '' })
    );
  }

  async setVersion(
    info: ClusterInfo,
    version: KubernetesVersion,
    ctx: OperationContext = {}
  ): DriverResult<void> {
    return this.withCluster(info, async (client, state) => {
      const id = clusterIdentity(state);

      log.info('Updating master version', {
        cluster: state.name,
        data: { version: version.version },
      });
      const master = await this.callProvider('error while updating cluster', () =>
        client.updateMasterVersion(id, version.version)
      );
      if (!master.ok) return master;
      const masterSettled = await this.waitCluster(client, state, ctx);
      if (!masterSettled.ok) return masterSettled;
      log.info('Master version updated successfully', { cluster: state.name });

      log.info('Updating node version', {
        cluster: state.name,
        data: { version: version.version },
      });
      const nodes = await this.callProvider('error while updating cluster', () =>
        client.updateNodeVersion(id, version.version)
      );
      if (!nodes.ok) return nodes;
      const nodesSettled = await this.waitCluster(client, state, ctx);
      if (!nodesSettled.ok) return nodesSettled;
      log.info('Node version updated successfully', { cluster: state.name });

      return ok(undefined);
    });
  }

  /**
   * Build a client from the record's credentials, run `fn`, then close the client.
   */
  private async withClient<T>(
    state: ClusterState,
    fn: (client: GkeClusterApi) => DriverResult<T>
  ): DriverResult<T> {
    let client: GkeClusterApi;
    try {
      client = this.clientFactory({
        credentialPath: state.credentialPath || undefined,
        credentialContent: state.credentialContent || undefined,
      });
    } catch (error) {
      return err(toDriverError('error creating provider client', error));
    }

    try {
      return await fn(client);
    } finally {
      await client.close().catch((error: unknown) => {
        log.warn('Failed to close provider client', { cluster: state.name, error });
      });
    }
  }

  /**
   * Restore state, build a client and read the live cluster before running `fn`.
   */
  private async withCluster<T>(
    info: ClusterInfo,
    fn: (client: GkeClusterApi, state: ClusterState, cluster: Cluster) => DriverResult<T>
  ): DriverResult<T> {
    const restored = restoreState(info);
    if (!restored.ok) {
      return restored;
    }
    const state = restored.value;

    return this.withClient(state, async (client) => {
      const cluster = await this.callProvider('error getting cluster info', () =>
        client.getCluster(clusterIdentity(state))
      );
      if (!cluster.ok) {
        return cluster;
      }
      return fn(client, state, cluster.value);
    });
  }

  private async firstNodePool(
    client: GkeClusterApi,
    state: ClusterState
  ): DriverResult<string> {
    const cluster = await this.callProvider('error getting cluster info', () =>
      client.getCluster(clusterIdentity(state))
    );
    if (!cluster.ok) {
      return cluster;
    }
    const name = cluster.value.nodePools?.[0]?.name;
    return name ? ok(name) : err(DriverErrors.NODE_POOL_NOT_FOUND(state.name));
  }

  private callProvider<T>(context: string, fn: () => Promise<T>): DriverResult<T> {
    return tryAsync(fn, (error) => toDriverError(context, error));
  }

  private waitOptions(
    ctx: OperationContext,
    describe: (status: string) => string,
    cluster: string
  ): ClusterWaitOptions {
    return {
      pollIntervalMs: this.config.pollIntervalMs,
      timeoutMs: this.config.waitTimeoutMs,
      signal: ctx.signal,
      onProgress: (status) => log.info(describe(status), { cluster }),
    };
  }

  private async waitCluster(
    client: GkeClusterApi,
    state: ClusterState,
    ctx: OperationContext
  ): DriverResult<Cluster> {
    const waited = await tryAsync(
      () =>
        waitForCluster(
          client,
          clusterIdentity(state),
          this.waitOptions(ctx, (status) => `${status.toLowerCase()} cluster ${state.name}......`, state.name)
        ),
      (error) => toDriverError('error waiting for cluster', error)
    );
    if (waited.ok) {
      log.info(`Cluster ${state.name} is running`, { cluster: state.name });
    }
    return waited;
  }

  private async waitNodePool(
    client: GkeClusterApi,
    id: NodePoolIdentity,
    ctx: OperationContext
  ): DriverResult<NodePool> {
    const waited = await tryAsync(
      () =>
        waitForNodePool(
          client,
          id,
          this.waitOptions(
            ctx,
            (status) => `${status.toLowerCase()} nodepool ${id.nodePoolId}......`,
            id.clusterName
          )
        ),
      (error) => toDriverError('error waiting for node pool', error)
    );
    if (waited.ok) {
      log.info(`Nodepool ${id.nodePoolId} is running`, { cluster: id.clusterName });
    }
    return waited;
  }

  private tokenOptions(): ServiceAccountTokenOptions {
    return {
      namespace: this.config.serviceAccountNamespace,
      timeoutMs: this.config.tokenTimeoutMs,
    };
  }
}

/**
 * Build a service whose settings come from `GKE_DRIVER_*` environment variables,
 * with explicit `options.config` values taking precedence.
 */
export function createGkeDriverService(
  options: GkeDriverServiceOptions = {},
  env: Record<string, string | undefined> = process.env
): Result<GkeDriverService, DriverError> {
  const loaded = loadDriverConfig(env);
  if (!loaded.ok) {
    return loaded;
  }
  return ok(new GkeDriverService({ ...options, config: { ...loaded.value, ...options.config } }));
}
