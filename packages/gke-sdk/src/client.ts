import { ClusterManagerClient } from '@google-cloud/container';
import { GRPC_CODES } from './constants.js';
import type { CredentialSource } from './credentials.js';
import { resolveCredentials } from './credentials.js';
import { AlreadyExistsError, GkeSdkError, NotFoundError } from './errors.js';
import type {
  Cluster,
  ClusterIdentity,
  CreateClusterRequest,
  GkeClusterApi,
  NodePool,
  NodePoolIdentity,
  Operation,
} from './types/cluster.js';

export interface GkeClientOptions {
  /** Credential source (host default credentials if omitted) */
  credentials?: CredentialSource;
  /** Pre-built cluster manager client */
  api?: ClusterManagerClient;
}

export function locationName(id: Pick<ClusterIdentity, 'projectId' | 'zone'>): string {
  return `projects/${id.projectId}/locations/${id.zone}`;
}

export function clusterName(id: ClusterIdentity): string {
  return `${locationName(id)}/clusters/${id.clusterName}`;
}

export function nodePoolName(id: NodePoolIdentity): string {
  return `${clusterName(id)}/nodePools/${id.nodePoolId}`;
}

/**
 * Typed wrapper over the GKE cluster manager with provider errors mapped
 * onto SDK error classes.
 */
export class GkeClient implements GkeClusterApi {
  readonly api: ClusterManagerClient;

  constructor(options?: GkeClientOptions) {
    this.api =
      options?.api ?? new ClusterManagerClient(resolveCredentials(options?.credentials ?? {}));
  }

  async getCluster(id: ClusterIdentity): Promise<Cluster> {
    try {
      const [cluster] = await this.api.getCluster({ name: clusterName(id) });
      return cluster;
    } catch (error) {
      throw this.mapError('getCluster', 'cluster', id.clusterName, error);
    }
  }

  async createCluster(
    location: Pick<ClusterIdentity, 'projectId' | 'zone'>,
    request: CreateClusterRequest
  ): Promise<Operation> {
    try {
      const [operation] = await this.api.createCluster({
        parent: locationName(location),
        cluster: request.cluster,
      });
      return operation;
    } catch (error) {
      throw this.mapError('createCluster', 'cluster', request.cluster.name ?? 'unknown', error);
    }
  }

  async updateMasterVersion(id: ClusterIdentity, version: string): Promise<Operation> {
    try {
      const [operation] = await this.api.updateCluster({
        name: clusterName(id),
        update: { desiredMasterVersion: version },
      });
      return operation;
    } catch (error) {
      throw this.mapError('updateCluster', 'cluster', id.clusterName, error);
    }
  }

  async updateNodeVersion(id: ClusterIdentity, version: string): Promise<Operation> {
    try {
      const [operation] = await this.api.updateCluster({
        name: clusterName(id),
        update: { desiredNodeVersion: version },
      });
      return operation;
    } catch (error) {
      throw this.mapError('updateCluster', 'cluster', id.clusterName, error);
    }
  }

  async deleteCluster(id: ClusterIdentity): Promise<Operation> {
    try {
      const [operation] = await this.api.deleteCluster({ name: clusterName(id) });
      return operation;
    } catch (error) {
      throw this.mapError('deleteCluster', 'cluster', id.clusterName, error);
    }
  }

  async getNodePool(id: NodePoolIdentity): Promise<NodePool> {
    try {
      const [nodePool] = await this.api.getNodePool({ name: nodePoolName(id) });
      return nodePool;
    } catch (error) {
      throw this.mapError('getNodePool', 'node pool', id.nodePoolId, error);
    }
  }

  async updateNodePoolVersion(
    id: NodePoolIdentity,
    version: string,
    imageType?: string
  ): Promise<Operation> {
    try {
      const [operation] = await this.api.updateNodePool({
        name: nodePoolName(id),
        nodeVersion: version,
        imageType,
      });
      return operation;
    } catch (error) {
      throw this.mapError('updateNodePool', 'node pool', id.nodePoolId, error);
    }
  }

  async setNodePoolSize(id: NodePoolIdentity, nodeCount: number): Promise<Operation> {
    try {
      const [operation] = await this.api.setNodePoolSize({
        name: nodePoolName(id),
        nodeCount,
      });
      return operation;
    } catch (error) {
      throw this.mapError('setNodePoolSize', 'node pool', id.nodePoolId, error);
    }
  }

  /** Bearer token for talking to the cluster's own API server */
  async getAccessToken(): Promise<string> {
    try {
      const token = await this.api.auth.getAccessToken();
      if (!token) {
        throw new GkeSdkError('No access token returned for credentials', 'AUTH_FAILED', 401);
      }
      return token;
    } catch (error) {
      throw this.wrapError('getAccessToken', error);
    }
  }

  async close(): Promise<void> {
    await this.api.close();
  }

  private mapError(operation: string, kind: string, name: string, error: unknown): GkeSdkError {
    if (this.isGrpcError(error)) {
      if (error.code === GRPC_CODES.notFound) {
        return new NotFoundError(kind, name);
      }
      if (error.code === GRPC_CODES.alreadyExists) {
        return new AlreadyExistsError(kind, name);
      }
    }
    return this.wrapError(operation, error);
  }

  private isGrpcError(error: unknown): error is { code: number } {
    return (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      typeof error.code === 'number'
    );
  }

  private wrapError(operation: string, error: unknown): GkeSdkError {
    if (error instanceof GkeSdkError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new GkeSdkError(`GKE ${operation} failed: ${message}`, 'GKE_API_ERROR', undefined, {
      grpcCode: this.isGrpcError(error) ? error.code : undefined,
    });
  }
}
