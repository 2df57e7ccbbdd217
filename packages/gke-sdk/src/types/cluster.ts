import type { protos } from '@google-cloud/container';

export type Cluster = protos.google.container.v1.ICluster;
export type NodePool = protos.google.container.v1.INodePool;
export type NodeConfig = protos.google.container.v1.INodeConfig;
export type AddonsConfig = protos.google.container.v1.IAddonsConfig;
export type Operation = protos.google.container.v1.IOperation;

/**
 * Payload for a create-cluster call. The parent location is derived from the
 * identity passed alongside it.
 */
export interface CreateClusterRequest {
  cluster: Cluster;
}

/**
 * Compound identity of a cluster
 */
export interface ClusterIdentity {
  projectId: string;
  /** Zone or region the cluster lives in */
  zone: string;
  clusterName: string;
}

/**
 * Compound identity of a node pool
 */
export interface NodePoolIdentity extends ClusterIdentity {
  nodePoolId: string;
}

/**
 * Cluster lifecycle calls the driver depends on.
 * Implemented by GkeClient; tests substitute in-memory fakes.
 */
export interface GkeClusterApi {
  getCluster(id: ClusterIdentity): Promise<Cluster>;
  createCluster(
    location: Pick<ClusterIdentity, 'projectId' | 'zone'>,
    request: CreateClusterRequest
  ): Promise<Operation>;
  updateMasterVersion(id: ClusterIdentity, version: string): Promise<Operation>;
  updateNodeVersion(id: ClusterIdentity, version: string): Promise<Operation>;
  deleteCluster(id: ClusterIdentity): Promise<Operation>;
  getNodePool(id: NodePoolIdentity): Promise<NodePool>;
  updateNodePoolVersion(id: NodePoolIdentity, version: string, imageType?: string): Promise<Operation>;
  setNodePoolSize(id: NodePoolIdentity, nodeCount: number): Promise<Operation>;
  getAccessToken(): Promise<string>;
  close(): Promise<void>;
}
