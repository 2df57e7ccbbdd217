/**
 * Tri-state feature toggle. `inherit` keeps the provider default and is not
 * the same as `disabled`.
 */
export type Toggle = 'inherit' | 'enabled' | 'disabled';

export type OptionType = 'string' | 'int' | 'bool' | 'boolPointer' | 'stringSlice';

/**
 * Option bag supplied by the control plane, one map per value type.
 * Keys are hyphenated flag names or their camel-case aliases.
 */
export interface DriverOptions {
  stringOptions?: Record<string, string>;
  intOptions?: Record<string, number>;
  boolOptions?: Record<string, boolean>;
  boolPointerOptions?: Record<string, boolean | null>;
  stringSliceOptions?: Record<string, string[]>;
}

export interface DriverFlag {
  type: OptionType;
  usage: string;
  default?: string | number | boolean;
}

/** Flag definitions keyed by flag name */
export type DriverFlags = Record<string, DriverFlag>;

/**
 * The control plane's handle to a cluster. `metadata` carries the driver's
 * own keys; the rest is displayed to users.
 */
export interface ClusterInfo {
  version?: string;
  serviceAccountToken?: string;
  endpoint?: string;
  username?: string;
  password?: string;
  rootCaCertificate?: string;
  clientCertificate?: string;
  clientKey?: string;
  nodeCount?: number;
  status?: string;
  metadata: Record<string, string>;
}

export interface NodeCount {
  count: number;
}

export interface KubernetesVersion {
  version: string;
}

export type Capability = 'getVersion' | 'setVersion' | 'getClusterSize' | 'setClusterSize';

/** Metadata keys the driver owns inside ClusterInfo.metadata */
export const METADATA_KEYS = {
  state: 'state',
  projectId: 'project-id',
  zone: 'zone',
  nodePool: 'nodePool',
} as const;
