import { z } from 'zod';
import type { DriverError } from '../errors/driver-errors.js';
import { DriverErrors } from '../errors/driver-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import {
  getBool,
  getBoolPointer,
  getInt,
  getString,
  getStringSlice,
} from './options.js';
import { toggleFrom } from './toggle.js';
import type { ClusterInfo, DriverOptions } from './types.js';
import { METADATA_KEYS } from './types.js';

const toggleSchema = z.enum(['inherit', 'enabled', 'disabled']);

export const nodeConfigSchema = z.object({
  machineType: z.string(),
  diskSizeGb: z.number().int(),
  diskType: z.string(),
  imageType: z.string(),
  labels: z.record(z.string(), z.string()),
});

export const clusterStateSchema = z.object({
  name: z.string(),
  displayName: z.string(),
  projectId: z.string(),
  zone: z.string(),
  clusterIpv4Cidr: z.string(),
  servicesIpv4Cidr: z.string(),
  description: z.string(),
  nodeCount: z.number().int(),
  masterVersion: z.string(),
  nodeVersion: z.string(),
  nodeConfig: nodeConfigSchema,
  credentialPath: z.string(),
  credentialContent: z.string(),
  enableAlphaFeature: z.boolean(),
  enableHttpLoadBalancing: toggleSchema,
  enableHorizontalPodAutoscaling: toggleSchema,
  enableNetworkPolicyConfig: toggleSchema,
  enableKubernetesDashboard: z.boolean(),
  legacyAbac: z.boolean(),
  enableStackdriverLogging: toggleSchema,
  enableStackdriverMonitoring: toggleSchema,
  locations: z.array(z.string()),
  network: z.string(),
  subNetwork: z.string(),
  nodePoolId: z.string(),
  maintenanceWindow: z.string(),
});

export type NodeConfigState = z.infer<typeof nodeConfigSchema>;
export type ClusterState = z.infer<typeof clusterStateSchema>;

/** Metadata entries written by storeState */
export type StateMetadata = Record<
  typeof METADATA_KEYS.state | typeof METADATA_KEYS.projectId | typeof METADATA_KEYS.zone,
  string
>;

export function emptyState(): ClusterState {
  return {
    name: '',
    displayName: '',
    projectId: '',
    zone: '',
    clusterIpv4Cidr: '',
    servicesIpv4Cidr: '',
    description: '',
    nodeCount: 0,
    masterVersion: '',
    nodeVersion: '',
    nodeConfig: { machineType: '', diskSizeGb: 0, diskType: '', imageType: '', labels: {} },
    credentialPath: '',
    credentialContent: '',
    enableAlphaFeature: false,
    enableHttpLoadBalancing: 'inherit',
    enableHorizontalPodAutoscaling: 'inherit',
    enableNetworkPolicyConfig: 'inherit',
    enableKubernetesDashboard: false,
    legacyAbac: false,
    enableStackdriverLogging: 'inherit',
    enableStackdriverMonitoring: 'inherit',
    locations: [],
    network: '',
    subNetwork: '',
    nodePoolId: '',
    maintenanceWindow: '',
  };
}

/**
 * Parse `key=value` entries. Anything that does not split into exactly two
 * parts is dropped.
 */
export function parseLabels(entries: string[]): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const entry of entries) {
    const parts = entry.split('=');
    const [key, value] = parts;
    if (parts.length === 2 && key !== undefined && value !== undefined) {
      labels[key] = value;
    }
  }
  return labels;
}

/**
 * Read every recognized option into a record without validating it.
 */
export function readState(options: DriverOptions): ClusterState {
  return {
    name: getString(options, 'name'),
    displayName: getString(options, 'displayName'),
    projectId: getString(options, 'projectId'),
    zone: getString(options, 'zone'),
    clusterIpv4Cidr: getString(options, 'clusterIpv4Cidr'),
    servicesIpv4Cidr: getString(options, 'servicesIpv4Cidr'),
    description: getString(options, 'description'),
    nodeCount: getInt(options, 'nodeCount'),
    masterVersion: getString(options, 'masterVersion'),
    nodeVersion: getString(options, 'nodeVersion'),
    nodeConfig: {
      machineType: getString(options, 'machineType'),
      diskSizeGb: getInt(options, 'diskSizeGb'),
      diskType: getString(options, 'diskType'),
      imageType: getString(options, 'imageType'),
      labels: parseLabels(getStringSlice(options, 'labels')),
    },
    credentialPath: getString(options, 'credentialPath'),
    credentialContent: getString(options, 'credentialContent'),
    enableAlphaFeature: getBool(options, 'enableAlphaFeature'),
    enableHttpLoadBalancing: toggleFrom(getBoolPointer(options, 'enableHttpLoadBalancing')),
    enableHorizontalPodAutoscaling: toggleFrom(
      getBoolPointer(options, 'enableHorizontalPodAutoscaling')
    ),
    enableNetworkPolicyConfig: toggleFrom(getBoolPointer(options, 'enableNetworkPolicyConfig')),
    enableKubernetesDashboard: getBool(options, 'enableKubernetesDashboard'),
    legacyAbac: getBool(options, 'legacyAbac'),
    enableStackdriverLogging: toggleFrom(getBoolPointer(options, 'enableStackdriverLogging')),
    enableStackdriverMonitoring: toggleFrom(getBoolPointer(options, 'enableStackdriverMonitoring')),
    locations: getStringSlice(options, 'locations'),
    network: getString(options, 'network'),
    subNetwork: getString(options, 'subNetwork'),
    nodePoolId: getString(options, 'nodePoolId'),
    maintenanceWindow: getString(options, 'maintenanceWindow'),
  };
}

export function validateState(state: ClusterState): Result<ClusterState, DriverError> {
  if (!state.projectId) {
    return err(DriverErrors.VALIDATION_FAILED('projectId', 'project ID is required'));
  }
  if (!state.zone) {
    return err(DriverErrors.VALIDATION_FAILED('zone', 'zone is required'));
  }
  if (!state.name) {
    return err(DriverErrors.VALIDATION_FAILED('name', 'cluster name is required'));
  }
  return ok(state);
}

/**
 * Build a validated record from caller options.
 */
export function decodeState(options: DriverOptions): Result<ClusterState, DriverError> {
  return validateState(readState(options));
}

export function serializeState(state: ClusterState): Result<StateMetadata, DriverError> {
  try {
    return ok({
      [METADATA_KEYS.state]: JSON.stringify(state),
      [METADATA_KEYS.projectId]: state.projectId,
      [METADATA_KEYS.zone]: state.zone,
    });
  } catch (error) {
    return err(DriverErrors.STATE_ENCODE_FAILED(String(error)));
  }
}

/**
 * Return a copy of `info` with the serialized state merged into its metadata.
 */
export function storeState(info: ClusterInfo, state: ClusterState): Result<ClusterInfo, DriverError> {
  const serialized = serializeState(state);
  if (!serialized.ok) {
    return serialized;
  }
  return ok({ ...info, metadata: { ...info.metadata, ...serialized.value } });
}

export function parseState(serialized: string): Result<ClusterState, DriverError> {
  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(DriverErrors.STATE_RESTORE_FAILED(message));
  }

  const parsed = clusterStateSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return err(DriverErrors.STATE_RESTORE_FAILED(`invalid fields: ${fields}`));
  }
  return ok(parsed.data);
}

export interface RestoreOptions {
  /** Treat missing or corrupt state as an empty record instead of failing */
  allowEmpty?: boolean;
}

export function restoreState(
  info: ClusterInfo,
  options: RestoreOptions = {}
): Result<ClusterState, DriverError> {
  const serialized = info.metadata?.[METADATA_KEYS.state];
  if (!serialized) {
    return options.allowEmpty
      ? ok(emptyState())
      : err(DriverErrors.STATE_RESTORE_FAILED('no state stored in cluster metadata'));
  }

  const restored = parseState(serialized);
  if (!restored.ok && options.allowEmpty) {
    return ok(emptyState());
  }
  return restored;
}
