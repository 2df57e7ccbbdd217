import type { DriverFlags, DriverOptions, OptionType } from './types.js';

interface OptionField {
  /** Flag name first, then accepted aliases; the first non-empty value wins */
  aliases: readonly [string, ...string[]];
  type: OptionType;
  usage: string;
  default?: string | number | boolean;
  /** Also offered when updating an existing cluster */
  update?: boolean;
}

export const OPTION_FIELDS = {
  name: {
    aliases: ['name'],
    type: 'string',
    usage: 'the internal name of the cluster in the control plane',
  },
  displayName: {
    aliases: ['display-name', 'displayName'],
    type: 'string',
    usage: 'the name of the cluster that should be displayed to the user',
  },
  projectId: {
    aliases: ['project-id', 'projectId'],
    type: 'string',
    usage: 'the ID of your project to use when creating a cluster',
  },
  zone: {
    aliases: ['zone'],
    type: 'string',
    usage: 'the zone to launch the cluster',
    default: 'us-central1-a',
  },
  nodePoolId: {
    aliases: ['node-pool', 'nodePool'],
    type: 'string',
    usage: 'the ID of the default node pool, filled in after creation',
  },
  clusterIpv4Cidr: {
    aliases: ['cluster-ipv4-cidr', 'clusterIpv4Cidr'],
    type: 'string',
    usage: 'the IP address range of the container pods',
  },
  servicesIpv4Cidr: {
    aliases: ['services-ipv4-cidr', 'servicesIpv4Cidr'],
    type: 'string',
    usage: 'the IP address range of the services; switches the cluster to IP aliases',
  },
  description: {
    aliases: ['description'],
    type: 'string',
    usage: 'an optional description of this cluster',
  },
  masterVersion: {
    aliases: ['master-version', 'masterVersion'],
    type: 'string',
    usage: 'the kubernetes master version',
    update: true,
  },
  nodeVersion: {
    aliases: ['node-version', 'nodeVersion'],
    type: 'string',
    usage: 'the kubernetes node version',
    update: true,
  },
  nodeCount: {
    aliases: ['node-count', 'nodeCount'],
    type: 'int',
    usage: 'the number of nodes to create in this cluster; 0 on update means no change',
    default: 3,
    update: true,
  },
  diskSizeGb: {
    aliases: ['disk-size-gb', 'diskSizeGb'],
    type: 'int',
    usage: 'size of the disk attached to each node',
    default: 100,
  },
  diskType: {
    aliases: ['disk-type', 'diskType'],
    type: 'string',
    usage: 'type of the disk attached to each node',
  },
  machineType: {
    aliases: ['machine-type', 'machineType'],
    type: 'string',
    usage: 'the machine type of the nodes',
  },
  imageType: {
    aliases: ['image-type', 'imageType'],
    type: 'string',
    usage: 'the image to use for the worker nodes',
  },
  labels: {
    aliases: ['labels'],
    type: 'stringSlice',
    usage: 'node labels as key=value pairs',
  },
  credentialPath: {
    aliases: ['gke-credential-path', 'credentialPath'],
    type: 'string',
    usage: 'the path to the service account key file',
  },
  credentialContent: {
    aliases: ['credential'],
    type: 'string',
    usage: 'the content of the service account key file',
  },
  enableAlphaFeature: {
    aliases: ['enable-alpha-feature', 'enableAlphaFeature'],
    type: 'bool',
    usage: 'enable kubernetes alpha features',
  },
  enableHttpLoadBalancing: {
    aliases: ['enable-http-load-balancing', 'enableHttpLoadBalancing'],
    type: 'boolPointer',
    usage: 'enable the HTTP (L7) load balancing controller addon',
  },
  enableHorizontalPodAutoscaling: {
    aliases: ['enable-horizontal-pod-autoscaling', 'enableHorizontalPodAutoscaling'],
    type: 'boolPointer',
    usage: 'enable horizontal pod autoscaling',
  },
  enableNetworkPolicyConfig: {
    aliases: ['enable-network-policy-config', 'enableNetworkPolicyConfig'],
    type: 'boolPointer',
    usage: 'enable the network policy addon',
  },
  enableKubernetesDashboard: {
    aliases: ['kubernetes-dashboard', 'enableKubernetesDashboard'],
    type: 'bool',
    usage: 'enable the kubernetes dashboard addon',
  },
  legacyAbac: {
    aliases: ['legacy-authorization', 'enableLegacyAbac'],
    type: 'bool',
    usage: 'enable legacy ABAC authorization',
  },
  enableStackdriverLogging: {
    aliases: ['enable-stackdriver-logging', 'enableStackdriverLogging'],
    type: 'boolPointer',
    usage: 'enable Stackdriver logging',
  },
  enableStackdriverMonitoring: {
    aliases: ['enable-stackdriver-monitoring', 'enableStackdriverMonitoring'],
    type: 'boolPointer',
    usage: 'enable Stackdriver monitoring',
  },
  locations: {
    aliases: ['locations'],
    type: 'stringSlice',
    usage: 'the zones in which the cluster nodes are located',
  },
  network: {
    aliases: ['network'],
    type: 'string',
    usage: 'the network to use for the cluster',
  },
  subNetwork: {
    aliases: ['sub-network', 'subNetwork'],
    type: 'string',
    usage: 'the sub-network to use for the cluster',
  },
  maintenanceWindow: {
    aliases: ['maintenance-window', 'maintenanceWindow'],
    type: 'string',
    usage: 'start time of the daily maintenance window, HH:MM in UTC',
  },
} as const satisfies Record<string, OptionField>;

export type OptionFieldName = keyof typeof OPTION_FIELDS;

export function getString(options: DriverOptions, field: OptionFieldName): string {
  for (const key of OPTION_FIELDS[field].aliases) {
    const value = options.stringOptions?.[key];
    if (value) return value;
  }
  return '';
}

export function getInt(options: DriverOptions, field: OptionFieldName): number {
  for (const key of OPTION_FIELDS[field].aliases) {
    const value = options.intOptions?.[key];
    if (value) return value;
  }
  return 0;
}

export function getBool(options: DriverOptions, field: OptionFieldName): boolean {
  return OPTION_FIELDS[field].aliases.some((key) => options.boolOptions?.[key] === true);
}

/** `undefined` when no alias carries an explicit true or false */
export function getBoolPointer(
  options: DriverOptions,
  field: OptionFieldName
): boolean | undefined {
  for (const key of OPTION_FIELDS[field].aliases) {
    const value = options.boolPointerOptions?.[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function getStringSlice(options: DriverOptions, field: OptionFieldName): string[] {
  for (const key of OPTION_FIELDS[field].aliases) {
    const value = options.stringSliceOptions?.[key];
    if (value && value.length > 0) return [...value];
  }
  return [];
}

function toFlags(fields: OptionField[], withDefaults: boolean): DriverFlags {
  const flags: DriverFlags = {};
  for (const field of fields) {
    flags[field.aliases[0]] = {
      type: field.type,
      usage: field.usage,
      ...(withDefaults && field.default !== undefined ? { default: field.default } : {}),
    };
  }
  return flags;
}

export function getCreateOptions(): DriverFlags {
  return toFlags(Object.values(OPTION_FIELDS), true);
}

/** Update flags carry no defaults: an unset flag leaves the cluster unchanged */
export function getUpdateOptions(): DriverFlags {
  const fields: OptionField[] = Object.values(OPTION_FIELDS);
  return toFlags(
    fields.filter((field) => field.update === true),
    false
  );
}
