import { GKE_SENTINELS } from '../constants.js';
import type { Cluster, CreateClusterRequest, NodeConfig } from '../types/cluster.js';

/**
 * Addons to switch off. Anything not listed keeps the provider default.
 */
export interface DisabledAddons {
  httpLoadBalancing: boolean;
  horizontalPodAutoscaling: boolean;
  kubernetesDashboard: boolean;
  networkPolicyConfig: boolean;
}

export class ClusterBuilder {
  private cluster: Cluster;

  constructor(name: string) {
    this.cluster = {
      name,
      masterAuth: { username: GKE_SENTINELS.adminUsername },
    };
  }

  description(description: string): this {
    this.cluster.description = description;
    return this;
  }

  /** Kubernetes version for the control plane at creation time */
  initialVersion(version: string): this {
    this.cluster.initialClusterVersion = version;
    return this;
  }

  initialNodeCount(count: number): this {
    this.cluster.initialNodeCount = count;
    return this;
  }

  /** Pod range without IP aliases */
  podCidr(cidr: string): this {
    this.cluster.clusterIpv4Cidr = cidr;
    return this;
  }

  /** Switch to VPC-native networking with explicit pod and service ranges */
  ipAliases(ranges: { podCidr?: string; serviceCidr: string }): this {
    this.cluster.clusterIpv4Cidr = undefined;
    this.cluster.ipAllocationPolicy = {
      useIpAliases: true,
      clusterIpv4CidrBlock: ranges.podCidr,
      servicesIpv4CidrBlock: ranges.serviceCidr,
    };
    return this;
  }

  network(network: string, subnetwork?: string): this {
    this.cluster.network = network;
    this.cluster.subnetwork = subnetwork;
    return this;
  }

  locations(locations: string[]): this {
    this.cluster.locations = [...locations];
    return this;
  }

  alphaFeatures(enabled: boolean): this {
    this.cluster.enableKubernetesAlpha = enabled;
    return this;
  }

  legacyAbac(enabled: boolean): this {
    this.cluster.legacyAbac = { enabled };
    return this;
  }

  addons(disabled: DisabledAddons): this {
    this.cluster.addonsConfig = {
      httpLoadBalancing: { disabled: disabled.httpLoadBalancing },
      horizontalPodAutoscaling: { disabled: disabled.horizontalPodAutoscaling },
      kubernetesDashboard: { disabled: disabled.kubernetesDashboard },
      networkPolicyConfig: { disabled: disabled.networkPolicyConfig },
    };
    return this;
  }

  nodeConfig(config: NodeConfig): this {
    this.cluster.nodeConfig = { ...config, labels: { ...config.labels } };
    return this;
  }

  resourceLabels(labels: Record<string, string>): this {
    this.cluster.resourceLabels = {
      ...this.cluster.resourceLabels,
      ...labels,
    };
    return this;
  }

  /** Store the display name as a lower-cased resource label */
  displayName(displayName: string): this {
    return this.resourceLabels({ [GKE_SENTINELS.displayNameLabel]: displayName.toLowerCase() });
  }

  /** Stackdriver logging stays on unless this is called */
  disableLogging(): this {
    this.cluster.loggingService = GKE_SENTINELS.none;
    return this;
  }

  /** Stackdriver monitoring stays on unless this is called */
  disableMonitoring(): this {
    this.cluster.monitoringService = GKE_SENTINELS.none;
    return this;
  }

  /** Daily maintenance window starting at `startTime` (HH:MM, UTC) */
  dailyMaintenanceWindow(startTime: string): this {
    this.cluster.maintenancePolicy = {
      window: { dailyMaintenanceWindow: { startTime } },
    };
    return this;
  }

  build(): CreateClusterRequest {
    return { cluster: this.cluster };
  }
}
