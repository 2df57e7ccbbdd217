import type { CreateClusterRequest } from 'gke-cluster-sdk';
import { ClusterBuilder } from 'gke-cluster-sdk';
import type { ClusterState } from './state.js';
import { isDisabled } from './toggle.js';

/**
 * Map a cluster record onto a create-cluster payload.
 *
 * Addons with an `inherit` toggle stay enabled. The dashboard has no
 * tri-state, so it is disabled unless explicitly enabled. Stackdriver
 * logging and monitoring are only overridden by an explicit `disabled`.
 */
export function buildCreateClusterRequest(state: ClusterState): CreateClusterRequest {
  const builder = new ClusterBuilder(state.name)
    .description(state.description)
    .initialVersion(state.masterVersion)
    .initialNodeCount(state.nodeCount)
    .alphaFeatures(state.enableAlphaFeature)
    .addons({
      httpLoadBalancing: isDisabled(state.enableHttpLoadBalancing),
      horizontalPodAutoscaling: isDisabled(state.enableHorizontalPodAutoscaling),
      kubernetesDashboard: !state.enableKubernetesDashboard,
      networkPolicyConfig: isDisabled(state.enableNetworkPolicyConfig),
    })
    .network(state.network, state.subNetwork)
    .legacyAbac(state.legacyAbac)
    .nodeConfig(state.nodeConfig)
    .displayName(state.displayName);

  if (state.servicesIpv4Cidr) {
    builder.ipAliases({
      podCidr: state.clusterIpv4Cidr || undefined,
      serviceCidr: state.servicesIpv4Cidr,
    });
  } else {
    builder.podCidr(state.clusterIpv4Cidr);
  }

  if (state.locations.length > 0) {
    builder.locations(state.locations);
  }
  if (isDisabled(state.enableStackdriverLogging)) {
    builder.disableLogging();
  }
  if (isDisabled(state.enableStackdriverMonitoring)) {
    builder.disableMonitoring();
  }
  if (state.maintenanceWindow) {
    builder.dailyMaintenanceWindow(state.maintenanceWindow);
  }

  return builder.build();
}
