import { describe, expect, it } from 'vitest';
import { buildCreateClusterRequest } from '../cluster-request.js';
import { decodeState, emptyState } from '../state.js';

function baseState() {
  return { ...emptyState(), name: 'c1', projectId: 'p1', zone: 'z1', nodeCount: 3 };
}

describe('buildCreateClusterRequest', () => {
  it('builds a minimal request', () => {
    const decoded = decodeState({
      stringOptions: { name: 'c1', 'project-id': 'p1', zone: 'z1' },
      intOptions: { 'node-count': 3 },
    });
    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;

    const { cluster } = buildCreateClusterRequest(decoded.value);

    expect(cluster.name).toBe('c1');
    expect(cluster.initialNodeCount).toBe(3);
    expect(cluster.masterAuth).toEqual({ username: 'admin' });
    expect(cluster.maintenancePolicy).toBeUndefined();
    expect(cluster.loggingService).toBeUndefined();
    expect(cluster.monitoringService).toBeUndefined();
    expect(cluster.locations).toBeUndefined();
  });

  it('leaves inherited addons enabled and disables the dashboard by default', () => {
    const { cluster } = buildCreateClusterRequest({
      ...baseState(),
      enableHttpLoadBalancing: 'disabled',
      enableHorizontalPodAutoscaling: 'enabled',
    });

    expect(cluster.addonsConfig).toEqual({
      httpLoadBalancing: { disabled: true },
      horizontalPodAutoscaling: { disabled: false },
      kubernetesDashboard: { disabled: true },
      networkPolicyConfig: { disabled: false },
    });
  });

  it('enables the dashboard on request', () => {
    const { cluster } = buildCreateClusterRequest({ ...baseState(), enableKubernetesDashboard: true });

    expect(cluster.addonsConfig?.kubernetesDashboard).toEqual({ disabled: false });
  });

  it('turns Stackdriver off only when explicitly disabled', () => {
    const disabled = buildCreateClusterRequest({
      ...baseState(),
      enableStackdriverLogging: 'disabled',
      enableStackdriverMonitoring: 'enabled',
    }).cluster;

    expect(disabled.loggingService).toBe('none');
    expect(disabled.monitoringService).toBeUndefined();
  });

  it('switches to IP aliases when a services range is set', () => {
    const { cluster } = buildCreateClusterRequest({
      ...baseState(),
      clusterIpv4Cidr: '10.0.0.0/14',
      servicesIpv4Cidr: '10.4.0.0/20',
    });

    expect(cluster.clusterIpv4Cidr).toBeUndefined();
    expect(cluster.ipAllocationPolicy).toEqual({
      useIpAliases: true,
      clusterIpv4CidrBlock: '10.0.0.0/14',
      servicesIpv4CidrBlock: '10.4.0.0/20',
    });
  });

  it('uses the pod range directly without a services range', () => {
    const { cluster } = buildCreateClusterRequest({ ...baseState(), clusterIpv4Cidr: '10.0.0.0/14' });

    expect(cluster.clusterIpv4Cidr).toBe('10.0.0.0/14');
    expect(cluster.ipAllocationPolicy).toBeUndefined();
  });

  it('carries locations, maintenance window and display name', () => {
    const { cluster } = buildCreateClusterRequest({
      ...baseState(),
      locations: ['z1', 'z2'],
      maintenanceWindow: '03:00',
      displayName: 'Prod Cluster',
    });

    expect(cluster.locations).toEqual(['z1', 'z2']);
    expect(cluster.maintenancePolicy).toEqual({
      window: { dailyMaintenanceWindow: { startTime: '03:00' } },
    });
    expect(cluster.resourceLabels).toEqual({ 'display-name': 'prod cluster' });
  });

  it('copies node settings and labels', () => {
    const state = baseState();
    state.nodeConfig = {
      machineType: 'n1-standard-4',
      diskSizeGb: 200,
      diskType: 'pd-ssd',
      imageType: 'COS',
      labels: { team: 'infra' },
    };

    const { cluster } = buildCreateClusterRequest(state);

    expect(cluster.nodeConfig).toEqual(state.nodeConfig);
    expect(cluster.nodeConfig?.labels).not.toBe(state.nodeConfig.labels);
  });
});
