import type { Cluster, CredentialSource, GkeClusterApi } from 'gke-cluster-sdk';
import { AlreadyExistsError, CredentialsError, GkeSdkError, NotFoundError } from 'gke-cluster-sdk';
import type { Mock } from 'vitest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { emptyState, storeState } from '../../lib/driver/state.js';
import type { ClusterInfo, DriverOptions } from '../../lib/driver/types.js';
import type { GkeClientFactory, ServiceAccountTokenMintFn } from '../gke-driver.service.js';
import { createGkeDriverService, GkeDriverService } from '../gke-driver.service.js';

const runningCluster: Cluster = {
  name: 'c1',
  status: 'RUNNING',
  endpoint: '203.0.113.10',
  currentMasterVersion: '1.29.1',
  currentNodeCount: 3,
  masterAuth: {
    username: 'admin',
    password: 'test-password',
    clusterCaCertificate: 'Y2E=',
    clientCertificate: 'Y2VydA==',
    clientKey: 'a2V5',
  },
  nodePools: [{ name: 'default-pool', initialNodeCount: 3, status: 'RUNNING' }],
};

const createOptions: DriverOptions = {
  stringOptions: { name: 'c1', 'project-id': 'p1', zone: 'z1', credential: '{"k":"v"}' },
  intOptions: { 'node-count': 3 },
};

const id = { projectId: 'p1', zone: 'z1', clusterName: 'c1' };
const poolId = { ...id, nodePoolId: 'default-pool' };

function createFakeApi() {
  return {
    getCluster: vi.fn<GkeClusterApi['getCluster']>().mockResolvedValue(runningCluster),
    createCluster: vi.fn<GkeClusterApi['createCluster']>().mockResolvedValue({ name: 'op-create' }),
    updateMasterVersion: vi
      .fn<GkeClusterApi['updateMasterVersion']>()
      .mockResolvedValue({ name: 'op-master' }),
    updateNodeVersion: vi.fn<GkeClusterApi['updateNodeVersion']>().mockResolvedValue({ name: 'op-nodes' }),
    deleteCluster: vi.fn<GkeClusterApi['deleteCluster']>().mockResolvedValue({ name: 'op-delete' }),
    getNodePool: vi
      .fn<GkeClusterApi['getNodePool']>()
      .mockResolvedValue({ name: 'default-pool', status: 'RUNNING' }),
    updateNodePoolVersion: vi
      .fn<GkeClusterApi['updateNodePoolVersion']>()
      .mockResolvedValue({ name: 'op-pool' }),
    setNodePoolSize: vi.fn<GkeClusterApi['setNodePoolSize']>().mockResolvedValue({ name: 'op-size' }),
    getAccessToken: vi.fn<GkeClusterApi['getAccessToken']>().mockResolvedValue('test-access-token'),
    close: vi.fn<GkeClusterApi['close']>().mockResolvedValue(undefined),
  } satisfies GkeClusterApi;
}

function storedInfo(overrides: Partial<ReturnType<typeof emptyState>> = {}): ClusterInfo {
  const stored = storeState(
    { metadata: {} },
    { ...emptyState(), name: 'c1', projectId: 'p1', zone: 'z1', nodeCount: 3, ...overrides }
  );
  if (!stored.ok) {
    throw new Error(stored.error.message);
  }
  return stored.value;
}

describe('GkeDriverService', () => {
  let api: ReturnType<typeof createFakeApi>;
  let sources: CredentialSource[];
  let mintToken: Mock<ServiceAccountTokenMintFn>;
  let service: GkeDriverService;

  beforeEach(() => {
    api = createFakeApi();
    sources = [];
    mintToken = vi.fn<ServiceAccountTokenMintFn>().mockResolvedValue('test-sa-token');
    const clientFactory: GkeClientFactory = (source) => {
      sources.push(source);
      return api;
    };
    service = new GkeDriverService({
      config: { pollIntervalMs: 1, waitTimeoutMs: 1_000 },
      clientFactory,
      mintToken,
    });
  });

  describe('create', () => {
    it('creates the cluster, waits for it and stores its state', async () => {
      const result = await service.create(createOptions);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(api.createCluster).toHaveBeenCalledWith(
        id,
        expect.objectContaining({
          cluster: expect.objectContaining({ name: 'c1', initialNodeCount: 3 }),
        })
      );
      expect(api.getCluster).toHaveBeenCalledWith(id);
      expect(result.value.metadata['project-id']).toBe('p1');
      expect(result.value.metadata.zone).toBe('z1');
      expect(api.close).toHaveBeenCalledTimes(1);
    });

    it('passes the record credentials to the client factory', async () => {
      await service.create(createOptions);

      expect(sources).toEqual([{ credentialPath: undefined, credentialContent: '{"k":"v"}' }]);
    });

    it('rejects invalid options without building a client', async () => {
      const result = await service.create({ stringOptions: { name: 'c1', zone: 'z1' } });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_VALIDATION_FAILED');
      }
      expect(sources).toHaveLength(0);
    });

    it('waits on a cluster that already exists', async () => {
      api.createCluster.mockRejectedValue(new AlreadyExistsError('cluster', 'c1'));

      const result = await service.create(createOptions);

      expect(result.ok).toBe(true);
      expect(api.getCluster).toHaveBeenCalled();
    });

    it('reports other create failures and still closes the client', async () => {
      api.createCluster.mockRejectedValue(new GkeSdkError('quota exceeded', 'GKE_API_ERROR'));

      const result = await service.create(createOptions);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_PROVIDER_ERROR');
        expect(result.error.message).toBe('error creating cluster: quota exceeded');
      }
      expect(api.close).toHaveBeenCalledTimes(1);
    });

    it('reports a cancelled wait', async () => {
      api.getCluster.mockResolvedValue({ ...runningCluster, status: 'PROVISIONING' });
      const controller = new AbortController();
      controller.abort();

      const result = await service.create(createOptions, { signal: controller.signal });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_WAIT_CANCELLED');
        expect(result.error.message).toBe('waitForRunning(cluster c1) was cancelled');
      }
    });

    it('maps credential failures from the client factory', async () => {
      const failing = new GkeDriverService({
        clientFactory: () => {
          throw new CredentialsError('Credential content is not valid JSON: bad');
        },
      });

      const result = await failing.create(createOptions);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_CREDENTIALS_INVALID');
      }
    });

    it('keeps credentials separate across concurrent operations', async () => {
      const [first, second] = await Promise.all([
        service.create(createOptions),
        service.create({
          ...createOptions,
          stringOptions: { name: 'c2', 'project-id': 'p2', zone: 'z2', credential: '{"other":1}' },
        }),
      ]);

      expect(first.ok && second.ok).toBe(true);
      expect(sources).toHaveLength(2);
      expect(sources.map((source) => source.credentialContent).sort()).toEqual([
        '{"k":"v"}',
        '{"other":1}',
      ]);
    });
  });

  describe('update', () => {
    it('applies master, node version and size in order', async () => {
      const info = storedInfo({ nodeConfig: { ...emptyState().nodeConfig, imageType: 'COS' } });

      const result = await service.update(info, {
        stringOptions: { 'master-version': '1.30.0', 'node-version': '1.30.0' },
        intOptions: { 'node-count': 5 },
      });

      expect(result.ok).toBe(true);
      expect(api.updateMasterVersion).toHaveBeenCalledWith(id, '1.30.0');
      expect(api.updateNodePoolVersion).toHaveBeenCalledWith(poolId, '1.30.0', 'COS');
      expect(api.setNodePoolSize).toHaveBeenCalledWith(poolId, 5);

      const [masterOrder] = api.updateMasterVersion.mock.invocationCallOrder;
      const [nodeOrder] = api.updateNodePoolVersion.mock.invocationCallOrder;
      const [sizeOrder] = api.setNodePoolSize.mock.invocationCallOrder;
      expect(masterOrder).toBeLessThan(nodeOrder ?? 0);
      expect(nodeOrder).toBeLessThan(sizeOrder ?? 0);

      if (result.ok) {
        const restored = JSON.parse(result.value.metadata.state ?? '{}');
        expect(restored).toEqual(
          expect.objectContaining({
            masterVersion: '1.30.0',
            nodeVersion: '1.30.0',
            nodeCount: 5,
            nodePoolId: 'default-pool',
          })
        );
      }
    });

    it('records the discovered node pool in metadata', async () => {
      const info = storedInfo();

      const result = await service.update(info, {});

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.metadata.nodePool).toBe('default-pool');
      expect(result.value.metadata.state).not.toBe(info.metadata.state);
      expect(info.metadata.nodePool).toBeUndefined();
    });

    it('leaves the node count alone when it is zero', async () => {
      const result = await service.update(storedInfo({ nodePoolId: 'default-pool' }), {
        stringOptions: { 'master-version': '1.30.0' },
      });

      expect(result.ok).toBe(true);
      expect(api.setNodePoolSize).not.toHaveBeenCalled();
      expect(api.updateNodePoolVersion).not.toHaveBeenCalled();
    });

    it('fails when the cluster has no node pools', async () => {
      api.getCluster.mockResolvedValue({ ...runningCluster, nodePools: [] });

      const result = await service.update(storedInfo(), { intOptions: { 'node-count': 5 } });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_NODE_POOL_NOT_FOUND');
      }
      expect(api.setNodePoolSize).not.toHaveBeenCalled();
    });

    it('stops at the first failed step', async () => {
      api.updateMasterVersion.mockRejectedValue(new GkeSdkError('bad version', 'GKE_API_ERROR'));

      const result = await service.update(storedInfo({ nodePoolId: 'default-pool' }), {
        stringOptions: { 'master-version': '9.9.9', 'node-version': '9.9.9' },
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('error updating master version: bad version');
      }
      expect(api.updateNodePoolVersion).not.toHaveBeenCalled();
    });

    it('fails without stored state', async () => {
      const result = await service.update({ metadata: {} }, {});

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_STATE_RESTORE_FAILED');
      }
      expect(sources).toHaveLength(0);
    });
  });

  describe('postCheck', () => {
    it('fills in connection details and a service account token', async () => {
      const info = storedInfo();

      const result = await service.postCheck(info);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({
        ...info,
        endpoint: '203.0.113.10',
        version: '1.29.1',
        username: 'admin',
        password: 'test-password',
        rootCaCertificate: 'Y2E=',
        clientCertificate: 'Y2VydA==',
        clientKey: 'a2V5',
        nodeCount: 3,
        status: 'RUNNING',
        serviceAccountToken: 'test-sa-token',
        metadata: { ...info.metadata, nodePool: 'default-pool' },
      });
      expect(mintToken).toHaveBeenCalledWith(runningCluster, 'test-access-token', {
        namespace: 'kube-system',
        timeoutMs: 60_000,
      });
    });

    it('reports token failures', async () => {
      mintToken.mockRejectedValue(new Error('secret never populated'));

      const result = await service.postCheck(storedInfo());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('DRIVER_SERVICE_ACCOUNT_TOKEN_FAILED');
        expect(result.error.message).toBe(
          'Failed to generate service account token: secret never populated'
        );
      }
    });
  });

  describe('remove', () => {
    it('deletes the cluster', async () => {
      const result = await service.remove(storedInfo());

      expect(result).toEqual({ ok: true, value: undefined });
      expect(api.deleteCluster).toHaveBeenCalledWith(id);
    });

    it('treats a missing cluster as removed', async () => {
      api.deleteCluster.mockRejectedValue(new NotFoundError('cluster', 'c1'));

      const result = await service.remove(storedInfo());

      expect(result).toEqual({ ok: true, value: undefined });
    });

    it('reports other delete failures', async () => {
      api.deleteCluster.mockRejectedValue(new GkeSdkError('permission denied', 'GKE_API_ERROR'));

      const result = await service.remove(storedInfo());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('error removing cluster: permission denied');
      }
    });
  });

  describe('size and version', () => {
    it('reads the size of the first node pool', async () => {
      const result = await service.getClusterSize(storedInfo());

      expect(result).toEqual({ ok: true, value: { count: 3 } });
    });

    it('fails to read the size without node pools', async () => {
      api.getCluster.mockResolvedValue({ ...runningCluster, nodePools: [] });

      const result = await service.getClusterSize(storedInfo());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Cluster c1 has no node pools');
      }
    });

    it('resizes the first node pool and waits', async () => {
      const result = await service.setClusterSize(storedInfo(), { count: 7 });

      expect(result.ok).toBe(true);
      expect(api.setNodePoolSize).toHaveBeenCalledWith(poolId, 7);
    });

    it('reads the master version', async () => {
      const result = await service.getVersion(storedInfo());

      expect(result).toEqual({ ok: true, value: { version: '1.29.1' } });
    });

    it('upgrades the master before the nodes', async () => {
      const result = await service.setVersion(storedInfo(), { version: '1.30.0' });

      expect(result.ok).toBe(true);
      expect(api.updateMasterVersion).toHaveBeenCalledWith(id, '1.30.0');
      expect(api.updateNodeVersion).toHaveBeenCalledWith(id, '1.30.0');
      const [masterOrder] = api.updateMasterVersion.mock.invocationCallOrder;
      const [nodeOrder] = api.updateNodeVersion.mock.invocationCallOrder;
      expect(masterOrder).toBeLessThan(nodeOrder ?? 0);
    });

    it('logs the requested version for both upgrade steps', async () => {
      const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await service.setVersion(storedInfo(), { version: '1.30.0' });

      const lines = info.mock.calls.map((call) => String(call[0]));
      info.mockRestore();
      expect(lines).toContain(
        'INFO [GkeDriverService] (cluster:c1) Updating master version {"version":"1.30.0"}'
      );
      expect(lines).toContain(
        'INFO [GkeDriverService] (cluster:c1) Updating node version {"version":"1.30.0"}'
      );
    });

    it('prefixes lookup failures', async () => {
      api.getCluster.mockRejectedValue(new NotFoundError('cluster', 'c1'));

      const result = await service.getVersion(storedInfo());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('error getting cluster info: cluster "c1" not found');
      }
    });
  });

  it('exposes flag definitions and capabilities', () => {
    expect(Object.keys(service.getUpdateOptions())).toHaveLength(3);
    expect(service.getCreateOptions().name?.type).toBe('string');
    expect(service.getCapabilities()).toEqual([
      'getVersion',
      'setVersion',
      'getClusterSize',
      'setClusterSize',
    ]);
  });

  describe('createGkeDriverService', () => {
    it('applies environment settings', async () => {
      const created = createGkeDriverService(
        { clientFactory: () => api, mintToken },
        { GKE_DRIVER_SERVICE_ACCOUNT_NAMESPACE: 'cluster-ops', GKE_DRIVER_POLL_INTERVAL_MS: '1' }
      );
      expect(created.ok).toBe(true);
      if (!created.ok) return;

      const result = await created.value.postCheck(storedInfo());

      expect(result.ok).toBe(true);
      expect(mintToken).toHaveBeenCalledWith(runningCluster, 'test-access-token', {
        namespace: 'cluster-ops',
        timeoutMs: 60_000,
      });
    });

    it('rejects invalid environment settings', () => {
      const created = createGkeDriverService({}, { GKE_DRIVER_POLL_INTERVAL_MS: 'soon' });

      expect(created.ok).toBe(false);
      if (!created.ok) {
        expect(created.error.code).toBe('DRIVER_CONFIG_INVALID');
      }
    });
  });
});
