import { setTimeout as sleep } from 'node:timers/promises';
import * as k8s from '@kubernetes/client-node';
import type { Cluster } from 'gke-cluster-sdk';
import { TimeoutError } from 'gke-cluster-sdk';

/**
 * Names of the resources the driver creates inside a managed cluster
 */
export const SERVICE_ACCOUNT_NAMES = {
  serviceAccount: 'cluster-driver',
  clusterRole: 'cluster-driver-admin',
  clusterRoleBinding: 'cluster-driver-admin-binding',
  tokenSecret: 'cluster-driver-token',
};

const MANAGED_LABELS = {
  'app.kubernetes.io/managed-by': 'gke-cluster-driver',
};

export type ServiceAccountCoreApi = Pick<
  k8s.CoreV1Api,
  'createNamespacedServiceAccount' | 'createNamespacedSecret' | 'readNamespacedSecret'
>;

export type ServiceAccountRbacApi = Pick<
  k8s.RbacAuthorizationV1Api,
  'createClusterRole' | 'createClusterRoleBinding'
>;

export interface ServiceAccountTokenOptions {
  namespace: string;
  /** How long to wait for the token controller to fill the secret */
  timeoutMs: number;
  pollIntervalMs?: number;
}

/**
 * KubeConfig for a freshly created cluster, authenticated with a provider
 * access token.
 */
export function kubeConfigForCluster(cluster: Cluster, accessToken: string): k8s.KubeConfig {
  const endpoint = cluster.endpoint ?? '';
  const server = endpoint.startsWith('https://') ? endpoint : `https://${endpoint}`;
  const name = cluster.name ?? 'cluster';

  const kc = new k8s.KubeConfig();
  kc.loadFromOptions({
    clusters: [
      {
        name,
        server,
        caData: cluster.masterAuth?.clusterCaCertificate ?? undefined,
        skipTLSVerify: false,
      },
    ],
    users: [{ name: 'driver', token: accessToken }],
    contexts: [{ name, cluster: name, user: 'driver' }],
    currentContext: name,
  });
  return kc;
}

/**
 * Creates a cluster-admin service account and reads back its token
 */
export class ServiceAccountTokenMinter {
  constructor(
    private coreApi: ServiceAccountCoreApi,
    private rbacApi: ServiceAccountRbacApi,
    private options: ServiceAccountTokenOptions
  ) {}

  async generateToken(): Promise<string> {
    await this.ensureServiceAccount();
    await this.ensureClusterRole();
    await this.ensureClusterRoleBinding();
    await this.ensureTokenSecret();
    return this.readToken();
  }

  async ensureServiceAccount(): Promise<void> {
    const body: k8s.V1ServiceAccount = {
      apiVersion: 'v1',
      kind: 'ServiceAccount',
      metadata: {
        name: SERVICE_ACCOUNT_NAMES.serviceAccount,
        namespace: this.options.namespace,
        labels: MANAGED_LABELS,
      },
    };

    try {
      await this.coreApi.createNamespacedServiceAccount({
        namespace: this.options.namespace,
        body,
      });
    } catch (error) {
      this.rethrowUnlessExists(error);
    }
  }

  async ensureClusterRole(): Promise<void> {
    const body: k8s.V1ClusterRole = {
      apiVersion: 'rbac.authorization.k8s.io/v1',
      kind: 'ClusterRole',
      metadata: { name: SERVICE_ACCOUNT_NAMES.clusterRole, labels: MANAGED_LABELS },
      rules: [
        { apiGroups: ['*'], resources: ['*'], verbs: ['*'] },
        { nonResourceURLs: ['*'], verbs: ['*'] },
      ],
    };

    try {
      await this.rbacApi.createClusterRole({ body });
    } catch (error) {
      this.rethrowUnlessExists(error);
    }
  }

  async ensureClusterRoleBinding(): Promise<void> {
    const body: k8s.V1ClusterRoleBinding = {
      apiVersion: 'rbac.authorization.k8s.io/v1',
      kind: 'ClusterRoleBinding',
      metadata: { name: SERVICE_ACCOUNT_NAMES.clusterRoleBinding, labels: MANAGED_LABELS },
      roleRef: {
        apiGroup: 'rbac.authorization.k8s.io',
        kind: 'ClusterRole',
        name: SERVICE_ACCOUNT_NAMES.clusterRole,
      },
      subjects: [
        {
          kind: 'ServiceAccount',
          name: SERVICE_ACCOUNT_NAMES.serviceAccount,
          namespace: this.options.namespace,
        },
      ],
    };

    try {
      await this.rbacApi.createClusterRoleBinding({ body });
    } catch (error) {
      this.rethrowUnlessExists(error);
    }
  }

  /** Long-lived token secret; the token controller fills in `data.token` */
  async ensureTokenSecret(): Promise<void> {
    const body: k8s.V1Secret = {
      apiVersion: 'v1',
      kind: 'Secret',
      type: 'kubernetes.io/service-account-token',
      metadata: {
        name: SERVICE_ACCOUNT_NAMES.tokenSecret,
        namespace: this.options.namespace,
        labels: MANAGED_LABELS,
        annotations: {
          'kubernetes.io/service-account.name': SERVICE_ACCOUNT_NAMES.serviceAccount,
        },
      },
    };

    try {
      await this.coreApi.createNamespacedSecret({ namespace: this.options.namespace, body });
    } catch (error) {
      this.rethrowUnlessExists(error);
    }
  }

  async readToken(): Promise<string> {
    const pollIntervalMs = this.options.pollIntervalMs ?? 1_000;
    const deadline = Date.now() + this.options.timeoutMs;

    while (Date.now() < deadline) {
      const secret = await this.coreApi.readNamespacedSecret({
        name: SERVICE_ACCOUNT_NAMES.tokenSecret,
        namespace: this.options.namespace,
      });

      const token = secret.data?.token;
      if (token) {
        return Buffer.from(token, 'base64').toString('utf8');
      }

      await sleep(pollIntervalMs);
    }

    throw new TimeoutError(
      `readToken(${this.options.namespace}/${SERVICE_ACCOUNT_NAMES.tokenSecret})`,
      this.options.timeoutMs
    );
  }

  private rethrowUnlessExists(error: unknown): void {
    if (!this.isAlreadyExistsError(error)) {
      throw error;
    }
  }

  private isAlreadyExistsError(error: unknown): boolean {
    if (error && typeof error === 'object') {
      if ('code' in error && error.code === 409) {
        return true;
      }
      if ('body' in error) {
        const parsed = typeof error.body === 'string' ? safeJson(error.body) : error.body;
        return (
          typeof parsed === 'object' &&
          parsed !== null &&
          'reason' in parsed &&
          parsed.reason === 'AlreadyExists'
        );
      }
    }
    return false;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Mint a cluster-admin service-account token inside `cluster`.
 */
export async function mintServiceAccountToken(
  cluster: Cluster,
  accessToken: string,
  options: ServiceAccountTokenOptions
): Promise<string> {
  const kc = kubeConfigForCluster(cluster, accessToken);
  const minter = new ServiceAccountTokenMinter(
    kc.makeApiClient(k8s.CoreV1Api),
    kc.makeApiClient(k8s.RbacAuthorizationV1Api),
    options
  );
  return minter.generateToken();
}
