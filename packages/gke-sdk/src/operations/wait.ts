import { GKE_STATUS, WAIT_DEFAULTS } from '../constants.js';
import { CancelledError, TimeoutError } from '../errors.js';
import type {
  Cluster,
  ClusterIdentity,
  GkeClusterApi,
  NodePool,
  NodePoolIdentity,
} from '../types/cluster.js';

/**
 * Options for awaitStatus
 */
export interface WaitOptions {
  /** Resource description used in error messages */
  resource: string;
  /** Poll interval in milliseconds (default: 5000) */
  pollIntervalMs?: number;
  /** Overall budget in milliseconds (default: 1 hour) */
  timeoutMs?: number;
  /** Aborts the wait, including a pending sleep */
  signal?: AbortSignal;
  /** Called once each time the observed status changes */
  onProgress?: (status: string) => void;
}

export type ClusterWaitOptions = Omit<WaitOptions, 'resource'>;

/**
 * Status name as reported by the provider. The client decodes enums to their
 * names, so anything else is treated as unspecified.
 */
export function statusOf(resource: { status?: unknown }): string {
  return typeof resource.status === 'string' ? resource.status : GKE_STATUS.unspecified;
}

/**
 * Poll `fetch` until the resource reports RUNNING.
 * A fetch error ends the wait immediately and is rethrown as-is.
 */
export async function awaitStatus<T extends { status?: unknown }>(
  fetch: () => Promise<T>,
  options: WaitOptions
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? WAIT_DEFAULTS.timeoutMs;
  const pollIntervalMs = options.pollIntervalMs ?? WAIT_DEFAULTS.pollIntervalMs;
  const deadline = Date.now() + timeoutMs;
  const operation = `waitForRunning(${options.resource})`;
  let lastStatus: string | undefined;

  while (Date.now() < deadline) {
    if (options.signal?.aborted) {
      throw new CancelledError(operation);
    }

    const resource = await fetch();
    const status = statusOf(resource);

    if (status === GKE_STATUS.running) {
      return resource;
    }

    if (status !== lastStatus) {
      options.onProgress?.(status);
      lastStatus = status;
    }

    await sleep(pollIntervalMs, operation, options.signal);
  }

  throw new TimeoutError(operation, timeoutMs);
}

export function waitForCluster(
  api: Pick<GkeClusterApi, 'getCluster'>,
  id: ClusterIdentity,
  options?: ClusterWaitOptions
): Promise<Cluster> {
  return awaitStatus(() => api.getCluster(id), {
    ...options,
    resource: `cluster ${id.clusterName}`,
  });
}

export function waitForNodePool(
  api: Pick<GkeClusterApi, 'getNodePool'>,
  id: NodePoolIdentity,
  options?: ClusterWaitOptions
): Promise<NodePool> {
  return awaitStatus(() => api.getNodePool(id), {
    ...options,
    resource: `node pool ${id.nodePoolId}`,
  });
}

function sleep(ms: number, operation: string, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(operation));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(operation));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
