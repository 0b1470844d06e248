import type { V1Deployment } from '@kubernetes/client-node';
import type { NodePoolConfig, PlaceholderSettings } from './types.js';
import { formatMemory } from './quantity.js';

export const POOL_LABEL = 'node-placeholder.io/pool';

const COMMON_LABELS = {
  'app.kubernetes.io/name': 'node-placeholder',
  'app.kubernetes.io/component': 'placeholder',
  'app.kubernetes.io/managed-by': 'node-placeholder-scaler',
};

export const DEFAULT_PLACEHOLDER: PlaceholderSettings = Object.freeze({
  image: 'registry.k8s.io/pause:3.9',
  priorityClassName: 'node-placeholder',
  tolerations: Object.freeze([]),
  podLabels: Object.freeze({}),
  podAnnotations: Object.freeze({}),
});

/**
 * One Deployment per pool, always under this name.
 */
export function placeholderName(poolName: string): string {
  return `${poolName}-placeholder`;
}

/**
 * Build the placeholder Deployment for a pool. Every call returns fresh objects,
 * so callers may mutate the result without affecting the settings passed in.
 */
export function makeDeployment(
  pool: NodePoolConfig,
  namespace: string,
  replicas: number,
  settings: PlaceholderSettings = DEFAULT_PLACEHOLDER
): V1Deployment {
  const selector = { ...COMMON_LABELS, [POOL_LABEL]: pool.name };

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: placeholderName(pool.name),
      namespace,
      labels: { ...selector },
    },
    spec: {
      replicas,
      selector: { matchLabels: { ...selector } },
      template: {
        metadata: {
          labels: { ...settings.podLabels, ...selector },
          annotations: { ...settings.podAnnotations },
        },
        spec: {
          priorityClassName: settings.priorityClassName,
          terminationGracePeriodSeconds: 0,
          automountServiceAccountToken: false,
          nodeSelector: { ...pool.nodeSelector },
          tolerations: settings.tolerations.map((toleration) => ({ ...toleration })),
          containers: [
            {
              name: 'placeholder',
              image: settings.image,
              resources: {
                requests: { memory: formatMemory(pool.memoryBytes) },
              },
            },
          ],
        },
      },
    },
  };
}
