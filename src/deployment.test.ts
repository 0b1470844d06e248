import { describe, it, expect } from 'vitest';
import { DEFAULT_PLACEHOLDER, POOL_LABEL, makeDeployment, placeholderName } from './deployment.js';
import type { NodePoolConfig, PlaceholderSettings } from './types.js';

const pool: NodePoolConfig = {
  name: 'gpu',
  nodeSelector: { 'hub.jupyter.org/pool-name': 'gpu-pool' },
  memoryBytes: 2 * 1024 ** 3,
  baseReplicas: 0,
  calendarRules: [],
};

describe('placeholderName', () => {
  it('suffixes the pool name', () => {
    expect(placeholderName('gpu')).toBe('gpu-placeholder');
  });
});

describe('makeDeployment', () => {
  it('sizes one placeholder pod per replica to the pool', () => {
    const deployment = makeDeployment(pool, 'jhub', 3);
    expect(deployment.metadata?.name).toBe('gpu-placeholder');
    expect(deployment.metadata?.namespace).toBe('jhub');
    expect(deployment.spec?.replicas).toBe(3);

    const podSpec = deployment.spec?.template.spec;
    expect(podSpec?.nodeSelector).toEqual({ 'hub.jupyter.org/pool-name': 'gpu-pool' });
    expect(podSpec?.priorityClassName).toBe('node-placeholder');
    expect(podSpec?.containers).toHaveLength(1);
    expect(podSpec?.containers[0].image).toBe('registry.k8s.io/pause:3.9');
    expect(podSpec?.containers[0].resources?.requests).toEqual({ memory: '2147483648' });
  });

  it('selects its own pods by pool', () => {
    const deployment = makeDeployment(pool, 'jhub', 1);
    const matchLabels = deployment.spec?.selector.matchLabels;
    expect(matchLabels?.[POOL_LABEL]).toBe('gpu');
    expect(deployment.spec?.template.metadata?.labels).toMatchObject(matchLabels ?? {});
  });

  it('applies placeholder settings without letting pod labels override the selector', () => {
    const settings: PlaceholderSettings = {
      image: 'example.com/pause:1',
      priorityClassName: 'low',
      tolerations: [{ key: 'nvidia.com/gpu', operator: 'Exists', effect: 'NoSchedule' }],
      podLabels: { team: 'data', [POOL_LABEL]: 'other' },
      podAnnotations: { 'cluster-autoscaler.kubernetes.io/safe-to-evict': 'true' },
    };
    const deployment = makeDeployment(pool, 'jhub', 1, settings);
    const template = deployment.spec?.template;
    expect(template?.metadata?.labels?.team).toBe('data');
    expect(template?.metadata?.labels?.[POOL_LABEL]).toBe('gpu');
    expect(template?.metadata?.annotations).toEqual({ 'cluster-autoscaler.kubernetes.io/safe-to-evict': 'true' });
    expect(template?.spec?.priorityClassName).toBe('low');
    expect(template?.spec?.tolerations).toEqual(settings.tolerations);
    expect(template?.spec?.tolerations).not.toBe(settings.tolerations);
  });

  it('returns fresh objects on every call', () => {
    const first = makeDeployment(pool, 'jhub', 1);
    first.spec?.template.spec?.tolerations?.push({ key: 'x' });
    const second = makeDeployment(pool, 'jhub', 1);
    expect(second.spec?.template.spec?.tolerations).toEqual([]);
    expect(DEFAULT_PLACEHOLDER.tolerations).toEqual([]);
  });
});
