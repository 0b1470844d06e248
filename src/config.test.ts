import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyEnvOverrides, loadConfig, parseConfig, type RawScalerConfig } from './config.js';
import { makeDeployment } from './deployment.js';
import { ConfigError } from './errors.js';

const minimal: RawScalerConfig = {
  calendarUrl: 'https://calendar.example.com/basic.ics',
  nodePools: {
    'pool-a': { resources: { requests: { memory: '1Gi' } } },
  },
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig(minimal);
    expect(config).toEqual({
      calendarUrl: 'https://calendar.example.com/basic.ics',
      namespace: undefined,
      tickIntervalSeconds: 60,
      calendarRefreshSeconds: 600,
      apiTimeoutSeconds: 10,
      calendarExpansionDays: 7,
      metricsPort: 9090,
      placeholder: {
        image: 'registry.k8s.io/pause:3.9',
        priorityClassName: 'node-placeholder',
        tolerations: [],
        podLabels: {},
        podAnnotations: {},
      },
      nodePools: [{ name: 'pool-a', nodeSelector: {}, memoryBytes: 1073741824, baseReplicas: 0, calendarRules: [] }],
    });
  });

  it('freezes the result', () => {
    const config = parseConfig(minimal);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.nodePools)).toBe(true);
    expect(Object.isFrozen(config.nodePools[0])).toBe(true);
  });

  it('freezes the placeholder settings', () => {
    const config = parseConfig({
      ...minimal,
      placeholder: {
        tolerations: [{ key: 'nvidia.com/gpu', operator: 'Exists', effect: 'NoSchedule' }],
        podLabels: { team: 'research' },
        podAnnotations: { 'example.com/owner': 'hub' },
      },
    });
    const { placeholder } = config;

    expect(Object.isFrozen(placeholder)).toBe(true);
    expect(Object.isFrozen(placeholder.tolerations)).toBe(true);
    expect(Object.isFrozen(placeholder.tolerations[0])).toBe(true);
    expect(Object.isFrozen(placeholder.podLabels)).toBe(true);
    expect(Object.isFrozen(placeholder.podAnnotations)).toBe(true);
    expect(Reflect.set(placeholder.podLabels, 'team', 'other')).toBe(false);
    expect(placeholder.podLabels).toEqual({ team: 'research' });

    const deployment = makeDeployment(config.nodePools[0], 'jhub', 1, placeholder);
    deployment.spec?.template.spec?.tolerations?.push({ key: 'extra' });
    expect(placeholder.tolerations).toHaveLength(1);
  });

  it('reads pools with selectors, base replicas and rules', () => {
    const config = parseConfig({
      ...minimal,
      nodePools: {
        gpu: {
          nodeSelector: { 'hub.jupyter.org/pool-name': 'gpu-pool' },
          resources: { requests: { memory: 60929654784 } },
          replicas: 1,
          calendarRules: [
            { match: 'Exam', replicas: 3 },
            { match: '^Lab \\d+', matchType: 'regex', replicas: 2 },
          ],
        },
      },
    });

    const [gpu] = config.nodePools;
    expect(gpu.name).toBe('gpu');
    expect(gpu.nodeSelector).toEqual({ 'hub.jupyter.org/pool-name': 'gpu-pool' });
    expect(gpu.memoryBytes).toBe(60929654784);
    expect(gpu.baseReplicas).toBe(1);
    expect(gpu.calendarRules[0]).toEqual({ match: 'Exam', matchType: 'exact', replicas: 3 });
    expect(gpu.calendarRules[1].pattern?.test('Lab 12')).toBe(true);
  });

  it('requires a calendar URL and at least one pool', () => {
    expect(issuesOf(() => parseConfig({}))).toEqual([
      'calendarUrl: calendarUrl is required',
      'nodePools: nodePools is required',
    ]);
    expect(issuesOf(() => parseConfig({ ...minimal, nodePools: {} }))).toEqual([
      'nodePools: At least one node pool must be configured',
    ]);
  });

  it('rejects unusable memory quantities', () => {
    expect(
      issuesOf(() => parseConfig({ ...minimal, nodePools: { 'pool-a': { resources: { requests: { memory: 'lots' } } } } }))
    ).toEqual(['nodePools.pool-a.resources.requests.memory: Invalid memory quantity: lots']);
  });

  it('rejects pool names that cannot name a deployment', () => {
    expect(
      issuesOf(() => parseConfig({ ...minimal, nodePools: { Pool_A: { resources: { requests: { memory: '1Gi' } } } } }))
    ).toEqual(['nodePools.Pool_A: Pool name must be lowercase alphanumeric and hyphens']);
  });

  it('rejects rules with an invalid regular expression', () => {
    const issues = issuesOf(() =>
      parseConfig({
        ...minimal,
        nodePools: {
          'pool-a': {
            resources: { requests: { memory: '1Gi' } },
            calendarRules: [{ match: '(', matchType: 'regex', replicas: 1 }],
          },
        },
      })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^nodePools\.pool-a\.calendarRules\.0: Invalid regex \(: /);
  });

  it('joins every issue into the error message', () => {
    expect(() => parseConfig({ nodePools: {} })).toThrow(
      'Invalid configuration: calendarUrl: calendarUrl is required; nodePools: At least one node pool must be configured'
    );
  });
});

describe('applyEnvOverrides', () => {
  it('lets the environment override the file', () => {
    const config = parseConfig(
      applyEnvOverrides(
        { ...minimal, metrics: { port: 9100 } },
        {
          CALENDAR_URL: 'file:///calendars/term.ics',
          NAMESPACE: 'jhub',
          TICK_INTERVAL_SECONDS: '30',
          CALENDAR_REFRESH_SECONDS: '300',
          API_TIMEOUT_SECONDS: '5',
          METRICS_PORT: '8080',
        }
      )
    );
    expect(config.calendarUrl).toBe('file:///calendars/term.ics');
    expect(config.namespace).toBe('jhub');
    expect(config.tickIntervalSeconds).toBe(30);
    expect(config.calendarRefreshSeconds).toBe(300);
    expect(config.apiTimeoutSeconds).toBe(5);
    expect(config.metricsPort).toBe(8080);
  });

  it('falls back to the pod namespace only when nothing else names one', () => {
    expect(parseConfig(applyEnvOverrides(minimal, { POD_NAMESPACE: 'pod-ns' })).namespace).toBe('pod-ns');
    expect(parseConfig(applyEnvOverrides(minimal, { NAMESPACE: 'env-ns', POD_NAMESPACE: 'pod-ns' })).namespace).toBe(
      'env-ns'
    );
    expect(
      parseConfig(applyEnvOverrides({ ...minimal, namespace: 'file-ns' }, { POD_NAMESPACE: 'pod-ns' })).namespace
    ).toBe('file-ns');
  });

  it('ignores empty variables', () => {
    expect(parseConfig(applyEnvOverrides(minimal, { CALENDAR_URL: '', TICK_INTERVAL_SECONDS: '' }))).toMatchObject({
      calendarUrl: 'https://calendar.example.com/basic.ics',
      tickIntervalSeconds: 60,
    });
  });

  it('rejects non-numeric intervals', () => {
    expect(issuesOf(() => parseConfig(applyEnvOverrides(minimal, { TICK_INTERVAL_SECONDS: 'soon' })))).toHaveLength(1);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the YAML file at CONFIG_PATH', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(
      path,
      [
        'calendarUrl: https://calendar.example.com/basic.ics',
        'tickIntervalSeconds: 15',
        'nodePools:',
        '  base:',
        '    nodeSelector:',
        '      hub.jupyter.org/pool-name: base-pool',
        '    resources:',
        '      requests:',
        '        memory: 512Mi',
        '    calendarRules:',
        '      - match: Midterm',
        '        matchType: prefix',
        '        replicas: 4',
        '',
      ].join('\n')
    );

    const config = loadConfig({ env: { CONFIG_PATH: path } });
    expect(config.tickIntervalSeconds).toBe(15);
    expect(config.nodePools).toEqual([
      {
        name: 'base',
        nodeSelector: { 'hub.jupyter.org/pool-name': 'base-pool' },
        memoryBytes: 536870912,
        baseReplicas: 0,
        calendarRules: [{ match: 'Midterm', matchType: 'prefix', replicas: 4 }],
      },
    ]);
  });

  it('treats a missing file as empty', () => {
    expect(issuesOf(() => loadConfig({ path: join(dir, 'missing.yaml'), env: {} }))).toEqual([
      'calendarUrl: calendarUrl is required',
      'nodePools: nodePools is required',
    ]);
  });

  it('rejects invalid YAML and documents that are not mappings', () => {
    const broken = join(dir, 'broken.yaml');
    writeFileSync(broken, 'nodePools: [\n');
    expect(() => loadConfig({ path: broken, env: {} })).toThrow(ConfigError);

    const list = join(dir, 'list.yaml');
    writeFileSync(list, '- pool-a\n- pool-b\n');
    expect(issuesOf(() => loadConfig({ path: list, env: {} }))).toEqual([`${list} must contain a mapping`]);
  });
});
