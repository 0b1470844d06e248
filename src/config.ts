import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { CalendarRule, NodePoolConfig, ScalerConfig } from './types.js';
import { ConfigError, describeError } from './errors.js';
import { parseMemory } from './quantity.js';
import { DEFAULT_PLACEHOLDER } from './deployment.js';

export const DEFAULT_CONFIG_PATH = '/etc/node-placeholder-scaler/config.yaml';

// pool names end up in "<pool>-placeholder", which must stay a valid 63-character DNS label
const poolNameSchema = z
  .string()
  .max(51)
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, {
    message: 'Pool name must be lowercase alphanumeric and hyphens',
  });

const memorySchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const bytes = parseMemory(value);
  if (bytes === null || bytes <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid memory quantity: ${value}` });
    return z.NEVER;
  }
  return bytes;
});

const calendarRuleSchema = z
  .object({
    match: z.string().min(1),
    matchType: z.enum(['exact', 'prefix', 'regex']).default('exact'),
    replicas: z.number().int().min(0),
  })
  .transform((rule, ctx): CalendarRule => {
    if (rule.matchType !== 'regex') {
      return rule;
    }
    try {
      return { ...rule, pattern: new RegExp(rule.match) };
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid regex ${rule.match}: ${describeError(error)}` });
      return z.NEVER;
    }
  });

const nodePoolSchema = z.object({
  nodeSelector: z.record(z.string()).default({}),
  resources: z.object({
    requests: z.object({
      memory: memorySchema,
    }),
  }),
  replicas: z.number().int().min(0).default(0),
  calendarRules: z.array(calendarRuleSchema).default([]),
});

const tolerationSchema = z.object({
  key: z.string().optional(),
  operator: z.enum(['Exists', 'Equal']).optional(),
  value: z.string().optional(),
  effect: z.enum(['NoSchedule', 'PreferNoSchedule', 'NoExecute']).optional(),
  tolerationSeconds: z.number().int().optional(),
});

const positiveSeconds = z.coerce.number().positive();

export const scalerConfigSchema = z.object({
  calendarUrl: z.string({ required_error: 'calendarUrl is required' }).trim().min(1, 'calendarUrl is required'),
  namespace: z.string().min(1).optional(),
  tickIntervalSeconds: positiveSeconds.default(60),
  calendarRefreshSeconds: positiveSeconds.default(600),
  apiTimeoutSeconds: positiveSeconds.default(10),
  calendar: z
    .object({
      expansionDays: z.number().int().positive().default(7),
    })
    .default({}),
  placeholder: z
    .object({
      image: z.string().min(1).default(DEFAULT_PLACEHOLDER.image),
      priorityClassName: z.string().min(1).default(DEFAULT_PLACEHOLDER.priorityClassName),
      tolerations: z.array(tolerationSchema).nullish().transform((value) => value ?? []),
      podLabels: z.record(z.string()).default({}),
      podAnnotations: z.record(z.string()).default({}),
    })
    .default({}),
  metrics: z
    .object({
      port: z.coerce.number().int().min(1).max(65535).default(9090),
    })
    .default({}),
  nodePools: z
    .record(poolNameSchema, nodePoolSchema, { required_error: 'nodePools is required' })
    .refine((pools) => Object.keys(pools).length > 0, 'At least one node pool must be configured'),
});

export type RawScalerConfig = z.input<typeof scalerConfigSchema>;

type Env = Record<string, string | undefined>;

function setIfPresent(target: Record<string, unknown>, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') {
    target[key] = value;
  }
}

/**
 * Environment variables override the file, the same names the chart sets on the container.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  setIfPresent(merged, 'calendarUrl', env.CALENDAR_URL);
  setIfPresent(merged, 'namespace', env.NAMESPACE);
  if (merged.namespace === undefined) {
    setIfPresent(merged, 'namespace', env.POD_NAMESPACE);
  }
  setIfPresent(merged, 'tickIntervalSeconds', env.TICK_INTERVAL_SECONDS);
  setIfPresent(merged, 'calendarRefreshSeconds', env.CALENDAR_REFRESH_SECONDS);
  setIfPresent(merged, 'apiTimeoutSeconds', env.API_TIMEOUT_SECONDS);

  if (env.METRICS_PORT) {
    const metrics = typeof raw.metrics === 'object' && raw.metrics !== null ? raw.metrics : {};
    merged.metrics = { ...metrics, port: env.METRICS_PORT };
  }
  return merged;
}

/**
 * Validate a raw document into a frozen ScalerConfig.
 */
export function parseConfig(raw: unknown): ScalerConfig {
  const result = scalerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }

  const data = result.data;
  const nodePools: NodePoolConfig[] = Object.entries(data.nodePools).map(([name, pool]) =>
    Object.freeze({
      name,
      nodeSelector: Object.freeze({ ...pool.nodeSelector }),
      memoryBytes: pool.resources.requests.memory,
      baseReplicas: pool.replicas,
      calendarRules: Object.freeze([...pool.calendarRules]),
    })
  );

  return Object.freeze({
    calendarUrl: data.calendarUrl,
    namespace: data.namespace,
    tickIntervalSeconds: data.tickIntervalSeconds,
    calendarRefreshSeconds: data.calendarRefreshSeconds,
    apiTimeoutSeconds: data.apiTimeoutSeconds,
    calendarExpansionDays: data.calendar.expansionDays,
    metricsPort: data.metrics.port,
    placeholder: Object.freeze({
      image: data.placeholder.image,
      priorityClassName: data.placeholder.priorityClassName,
      tolerations: Object.freeze(
        data.placeholder.tolerations.map((toleration) => Object.freeze({ ...toleration }))
      ),
      podLabels: Object.freeze({ ...data.placeholder.podLabels }),
      podAnnotations: Object.freeze({ ...data.placeholder.podAnnotations }),
    }),
    nodePools: Object.freeze(nodePools),
  });
}

function readConfigDocument(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError([`Cannot read ${path}: ${describeError(error)}`], error);
  }

  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw new ConfigError([`${path} is not valid YAML: ${describeError(error)}`], error);
  }

  if (document === undefined || document === null) {
    return {};
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError([`${path} must contain a mapping`]);
  }
  return Object.fromEntries(Object.entries(document));
}

export interface LoadConfigOptions {
  path?: string;
  env?: Env;
}

/**
 * Read the YAML file (a missing file counts as empty), apply environment overrides,
 * validate. Throws ConfigError on anything unusable.
 */
export function loadConfig(options: LoadConfigOptions = {}): ScalerConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  return parseConfig(applyEnvOverrides(readConfigDocument(path), env));
}
