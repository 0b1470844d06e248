import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { CalendarFetcher } from './calendar.js';
import { KubeDeploymentClient, contextNamespace, loadKubeConfig } from './kube.js';
import { PoolReconciler } from './reconciler.js';
import { ScalerLoop } from './loop.js';
import { ScalerMetrics } from './metrics.js';
import { createMetricsApp } from './server.js';
import logger from './logger.js';
import type { ScalerConfig } from './types.js';

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, '❌ Unhandled promise rejection');
  process.exit(1);
});

let config: ScalerConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, error.message);
  } else {
    logger.fatal({ err: error }, 'Failed to load configuration');
  }
  process.exit(1);
}

logger.info(
  {
    calendarUrl: config.calendarUrl,
    pools: config.nodePools.map((pool) => ({
      name: pool.name,
      baseReplicas: pool.baseReplicas,
      memoryBytes: pool.memoryBytes,
      rules: pool.calendarRules.length,
    })),
    tickIntervalSeconds: config.tickIntervalSeconds,
    calendarRefreshSeconds: config.calendarRefreshSeconds,
  },
  '🚀 Starting node placeholder scaler'
);

const skipTlsVerify = process.env.SKIP_TLS_VERIFY === 'true';
if (skipTlsVerify) {
  logger.warn('⚠️  TLS certificate verification disabled (development mode)');
}

const kubeConfig = loadKubeConfig(skipTlsVerify);
const namespace = config.namespace ?? contextNamespace(kubeConfig) ?? 'default';
logger.info({ namespace, cluster: kubeConfig.getCurrentCluster()?.server }, '✅ Kubernetes client initialized');

const metrics = new ScalerMetrics({ collectDefaults: true });
const apiTimeoutMs = config.apiTimeoutSeconds * 1000;

const loop = new ScalerLoop({
  pools: config.nodePools,
  calendar: new CalendarFetcher({
    url: config.calendarUrl,
    timeoutMs: apiTimeoutMs,
    expansionDays: config.calendarExpansionDays,
  }),
  reconciler: new PoolReconciler(new KubeDeploymentClient(kubeConfig), {
    namespace,
    apiTimeoutMs,
    placeholder: config.placeholder,
  }),
  metrics,
  tickIntervalMs: config.tickIntervalSeconds * 1000,
  calendarRefreshMs: config.calendarRefreshSeconds * 1000,
});

const server = serve({ fetch: createMetricsApp(metrics, loop).fetch, port: config.metricsPort }, (info) => {
  logger.info({ port: info.port }, 'Metrics listening on /metrics');
});

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info({ signal }, '👋 Shutting down');
  await loop.stop();
  server.close();
  process.exit(0);
};

process.on('SIGTERM', (signal) => void shutdown(signal));
process.on('SIGINT', (signal) => void shutdown(signal));

await loop.start();
