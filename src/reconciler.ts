import type { DeploymentClient } from './kube.js';
import type { NodePoolConfig, PlaceholderSettings, ReconcileOperation, ReconcileResult } from './types.js';
import { ReconcileError } from './errors.js';
import { withTimeout } from './retry.js';
import { makeDeployment, placeholderName } from './deployment.js';
import baseLogger, { type Logger } from './logger.js';

export interface PoolReconcilerOptions {
  namespace: string;
  apiTimeoutMs: number;
  placeholder: PlaceholderSettings;
  logger?: Logger;
}

/**
 * Drives one pool's placeholder Deployment towards a replica count:
 * absent stays absent at zero, absent is created otherwise, present is scaled
 * only when its replica count differs.
 */
export class PoolReconciler {
  private readonly logger: Logger;

  constructor(
    private readonly client: DeploymentClient,
    private readonly options: PoolReconcilerOptions
  ) {
    this.logger = options.logger ?? baseLogger.child({ component: 'reconciler' });
  }

  async reconcile(pool: NodePoolConfig, desiredReplicas: number): Promise<ReconcileResult> {
    const { namespace } = this.options;
    const name = placeholderName(pool.name);
    const log = this.logger.child({ pool: pool.name, deployment: name });

    const existing = await this.call(pool, 'get', () => this.client.get(namespace, name));

    if (!existing) {
      if (desiredReplicas === 0) {
        log.debug('Placeholder deployment absent and no replicas wanted, nothing to do');
        return { pool: pool.name, outcome: 'absent', desiredReplicas, observedReplicas: 0 };
      }

      const body = makeDeployment(pool, namespace, desiredReplicas, this.options.placeholder);
      const created = await this.call(pool, 'create', () => this.client.create(namespace, body));
      const observedReplicas = created.spec?.replicas ?? desiredReplicas;
      log.info({ replicas: observedReplicas }, `✅ Created placeholder deployment ${name}`);
      return { pool: pool.name, outcome: 'created', desiredReplicas, observedReplicas };
    }

    // an omitted spec.replicas defaults to 1 on the API server
    const currentReplicas = existing.spec?.replicas ?? 1;
    if (currentReplicas === desiredReplicas) {
      log.debug({ replicas: currentReplicas }, 'Placeholder deployment already at desired replicas');
      return { pool: pool.name, outcome: 'unchanged', desiredReplicas, observedReplicas: currentReplicas };
    }

    await this.call(pool, 'patch', () => this.client.scale(namespace, name, desiredReplicas));
    const direction = desiredReplicas > currentReplicas ? '📈 Scaled up' : '📉 Scaled down';
    log.info({ from: currentReplicas, to: desiredReplicas }, `${direction} placeholder deployment ${name}`);
    return { pool: pool.name, outcome: 'scaled', desiredReplicas, observedReplicas: desiredReplicas };
  }

  private async call<T>(pool: NodePoolConfig, operation: ReconcileOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn, this.options.apiTimeoutMs, `${operation} ${placeholderName(pool.name)}`);
    } catch (error) {
      throw new ReconcileError(pool.name, operation, error);
    }
  }
}
