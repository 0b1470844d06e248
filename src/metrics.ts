import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { ReconcileOperation, ReconcileResult } from './types.js';

/**
 * Process-wide counters and gauges, scraped from /metrics.
 */
export class ScalerMetrics {
  readonly registry: Registry;
  readonly ticks: Counter;
  readonly reconciles: Counter<'pool' | 'outcome'>;
  readonly reconcileErrors: Counter<'pool' | 'operation'>;
  readonly calendarFetchErrors: Counter;
  readonly calendarLastSuccess: Gauge;
  readonly calendarEvents: Gauge;
  readonly desiredReplicas: Gauge<'pool'>;
  readonly observedReplicas: Gauge<'pool'>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    const registers = [this.registry];
    this.ticks = new Counter({
      name: 'node_placeholder_ticks_total',
      help: 'Reconciliation ticks run',
      registers,
    });
    this.reconciles = new Counter({
      name: 'node_placeholder_reconcile_total',
      help: 'Successful pool reconciliations by outcome',
      labelNames: ['pool', 'outcome'],
      registers,
    });
    this.reconcileErrors = new Counter({
      name: 'node_placeholder_reconcile_errors_total',
      help: 'Failed pool reconciliations by API operation',
      labelNames: ['pool', 'operation'],
      registers,
    });
    this.calendarFetchErrors = new Counter({
      name: 'node_placeholder_calendar_fetch_errors_total',
      help: 'Calendar refreshes that failed and kept the previous event set',
      registers,
    });
    this.calendarLastSuccess = new Gauge({
      name: 'node_placeholder_calendar_last_success_timestamp_seconds',
      help: 'Unix time of the last successful calendar refresh',
      registers,
    });
    this.calendarEvents = new Gauge({
      name: 'node_placeholder_calendar_events',
      help: 'Events in the cached calendar set',
      registers,
    });
    this.desiredReplicas = new Gauge({
      name: 'node_placeholder_desired_replicas',
      help: 'Placeholder replicas the calendar asks for',
      labelNames: ['pool'],
      registers,
    });
    this.observedReplicas = new Gauge({
      name: 'node_placeholder_observed_replicas',
      help: 'Placeholder replicas on the Deployment after the last reconcile',
      labelNames: ['pool'],
      registers,
    });
  }

  recordReconcile(result: ReconcileResult): void {
    this.reconciles.inc({ pool: result.pool, outcome: result.outcome });
    this.observedReplicas.set({ pool: result.pool }, result.observedReplicas);
  }

  recordReconcileError(pool: string, operation: ReconcileOperation | 'unknown'): void {
    this.reconcileErrors.inc({ pool, operation });
  }

  recordCalendarSuccess(at: Date, eventCount: number): void {
    this.calendarLastSuccess.set(at.getTime() / 1000);
    this.calendarEvents.set(eventCount);
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }

  contentType(): string {
    return this.registry.contentType;
  }
}
