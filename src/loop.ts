import type {
  CalendarEvent,
  LoopState,
  NodePoolConfig,
  PoolStatus,
  ReconcileResult,
} from './types.js';
import { ReconcileError, describeError } from './errors.js';
import { evaluateAll, replicaCountsFromDescriptions } from './demand.js';
import { describeEvent, isActive } from './calendar.js';
import type { ScalerMetrics } from './metrics.js';
import baseLogger, { type Logger } from './logger.js';

export interface CalendarSource {
  refresh(): Promise<readonly CalendarEvent[]>;
  current(): readonly CalendarEvent[];
  lastSuccessAt(): Date | null;
  timeZone(): string;
}

export interface Reconciler {
  reconcile(pool: NodePoolConfig, desiredReplicas: number): Promise<ReconcileResult>;
}

export interface ScalerLoopOptions {
  pools: readonly NodePoolConfig[];
  calendar: CalendarSource;
  reconciler: Reconciler;
  metrics: ScalerMetrics;
  tickIntervalMs: number;
  calendarRefreshMs: number;
  now?: () => Date;
  logger?: Logger;
}

export interface PoolFailure {
  pool: string;
  error: unknown;
}

export interface TickSummary {
  at: Date;
  results: ReconcileResult[];
  failures: PoolFailure[];
}

/**
 * Top-level control loop. Two independent timers: a frequent reconciliation tick
 * and a slower calendar refresh. Pools are reconciled concurrently within a tick and
 * a failing pool only affects its own result.
 */
export class ScalerLoop {
  private currentState: LoopState = 'idle';
  private tickTimer: NodeJS.Timeout | undefined;
  private refreshTimer: NodeJS.Timeout | undefined;
  private inFlightTick: Promise<TickSummary> | null = null;
  private inFlightRefresh: Promise<boolean> | null = null;
  private lastTick: Date | null = null;
  private readonly poolStatus = new Map<string, PoolStatus>();
  private readonly now: () => Date;
  private readonly logger: Logger;
  private stopRequested = false;

  constructor(private readonly options: ScalerLoopOptions) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? baseLogger.child({ component: 'loop' });
    for (const pool of options.pools) {
      this.poolStatus.set(pool.name, { consecutiveErrors: 0 });
    }
  }

  get state(): LoopState {
    return this.currentState;
  }

  lastTickAt(): Date | null {
    return this.lastTick;
  }

  /**
   * Refresh the calendar and reconcile once, then keep doing both on their intervals.
   */
  async start(): Promise<void> {
    if (this.tickTimer || this.refreshTimer) {
      return;
    }
    this.currentState = 'idle';
    this.stopRequested = false;

    await this.refreshCalendar();
    if (this.stopRequested) {
      return;
    }
    await this.tick();
    if (this.stopRequested) {
      return;
    }

    this.refreshTimer = setInterval(() => {
      this.refreshCalendar().catch((error) => this.logger.error({ err: error }, 'Calendar refresh crashed'));
    }, this.options.calendarRefreshMs);

    this.tickTimer = setInterval(() => {
      this.tick().catch((error) => this.logger.error({ err: error }, 'Reconciliation tick crashed'));
    }, this.options.tickIntervalMs);

    this.logger.info(
      {
        pools: this.options.pools.map((pool) => pool.name),
        tickIntervalMs: this.options.tickIntervalMs,
        calendarRefreshMs: this.options.calendarRefreshMs,
      },
      '⏰ Periodic reconciliation scheduled'
    );
  }

  /**
   * Stop both timers and wait for whatever is still running to settle.
   */
  async stop(): Promise<void> {
    // a start() still awaiting its first refresh or tick must not schedule timers after this
    this.stopRequested = true;
    clearInterval(this.tickTimer);
    clearInterval(this.refreshTimer);
    this.tickTimer = undefined;
    this.refreshTimer = undefined;

    await Promise.allSettled([this.inFlightTick, this.inFlightRefresh].filter((work) => work !== null));
    this.currentState = 'stopped';
  }

  /**
   * Run a tick unless the previous one is still going, in which case this one is skipped.
   */
  async tick(): Promise<TickSummary | null> {
    if (this.inFlightTick) {
      this.logger.debug('Previous tick still running, skipping');
      return null;
    }

    this.inFlightTick = this.runTick();
    try {
      return await this.inFlightTick;
    } finally {
      this.inFlightTick = null;
    }
  }

  async runTick(): Promise<TickSummary> {
    const at = this.now();
    this.options.metrics.ticks.inc();

    // one snapshot for the whole tick; a refresh landing mid-tick only affects the next one
    const events = this.options.calendar.current();

    this.enter('evaluating');
    const desired = evaluateAll(this.options.pools, at, events);
    const work = this.options.pools.map((pool, index) => {
      const { desiredReplicas } = desired[index];
      this.options.metrics.desiredReplicas.set({ pool: pool.name }, desiredReplicas);
      this.updateStatus(pool.name, { desiredReplicas });
      return { pool, desiredReplicas };
    });
    this.logger.debug({ desired }, 'Evaluated calendar demand');

    this.enter('reconciling');
    const settled = await Promise.allSettled(
      work.map(({ pool, desiredReplicas }) => this.options.reconciler.reconcile(pool, desiredReplicas))
    );

    const results: ReconcileResult[] = [];
    const failures: PoolFailure[] = [];
    settled.forEach((outcome, index) => {
      const pool = work[index].pool.name;
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
        this.options.metrics.recordReconcile(outcome.value);
        this.updateStatus(pool, {
          observedReplicas: outcome.value.observedReplicas,
          lastOutcome: outcome.value.outcome,
          lastError: undefined,
          consecutiveErrors: 0,
        });
      } else {
        failures.push({ pool, error: outcome.reason });
        this.recordFailure(pool, outcome.reason);
      }
    });

    this.lastTick = at;
    this.enter('idle');

    if (failures.length > 0) {
      this.logger.warn(
        { failed: failures.map((failure) => failure.pool), succeeded: results.length },
        'Tick finished with failing pools, they will be retried next tick'
      );
    }
    return { at, results, failures };
  }

  /**
   * Refresh the cached calendar. Resolves false when the fetch failed and the
   * previous event set stays in use.
   */
  async refreshCalendar(): Promise<boolean> {
    if (this.inFlightRefresh) {
      return this.inFlightRefresh;
    }

    this.inFlightRefresh = this.runRefresh();
    try {
      return await this.inFlightRefresh;
    } finally {
      this.inFlightRefresh = null;
    }
  }

  status(): Record<string, PoolStatus> {
    return Object.fromEntries([...this.poolStatus].map(([pool, status]) => [pool, { ...status }]));
  }

  private async runRefresh(): Promise<boolean> {
    const { calendar, metrics } = this.options;
    this.enter('fetching-calendar');
    try {
      const events = await calendar.refresh();
      metrics.recordCalendarSuccess(calendar.lastSuccessAt() ?? this.now(), events.length);

      const now = this.now();
      const active = events.filter((event) => isActive(event, now));
      this.logger.info(
        {
          events: events.length,
          active: active.map((event) => describeEvent(event, calendar.timeZone())),
          requested: Object.fromEntries(replicaCountsFromDescriptions(active)),
        },
        '📅 Calendar refreshed'
      );
      return true;
    } catch (error) {
      metrics.calendarFetchErrors.inc();
      this.logger.warn(
        { err: error, cachedEvents: calendar.current().length },
        'Calendar refresh failed, keeping previously fetched events'
      );
      return false;
    } finally {
      this.enter(this.inFlightTick ? 'reconciling' : 'idle');
    }
  }

  private recordFailure(pool: string, error: unknown): void {
    const operation = error instanceof ReconcileError ? error.operation : 'unknown';
    this.options.metrics.recordReconcileError(pool, operation);

    const previous = this.poolStatus.get(pool) ?? { consecutiveErrors: 0 };
    this.updateStatus(pool, {
      lastError: describeError(error),
      consecutiveErrors: previous.consecutiveErrors + 1,
    });
    this.logger.error(
      { err: error, pool, operation, consecutiveErrors: previous.consecutiveErrors + 1 },
      `Error reconciling pool ${pool}`
    );
  }

  private updateStatus(pool: string, update: Partial<PoolStatus>): void {
    const previous = this.poolStatus.get(pool) ?? { consecutiveErrors: 0 };
    this.poolStatus.set(pool, { ...previous, ...update });
  }

  private enter(state: LoopState): void {
    if (this.currentState !== 'stopped') {
      this.currentState = state;
    }
  }
}
