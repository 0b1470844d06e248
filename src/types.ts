import type { V1Toleration } from '@kubernetes/client-node';

export type RuleMatchType = 'exact' | 'prefix' | 'regex';

export interface CalendarRule {
  match: string;
  matchType: RuleMatchType;
  replicas: number;
  pattern?: RegExp; // compiled once at load for 'regex' rules
}

export interface NodePoolConfig {
  name: string;
  nodeSelector: Readonly<Record<string, string>>;
  memoryBytes: number;
  baseReplicas: number;
  calendarRules: readonly CalendarRule[];
}

export interface CalendarEvent {
  uid: string;
  summary: string;
  description: string;
  start: Date;
  end: Date;
  allDay: boolean;
}

export interface DesiredState {
  pool: string;
  desiredReplicas: number;
  memoryBytes: number;
}

export interface PlaceholderSettings {
  image: string;
  priorityClassName: string;
  tolerations: readonly V1Toleration[];
  podLabels: Readonly<Record<string, string>>;
  podAnnotations: Readonly<Record<string, string>>;
}

export interface ScalerConfig {
  calendarUrl: string;
  namespace?: string;  // resolved against the kubeconfig context when absent
  tickIntervalSeconds: number;
  calendarRefreshSeconds: number;
  apiTimeoutSeconds: number;
  calendarExpansionDays: number;
  metricsPort: number;
  placeholder: PlaceholderSettings;
  nodePools: readonly NodePoolConfig[];
}

export type ReconcileOutcome = 'absent' | 'created' | 'unchanged' | 'scaled';

export type ReconcileOperation = 'get' | 'create' | 'patch';

export interface ReconcileResult {
  pool: string;
  outcome: ReconcileOutcome;
  desiredReplicas: number;
  observedReplicas: number;
}

export type LoopState = 'idle' | 'fetching-calendar' | 'evaluating' | 'reconciling' | 'stopped';

export interface PoolStatus {
  desiredReplicas?: number;
  observedReplicas?: number;
  lastOutcome?: ReconcileOutcome;
  lastError?: string;
  consecutiveErrors: number;
}
