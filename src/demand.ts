import * as yaml from 'js-yaml';
import type { CalendarEvent, CalendarRule, DesiredState, NodePoolConfig } from './types.js';
import { isActive } from './calendar.js';

export function ruleMatches(rule: CalendarRule, summary: string): boolean {
  const text = summary.trim();
  switch (rule.matchType) {
    case 'exact':
      return text === rule.match;
    case 'prefix':
      return text.startsWith(rule.match);
    case 'regex':
      return (rule.pattern ?? new RegExp(rule.match)).test(text);
  }
}

/**
 * Read a `pool-name: count` mapping out of an event description.
 * Anything that is not a mapping of non-negative integers is ignored, entry by entry.
 */
export function parseReplicaMapping(description: string): Map<string, number> {
  const counts = new Map<string, number>();
  if (!description.trim()) {
    return counts;
  }

  let document: unknown;
  try {
    document = yaml.load(description);
  } catch {
    return counts;
  }

  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    return counts;
  }

  for (const [pool, value] of Object.entries(document)) {
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
      counts.set(pool, value);
    }
  }
  return counts;
}

/**
 * Highest requested count per pool across the given events.
 */
export function replicaCountsFromDescriptions(events: readonly CalendarEvent[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const event of events) {
    for (const [pool, count] of parseReplicaMapping(event.description)) {
      counts.set(pool, Math.max(counts.get(pool) ?? 0, count));
    }
  }
  return counts;
}

/**
 * Replica overrides the active events request for one pool.
 */
export function activeOverrides(pool: NodePoolConfig, now: Date, events: readonly CalendarEvent[]): number[] {
  const overrides: number[] = [];
  for (const event of events) {
    if (!isActive(event, now)) {
      continue;
    }
    for (const rule of pool.calendarRules) {
      if (ruleMatches(rule, event.summary)) {
        overrides.push(rule.replicas);
      }
    }
    const requested = parseReplicaMapping(event.description).get(pool.name);
    if (requested !== undefined) {
      overrides.push(requested);
    }
  }
  return overrides;
}

/**
 * Desired placeholder replicas for a pool: the base count, raised to the highest
 * override any active event asks for. Never below zero.
 */
export function evaluate(pool: NodePoolConfig, now: Date, events: readonly CalendarEvent[]): number {
  return Math.max(0, pool.baseReplicas, ...activeOverrides(pool, now, events));
}

export function evaluateAll(
  pools: readonly NodePoolConfig[],
  now: Date,
  events: readonly CalendarEvent[]
): DesiredState[] {
  return pools.map((pool) => ({
    pool: pool.name,
    desiredReplicas: evaluate(pool, now, events),
    memoryBytes: pool.memoryBytes,
  }));
}
