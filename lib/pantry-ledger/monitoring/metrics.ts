/**
 * Pantry Ledger Metrics
 *
 * Process-local counters for ledger operations.
 *
 * PRIVACY RULES:
 * - No identifiers (household keys, ingredient names)
 * - Only simple numeric counters and durations
 *
 * Usage:
 *   import { record, getSnapshot } from './metrics';
 *   record('allocation_called');
 *   const snapshot = getSnapshot();
 */

export type MetricName =
  | 'allocation_called'
  | 'allocation_shortfall'
  | 'allocation_rejected'
  | 'discard_called'
  | 'discard_noop'
  | 'usage_recorded'
  | 'usage_reversed'
  | 'reversal_heuristic'
  | 'reversal_fallback'
  | 'purchase_recorded'
  | 'readonly_hit';

export type MetricsSnapshot = {
  [K in MetricName]?: number;
};

/**
 * Duration metric names (for timing measurements)
 */
export type DurationMetricName = 'ledger_tx_ms';

/**
 * Duration metrics snapshot (latest value plus count/sum for averaging)
 */
export type DurationSnapshot = {
  [K in DurationMetricName]?: { latest: number; count: number; sum: number };
};

const counters: Map<MetricName, number> = new Map();

const durations: Map<DurationMetricName, { latest: number; count: number; sum: number }> = new Map();

/**
 * Record (increment) a metric counter
 */
export function record(name: MetricName): void {
  const current = counters.get(name) ?? 0;
  counters.set(name, current + 1);
}

/**
 * Record a duration metric (e.g., ledger_tx_ms)
 */
export function recordDuration(name: DurationMetricName, durationMs: number): void {
  const current = durations.get(name);
  if (current) {
    durations.set(name, {
      latest: durationMs,
      count: current.count + 1,
      sum: current.sum + durationMs,
    });
  } else {
    durations.set(name, {
      latest: durationMs,
      count: 1,
      sum: durationMs,
    });
  }
}

export function getSnapshot(): MetricsSnapshot {
  const snapshot: MetricsSnapshot = {};
  for (const [name, count] of counters) {
    snapshot[name] = count;
  }
  return snapshot;
}

export function getDurationSnapshot(): DurationSnapshot {
  const snapshot: DurationSnapshot = {};
  for (const [name, stats] of durations) {
    snapshot[name] = { ...stats };
  }
  return snapshot;
}

/**
 * Reset all counters (for testing only)
 */
export function reset(): void {
  counters.clear();
  durations.clear();
}

/**
 * Get a single metric value, 0 if never recorded
 */
export function getMetric(name: MetricName): number {
  return counters.get(name) ?? 0;
}

/**
 * Log metrics to console (dev only)
 */
export function logMetricsIfDev(): void {
  if (process.env.NODE_ENV === 'production') {
    return;
  }

  const snapshot = getSnapshot();
  const total = Object.values(snapshot).reduce((a, b) => a + (b ?? 0), 0);

  if (total > 0) {
    console.log('[Metrics]', JSON.stringify(snapshot));
  }
}
