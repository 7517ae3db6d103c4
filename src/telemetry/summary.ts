import type { TelemetryEvent, TelemetryKind } from './types.js';

export interface TargetSummary {
  kind: TelemetryKind;
  target: string;
  calls: number;
  successes: number;
  failures: number;
  successRate: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

export interface TelemetrySummary {
  totalEvents: number;
  totalCostUsd: number;
  oracle: TargetSummary[];
  agents: TargetSummary[];
}

type Accumulator = TargetSummary & { totalLatencyMs: number };

/**
 * Fold an event stream into per-target metrics. Order of the input does
 * not matter; output rows are sorted by kind then target.
 */
export function summarizeTelemetry(events: readonly TelemetryEvent[]): TelemetrySummary {
  const rows = new Map<string, Accumulator>();

  for (const event of events) {
    const key = `${event.kind}\u0000${event.target}`;
    let row = rows.get(key);
    if (!row) {
      row = {
        kind: event.kind,
        target: event.target,
        calls: 0,
        successes: 0,
        failures: 0,
        successRate: 0,
        avgLatencyMs: 0,
        maxLatencyMs: 0,
        inputTokens: 0,
        outputTokens: 0,
        costUsd: 0,
        totalLatencyMs: 0,
      };
      rows.set(key, row);
    }
    row.calls++;
    if (event.success) row.successes++;
    else row.failures++;
    row.totalLatencyMs += event.latencyMs;
    row.maxLatencyMs = Math.max(row.maxLatencyMs, event.latencyMs);
    row.inputTokens += event.inputTokens ?? 0;
    row.outputTokens += event.outputTokens ?? 0;
    row.costUsd += event.costUsd ?? 0;
  }

  const finished = [...rows.values()]
    .map(({ totalLatencyMs, ...row }): TargetSummary => ({
      ...row,
      successRate: row.successes / row.calls,
      avgLatencyMs: totalLatencyMs / row.calls,
    }))
    .sort((a, b) => (a.target < b.target ? -1 : a.target > b.target ? 1 : 0));

  return {
    totalEvents: events.length,
    totalCostUsd: finished.reduce((sum, row) => sum + row.costUsd, 0),
    oracle: finished.filter((row) => row.kind === 'oracle_call'),
    agents: finished.filter((row) => row.kind === 'agent_call'),
  };
}
