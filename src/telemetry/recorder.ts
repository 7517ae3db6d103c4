/**
 * @fileoverview Collects the telemetry of one task run.
 *
 * Each call is bracketed: begin() before the call, end() right after it.
 * The event is only created at end(), frozen, and appended in close order.
 */

import { randomUUID } from 'crypto';
import { estimateCostUsd } from './cost.js';
import type { TelemetryEvent, TelemetryKind, TokenUsage } from './types.js';

export interface BeginOptions {
  iteration: number;
  agentId?: string;
  model?: string;
}

export interface EndOptions {
  success: boolean;
  error?: string;
  usage?: TokenUsage;
  /** Overrides the model given at begin(), e.g. the one the provider reports. */
  model?: string;
}

export interface TelemetryHandle {
  /** Close the bracket. Later calls return the first event and record nothing. */
  end(options: EndOptions): TelemetryEvent;
  readonly closed: boolean;
}

export class TelemetryRecorder {
  private readonly recorded: TelemetryEvent[] = [];

  constructor(
    readonly taskId: string,
    readonly runId: string,
    private readonly now: () => number = Date.now
  ) {}

  begin(kind: TelemetryKind, target: string, options: BeginOptions): TelemetryHandle {
    const startedAt = this.now();
    let closedEvent: TelemetryEvent | undefined;

    return {
      end: (result: EndOptions): TelemetryEvent => {
        if (closedEvent) return closedEvent;
        closedEvent = this.close(kind, target, options, startedAt, result);
        return closedEvent;
      },
      get closed() {
        return closedEvent !== undefined;
      },
    };
  }

  /** Events in close order. */
  events(): readonly TelemetryEvent[] {
    return [...this.recorded];
  }

  private close(
    kind: TelemetryKind,
    target: string,
    options: BeginOptions,
    startedAt: number,
    result: EndOptions
  ): TelemetryEvent {
    const endedAt = this.now();
    const model = result.model ?? options.model;
    const event: TelemetryEvent = Object.freeze({
      id: randomUUID(),
      taskId: this.taskId,
      runId: this.runId,
      kind,
      target,
      agentId: options.agentId,
      model,
      iteration: options.iteration,
      startedAt,
      endedAt,
      latencyMs: Math.max(0, endedAt - startedAt),
      success: result.success,
      error: result.error,
      inputTokens: result.usage?.inputTokens,
      outputTokens: result.usage?.outputTokens,
      costUsd: model && result.usage
        ? estimateCostUsd(model, result.usage.inputTokens, result.usage.outputTokens)
        : undefined,
    });
    this.recorded.push(event);
    return event;
  }
}
