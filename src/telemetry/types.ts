export type TelemetryKind = 'oracle_call' | 'agent_call';

/**
 * One bracketed call to the oracle or to an agent. Written once, never
 * mutated; aggregators fold these without any other run state.
 */
export interface TelemetryEvent {
  readonly id: string;
  readonly taskId: string;
  readonly runId: string;
  readonly kind: TelemetryKind;
  /** Oracle name for oracle calls, capability name for agent calls. */
  readonly target: string;
  readonly agentId?: string;
  readonly model?: string;
  readonly iteration: number;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly latencyMs: number;
  readonly success: boolean;
  readonly error?: string;
  readonly inputTokens?: number;
  readonly outputTokens?: number;
  readonly costUsd?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}
