/**
 * Orchestrator run types.
 */

import type { AgentFailurePolicy } from '../config.js';
import type { TerminalCause } from '../utils/errors.js';
import type { TelemetryEvent } from '../telemetry/types.js';

export type { AgentFailurePolicy };

export interface RunOptions {
  /** Upper bound on planning steps for this run. */
  maxIterations?: number;
  /** What a failed agent call does: end the run, or go back to planning. */
  agentFailurePolicy?: AgentFailurePolicy;
  /** Checked between steps; never interrupts a call in flight. */
  signal?: AbortSignal;
  /** Append the oracle's interim reasoning as system messages. */
  recordReasoning?: boolean;
  runId?: string;
}

export type RunDefaults = Required<Pick<RunOptions, 'maxIterations' | 'agentFailurePolicy' | 'recordReasoning'>>;

export const DEFAULT_RUN_OPTIONS: RunDefaults = {
  maxIterations: 10,
  agentFailurePolicy: 'replan',
  recordReasoning: false,
};

export interface RunResult {
  taskId: string;
  runId: string;
  status: 'completed' | 'failed';
  finalAnswer?: string;
  cause?: TerminalCause;
  /** Planning steps taken. */
  iterations: number;
  telemetry: readonly TelemetryEvent[];
  /** Session token held by each capability called during the run. */
  sessions: Record<string, string>;
}
