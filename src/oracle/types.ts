/**
 * Planning oracle contract.
 *
 * The oracle sees the task and the full transcript so far and answers with
 * exactly one of two actions. Anything the provider returns is folded into
 * this shape or raised as OracleError.
 */

import type { CapabilityDescriptor } from '../capabilities/agent-capability.js';
import type { OrchestrationStrategy, TaskMessage } from '../types/domain.js';
import type { TokenUsage } from '../telemetry/types.js';

export type InvokeCapability = {
  type: 'invoke';
  capability: string;
  message: string;
};

export type Conclude = {
  type: 'conclude';
  answer: string;
};

export type OracleAction = InvokeCapability | Conclude;

export interface OracleDecision {
  action: OracleAction;
  /** Provider model id, when a model call was made for this step. */
  model?: string;
  usage?: TokenUsage;
  /** Interim reasoning emitted next to the action, if any. */
  reasoning?: string;
}

export interface PlanningInput {
  taskTitle: string;
  taskDescription: string;
  transcript: readonly TaskMessage[];
  capabilities: readonly CapabilityDescriptor[];
}

export interface PlanningOracle {
  /** Telemetry target for this oracle's planning steps. */
  readonly name: string;
  plan(input: PlanningInput): Promise<OracleDecision>;
}

/** Builds a fresh oracle per task run; strategies may keep per-run state. */
export type OracleFactory = (strategy: OrchestrationStrategy) => PlanningOracle;
