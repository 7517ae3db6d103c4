/**
 * @fileoverview Error taxonomy for crew orchestration.
 *
 * Every failure the orchestrator can observe is an AppError subclass with a
 * stable `code`. Runs never surface raw exceptions to their caller; instead
 * the thrown value is folded into a TerminalCause via toTerminalCause().
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** No active member left to bind: a context cannot be built. */
export class EmptyCrewError extends AppError {
  constructor(crewId: string) {
    super(`Crew ${crewId} has no active agents`, 'EMPTY_CREW', false, { crewId });
    this.name = 'EmptyCrewError';
  }
}

/** Transport-level failure. Retried inside the capability, then surfaced. */
export class AgentUnavailableError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AGENT_UNAVAILABLE', true, context);
    this.name = 'AgentUnavailableError';
  }
}

/** The remote agent answered with an application-level failure. */
export class AgentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AGENT_ERROR', false, context);
    this.name = 'AgentError';
  }
}

export class TaskAlreadyTerminalError extends AppError {
  constructor(taskId: string, status: string) {
    super(`Task ${taskId} is already ${status}`, 'TASK_ALREADY_TERMINAL', false, { taskId, status });
    this.name = 'TaskAlreadyTerminalError';
  }
}

export class PlanningIterationLimitExceededError extends AppError {
  constructor(limit: number) {
    super(`Planning iteration limit of ${limit} exceeded`, 'PLANNING_ITERATION_LIMIT_EXCEEDED', false, { limit });
    this.name = 'PlanningIterationLimitExceededError';
  }
}

export class CancellationRequestedError extends AppError {
  constructor(reason = 'Task run was cancelled') {
    super(reason, 'CANCELLATION_REQUESTED', false);
    this.name = 'CancellationRequestedError';
  }
}

export class CrewNotFoundError extends AppError {
  constructor(crewId: string) {
    super(`Crew ${crewId} not found`, 'CREW_NOT_FOUND', false, { crewId });
    this.name = 'CrewNotFoundError';
  }
}

export class AgentNotFoundError extends AppError {
  constructor(agentId: string) {
    super(`Agent ${agentId} not found`, 'AGENT_NOT_FOUND', false, { agentId });
    this.name = 'AgentNotFoundError';
  }
}

export class TaskNotFoundError extends AppError {
  constructor(taskId: string) {
    super(`Task ${taskId} not found`, 'TASK_NOT_FOUND', false, { taskId });
    this.name = 'TaskNotFoundError';
  }
}

/** The planning model could not be reached or returned nothing usable. */
export class OracleError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ORACLE_ERROR', false, context);
    this.name = 'OracleError';
  }
}

export class InvalidTaskTransitionError extends AppError {
  constructor(taskId: string, from: string, to: string) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`, 'INVALID_TASK_TRANSITION', false, { taskId, from, to });
    this.name = 'InvalidTaskTransitionError';
  }
}

export class UnknownCapabilityError extends AppError {
  constructor(name: string) {
    super(`No capability named "${name}" in this crew`, 'UNKNOWN_CAPABILITY', true, { capability: name });
    this.name = 'UnknownCapabilityError';
  }
}

/** Duplicate (crew, agent) membership, bad input and similar caller mistakes. */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', false, context);
    this.name = 'ValidationError';
  }
}

export type TerminalCause = {
  code: string;
  message: string;
};

export function toTerminalCause(error: unknown): TerminalCause {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(error) };
}
