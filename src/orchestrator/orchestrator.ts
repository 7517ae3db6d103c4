/**
 * @fileoverview Plan/call/observe loop for one task run.
 *
 * Planning -> Invoking -> Planning ... -> Done | Failed.
 *
 * Every planning step and every agent call is bracketed by a telemetry
 * event. Each planning step sees the transcript up to and including the
 * previous call's result. A run never throws once it has started: any
 * failure ends as status `failed` with a terminal cause message.
 */

import {
  AgentError,
  AgentUnavailableError,
  CancellationRequestedError,
  PlanningIterationLimitExceededError,
  TaskAlreadyTerminalError,
  TaskNotFoundError,
  UnknownCapabilityError,
  ValidationError,
  toTerminalCause,
  type TerminalCause,
} from '../utils/errors.js';
import { createLogger, createRunId, withLogContext } from '../utils/observability/index.js';
import { isTerminalStatus, type Task } from '../types/domain.js';
import type { CapabilitySet } from '../capabilities/capability-set.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { OracleDecision, OracleFactory, PlanningInput, PlanningOracle } from '../oracle/types.js';
import type { TaskStore, TelemetryStore } from '../services/store/types.js';
import { TelemetryRecorder } from '../telemetry/recorder.js';
import { DEFAULT_RUN_OPTIONS, type RunDefaults, type RunOptions, type RunResult } from './types.js';

const logger = createLogger({ domain: 'orchestrator' });

export interface OrchestratorDeps {
  tasks: TaskStore;
  telemetry: TelemetryStore;
  oracles: OracleFactory;
  defaults?: Partial<RunDefaults>;
  now?: () => number;
}

type RunState = {
  task: Task;
  runId: string;
  options: RunDefaults & { signal?: AbortSignal };
  oracle: PlanningOracle;
  capabilities: CapabilitySet;
  recorder: TelemetryRecorder;
  iterations: number;
};

function isAgentFailure(error: unknown): boolean {
  return error instanceof AgentUnavailableError || error instanceof AgentError;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw new CancellationRequestedError(typeof reason === 'string' && reason ? reason : undefined);
}

export function formatFailureMessage(cause: TerminalCause): string {
  return `Task failed [${cause.code}]: ${cause.message}`;
}

export function formatObservation(capability: string, cause: TerminalCause): string {
  return `Call to ${capability} failed [${cause.code}]: ${cause.message}`;
}

export class Orchestrator {
  private readonly defaults: RunDefaults;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.defaults = { ...DEFAULT_RUN_OPTIONS, ...deps.defaults };
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run the task to completion against the given context.
   *
   * Rejects (without touching the task) when the task is unknown, belongs
   * to another crew, or is already terminal. Otherwise always resolves.
   */
  async run(taskId: string, context: ExecutionContext, options: RunOptions = {}): Promise<RunResult> {
    const task = await this.deps.tasks.getTask(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (isTerminalStatus(task.status)) {
      throw new TaskAlreadyTerminalError(taskId, task.status);
    }
    if (task.crewId !== context.crewId) {
      throw new ValidationError(`Task ${taskId} belongs to crew ${task.crewId}, not ${context.crewId}`);
    }

    const runId = options.runId ?? createRunId();
    // Claims the task; a concurrent second run fails the transition here.
    await this.deps.tasks.updateStatus(taskId, 'in_progress');

    const state: RunState = {
      task,
      runId,
      options: {
        maxIterations: options.maxIterations ?? this.defaults.maxIterations,
        agentFailurePolicy: options.agentFailurePolicy ?? this.defaults.agentFailurePolicy,
        recordReasoning: options.recordReasoning ?? this.defaults.recordReasoning,
        signal: options.signal,
      },
      oracle: this.deps.oracles(task.strategy),
      capabilities: context.forRun(),
      recorder: new TelemetryRecorder(taskId, runId, this.now),
      iterations: 0,
    };

    return withLogContext({ taskId, crewId: task.crewId, runId }, () => this.execute(state, context));
  }

  private async execute(state: RunState, context: ExecutionContext): Promise<RunResult> {
    const startedAt = this.now();
    logger.info('task_run_started', {
      strategy: state.task.strategy,
      membershipVersion: context.membershipVersion,
      capabilities: state.capabilities.size,
      maxIterations: state.options.maxIterations,
    });

    let result: RunResult;
    try {
      const answer = await this.loop(state);
      result = await this.complete(state, answer);
    } catch (error) {
      result = await this.fail(state, error);
    }

    await this.persistTelemetry(state);
    logger.info('task_run_finished', {
      status: result.status,
      code: result.cause?.code,
      iterations: result.iterations,
      durationMs: this.now() - startedAt,
    });
    return result;
  }

  /** Returns the final answer; throws the terminal cause otherwise. */
  private async loop(state: RunState): Promise<string> {
    const { task, options } = state;
    const descriptors = state.capabilities.describe();

    for (;;) {
      throwIfCancelled(options.signal);
      if (state.iterations >= options.maxIterations) {
        throw new PlanningIterationLimitExceededError(options.maxIterations);
      }
      state.iterations++;

      const transcript = await this.deps.tasks.getMessages(task.id);
      const decision = await this.planStep(state, {
        taskTitle: task.title,
        taskDescription: task.description,
        transcript,
        capabilities: descriptors,
      });

      if (options.recordReasoning && decision.reasoning) {
        await this.deps.tasks.appendMessage(task.id, { author: 'system', content: decision.reasoning });
      }

      const action = decision.action;
      switch (action.type) {
        case 'conclude':
          return action.answer;
        case 'invoke':
          throwIfCancelled(options.signal);
          await this.invokeStep(state, action.capability, action.message);
          break;
      }
    }
  }

  private async planStep(state: RunState, input: PlanningInput): Promise<OracleDecision> {
    const handle = state.recorder.begin('oracle_call', state.oracle.name, { iteration: state.iterations });
    try {
      const decision = await state.oracle.plan(input);
      handle.end({ success: true, model: decision.model, usage: decision.usage });
      logger.debug('planning_step', {
        iteration: state.iterations,
        action: decision.action.type,
        capability: decision.action.type === 'invoke' ? decision.action.capability : undefined,
      });
      return decision;
    } catch (error) {
      handle.end({ success: false, error: toTerminalCause(error).message });
      throw error;
    }
  }

  /**
   * One agent call. Soft failures are written to the transcript as an
   * observation and return normally so the loop plans again.
   */
  private async invokeStep(state: RunState, name: string, message: string): Promise<void> {
    const taskId = state.task.id;
    const capability = state.capabilities.get(name);
    if (!capability) {
      const cause = toTerminalCause(new UnknownCapabilityError(name));
      logger.warn('unknown_capability', { capability: name, iteration: state.iterations });
      await this.deps.tasks.appendMessage(taskId, { author: 'system', content: formatObservation(name, cause) });
      return;
    }

    const handle = state.recorder.begin('agent_call', capability.name, {
      iteration: state.iterations,
      agentId: capability.agentId,
    });

    let reply: string;
    try {
      reply = await capability.invoke(message);
      handle.end({ success: true });
    } catch (error) {
      const cause = toTerminalCause(error);
      handle.end({ success: false, error: cause.message });
      if (!isAgentFailure(error) || state.options.agentFailurePolicy === 'fail') {
        throw error;
      }
      logger.warn('agent_call_failed_replanning', {
        capability: capability.name,
        agentId: capability.agentId,
        code: cause.code,
      });
      await this.deps.tasks.appendMessage(taskId, {
        author: 'system',
        content: formatObservation(capability.name, cause),
      });
      return;
    }

    await this.deps.tasks.appendMessage(taskId, {
      author: 'agent',
      agentId: capability.agentId,
      content: reply,
    });
  }

  private async complete(state: RunState, answer: string): Promise<RunResult> {
    const taskId = state.task.id;
    await this.deps.tasks.appendMessage(taskId, { author: 'system', content: answer });
    await this.deps.tasks.updateStatus(taskId, 'completed', { result: answer });
    return {
      taskId,
      runId: state.runId,
      status: 'completed',
      finalAnswer: answer,
      iterations: state.iterations,
      telemetry: state.recorder.events(),
      sessions: state.capabilities.sessions(),
    };
  }

  private async fail(state: RunState, error: unknown): Promise<RunResult> {
    const taskId = state.task.id;
    const cause = toTerminalCause(error);
    logger.warn('task_run_failed', { code: cause.code, error: cause.message, iteration: state.iterations });

    try {
      await this.deps.tasks.appendMessage(taskId, { author: 'system', content: formatFailureMessage(cause) });
      await this.deps.tasks.updateStatus(taskId, 'failed', { error: cause.message });
    } catch (persistError) {
      logger.error('task_failure_not_persisted', {
        code: cause.code,
        error: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }

    return {
      taskId,
      runId: state.runId,
      status: 'failed',
      cause,
      iterations: state.iterations,
      telemetry: state.recorder.events(),
      sessions: state.capabilities.sessions(),
    };
  }

  private async persistTelemetry(state: RunState): Promise<void> {
    const events = state.recorder.events();
    if (events.length === 0) return;
    try {
      await this.deps.telemetry.insertEvents(events);
    } catch (error) {
      logger.error('telemetry_not_persisted', {
        count: events.length,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
