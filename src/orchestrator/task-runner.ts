/**
 * @fileoverview Background execution of task runs.
 *
 * Each started task gets its own AbortController. The tracked promise
 * never rejects: every failure ends up on the task as status `failed`
 * or, when even that cannot be written, in the error log.
 */

import { isTerminalStatus } from '../types/domain.js';
import { toTerminalCause } from '../utils/errors.js';
import { createLogger, createRunId, withLogContext } from '../utils/observability/index.js';
import type { ExecutionContextCache } from '../context/cache.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { TaskStore } from '../services/store/types.js';
import type { Orchestrator } from './orchestrator.js';
import { formatFailureMessage } from './orchestrator.js';
import type { RunOptions, RunResult } from './types.js';

const logger = createLogger({ domain: 'task-runner' });

export interface TaskRunnerDeps {
  tasks: TaskStore;
  cache: ExecutionContextCache;
  orchestrator: Orchestrator;
  /** Per-run options applied to every start(), e.g. from config. */
  runOptions?: Omit<RunOptions, 'signal' | 'runId'>;
}

export interface StartedRun {
  runId: string;
  /** Resolves with the run result, or null when the run never started. */
  done: Promise<RunResult | null>;
}

type RunningTask = StartedRun & { controller: AbortController };

export class TaskRunner {
  private readonly running = new Map<string, RunningTask>();

  constructor(private readonly deps: TaskRunnerDeps) {}

  /** Start a run in the background. Starting a task that is already running returns the existing run. */
  start(taskId: string): StartedRun {
    const existing = this.running.get(taskId);
    if (existing) {
      return { runId: existing.runId, done: existing.done };
    }

    const runId = createRunId();
    const controller = new AbortController();
    const done = this.execute(taskId, runId, controller.signal)
      .catch((error: unknown) => {
        logger.error('task_run_crashed', {
          taskId,
          runId,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      })
      .finally(() => {
        this.running.delete(taskId);
      });

    this.running.set(taskId, { runId, done, controller });
    return { runId, done };
  }

  /** Request cooperative cancellation. Returns false when the task is not running. */
  cancel(taskId: string, reason = 'Task run was cancelled'): boolean {
    const entry = this.running.get(taskId);
    if (!entry) return false;
    entry.controller.abort(reason);
    logger.info('task_cancel_requested', { taskId, runId: entry.runId });
    return true;
  }

  isRunning(taskId: string): boolean {
    return this.running.has(taskId);
  }

  get activeCount(): number {
    return this.running.size;
  }

  /** Wait for every running task to settle. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map((entry) => entry.done));
    }
  }

  private async execute(taskId: string, runId: string, signal: AbortSignal): Promise<RunResult | null> {
    const task = await this.deps.tasks.getTask(taskId);
    if (!task) {
      logger.warn('task_run_skipped', { taskId, reason: 'not_found' });
      return null;
    }
    if (isTerminalStatus(task.status)) {
      logger.warn('task_run_skipped', { taskId, reason: task.status });
      return null;
    }

    return withLogContext({ taskId, crewId: task.crewId, runId }, async () => {
      let context: ExecutionContext;
      try {
        context = await this.deps.cache.get(task.crewId);
      } catch (error) {
        await this.failBeforeRun(taskId, error);
        return null;
      }

      return this.deps.orchestrator.run(taskId, context, {
        ...this.deps.runOptions,
        signal,
        runId,
      });
    });
  }

  /** The context could not be built, e.g. no active agent is left. */
  private async failBeforeRun(taskId: string, error: unknown): Promise<void> {
    const cause = toTerminalCause(error);
    logger.warn('task_context_unavailable', { code: cause.code, error: cause.message });
    await this.deps.tasks.appendMessage(taskId, { author: 'system', content: formatFailureMessage(cause) });
    await this.deps.tasks.updateStatus(taskId, 'failed', { error: cause.message });
  }
}
