/**
 * @fileoverview Wires the orchestration services together.
 *
 * The server uses the config-driven defaults; tests pass their own store,
 * transport or oracle factory.
 */

import config from '../config.js';
import { createCapabilityBinder } from '../capabilities/binder.js';
import type { CallPolicy } from '../capabilities/agent-capability.js';
import { ExecutionContextCache } from '../context/cache.js';
import { createOracleFactory } from '../oracle/index.js';
import type { OracleFactory } from '../oracle/types.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { TaskRunner } from '../orchestrator/task-runner.js';
import type { RunDefaults } from '../orchestrator/types.js';
import { DirectLineTransport } from '../transport/direct-line.js';
import type { AgentTransport } from '../transport/types.js';
import { getStore, type SqliteStore } from './store/index.js';

export interface CrewRuntime {
  store: SqliteStore;
  cache: ExecutionContextCache;
  orchestrator: Orchestrator;
  runner: TaskRunner;
}

export interface CrewRuntimeOptions {
  store?: SqliteStore;
  transport?: AgentTransport;
  oracles?: OracleFactory;
  policy?: CallPolicy;
  runDefaults?: RunDefaults;
}

export function createCrewRuntime(options: CrewRuntimeOptions = {}): CrewRuntime {
  const store = options.store ?? getStore();

  const transport = options.transport ?? new DirectLineTransport({
    secret: config.directLine.secret ?? '',
    baseUrl: config.directLine.baseUrl,
    pollIntervalMs: config.directLine.pollIntervalMs,
    maxPolls: config.directLine.maxPolls,
  });

  const policy = options.policy ?? {
    retryDelaysMs: config.agents.retryDelaysMs,
    callTimeoutMs: config.agents.callTimeoutMs,
  };

  const oracles = options.oracles ?? createOracleFactory({
    model: config.oracle.model,
    maxTokens: config.oracle.maxTokens,
    maxSteps: config.oracle.maxPlanSteps,
  });

  const runDefaults = options.runDefaults ?? {
    maxIterations: config.orchestrator.maxIterations,
    agentFailurePolicy: config.orchestrator.agentFailurePolicy,
    recordReasoning: config.orchestrator.recordReasoning,
  };

  const cache = new ExecutionContextCache(store, createCapabilityBinder(transport, policy));
  const orchestrator = new Orchestrator({ tasks: store, telemetry: store, oracles, defaults: runDefaults });
  const runner = new TaskRunner({ tasks: store, cache, orchestrator });

  return { store, cache, orchestrator, runner };
}
