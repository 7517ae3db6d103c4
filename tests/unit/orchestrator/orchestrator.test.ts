/**
 * Unit tests for the plan/call/observe loop.
 *
 * Runs against an in-memory SQLite store, the real capability binder and
 * context cache, a fake agent transport and a scripted oracle.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  setMockResponses,
  createTextResponse,
  clearMockState,
} from '../../mocks/anthropic.js';
import type { CallPolicy } from '../../../src/capabilities/agent-capability.js';
import { createCapabilityBinder } from '../../../src/capabilities/binder.js';
import { ExecutionContextCache } from '../../../src/context/cache.js';
import { createOracleFactory } from '../../../src/oracle/index.js';
import type { OracleFactory } from '../../../src/oracle/types.js';
import { Orchestrator } from '../../../src/orchestrator/orchestrator.js';
import { SqliteStore } from '../../../src/services/store/sqlite.js';
import { DirectLineTransport } from '../../../src/transport/direct-line.js';
import type { AgentTransport } from '../../../src/transport/types.js';
import {
  AgentError,
  AgentUnavailableError,
  TaskAlreadyTerminalError,
  TaskNotFoundError,
  ValidationError,
} from '../../../src/utils/errors.js';
import {
  FakeTransport,
  ScriptedOracle,
  conclude,
  invoke,
  seedCrew,
  type SeedAgent,
  type TransportCall,
} from '../../helpers/fakes.js';

type Respond = ConstructorParameters<typeof FakeTransport>[0];

describe('Orchestrator', () => {
  let store: SqliteStore;
  let transport: FakeTransport;
  let cache: ExecutionContextCache;

  function useTransport(respond?: Respond, policy: Partial<CallPolicy> = {}): void {
    transport = new FakeTransport(respond);
    bindTo(transport, policy);
  }

  function bindTo(agentTransport: AgentTransport, policy: Partial<CallPolicy> = {}): void {
    cache = new ExecutionContextCache(
      store,
      createCapabilityBinder(agentTransport, { retryDelaysMs: [], callTimeoutMs: 1000, ...policy })
    );
  }

  function orchestrator(oracles: OracleFactory): Orchestrator {
    return new Orchestrator({ tasks: store, telemetry: store, oracles });
  }

  async function setup(agents: SeedAgent[], title = 'Answer the question') {
    const seeded = await seedCrew(store, agents);
    const task = await store.createTask({ title, description: '', crewId: seeded.crew.id });
    const context = await cache.get(seeded.crew.id);
    return { ...seeded, task, context };
  }

  beforeEach(() => {
    store = new SqliteStore(':memory:');
    useTransport();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    store.close();
  });

  it('completes on the first planning step when the oracle concludes', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([conclude('42')]);

    const result = await orchestrator(() => oracle).run(task.id, context);

    expect(result).toMatchObject({ status: 'completed', finalAnswer: '42', iterations: 1, sessions: {} });
    expect(transport.calls).toEqual([]);
    expect(result.telemetry).toHaveLength(1);
    expect(result.telemetry[0]).toMatchObject({
      kind: 'oracle_call',
      target: 'scripted',
      model: 'claude-sonnet-4-5-20250929',
      iteration: 1,
      success: true,
      inputTokens: 100,
      outputTokens: 20,
    });

    const messages = await store.getMessages(task.id);
    expect(messages.map((m) => [m.author, m.content])).toEqual([['system', '42']]);
    expect(await store.getTask(task.id)).toMatchObject({ status: 'completed', result: '42', error: null });
    expect(await store.listEventsForTask(task.id)).toHaveLength(1);
  });

  it('calls an agent, shows the reply to the next planning step, then concludes', async () => {
    const { task, context, agents } = await setup([{ name: 'Researcher' }, { name: 'Writer' }]);
    const oracle = new ScriptedOracle([invoke('ask_researcher', 'Find facts'), conclude('Summary')]);

    const result = await orchestrator(() => oracle).run(task.id, context);

    expect(result.status).toBe('completed');
    expect(result.iterations).toBe(2);
    expect(result.sessions).toEqual({ ask_researcher: 'session-1' });
    expect(transport.calls).toEqual([{ botId: 'bot-researcher', message: 'Find facts', sessionToken: undefined }]);

    expect(oracle.inputs[0].transcript).toEqual([]);
    expect(oracle.inputs[1].transcript.map((m) => m.content)).toEqual(['reply to: Find facts']);
    expect(oracle.inputs[1].capabilities.map((c) => c.name)).toEqual(['ask_researcher', 'ask_writer']);

    const messages = await store.getMessages(task.id);
    expect(messages.map((m) => [m.author, m.agentId, m.content])).toEqual([
      ['agent', agents[0].id, 'reply to: Find facts'],
      ['system', null, 'Summary'],
    ]);
    expect(result.telemetry.map((e) => [e.kind, e.target, e.iteration])).toEqual([
      ['oracle_call', 'scripted', 1],
      ['agent_call', 'ask_researcher', 1],
      ['oracle_call', 'scripted', 2],
    ]);
    expect(result.telemetry[1].agentId).toBe(agents[0].id);
  });

  it('continues the same agent conversation within a run', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([
      invoke('ask_researcher', 'first'),
      invoke('ask_researcher', 'second'),
      conclude('done'),
    ]);

    const result = await orchestrator(() => oracle).run(task.id, context);

    expect(transport.calls.map((call) => call.sessionToken)).toEqual([undefined, 'session-1']);
    expect(result.sessions).toEqual({ ask_researcher: 'session-2' });
  });

  it('fails the task on an agent failure under the fail policy', async () => {
    useTransport(() => new AgentUnavailableError('HTTP 503'));
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([invoke('ask_researcher', 'Find facts'), conclude('unreachable')]);

    const result = await orchestrator(() => oracle).run(task.id, context, { agentFailurePolicy: 'fail' });

    expect(result.status).toBe('failed');
    expect(result.cause).toEqual({ code: 'AGENT_UNAVAILABLE', message: 'HTTP 503' });
    expect(result.finalAnswer).toBeUndefined();
    expect(oracle.inputs).toHaveLength(1);

    const messages = await store.getMessages(task.id);
    expect(messages.map((m) => m.content)).toEqual(['Task failed [AGENT_UNAVAILABLE]: HTTP 503']);
    expect(await store.getTask(task.id)).toMatchObject({ status: 'failed', error: 'HTTP 503', result: null });
    expect(result.telemetry[1]).toMatchObject({ kind: 'agent_call', success: false, error: 'HTTP 503' });
  });

  it('records the failure as an observation and plans again under the replan policy', async () => {
    useTransport(() => new AgentError('Agent rejected the request'));
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([invoke('ask_researcher', 'Find facts'), conclude('Best effort answer')]);

    const result = await orchestrator(() => oracle).run(task.id, context, { agentFailurePolicy: 'replan' });

    expect(result).toMatchObject({ status: 'completed', finalAnswer: 'Best effort answer', sessions: {} });
    const observation = 'Call to ask_researcher failed [AGENT_ERROR]: Agent rejected the request';
    expect(oracle.inputs[1].transcript.map((m) => m.content)).toEqual([observation]);
    expect((await store.getMessages(task.id)).map((m) => m.content)).toEqual([observation, 'Best effort answer']);
  });

  it('plans again after every retry of an unavailable agent is spent under the replan policy', async () => {
    useTransport(() => new AgentUnavailableError('HTTP 503'), { retryDelaysMs: [0, 0], sleep: async () => {} });
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([invoke('ask_researcher', 'Find facts'), conclude('Answered without help')]);

    const result = await orchestrator(() => oracle).run(task.id, context, { agentFailurePolicy: 'replan' });

    expect(result).toMatchObject({ status: 'completed', finalAnswer: 'Answered without help', sessions: {} });
    expect(transport.calls).toHaveLength(3);
    const agentCalls = result.telemetry.filter((event) => event.kind === 'agent_call');
    expect(agentCalls).toHaveLength(1);
    expect(agentCalls[0]).toMatchObject({ target: 'ask_researcher', success: false, error: 'HTTP 503' });

    const observation = 'Call to ask_researcher failed [AGENT_UNAVAILABLE]: HTTP 503';
    expect(oracle.inputs[1].transcript.map((m) => m.content)).toEqual([observation]);
    expect(await store.getTask(task.id)).toMatchObject({ status: 'completed', result: 'Answered without help' });
  });

  it('treats a Direct Line reply that is not JSON as an agent failure under the replan policy', async () => {
    const responses = [
      new Response(JSON.stringify({ conversationId: 'conv-1' }), { status: 201 }),
      new Response(JSON.stringify({ id: 'conv-1|0001' }), { status: 200 }),
      new Response('not json', { status: 200 }),
    ];
    vi.stubGlobal('fetch', vi.fn(async () => {
      const next = responses.shift();
      if (!next) throw new Error('Unexpected fetch');
      return next;
    }));
    bindTo(new DirectLineTransport({
      secret: 'test-secret',
      baseUrl: 'https://directline.test/v3/directline',
      pollIntervalMs: 1,
      maxPolls: 1,
    }));
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([invoke('ask_researcher', 'Find facts'), conclude('Fallback answer')]);

    const result = await orchestrator(() => oracle).run(task.id, context, { agentFailurePolicy: 'replan' });

    expect(result).toMatchObject({ status: 'completed', finalAnswer: 'Fallback answer' });
    expect(oracle.inputs[1].transcript.map((m) => m.content)).toEqual([
      'Call to ask_researcher failed [AGENT_ERROR]: Get activities returned a malformed body',
    ]);
  });

  it('fails on errors that are not agent failures regardless of policy', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([new Error('model exploded')]);

    const result = await orchestrator(() => oracle).run(task.id, context, { agentFailurePolicy: 'replan' });

    expect(result.cause).toEqual({ code: 'INTERNAL_ERROR', message: 'model exploded' });
    expect(result.telemetry).toHaveLength(1);
    expect(result.telemetry[0]).toMatchObject({ kind: 'oracle_call', success: false, error: 'model exploded' });
    expect(result.telemetry[0].inputTokens).toBeUndefined();
  });

  it('treats an unknown capability as an observation without an agent call', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([invoke('ask_lawyer', 'Review'), conclude('ok')]);

    const result = await orchestrator(() => oracle).run(task.id, context);

    expect(result.status).toBe('completed');
    expect(transport.calls).toEqual([]);
    expect(result.telemetry.map((e) => e.kind)).toEqual(['oracle_call', 'oracle_call']);
    expect((await store.getMessages(task.id)).map((m) => m.content)).toEqual([
      'Call to ask_lawyer failed [UNKNOWN_CAPABILITY]: No capability named "ask_lawyer" in this crew',
      'ok',
    ]);
  });

  it('fails once the iteration bound is reached', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([
      invoke('ask_researcher', 'one'),
      invoke('ask_researcher', 'two'),
      invoke('ask_researcher', 'three'),
    ]);

    const result = await orchestrator(() => oracle).run(task.id, context, { maxIterations: 2 });

    expect(result.status).toBe('failed');
    expect(result.iterations).toBe(2);
    expect(result.cause).toEqual({
      code: 'PLANNING_ITERATION_LIMIT_EXCEEDED',
      message: 'Planning iteration limit of 2 exceeded',
    });
    expect(transport.calls.map((call) => call.message)).toEqual(['one', 'two']);
    const messages = await store.getMessages(task.id);
    expect(messages[messages.length - 1].content).toBe(
      'Task failed [PLANNING_ITERATION_LIMIT_EXCEEDED]: Planning iteration limit of 2 exceeded'
    );
  });

  it('appends the oracle reasoning when asked to', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([invoke('ask_researcher', 'q'), conclude('a')], 'thinking');

    await orchestrator(() => oracle).run(task.id, context, { recordReasoning: true });

    expect((await store.getMessages(task.id)).map((m) => [m.author, m.content])).toEqual([
      ['system', 'thinking'],
      ['agent', 'reply to: q'],
      ['system', 'thinking'],
      ['system', 'a'],
    ]);
  });

  it('keeps the transcript strictly ordered by creation time', async () => {
    const { task, context } = await setup([{ name: 'Researcher' }]);
    const oracle = new ScriptedOracle([
      invoke('ask_researcher', '1'),
      invoke('ask_researcher', '2'),
      invoke('ask_researcher', '3'),
      conclude('end'),
    ]);

    await orchestrator(() => oracle).run(task.id, context);

    const times = (await store.getMessages(task.id)).map((m) => m.createdAt);
    expect(times).toHaveLength(4);
    for (let i = 1; i < times.length; i++) {
      expect(times[i]).toBeGreaterThan(times[i - 1]);
    }
  });

  describe('cancellation', () => {
    it('stops before the first planning step', async () => {
      const { task, context } = await setup([{ name: 'Researcher' }]);
      const oracle = new ScriptedOracle([conclude('never')]);
      const controller = new AbortController();
      controller.abort('Stopped by operator');

      const result = await orchestrator(() => oracle).run(task.id, context, { signal: controller.signal });

      expect(result).toMatchObject({
        status: 'failed',
        iterations: 0,
        cause: { code: 'CANCELLATION_REQUESTED', message: 'Stopped by operator' },
      });
      expect(oracle.inputs).toEqual([]);
      expect(result.telemetry).toEqual([]);
    });

    it('does not invoke an agent after a cancel arriving during planning', async () => {
      const { task, context } = await setup([{ name: 'Researcher' }]);
      const controller = new AbortController();
      const oracle = new ScriptedOracle([
        () => {
          controller.abort();
          return invoke('ask_researcher', 'too late');
        },
      ]);

      const result = await orchestrator(() => oracle).run(task.id, context, { signal: controller.signal });

      expect(result.cause).toEqual({ code: 'CANCELLATION_REQUESTED', message: 'Task run was cancelled' });
      expect(transport.calls).toEqual([]);
      expect(await store.getTask(task.id)).toMatchObject({ status: 'failed', error: 'Task run was cancelled' });
    });
  });

  describe('preconditions', () => {
    it('rejects an unknown task', async () => {
      const { context } = await setup([{ name: 'Researcher' }]);

      await expect(orchestrator(() => new ScriptedOracle([])).run('missing', context))
        .rejects.toBeInstanceOf(TaskNotFoundError);
    });

    it('rejects a terminal task and leaves it untouched', async () => {
      const { task, context } = await setup([{ name: 'Researcher' }]);
      await orchestrator(() => new ScriptedOracle([conclude('first')])).run(task.id, context);

      const second = new ScriptedOracle([conclude('second')]);
      await expect(orchestrator(() => second).run(task.id, context)).rejects.toBeInstanceOf(TaskAlreadyTerminalError);

      expect(second.inputs).toEqual([]);
      expect((await store.getMessages(task.id)).map((m) => m.content)).toEqual(['first']);
      expect(await store.getTask(task.id)).toMatchObject({ status: 'completed', result: 'first' });
    });

    it('rejects a context built for another crew', async () => {
      const { task } = await setup([{ name: 'Researcher' }]);
      const other = await seedCrew(store, [{ name: 'Writer' }], 'Other crew');
      const otherContext = await cache.get(other.crew.id);

      await expect(orchestrator(() => new ScriptedOracle([])).run(task.id, otherContext))
        .rejects.toBeInstanceOf(ValidationError);
      expect(await store.getTask(task.id)).toMatchObject({ status: 'pending' });
    });
  });

  it('gives concurrent runs on one context separate agent sessions', async () => {
    const seeded = await seedCrew(store, [{ name: 'Researcher' }]);
    const taskA = await store.createTask({ title: 'A', description: '', crewId: seeded.crew.id });
    const taskB = await store.createTask({ title: 'B', description: '', crewId: seeded.crew.id });
    const context = await cache.get(seeded.crew.id);
    const runner = orchestrator(() => new ScriptedOracle([
      (input) => invoke('ask_researcher', `${input.taskTitle} step 1`),
      (input) => invoke('ask_researcher', `${input.taskTitle} step 2`),
      conclude('done'),
    ]));

    const [resultA, resultB] = await Promise.all([
      runner.run(taskA.id, context),
      runner.run(taskB.id, context),
    ]);

    expect(resultA.status).toBe('completed');
    expect(resultB.status).toBe('completed');

    // Tokens are issued in call order: the call at index i receives session-(i+1).
    const issuedTo = (message: string): string => `session-${transport.calls.findIndex((call) => call.message === message) + 1}`;
    const callFor = (message: string): TransportCall | undefined => transport.calls.find((call) => call.message === message);

    expect(callFor('A step 1')?.sessionToken).toBeUndefined();
    expect(callFor('B step 1')?.sessionToken).toBeUndefined();
    expect(callFor('A step 2')?.sessionToken).toBe(issuedTo('A step 1'));
    expect(callFor('B step 2')?.sessionToken).toBe(issuedTo('B step 1'));
    expect(resultA.sessions.ask_researcher).toBe(issuedTo('A step 2'));
    expect(resultB.sessions.ask_researcher).toBe(issuedTo('B step 2'));
  });

  describe('fixed plan strategy', () => {
    beforeEach(() => {
      clearMockState();
    });

    it('replays the plan and concludes with the aggregated answer', async () => {
      const seeded = await seedCrew(store, [{ name: 'Researcher' }, { name: 'Writer' }]);
      const task = await store.createTask({
        title: 'Brief',
        description: 'Write a brief on heat pumps',
        crewId: seeded.crew.id,
        strategy: 'fixed_plan',
      });
      const context = await cache.get(seeded.crew.id);
      setMockResponses([
        createTextResponse(JSON.stringify({
          steps: [
            { capability: 'ask_researcher', message: 'Collect facts' },
            { capability: 'ask_writer', message: 'Write it up' },
          ],
        })),
        createTextResponse('Final brief'),
      ]);
      const oracles = createOracleFactory({ model: 'test-model', maxTokens: 1024, maxSteps: 3 });

      const result = await orchestrator(oracles).run(task.id, context);

      expect(result).toMatchObject({ status: 'completed', finalAnswer: 'Final brief', iterations: 3 });
      expect(transport.calls.map((call) => [call.botId, call.message])).toEqual([
        ['bot-researcher', 'Collect facts'],
        ['bot-writer', 'Write it up'],
      ]);
      expect(result.telemetry.map((e) => [e.kind, e.target])).toEqual([
        ['oracle_call', 'fixed_plan'],
        ['agent_call', 'ask_researcher'],
        ['oracle_call', 'fixed_plan'],
        ['agent_call', 'ask_writer'],
        ['oracle_call', 'fixed_plan'],
      ]);
      expect(result.telemetry[2].model).toBeUndefined();
    });
  });
});
