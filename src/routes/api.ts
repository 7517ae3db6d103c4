/**
 * @fileoverview JSON API for agents, crews and tasks.
 *
 * Thin handlers over the store, the context cache and the task runner.
 * There is no authentication here.
 *
 * Routes:
 * - GET    /api/agents                         - List agents
 * - POST   /api/agents                         - Register an agent
 * - PUT    /api/agents/:id                     - Update an agent
 * - DELETE /api/agents/:id                     - Deactivate an agent
 * - GET    /api/crews                          - List crews
 * - POST   /api/crews                          - Create a crew
 * - GET    /api/crews/:id                      - Get a crew
 * - POST   /api/crews/:id/members              - Add a member
 * - PUT    /api/crews/:id/members              - Replace every member
 * - PUT    /api/crews/:id/members/:agentId     - Change a member's role or position
 * - DELETE /api/crews/:id/members/:agentId     - Remove a member
 * - GET    /api/crews/:id/capabilities         - Capabilities the planner sees
 * - GET    /api/tasks                          - List tasks (crewId, status, limit)
 * - POST   /api/tasks                          - Create a task and start it
 * - GET    /api/tasks/:id                      - Task with transcript
 * - POST   /api/tasks/:id/messages             - Add a user message
 * - POST   /api/tasks/:id/cancel               - Cancel a running task
 * - GET    /api/tasks/:id/telemetry            - Telemetry of one task
 * - GET    /api/metrics                        - Aggregated telemetry and task stats
 */

import express, { Router, type Request, type Response } from 'express';
import type { ExecutionContextCache } from '../context/cache.js';
import type { TaskRunner } from '../orchestrator/task-runner.js';
import type { CrewAdmin, NewCrew, TaskStore, TelemetryStore } from '../services/store/types.js';
import { summarizeTelemetry } from '../telemetry/summary.js';
import type { OrchestrationStrategy, TaskStatus } from '../types/domain.js';
import { TaskNotFoundError } from '../utils/errors.js';
import {
  arrayField,
  badRequest,
  booleanField,
  hasField,
  numberField,
  sendError,
  stringField,
} from './http-errors.js';

export interface ApiDeps {
  store: CrewAdmin & TaskStore & TelemetryStore;
  cache: ExecutionContextCache;
  runner: TaskRunner;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function parseMembers(raw: unknown[]): NonNullable<NewCrew['members']> | string {
  const members: NonNullable<NewCrew['members']> = [];
  for (const entry of raw) {
    const agentId = stringField(entry, 'agentId');
    if (!agentId) {
      return 'Each member needs an agentId';
    }
    members.push({
      agentId,
      role: stringField(entry, 'role') ?? '',
      position: numberField(entry, 'position'),
    });
  }
  return members;
}

function parseStrategy(value: string | undefined): OrchestrationStrategy | null {
  if (value === undefined || value === 'dynamic') return 'dynamic';
  if (value === 'fixed_plan') return 'fixed_plan';
  return null;
}

const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'completed', 'failed'];
const MAX_TASK_LIST_LIMIT = 500;

function parseStatus(value: unknown): TaskStatus | null | undefined {
  if (value === undefined) return undefined;
  return TASK_STATUSES.find((status) => status === value) ?? null;
}

function parseLimit(value: unknown): number | null | undefined {
  if (value === undefined) return undefined;
  const limit = typeof value === 'string' ? Number(value) : NaN;
  return Number.isInteger(limit) && limit >= 1 && limit <= MAX_TASK_LIST_LIMIT ? limit : null;
}

export function createApiHandlers(deps: ApiDeps) {
  const { store, cache, runner } = deps;

  const invalidateAll = async (crewIds: readonly string[]): Promise<void> => {
    await Promise.all(crewIds.map((crewId) => cache.invalidate(crewId)));
  };

  /** GET /api/agents */
  const listAgents: Handler = async (_req, res) => {
    try {
      res.json({ agents: await store.listAgents() });
    } catch (error) {
      sendError(res, error, 'list agents');
    }
  };

  /** POST /api/agents */
  const createAgent: Handler = async (req, res) => {
    try {
      const name = stringField(req.body, 'name');
      const botId = stringField(req.body, 'botId');
      if (!name || !botId) {
        badRequest(res, 'Missing required fields: name, botId');
        return;
      }
      const agent = await store.createAgent({
        name,
        description: stringField(req.body, 'description') ?? '',
        connection: { kind: 'direct_line', botId },
        isActive: booleanField(req.body, 'isActive') ?? true,
      });
      res.status(201).json({ agent });
    } catch (error) {
      sendError(res, error, 'create agent');
    }
  };

  /** PUT /api/agents/:id */
  const updateAgent: Handler = async (req, res) => {
    try {
      const botId = stringField(req.body, 'botId');
      const { agent, affectedCrewIds } = await store.updateAgent(req.params.id, {
        name: stringField(req.body, 'name'),
        description: stringField(req.body, 'description'),
        connection: botId ? { kind: 'direct_line', botId } : undefined,
        isActive: booleanField(req.body, 'isActive'),
      });
      await invalidateAll(affectedCrewIds);
      res.json({ agent, affectedCrewIds });
    } catch (error) {
      sendError(res, error, 'update agent');
    }
  };

  /** DELETE /api/agents/:id (deactivates; members stay on their crews) */
  const deactivateAgent: Handler = async (req, res) => {
    try {
      const { agent, affectedCrewIds } = await store.updateAgent(req.params.id, { isActive: false });
      await invalidateAll(affectedCrewIds);
      res.json({ agent, affectedCrewIds });
    } catch (error) {
      sendError(res, error, 'deactivate agent');
    }
  };

  /** GET /api/crews */
  const listCrews: Handler = async (_req, res) => {
    try {
      res.json({ crews: await store.listCrews() });
    } catch (error) {
      sendError(res, error, 'list crews');
    }
  };

  /** POST /api/crews */
  const createCrew: Handler = async (req, res) => {
    try {
      const name = stringField(req.body, 'name');
      if (!name) {
        badRequest(res, 'Missing required field: name');
        return;
      }
      const members = parseMembers(arrayField(req.body, 'members') ?? []);
      if (typeof members === 'string') {
        badRequest(res, members);
        return;
      }
      const crew = await store.createCrew({
        name,
        description: stringField(req.body, 'description') ?? '',
        members,
      });
      res.status(201).json({ crew });
    } catch (error) {
      sendError(res, error, 'create crew');
    }
  };

  /** GET /api/crews/:id */
  const getCrew: Handler = async (req, res) => {
    try {
      const crew = await store.getCrew(req.params.id);
      if (!crew) {
        res.status(404).json({ error: 'Crew not found', code: 'CREW_NOT_FOUND' });
        return;
      }
      res.json({ crew });
    } catch (error) {
      sendError(res, error, 'get crew');
    }
  };

  /** POST /api/crews/:id/members */
  const addMember: Handler = async (req, res) => {
    try {
      const agentId = stringField(req.body, 'agentId');
      if (!agentId) {
        badRequest(res, 'Missing required field: agentId');
        return;
      }
      if (hasField(req.body, 'position') && numberField(req.body, 'position') === undefined) {
        badRequest(res, 'position must be an integer');
        return;
      }
      const crew = await store.addMember(req.params.id, {
        agentId,
        role: stringField(req.body, 'role') ?? '',
        position: numberField(req.body, 'position'),
      });
      await cache.invalidate(crew.id);
      res.status(201).json({ crew });
    } catch (error) {
      sendError(res, error, 'add crew member');
    }
  };

  /** PUT /api/crews/:id/members */
  const replaceMembers: Handler = async (req, res) => {
    try {
      const raw = arrayField(req.body, 'members');
      if (!raw) {
        badRequest(res, 'Missing required field: members');
        return;
      }
      const members = parseMembers(raw);
      if (typeof members === 'string') {
        badRequest(res, members);
        return;
      }
      const crew = await store.replaceMembers(req.params.id, members);
      await cache.invalidate(crew.id);
      res.json({ crew });
    } catch (error) {
      sendError(res, error, 'replace crew members');
    }
  };

  /** PUT /api/crews/:id/members/:agentId */
  const updateMember: Handler = async (req, res) => {
    try {
      if (hasField(req.body, 'position') && numberField(req.body, 'position') === undefined) {
        badRequest(res, 'position must be an integer');
        return;
      }
      if (hasField(req.body, 'role') && stringField(req.body, 'role') === undefined) {
        badRequest(res, 'role must be a string');
        return;
      }
      const crew = await store.updateMember(req.params.id, req.params.agentId, {
        role: stringField(req.body, 'role'),
        position: numberField(req.body, 'position'),
      });
      await cache.invalidate(crew.id);
      res.json({ crew });
    } catch (error) {
      sendError(res, error, 'update crew member');
    }
  };

  /** DELETE /api/crews/:id/members/:agentId */
  const removeMember: Handler = async (req, res) => {
    try {
      const crew = await store.removeMember(req.params.id, req.params.agentId);
      await cache.invalidate(crew.id);
      res.json({ crew });
    } catch (error) {
      sendError(res, error, 'remove crew member');
    }
  };

  /** GET /api/crews/:id/capabilities */
  const getCapabilities: Handler = async (req, res) => {
    try {
      const context = await cache.get(req.params.id);
      res.json({
        crewId: context.crewId,
        membershipVersion: context.membershipVersion,
        capabilities: context.describe(),
      });
    } catch (error) {
      sendError(res, error, 'list crew capabilities');
    }
  };

  /** GET /api/tasks?crewId=&status=&limit= (newest first) */
  const listTasks: Handler = async (req, res) => {
    try {
      const status = parseStatus(req.query.status);
      if (status === null) {
        badRequest(res, `status must be one of: ${TASK_STATUSES.join(', ')}`);
        return;
      }
      const limit = parseLimit(req.query.limit);
      if (limit === null) {
        badRequest(res, `limit must be an integer between 1 and ${MAX_TASK_LIST_LIMIT}`);
        return;
      }
      const crewId = typeof req.query.crewId === 'string' ? req.query.crewId : undefined;
      res.json({ tasks: await store.listTasks({ crewId, status, limit }) });
    } catch (error) {
      sendError(res, error, 'list tasks');
    }
  };

  /** POST /api/tasks (202: the run continues in the background) */
  const createTask: Handler = async (req, res) => {
    try {
      const title = stringField(req.body, 'title');
      const crewId = stringField(req.body, 'crewId');
      if (!title || !crewId) {
        badRequest(res, 'Missing required fields: title, crewId');
        return;
      }
      const strategy = parseStrategy(stringField(req.body, 'strategy'));
      if (!strategy) {
        badRequest(res, 'strategy must be "dynamic" or "fixed_plan"');
        return;
      }
      const task = await store.createTask({
        title,
        description: stringField(req.body, 'description') ?? title,
        crewId,
        strategy,
      });
      const { runId } = runner.start(task.id);
      res.status(202).json({ task, runId });
    } catch (error) {
      sendError(res, error, 'create task');
    }
  };

  /** GET /api/tasks/:id */
  const getTask: Handler = async (req, res) => {
    try {
      const task = await store.getTask(req.params.id);
      if (!task) {
        res.status(404).json({ error: 'Task not found', code: 'TASK_NOT_FOUND' });
        return;
      }
      const messages = await store.getMessages(task.id);
      res.json({ task, messages, running: runner.isRunning(task.id) });
    } catch (error) {
      sendError(res, error, 'get task');
    }
  };

  /** POST /api/tasks/:id/messages (409 once the task is completed or failed) */
  const addUserMessage: Handler = async (req, res) => {
    try {
      const content = stringField(req.body, 'content');
      if (!content || !content.trim()) {
        badRequest(res, 'Missing required field: content');
        return;
      }
      const message = await store.appendMessage(req.params.id, { author: 'user', content });
      res.status(201).json({ message });
    } catch (error) {
      sendError(res, error, 'add task message');
    }
  };

  /** POST /api/tasks/:id/cancel */
  const cancelTask: Handler = async (req, res) => {
    try {
      const task = await store.getTask(req.params.id);
      if (!task) {
        throw new TaskNotFoundError(req.params.id);
      }
      const cancelled = runner.cancel(task.id);
      res.status(cancelled ? 202 : 200).json({ taskId: task.id, cancelled, status: task.status });
    } catch (error) {
      sendError(res, error, 'cancel task');
    }
  };

  /** GET /api/tasks/:id/telemetry */
  const getTaskTelemetry: Handler = async (req, res) => {
    try {
      const task = await store.getTask(req.params.id);
      if (!task) {
        throw new TaskNotFoundError(req.params.id);
      }
      const events = await store.listEventsForTask(task.id);
      res.json({ taskId: task.id, events, summary: summarizeTelemetry(events) });
    } catch (error) {
      sendError(res, error, 'get task telemetry');
    }
  };

  /** GET /api/metrics?since=<epoch ms> */
  const getMetrics: Handler = async (req, res) => {
    try {
      const rawSince = typeof req.query.since === 'string' ? Number(req.query.since) : 0;
      if (!Number.isFinite(rawSince) || rawSince < 0) {
        badRequest(res, 'since must be a non-negative number of milliseconds');
        return;
      }
      const events = await store.listEventsSince(rawSince);
      res.json({
        since: rawSince,
        telemetry: summarizeTelemetry(events),
        tasks: await store.getTaskStats(rawSince),
        contextCache: cache.stats(),
        activeRuns: runner.activeCount,
      });
    } catch (error) {
      sendError(res, error, 'get metrics');
    }
  };

  return {
    listAgents,
    createAgent,
    updateAgent,
    deactivateAgent,
    listCrews,
    createCrew,
    getCrew,
    addMember,
    replaceMembers,
    updateMember,
    removeMember,
    getCapabilities,
    listTasks,
    createTask,
    getTask,
    addUserMessage,
    cancelTask,
    getTaskTelemetry,
    getMetrics,
  };
}

export function createApiRouter(deps: ApiDeps): Router {
  const handlers = createApiHandlers(deps);
  const router = Router();
  const json = express.json();

  router.get('/api/agents', handlers.listAgents);
  router.post('/api/agents', json, handlers.createAgent);
  router.put('/api/agents/:id', json, handlers.updateAgent);
  router.delete('/api/agents/:id', handlers.deactivateAgent);

  router.get('/api/crews', handlers.listCrews);
  router.post('/api/crews', json, handlers.createCrew);
  router.get('/api/crews/:id', handlers.getCrew);
  router.post('/api/crews/:id/members', json, handlers.addMember);
  router.put('/api/crews/:id/members', json, handlers.replaceMembers);
  router.put('/api/crews/:id/members/:agentId', json, handlers.updateMember);
  router.delete('/api/crews/:id/members/:agentId', handlers.removeMember);
  router.get('/api/crews/:id/capabilities', handlers.getCapabilities);

  router.get('/api/tasks', handlers.listTasks);
  router.post('/api/tasks', json, handlers.createTask);
  router.get('/api/tasks/:id', handlers.getTask);
  router.post('/api/tasks/:id/messages', json, handlers.addUserMessage);
  router.post('/api/tasks/:id/cancel', handlers.cancelTask);
  router.get('/api/tasks/:id/telemetry', handlers.getTaskTelemetry);

  router.get('/api/metrics', handlers.getMetrics);

  return router;
}
