/**
 * @fileoverview SQLite store for agents, crews, tasks and telemetry.
 *
 * One database backs the crew repository read by the context cache, the
 * task transcript the orchestrator appends to, and the telemetry sink.
 * Every membership change bumps the crew's membership_version inside the
 * same transaction as the change.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import {
  AgentNotFoundError,
  CrewNotFoundError,
  InvalidTaskTransitionError,
  TaskAlreadyTerminalError,
  TaskNotFoundError,
  ValidationError,
} from '../../utils/errors.js';
import { isTerminalStatus } from '../../types/domain.js';
import type {
  Agent,
  AgentConnection,
  Crew,
  CrewMember,
  NewTaskMessage,
  OrchestrationStrategy,
  Task,
  TaskMessage,
  TaskStatus,
} from '../../types/domain.js';
import type { TelemetryEvent, TelemetryKind } from '../../telemetry/types.js';
import type {
  AgentUpdate,
  CrewAdmin,
  CrewMembership,
  CrewRepository,
  MemberUpdate,
  NewAgent,
  NewCrew,
  NewTask,
  TaskStats,
  TaskStore,
  TelemetryStore,
} from './types.js';

type AgentRow = {
  id: string;
  name: string;
  description: string;
  connection_json: string;
  is_active: number;
  created_at: number;
  updated_at: number;
};

type CrewRow = {
  id: string;
  name: string;
  description: string;
  membership_version: number;
  created_at: number;
  updated_at: number;
};

type MemberRow = {
  crew_id: string;
  agent_id: string;
  role: string;
  position: number;
};

type TaskRow = {
  id: string;
  title: string;
  description: string;
  crew_id: string;
  status: TaskStatus;
  strategy: OrchestrationStrategy;
  result: string | null;
  error: string | null;
  created_at: number;
  updated_at: number;
};

type MessageRow = {
  id: string;
  task_id: string;
  author: TaskMessage['author'];
  agent_id: string | null;
  content: string;
  created_at: number;
};

type TelemetryRow = {
  id: string;
  task_id: string;
  run_id: string;
  kind: TelemetryKind;
  target: string;
  agent_id: string | null;
  model: string | null;
  iteration: number;
  started_at: number;
  ended_at: number;
  latency_ms: number;
  success: number;
  error: string | null;
  input_tokens: number | null;
  output_tokens: number | null;
  cost_usd: number | null;
};

/** Allowed status moves. Terminal statuses have none. */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['in_progress', 'failed'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
};

function parseConnection(json: string): AgentConnection {
  const parsed = JSON.parse(json) as Partial<AgentConnection>;
  return { kind: 'direct_line', botId: typeof parsed.botId === 'string' ? parsed.botId : '' };
}

function toAgent(row: AgentRow): Agent {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    connection: parseConnection(row.connection_json),
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    crewId: row.crew_id,
    status: row.status,
    strategy: row.strategy,
    result: row.result,
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toMessage(row: MessageRow): TaskMessage {
  return {
    id: row.id,
    taskId: row.task_id,
    author: row.author,
    agentId: row.agent_id,
    content: row.content,
    createdAt: row.created_at,
  };
}

function toEvent(row: TelemetryRow): TelemetryEvent {
  return Object.freeze({
    id: row.id,
    taskId: row.task_id,
    runId: row.run_id,
    kind: row.kind,
    target: row.target,
    agentId: row.agent_id ?? undefined,
    model: row.model ?? undefined,
    iteration: row.iteration,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    latencyMs: row.latency_ms,
    success: row.success === 1,
    error: row.error ?? undefined,
    inputTokens: row.input_tokens ?? undefined,
    outputTokens: row.output_tokens ?? undefined,
    costUsd: row.cost_usd ?? undefined,
  });
}

/**
 * SQLite implementation of every persistence collaborator.
 * Pass ':memory:' for an in-process database.
 */
export class SqliteStore implements CrewRepository, CrewAdmin, TaskStore, TelemetryStore {
  private db: Database.Database;

  constructor(dbPath: string, private readonly now: () => number = Date.now) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS agents (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        connection_json TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS crews (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        membership_version INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS crew_members (
        crew_id TEXT NOT NULL REFERENCES crews(id) ON DELETE CASCADE,
        agent_id TEXT NOT NULL REFERENCES agents(id),
        role TEXT NOT NULL DEFAULT '',
        position INTEGER NOT NULL,
        PRIMARY KEY (crew_id, agent_id)
      );

      CREATE INDEX IF NOT EXISTS idx_crew_members_agent
        ON crew_members(agent_id);

      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT NOT NULL,
        crew_id TEXT NOT NULL REFERENCES crews(id),
        status TEXT NOT NULL DEFAULT 'pending',
        strategy TEXT NOT NULL DEFAULT 'dynamic',
        result TEXT,
        error TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_crew
        ON tasks(crew_id, created_at DESC);

      CREATE TABLE IF NOT EXISTS task_messages (
        id TEXT PRIMARY KEY,
        task_id TEXT NOT NULL REFERENCES tasks(id),
        author TEXT NOT NULL,
        agent_id TEXT,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        UNIQUE (task_id, created_at)
      );

      CREATE TABLE IF NOT EXISTS telemetry_events (
        id TEXT PRIMARY KEY,
        task_id TEXT NOT NULL,
        run_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        target TEXT NOT NULL,
        agent_id TEXT,
        model TEXT,
        iteration INTEGER NOT NULL,
        started_at INTEGER NOT NULL,
        ended_at INTEGER NOT NULL,
        latency_ms INTEGER NOT NULL,
        success INTEGER NOT NULL,
        error TEXT,
        input_tokens INTEGER,
        output_tokens INTEGER,
        cost_usd REAL
      );

      CREATE INDEX IF NOT EXISTS idx_telemetry_task
        ON telemetry_events(task_id, started_at);

      CREATE INDEX IF NOT EXISTS idx_telemetry_started
        ON telemetry_events(started_at);
    `);
  }

  // ---------------------------------------------------------------------------
  // Agents
  // ---------------------------------------------------------------------------

  async createAgent(input: NewAgent): Promise<Agent> {
    if (!input.name.trim()) {
      throw new ValidationError('Agent name is required');
    }
    const now = this.now();
    const id = randomUUID();
    this.db.prepare(`
      INSERT INTO agents (id, name, description, connection_json, is_active, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      input.name.trim(),
      input.description ?? '',
      JSON.stringify(input.connection),
      input.isActive === false ? 0 : 1,
      now,
      now
    );
    return this.requireAgent(id);
  }

  async getAgent(agentId: string): Promise<Agent | null> {
    const row = this.db.prepare(`SELECT * FROM agents WHERE id = ?`).get(agentId) as AgentRow | undefined;
    return row ? toAgent(row) : null;
  }

  async listAgents(): Promise<Agent[]> {
    const rows = this.db.prepare(`SELECT * FROM agents ORDER BY created_at, id`).all() as AgentRow[];
    return rows.map(toAgent);
  }

  /**
   * Update an agent. Every crew that contains it gets a new membership
   * version so cached contexts built from the old record are rebuilt.
   */
  async updateAgent(agentId: string, update: AgentUpdate): Promise<{ agent: Agent; affectedCrewIds: string[] }> {
    const current = await this.getAgent(agentId);
    if (!current) {
      throw new AgentNotFoundError(agentId);
    }
    if (update.name !== undefined && !update.name.trim()) {
      throw new ValidationError('Agent name cannot be empty');
    }

    const next: Agent = {
      ...current,
      name: update.name ?? current.name,
      description: update.description ?? current.description,
      connection: update.connection ?? current.connection,
      isActive: update.isActive ?? current.isActive,
    };
    const now = this.now();

    const affectedCrewIds = this.db.transaction(() => {
      this.db.prepare(`
        UPDATE agents
        SET name = ?, description = ?, connection_json = ?, is_active = ?, updated_at = ?
        WHERE id = ?
      `).run(next.name.trim(), next.description, JSON.stringify(next.connection), next.isActive ? 1 : 0, now, agentId);

      const crews = this.db.prepare(`
        SELECT DISTINCT crew_id FROM crew_members WHERE agent_id = ? ORDER BY crew_id
      `).all(agentId) as Array<{ crew_id: string }>;
      for (const { crew_id } of crews) {
        this.bumpVersion(crew_id, now);
      }
      return crews.map((row) => row.crew_id);
    })();

    return { agent: await this.requireAgent(agentId), affectedCrewIds };
  }

  private async requireAgent(agentId: string): Promise<Agent> {
    const agent = await this.getAgent(agentId);
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    return agent;
  }

  // ---------------------------------------------------------------------------
  // Crews
  // ---------------------------------------------------------------------------

  async createCrew(input: NewCrew): Promise<Crew> {
    if (!input.name.trim()) {
      throw new ValidationError('Crew name is required');
    }
    const now = this.now();
    const id = randomUUID();

    this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO crews (id, name, description, membership_version, created_at, updated_at)
        VALUES (?, ?, ?, 1, ?, ?)
      `).run(id, input.name.trim(), input.description ?? '', now, now);
      this.insertMembers(id, input.members ?? []);
    })();

    return this.requireCrew(id);
  }

  async getCrew(crewId: string): Promise<Crew | null> {
    const row = this.db.prepare(`SELECT * FROM crews WHERE id = ?`).get(crewId) as CrewRow | undefined;
    if (!row) return null;

    const members = this.db.prepare(`
      SELECT * FROM crew_members WHERE crew_id = ? ORDER BY position, agent_id
    `).all(crewId) as MemberRow[];

    return {
      id: row.id,
      name: row.name,
      description: row.description,
      members: members.map((member): CrewMember => ({
        agentId: member.agent_id,
        role: member.role,
        position: member.position,
      })),
      membershipVersion: row.membership_version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async listCrews(): Promise<Crew[]> {
    const ids = this.db.prepare(`SELECT id FROM crews ORDER BY created_at, id`).all() as Array<{ id: string }>;
    const crews: Crew[] = [];
    for (const { id } of ids) {
      const crew = await this.getCrew(id);
      if (crew) crews.push(crew);
    }
    return crews;
  }

  async addMember(
    crewId: string,
    member: Pick<CrewMember, 'agentId' | 'role'> & { position?: number }
  ): Promise<Crew> {
    this.db.transaction(() => {
      this.assertCrewExists(crewId);
      this.insertMembers(crewId, [member]);
      this.bumpVersion(crewId, this.now());
    })();
    return this.requireCrew(crewId);
  }

  async updateMember(crewId: string, agentId: string, update: MemberUpdate): Promise<Crew> {
    this.db.transaction(() => {
      this.assertCrewExists(crewId);
      const row = this.db.prepare(`
        SELECT * FROM crew_members WHERE crew_id = ? AND agent_id = ?
      `).get(crewId, agentId) as MemberRow | undefined;
      if (!row) {
        throw new ValidationError(`Agent ${agentId} is not a member of crew ${crewId}`);
      }
      this.db.prepare(`
        UPDATE crew_members SET role = ?, position = ? WHERE crew_id = ? AND agent_id = ?
      `).run(update.role ?? row.role, update.position ?? row.position, crewId, agentId);
      this.bumpVersion(crewId, this.now());
    })();
    return this.requireCrew(crewId);
  }

  async removeMember(crewId: string, agentId: string): Promise<Crew> {
    this.db.transaction(() => {
      this.assertCrewExists(crewId);
      const result = this.db.prepare(`
        DELETE FROM crew_members WHERE crew_id = ? AND agent_id = ?
      `).run(crewId, agentId);
      if (result.changes === 0) {
        throw new ValidationError(`Agent ${agentId} is not a member of crew ${crewId}`);
      }
      this.bumpVersion(crewId, this.now());
    })();
    return this.requireCrew(crewId);
  }

  async replaceMembers(crewId: string, members: NonNullable<NewCrew['members']>): Promise<Crew> {
    this.db.transaction(() => {
      this.assertCrewExists(crewId);
      this.db.prepare(`DELETE FROM crew_members WHERE crew_id = ?`).run(crewId);
      this.insertMembers(crewId, members);
      this.bumpVersion(crewId, this.now());
    })();
    return this.requireCrew(crewId);
  }

  async getMembershipVersion(crewId: string): Promise<number | null> {
    const row = this.db.prepare(`
      SELECT membership_version FROM crews WHERE id = ?
    `).get(crewId) as { membership_version: number } | undefined;
    return row ? row.membership_version : null;
  }

  /** Crew, its members and their agents, read in one transaction. */
  async getCrewMembership(crewId: string): Promise<CrewMembership | null> {
    return this.db.transaction((): CrewMembership | null => {
      const row = this.db.prepare(`SELECT * FROM crews WHERE id = ?`).get(crewId) as CrewRow | undefined;
      if (!row) return null;

      const joined = this.db.prepare(`
        SELECT m.role, m.position, a.*
        FROM crew_members m
        JOIN agents a ON a.id = m.agent_id
        WHERE m.crew_id = ?
        ORDER BY m.position, m.agent_id
      `).all(crewId) as Array<AgentRow & { role: string; position: number }>;

      const members = joined.map((member) => ({
        agentId: member.id,
        role: member.role,
        position: member.position,
        agent: toAgent(member),
      }));

      return {
        crew: {
          id: row.id,
          name: row.name,
          description: row.description,
          members: members.map(({ agentId, role, position }) => ({ agentId, role, position })),
          membershipVersion: row.membership_version,
          createdAt: row.created_at,
          updatedAt: row.updated_at,
        },
        members,
      };
    })();
  }

  private assertCrewExists(crewId: string): void {
    const row = this.db.prepare(`SELECT id FROM crews WHERE id = ?`).get(crewId);
    if (!row) {
      throw new CrewNotFoundError(crewId);
    }
  }

  /** Appends after the current last position unless one is given. */
  private insertMembers(
    crewId: string,
    members: ReadonlyArray<Pick<CrewMember, 'agentId' | 'role'> & { position?: number }>
  ): void {
    const maxRow = this.db.prepare(`
      SELECT MAX(position) AS max_position FROM crew_members WHERE crew_id = ?
    `).get(crewId) as { max_position: number | null };
    let nextPosition = (maxRow.max_position ?? -1) + 1;

    const exists = this.db.prepare(`SELECT 1 FROM crew_members WHERE crew_id = ? AND agent_id = ?`);
    const insert = this.db.prepare(`
      INSERT INTO crew_members (crew_id, agent_id, role, position) VALUES (?, ?, ?, ?)
    `);

    for (const member of members) {
      if (!this.db.prepare(`SELECT 1 FROM agents WHERE id = ?`).get(member.agentId)) {
        throw new AgentNotFoundError(member.agentId);
      }
      if (exists.get(crewId, member.agentId)) {
        throw new ValidationError(`Agent ${member.agentId} is already a member of crew ${crewId}`);
      }
      const position = member.position ?? nextPosition;
      insert.run(crewId, member.agentId, member.role, position);
      nextPosition = Math.max(nextPosition, position + 1);
    }
  }

  private bumpVersion(crewId: string, now: number): void {
    this.db.prepare(`
      UPDATE crews SET membership_version = membership_version + 1, updated_at = ? WHERE id = ?
    `).run(now, crewId);
  }

  private async requireCrew(crewId: string): Promise<Crew> {
    const crew = await this.getCrew(crewId);
    if (!crew) {
      throw new CrewNotFoundError(crewId);
    }
    return crew;
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  async createTask(input: NewTask): Promise<Task> {
    if (!input.title.trim()) {
      throw new ValidationError('Task title is required');
    }
    const now = this.now();
    const id = randomUUID();

    this.db.transaction(() => {
      this.assertCrewExists(input.crewId);
      this.db.prepare(`
        INSERT INTO tasks (id, title, description, crew_id, status, strategy, created_at, updated_at)
        VALUES (?, ?, ?, ?, 'pending', ?, ?, ?)
      `).run(id, input.title.trim(), input.description, input.crewId, input.strategy ?? 'dynamic', now, now);
    })();

    return this.requireTask(id);
  }

  async getTask(taskId: string): Promise<Task | null> {
    const row = this.db.prepare(`SELECT * FROM tasks WHERE id = ?`).get(taskId) as TaskRow | undefined;
    return row ? toTask(row) : null;
  }

  async listTasks(options: { crewId?: string; status?: TaskStatus; limit?: number } = {}): Promise<Task[]> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (options.crewId) {
      clauses.push('crew_id = ?');
      params.push(options.crewId);
    }
    if (options.status) {
      clauses.push('status = ?');
      params.push(options.status);
    }
    params.push(options.limit ?? 100);

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db.prepare(`
      SELECT * FROM tasks ${where} ORDER BY created_at DESC, id LIMIT ?
    `).all(...params) as TaskRow[];
    return rows.map(toTask);
  }

  async getTaskStats(since = 0): Promise<TaskStats> {
    const counts = this.db.prepare(`
      SELECT status, COUNT(*) AS count FROM tasks WHERE created_at >= ? GROUP BY status
    `).all(since) as Array<{ status: TaskStatus; count: number }>;
    const timing = this.db.prepare(`
      SELECT
        COUNT(*) AS count,
        AVG(updated_at - created_at) AS average,
        MIN(updated_at - created_at) AS min,
        MAX(updated_at - created_at) AS max
      FROM tasks
      WHERE status = 'completed' AND created_at >= ?
    `).get(since) as { count: number; average: number | null; min: number | null; max: number | null };

    const byStatus: Record<TaskStatus, number> = { pending: 0, in_progress: 0, completed: 0, failed: 0 };
    for (const row of counts) {
      byStatus[row.status] = row.count;
    }
    const total = counts.reduce((sum, row) => sum + row.count, 0);

    return {
      total,
      byStatus,
      completionRate: total > 0 ? byStatus.completed / total : 0,
      completionMs: timing.count > 0
        ? { average: timing.average ?? 0, min: timing.min ?? 0, max: timing.max ?? 0 }
        : null,
    };
  }

  /**
   * Append a message. createdAt is max(now, previous + 1) so the
   * transcript order is strictly increasing even within one millisecond.
   * A completed or failed task's transcript is closed.
   */
  async appendMessage(taskId: string, message: NewTaskMessage): Promise<TaskMessage> {
    const id = randomUUID();
    this.db.transaction(() => {
      const task = this.db.prepare(`SELECT status FROM tasks WHERE id = ?`).get(taskId) as
        | { status: TaskStatus }
        | undefined;
      if (!task) {
        throw new TaskNotFoundError(taskId);
      }
      if (isTerminalStatus(task.status)) {
        throw new TaskAlreadyTerminalError(taskId, task.status);
      }
      const last = this.db.prepare(`
        SELECT MAX(created_at) AS last_at FROM task_messages WHERE task_id = ?
      `).get(taskId) as { last_at: number | null };
      const createdAt = last.last_at === null ? this.now() : Math.max(this.now(), last.last_at + 1);

      this.db.prepare(`
        INSERT INTO task_messages (id, task_id, author, agent_id, content, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(id, taskId, message.author, message.agentId ?? null, message.content, createdAt);
    })();

    const row = this.db.prepare(`SELECT * FROM task_messages WHERE id = ?`).get(id) as MessageRow;
    return toMessage(row);
  }

  async getMessages(taskId: string): Promise<TaskMessage[]> {
    const rows = this.db.prepare(`
      SELECT * FROM task_messages WHERE task_id = ? ORDER BY created_at ASC
    `).all(taskId) as MessageRow[];
    return rows.map(toMessage);
  }

  async updateStatus(
    taskId: string,
    status: TaskStatus,
    outcome: { result?: string; error?: string } = {}
  ): Promise<Task> {
    this.db.transaction(() => {
      const row = this.db.prepare(`SELECT status FROM tasks WHERE id = ?`).get(taskId) as { status: TaskStatus } | undefined;
      if (!row) {
        throw new TaskNotFoundError(taskId);
      }
      if (!TRANSITIONS[row.status].includes(status)) {
        throw new InvalidTaskTransitionError(taskId, row.status, status);
      }
      this.db.prepare(`
        UPDATE tasks
        SET status = ?, result = COALESCE(?, result), error = COALESCE(?, error), updated_at = ?
        WHERE id = ?
      `).run(status, outcome.result ?? null, outcome.error ?? null, this.now(), taskId);
    })();
    return this.requireTask(taskId);
  }

  private async requireTask(taskId: string): Promise<Task> {
    const task = await this.getTask(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  // ---------------------------------------------------------------------------
  // Telemetry
  // ---------------------------------------------------------------------------

  async insertEvents(events: readonly TelemetryEvent[]): Promise<void> {
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO telemetry_events (
        id, task_id, run_id, kind, target, agent_id, model, iteration,
        started_at, ended_at, latency_ms, success, error,
        input_tokens, output_tokens, cost_usd
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.db.transaction(() => {
      for (const event of events) {
        insert.run(
          event.id,
          event.taskId,
          event.runId,
          event.kind,
          event.target,
          event.agentId ?? null,
          event.model ?? null,
          event.iteration,
          event.startedAt,
          event.endedAt,
          event.latencyMs,
          event.success ? 1 : 0,
          event.error ?? null,
          event.inputTokens ?? null,
          event.outputTokens ?? null,
          event.costUsd ?? null
        );
      }
    })();
  }

  async listEventsForTask(taskId: string): Promise<TelemetryEvent[]> {
    const rows = this.db.prepare(`
      SELECT * FROM telemetry_events WHERE task_id = ? ORDER BY started_at, ended_at, rowid
    `).all(taskId) as TelemetryRow[];
    return rows.map(toEvent);
  }

  async listEventsSince(since: number): Promise<TelemetryEvent[]> {
    const rows = this.db.prepare(`
      SELECT * FROM telemetry_events WHERE started_at >= ? ORDER BY started_at, ended_at, rowid
    `).all(since) as TelemetryRow[];
    return rows.map(toEvent);
  }

  close(): void {
    this.db.close();
  }
}
