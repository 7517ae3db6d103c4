/**
 * Persistence collaborators used by the orchestration core.
 *
 * The core only appends messages, moves task status and hands telemetry
 * over; everything else here serves the HTTP surface.
 */

import type {
  Agent,
  AgentConnection,
  Crew,
  CrewMember,
  NewTaskMessage,
  OrchestrationStrategy,
  ResolvedCrewMember,
  Task,
  TaskMessage,
  TaskStatus,
} from '../../types/domain.js';
import type { TelemetryEvent } from '../../telemetry/types.js';

export interface CrewMembership {
  crew: Crew;
  members: ResolvedCrewMember[];
}

/** Read side the context cache depends on. */
export interface CrewRepository {
  getMembershipVersion(crewId: string): Promise<number | null>;
  getCrewMembership(crewId: string): Promise<CrewMembership | null>;
}

export interface NewAgent {
  name: string;
  description?: string;
  connection: AgentConnection;
  isActive?: boolean;
}

export type AgentUpdate = Partial<Pick<Agent, 'name' | 'description' | 'connection' | 'isActive'>>;

export interface NewCrew {
  name: string;
  description?: string;
  members?: Array<Pick<CrewMember, 'agentId' | 'role'> & { position?: number }>;
}

export type MemberUpdate = Partial<Pick<CrewMember, 'role' | 'position'>>;

export interface CrewAdmin {
  createAgent(input: NewAgent): Promise<Agent>;
  getAgent(agentId: string): Promise<Agent | null>;
  listAgents(): Promise<Agent[]>;
  /** Returns ids of crews whose membership version was bumped. */
  updateAgent(agentId: string, update: AgentUpdate): Promise<{ agent: Agent; affectedCrewIds: string[] }>;

  createCrew(input: NewCrew): Promise<Crew>;
  getCrew(crewId: string): Promise<Crew | null>;
  listCrews(): Promise<Crew[]>;
  addMember(crewId: string, member: Pick<CrewMember, 'agentId' | 'role'> & { position?: number }): Promise<Crew>;
  updateMember(crewId: string, agentId: string, update: MemberUpdate): Promise<Crew>;
  removeMember(crewId: string, agentId: string): Promise<Crew>;
  replaceMembers(crewId: string, members: NonNullable<NewCrew['members']>): Promise<Crew>;
}

export interface NewTask {
  title: string;
  description: string;
  crewId: string;
  strategy?: OrchestrationStrategy;
}

export interface TaskStats {
  total: number;
  byStatus: Record<TaskStatus, number>;
  /** Completed share of all tasks; 0 when there are none. */
  completionRate: number;
  /** Creation to completion, over completed tasks only. */
  completionMs: { average: number; min: number; max: number } | null;
}

export interface TaskStore {
  createTask(input: NewTask): Promise<Task>;
  getTask(taskId: string): Promise<Task | null>;
  listTasks(options?: { crewId?: string; status?: TaskStatus; limit?: number }): Promise<Task[]>;
  /** Counts and completion times of tasks created at or after `since`. */
  getTaskStats(since?: number): Promise<TaskStats>;
  /** Append-only; createdAt strictly increases within a task. Rejects terminal tasks. */
  appendMessage(taskId: string, message: NewTaskMessage): Promise<TaskMessage>;
  getMessages(taskId: string): Promise<TaskMessage[]>;
  /** Rejects moves out of a terminal status. */
  updateStatus(taskId: string, status: TaskStatus, outcome?: { result?: string; error?: string }): Promise<Task>;
}

export interface TelemetryStore {
  insertEvents(events: readonly TelemetryEvent[]): Promise<void>;
  listEventsForTask(taskId: string): Promise<TelemetryEvent[]>;
  listEventsSince(since: number): Promise<TelemetryEvent[]>;
}
