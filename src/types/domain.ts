/**
 * Core domain records shared by the store, the orchestrator and the routes.
 */

/** How to reach an agent. Only the Direct Line channel is wired today. */
export type AgentConnection = {
  kind: 'direct_line';
  /** Agent identity on the channel, sent as channelData.agentId. */
  botId: string;
};

export interface Agent {
  id: string;
  name: string;
  /** Free-text capability description shown to the planner. */
  description: string;
  connection: AgentConnection;
  isActive: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface CrewMember {
  agentId: string;
  role: string;
  position: number;
}

/** A crew member joined with its agent record. */
export interface ResolvedCrewMember extends CrewMember {
  agent: Agent;
}

export interface Crew {
  id: string;
  name: string;
  description: string;
  members: CrewMember[];
  membershipVersion: number;
  createdAt: number;
  updatedAt: number;
}

export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(['completed', 'failed']);

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** `dynamic`: the oracle picks each call. `fixed_plan`: plan once, replay, aggregate. */
export type OrchestrationStrategy = 'dynamic' | 'fixed_plan';

export interface Task {
  id: string;
  title: string;
  description: string;
  crewId: string;
  status: TaskStatus;
  strategy: OrchestrationStrategy;
  result: string | null;
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

export type MessageAuthor = 'system' | 'agent' | 'user';

export interface TaskMessage {
  id: string;
  taskId: string;
  author: MessageAuthor;
  /** Set when author is 'agent'. */
  agentId: string | null;
  content: string;
  createdAt: number;
}

export type NewTaskMessage = Pick<TaskMessage, 'author' | 'content'> & {
  agentId?: string;
};
