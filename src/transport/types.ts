/**
 * Agent transport contract: one message out, one reply back, with an
 * opaque token that continues the same remote conversation.
 */

import type { AgentConnection } from '../types/domain.js';

export interface AgentReply {
  reply: string;
  /** Pass back on the next send to continue the same conversation. */
  sessionToken: string;
}

export interface SendOptions {
  signal?: AbortSignal;
}

/**
 * Implementations throw AgentUnavailableError for transport failures that
 * may succeed on retry and AgentError for failures reported by the agent.
 */
export interface AgentTransport {
  send(
    connection: AgentConnection,
    message: string,
    sessionToken?: string,
    options?: SendOptions
  ): Promise<AgentReply>;
}
