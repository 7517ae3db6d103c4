/**
 * @fileoverview One crew agent exposed to the planner as a named function.
 *
 * A capability holds the session token of its remote conversation. The
 * holder belongs to exactly one capability instance; task runs work on
 * clones so two runs never continue each other's conversation.
 */

import { AgentUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { AgentConnection } from '../types/domain.js';
import type { AgentTransport } from '../transport/types.js';

const logger = createLogger({ domain: 'capability' });

export interface CallPolicy {
  /** Delays between attempts; attempts = delays + 1. */
  retryDelaysMs: number[];
  callTimeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CapabilityDescriptor {
  name: string;
  agentId: string;
  agentName: string;
  role: string;
  description: string;
}

export interface AgentCapabilityInit extends CapabilityDescriptor {
  connection: AgentConnection;
  transport: AgentTransport;
  policy: CallPolicy;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export class AgentCapability {
  readonly name: string;
  readonly agentId: string;
  readonly agentName: string;
  readonly role: string;
  readonly description: string;

  private readonly connection: AgentConnection;
  private readonly transport: AgentTransport;
  private readonly policy: CallPolicy;
  private session: string | undefined;

  constructor(init: AgentCapabilityInit) {
    this.name = init.name;
    this.agentId = init.agentId;
    this.agentName = init.agentName;
    this.role = init.role;
    this.description = init.description;
    this.connection = init.connection;
    this.transport = init.transport;
    this.policy = init.policy;
  }

  /** Current continuation token, undefined until the first successful call. */
  get sessionToken(): string | undefined {
    return this.session;
  }

  describe(): CapabilityDescriptor {
    return {
      name: this.name,
      agentId: this.agentId,
      agentName: this.agentName,
      role: this.role,
      description: this.description,
    };
  }

  /** Same metadata and transport, empty session holder. */
  clone(): AgentCapability {
    return new AgentCapability({
      ...this.describe(),
      connection: this.connection,
      transport: this.transport,
      policy: this.policy,
    });
  }

  /**
   * Send one message to the agent and return its reply.
   *
   * Only AgentUnavailableError is retried. AgentError and anything else
   * propagates on the first occurrence.
   */
  async invoke(message: string): Promise<string> {
    const delays = this.policy.retryDelaysMs;
    const totalAttempts = delays.length + 1;
    const wait = this.policy.sleep ?? sleep;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.sendOnce(message);
        this.session = result.sessionToken;
        return result.reply;
      } catch (error) {
        if (!(error instanceof AgentUnavailableError) || attempt >= totalAttempts) {
          throw error;
        }
        const delayMs = delays[attempt - 1];
        logger.warn('agent_call_retry', {
          capability: this.name,
          agentId: this.agentId,
          attempt,
          attempts: totalAttempts,
          delayMs,
          error: error.message,
        });
        await wait(delayMs);
      }
    }
  }

  private async sendOnce(message: string): Promise<{ reply: string; sessionToken: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.policy.callTimeoutMs);
    try {
      return await this.transport.send(this.connection, message, this.session, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AgentUnavailableError(`Call to ${this.name} timed out after ${this.policy.callTimeoutMs}ms`, {
          capability: this.name,
        });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
