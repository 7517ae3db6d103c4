/**
 * @fileoverview Direct Line transport for remotely hosted agents.
 *
 * A session token carries the Direct Line conversation id and the last seen
 * activity watermark, so a capability holding the token continues the same
 * conversation on its next call.
 */

import { AgentError, AgentUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { AgentConnection } from '../types/domain.js';
import type { AgentReply, AgentTransport, SendOptions } from './types.js';

const logger = createLogger({ domain: 'agent-transport' });

/** Sender id used for our own activities; anything else is the agent. */
const USER_ID = 'user';

/** Network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export interface DirectLineOptions {
  secret: string;
  baseUrl: string;
  pollIntervalMs: number;
  maxPolls: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DirectLineSession {
  conversationId: string;
  watermark: string | null;
}

type Activity = {
  type?: string;
  text?: string;
  from?: { id?: string };
};

type ActivitySet = {
  activities?: Activity[];
  watermark?: string | null;
};

export function encodeSessionToken(session: DirectLineSession): string {
  return `${session.conversationId}#${session.watermark ?? ''}`;
}

export function decodeSessionToken(token: string): DirectLineSession {
  const separator = token.lastIndexOf('#');
  if (separator === -1) {
    return { conversationId: token, watermark: null };
  }
  const watermark = token.slice(separator + 1);
  return {
    conversationId: token.slice(0, separator),
    watermark: watermark.length > 0 ? watermark : null,
  };
}

/** Transient upstream statuses. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  const cause: unknown = error.cause;
  if (!cause || typeof cause !== 'object' || !('code' in cause)) {
    return undefined;
  }
  return typeof cause.code === 'string' ? cause.code : undefined;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Map a thrown fetch error onto the taxonomy. Aborts and network failures
 * are transient; anything else is reported as-is by the agent side.
 */
function classifyFetchError(error: unknown, operation: string): Error {
  if (isAbortError(error)) {
    return new AgentUnavailableError(`${operation} was aborted`, { operation });
  }
  const code = getErrorCode(error);
  if (error instanceof TypeError || (code && RETRYABLE_ERROR_CODES.has(code))) {
    return new AgentUnavailableError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, {
      operation,
      errorCode: code,
    });
  }
  return new AgentError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, { operation });
}

async function failureFromResponse(response: Response, operation: string): Promise<Error> {
  const body = await response.text().catch(() => '');
  const message = `${operation} failed with HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`;
  return isRetryableStatus(response.status)
    ? new AgentUnavailableError(message, { operation, status: response.status })
    : new AgentError(message, { operation, status: response.status });
}

/**
 * Read a JSON body. An aborted read is transient; a body that does not parse
 * is the agent's fault.
 */
async function readJson(response: Response, operation: string): Promise<unknown> {
  const text = await response.text().catch((error: unknown) => {
    throw classifyFetchError(error, operation);
  });
  try {
    return JSON.parse(text);
  } catch {
    throw new AgentError(`${operation} returned a malformed body`, { operation, status: response.status });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toActivity(value: unknown): Activity | null {
  if (!isRecord(value)) return null;
  const { type, text, from } = value;
  const fromId = isRecord(from) ? from.id : undefined;
  return {
    type: typeof type === 'string' ? type : undefined,
    text: typeof text === 'string' ? text : undefined,
    from: typeof fromId === 'string' ? { id: fromId } : undefined,
  };
}

/** Validate a GET activities payload; entries that are not objects are dropped. */
function toActivitySet(data: unknown, operation: string): ActivitySet {
  if (!isRecord(data)) {
    throw new AgentError(`${operation} returned a malformed body`, { operation });
  }
  const activities: unknown = data.activities ?? [];
  if (!Array.isArray(activities)) {
    throw new AgentError(`${operation} returned a malformed activity list`, { operation });
  }
  const { watermark } = data;
  return {
    activities: activities.flatMap((entry: unknown) => {
      const activity = toActivity(entry);
      return activity ? [activity] : [];
    }),
    watermark: typeof watermark === 'string' ? watermark : null,
  };
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export class DirectLineTransport implements AgentTransport {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: DirectLineOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  async send(
    connection: AgentConnection,
    message: string,
    sessionToken?: string,
    sendOptions: SendOptions = {}
  ): Promise<AgentReply> {
    const session = sessionToken
      ? decodeSessionToken(sessionToken)
      : { conversationId: await this.startConversation(sendOptions.signal), watermark: null };

    await this.postActivity(session.conversationId, connection.botId, message, sendOptions.signal);
    const { reply, watermark, polls } = await this.awaitReply(session, sendOptions.signal);

    logger.debug('direct_line_reply', {
      botId: connection.botId,
      polls,
      messageLength: message.length,
      replyLength: reply.length,
    });

    return {
      reply,
      sessionToken: encodeSessionToken({ conversationId: session.conversationId, watermark }),
    };
  }

  private headers(json: boolean): Record<string, string> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.options.secret}` };
    if (json) headers['Content-Type'] = 'application/json';
    return headers;
  }

  private async request(url: string, init: RequestInit, operation: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw classifyFetchError(error, operation);
    }
    if (!response.ok) {
      throw await failureFromResponse(response, operation);
    }
    return response;
  }

  private async startConversation(signal?: AbortSignal): Promise<string> {
    const response = await this.request(
      `${this.options.baseUrl}/conversations`,
      { method: 'POST', headers: this.headers(true), signal },
      'Start conversation'
    );
    const data = await readJson(response, 'Start conversation');
    if (!isRecord(data) || typeof data.conversationId !== 'string') {
      throw new AgentError('Start conversation returned no conversationId');
    }
    return data.conversationId;
  }

  private async postActivity(
    conversationId: string,
    botId: string,
    text: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.request(
      `${this.options.baseUrl}/conversations/${encodeURIComponent(conversationId)}/activities`,
      {
        method: 'POST',
        headers: this.headers(true),
        body: JSON.stringify({
          type: 'message',
          from: { id: USER_ID },
          text,
          channelData: { agentId: botId },
        }),
        signal,
      },
      'Send message'
    );
  }

  /**
   * Poll for activities after the session watermark until one comes from
   * the agent. The latest agent activity wins.
   */
  private async awaitReply(
    session: DirectLineSession,
    signal?: AbortSignal
  ): Promise<{ reply: string; watermark: string | null; polls: number }> {
    let watermark = session.watermark;

    for (let poll = 1; poll <= this.options.maxPolls; poll++) {
      const query = watermark ? `?watermark=${encodeURIComponent(watermark)}` : '';
      const response = await this.request(
        `${this.options.baseUrl}/conversations/${encodeURIComponent(session.conversationId)}/activities${query}`,
        { method: 'GET', headers: this.headers(false), signal },
        'Get activities'
      );
      const data = toActivitySet(await readJson(response, 'Get activities'), 'Get activities');
      watermark = data.watermark ?? watermark;

      const fromAgent = (data.activities ?? []).filter(
        (activity) => activity.from?.id !== USER_ID && (activity.type === undefined || activity.type === 'message')
      );
      if (fromAgent.length > 0) {
        return { reply: fromAgent[fromAgent.length - 1].text ?? '', watermark, polls: poll };
      }

      if (poll < this.options.maxPolls) {
        await this.sleep(this.options.pollIntervalMs);
      }
    }

    throw new AgentError(`No reply from agent after ${this.options.maxPolls} polls`, {
      polls: this.options.maxPolls,
    });
  }
}
