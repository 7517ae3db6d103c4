import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import {
  DirectLineTransport,
  decodeSessionToken,
  encodeSessionToken,
} from '../../../src/transport/direct-line.js';
import { AgentError, AgentUnavailableError } from '../../../src/utils/errors.js';

const BASE_URL = 'https://directline.test/v3/directline';
const CONNECTION = { kind: 'direct_line' as const, botId: 'bot-researcher' };

type FetchCall = { url: string; init?: RequestInit };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function agentActivity(text: string) {
  return { type: 'message', from: { id: 'bot-researcher' }, text };
}

function userActivity(text: string) {
  return { type: 'message', from: { id: 'user' }, text };
}

describe('DirectLineTransport', () => {
  let calls: FetchCall[];
  let queue: Array<Response | Error>;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    calls = [];
    queue = [];
    sleep = vi.fn(async (_ms: number) => {});
    vi.stubGlobal('fetch', vi.fn(async (url: string, init?: RequestInit) => {
      calls.push({ url, init });
      const next = queue.shift();
      if (!next) throw new Error(`Unexpected fetch ${url}`);
      if (next instanceof Error) throw next;
      return next;
    }));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function transport(maxPolls = 3) {
    return new DirectLineTransport({
      secret: 'test-secret',
      baseUrl: BASE_URL,
      pollIntervalMs: 50,
      maxPolls,
      sleep,
    });
  }

  it('starts a conversation, posts the message and returns the agent reply', async () => {
    queue.push(
      jsonResponse({ conversationId: 'conv-1' }, 201),
      jsonResponse({ id: 'conv-1|0001' }),
      jsonResponse({ activities: [userActivity('find X'), agentActivity('X is 42')], watermark: '2' })
    );

    const result = await transport().send(CONNECTION, 'find X');

    expect(result).toEqual({ reply: 'X is 42', sessionToken: 'conv-1#2' });
    expect(calls.map((call) => `${call.init?.method} ${call.url}`)).toEqual([
      `POST ${BASE_URL}/conversations`,
      `POST ${BASE_URL}/conversations/conv-1/activities`,
      `GET ${BASE_URL}/conversations/conv-1/activities`,
    ]);

    const headers = calls[1].init?.headers as Record<string, string>;
    expect(headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(String(calls[1].init?.body))).toEqual({
      type: 'message',
      from: { id: 'user' },
      text: 'find X',
      channelData: { agentId: 'bot-researcher' },
    });
  });

  it('continues an existing conversation from the session watermark', async () => {
    queue.push(
      jsonResponse({ id: 'conv-9|0005' }),
      jsonResponse({ activities: [agentActivity('second answer')], watermark: '6' })
    );

    const result = await transport().send(CONNECTION, 'and then?', 'conv-9#4');

    expect(result.sessionToken).toBe('conv-9#6');
    expect(calls).toHaveLength(2);
    expect(calls[1].url).toBe(`${BASE_URL}/conversations/conv-9/activities?watermark=4`);
  });

  it('keeps polling until the agent answers', async () => {
    queue.push(
      jsonResponse({ conversationId: 'conv-2' }, 201),
      jsonResponse({ id: 'conv-2|0001' }),
      jsonResponse({ activities: [userActivity('hello')], watermark: '1' }),
      jsonResponse({ activities: [agentActivity('hi there')], watermark: '2' })
    );

    const result = await transport().send(CONNECTION, 'hello');

    expect(result).toEqual({ reply: 'hi there', sessionToken: 'conv-2#2' });
    expect(calls[3].url).toBe(`${BASE_URL}/conversations/conv-2/activities?watermark=1`);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(50);
  });

  it('reports an agent error when no reply arrives within the poll budget', async () => {
    queue.push(
      jsonResponse({ id: 'conv-3|0001' }),
      jsonResponse({ activities: [], watermark: '1' }),
      jsonResponse({ activities: [], watermark: '1' })
    );

    const error = await transport(2).send(CONNECTION, 'anyone?', 'conv-3#1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentError);
    expect((error as AgentError).message).toBe('No reply from agent after 2 polls');
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('classifies retryable HTTP statuses as unavailable', async () => {
    queue.push(new Response('busy', { status: 503 }));

    const error = await transport().send(CONNECTION, 'hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentUnavailableError);
    expect((error as AgentUnavailableError).message).toBe('Start conversation failed with HTTP 503: busy');
  });

  it('classifies other HTTP failures as agent errors', async () => {
    queue.push(new Response('bad activity', { status: 400 }));

    const error = await transport().send(CONNECTION, 'hi', 'conv-4#').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentError);
    expect((error as AgentError).code).toBe('AGENT_ERROR');
  });

  it('classifies network failures as unavailable', async () => {
    queue.push(new TypeError('fetch failed'));

    const error = await transport().send(CONNECTION, 'hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentUnavailableError);
    expect((error as AgentUnavailableError).recoverable).toBe(true);
  });

  it('reports a reply body that is not JSON as an agent error', async () => {
    queue.push(jsonResponse({ id: 'conv-5|0001' }), new Response('not json', { status: 200 }));

    const error = await transport().send(CONNECTION, 'hi', 'conv-5#').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentError);
    expect((error as AgentError).message).toBe('Get activities returned a malformed body');
  });

  it('reports a conversation start body that is not JSON as an agent error', async () => {
    queue.push(new Response('<html>gateway</html>', { status: 200 }));

    const error = await transport().send(CONNECTION, 'hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentError);
    expect((error as AgentError).message).toBe('Start conversation returned a malformed body');
  });

  it('rejects an activity list that is not an array', async () => {
    queue.push(jsonResponse({ id: 'conv-6|0001' }), jsonResponse({ activities: 'none', watermark: '1' }));

    const error = await transport().send(CONNECTION, 'hi', 'conv-6#').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentError);
    expect((error as AgentError).message).toBe('Get activities returned a malformed activity list');
  });

  it('skips activity entries that are not objects', async () => {
    queue.push(
      jsonResponse({ id: 'conv-7|0001' }),
      jsonResponse({ activities: [null, 'noise', agentActivity('still here')], watermark: 3 })
    );

    const result = await transport().send(CONNECTION, 'hi', 'conv-7#2');

    expect(result).toEqual({ reply: 'still here', sessionToken: 'conv-7#2' });
  });
});

describe('session tokens', () => {
  it('carries conversation id and watermark', () => {
    expect(encodeSessionToken({ conversationId: 'abc', watermark: '12' })).toBe('abc#12');
    expect(decodeSessionToken('abc#12')).toEqual({ conversationId: 'abc', watermark: '12' });
  });

  it('treats an empty watermark as none', () => {
    expect(decodeSessionToken('abc#')).toEqual({ conversationId: 'abc', watermark: null });
    expect(decodeSessionToken('abc')).toEqual({ conversationId: 'abc', watermark: null });
  });
});
