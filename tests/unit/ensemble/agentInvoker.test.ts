import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockLoggerWarn = vi.hoisted(() => vi.fn());

vi.mock('../../../src/shared/logging/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: mockLoggerWarn,
    error: vi.fn(),
  },
}));

import { invokeAgent } from '../../../src/core/ensemble/agentInvoker';
import {
  MalformedResponseError,
  ProtocolError,
  TransientNetworkError,
} from '../../../src/core/llm/llm-errors';
import { ChatEndpointClient, ChatEndpointRequest } from '../../../src/core/llm/llm-types';
import { makeAgent } from '../../helpers/agents';

const messages = [{ role: 'user' as const, content: 'Name three TypeScript features.' }];

function clientWith(chat: ChatEndpointClient['chat']): { client: ChatEndpointClient; retryBaseDelayMs: number } {
  return { client: { chat }, retryBaseDelayMs: 1 };
}

describe('invokeAgent', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns the content of a successful call', async () => {
    const chat = vi.fn().mockResolvedValue({ content: 'Generics, unions, and type guards.' });
    const agent = makeAgent('worker-a', { timeoutSec: 7, apiUrl: 'http://gpu-1:11434/api/chat' });

    const outcome = await invokeAgent(agent, messages, clientWith(chat));

    expect(outcome).toMatchObject({ ok: true, content: 'Generics, unions, and type guards.', attempts: 1 });
    expect(outcome.elapsedSec).toBeGreaterThanOrEqual(0);
    expect(chat).toHaveBeenCalledWith({
      url: 'http://gpu-1:11434/api/chat',
      model: 'worker-a-model',
      messages: [{ role: 'user', content: 'Name three TypeScript features.' }],
      timeoutMs: 7000,
    });
  });

  it('succeeds when one timeout is followed by an answer within the retry budget', async () => {
    const chat = vi
      .fn()
      .mockRejectedValueOnce(new TransientNetworkError('timeout', 'timed out'))
      .mockResolvedValueOnce({ content: 'second try' });

    const outcome = await invokeAgent(makeAgent('worker-a', { maxRetries: 1 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({ ok: true, content: 'second try', attempts: 2 });
    expect(chat).toHaveBeenCalledTimes(2);
    expect(mockLoggerWarn).toHaveBeenCalledWith(
      expect.objectContaining({ agent: 'worker-a', attempt: 1 }),
      'Agent call failed, retrying',
    );
  });

  it('fails when every attempt times out', async () => {
    const chat = vi.fn().mockRejectedValue(new TransientNetworkError('timeout', 'timed out after 5000ms'));

    const outcome = await invokeAgent(makeAgent('worker-a', { maxRetries: 1 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({
      ok: false,
      kind: 'timeout',
      detail: 'timed out after 5000ms',
      attempts: 2,
    });
    expect(chat).toHaveBeenCalledTimes(2);
  });

  it('retries refused connections until the budget runs out', async () => {
    const chat = vi.fn().mockRejectedValue(new TransientNetworkError('connection', 'fetch failed (ECONNREFUSED)'));

    const outcome = await invokeAgent(makeAgent('worker-a', { maxRetries: 2 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({ ok: false, kind: 'connection', attempts: 3 });
    expect(chat).toHaveBeenCalledTimes(3);
  });

  it('does not retry protocol errors', async () => {
    const chat = vi.fn().mockRejectedValue(new ProtocolError(500, 'boom'));

    const outcome = await invokeAgent(makeAgent('worker-a', { maxRetries: 3 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({
      ok: false,
      kind: 'protocol',
      detail: 'Endpoint responded with HTTP 500: boom',
      attempts: 1,
    });
    expect(chat).toHaveBeenCalledTimes(1);
  });

  it('does not retry malformed payloads', async () => {
    const chat = vi.fn().mockRejectedValue(new MalformedResponseError('Endpoint response body is not valid JSON'));

    const outcome = await invokeAgent(makeAgent('worker-a', { maxRetries: 3 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({ ok: false, kind: 'malformed', attempts: 1 });
    expect(chat).toHaveBeenCalledTimes(1);
  });

  it('folds unexpected client errors into a failure outcome', async () => {
    const chat = vi.fn().mockRejectedValue(new Error('socket exploded'));

    const outcome = await invokeAgent(makeAgent('worker-a', { maxRetries: 2 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({ ok: false, kind: 'unexpected', detail: 'socket exploded', attempts: 1 });
  });

  it('rejects an empty message list without calling the endpoint', async () => {
    const chat = vi.fn();

    const outcome = await invokeAgent(makeAgent('worker-a'), [], clientWith(chat));

    expect(outcome).toEqual({
      ok: false,
      kind: 'invalid_request',
      detail: 'messages must not be empty',
      elapsedSec: 0,
      attempts: 0,
    });
    expect(chat).not.toHaveBeenCalled();
  });

  it('rejects a non-positive timeout without calling the endpoint', async () => {
    const chat = vi.fn();

    const outcome = await invokeAgent(makeAgent('worker-a', { timeoutSec: 0 }), messages, clientWith(chat));

    expect(outcome).toMatchObject({ ok: false, kind: 'invalid_request', detail: 'timeout must be positive (got 0)' });
    expect(chat).not.toHaveBeenCalled();
  });

  it('sends each call its own copy of the messages', async () => {
    const chat = vi.fn(async (_request: ChatEndpointRequest) => ({ content: 'ok' }));

    await invokeAgent(makeAgent('worker-a'), messages, clientWith(chat));

    const sent = chat.mock.calls[0]?.[0];
    expect(sent?.messages).toEqual(messages);
    expect(sent?.messages[0]).not.toBe(messages[0]);
  });
});
