import { z } from 'zod';
import { AppError, isAppError } from '../../shared/errors/app-error';
import { withTimeout } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import { ChatEndpointClient, ChatEndpointRequest, ChatEndpointResponse } from './llm-types';
import { MalformedResponseError, ProtocolError, TransientNetworkError } from './llm-errors';

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

interface ChatPayload {
  model: string;
  messages: ChatEndpointRequest['messages'];
  stream: false;
}

// Ollama /api/chat
const ollamaChatSchema = z.object({
  message: z.object({ content: z.string() }),
});

// OpenAI-compatible /chat/completions
const openAiChatSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
});

/**
 * Read the generated text from either supported response shape.
 *
 * @returns The text, or null when neither shape matches.
 */
export function extractGeneratedText(payload: unknown): string | null {
  const ollama = ollamaChatSchema.safeParse(payload);
  if (ollama.success) return ollama.data.message.content;

  const openAi = openAiChatSchema.safeParse(payload);
  if (openAi.success) return openAi.data.choices[0].message.content;

  return null;
}

function describeNetworkFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici wraps the socket error (ECONNREFUSED, ECONNRESET, ...) in `cause`.
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : cause.name;
    return `${error.message} (${code})`;
  }
  return error.message;
}

function assertHttpUrl(rawUrl: string): string {
  const parsed = new URL(rawUrl.trim());
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new AppError('CONFIG_INVALID', `Chat endpoint must be an HTTP(S) URL: ${rawUrl}`);
  }
  return parsed.toString();
}

/**
 * Chat client over the global `fetch`. Stateless apart from the injected fetcher, so one
 * instance can serve every agent and every concurrent request.
 */
export class FetchChatEndpointClient implements ChatEndpointClient {
  private readonly fetcher: Fetcher;

  constructor(opts: { fetcher?: Fetcher } = {}) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  async chat(request: ChatEndpointRequest): Promise<ChatEndpointResponse> {
    try {
      return await withTimeout(
        (signal) => this.roundTrip(request, signal),
        request.timeoutMs,
        `Chat call to ${request.model}`,
      );
    } catch (error) {
      if (isAppError(error, 'TIMEOUT')) {
        throw new TransientNetworkError('timeout', error.message, error);
      }
      throw error;
    }
  }

  private async roundTrip(request: ChatEndpointRequest, signal: AbortSignal): Promise<ChatEndpointResponse> {
    const url = assertHttpUrl(request.url);
    const payload: ChatPayload = {
      model: request.model,
      messages: request.messages,
      stream: false,
    };

    logger.debug({ url, model: request.model, messageCount: request.messages.length }, '[Endpoint] Request');

    let response: Response;
    try {
      response = await this.fetcher(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      throw new TransientNetworkError('connection', describeNetworkFailure(error), error);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      // Connection dropped mid-body.
      throw new TransientNetworkError('connection', describeNetworkFailure(error), error);
    }

    if (!response.ok) {
      throw new ProtocolError(response.status, text.slice(0, 200));
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new MalformedResponseError('Endpoint response body is not valid JSON');
    }

    const content = extractGeneratedText(body);
    if (content === null) {
      throw new MalformedResponseError(
        'Endpoint response carries neither message.content nor choices[0].message.content',
      );
    }

    return { content };
  }
}
