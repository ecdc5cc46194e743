import { ChatEndpointClient } from './llm-types';
import { Fetcher, FetchChatEndpointClient } from './chat-endpoint-client';

let instance: ChatEndpointClient | null = null;

/** Shared client for the process; fetch keeps its own connection pool. */
export function getChatEndpointClient(): ChatEndpointClient {
  if (instance) return instance;
  instance = createChatEndpointClient();
  return instance;
}

export function createChatEndpointClient(opts: { fetcher?: Fetcher } = {}): ChatEndpointClient {
  return new FetchChatEndpointClient(opts);
}

export * from './llm-types';
export * from './llm-errors';
export { FetchChatEndpointClient, extractGeneratedText } from './chat-endpoint-client';
export type { Fetcher } from './chat-endpoint-client';
