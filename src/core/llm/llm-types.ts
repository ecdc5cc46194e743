export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMChatMessage {
  role: LLMRole;
  content: string;
}

export interface ChatEndpointRequest {
  /** Full chat endpoint URL, e.g. `http://host:11434/api/chat`. */
  url: string;
  model: string;
  messages: LLMChatMessage[];
  timeoutMs: number;
}

export interface ChatEndpointResponse {
  content: string;
}

/**
 * One non-streaming chat round trip. Implementations must be safe for concurrent use and
 * reject with the errors in `llm-errors` so callers can decide what to retry.
 */
export interface ChatEndpointClient {
  chat(request: ChatEndpointRequest): Promise<ChatEndpointResponse>;
}
