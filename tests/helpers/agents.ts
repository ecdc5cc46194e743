import type { AgentConfig, AgentRole } from '../../src/core/ensemble/ensemble-types';
import type { ChatEndpointRequest, ChatEndpointResponse } from '../../src/core/llm/llm-types';

export function makeAgent(name: string, overrides: Partial<AgentConfig> = {}): AgentConfig {
  const role: AgentRole = overrides.role ?? 'worker';
  return {
    name,
    apiUrl: `http://localhost:11434/api/chat`,
    model: `${name}-model`,
    timeoutSec: 5,
    maxRetries: 0,
    role,
    ...overrides,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type ScriptedReply = (request: ChatEndpointRequest) => Promise<ChatEndpointResponse>;

/**
 * Chat client stand-in that routes each call by model name to a scripted handler.
 */
export function scriptedChat(handlers: Record<string, ScriptedReply>) {
  return async (request: ChatEndpointRequest): Promise<ChatEndpointResponse> => {
    const handler = handlers[request.model];
    if (!handler) throw new Error(`no scripted reply for ${request.model}`);
    return handler(request);
  };
}
