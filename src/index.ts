export * from './core/ensemble';
export {
  createChatEndpointClient,
  getChatEndpointClient,
  FetchChatEndpointClient,
  TransientNetworkError,
  ProtocolError,
  MalformedResponseError,
  type ChatEndpointClient,
  type ChatEndpointRequest,
  type ChatEndpointResponse,
} from './core/llm';
export {
  getAgentSummary,
  loadAgentsConfig,
  parseAgentsConfig,
  type EnsembleConfig,
  type SystemSettings,
} from './core/config/agents-config';
export { bootstrapApp, type EnsembleApp } from './app/bootstrap';
export { ChatHistory, parseChatInput, type ChatInput } from './app/chatHistory';
export { runChatLoop, type ChatLoopOptions } from './app/chatLoop';
export { AppError, isAppError, type ErrorCode } from './shared/errors/app-error';
