/**
 * Public surface of the orchestration engine. HTTP serving and config file loading live
 * outside this module.
 */
export {
  EnsembleEngine,
  generateInputSchema,
  normalizeGenerateInput,
  type EnsembleEngineOptions,
  type GenerateInput,
} from './ensembleEngine';
export { invokeAgent, type AgentInvokerDeps } from './agentInvoker';
export { dispatchWorkers, assertAnyWorkerSucceeded } from './fanOutCoordinator';
export {
  buildReviewPrompt,
  REVIEW_SECTION_HEADING,
  FINAL_ANSWER_SECTION_HEADING,
  type BuildReviewPromptParams,
} from './reviewPrompt';
export { runReview, parseReviewReply } from './reviewerAgent';
export { composeResponse, toGenerateResponseBody } from './resultComposer';
export { AllWorkersFailedError, ReviewerError, RequestValidationError } from './ensemble-errors';
export type {
  AgentConfig,
  AgentRole,
  AgentRoster,
  AggregatedResponse,
  AggregatedResponseMetadata,
  ConversationMessage,
  EnsembleRequestState,
  EnsembleStateChange,
  FanOutResult,
  GenerateResponseBody,
  InvocationFailureKind,
  InvocationOutcome,
  ReviewOutcome,
  ReviewReplyParse,
  WorkerResult,
} from './ensemble-types';
