import type { LLMChatMessage } from '../llm/llm-types';

export type AgentRole = 'worker' | 'reviewer';

/**
 * One configured chat endpoint. Frozen by the config loader and shared by reference across
 * concurrent requests, never mutated.
 */
export interface AgentConfig {
  readonly name: string;
  readonly apiUrl: string;
  readonly model: string;
  readonly timeoutSec: number;
  readonly maxRetries: number;
  readonly role: AgentRole;
  readonly description?: string;
}

export interface AgentRoster {
  readonly reviewer: AgentConfig;
  readonly workers: readonly AgentConfig[];
}

export type ConversationMessage = LLMChatMessage;

export type InvocationFailureKind =
  | 'timeout'
  | 'connection'
  | 'protocol'
  | 'malformed'
  | 'invalid_request'
  | 'unexpected';

export type InvocationOutcome =
  | { ok: true; content: string; elapsedSec: number; attempts: number }
  | { ok: false; kind: InvocationFailureKind; detail: string; elapsedSec: number; attempts: number };

export interface WorkerResult {
  agentName: string;
  /** Empty when the worker failed. */
  content: string;
  isSuccess: boolean;
  elapsedSec: number;
  /** Present iff `isSuccess` is false. */
  errorDetail?: string;
}

export interface FanOutResult {
  workerResults: WorkerResult[];
  successfulWorkers: number;
  failedWorkers: number;
}

export type ReviewReplyParse =
  | { kind: 'structured'; reviewComment: string; finalAnswer: string }
  | { kind: 'unstructured'; finalAnswer: string };

export interface ReviewOutcome {
  reviewComment: string;
  finalAnswer: string;
  format: ReviewReplyParse['kind'];
  elapsedSec: number;
}

export interface AggregatedResponseMetadata {
  processingTimeSeconds: number;
  totalWorkers: number;
  successfulWorkers: number;
  failedWorkers: number;
}

export interface AggregatedResponse {
  finalAnswer: string;
  reviewComment: string;
  workerResults: WorkerResult[];
  metadata: AggregatedResponseMetadata;
}

/** Caller-facing JSON shape of an aggregated response. */
export interface GenerateResponseBody {
  final_answer: string;
  review_comment: string;
  worker_responses: Array<{
    agent_name: string;
    response: string;
    is_success: boolean;
    processing_time: number;
  }>;
  metadata: {
    processing_time_seconds: number;
    successful_workers: number;
    total_workers: number;
    failed_workers: number;
  };
}

export type EnsembleRequestState =
  | 'DISPATCHED'
  | 'WORKERS_JOINED'
  | 'ALL_FAILED'
  | 'REVIEW_DISPATCHED'
  | 'REVIEW_DONE'
  | 'REVIEW_FAILED'
  | 'DONE'
  | 'ERROR';

export interface EnsembleStateChange {
  requestId: string;
  state: EnsembleRequestState;
}
