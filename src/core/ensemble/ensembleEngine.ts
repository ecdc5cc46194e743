import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { childLogger } from '../../shared/logging/logger';
import { ChatEndpointClient } from '../llm/llm-types';
import { limitConcurrency } from '../utils/concurrency';
import { AgentInvokerDeps } from './agentInvoker';
import { RequestValidationError } from './ensemble-errors';
import {
  AgentRoster,
  AggregatedResponse,
  ConversationMessage,
  EnsembleRequestState,
  EnsembleStateChange,
  ReviewOutcome,
} from './ensemble-types';
import { assertAnyWorkerSucceeded, dispatchWorkers } from './fanOutCoordinator';
import { composeResponse } from './resultComposer';
import { buildReviewPrompt } from './reviewPrompt';
import { runReview } from './reviewerAgent';

const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().max(20_000).trim().min(1, 'content must not be empty'),
});

export const generateInputSchema = z
  .object({
    prompt: z.string().max(10_000).trim().optional(),
    messages: z.array(chatMessageSchema).optional(),
  })
  .superRefine((value, ctx) => {
    const hasMessages = value.messages !== undefined && value.messages.length > 0;
    if (!hasMessages) {
      if (value.prompt === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Either prompt or messages is required' });
      } else if (value.prompt.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['prompt'], message: 'prompt must not be empty' });
      }
      return;
    }
    const last = value.messages?.[value.messages.length - 1];
    if (last && last.role !== 'user') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['messages'],
        message: 'The last message must have role "user"',
      });
    }
  });

export type GenerateInput = z.input<typeof generateInputSchema>;

/**
 * Validate caller input and turn it into the conversation sent to workers.
 * A non-empty message history wins over a bare prompt.
 */
export function normalizeGenerateInput(input: GenerateInput): ConversationMessage[] {
  const parsed = generateInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new RequestValidationError(`Invalid generate request: ${issues.join('; ')}`, issues);
  }

  const { prompt, messages } = parsed.data;
  if (messages && messages.length > 0) {
    return messages.map((message) => ({ role: message.role, content: message.content }));
  }
  if (prompt) {
    return [{ role: 'user', content: prompt }];
  }
  throw new RequestValidationError('Invalid generate request: Either prompt or messages is required', []);
}

export interface EnsembleEngineOptions {
  roster: AgentRoster;
  client: ChatEndpointClient;
  retryBaseDelayMs: number;
  /** Caps concurrent `generate` calls on this engine. 0 or unset disables the gate. */
  maxConcurrentRequests?: number;
  onStateChange?: (change: EnsembleStateChange) => void;
}

/**
 * Fan a request out to every worker, review the answers, and return one merged response.
 *
 * Terminal failures surface as `AllWorkersFailedError` or `ReviewerError`; individual worker
 * failures only show up inside the returned worker results.
 */
export class EnsembleEngine {
  private readonly roster: AgentRoster;
  private readonly deps: AgentInvokerDeps;
  private readonly gate: (<T>(fn: () => Promise<T>) => Promise<T>) | null;
  private readonly onStateChange?: (change: EnsembleStateChange) => void;

  constructor(opts: EnsembleEngineOptions) {
    this.roster = opts.roster;
    this.deps = { client: opts.client, retryBaseDelayMs: opts.retryBaseDelayMs };
    const limit = opts.maxConcurrentRequests ?? 0;
    this.gate = limit > 0 ? limitConcurrency(limit) : null;
    this.onStateChange = opts.onStateChange;
  }

  async generate(input: GenerateInput): Promise<AggregatedResponse> {
    const conversation = normalizeGenerateInput(input);
    const requestId = randomUUID();
    if (this.gate) {
      return this.gate(() => this.run(requestId, conversation));
    }
    return this.run(requestId, conversation);
  }

  private async run(requestId: string, conversation: ConversationMessage[]): Promise<AggregatedResponse> {
    const log = childLogger({ requestId });
    const transition = (state: EnsembleRequestState) => {
      log.debug({ state }, 'Ensemble request state');
      this.onStateChange?.({ requestId, state });
    };

    const startedAt = Date.now();
    const userPrompt = conversation[conversation.length - 1].content;
    log.info(
      { conversationLength: conversation.length, promptChars: userPrompt.length },
      'Ensemble request received',
    );

    transition('DISPATCHED');
    const fanOut = await dispatchWorkers(this.roster.workers, conversation, this.deps);
    transition('WORKERS_JOINED');

    try {
      assertAnyWorkerSucceeded(fanOut);
    } catch (error) {
      log.error({ totalWorkers: fanOut.workerResults.length }, 'All workers failed');
      transition('ALL_FAILED');
      transition('ERROR');
      throw error;
    }

    const reviewPrompt = buildReviewPrompt({
      userPrompt,
      history: conversation.slice(0, -1),
      workerResults: fanOut.workerResults,
    });

    transition('REVIEW_DISPATCHED');
    let review: ReviewOutcome;
    try {
      review = await runReview(this.roster.reviewer, reviewPrompt, this.deps);
    } catch (error) {
      log.error({ error, reviewer: this.roster.reviewer.name }, 'Reviewer failed');
      transition('REVIEW_FAILED');
      transition('ERROR');
      throw error;
    }
    transition('REVIEW_DONE');

    const response = composeResponse({
      workerResults: fanOut.workerResults,
      review,
      totalElapsedSec: Math.max(0, Date.now() - startedAt) / 1000,
    });
    transition('DONE');
    log.info(
      {
        processingTimeSeconds: response.metadata.processingTimeSeconds,
        successfulWorkers: response.metadata.successfulWorkers,
        failedWorkers: response.metadata.failedWorkers,
        reviewFormat: review.format,
      },
      'Ensemble request completed',
    );
    return response;
  }
}
