import { isAppError } from '../../shared/errors/app-error';
import { retry } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import { ChatEndpointClient } from '../llm/llm-types';
import {
  MalformedResponseError,
  ProtocolError,
  TransientNetworkError,
  isTransientNetworkError,
} from '../llm/llm-errors';
import {
  AgentConfig,
  ConversationMessage,
  InvocationFailureKind,
  InvocationOutcome,
} from './ensemble-types';

export interface AgentInvokerDeps {
  client: ChatEndpointClient;
  /** First backoff delay; doubles on each retry. */
  retryBaseDelayMs: number;
}

function elapsedSince(startedAt: number): number {
  return Math.max(0, Date.now() - startedAt) / 1000;
}

function classifyFailure(error: unknown): InvocationFailureKind {
  if (error instanceof TransientNetworkError) return error.kind;
  if (error instanceof ProtocolError) return 'protocol';
  if (error instanceof MalformedResponseError) return 'malformed';
  if (error instanceof RangeError) return 'invalid_request';
  return 'unexpected';
}

function errorText(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function unwrapRetryFailure(error: unknown): { cause: unknown; attempts: number | null } {
  if (isAppError(error, 'EXTERNAL_CALL_FAILED')) {
    const attempts = error.details?.attempts;
    return { cause: error.cause, attempts: typeof attempts === 'number' ? attempts : null };
  }
  return { cause: error, attempts: null };
}

/**
 * Run one chat round trip against one agent, retrying transient failures.
 *
 * Never rejects: every outcome, including invalid input, comes back as an
 * `InvocationOutcome` with the wall time of all attempts and backoff.
 */
export async function invokeAgent(
  agent: AgentConfig,
  messages: readonly ConversationMessage[],
  deps: AgentInvokerDeps,
): Promise<InvocationOutcome> {
  const startedAt = Date.now();

  if (messages.length === 0) {
    return { ok: false, kind: 'invalid_request', detail: 'messages must not be empty', elapsedSec: 0, attempts: 0 };
  }
  if (!Number.isFinite(agent.timeoutSec) || agent.timeoutSec <= 0) {
    return {
      ok: false,
      kind: 'invalid_request',
      detail: `timeout must be positive (got ${agent.timeoutSec})`,
      elapsedSec: 0,
      attempts: 0,
    };
  }

  const timeoutMs = Math.max(1, Math.round(agent.timeoutSec * 1000));
  let attempts = 0;

  logger.debug({ agent: agent.name, model: agent.model, role: agent.role }, 'Agent invocation started');

  try {
    const response = await retry(
      () => {
        attempts += 1;
        return deps.client.chat({
          url: agent.apiUrl,
          model: agent.model,
          messages: messages.map((message) => ({ ...message })),
          timeoutMs,
        });
      },
      {
        retries: agent.maxRetries,
        baseDelayMs: deps.retryBaseDelayMs,
        operationName: `Agent "${agent.name}"`,
        shouldRetry: isTransientNetworkError,
        onRetry: (error, attempt) => {
          logger.warn({ agent: agent.name, attempt, error: errorText(error) }, 'Agent call failed, retrying');
        },
      },
    );

    const elapsedSec = elapsedSince(startedAt);
    logger.info({ agent: agent.name, elapsedSec, attempts }, 'Agent responded');
    return { ok: true, content: response.content, elapsedSec, attempts };
  } catch (error) {
    const elapsedSec = elapsedSince(startedAt);
    const unwrapped = unwrapRetryFailure(error);
    const kind = classifyFailure(unwrapped.cause);
    const detail = errorText(unwrapped.cause);
    logger.warn({ agent: agent.name, kind, detail, elapsedSec, attempts }, 'Agent invocation failed');
    return { ok: false, kind, detail, elapsedSec, attempts: unwrapped.attempts ?? attempts };
  }
}
