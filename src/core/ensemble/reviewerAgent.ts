import { logger } from '../../shared/logging/logger';
import { AgentInvokerDeps, invokeAgent } from './agentInvoker';
import { ReviewerError } from './ensemble-errors';
import { AgentConfig, ReviewOutcome, ReviewReplyParse } from './ensemble-types';

const REVIEW_HEADING_NAMES = new Set(['review', 'evaluation', 'critique']);
const FINAL_ANSWER_HEADING_NAMES = new Set(['final answer']);

type ReplySection = 'review' | 'final_answer';

const FENCE_PATTERN = /^\s*(`{3,}|~{3,})/;

function headingSection(line: string): ReplySection | null {
  if (!line.trimStart().startsWith('#')) return null;
  const name = line
    .replace(/^\s*#+\s*/, '')
    .replace(/[\s:.]+$/, '')
    .toLowerCase();
  if (FINAL_ANSWER_HEADING_NAMES.has(name)) return 'final_answer';
  if (REVIEW_HEADING_NAMES.has(name)) return 'review';
  return null;
}

/**
 * Split a reviewer reply into critique and final answer.
 *
 * Text under a `## Review` heading is the critique and text under `## Final Answer` is the
 * answer; other headings stay part of the section they appear in. Lines inside ``` or ~~~
 * fences are never headings. A reply without a non-empty final answer section comes back
 * `unstructured` with the whole text as answer.
 */
export function parseReviewReply(text: string): ReviewReplyParse {
  const reviewLines: string[] = [];
  const answerLines: string[] = [];
  let current: ReplySection | null = null;
  // Marker that opened the current code fence; a fence closes on the same character, at least as long.
  let openFence: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    const fence = FENCE_PATTERN.exec(line)?.[1];
    if (fence) {
      if (openFence === null) {
        openFence = fence;
      } else if (fence[0] === openFence[0] && fence.length >= openFence.length) {
        openFence = null;
      }
    }

    const section = fence || openFence !== null ? null : headingSection(line);
    if (section) {
      current = section;
      continue;
    }
    if (current === 'review') reviewLines.push(line);
    if (current === 'final_answer') answerLines.push(line);
  }

  const finalAnswer = answerLines.join('\n').trim();
  if (finalAnswer.length === 0) {
    return { kind: 'unstructured', finalAnswer: text };
  }
  return { kind: 'structured', reviewComment: reviewLines.join('\n').trim(), finalAnswer };
}

/**
 * Send the review prompt to the reviewer and parse its reply.
 *
 * @throws ReviewerError when the call fails after retries or the reply is blank. There is
 * no fallback reviewer.
 */
export async function runReview(
  reviewer: AgentConfig,
  reviewPrompt: string,
  deps: AgentInvokerDeps,
): Promise<ReviewOutcome> {
  const outcome = await invokeAgent(reviewer, [{ role: 'user', content: reviewPrompt }], deps);
  if (!outcome.ok) {
    throw new ReviewerError(reviewer.name, outcome.kind, outcome.detail);
  }
  if (outcome.content.trim().length === 0) {
    throw new ReviewerError(reviewer.name, 'empty_reply', 'reply was empty');
  }

  const parsed = parseReviewReply(outcome.content);
  if (parsed.kind === 'unstructured') {
    logger.warn(
      { reviewer: reviewer.name, replyChars: outcome.content.length },
      'Reviewer reply has no final answer section; using the whole reply as the answer',
    );
    return { reviewComment: '', finalAnswer: parsed.finalAnswer, format: parsed.kind, elapsedSec: outcome.elapsedSec };
  }

  return {
    reviewComment: parsed.reviewComment,
    finalAnswer: parsed.finalAnswer,
    format: parsed.kind,
    elapsedSec: outcome.elapsedSec,
  };
}
