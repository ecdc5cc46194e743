import { ConversationMessage, WorkerResult } from './ensemble-types';

/** Headings the reviewer is told to use; `parseReviewReply` splits on the same names. */
export const REVIEW_SECTION_HEADING = '## Review';
export const FINAL_ANSWER_SECTION_HEADING = '## Final Answer';

export const WORKER_SECTION_RULE = '---';

export interface BuildReviewPromptParams {
  userPrompt: string;
  /** Prior turns, oldest first. System turns are dropped. */
  history?: readonly ConversationMessage[];
  workerResults: readonly WorkerResult[];
}

const HISTORY_LABELS: Record<ConversationMessage['role'], string> = {
  user: 'User',
  assistant: 'Final answer',
  system: 'System',
};

function renderHistory(history: readonly ConversationMessage[]): string[] {
  const turns = history.filter((message) => message.role === 'user' || message.role === 'assistant');
  if (turns.length === 0) return [];

  const lines = ['# Conversation so far:'];
  for (const turn of turns) {
    lines.push(`[${HISTORY_LABELS[turn.role]}]`, turn.content, '');
  }
  return lines;
}

/**
 * Build the single instruction message sent to the reviewer.
 *
 * Only successful worker results are rendered; a failed worker's name and error text never
 * reach the reviewer. Output depends on nothing but the arguments.
 */
export function buildReviewPrompt(params: BuildReviewPromptParams): string {
  const answered = params.workerResults.filter((result) => result.isSuccess);

  const lines: string[] = [
    'You are the chief reviewer. Several AI workers answered the user request below.',
    '',
    ...renderHistory(params.history ?? []),
    '# User request:',
    params.userPrompt,
    '',
    '# Worker answers:',
  ];

  for (const result of answered) {
    lines.push(WORKER_SECTION_RULE, `[Agent: ${result.agentName}]`, result.content);
  }

  lines.push(
    WORKER_SECTION_RULE,
    '',
    '# Your task:',
    '1. Review: briefly assess each worker answer above, naming the worker.',
    '2. Synthesize: using all of the answers, correct mistakes, combine their strengths, and write one final answer of the highest quality.',
    '',
    '# Output format (required):',
    REVIEW_SECTION_HEADING,
    '(your assessment of each worker answer)',
    '',
    FINAL_ANSWER_SECTION_HEADING,
    '(the merged final answer)',
  );

  return lines.join('\n');
}
