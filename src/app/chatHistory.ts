import type { ConversationMessage } from '../core/ensemble';

export type ChatInput =
  | { kind: 'exit' }
  | { kind: 'reset' }
  | { kind: 'empty' }
  | { kind: 'message'; text: string };

const EXIT_COMMANDS = new Set(['/exit', '/quit', ':q']);

export function parseChatInput(raw: string): ChatInput {
  const text = raw.trim();
  if (EXIT_COMMANDS.has(text)) return { kind: 'exit' };
  if (text === '/reset') return { kind: 'reset' };
  if (text.length === 0) return { kind: 'empty' };
  return { kind: 'message', text };
}

/**
 * User and final-answer turns of an interactive session. Worker answers and review comments
 * never enter the history; a turn whose request failed is dropped.
 */
export class ChatHistory {
  private turns: ConversationMessage[] = [];

  get size(): number {
    return this.turns.length;
  }

  snapshot(): ConversationMessage[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  /** Append the user turn and return the conversation to send. */
  beginTurn(userText: string): ConversationMessage[] {
    this.turns.push({ role: 'user', content: userText });
    return this.snapshot();
  }

  completeTurn(finalAnswer: string): void {
    this.turns.push({ role: 'assistant', content: finalAnswer });
  }

  /** Drop the pending user turn after a failed request. */
  abandonTurn(): void {
    if (this.turns[this.turns.length - 1]?.role === 'user') {
      this.turns.pop();
    }
  }

  reset(): void {
    this.turns = [];
  }
}
