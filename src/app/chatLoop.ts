import { createInterface } from 'node:readline';
import { toGenerateResponseBody, type EnsembleEngine } from '../core/ensemble';
import { toErrorWithCode } from '../shared/errors/app-error';
import { ChatHistory, parseChatInput } from './chatHistory';

export interface ChatLoopOptions {
  engine: Pick<EnsembleEngine, 'generate'>;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  showReview?: boolean;
}

const RULE = '='.repeat(60);

/**
 * Interactive multi-turn session over `engine.generate`. Each turn sends the whole history;
 * only the final answer is kept as the assistant turn. Ends on `/exit` or end of input.
 *
 * @returns The history as it stood when the session ended.
 */
export async function runChatLoop(opts: ChatLoopOptions): Promise<ChatHistory> {
  const history = new ChatHistory();
  const rl = createInterface({ input: opts.input, output: opts.output, terminal: false });
  const print = (text = '') => {
    opts.output.write(`${text}\n`);
  };
  const section = (title: string, body: string) => {
    print();
    print(RULE);
    print(title);
    print(RULE);
    print(body);
  };

  print('🗣️ Chat mode (/exit to quit, /reset to clear history)');
  rl.setPrompt('you > ');
  rl.prompt();

  try {
    for await (const raw of rl) {
      const input = parseChatInput(raw);
      if (input.kind === 'exit') break;

      if (input.kind === 'reset') {
        history.reset();
        print('🔁 Conversation history cleared.');
      } else if (input.kind === 'empty') {
        print('(empty input)');
      } else {
        const messages = history.beginTurn(input.text);
        try {
          const response = await opts.engine.generate({ messages });
          history.completeTurn(response.finalAnswer);
          const body = toGenerateResponseBody(response);
          section('🎯 Final answer', body.final_answer);
          if (opts.showReview) section('📝 Review', body.review_comment);
          section('📊 Metadata', JSON.stringify(body.metadata, null, 2));
          print(`🧵 History: ${history.size} messages`);
        } catch (error) {
          history.abandonTurn();
          const appError = toErrorWithCode(error, 'UNEXPECTED');
          print(`❌ [${appError.code}] ${appError.message}`);
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  print('👋 Bye.');
  return history;
}
