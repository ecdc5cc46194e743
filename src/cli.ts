#!/usr/bin/env node
/* eslint-disable no-console */
import { bootstrapApp } from './app/bootstrap';
import { runChatLoop } from './app/chatLoop';
import { toGenerateResponseBody } from './core/ensemble';
import { toErrorWithCode } from './shared/errors/app-error';

const USAGE = 'Usage: ensemble-hub <prompt>\n       ensemble-hub --chat [--show-review]';

/**
 * Run one prompt through the ensemble and print the aggregated response as JSON, or with
 * `--chat` hold a multi-turn conversation on stdin/stdout.
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const chat = args.includes('--chat');
  const showReview = args.includes('--show-review');
  const prompt = args
    .filter((arg) => arg !== '--chat' && arg !== '--show-review')
    .join(' ')
    .trim();

  if (!chat && !prompt) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const { engine } = await bootstrapApp();
  if (chat) {
    await runChatLoop({ engine, input: process.stdin, output: process.stdout, showReview });
    return;
  }

  const response = await engine.generate({ prompt });
  console.log(JSON.stringify(toGenerateResponseBody(response), null, 2));
}

main().catch((err: unknown) => {
  const error = toErrorWithCode(err, 'UNEXPECTED');
  console.error(`[${error.code}] ${error.message}`);
  if (error.code === 'UNEXPECTED') console.error(error.cause);
  process.exit(1);
});
