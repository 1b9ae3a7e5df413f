#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { createPlanner } from './bootstrap.js';
import { describeError, rootCause } from './core/errors.js';
import { createLogger } from './util/logging.js';

const USER_ID = 'local';
const CONVERSATION_ID = 'cli';

const FRAME_BAR = '─'.repeat(44);

async function main(): Promise<void> {
  const log = createLogger({ level: process.env.LOG_LEVEL ?? 'warn' });
  const { dispatcher, store } = await createPlanner({ log });
  const rl = readline.createInterface({ input, output });

  output.write(chalk.bold('Dinner planner') + chalk.gray('  (/reset to start over, /exit to quit)\n'));

  try {
    for (;;) {
      const line = (await rl.question(chalk.cyan('You: '))).trim();
      if (!line) continue;
      if (line === '/exit' || line === '/quit') break;
      if (line === '/reset') {
        await dispatcher.reset(USER_ID, CONVERSATION_ID);
        output.write(chalk.gray('Session cleared.\n'));
        continue;
      }

      const started = Date.now();
      try {
        const plan = await dispatcher.handle(USER_ID, CONVERSATION_ID, line);
        output.write(`${chalk.gray(FRAME_BAR)}\n${plan}\n${chalk.gray(FRAME_BAR)}\n`);
        output.write(chalk.gray(`(${Date.now() - started} ms)\n`));
      } catch (err) {
        output.write(chalk.red(`Could not plan dinner: ${describeError(rootCause(err))}\n`));
      }
    }
  } finally {
    rl.close();
    store.close();
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red(describeError(err)));
  process.exit(1);
});
