#!/usr/bin/env node
/**
 * asio 進入點
 * 建立工作階段並執行指令（未指定時進入互動 shell）
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { createCli } from './cli.js';
import { ConfigService } from './services/config.js';
import { formatError } from './services/errors.js';
import { setLogLevel } from './lib/logger.js';
import { AppContext } from './shell/context.js';
import { consoleOutput } from './shell/render.js';
import { ReadlinePrompter } from './shell/prompter.js';

async function main(): Promise<void> {
  const config = new ConfigService();
  setLogLevel(config.getLogLevel());

  const ctx = new AppContext({ config });

  const onSigint = (): void => {
    if (!ctx.interrupt()) {
      process.exit(130);
    }
  };
  process.on('SIGINT', onSigint);

  // 單次指令（例如 asio run）需要提問時才開啟 readline
  const session: { rl?: Interface } = {};
  const openReadline = (): Interface => {
    if (!session.rl) {
      session.rl = createInterface({ input: process.stdin, output: process.stdout });
      session.rl.on('SIGINT', onSigint);
    }
    return session.rl;
  };
  ctx.prompter = new ReadlinePrompter(openReadline, consoleOutput, () => ctx.currentSignal());

  try {
    await createCli(ctx).parseAsync(process.argv);
  } finally {
    process.off('SIGINT', onSigint);
    session.rl?.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${formatError(error)}`);
  process.exitCode = 1;
});
