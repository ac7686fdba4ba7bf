/**
 * Interactive shell
 * 互動式 shell - 讀取一行、解析、交由指令樹執行；Ctrl+C 取消目前操作
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { CommanderError } from 'commander';
import { commandNames, createCli } from '../cli.js';
import { withOperation } from '../commands/shared.js';
import { formatError, OperationCancelledError } from '../services/errors.js';
import { loggers } from '../lib/logger.js';
import { ReadlinePrompter } from './prompter.js';
import type { AppContext } from './context.js';

const PROMPT = 'asio> ';
const EXIT_WORDS = new Set(['exit', 'quit']);

export interface ShellOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class CommandLineSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandLineSyntaxError';
  }
}

/**
 * 以 shell 規則切分一行輸入（單/雙引號、反斜線跳脫）
 * @throws CommandLineSyntaxError 引號未關閉
 */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let started = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (quote) {
      if (char === quote) {
        quote = null;
      } else if (char === '\\' && quote === '"' && i + 1 < line.length) {
        current += line[++i];
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      started = true;
    } else if (char === '\\' && i + 1 < line.length) {
      current += line[++i];
      started = true;
    } else if (/\s/.test(char)) {
      if (started) {
        args.push(current);
        current = '';
        started = false;
      }
    } else {
      current += char;
      started = true;
    }
  }

  if (quote) {
    throw new CommandLineSyntaxError('No closing quotation');
  }
  if (started) {
    args.push(current);
  }
  return args;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function isCancellation(error: unknown): boolean {
  return error instanceof OperationCancelledError || isAbortError(error);
}

/**
 * 執行一行指令；錯誤在此回報，不會結束 shell
 */
export async function dispatchLine(ctx: AppContext, line: string): Promise<void> {
  let args: string[];
  try {
    args = splitCommandLine(line);
  } catch (error) {
    ctx.output.error(`Error: ${formatError(error)}`);
    return;
  }
  if (args.length === 0) {
    return;
  }

  const program = createCli(ctx, { interactive: true });
  if (args[0] === 'help' && args.length === 1) {
    program.outputHelp();
    return;
  }

  try {
    await withOperation(ctx, () => program.parseAsync(args, { from: 'user' }));
  } catch (error) {
    if (error instanceof CommanderError) {
      // 說明、版本與用法錯誤已由 commander 輸出
      return;
    }
    if (isCancellation(error)) {
      ctx.output.log('Cancelled.');
      return;
    }
    loggers.task.debug('Command failed', { command: args[0], error: formatError(error) });
    ctx.output.error(`Error: ${formatError(error)}`);
  }
}

export function completeLine(names: readonly string[], line: string): [string[], string] {
  if (/\s/.test(line)) {
    return [[], line];
  }
  const hits = names.filter((name) => name.startsWith(line));
  return [hits.length > 0 ? hits : [...names], line];
}

function printWelcome(ctx: AppContext): void {
  ctx.output.log('Automation platform shell. Type "help" for commands, "exit" to quit.');
  ctx.output.log('Press Ctrl+C to cancel a running command or wait.');
}

/**
 * 互動式主迴圈，直到 exit/quit、EOF 或閒置時的 Ctrl+C
 */
export async function runShell(ctx: AppContext, options: ShellOptions = {}): Promise<void> {
  const names = [...commandNames(ctx), 'help', ...EXIT_WORDS];
  const rl: Interface = createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    completer: (line: string) => completeLine(names, line),
  });
  ctx.prompter = new ReadlinePrompter(() => rl, ctx.output, () => ctx.currentSignal());

  let isClosed = false;
  const closed = new Promise<null>((resolve) => {
    rl.once('close', () => {
      isClosed = true;
      resolve(null);
    });
  });
  rl.on('SIGINT', () => {
    if (ctx.interrupt()) {
      ctx.output.log('');
      return;
    }
    rl.close();
  });

  printWelcome(ctx);
  try {
    while (!isClosed) {
      const line = await Promise.race([rl.question(PROMPT), closed]);
      if (line === null) {
        break;
      }
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }
      if (EXIT_WORDS.has(trimmed.toLowerCase())) {
        break;
      }
      await dispatchLine(ctx, trimmed);
    }
  } catch (error) {
    // 輸入關閉時 readline 會放棄等待中的提問
    if (!isAbortError(error)) {
      throw error;
    }
  } finally {
    rl.close();
    ctx.prompter = undefined;
  }
  ctx.output.log('Bye.');
}
