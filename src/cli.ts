import { Command, Option } from 'commander';
import { createCompaniesCommand, createEndpointsCommand, createSitesCommand } from './commands/companies.js';
import { createConfigCommand } from './commands/config.js';
import { createDebugCommand } from './commands/debug.js';
import { createMetricsCommand } from './commands/metrics.js';
import { createRunCommand } from './commands/run.js';
import { createScopecheckCommand } from './commands/scopecheck.js';
import { createScriptsCommand } from './commands/scripts.js';
import { createResultsCommand, createSummaryCommand, createWatchCommand } from './commands/tasks.js';
import { runShell } from './shell/repl.js';
import { isOutputFormat } from './shell/render.js';
import type { AppContext } from './shell/context.js';

export const VERSION = '0.1.0';

export interface CliOptions {
  /** 互動模式：每一行建立一次，錯誤不結束程序 */
  interactive?: boolean;
}

/**
 * 建立指令樹
 * 互動 shell 每一行輸入都重新建立，避免 commander 選項狀態殘留
 */
export function createCli(ctx: AppContext, options: CliOptions = {}): Command {
  const interactive = options.interactive ?? false;
  const cli = new Command();

  cli
    .name('asio')
    .description('Operator shell for the automation platform REST API')
    .version(VERSION);

  // 全域選項
  cli.addOption(new Option('-f, --format <format>', 'output format').choices(['table', 'json']));
  if (!interactive) {
    cli.option('--debug', 'print login exchanges and masked HTTP snapshots');
    cli.hook('preAction', (thisCommand) => {
      const { debug, format } = thisCommand.opts();
      if (isOutputFormat(format)) {
        ctx.format = format;
      }
      if (debug === true) {
        ctx.setLoginDebug(true);
        ctx.setDebug(true);
      }
    });
  }

  // 註冊指令
  cli.addCommand(createCompaniesCommand(ctx));
  cli.addCommand(createSitesCommand(ctx));
  cli.addCommand(createEndpointsCommand(ctx));
  cli.addCommand(createScriptsCommand(ctx));
  cli.addCommand(createRunCommand(ctx));
  cli.addCommand(createSummaryCommand(ctx));
  cli.addCommand(createResultsCommand(ctx));
  cli.addCommand(createWatchCommand(ctx));
  cli.addCommand(createScopecheckCommand(ctx));
  cli.addCommand(createDebugCommand(ctx));
  cli.addCommand(createConfigCommand(ctx));
  cli.addCommand(createMetricsCommand(ctx));

  if (!interactive) {
    cli.addCommand(
      new Command('shell').description('Start the interactive shell (default)').action(() => runShell(ctx)),
      { isDefault: true }
    );
    return cli;
  }

  // addCommand 加入的子指令不會繼承設定，逐一套用
  for (const command of [cli, ...cli.commands]) {
    command.exitOverride();
    command.configureOutput({
      writeOut: (text) => ctx.output.log(text.trimEnd()),
      writeErr: (text) => ctx.output.error(text.trimEnd()),
    });
  }
  return cli;
}

/**
 * 指令名稱（供 shell 自動完成）
 */
export function commandNames(ctx: AppContext): string[] {
  return createCli(ctx, { interactive: true }).commands.map((command) => command.name());
}
