/**
 * Scripts Command
 * 自動化腳本清單
 */

import { Command } from 'commander';
import { printJson, resolveFormat, withOperation } from './shared.js';
import { pickString } from '../lib/payload-fields.js';
import { renderTable } from '../shell/render.js';
import type { AppContext } from '../shell/context.js';

export function createScriptsCommand(ctx: AppContext): Command {
  return new Command('scripts')
    .description('List available automation scripts')
    .action(async (_options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const scripts = await withOperation(ctx, () => ctx.getServices().catalog.loadScripts({ forceRefresh: true }));
      ctx.debugPrint('scripts', scripts);

      if (format === 'json') {
        printJson(ctx, { count: scripts.length, scripts });
        return;
      }
      if (scripts.length === 0) {
        ctx.output.log('No automation scripts returned.');
        return;
      }
      ctx.output.log(
        renderTable(
          ['#', 'Template ID', 'Name', 'Category'],
          scripts.map((script, index) => [
            String(index + 1),
            pickString(script, ['id']),
            pickString(script, ['name']),
            pickString(script, ['scriptCategory']),
          ]),
          'Automation Scripts'
        )
      );
    });
}
