/**
 * Debug Command
 * 切換命令輸出除錯（含遮罩後的 HTTP 快照）
 */

import { Command } from 'commander';
import type { AppContext } from '../shell/context.js';

function describe(enabled: boolean): string {
  return enabled ? 'enabled' : 'disabled';
}

/**
 * asio debug [on|off|status]
 */
export function createDebugCommand(ctx: AppContext): Command {
  return new Command('debug')
    .description('Toggle command output debugging')
    .argument('[mode]', 'on | off | status (toggles when omitted)')
    .action((mode: string | undefined) => {
      const option = mode?.toLowerCase();

      if (option === undefined) {
        ctx.setDebug(!ctx.isDebugEnabled());
        ctx.output.log(`Debugging ${describe(ctx.isDebugEnabled())}.`);
      } else if (option === 'on' || option === 'enable') {
        ctx.setDebug(true);
        ctx.output.log('Debugging enabled.');
      } else if (option === 'off' || option === 'disable') {
        ctx.setDebug(false);
        ctx.output.log('Debugging disabled.');
      } else if (option === 'status' || option === 'state') {
        ctx.output.log(`Debugging is currently ${describe(ctx.isDebugEnabled())}.`);
      } else {
        ctx.output.log('Usage: debug [on|off|status]');
      }
    });
}
