/**
 * Scopecheck Command
 * 找出憑證實際可組合使用的最大 scope 集合
 */

import { Command } from 'commander';
import { printJson, resolveFormat, withOperation } from './shared.js';
import { ENV_SCOPE, parseScopes } from '../services/config.js';
import { summarizeScopeDetail, type ScopeDiscoveryReport } from '../services/scope-discovery.js';
import { renderTable } from '../shell/render.js';
import type { AppContext } from '../shell/context.js';

function printReport(ctx: AppContext, report: ScopeDiscoveryReport): void {
  ctx.output.log(
    renderTable(
      ['Scope', 'Status', 'Detail'],
      report.probes.map((probe) => [
        probe.scope,
        probe.allowed ? 'allowed' : 'denied',
        summarizeScopeDetail(probe.detail),
      ]),
      'Individual Scope Results'
    )
  );

  if (report.status === 'none-allowed') {
    ctx.output.error('No scopes could be used to obtain a token. Verify client provisioning.');
    return;
  }

  ctx.output.log(
    renderTable(
      ['Scope Added', 'Status', 'Detail'],
      report.combinations.map((combination) => [
        combination.scope,
        combination.allowed ? 'kept' : 'removed',
        summarizeScopeDetail(combination.detail),
      ]),
      'Combination Check'
    )
  );

  if (report.status === 'complete') {
    ctx.output.log(`Suggested scope string: ${report.accepted.join(' ')}`);
    ctx.output.log(`Update your ${ENV_SCOPE} or .env file accordingly.`);
  } else {
    ctx.output.log(
      'All individually valid scopes conflicted when combined. Consider contacting the platform team for guidance.'
    );
  }
}

/**
 * asio scopecheck
 */
export function createScopecheckCommand(ctx: AppContext): Command {
  return new Command('scopecheck')
    .description('Discover the maximal scope set your credentials support')
    .action(async (_options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const scopes = parseScopes(ctx.config.getScope());
      const { scopes: engine } = ctx.getServices();

      if (scopes.length === 0) {
        ctx.output.log(`No scopes configured in ${ENV_SCOPE}.`);
        return;
      }
      if (format === 'table') {
        ctx.output.log('Probing individual scopes, then building the largest working combination...');
      }

      const report = await withOperation(ctx, () => engine.discover(scopes));
      if (format === 'json') {
        printJson(ctx, report);
        return;
      }
      printReport(ctx, report);
    });
}
