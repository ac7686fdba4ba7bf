/**
 * Config Command
 * 顯示目前生效的設定（機密已遮罩）
 */

import { Command } from 'commander';
import { printJson, resolveFormat } from './shared.js';
import { ENV_BASE_URL, ENV_CLIENT_ID, ENV_CLIENT_SECRET, ENV_LOG_LEVEL, ENV_SCOPE, parseScopes } from '../services/config.js';
import { maskSecret } from '../lib/mask.js';
import { renderTable } from '../shell/render.js';
import type { AppContext } from '../shell/context.js';

export interface ConfigView {
  configPath: string;
  baseUrl: string | null;
  clientId: string | null;
  clientSecret: string | null;
  scopeCount: number;
  logLevel: string;
  ready: boolean;
}

export function buildConfigView(ctx: AppContext): ConfigView {
  const { config } = ctx;
  const secret = config.getClientSecret();
  return {
    configPath: config.getConfigPath(),
    baseUrl: config.getBaseUrl() ?? null,
    clientId: config.getClientId() ?? null,
    clientSecret: secret ? maskSecret(secret) : null,
    scopeCount: parseScopes(config.getScope()).length,
    logLevel: config.getLogLevel(),
    ready: config.hasCredentials(),
  };
}

/**
 * asio config
 */
export function createConfigCommand(ctx: AppContext): Command {
  return new Command('config')
    .description('Show the effective configuration (secret masked)')
    .action((_options: unknown, cmd: Command) => {
      const view = buildConfigView(ctx);
      if (resolveFormat(ctx, cmd) === 'json') {
        printJson(ctx, view);
        return;
      }

      const unset = '(not set)';
      ctx.output.log(
        renderTable(
          ['Setting', 'Source variable', 'Value'],
          [
            ['Base URL', ENV_BASE_URL, view.baseUrl ?? unset],
            ['Client ID', ENV_CLIENT_ID, view.clientId ?? unset],
            ['Client secret', ENV_CLIENT_SECRET, view.clientSecret ?? unset],
            ['Scopes', ENV_SCOPE, `${view.scopeCount} scope(s)`],
            ['Log level', ENV_LOG_LEVEL, view.logLevel],
          ],
          `Configuration (file: ${view.configPath})`
        )
      );
      if (!view.ready) {
        ctx.output.error('Missing required settings: set them in the environment, .env or the config file.');
      }
    });
}
