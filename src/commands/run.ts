/**
 * Run Command
 * 排程精靈 - 選擇公司、端點與腳本，收集參數，排程後監控完成
 */

import { Command } from 'commander';
import { companyLabel } from './companies.js';
import { printJson, resolveFormat, withOperation, withRateLimitWait } from './shared.js';
import { watchTask } from './tasks.js';
import { DEFAULT_TASK_NAME } from '../services/api.js';
import { companyAliases, endpointAliases, scriptAliases } from '../services/catalog.js';
import { FIELD_NAMES, pickString, pickTimestamp } from '../lib/payload-fields.js';
import { collectScriptParameters } from '../lib/script-parameters.js';
import { chooseItem } from '../shell/prompter.js';
import type { AppContext } from '../shell/context.js';
import type { Endpoint, Script } from '../types/api.js';

const DEFAULT_TEMPLATE_TYPE = 'fusionscript';

function endpointLabel(endpoint: Endpoint): string {
  const name = pickString(endpoint, ['friendlyName', 'endpointId']);
  return `${name} | ${pickString(endpoint, ['endpointType'])} | ${pickString(endpoint, ['osType'])}`;
}

function scriptLabel(script: Script): string {
  return `${pickString(script, ['name'])} (${pickString(script, ['scriptCategory'])})`;
}

/**
 * asio run
 */
export function createRunCommand(ctx: AppContext): Command {
  return new Command('run')
    .description('Interactive wizard to schedule a script, collect parameters, and watch results')
    .option('--no-watch', 'schedule only, do not wait for completion')
    .action(async (options: { watch: boolean }, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const prompter = ctx.requirePrompter();
      const { api, catalog } = ctx.getServices();

      const scheduled = await withOperation(ctx, async () => {
        const companies = await catalog.loadCompanies();
        ctx.debugPrint('run:companies', companies);
        if (companies.length === 0) {
          ctx.output.log('No companies available.');
          return undefined;
        }
        const company = await chooseItem(prompter, 'Select company', companies, {
          label: companyLabel,
          aliases: companyAliases,
        });
        ctx.debugPrint('run:selected_company', company);
        if (!company) {
          return undefined;
        }

        const companyId = pickString(company, ['id']);
        const endpoints = await catalog.loadEndpoints(companyId);
        ctx.debugPrint(`run:endpoints:${companyId}`, endpoints);
        if (endpoints.length === 0) {
          ctx.output.log('No endpoints for the selected company.');
          return undefined;
        }
        const endpoint = await chooseItem(prompter, 'Select endpoint', endpoints, {
          label: endpointLabel,
          aliases: endpointAliases,
        });
        ctx.debugPrint('run:selected_endpoint', endpoint);
        if (!endpoint) {
          return undefined;
        }

        const scripts = await catalog.loadScripts();
        ctx.debugPrint('run:scripts', scripts);
        if (scripts.length === 0) {
          ctx.output.log('No scripts to schedule.');
          return undefined;
        }
        const script = await chooseItem(prompter, 'Select script', scripts, {
          label: scriptLabel,
          aliases: scriptAliases,
        });
        ctx.debugPrint('run:selected_script', script);
        if (!script) {
          return undefined;
        }

        const defaultName = pickString(script, ['name']) || DEFAULT_TASK_NAME;
        const taskName = (await prompter.ask(`Task name [${defaultName}]: `)).trim() || defaultName;

        const definition = script.hasParameters ? await catalog.findTaskDefinitionForScript(script) : undefined;
        const userParameters = await collectScriptParameters(Boolean(script.hasParameters), definition, prompter);

        const response = await withRateLimitWait(ctx, () =>
          api.scheduleScript({
            templateId: pickString(script, ['id']),
            templateType: pickString(script, ['templateType']) || DEFAULT_TEMPLATE_TYPE,
            endpointIds: [pickString(endpoint, ['endpointId'])],
            name: taskName,
            userParameters,
          })
        );
        ctx.debugPrint('run:schedule_response', response);
        return response;
      });

      if (!scheduled) {
        return;
      }

      const taskId = pickString(scheduled, FIELD_NAMES.taskId);
      if (format === 'json') {
        printJson(ctx, scheduled);
      } else {
        ctx.output.log('Task scheduled successfully.');
        if (taskId) {
          ctx.output.log(`Task ID: ${taskId}`);
        }
      }

      if (taskId && options.watch) {
        const submittedAt = pickTimestamp(scheduled, FIELD_NAMES.submittedAt) ?? new Date();
        await watchTask(ctx, taskId, { format, submittedAt });
      }
    });
}
