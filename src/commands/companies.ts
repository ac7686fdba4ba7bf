/**
 * Companies Command
 * 公司、站點與端點查詢指令
 */

import { Command } from 'commander';
import { printJson, resolveFormat, withOperation, withRateLimitWait } from './shared.js';
import { pickString } from '../lib/payload-fields.js';
import { renderTable } from '../shell/render.js';
import type { AppContext } from '../shell/context.js';
import type { Company } from '../types/api.js';

export function companyLabel(company: Company): string {
  return pickString(company, ['friendlyName', 'name', 'id']);
}

/**
 * @throws Error 找不到公司時
 */
async function requireCompany(ctx: AppContext, identifier: string): Promise<Company> {
  const company = await withOperation(ctx, () => ctx.getServices().catalog.resolveCompany(identifier));
  if (!company) {
    throw new Error(`Unknown company '${identifier}'. Run 'companies' to see available options.`);
  }
  return company;
}

/**
 * asio companies
 */
export function createCompaniesCommand(ctx: AppContext): Command {
  return new Command('companies')
    .description('List companies your credentials can access')
    .action(async (_options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const companies = await withOperation(ctx, () =>
        ctx.getServices().catalog.loadCompanies({ forceRefresh: true })
      );
      ctx.debugPrint('companies', companies);

      if (format === 'json') {
        printJson(ctx, { count: companies.length, companies });
        return;
      }
      if (companies.length === 0) {
        ctx.output.log('No companies returned.');
        return;
      }
      ctx.output.log(
        renderTable(
          ['#', 'ID', 'Name', 'Friendly Name'],
          companies.map((company, index) => [
            String(index + 1),
            pickString(company, ['id']),
            pickString(company, ['name']),
            pickString(company, ['friendlyName']),
          ]),
          'Companies'
        )
      );
    });
}

/**
 * asio sites <company>
 */
export function createSitesCommand(ctx: AppContext): Command {
  return new Command('sites')
    .description('List sites for a company (ID, name, friendly name or list number)')
    .argument('<company...>', 'company identifier')
    .action(async (words: string[], _options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const company = await requireCompany(ctx, words.join(' '));
      const companyId = pickString(company, ['id']);
      const { api } = ctx.getServices();
      const sites = await withRateLimitWait(ctx, () => api.listCompanySites(companyId));
      ctx.debugPrint(`sites:${companyId}`, sites);

      if (format === 'json') {
        printJson(ctx, { companyId, count: sites.length, sites });
        return;
      }
      if (sites.length === 0) {
        ctx.output.log(`No sites found for company ${companyId}.`);
        return;
      }
      ctx.output.log(
        renderTable(
          ['#', 'Site ID', 'Name'],
          sites.map((site, index) => [
            String(index + 1),
            pickString(site, ['id', 'siteId']),
            pickString(site, ['name', 'friendlyName']),
          ]),
          `Sites for ${companyLabel(company)}`
        )
      );
    });
}

/**
 * asio endpoints <company>
 */
export function createEndpointsCommand(ctx: AppContext): Command {
  return new Command('endpoints')
    .description('List endpoints for a company (ID, name, friendly name or list number)')
    .argument('<company...>', 'company identifier')
    .action(async (words: string[], _options: unknown, cmd: Command) => {
      const format = resolveFormat(ctx, cmd);
      const company = await requireCompany(ctx, words.join(' '));
      const companyId = pickString(company, ['id']);
      const endpoints = await withOperation(ctx, () =>
        ctx.getServices().catalog.loadEndpoints(companyId, { forceRefresh: true })
      );
      ctx.debugPrint(`endpoints:${companyId}`, endpoints);

      if (format === 'json') {
        printJson(ctx, { companyId, count: endpoints.length, endpoints });
        return;
      }
      if (endpoints.length === 0) {
        ctx.output.log(`No endpoints found for company ${companyId}.`);
        return;
      }
      ctx.output.log(
        renderTable(
          ['#', 'Endpoint ID', 'Friendly Name', 'Type', 'OS', 'Site ID'],
          endpoints.map((endpoint, index) => [
            String(index + 1),
            pickString(endpoint, ['endpointId']),
            pickString(endpoint, ['friendlyName']),
            pickString(endpoint, ['endpointType']),
            pickString(endpoint, ['osType']),
            pickString(endpoint, ['siteId']),
          ]),
          `Endpoints for ${companyLabel(company)}`
        )
      );
    });
}
