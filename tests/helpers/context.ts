/**
 * Test context
 * 以替身執行者建立完整的工作階段（不連網）
 */

import os from 'node:os';
import path from 'node:path';
import { AutomationApiClient } from '../../src/services/api.js';
import { CatalogService } from '../../src/services/catalog.js';
import { ConfigService } from '../../src/services/config.js';
import { ScopeDiscoveryEngine, type ScopeExchanger } from '../../src/services/scope-discovery.js';
import { TaskCompletionMonitor } from '../../src/services/task-monitor.js';
import type { Sleeper } from '../../src/services/rate-limit.js';
import { AppContext, createDefaultServices } from '../../src/shell/context.js';
import { FakeExecutor, MemoryOutput, ScriptedPrompter } from './fakes.js';

const MISSING_DIR = path.join(os.tmpdir(), 'asio-shell-test-missing');

export const TEST_ENV: NodeJS.ProcessEnv = {
  ASIO_BASE_URL: 'https://example.test',
  ASIO_CLIENT_ID: 'test-client',
  ASIO_CLIENT_SECRET: 'test-secret',
  ASIO_SCOPE: 'platform.companies.read platform.automation.read',
};

export interface TestContextOptions {
  executor?: FakeExecutor;
  exchanger?: ScopeExchanger;
  answers?: string[];
  env?: NodeJS.ProcessEnv;
}

export interface TestContext {
  ctx: AppContext;
  output: MemoryOutput;
  prompter: ScriptedPrompter;
  executor: FakeExecutor;
  /** 假時鐘（毫秒） */
  clock: { now: number };
}

export function createConfig(env: NodeJS.ProcessEnv): ConfigService {
  return new ConfigService({
    env: { ...env },
    dotenvPath: path.join(MISSING_DIR, '.env'),
    configPath: path.join(MISSING_DIR, 'config.json'),
  });
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const output = new MemoryOutput();
  const prompter = new ScriptedPrompter(options.answers ?? []);
  const executor = options.executor ?? new FakeExecutor();
  const clock = { now: Date.parse('2024-03-01T10:00:00Z') };
  const sleep: Sleeper = async (ms, signal) => {
    if (signal?.aborted) {
      return false;
    }
    clock.now += ms;
    return true;
  };

  const ctx = new AppContext({
    config: createConfig(options.env ?? TEST_ENV),
    output,
    prompter,
    sleep,
    createServices: (context) => {
      const services = createDefaultServices(context);
      const api = new AutomationApiClient(executor);
      return {
        ...services,
        api,
        catalog: new CatalogService(api, {
          waitOptions: () => context.waitOptions(),
          onRateLimit: (error) => context.reportRateLimit(error),
          onLookupError: (message) => context.output.error(message),
        }),
        monitor: new TaskCompletionMonitor(api, { now: () => clock.now, sleep }),
        scopes: new ScopeDiscoveryEngine(options.exchanger ?? services.tokens, { wait: async () => true }),
      };
    },
  });

  return { ctx, output, prompter, executor, clock };
}
