/**
 * App Context
 * 工作階段狀態 - 延遲建立服務、除錯開關、目前操作的取消控制
 */

import { AutomationApiClient } from '../services/api.js';
import { TokenManager } from '../services/auth.js';
import { CatalogService } from '../services/catalog.js';
import { ConfigService } from '../services/config.js';
import { RateLimitedExecutor } from '../services/executor.js';
import { ScopeDiscoveryEngine } from '../services/scope-discovery.js';
import { TaskCompletionMonitor, type TaskMonitorOptions } from '../services/task-monitor.js';
import {
  rateLimitWaitSeconds,
  waitForRateLimit,
  type RateLimitWaitOptions,
  type Sleeper,
} from '../services/rate-limit.js';
import type { RateLimitedError } from '../services/errors.js';
import { consoleOutput, createDebugPrinter, renderJson, type Output, type OutputFormat } from './render.js';
import type { DebugRecorder } from '../types/debug.js';
import type { Prompter } from '../types/prompt.js';

export interface Services {
  tokens: TokenManager;
  executor: RateLimitedExecutor;
  api: AutomationApiClient;
  catalog: CatalogService;
  monitor: TaskCompletionMonitor;
  scopes: ScopeDiscoveryEngine;
}

export interface AppContextOptions {
  config?: ConfigService;
  output?: Output;
  prompter?: Prompter;
  /** 建立服務的方式（測試時可替換） */
  createServices?: (ctx: AppContext) => Services;
  monitor?: TaskMonitorOptions;
  format?: OutputFormat;
  /** 速率限制等待使用的 sleep（測試時可替換） */
  sleep?: Sleeper;
}

/**
 * 以設定建立服務
 * @throws ConfigError 缺少必要設定
 */
export function createDefaultServices(ctx: AppContext, monitorOptions: TaskMonitorOptions = {}): Services {
  const appConfig = ctx.config.getAppConfig();
  const tokens = new TokenManager(appConfig, {
    loginRecorder: ctx.loginRecorder(),
    httpRecorder: ctx.httpRecorder(),
  });
  const executor = new RateLimitedExecutor(appConfig.baseUrl, tokens, { httpRecorder: ctx.httpRecorder() });
  const api = new AutomationApiClient(executor);
  const catalog = new CatalogService(api, {
    waitOptions: () => ctx.waitOptions(),
    onRateLimit: (error) => ctx.reportRateLimit(error),
    onLookupError: (message) => ctx.output.error(message),
  });
  const monitor = new TaskCompletionMonitor(api, monitorOptions);
  const scopes = new ScopeDiscoveryEngine(tokens, {
    onRateLimit: (error) => ctx.reportRateLimit(error),
    wait: (error) => waitForRateLimit(error, ctx.waitOptions()),
  });
  return { tokens, executor, api, catalog, monitor, scopes };
}

export class AppContext {
  readonly config: ConfigService;
  readonly output: Output;
  prompter?: Prompter;
  format: OutputFormat;

  private debugEnabled = false;
  private loginDebugEnabled = false;
  private services?: Services;
  private createServices: (ctx: AppContext) => Services;
  private activeController: AbortController | null = null;
  private operationDepth = 0;
  private sleep?: Sleeper;

  constructor(options: AppContextOptions = {}) {
    this.config = options.config ?? new ConfigService();
    this.output = options.output ?? consoleOutput;
    this.prompter = options.prompter;
    this.format = options.format ?? 'table';
    this.sleep = options.sleep;
    this.createServices = options.createServices ?? ((ctx) => createDefaultServices(ctx, options.monitor));
  }

  /**
   * 第一次使用時才讀取設定並建立服務
   * @throws ConfigError 缺少必要設定（此時尚未有任何網路請求）
   */
  getServices(): Services {
    if (!this.services) {
      this.services = this.createServices(this);
    }
    return this.services;
  }

  requirePrompter(): Prompter {
    if (!this.prompter) {
      throw new Error('This command needs an interactive terminal');
    }
    return this.prompter;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  isLoginDebugEnabled(): boolean {
    return this.loginDebugEnabled;
  }

  /**
   * 命令輸出除錯（含 HTTP 快照）
   */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
    this.services?.tokens.setHttpRecorder(this.httpRecorder());
    this.services?.executor.setHttpRecorder(this.httpRecorder());
  }

  /**
   * 登入流程除錯（--debug）
   */
  setLoginDebug(enabled: boolean): void {
    this.loginDebugEnabled = enabled;
    this.services?.tokens.setLoginRecorder(this.loginRecorder());
  }

  httpRecorder(): DebugRecorder | undefined {
    return this.debugEnabled ? createDebugPrinter(this.output, 'HTTP') : undefined;
  }

  loginRecorder(): DebugRecorder | undefined {
    return this.loginDebugEnabled ? createDebugPrinter(this.output, 'LOGIN DEBUG') : undefined;
  }

  debugPrint(label: string, payload: unknown): void {
    if (!this.debugEnabled) {
      return;
    }
    this.output.error(`DEBUG ${label}`);
    this.output.error(renderJson(payload));
  }

  /**
   * 開始一個可被 Ctrl+C 取消的操作（巢狀呼叫共用同一個訊號）
   */
  beginOperation(): AbortSignal {
    if (!this.activeController) {
      this.activeController = new AbortController();
    }
    this.operationDepth++;
    return this.activeController.signal;
  }

  endOperation(): void {
    this.operationDepth = Math.max(0, this.operationDepth - 1);
    if (this.operationDepth === 0) {
      this.activeController = null;
    }
  }

  currentSignal(): AbortSignal | undefined {
    return this.activeController?.signal;
  }

  /**
   * 取消目前的操作
   * @returns 是否有操作被取消
   */
  interrupt(): boolean {
    if (!this.activeController || this.activeController.signal.aborted) {
      return false;
    }
    this.activeController.abort();
    return true;
  }

  waitOptions(): RateLimitWaitOptions {
    return {
      signal: this.currentSignal(),
      sleep: this.sleep,
      onTick: (remaining) => this.output.log(`${remaining} seconds remaining...`),
    };
  }

  reportRateLimit(error: RateLimitedError): void {
    this.output.log(`API rate limit reached. Retrying in ${rateLimitWaitSeconds(error)} seconds...`);
  }
}
