/**
 * Scope Discovery Engine
 * 範圍探測 - 逐一測試 scope，再依原順序貪婪組合出可用的最大集合
 */

import { RateLimitedError } from './errors.js';
import { waitForRateLimit } from './rate-limit.js';
import { loggers } from '../lib/logger.js';
import { maskTokenFields, TOKEN_FIELD_NAMES } from '../lib/mask.js';
import { recordScopeProbe } from '../lib/metrics.js';
import { isJsonObject, toJsonValue, type JsonValue } from '../types/json.js';
import type { TokenExchange } from '../types/auth.js';

/**
 * 不經快取的 token 交換（TokenManager.exchange）
 */
export interface ScopeExchanger {
  exchange(scopes: readonly string[]): Promise<TokenExchange>;
}

export interface ScopeProbeResult {
  readonly scope: string;
  readonly allowed: boolean;
  /** Masked response body on success, masked error body or message on failure */
  readonly detail: JsonValue;
}

export interface ScopeCombinationResult extends ScopeProbeResult {
  /** The full scope set that was requested */
  readonly scopes: readonly string[];
}

export type ScopeDiscoveryStatus = 'no-scopes' | 'none-allowed' | 'none-combined' | 'complete';

export interface ScopeDiscoveryReport {
  status: ScopeDiscoveryStatus;
  probes: ScopeProbeResult[];
  combinations: ScopeCombinationResult[];
  /** Largest working combination, in configured order */
  accepted: string[];
}

export type ScopeDiscoveryPhase = 'individual' | 'combination';

export interface ScopeDiscoveryOptions {
  /** 等待速率限制；回傳 false 代表取消 */
  wait?: (error: RateLimitedError) => Promise<boolean>;
  onRateLimit?: (error: RateLimitedError, scopes: readonly string[]) => void;
  onProbe?: (phase: ScopeDiscoveryPhase, result: ScopeProbeResult) => void;
}

export class ScopeDiscoveryCancelledError extends Error {
  constructor() {
    super('Scope discovery cancelled');
    this.name = 'ScopeDiscoveryCancelledError';
  }
}

function errorDetail(error: unknown): JsonValue {
  if (error instanceof Error) {
    const body = 'body' in error ? error.body : undefined;
    if (body !== undefined && body !== null && body !== '') {
      return maskTokenFields(toJsonValue(body));
    }
    return error.message;
  }
  return String(error);
}

/**
 * 顯示用的精簡說明
 */
export function summarizeScopeDetail(detail: JsonValue | undefined): string {
  if (detail === undefined || detail === null) {
    return '';
  }
  if (Array.isArray(detail)) {
    const head = detail.slice(0, 3).map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
    return head.join(', ') + (detail.length > 3 ? '...' : '');
  }
  if (isJsonObject(detail)) {
    if ('error_description' in detail) {
      return String(detail.error_description);
    }
    if ('error' in detail) {
      return String(detail.error);
    }
    const rest = Object.fromEntries(Object.entries(detail).filter(([key]) => !TOKEN_FIELD_NAMES.has(key)));
    return JSON.stringify(rest);
  }
  return String(detail);
}

export class ScopeDiscoveryEngine {
  private exchanger: ScopeExchanger;
  private options: ScopeDiscoveryOptions;

  constructor(exchanger: ScopeExchanger, options: ScopeDiscoveryOptions = {}) {
    this.exchanger = exchanger;
    this.options = options;
  }

  /**
   * 兩階段探測
   * @throws ScopeDiscoveryCancelledError 等待速率限制時被取消
   */
  async discover(scopes: readonly string[]): Promise<ScopeDiscoveryReport> {
    const report: ScopeDiscoveryReport = { status: 'no-scopes', probes: [], combinations: [], accepted: [] };
    if (scopes.length === 0) {
      return report;
    }

    for (const scope of scopes) {
      const result = await this.probe([scope], 'individual');
      report.probes.push({ scope, allowed: result.allowed, detail: result.detail });
    }

    const passing = report.probes.filter((probe) => probe.allowed).map((probe) => probe.scope);
    if (passing.length === 0) {
      report.status = 'none-allowed';
      loggers.scope.info('No scope passed individually', { scopes: scopes.length });
      return report;
    }

    // 貪婪且依序：被拒絕的候選直接丟棄，不換順序重試
    for (const candidate of passing) {
      const requested = [...report.accepted, candidate];
      const result = await this.probe(requested, 'combination');
      report.combinations.push({ scope: candidate, scopes: requested, allowed: result.allowed, detail: result.detail });
      if (result.allowed) {
        report.accepted.push(candidate);
      }
    }

    report.status = report.accepted.length > 0 ? 'complete' : 'none-combined';
    loggers.scope.info('Scope discovery finished', {
      status: report.status,
      passing: passing.length,
      accepted: report.accepted.length,
    });
    return report;
  }

  private async probe(
    scopes: readonly string[],
    phase: ScopeDiscoveryPhase
  ): Promise<{ allowed: boolean; detail: JsonValue }> {
    for (;;) {
      try {
        const { body } = await this.exchanger.exchange(scopes);
        const detail = maskTokenFields(body);
        this.report(phase, scopes, true, detail);
        return { allowed: true, detail };
      } catch (error) {
        if (error instanceof RateLimitedError) {
          // 速率限制不算失敗：等待後重試同一組
          this.options.onRateLimit?.(error, scopes);
          const wait = this.options.wait ?? ((err: RateLimitedError) => waitForRateLimit(err));
          if (!(await wait(error))) {
            throw new ScopeDiscoveryCancelledError();
          }
          continue;
        }
        const detail = errorDetail(error);
        this.report(phase, scopes, false, detail);
        return { allowed: false, detail };
      }
    }
  }

  private report(phase: ScopeDiscoveryPhase, scopes: readonly string[], allowed: boolean, detail: JsonValue): void {
    recordScopeProbe(phase, allowed);
    loggers.scope.debug('Scope probe', { phase, scopes: scopes.join(' '), allowed });
    const scope = scopes[scopes.length - 1] ?? '';
    this.options.onProbe?.(phase, { scope, allowed, detail });
  }
}
