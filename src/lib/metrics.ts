/**
 * Prometheus 指標收集
 * 追蹤 API、認證、速率限制、範圍探測與任務輪詢
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * API 指標
 */
export const apiRequestsTotal = new Counter({
  name: 'asio_api_requests_total',
  help: 'API 請求總數',
  labelNames: ['method', 'status']
});

export const apiRequestDurationSeconds = new Histogram({
  name: 'asio_api_request_duration_seconds',
  help: 'API 請求延遲（秒）',
  labelNames: ['method'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.0, 5.0, 10.0]
});

/**
 * 速率限制指標
 */
export const rateLimitedTotal = new Counter({
  name: 'asio_rate_limited_total',
  help: 'HTTP 429 回應次數',
  labelNames: ['source'] // 'token' | 'api'
});

export const rateLimitWaitSecondsTotal = new Counter({
  name: 'asio_rate_limit_wait_seconds_total',
  help: '因速率限制而等待的總秒數'
});

/**
 * 認證服務指標
 */
export const authTokenRequestsTotal = new Counter({
  name: 'asio_auth_token_requests_total',
  help: '認證 Token 請求總數',
  labelNames: ['status'] // 'success' | 'failed' | 'rate_limited'
});

export const authCacheHitsTotal = new Counter({
  name: 'asio_auth_cache_hits_total',
  help: '認證快取命中次數'
});

export const authCacheMissesTotal = new Counter({
  name: 'asio_auth_cache_misses_total',
  help: '認證快取未命中次數'
});

/**
 * 範圍探測與任務輪詢指標
 */
export const scopeProbesTotal = new Counter({
  name: 'asio_scope_probes_total',
  help: '範圍探測次數',
  labelNames: ['phase', 'result'] // phase: 'individual' | 'combination'
});

export const taskPollsTotal = new Counter({
  name: 'asio_task_polls_total',
  help: '任務摘要輪詢次數'
});

export const taskOutcomesTotal = new Counter({
  name: 'asio_task_outcomes_total',
  help: '任務監控結果',
  labelNames: ['state']
});

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

export function getMetricsJson(): ReturnType<typeof register.getMetricsAsJSON> {
  return register.getMetricsAsJSON();
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}

export function recordApiRequest(method: string, statusCode: number, durationMs: number): void {
  apiRequestsTotal.inc({ method, status: String(statusCode) });
  apiRequestDurationSeconds.observe({ method }, durationMs / 1000);
}

export function recordRateLimited(source: 'token' | 'api'): void {
  rateLimitedTotal.inc({ source });
}

export function recordRateLimitWait(seconds: number): void {
  rateLimitWaitSecondsTotal.inc(seconds);
}

export function recordAuthTokenRequest(status: 'success' | 'failed' | 'rate_limited'): void {
  authTokenRequestsTotal.inc({ status });
}

export function recordAuthCacheHit(): void {
  authCacheHitsTotal.inc();
}

export function recordAuthCacheMiss(): void {
  authCacheMissesTotal.inc();
}

export function recordScopeProbe(phase: 'individual' | 'combination', allowed: boolean): void {
  scopeProbesTotal.inc({ phase, result: allowed ? 'allowed' : 'denied' });
}

export function recordTaskPoll(): void {
  taskPollsTotal.inc();
}

export function recordTaskOutcome(state: string): void {
  taskOutcomesTotal.inc({ state });
}
