import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'budget-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger operations by operation (reserve, settle, refund) and outcome
 * (ok, idempotent, or the denial kind)
 */
export const ledgerOperationsTotal = new Counter({
  name: 'ledger_operations_total',
  help: 'Ledger operations by operation and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [registry],
});

/**
 * Last derived used-today figure per principal
 */
export const budgetUsedTokens = new Gauge({
  name: 'budget_used_tokens',
  help: 'Tokens charged against the current budget day',
  labelNames: ['principal'] as const,
  registers: [registry],
});

export const admissionDecisionsTotal = new Counter({
  name: 'admission_decisions_total',
  help: 'Admission gate decisions by verdict',
  labelNames: ['verdict'] as const,
  registers: [registry],
});

// ============================================
// Store Metrics
// ============================================

/**
 * Primary store failures that were served by the local fallback
 */
export const storeFallbacksTotal = new Counter({
  name: 'store_fallbacks_total',
  help: 'Primary store calls retried against the local fallback',
  labelNames: ['operation'] as const, // insert, select, update
  registers: [registry],
});

// ============================================
// Cache Metrics
// ============================================

export const cacheLookupsTotal = new Counter({
  name: 'cache_lookups_total',
  help: 'Cache lookups by tier and outcome',
  labelNames: ['tier', 'outcome'] as const, // memory/disk, hit/miss/expired/corrupt
  registers: [registry],
});

// ============================================
// Coordination Metrics
// ============================================

export const coordinationMessagesTotal = new Counter({
  name: 'coordination_messages_total',
  help: 'Coordination messages by direction',
  labelNames: ['direction'] as const, // sent, processed, failed
  registers: [registry],
});

export const coordinationCyclesTotal = new Counter({
  name: 'coordination_cycles_total',
  help: 'Coordination cycles by verdict',
  labelNames: ['triggered'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
