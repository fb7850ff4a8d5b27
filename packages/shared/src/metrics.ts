/**
 * Prometheus Metrics
 *
 * Metrics for monitoring audit runs, model calls and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Enable default process metrics (CPU, memory, etc.).
 * Called by long-running services only; wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const auditsCounter = new promClient.Counter({
  name: 'governance_audit_runs_total',
  help: 'Total number of audit runs by final analysis status',
  labelNames: ['status'],
  registers: [register],
});

export const auditFailuresCounter = new promClient.Counter({
  name: 'governance_audit_failures_total',
  help: 'Audit failures recovered into an error result, by kind',
  labelNames: ['kind'],
  registers: [register],
});

export const pageSelectionCounter = new promClient.Counter({
  name: 'governance_audit_page_selection_total',
  help: 'Page selection outcomes (matched related-party pages or fallback prefix)',
  labelNames: ['mode'],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'governance_audit_stage_duration_seconds',
  help: 'Duration of each pipeline stage',
  labelNames: ['stage'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'governance_audit_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'governance_audit_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'governance_audit_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 60],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'governance_audit_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
