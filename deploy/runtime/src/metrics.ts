/**
 * Prometheus Metrics — prom-client integration
 *
 * Exposes a /metrics endpoint via a Hono sub-app and provides helper
 * functions for instrumenting HTTP traffic, validations and admin actions.
 *
 * Metrics:
 *   http_requests_total{route,status}             — Counter
 *   http_request_duration_seconds{route}          — Histogram
 *   license_validations_total{decision}           — Counter
 *   license_admin_actions_total{action}           — Counter
 *   + default process_* and nodejs_* metrics
 */

import { Hono } from 'hono';
import client from 'prom-client';

// ---------------------------------------------------------------------------
// Registry & default metrics
// ---------------------------------------------------------------------------

export const register = new client.Registry();

// Collect default Node.js process metrics (GC, event loop, memory, etc.)
client.collectDefaultMetrics({ register });

// ---------------------------------------------------------------------------
// Custom metrics
// ---------------------------------------------------------------------------

const requestsTotal = new client.Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['route', 'status'] as const,
  registers: [register],
});

const requestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['route'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

const validationsTotal = new client.Counter({
  name: 'license_validations_total',
  help: 'License validations by decision',
  labelNames: ['decision'] as const,
  registers: [register],
});

const adminActionsTotal = new client.Counter({
  name: 'license_admin_actions_total',
  help: 'Successful admin mutations by action',
  labelNames: ['action'] as const,
  registers: [register],
});

// ---------------------------------------------------------------------------
// Helper functions
// ---------------------------------------------------------------------------

export function incRequests(route: string, status: number): void {
  requestsTotal.inc({ route, status: String(status) });
}

export function incValidation(decision: string): void {
  validationsTotal.inc({ decision });
}

export function incAdminAction(action: string): void {
  adminActionsTotal.inc({ action });
}

/**
 * Create a timer that records request duration when stopped.
 * Usage:
 *   const end = startRequestTimer('validate');
 *   // ... handle request ...
 *   end();
 */
export function startRequestTimer(route: string): () => void {
  const end = requestDuration.startTimer({ route });
  return () => {
    end();
  };
}

/** Low-cardinality route label for a request path. */
export function routeLabel(path: string): string {
  if (path === '/validate_license' || path === '/v1/licenses/validate') return 'validate';
  if (path.startsWith('/v1/admin/')) return 'admin';
  if (path === '/health') return 'health';
  return 'other';
}

// ---------------------------------------------------------------------------
// Hono sub-app
// ---------------------------------------------------------------------------

export const metricsApp = new Hono();

metricsApp.get('/metrics', async (c) => {
  const metrics = await register.metrics();
  return c.text(metrics, 200, {
    'Content-Type': register.contentType,
  });
});
