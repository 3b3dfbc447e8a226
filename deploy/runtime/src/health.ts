/**
 * Health Endpoints — Kubernetes-standard probes
 *
 * Exposes three probe paths as a Hono sub-app:
 *   /health/live    — Liveness: always 200 (process is alive), no side effects
 *   /health/ready   — Readiness: 503 until startup completes, then key store ping
 *   /health/startup — Startup: 503 until initialization completes, then 200
 *
 * Usage:
 *   const health = createHealthApp(store);
 *   app.route('/', health.app);
 *   // after initialization completes:
 *   health.markReady();
 */

import { Hono } from 'hono';

import type { KeyStore } from '../../../api/src/index.js';

export interface HealthProbes {
  app: Hono;
  markReady(): void;
}

export function createHealthApp(store: KeyStore): HealthProbes {
  let ready = false;
  const app = new Hono();

  app.get('/health/live', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() }, 200);
  });

  app.get('/health/ready', async (c) => {
    if (!ready) {
      return c.json({ status: 'not_ready' }, 503);
    }

    const start = Date.now();
    const ok = await store.ping();
    const keyStore = { ok, latencyMs: Date.now() - start };

    return c.json(
      {
        status: ok ? 'ok' : 'degraded',
        checks: { keyStore },
        timestamp: new Date().toISOString(),
      },
      ok ? 200 : 503,
    );
  });

  app.get('/health/startup', (c) => {
    if (!ready) {
      return c.json({ status: 'starting' }, 503);
    }
    return c.json({ status: 'ok', timestamp: new Date().toISOString() }, 200);
  });

  return {
    app,
    markReady() {
      ready = true;
    },
  };
}
