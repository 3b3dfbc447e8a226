/**
 * HTTP Server — Hono-based request handling
 *
 * Responsibilities:
 *   1. Creates the Hono app with health, metrics, and CORS middleware
 *   2. Routes all other requests to the license API worker's fetch() handler
 *   3. Instruments requests with Prometheus metrics
 *   4. Exports createApp() for use by the entrypoint and tests
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';

import {
  createApiWorker,
  type AdminGuard,
  type Clock,
  type KeyStore,
  type LicenseEventSink,
} from '../../../api/src/index.js';
import { createTokenGuard } from './auth.js';
import { createEventSink } from './events.js';
import { createHealthApp } from './health.js';
import { incRequests, metricsApp, routeLabel, startRequestTimer } from './metrics.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServerConfig {
  store: KeyStore;
  adminToken?: string;
  /** Overrides the token guard, e.g. when an upstream proxy authenticates */
  requireAdmin?: AdminGuard;
  clock?: Clock;
  events?: LicenseEventSink;
}

export interface ServerApp {
  app: Hono;
  markReady(): void;
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export function createApp(config: ServerConfig): ServerApp {
  const app = new Hono();
  const health = createHealthApp(config.store);

  const worker = createApiWorker({
    store: config.store,
    requireAdmin: config.requireAdmin ?? createTokenGuard(config.adminToken),
    clock: config.clock,
    events: config.events ?? createEventSink(),
  });

  // -------------------------------------------------------------------------
  // Middleware
  // -------------------------------------------------------------------------

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
      maxAge: 86400,
    }),
  );

  // -------------------------------------------------------------------------
  // Health + Metrics sub-apps
  // -------------------------------------------------------------------------

  app.route('/', health.app);
  app.route('/', metricsApp);

  // -------------------------------------------------------------------------
  // License API — all other routes
  // -------------------------------------------------------------------------

  app.all('*', async (c) => {
    const route = routeLabel(new URL(c.req.url).pathname);
    const endTimer = startRequestTimer(route);

    try {
      const response = await worker.fetch(c.req.raw);
      incRequests(route, response.status);
      endTimer();
      return response;
    } catch (err) {
      endTimer();
      incRequests(route, 500);

      console.error('[server] Unhandled error in license API:', err);

      return c.json(
        {
          error: 'Internal server error',
          message: err instanceof Error ? err.message : 'Unknown error',
        },
        500,
      );
    }
  });

  return { app, markReady: health.markReady };
}
