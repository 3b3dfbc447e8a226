/**
 * keybind License API
 *
 * Routes:
 * - GET    /health                          - Health check
 * - POST   /validate_license                - Validate a key for a device
 * - POST   /v1/licenses/validate            - Same, versioned path
 * - GET    /v1/admin/keys                   - List keys, newest first
 * - POST   /v1/admin/keys                   - Create a key
 * - POST   /v1/admin/keys/bulk              - Create many keys (insert-if-absent)
 * - POST   /v1/admin/keys/generate          - Generate and create N keys
 * - GET    /v1/admin/keys/:key              - Key detail
 * - PATCH  /v1/admin/keys/:key              - Change valid_for_days
 * - POST   /v1/admin/keys/:key/revoke       - Revoke
 * - POST   /v1/admin/keys/:key/reinstate    - Reinstate
 */

import { AdminOperations } from './licensing/admin.js';
import type { LicenseEventSink } from './licensing/events.js';
import {
  corsHeaders,
  errorResponse,
  handleAdminBulkCreate,
  handleAdminCreateKey,
  handleAdminGenerateKeys,
  handleAdminKeyDetail,
  handleAdminListKeys,
  handleAdminModifyValidity,
  handleAdminReinstateKey,
  handleAdminRevokeKey,
  handleLicenseValidate,
  jsonResponse,
  type AdminGuard,
  type LicensingContext,
} from './licensing/handlers.js';
import { KeyGenerationError } from './licensing/keygen.js';
import { ValidationService } from './licensing/service.js';
import type { Clock } from './licensing/types.js';
import { StorageUnavailableError, type KeyStore } from './store/types.js';

export interface ApiDeps {
  store: KeyStore;
  requireAdmin: AdminGuard;
  clock?: Clock;
  events?: LicenseEventSink;
}

export interface ApiWorker {
  fetch(request: Request): Promise<Response>;
}

const KEY_ROUTE = /^\/v1\/admin\/keys\/([^/]+)(?:\/(revoke|reinstate))?$/;

function decodeKeySegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

async function route(ctx: LicensingContext, request: Request): Promise<Response> {
  const url = new URL(request.url);
  const path = url.pathname.replace(/\/+$/, '') || '/';
  const method = request.method;

  if (method === 'OPTIONS') {
    return new Response(null, { status: 204, headers: corsHeaders });
  }

  if (path === '/health' && method === 'GET') {
    return jsonResponse({ status: 'ok', timestamp: new Date().toISOString() });
  }

  if ((path === '/validate_license' || path === '/v1/licenses/validate') && method === 'POST') {
    return handleLicenseValidate(ctx, request);
  }

  if (path === '/v1/admin/keys') {
    if (method === 'GET') return handleAdminListKeys(ctx, request);
    if (method === 'POST') return handleAdminCreateKey(ctx, request);
  }
  if (path === '/v1/admin/keys/bulk' && method === 'POST') {
    return handleAdminBulkCreate(ctx, request);
  }
  if (path === '/v1/admin/keys/generate' && method === 'POST') {
    return handleAdminGenerateKeys(ctx, request);
  }

  const keyMatch = path.match(KEY_ROUTE);
  if (keyMatch) {
    const key = decodeKeySegment(keyMatch[1]);
    if (key === null) return errorResponse('Invalid key', 400);
    const action = keyMatch[2];
    if (action === 'revoke' && method === 'POST') return handleAdminRevokeKey(ctx, request, key);
    if (action === 'reinstate' && method === 'POST') return handleAdminReinstateKey(ctx, request, key);
    if (action === undefined && method === 'GET') return handleAdminKeyDetail(ctx, request, key);
    if (action === undefined && method === 'PATCH') return handleAdminModifyValidity(ctx, request, key);
  }

  return errorResponse('Not found', 404);
}

export function createApiWorker(deps: ApiDeps): ApiWorker {
  const ctx: LicensingContext = {
    validation: new ValidationService({ store: deps.store, clock: deps.clock, events: deps.events }),
    admin: new AdminOperations({ store: deps.store, clock: deps.clock, events: deps.events }),
    requireAdmin: deps.requireAdmin,
  };

  return {
    async fetch(request: Request): Promise<Response> {
      try {
        return await route(ctx, request);
      } catch (err) {
        if (err instanceof StorageUnavailableError || err instanceof KeyGenerationError) {
          console.error('[api] Storage error:', err.message);
          return errorResponse('Service temporarily unavailable', 503);
        }
        throw err;
      }
    },
  };
}

export { AdminOperations } from './licensing/admin.js';
export { ValidationService } from './licensing/service.js';
export { evaluateLicense, describeDecision, toPublicRecord, expiresOn } from './licensing/policy.js';
export type { AdminGuard, AdminPrincipal } from './licensing/handlers.js';
export type { LicenseEventSink, ValidationEvent, AdminEvent } from './licensing/events.js';
export type { Clock, LicenseRecord, PublicLicenseRecord } from './licensing/types.js';
export * from './store/index.js';
