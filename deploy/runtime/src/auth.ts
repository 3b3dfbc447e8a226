/**
 * Shared-token admin guard for self-hosted deployments.
 *
 * Admin requests carry `Authorization: Bearer <ADMIN_TOKEN>`. Without a
 * configured token every admin request is refused.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import type { AdminGuard } from '../../../api/src/index.js';

function unauthorized(message: string): Response {
  return new Response(JSON.stringify({ error: message }), {
    status: 401,
    headers: {
      'Content-Type': 'application/json',
      'WWW-Authenticate': 'Bearer',
    },
  });
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function createTokenGuard(adminToken: string | undefined): AdminGuard {
  const expected = adminToken ? digest(adminToken) : null;

  return async (request: Request) => {
    if (!expected) return unauthorized('Admin API is disabled');

    const header = request.headers.get('authorization') ?? '';
    const match = header.match(/^Bearer\s+(.+)$/i);
    if (!match) return unauthorized('Admin token required');

    // timingSafeEqual needs equal lengths; compare digests.
    if (!timingSafeEqual(digest(match[1].trim()), expected)) {
      return unauthorized('Invalid admin token');
    }
    return { sub: 'admin-token' };
  };
}
