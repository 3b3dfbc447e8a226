/**
 * PostgREST KeyStore — the `license_keys` table behind a Supabase/PostgREST
 * REST endpoint (see api/migrations/001_license_keys.sql).
 *
 * First-use binding is a PATCH filtered on `bound_device_id=is.null`, so the
 * database applies it as one conditional UPDATE. An empty representation
 * means the guard did not match.
 */

import type { LicenseRecord } from '../licensing/types.js';
import { decodeRows, toRow } from './codec.js';
import {
  StorageUnavailableError,
  type BindResult,
  type KeyStore,
  type LicensePatch,
} from './types.js';

export interface PostgrestConfig {
  url: string;
  apiKey: string;
  table?: string;
}

// ============================================
// Request helper
// ============================================

async function postgrestRequest(
  config: PostgrestConfig,
  operation: string,
  path: string,
  init: { method?: string; body?: unknown; prefer?: string } = {},
): Promise<LicenseRecord[]> {
  const headers: Record<string, string> = {
    apikey: config.apiKey,
    Authorization: `Bearer ${config.apiKey}`,
    'Content-Type': 'application/json',
  };
  if (init.prefer) headers.Prefer = init.prefer;

  let response: Response;
  try {
    response = await fetch(`${config.url}/rest/v1/${path}`, {
      method: init.method ?? 'GET',
      headers,
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
    });
  } catch (err) {
    throw new StorageUnavailableError('postgrest', operation, err);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => response.statusText);
    throw new StorageUnavailableError('postgrest', operation, `${response.status} ${text}`);
  }

  const rows = decodeRows(await response.json());
  if (!rows) {
    throw new StorageUnavailableError('postgrest', operation, 'malformed response');
  }
  return rows;
}

// ============================================
// Store
// ============================================

export class PostgrestKeyStore implements KeyStore {
  private readonly config: PostgrestConfig;
  private readonly table: string;

  constructor(config: PostgrestConfig) {
    this.config = config;
    this.table = config.table ?? 'license_keys';
  }

  private byKey(key: string): string {
    return `${this.table}?key=eq.${encodeURIComponent(key)}`;
  }

  async get(key: string): Promise<LicenseRecord | null> {
    const rows = await postgrestRequest(this.config, 'get', `${this.byKey(key)}&select=*`);
    return rows[0] ?? null;
  }

  async insert(record: LicenseRecord): Promise<boolean> {
    const rows = await postgrestRequest(this.config, 'insert', this.table, {
      method: 'POST',
      body: toRow(record),
      prefer: 'resolution=ignore-duplicates,return=representation',
    });
    return rows.length === 1;
  }

  async insertMany(records: LicenseRecord[]): Promise<string[]> {
    const unique = new Map<string, LicenseRecord>();
    for (const record of records) {
      if (!unique.has(record.key)) unique.set(record.key, record);
    }
    if (unique.size === 0) return [];

    const rows = await postgrestRequest(this.config, 'insert_many', this.table, {
      method: 'POST',
      body: [...unique.values()].map(toRow),
      prefer: 'resolution=ignore-duplicates,return=representation',
    });
    const inserted = new Set(rows.map((r) => r.key));
    return [...unique.keys()].filter((key) => inserted.has(key));
  }

  async bindIfUnbound(key: string, deviceId: string, at: Date): Promise<BindResult> {
    const rows = await postgrestRequest(
      this.config,
      'bind',
      `${this.byKey(key)}&bound_device_id=is.null`,
      {
        method: 'PATCH',
        body: { bound_device_id: deviceId, issuance_date: at.toISOString() },
        prefer: 'return=representation',
      },
    );
    if (rows[0]) return { status: 'bound', record: rows[0] };

    const current = await this.get(key);
    return current ? { status: 'already_bound', record: current } : { status: 'not_found' };
  }

  async update(key: string, patch: LicensePatch): Promise<LicenseRecord | null> {
    const body: Record<string, unknown> = {};
    if (patch.revoked !== undefined) body.revoked = patch.revoked;
    if (patch.validForDays !== undefined) body.valid_for_days = patch.validForDays;
    if (Object.keys(body).length === 0) return this.get(key);

    const rows = await postgrestRequest(this.config, 'update', this.byKey(key), {
      method: 'PATCH',
      body,
      prefer: 'return=representation',
    });
    return rows[0] ?? null;
  }

  async list(): Promise<LicenseRecord[]> {
    return postgrestRequest(
      this.config,
      'list',
      `${this.table}?select=*&order=creation_date.desc,key.asc`,
    );
  }

  async ping(): Promise<boolean> {
    try {
      const resp = await fetch(`${this.config.url}/rest/v1/`, {
        method: 'HEAD',
        headers: { apikey: this.config.apiKey },
        signal: AbortSignal.timeout(5000),
      });
      return resp.status < 500;
    } catch {
      return false;
    }
  }
}
