/**
 * Admin operations — create, revoke, reinstate, re-window and generate keys.
 *
 * Results are values: `bad_request`, `not_found` and `conflict` are expected
 * outcomes. Storage failures propagate as StorageUnavailableError.
 */

import type { KeyStore } from '../store/types.js';
import { adminEvent, consoleEventSink, type AdminAction, type LicenseEventSink } from './events.js';
import { DEFAULT_KEY_FORMAT, KeyGenerationError, generateKey, type KeyFormat } from './keygen.js';
import { systemClock, type Clock, type LicenseRecord } from './types.js';

export type AdminErrorKind = 'bad_request' | 'not_found' | 'conflict';

export interface AdminError {
  kind: AdminErrorKind;
  message: string;
}

export type AdminResult<T> = { ok: true; value: T } | { ok: false; error: AdminError };

export interface BulkCreateResult {
  created: string[];
  skipped: string[];
}

export const MAX_GENERATE_COUNT = 1000;
const GENERATE_ATTEMPTS_PER_KEY = 20;

export interface AdminOperationsDeps {
  store: KeyStore;
  clock?: Clock;
  events?: LicenseEventSink;
}

function fail(kind: AdminErrorKind, message: string): { ok: false; error: AdminError } {
  return { ok: false, error: { kind, message } };
}

/** Expiry days must stay within the Date range and an int4 column. */
export const MAX_VALID_FOR_DAYS = 36_500;

export function isValidDays(value: unknown): value is number {
  return (
    typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_VALID_FOR_DAYS
  );
}

export const DAYS_ERROR = `valid_for_days must be an integer between 0 and ${MAX_VALID_FOR_DAYS}`;

export class AdminOperations {
  private readonly store: KeyStore;
  private readonly clock: Clock;
  private readonly events: LicenseEventSink;

  constructor(deps: AdminOperationsDeps) {
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.events = deps.events ?? consoleEventSink;
  }

  private newRecord(key: string, validForDays: number, now: Date): LicenseRecord {
    return { key, revoked: false, validForDays, creationDate: now.toISOString() };
  }

  private emit(
    action: AdminAction,
    actor: string,
    now: Date,
    target: { key?: string; count?: number; details?: Record<string, unknown> },
  ): void {
    this.events.admin(adminEvent(action, actor, now, target));
  }

  async createKey(
    key: string,
    validForDays: number,
    actor = 'system',
  ): Promise<AdminResult<LicenseRecord>> {
    const trimmed = key.trim();
    if (!trimmed) return fail('bad_request', 'key is required');
    if (!isValidDays(validForDays)) return fail('bad_request', DAYS_ERROR);

    const now = this.clock.now();
    const record = this.newRecord(trimmed, validForDays, now);
    if (!(await this.store.insert(record))) {
      return fail('conflict', 'Key already exists');
    }

    this.emit('create_key', actor, now, { key: trimmed, details: { valid_for_days: validForDays } });
    return { ok: true, value: record };
  }

  async revokeKey(key: string, actor = 'system'): Promise<AdminResult<LicenseRecord>> {
    return this.setRevoked(key, true, 'revoke_key', actor);
  }

  async reinstateKey(key: string, actor = 'system'): Promise<AdminResult<LicenseRecord>> {
    return this.setRevoked(key, false, 'reinstate_key', actor);
  }

  private async setRevoked(
    key: string,
    revoked: boolean,
    action: AdminAction,
    actor: string,
  ): Promise<AdminResult<LicenseRecord>> {
    const record = await this.store.update(key, { revoked });
    if (!record) return fail('not_found', 'Key not found');

    this.emit(action, actor, this.clock.now(), { key });
    return { ok: true, value: record };
  }

  /** Expiry is derived, so this also moves the expiry of already-bound keys. */
  async modifyValidity(
    key: string,
    validForDays: number,
    actor = 'system',
  ): Promise<AdminResult<LicenseRecord>> {
    if (!isValidDays(validForDays)) return fail('bad_request', DAYS_ERROR);

    const record = await this.store.update(key, { validForDays });
    if (!record) return fail('not_found', 'Key not found');

    this.emit('modify_validity', actor, this.clock.now(), {
      key,
      details: { valid_for_days: validForDays },
    });
    return { ok: true, value: record };
  }

  /**
   * Insert-if-absent for every key. Blank entries, repeats within the input
   * and keys already stored are reported as skipped, not as errors.
   */
  async bulkCreate(
    keys: string[],
    validForDays: number,
    actor = 'system',
  ): Promise<AdminResult<BulkCreateResult>> {
    if (!isValidDays(validForDays)) return fail('bad_request', DAYS_ERROR);

    const now = this.clock.now();
    const seen = new Set<string>();
    const skipped: string[] = [];
    const candidates: LicenseRecord[] = [];
    for (const raw of keys) {
      const key = raw.trim();
      if (!key) continue;
      if (seen.has(key)) {
        skipped.push(key);
        continue;
      }
      seen.add(key);
      candidates.push(this.newRecord(key, validForDays, now));
    }

    const created = await this.store.insertMany(candidates);
    const createdSet = new Set(created);
    for (const record of candidates) {
      if (!createdSet.has(record.key)) skipped.push(record.key);
    }

    this.emit('bulk_create', actor, now, {
      count: created.length,
      details: { skipped: skipped.length, valid_for_days: validForDays },
    });
    return { ok: true, value: { created, skipped } };
  }

  /**
   * Generate and store `count` new keys. Each candidate is checked against
   * the store and the batch, then inserted with insert-if-absent; a lost
   * insert is a collision and another candidate is drawn.
   */
  async generateUniqueKeys(
    count: number,
    validForDays: number,
    format: KeyFormat = DEFAULT_KEY_FORMAT,
    actor = 'system',
  ): Promise<AdminResult<LicenseRecord[]>> {
    if (!Number.isInteger(count) || count < 1 || count > MAX_GENERATE_COUNT) {
      return fail('bad_request', `count must be between 1 and ${MAX_GENERATE_COUNT}`);
    }
    if (!isValidDays(validForDays)) return fail('bad_request', DAYS_ERROR);

    const now = this.clock.now();
    const batch = new Set<string>();
    const records: LicenseRecord[] = [];
    const maxAttempts = count * GENERATE_ATTEMPTS_PER_KEY;
    let attempts = 0;

    while (records.length < count) {
      if (attempts >= maxAttempts) {
        throw new KeyGenerationError(
          `Generated ${records.length} of ${count} keys after ${attempts} attempts; key space exhausted`,
        );
      }
      attempts++;

      const candidate = generateKey(format);
      if (batch.has(candidate)) continue;
      if (await this.store.get(candidate)) continue;

      const record = this.newRecord(candidate, validForDays, now);
      if (!(await this.store.insert(record))) continue;

      batch.add(candidate);
      records.push(record);
    }

    this.emit('generate_keys', actor, now, {
      count: records.length,
      details: { attempts, valid_for_days: validForDays },
    });
    return { ok: true, value: records };
  }

  async getKey(key: string): Promise<AdminResult<LicenseRecord>> {
    const record = await this.store.get(key);
    if (!record) return fail('not_found', 'Key not found');
    return { ok: true, value: record };
  }

  async listKeys(): Promise<LicenseRecord[]> {
    return this.store.list();
  }
}
