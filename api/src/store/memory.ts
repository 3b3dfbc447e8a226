/**
 * In-memory KeyStore (single-node / dev / tests).
 *
 * No method awaits between reading and writing the map, so every
 * check-and-set runs to completion on the event loop before another
 * request can observe the record.
 */

import type { LicenseRecord } from '../licensing/types.js';
import {
  byCreationDateDesc,
  type BindResult,
  type KeyStore,
  type LicensePatch,
} from './types.js';

function copy(record: LicenseRecord): LicenseRecord {
  return { ...record };
}

export class InMemoryKeyStore implements KeyStore {
  private readonly records = new Map<string, LicenseRecord>();

  constructor(seed: LicenseRecord[] = []) {
    for (const record of seed) {
      this.records.set(record.key, copy(record));
    }
  }

  async get(key: string): Promise<LicenseRecord | null> {
    const record = this.records.get(key);
    return record ? copy(record) : null;
  }

  async insert(record: LicenseRecord): Promise<boolean> {
    if (this.records.has(record.key)) return false;
    this.records.set(record.key, copy(record));
    return true;
  }

  async insertMany(records: LicenseRecord[]): Promise<string[]> {
    const inserted: string[] = [];
    for (const record of records) {
      if (this.records.has(record.key)) continue;
      this.records.set(record.key, copy(record));
      inserted.push(record.key);
    }
    return inserted;
  }

  async bindIfUnbound(key: string, deviceId: string, at: Date): Promise<BindResult> {
    const current = this.records.get(key);
    if (!current) return { status: 'not_found' };
    if (current.boundDeviceId !== undefined) {
      return { status: 'already_bound', record: copy(current) };
    }

    const bound: LicenseRecord = {
      ...current,
      boundDeviceId: deviceId,
      issuanceDate: at.toISOString(),
    };
    this.records.set(key, bound);
    return { status: 'bound', record: copy(bound) };
  }

  async update(key: string, patch: LicensePatch): Promise<LicenseRecord | null> {
    const current = this.records.get(key);
    if (!current) return null;

    const next: LicenseRecord = { ...current };
    if (patch.revoked !== undefined) next.revoked = patch.revoked;
    if (patch.validForDays !== undefined) next.validForDays = patch.validForDays;
    this.records.set(key, next);
    return copy(next);
  }

  async list(): Promise<LicenseRecord[]> {
    return [...this.records.values()].map(copy).sort(byCreationDateDesc);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.records.size;
  }
}
