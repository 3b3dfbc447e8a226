/**
 * KeyStore — durable mapping from key string to LicenseRecord.
 *
 * bindIfUnbound is the only write on the validation path and must be a
 * single atomic operation in every backend: it sets boundDeviceId and
 * issuanceDate only while both are still absent.
 */

import type { LicenseRecord } from '../licensing/types.js';

export type BindResult =
  | { status: 'bound'; record: LicenseRecord }
  | { status: 'already_bound'; record: LicenseRecord }
  | { status: 'not_found' };

export interface LicensePatch {
  revoked?: boolean;
  validForDays?: number;
}

export interface KeyStore {
  get(key: string): Promise<LicenseRecord | null>;
  /** Insert-if-absent. Resolves false when the key already exists. */
  insert(record: LicenseRecord): Promise<boolean>;
  /** Insert-if-absent for each record; resolves to the keys actually inserted. */
  insertMany(records: LicenseRecord[]): Promise<string[]>;
  bindIfUnbound(key: string, deviceId: string, at: Date): Promise<BindResult>;
  /** Never touches binding fields. Resolves null when the key is absent. */
  update(key: string, patch: LicensePatch): Promise<LicenseRecord | null>;
  /** All records, newest creationDate first. */
  list(): Promise<LicenseRecord[]>;
  ping(): Promise<boolean>;
  close?(): Promise<void>;
}

export type KeyStoreBackend = 'memory' | 'redis' | 'postgrest';

/**
 * Raised for any storage I/O failure. The only error a caller may retry.
 */
export class StorageUnavailableError extends Error {
  readonly backend: KeyStoreBackend;
  readonly operation: string;

  constructor(backend: KeyStoreBackend, operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause ? String(cause) : 'unknown error';
    super(`${backend} key store ${operation} failed: ${detail}`, { cause });
    this.name = 'StorageUnavailableError';
    this.backend = backend;
    this.operation = operation;
  }
}

export function byCreationDateDesc(a: LicenseRecord, b: LicenseRecord): number {
  if (a.creationDate === b.creationDate) return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  return a.creationDate < b.creationDate ? 1 : -1;
}
