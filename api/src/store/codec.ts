/**
 * Decoding of stored license records. Backends hand back untyped JSON,
 * so every record is checked field by field before it reaches the policy.
 */

import type { LicenseRecord } from '../licensing/types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function withBinding(
  base: Omit<LicenseRecord, 'issuanceDate' | 'boundDeviceId'>,
  issuanceDate: string | undefined,
  boundDeviceId: string | undefined,
): LicenseRecord | null {
  // Half-bound rows violate the binding invariant; treat them as corrupt.
  if ((issuanceDate === undefined) !== (boundDeviceId === undefined)) return null;
  if (issuanceDate === undefined || boundDeviceId === undefined) return base;
  return { ...base, issuanceDate, boundDeviceId };
}

/** Record as stored in Redis (camelCase JSON). */
export function decodeRecord(value: unknown): LicenseRecord | null {
  if (!isObject(value)) return null;
  const { key, revoked, validForDays, creationDate } = value;
  if (typeof key !== 'string' || typeof creationDate !== 'string') return null;
  if (typeof validForDays !== 'number' || !Number.isInteger(validForDays)) return null;

  return withBinding(
    { key, revoked: revoked === true, validForDays, creationDate },
    optionalString(value.issuanceDate),
    optionalString(value.boundDeviceId),
  );
}

export function parseRecord(raw: string): LicenseRecord | null {
  try {
    return decodeRecord(JSON.parse(raw));
  } catch {
    return null;
  }
}

export function encodeRecord(record: LicenseRecord): string {
  return JSON.stringify(record);
}

// ============================================
// Relational rows (snake_case columns)
// ============================================

export interface LicenseRow {
  key: string;
  revoked: boolean;
  valid_for_days: number;
  creation_date: string;
  issuance_date: string | null;
  bound_device_id: string | null;
}

export function toRow(record: LicenseRecord): LicenseRow {
  return {
    key: record.key,
    revoked: record.revoked,
    valid_for_days: record.validForDays,
    creation_date: record.creationDate,
    issuance_date: record.issuanceDate ?? null,
    bound_device_id: record.boundDeviceId ?? null,
  };
}

export function decodeRow(value: unknown): LicenseRecord | null {
  if (!isObject(value)) return null;
  const { key, revoked, valid_for_days, creation_date } = value;
  if (typeof key !== 'string' || typeof creation_date !== 'string') return null;
  if (typeof valid_for_days !== 'number' || !Number.isInteger(valid_for_days)) return null;

  return withBinding(
    { key, revoked: revoked === true, validForDays: valid_for_days, creationDate: creation_date },
    optionalString(value.issuance_date),
    optionalString(value.bound_device_id),
  );
}

/** Decode a PostgREST array response; null if any row is malformed. */
export function decodeRows(value: unknown): LicenseRecord[] | null {
  if (!Array.isArray(value)) return null;
  const records: LicenseRecord[] = [];
  for (const row of value) {
    const record = decodeRow(row);
    if (!record) return null;
    records.push(record);
  }
  return records;
}
