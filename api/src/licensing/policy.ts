/**
 * License policy — the pure decision function behind every validation.
 *
 * Check order is fixed: not-found → revoked → expired → mismatch → grant.
 * Expiry is counted in whole UTC calendar days: a key bound on 2024-01-01
 * with 30 days is valid through 2024-01-31 and expired from 2024-02-01.
 */

import type {
  BoundLicenseRecord,
  Decision,
  DecisionDescription,
  LicenseRecord,
  PublicLicenseRecord,
  ValidationDecision,
} from './types.js';

const DAY_MS = 86_400_000;

// ============================================
// Date helpers
// ============================================

/** Milliseconds at 00:00 UTC of the day containing `date`. */
function utcDayStart(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function formatDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function isBound(record: LicenseRecord): record is BoundLicenseRecord {
  return record.boundDeviceId !== undefined && record.issuanceDate !== undefined;
}

/** Last valid UTC day (YYYY-MM-DD), or null for an unbound key. */
export function expiresOn(record: LicenseRecord): string | null {
  if (!isBound(record)) return null;
  return formatDay(expiryDayStart(record));
}

function expiryDayStart(record: BoundLicenseRecord): number {
  return utcDayStart(new Date(record.issuanceDate)) + record.validForDays * DAY_MS;
}

export function isExpired(record: LicenseRecord, now: Date): boolean {
  if (!isBound(record)) return false;
  return utcDayStart(now) > expiryDayStart(record);
}

// ============================================
// Policy
// ============================================

export function evaluateLicense(
  record: LicenseRecord | null,
  deviceId: string,
  now: Date,
): Decision {
  if (!record) return 'not_found';
  if (record.revoked) return 'revoked';
  if (isExpired(record, now)) return 'expired';
  if (!isBound(record)) return 'grant_bind';
  if (record.boundDeviceId !== deviceId) return 'device_mismatch';
  return 'grant_existing';
}

const DESCRIPTIONS: Record<ValidationDecision, DecisionDescription> = {
  grant_bind: { granted: true, status: 200, message: 'License validated successfully' },
  grant_existing: { granted: true, status: 200, message: 'License validated successfully' },
  not_found: { granted: false, status: 404, message: 'Invalid key' },
  revoked: { granted: false, status: 403, message: 'Key has been revoked' },
  expired: { granted: false, status: 403, message: 'License has expired.' },
  device_mismatch: {
    granted: false,
    status: 403,
    message: 'Key is already in use on another device',
  },
  bad_request: { granted: false, status: 400, message: 'Missing key or device ID' },
  storage_unavailable: { granted: false, status: 503, message: 'Service temporarily unavailable' },
};

export function describeDecision(decision: ValidationDecision): DecisionDescription {
  return DESCRIPTIONS[decision];
}

export function toPublicRecord(record: LicenseRecord): PublicLicenseRecord {
  return {
    key: record.key,
    revoked: record.revoked,
    valid_for_days: record.validForDays,
    creation_date: record.creationDate,
    issuance_date: record.issuanceDate ?? null,
    used_on_device: record.boundDeviceId ?? null,
    expires_on: expiresOn(record),
  };
}
