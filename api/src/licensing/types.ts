/**
 * License Key Types
 *
 * A key is created unbound; the first successful validation binds it to a
 * device and starts its validity window.
 */

export interface LicenseRecord {
  key: string;
  revoked: boolean;
  validForDays: number;
  /** ISO-8601 UTC timestamp */
  creationDate: string;
  /** Set together with boundDeviceId on first use */
  issuanceDate?: string;
  boundDeviceId?: string;
}

export type BoundLicenseRecord = LicenseRecord & {
  issuanceDate: string;
  boundDeviceId: string;
};

export type Decision =
  | 'not_found'
  | 'revoked'
  | 'expired'
  | 'device_mismatch'
  | 'grant_bind'
  | 'grant_existing';

/** Decisions plus the outcomes that never reach the policy */
export type ValidationDecision = Decision | 'bad_request' | 'storage_unavailable';

export interface DecisionDescription {
  granted: boolean;
  status: 200 | 400 | 403 | 404 | 503;
  message: string;
}

export interface ValidationOutcome extends DecisionDescription {
  decision: ValidationDecision;
  record?: LicenseRecord;
}

export interface LicenseValidationRequest {
  key: string;
  device_id: string;
}

export interface LicenseValidationResponse {
  valid: boolean;
  message: string;
}

/** Wire shape used by the admin API and the CLI */
export interface PublicLicenseRecord {
  key: string;
  revoked: boolean;
  valid_for_days: number;
  creation_date: string;
  issuance_date: string | null;
  used_on_device: string | null;
  expires_on: string | null;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
