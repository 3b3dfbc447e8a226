/**
 * License events — emitted for every validation outcome and every admin
 * mutation. Keys and device IDs only appear as truncated SHA-256 digests.
 */

import { createHash } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';

import type { ValidationDecision } from './types.js';

export type AdminAction =
  | 'create_key'
  | 'revoke_key'
  | 'reinstate_key'
  | 'modify_validity'
  | 'bulk_create'
  | 'generate_keys';

export interface ValidationEvent {
  key_ref: string;
  device_ref: string;
  decision: ValidationDecision;
  granted: boolean;
  timestamp: string;
}

export interface AdminEvent {
  event_id: string;
  action: AdminAction;
  actor: string;
  key_ref?: string;
  count?: number;
  details?: Record<string, unknown>;
  timestamp: string;
}

export interface LicenseEventSink {
  validation(event: ValidationEvent): void;
  admin(event: AdminEvent): void;
}

export function redact(value: string): string {
  if (value === '') return '';
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

export function validationEvent(
  key: string,
  deviceId: string,
  decision: ValidationDecision,
  granted: boolean,
  at: Date,
): ValidationEvent {
  return {
    key_ref: redact(key),
    device_ref: redact(deviceId),
    decision,
    granted,
    timestamp: at.toISOString(),
  };
}

export function adminEvent(
  action: AdminAction,
  actor: string,
  at: Date,
  target: { key?: string; count?: number; details?: Record<string, unknown> },
): AdminEvent {
  return {
    event_id: uuidv4(),
    action,
    actor,
    ...(target.key !== undefined ? { key_ref: redact(target.key) } : {}),
    ...(target.count !== undefined ? { count: target.count } : {}),
    ...(target.details ? { details: target.details } : {}),
    timestamp: at.toISOString(),
  };
}

/** Fallback sink: one console line per event. */
export const consoleEventSink: LicenseEventSink = {
  validation(event) {
    console.info('[license] validation', event);
  },
  admin(event) {
    console.info('[license] admin', event);
  },
};
