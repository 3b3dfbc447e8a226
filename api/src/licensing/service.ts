/**
 * Validation service — read, decide, and on first use bind.
 *
 * The store's bindIfUnbound is the only write on this path. If another
 * request wins the bind, the record it returns is evaluated once more and
 * that decision is final.
 */

import { StorageUnavailableError, type KeyStore } from '../store/types.js';
import { consoleEventSink, validationEvent, type LicenseEventSink } from './events.js';
import { describeDecision, evaluateLicense } from './policy.js';
import {
  systemClock,
  type Clock,
  type LicenseRecord,
  type ValidationDecision,
  type ValidationOutcome,
} from './types.js';

export interface ValidationServiceDeps {
  store: KeyStore;
  clock?: Clock;
  events?: LicenseEventSink;
}

export class ValidationService {
  private readonly store: KeyStore;
  private readonly clock: Clock;
  private readonly events: LicenseEventSink;

  constructor(deps: ValidationServiceDeps) {
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.events = deps.events ?? consoleEventSink;
  }

  async validate(key: string, deviceId: string, now?: Date): Promise<ValidationOutcome> {
    const at = now ?? this.clock.now();
    const trimmedKey = key.trim();
    const trimmedDevice = deviceId.trim();

    let result: { decision: ValidationDecision; record?: LicenseRecord };
    if (!trimmedKey || !trimmedDevice) {
      result = { decision: 'bad_request' };
    } else {
      try {
        result = await this.decide(trimmedKey, trimmedDevice, at);
      } catch (err) {
        if (!(err instanceof StorageUnavailableError)) throw err;
        console.error('[license] validation storage failure:', err.message);
        result = { decision: 'storage_unavailable' };
      }
    }

    const description = describeDecision(result.decision);
    this.events.validation(
      validationEvent(trimmedKey, trimmedDevice, result.decision, description.granted, at),
    );

    return {
      ...description,
      decision: result.decision,
      ...(result.record ? { record: result.record } : {}),
    };
  }

  private async decide(
    key: string,
    deviceId: string,
    now: Date,
  ): Promise<{ decision: ValidationDecision; record?: LicenseRecord }> {
    const record = await this.store.get(key);
    const decision = evaluateLicense(record, deviceId, now);
    if (decision !== 'grant_bind') {
      return record ? { decision, record } : { decision };
    }

    const bind = await this.store.bindIfUnbound(key, deviceId, now);
    switch (bind.status) {
      case 'bound':
        return { decision: 'grant_bind', record: bind.record };
      case 'not_found':
        return { decision: 'not_found' };
      case 'already_bound': {
        const retry = evaluateLicense(bind.record, deviceId, now);
        // A lost bind against a record that still reads as unbound means the
        // store is inconsistent; do not try again.
        if (retry === 'grant_bind') {
          return { decision: 'storage_unavailable' };
        }
        return { decision: retry, record: bind.record };
      }
    }
  }
}
