/**
 * Tests for the validation service: first-use binding, denials, the single
 * re-evaluation after a lost bind, storage failures and concurrent redemption.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AdminOperations } from '../admin.js';
import { redact, type LicenseEventSink, type ValidationEvent } from '../events.js';
import { ValidationService } from '../service.js';
import type { Clock, LicenseRecord } from '../types.js';
import { InMemoryKeyStore } from '../../store/memory.js';
import {
  StorageUnavailableError,
  type BindResult,
  type KeyStore,
  type LicensePatch,
} from '../../store/types.js';

// ============================================================================
// Test helpers
// ============================================================================

function fixedClock(iso: string): Clock & { set(iso: string): void } {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set(next: string) {
      current = new Date(next);
    },
  };
}

function makeSink(): LicenseEventSink & { validations: ValidationEvent[] } {
  const validations: ValidationEvent[] = [];
  return {
    validations,
    validation: (event) => {
      validations.push(event);
    },
    admin: vi.fn(),
  };
}

function record(overrides?: Partial<LicenseRecord>): LicenseRecord {
  return {
    key: 'KEY-1',
    revoked: false,
    validForDays: 30,
    creationDate: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

const JAN_1 = new Date('2024-01-01T09:00:00.000Z');

/**
 * Delegates to an in-memory store but yields a random number of times
 * before each call, so concurrent validations interleave differently on
 * every run.
 */
class InterleavingStore implements KeyStore {
  constructor(private readonly inner: InMemoryKeyStore) {}

  private async jitter(): Promise<void> {
    const yields = Math.floor(Math.random() * 6);
    for (let i = 0; i < yields; i++) {
      await Promise.resolve();
    }
  }

  async get(key: string) {
    await this.jitter();
    return this.inner.get(key);
  }
  async insert(r: LicenseRecord) {
    await this.jitter();
    return this.inner.insert(r);
  }
  async insertMany(rs: LicenseRecord[]) {
    await this.jitter();
    return this.inner.insertMany(rs);
  }
  async bindIfUnbound(key: string, deviceId: string, at: Date): Promise<BindResult> {
    await this.jitter();
    return this.inner.bindIfUnbound(key, deviceId, at);
  }
  async update(key: string, patch: LicensePatch) {
    await this.jitter();
    return this.inner.update(key, patch);
  }
  async list() {
    return this.inner.list();
  }
  async ping() {
    return true;
  }
}

let store: InMemoryKeyStore;
let sink: ReturnType<typeof makeSink>;
let service: ValidationService;

beforeEach(() => {
  store = new InMemoryKeyStore([record()]);
  sink = makeSink();
  service = new ValidationService({ store, events: sink, clock: fixedClock('2024-01-01T09:00:00Z') });
});

// ============================================================================
// 1. Input checks
// ============================================================================

describe('bad input', () => {
  it('rejects an empty key without touching the store', async () => {
    const getSpy = vi.spyOn(store, 'get');
    const outcome = await service.validate('', 'dev1');

    expect(outcome).toEqual({
      granted: false,
      status: 400,
      message: 'Missing key or device ID',
      decision: 'bad_request',
    });
    expect(getSpy).not.toHaveBeenCalled();
  });

  it('rejects a whitespace-only device ID', async () => {
    const outcome = await service.validate('KEY-1', '   ');
    expect(outcome.decision).toBe('bad_request');
    expect((await store.get('KEY-1'))?.boundDeviceId).toBeUndefined();
  });
});

// ============================================================================
// 2. Binding and denials
// ============================================================================

describe('validate', () => {
  it('returns not_found for an unknown key', async () => {
    const outcome = await service.validate('NOPE', 'dev1');
    expect(outcome.decision).toBe('not_found');
    expect(outcome.status).toBe(404);
    expect(outcome.message).toBe('Invalid key');
  });

  it('binds an unused key to the first device', async () => {
    const outcome = await service.validate('KEY-1', 'dev1', JAN_1);

    expect(outcome.granted).toBe(true);
    expect(outcome.decision).toBe('grant_bind');
    expect(outcome.status).toBe(200);
    const stored = await store.get('KEY-1');
    expect(stored?.boundDeviceId).toBe('dev1');
    expect(stored?.issuanceDate).toBe('2024-01-01T09:00:00.000Z');
  });

  it('uses the injected clock when no time is passed', async () => {
    await service.validate('KEY-1', 'dev1');
    expect((await store.get('KEY-1'))?.issuanceDate).toBe('2024-01-01T09:00:00.000Z');
  });

  it('trims the key and device before use', async () => {
    const outcome = await service.validate('  KEY-1 ', ' dev1 ', JAN_1);
    expect(outcome.granted).toBe(true);
    expect((await store.get('KEY-1'))?.boundDeviceId).toBe('dev1');
  });

  it('grants the bound device repeatedly without rebinding', async () => {
    await service.validate('KEY-1', 'dev1', JAN_1);
    const bindSpy = vi.spyOn(store, 'bindIfUnbound');

    for (const day of ['2024-01-05', '2024-01-10', '2024-01-20']) {
      const outcome = await service.validate('KEY-1', 'dev1', new Date(`${day}T12:00:00Z`));
      expect(outcome.decision).toBe('grant_existing');
    }

    expect(bindSpy).not.toHaveBeenCalled();
    expect((await store.get('KEY-1'))?.issuanceDate).toBe('2024-01-01T09:00:00.000Z');
  });

  it('denies a second device with device_mismatch', async () => {
    await service.validate('KEY-1', 'dev1', JAN_1);
    const outcome = await service.validate('KEY-1', 'dev2', JAN_1);

    expect(outcome.granted).toBe(false);
    expect(outcome.decision).toBe('device_mismatch');
    expect(outcome.status).toBe(403);
    expect((await store.get('KEY-1'))?.boundDeviceId).toBe('dev1');
  });

  it('denies a revoked unbound key and leaves it unbound', async () => {
    await store.update('KEY-1', { revoked: true });
    const outcome = await service.validate('KEY-1', 'dev1', JAN_1);

    expect(outcome.decision).toBe('revoked');
    expect(outcome.message).toBe('Key has been revoked');
    expect((await store.get('KEY-1'))?.boundDeviceId).toBeUndefined();
  });

  it('reports revoked for a bound key on every device, even when expired', async () => {
    await service.validate('KEY-1', 'dev1', JAN_1);
    await store.update('KEY-1', { revoked: true });

    const later = new Date('2024-06-01T00:00:00Z');
    expect((await service.validate('KEY-1', 'dev1', JAN_1)).decision).toBe('revoked');
    expect((await service.validate('KEY-1', 'dev2', JAN_1)).decision).toBe('revoked');
    expect((await service.validate('KEY-1', 'dev1', later)).decision).toBe('revoked');
  });

  it('grants again after reinstatement', async () => {
    await service.validate('KEY-1', 'dev1', JAN_1);
    await store.update('KEY-1', { revoked: true });
    await store.update('KEY-1', { revoked: false });

    expect((await service.validate('KEY-1', 'dev1', JAN_1)).decision).toBe('grant_existing');
  });

  it('never writes on a denial', async () => {
    await service.validate('KEY-1', 'dev1', JAN_1);
    const bindSpy = vi.spyOn(store, 'bindIfUnbound');
    const updateSpy = vi.spyOn(store, 'update');

    await service.validate('KEY-1', 'dev2', JAN_1);
    await service.validate('KEY-1', 'dev1', new Date('2024-03-01T00:00:00Z'));
    await service.validate('NOPE', 'dev1', JAN_1);

    expect(bindSpy).not.toHaveBeenCalled();
    expect(updateSpy).not.toHaveBeenCalled();
  });
});

// ============================================================================
// 3. Lost compare-and-swap
// ============================================================================

describe('lost bind', () => {
  it('re-evaluates once and reports device_mismatch', async () => {
    const winner = record({ boundDeviceId: 'dev-winner', issuanceDate: JAN_1.toISOString() });
    const bindSpy = vi
      .spyOn(store, 'bindIfUnbound')
      .mockResolvedValue({ status: 'already_bound', record: winner });
    const getSpy = vi.spyOn(store, 'get');

    const outcome = await service.validate('KEY-1', 'dev-loser', JAN_1);

    expect(outcome.decision).toBe('device_mismatch');
    expect(outcome.record).toEqual(winner);
    expect(bindSpy).toHaveBeenCalledTimes(1);
    expect(getSpy).toHaveBeenCalledTimes(1);
  });

  it('grants when the winning bind was for the same device', async () => {
    vi.spyOn(store, 'bindIfUnbound').mockResolvedValue({
      status: 'already_bound',
      record: record({ boundDeviceId: 'dev1', issuanceDate: JAN_1.toISOString() }),
    });

    const outcome = await service.validate('KEY-1', 'dev1', JAN_1);
    expect(outcome.decision).toBe('grant_existing');
    expect(outcome.granted).toBe(true);
  });

  it('reports revoked when the key was revoked between read and bind', async () => {
    vi.spyOn(store, 'bindIfUnbound').mockResolvedValue({
      status: 'already_bound',
      record: record({ revoked: true, boundDeviceId: 'dev2', issuanceDate: JAN_1.toISOString() }),
    });

    expect((await service.validate('KEY-1', 'dev1', JAN_1)).decision).toBe('revoked');
  });

  it('does not retry when the lost bind still reads as unbound', async () => {
    const bindSpy = vi
      .spyOn(store, 'bindIfUnbound')
      .mockResolvedValue({ status: 'already_bound', record: record() });

    const outcome = await service.validate('KEY-1', 'dev1', JAN_1);

    expect(outcome.decision).toBe('storage_unavailable');
    expect(outcome.status).toBe(503);
    expect(bindSpy).toHaveBeenCalledTimes(1);
  });

  it('reports not_found when the record vanished before the bind', async () => {
    vi.spyOn(store, 'bindIfUnbound').mockResolvedValue({ status: 'not_found' });
    expect((await service.validate('KEY-1', 'dev1', JAN_1)).decision).toBe('not_found');
  });
});

// ============================================================================
// 4. Storage failures
// ============================================================================

describe('storage failures', () => {
  it('maps StorageUnavailableError to a retryable 503', async () => {
    vi.spyOn(store, 'get').mockRejectedValue(
      new StorageUnavailableError('redis', 'get', new Error('ECONNREFUSED')),
    );
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const outcome = await service.validate('KEY-1', 'dev1', JAN_1);

    expect(outcome).toEqual({
      granted: false,
      status: 503,
      message: 'Service temporarily unavailable',
      decision: 'storage_unavailable',
    });
    expect(errorSpy).toHaveBeenCalledWith(
      '[license] validation storage failure:',
      'redis key store get failed: ECONNREFUSED',
    );
    errorSpy.mockRestore();
  });

  it('rethrows unexpected errors', async () => {
    vi.spyOn(store, 'get').mockRejectedValue(new TypeError('boom'));
    await expect(service.validate('KEY-1', 'dev1', JAN_1)).rejects.toThrow('boom');
  });
});

// ============================================================================
// 5. Events
// ============================================================================

describe('validation events', () => {
  it('emits one event per validation with redacted identifiers', async () => {
    await service.validate('KEY-1', 'dev1', JAN_1);
    await service.validate('KEY-1', 'dev2', JAN_1);

    expect(sink.validations).toEqual([
      {
        key_ref: redact('KEY-1'),
        device_ref: redact('dev1'),
        decision: 'grant_bind',
        granted: true,
        timestamp: '2024-01-01T09:00:00.000Z',
      },
      {
        key_ref: redact('KEY-1'),
        device_ref: redact('dev2'),
        decision: 'device_mismatch',
        granted: false,
        timestamp: '2024-01-01T09:00:00.000Z',
      },
    ]);
    expect(sink.validations[0].key_ref).toMatch(/^[0-9a-f]{12}$/);
  });
});

// ============================================================================
// 6. Concurrent first use
// ============================================================================

describe('concurrent first use', () => {
  it('binds exactly one of two racing devices', async () => {
    for (let run = 0; run < 200; run++) {
      const inner = new InMemoryKeyStore([record()]);
      const racing = new ValidationService({ store: new InterleavingStore(inner), events: makeSink() });

      const [a, b] = await Promise.all([
        racing.validate('KEY-1', 'dev-a', JAN_1),
        racing.validate('KEY-1', 'dev-b', JAN_1),
      ]);

      const outcomes = [a, b];
      const winners = outcomes.filter((o) => o.granted);
      const losers = outcomes.filter((o) => !o.granted);
      expect(winners).toHaveLength(1);
      expect(losers).toHaveLength(1);
      expect(losers[0].decision).toBe('device_mismatch');

      const stored = await inner.get('KEY-1');
      const winnerDevice = winners[0] === a ? 'dev-a' : 'dev-b';
      expect(stored?.boundDeviceId).toBe(winnerDevice);
      expect(stored?.issuanceDate).toBe(JAN_1.toISOString());
    }
  });

  it('grants only one of many racing devices', async () => {
    for (let run = 0; run < 50; run++) {
      const inner = new InMemoryKeyStore([record()]);
      const racing = new ValidationService({ store: new InterleavingStore(inner), events: makeSink() });
      const devices = Array.from({ length: 8 }, (_, i) => `dev-${i}`);

      const outcomes = await Promise.all(devices.map((d) => racing.validate('KEY-1', d, JAN_1)));

      const granted = devices.filter((_, i) => outcomes[i].granted);
      expect(granted).toHaveLength(1);
      expect(outcomes.filter((o) => o.decision === 'device_mismatch')).toHaveLength(7);
      expect((await inner.get('KEY-1'))?.boundDeviceId).toBe(granted[0]);
    }
  });

  it('grants both calls when one device races itself', async () => {
    for (let run = 0; run < 50; run++) {
      const inner = new InMemoryKeyStore([record()]);
      const racing = new ValidationService({ store: new InterleavingStore(inner), events: makeSink() });

      const outcomes = await Promise.all([
        racing.validate('KEY-1', 'dev-a', JAN_1),
        racing.validate('KEY-1', 'dev-a', JAN_1),
      ]);

      expect(outcomes.every((o) => o.granted)).toBe(true);
      expect(outcomes.map((o) => o.decision).sort()).toContain('grant_bind');
    }
  });
});

// ============================================================================
// 7. End-to-end scenario
// ============================================================================

describe('license lifecycle', () => {
  it('binds, rejects other devices, honours the last day and then expires', async () => {
    const clock = fixedClock('2024-01-01T00:00:00Z');
    const keys = new InMemoryKeyStore();
    const admin = new AdminOperations({ store: keys, clock, events: makeSink() });
    const validation = new ValidationService({ store: keys, clock, events: makeSink() });

    const created = await admin.createKey('ABCD-1234-EFGH', 30);
    expect(created.ok).toBe(true);

    const first = await validation.validate('ABCD-1234-EFGH', 'dev1');
    expect(first.granted).toBe(true);
    expect(await keys.get('ABCD-1234-EFGH')).toEqual({
      key: 'ABCD-1234-EFGH',
      revoked: false,
      validForDays: 30,
      creationDate: '2024-01-01T00:00:00.000Z',
      issuanceDate: '2024-01-01T00:00:00.000Z',
      boundDeviceId: 'dev1',
    });

    clock.set('2024-01-02T00:00:00Z');
    const other = await validation.validate('ABCD-1234-EFGH', 'dev2');
    expect(other.granted).toBe(false);
    expect(other.decision).toBe('device_mismatch');

    clock.set('2024-01-31T00:00:00Z');
    expect((await validation.validate('ABCD-1234-EFGH', 'dev1')).granted).toBe(true);

    clock.set('2024-02-01T00:00:00Z');
    const expired = await validation.validate('ABCD-1234-EFGH', 'dev1');
    expect(expired.granted).toBe(false);
    expect(expired.decision).toBe('expired');
    expect(expired.message).toBe('License has expired.');
  });

  it('extending the window revives an expired bound key', async () => {
    const clock = fixedClock('2024-01-01T00:00:00Z');
    const keys = new InMemoryKeyStore();
    const admin = new AdminOperations({ store: keys, clock, events: makeSink() });
    const validation = new ValidationService({ store: keys, clock, events: makeSink() });

    await admin.createKey('KEY-X', 10);
    await validation.validate('KEY-X', 'dev1');

    clock.set('2024-01-20T00:00:00Z');
    expect((await validation.validate('KEY-X', 'dev1')).decision).toBe('expired');

    await admin.modifyValidity('KEY-X', 30);
    expect((await validation.validate('KEY-X', 'dev1')).decision).toBe('grant_existing');

    await admin.modifyValidity('KEY-X', 5);
    expect((await validation.validate('KEY-X', 'dev1')).decision).toBe('expired');
  });
});
