import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: { event: vi.fn() },
}));

import { logger } from '../logger.js';
import { createEventSink } from '../events.js';
import { register } from '../metrics.js';

async function counterValue(name: string, label: string, value: string): Promise<number> {
  const metric = register.getSingleMetric(name);
  if (!metric) return 0;
  const { values } = await metric.get();
  return values.find((v) => v.labels[label] === value)?.value ?? 0;
}

beforeEach(() => {
  vi.mocked(logger.event).mockClear();
});

describe('createEventSink', () => {
  it('logs validations and counts them by decision', async () => {
    const sink = createEventSink();
    const before = await counterValue('license_validations_total', 'decision', 'expired');

    sink.validation({
      decision: 'expired',
      granted: false,
      key_ref: 'aaaaaaaaaaaa',
      device_ref: 'bbbbbbbbbbbb',
      timestamp: '2024-05-01T10:00:00.000Z',
    });

    expect(logger.event).toHaveBeenCalledWith('info', 'license.validation', {
      decision: 'expired',
      granted: false,
      key_ref: 'aaaaaaaaaaaa',
      device_ref: 'bbbbbbbbbbbb',
      timestamp: '2024-05-01T10:00:00.000Z',
    });
    expect(await counterValue('license_validations_total', 'decision', 'expired')).toBe(before + 1);
  });

  it('logs storage failures at warn', () => {
    createEventSink().validation({
      decision: 'storage_unavailable',
      granted: false,
      key_ref: 'aaaaaaaaaaaa',
      device_ref: 'bbbbbbbbbbbb',
      timestamp: '2024-05-01T10:00:00.000Z',
    });

    expect(vi.mocked(logger.event).mock.calls[0][0]).toBe('warn');
  });

  it('logs and counts admin actions', async () => {
    const before = await counterValue('license_admin_actions_total', 'action', 'revoke_key');

    createEventSink().admin({
      event_id: '00000000-0000-4000-8000-000000000000',
      action: 'revoke_key',
      actor: 'admin-token',
      timestamp: '2024-05-01T10:00:00.000Z',
      key_ref: 'aaaaaaaaaaaa',
    });

    expect(vi.mocked(logger.event).mock.calls[0][1]).toBe('license.admin');
    expect(await counterValue('license_admin_actions_total', 'action', 'revoke_key')).toBe(before + 1);
  });
});
