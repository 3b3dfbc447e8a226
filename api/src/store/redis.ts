/**
 * Redis KeyStore — ioredis-backed storage for multi-node deployments.
 *
 * Layout:
 *   <prefix>key:<license key>  — record JSON
 *   <prefix>index              — sorted set of keys scored by creation time
 *
 * Insert, bind and update run as Lua scripts, so each read-check-write is a
 * single atomic command on the server. Every Redis failure surfaces as
 * StorageUnavailableError.
 */

import type { Redis } from 'ioredis';

import type { LicenseRecord } from '../licensing/types.js';
import { encodeRecord, parseRecord } from './codec.js';
import {
  StorageUnavailableError,
  byCreationDateDesc,
  type BindResult,
  type KeyStore,
  type LicensePatch,
} from './types.js';

// ---------------------------------------------------------------------------
// Lua scripts
// ---------------------------------------------------------------------------

export const INSERT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('SET', KEYS[1], ARGV[1])
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[3])
return 1
`;

export const BIND_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then return {'not_found'} end
local rec = cjson.decode(raw)
if rec.boundDeviceId ~= nil and rec.boundDeviceId ~= cjson.null then
  return {'already_bound', raw}
end
rec.boundDeviceId = ARGV[1]
rec.issuanceDate = ARGV[2]
local encoded = cjson.encode(rec)
redis.call('SET', KEYS[1], encoded)
return {'bound', encoded}
`;

export const UPDATE_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then return false end
local rec = cjson.decode(raw)
local patch = cjson.decode(ARGV[1])
if patch.revoked ~= nil then rec.revoked = patch.revoked end
if patch.validForDays ~= nil then rec.validForDays = patch.validForDays end
local encoded = cjson.encode(rec)
redis.call('SET', KEYS[1], encoded)
return encoded
`;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class RedisKeyStore implements KeyStore {
  private readonly redis: Redis;
  private readonly prefix: string;

  constructor(redis: Redis, prefix = 'license:') {
    this.redis = redis;
    this.prefix = prefix;
  }

  private recordKey(key: string): string {
    return `${this.prefix}key:${key}`;
  }

  private get indexKey(): string {
    return `${this.prefix}index`;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StorageUnavailableError) throw err;
      throw new StorageUnavailableError('redis', operation, err);
    }
  }

  private decode(operation: string, raw: unknown): LicenseRecord {
    const record = typeof raw === 'string' ? parseRecord(raw) : null;
    if (!record) {
      throw new StorageUnavailableError('redis', operation, 'malformed record');
    }
    return record;
  }

  async get(key: string): Promise<LicenseRecord | null> {
    return this.run('get', async () => {
      const raw = await this.redis.get(this.recordKey(key));
      return raw === null ? null : this.decode('get', raw);
    });
  }

  async insert(record: LicenseRecord): Promise<boolean> {
    return this.run('insert', async () => {
      const result = await this.redis.eval(
        INSERT_SCRIPT,
        2,
        this.recordKey(record.key),
        this.indexKey,
        encodeRecord(record),
        Date.parse(record.creationDate),
        record.key,
      );
      return result === 1;
    });
  }

  async insertMany(records: LicenseRecord[]): Promise<string[]> {
    const inserted: string[] = [];
    for (const record of records) {
      if (await this.insert(record)) inserted.push(record.key);
    }
    return inserted;
  }

  async bindIfUnbound(key: string, deviceId: string, at: Date): Promise<BindResult> {
    return this.run('bind', async () => {
      const reply = await this.redis.eval(
        BIND_SCRIPT,
        1,
        this.recordKey(key),
        deviceId,
        at.toISOString(),
      );
      if (!Array.isArray(reply)) {
        throw new StorageUnavailableError('redis', 'bind', 'unexpected script reply');
      }

      const [status, raw] = reply;
      if (status === 'not_found') return { status: 'not_found' };
      if (status === 'bound') return { status: 'bound', record: this.decode('bind', raw) };
      if (status === 'already_bound') {
        return { status: 'already_bound', record: this.decode('bind', raw) };
      }
      throw new StorageUnavailableError('redis', 'bind', `unknown status ${String(status)}`);
    });
  }

  async update(key: string, patch: LicensePatch): Promise<LicenseRecord | null> {
    return this.run('update', async () => {
      const raw = await this.redis.eval(
        UPDATE_SCRIPT,
        1,
        this.recordKey(key),
        JSON.stringify(patch),
      );
      return raw === null ? null : this.decode('update', raw);
    });
  }

  async list(): Promise<LicenseRecord[]> {
    return this.run('list', async () => {
      const keys = await this.redis.zrevrange(this.indexKey, 0, -1);
      if (keys.length === 0) return [];

      const values = await this.redis.mget(...keys.map((k) => this.recordKey(k)));
      const records: LicenseRecord[] = [];
      for (const raw of values) {
        if (raw !== null) records.push(this.decode('list', raw));
      }
      return records.sort(byCreationDateDesc);
    });
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
