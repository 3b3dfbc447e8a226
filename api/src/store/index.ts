import { Redis } from 'ioredis';

import { InMemoryKeyStore } from './memory.js';
import { PostgrestKeyStore } from './postgrest.js';
import { RedisKeyStore } from './redis.js';
import type { KeyStore } from './types.js';

export type KeyStoreOptions =
  | { backend: 'memory' }
  | { backend: 'redis'; url: string; prefix?: string }
  | { backend: 'postgrest'; url: string; apiKey: string; table?: string };

export function createKeyStore(options: KeyStoreOptions): KeyStore {
  switch (options.backend) {
    case 'redis': {
      const redis = new Redis(options.url, {
        maxRetriesPerRequest: 3,
        retryStrategy(times: number) {
          return Math.min(times * 200, 5000);
        },
        lazyConnect: true,
      });
      return new RedisKeyStore(redis, options.prefix);
    }
    case 'postgrest':
      return new PostgrestKeyStore({
        url: options.url,
        apiKey: options.apiKey,
        table: options.table,
      });
    case 'memory':
      console.warn('[KeyStore] Using in-memory key store; records are lost on restart');
      return new InMemoryKeyStore();
  }
}

export { InMemoryKeyStore } from './memory.js';
export { PostgrestKeyStore, type PostgrestConfig } from './postgrest.js';
export { RedisKeyStore } from './redis.js';
export {
  StorageUnavailableError,
  type BindResult,
  type KeyStore,
  type KeyStoreBackend,
  type LicensePatch,
} from './types.js';
