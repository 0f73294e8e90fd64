import IORedis from 'ioredis';
import type { Logger } from 'pino';
import { isJsonValue, type JsonValue } from '@hpcpulse/shared';

import { DocumentStoreError, type DocumentStore } from './types';

/** The part of an ioredis client the store uses. */
export type RedisCommandClient = {
  call(command: string, ...args: (string | number)[]): Promise<unknown>;
  quit(): Promise<unknown>;
};

export type RedisDocumentStoreOptions = {
  name?: string;
  logger?: Pick<Logger, 'error'>;
};

export function redactRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return 'redis';
  }
}

function normalizeRedisUrl(value: string): string {
  return /^rediss?:\/\//i.test(value) ? value : `redis://${value}`;
}

/**
 * RedisJSON-backed store. `JSON.SET <key> $` replaces the stored document in
 * one command, so readers see either the previous or the new document.
 */
export function createRedisDocumentStoreFromClient(client: RedisCommandClient, name: string): DocumentStore {
  return {
    name,
    async setDocument(key: string, document: JsonValue): Promise<void> {
      await client.call('JSON.SET', key, '$', JSON.stringify(document));
    },
    async getPath(key: string, path: string): Promise<JsonValue[] | null> {
      const raw = await client.call('JSON.GET', key, path);
      if (raw === null || raw === undefined) {
        return null;
      }
      if (typeof raw !== 'string') {
        throw new DocumentStoreError(name, `Unexpected JSON.GET reply for ${key}`);
      }
      const parsed: unknown = JSON.parse(raw);
      if (!isJsonValue(parsed)) {
        throw new DocumentStoreError(name, `JSON.GET ${key} returned invalid JSON`);
      }
      // `$` paths reply with an array of matches, legacy paths with the value itself.
      if (path.startsWith('$') && Array.isArray(parsed)) {
        return parsed;
      }
      return [parsed];
    },
    async close(): Promise<void> {
      await client.quit();
    }
  };
}

export function createRedisDocumentStore(url: string, options: RedisDocumentStoreOptions = {}): DocumentStore {
  const normalized = normalizeRedisUrl(url);
  const name = options.name ?? redactRedisUrl(normalized);
  const redis = new IORedis(normalized, {
    maxRetriesPerRequest: 2,
    enableOfflineQueue: true
  });
  redis.on('error', (err) => {
    options.logger?.error({ err, store: name }, 'Redis connection error');
  });

  return createRedisDocumentStoreFromClient(
    {
      call: (command, ...args) => redis.call(command, ...args),
      quit: () => redis.quit()
    },
    name
  );
}
