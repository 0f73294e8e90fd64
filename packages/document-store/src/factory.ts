import type { Logger } from 'pino';

import { createInlineDocumentStore } from './inlineStore';
import { createRedisDocumentStore } from './redisStore';
import type { DocumentStore } from './types';

export const INLINE_STORE_URL = 'inline';

/** `inline` selects the in-process store, anything else is a redis URL. */
export function createDocumentStore(url: string, logger?: Pick<Logger, 'error'>): DocumentStore {
  if (url.trim().toLowerCase() === INLINE_STORE_URL) {
    return createInlineDocumentStore();
  }
  return createRedisDocumentStore(url.trim(), { logger });
}
