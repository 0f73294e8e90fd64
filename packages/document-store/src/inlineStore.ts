import { JSONPath } from 'jsonpath-plus';
import { isJsonValue, type JsonValue } from '@hpcpulse/shared';

import { normalizePath } from './paths';
import { DocumentStoreError, type DocumentStore } from './types';

/**
 * In-process store evaluating paths with jsonpath-plus. Documents are kept
 * serialized so a reader never sees a later mutation of the published value.
 */
export function createInlineDocumentStore(name = 'inline'): DocumentStore {
  const documents = new Map<string, string>();

  return {
    name,
    async setDocument(key: string, document: JsonValue): Promise<void> {
      documents.set(key, JSON.stringify(document));
    },
    async getPath(key: string, path: string): Promise<JsonValue[] | null> {
      const serialized = documents.get(key);
      if (serialized === undefined) {
        return null;
      }
      const json: unknown = JSON.parse(serialized);
      if (!isJsonValue(json)) {
        throw new DocumentStoreError(name, `Stored document ${key} is not valid JSON`);
      }
      const matches: unknown = JSONPath({ path: normalizePath(path), json, wrap: true });
      if (!Array.isArray(matches) || !matches.every(isJsonValue)) {
        throw new DocumentStoreError(name, `Unexpected result evaluating ${path}`);
      }
      return matches;
    },
    async close(): Promise<void> {
      documents.clear();
    }
  };
}
