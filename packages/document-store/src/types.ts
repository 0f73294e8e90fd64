import type { JsonValue } from '@hpcpulse/shared';

export interface DocumentStore {
  /** Label used in logs and metrics, e.g. the redis URL without credentials. */
  readonly name: string;
  /** Replaces the whole document stored under `key`. */
  setDocument(key: string, document: JsonValue): Promise<void>;
  /**
   * Evaluates a JSONPath expression against the document under `key`.
   * Resolves to `null` when the key does not exist.
   */
  getPath(key: string, path: string): Promise<JsonValue[] | null>;
  close(): Promise<void>;
}

export class DocumentStoreError extends Error {
  readonly store: string;

  constructor(store: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentStoreError';
    this.store = store;
  }
}
