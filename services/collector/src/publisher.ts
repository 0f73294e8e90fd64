import type { Logger } from 'pino';
import type { DocumentStore } from '@hpcpulse/document-store';
import { PublicationError, type DestinationFailure } from '@hpcpulse/pbs-model';
import type { JsonValue } from '@hpcpulse/shared';

export type PublishOptions = {
  logger: Pick<Logger, 'info' | 'error'>;
  onFailure?: (failure: DestinationFailure) => void;
};

export type PublishResult = {
  published: string[];
  failures: DestinationFailure[];
};

/**
 * Writes `document` to every store in order. A failing store does not stop
 * the others; the call rejects with {@link PublicationError} only when the
 * first (primary) store failed.
 */
export async function publishDocument(
  stores: readonly DocumentStore[],
  key: string,
  document: JsonValue,
  options: PublishOptions
): Promise<PublishResult> {
  const published: string[] = [];
  const failures: DestinationFailure[] = [];
  let primaryFailed = false;

  for (const [index, store] of stores.entries()) {
    try {
      await store.setDocument(key, document);
      published.push(store.name);
      options.logger.info({ key, destination: store.name }, 'Published document');
    } catch (err) {
      const failure = {
        destination: store.name,
        message: err instanceof Error ? err.message : String(err)
      };
      failures.push(failure);
      primaryFailed = primaryFailed || index === 0;
      options.logger.error({ err, key, destination: store.name }, 'Failed to publish document');
      options.onFailure?.(failure);
    }
  }

  if (stores.length === 0) {
    throw new PublicationError(`No destination configured for ${key}`, failures);
  }
  if (primaryFailed) {
    throw new PublicationError(`Primary destination ${stores[0]?.name ?? ''} rejected ${key}`, failures);
  }
  return { published, failures };
}
