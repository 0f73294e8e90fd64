import type { Logger } from 'pino';
import { createDocumentStore, type DocumentStore } from '@hpcpulse/document-store';

import { createCollectorState, type CollectorContext } from './collector';
import type { CollectorConfig } from './config';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { createSchedulerSource } from './scheduler/source';

export type CollectorRuntime = CollectorContext & {
  config: CollectorConfig;
};

export type RuntimeOverrides = {
  logger?: Logger;
  stores?: DocumentStore[];
  source?: CollectorContext['source'];
  collectDefaultMetrics?: boolean;
};

export function createRuntime(config: CollectorConfig, overrides: RuntimeOverrides = {}): CollectorRuntime {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const stores = overrides.stores ?? config.redisUrls.map((url) => createDocumentStore(url, logger));
  const source =
    overrides.source ?? createSchedulerSource({ binDir: config.pbsBinDir, timeoutMs: config.commandTimeoutMs });

  return {
    config,
    site: config.site,
    source,
    stores,
    logger,
    metrics: createMetrics({ collectDefaults: overrides.collectDefaultMetrics ?? false }),
    state: createCollectorState()
  };
}

export async function closeRuntime(runtime: CollectorRuntime): Promise<void> {
  const results = await Promise.allSettled(runtime.stores.map((store) => store.close()));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      runtime.logger.warn({ err: result.reason, destination: runtime.stores[index]?.name }, 'Failed to close destination');
    }
  });
}
