import { setTimeout as sleep } from 'node:timers/promises';

import type { Logger } from 'pino';
import type { DocumentStore } from '@hpcpulse/document-store';
import {
  buildDocument,
  parseSnapshot,
  siteDocumentKey,
  type DestinationFailure,
  type PbsDocument
} from '@hpcpulse/pbs-model';

import type { CollectorMetrics } from './metrics';
import { publishDocument } from './publisher';
import type { SchedulerSource } from './scheduler/source';

export type CollectorState = {
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
  lastError: string | null;
  passes: number;
};

export type CollectorContext = {
  site: string;
  source: SchedulerSource;
  stores: readonly DocumentStore[];
  logger: Logger;
  metrics: CollectorMetrics;
  state: CollectorState;
  now?: () => Date;
};

export type PassSummary = {
  key: string;
  timestamp: number;
  queues: number;
  nodes: number;
  jobs: number;
  issues: number;
  published: string[];
  failures: DestinationFailure[];
};

export function createCollectorState(): CollectorState {
  return { lastSuccessAt: null, lastFailureAt: null, lastError: null, passes: 0 };
}

/** Fetches, parses and aggregates one snapshot without publishing it. */
export async function collectDocument(
  ctx: Pick<CollectorContext, 'source' | 'logger' | 'metrics' | 'now'>
): Promise<{ document: PbsDocument; issues: number }> {
  const startedAt = ctx.now?.() ?? new Date();
  const raw = await ctx.source.fetchAll();
  const snapshot = parseSnapshot(raw, {
    onRepair: (query, repair) => {
      ctx.metrics.repairedLines.inc({ query });
      ctx.logger.warn(
        { query, lineNumber: repair.lineNumber, reason: repair.reason, line: repair.line },
        'Dropped malformed scheduler output line'
      );
    }
  });

  const { document, issues } = buildDocument(snapshot, { logger: ctx.logger, now: startedAt });
  for (const issue of issues) {
    ctx.metrics.topologyIssues.inc({ subject: issue.subject });
  }
  return { document, issues: issues.length };
}

/**
 * One aggregation pass. Any failure before publication leaves the documents
 * already in the stores untouched.
 */
export async function runPass(ctx: CollectorContext): Promise<PassSummary> {
  const endTimer = ctx.metrics.passDuration.startTimer();
  const key = siteDocumentKey(ctx.site);
  ctx.state.passes += 1;

  try {
    const { document, issues } = await collectDocument(ctx);
    const result = await publishDocument(ctx.stores, key, document, {
      logger: ctx.logger,
      onFailure: (failure) => ctx.metrics.destinationFailures.inc({ destination: failure.destination })
    });

    const finishedAt = ctx.now?.() ?? new Date();
    ctx.state.lastSuccessAt = finishedAt;
    ctx.state.lastError = null;
    ctx.metrics.lastSuccessfulPass.set(Math.floor(finishedAt.getTime() / 1000));
    ctx.metrics.passes.inc({ outcome: result.failures.length > 0 ? 'partial' : 'success' });

    return {
      key,
      timestamp: document.timestamp,
      queues: Object.keys(document.Queue).length,
      nodes: Object.keys(document.nodes).length,
      jobs: Object.keys(document.Jobs).length,
      issues,
      published: result.published,
      failures: result.failures
    };
  } catch (err) {
    ctx.state.lastFailureAt = ctx.now?.() ?? new Date();
    ctx.state.lastError = err instanceof Error ? err.message : String(err);
    ctx.metrics.passes.inc({ outcome: 'failure' });
    throw err;
  } finally {
    endTimer();
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export type CollectorLoopOptions = {
  intervalMs: number;
  signal: AbortSignal;
};

/**
 * Runs passes back to back with `intervalMs` of rest in between until
 * `signal` aborts. A failed pass is logged; the next pass is its retry.
 */
export async function runCollectorLoop(ctx: CollectorContext, options: CollectorLoopOptions): Promise<void> {
  ctx.logger.info({ site: ctx.site, intervalMs: options.intervalMs }, 'Collector loop starting');

  while (!options.signal.aborted) {
    try {
      const summary = await runPass(ctx);
      ctx.logger.info(summary, 'Aggregation pass completed');
    } catch (err) {
      ctx.logger.error({ err, site: ctx.site }, 'Aggregation pass failed, previous document left in place');
    }

    if (options.signal.aborted) {
      break;
    }
    try {
      await sleep(options.intervalMs, undefined, { signal: options.signal });
    } catch (err) {
      if (!isAbortError(err)) {
        throw err;
      }
    }
  }

  ctx.logger.info({ site: ctx.site }, 'Collector loop stopped');
}
