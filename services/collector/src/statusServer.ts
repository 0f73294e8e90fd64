import fastify, { type FastifyInstance } from 'fastify';

import type { CollectorState } from './collector';
import { loggerOptions } from './logger';
import type { CollectorMetrics } from './metrics';

export type StatusServerContext = {
  logLevel: string;
  metrics: CollectorMetrics;
  state: CollectorState;
  /** A pass older than this marks the collector as not ready. */
  maxStalenessMs: number;
  now?: () => Date;
};

export const createStatusServer = (ctx: StatusServerContext): FastifyInstance => {
  const app = fastify({ logger: loggerOptions(ctx.logLevel, 'pbs-collector-status') });

  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const { state } = ctx;
    const now = ctx.now?.() ?? new Date();
    const lastSuccessAt = state.lastSuccessAt ? state.lastSuccessAt.toISOString() : null;
    const fresh = state.lastSuccessAt !== null && now.getTime() - state.lastSuccessAt.getTime() <= ctx.maxStalenessMs;

    const body = {
      status: fresh ? 'ready' : 'not_ready',
      passes: state.passes,
      lastSuccessAt,
      lastError: state.lastError
    };
    if (!fresh) {
      return reply.status(503).send(body);
    }
    return body;
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });

  return app;
};
