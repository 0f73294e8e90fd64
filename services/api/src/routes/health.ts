import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    try {
      await ctx.documents.ping();
    } catch (error) {
      request.log.warn({ err: error }, 'Document store not reachable');
      return reply.status(503).send({ status: 'not_ready', components: { store: false } });
    }
    return { status: 'ready', components: { store: true } };
  });
};
