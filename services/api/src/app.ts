import cors from '@fastify/cors';
import fastify, { type FastifyInstance } from 'fastify';
import { createDocumentStore, type DocumentStore } from '@hpcpulse/document-store';

import { basicAuthPlugin } from './auth/basicAuth';
import type { ApiConfig } from './config';
import { mapErrorToResponse } from './errors';
import { createLogger } from './logger';
import { registerAppRoutes } from './routes/apps';
import { registerHealthRoutes } from './routes/health';
import { registerPbsRoutes } from './routes/pbs';
import { registerUserRoutes } from './routes/users';
import { SiteDocuments } from './siteDocuments';
import type { AppContext } from './types';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export type CreateAppOptions = {
  /** Replaces the store built from `config.redisUrl`. */
  store?: DocumentStore;
  now?: () => Date;
};

export const createApp = async (config: ApiConfig, options: CreateAppOptions = {}): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLogger(config.logLevel) });
  await app.register(cors, { origin: true, credentials: true });
  await app.register(basicAuthPlugin, { user: config.user, password: config.password });

  const store = options.store ?? createDocumentStore(config.redisUrl, app.log);
  const documents = new SiteDocuments({
    store,
    sites: config.sites,
    maxAgeSeconds: config.maxAgeSeconds,
    now: options.now
  });

  const ctx: AppContext = { config, store, documents };

  registerHealthRoutes(app, ctx);
  registerPbsRoutes(app, ctx);
  registerUserRoutes(app, ctx);
  registerAppRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ result: false, msg: mapped.msg });
  });

  app.addHook('onClose', async () => {
    await store.close();
  });

  return { app, ctx };
};
