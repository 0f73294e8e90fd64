import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { fieldPath, wildcardPath } from '@hpcpulse/document-store';
import { APP_REGISTRY_KEY } from '@hpcpulse/pbs-model';

import { sendError } from '../errors';
import type { AppContext } from '../types';

const appParamsSchema = z.object({ name: z.string().min(1) });

export const registerAppRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/app', async (request, reply) => {
    try {
      const names = await ctx.documents.query(APP_REGISTRY_KEY, `${wildcardPath('$')}.Name`);
      return { result: true, data: names ?? [] };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.get('/app/:name', async (request, reply) => {
    try {
      const { name } = appParamsSchema.parse(request.params);
      const descriptor = await ctx.documents.query(APP_REGISTRY_KEY, fieldPath(name));
      return { result: true, data: descriptor ?? [] };
    } catch (error) {
      return sendError(reply, error);
    }
  });
};
