import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { fieldPath, filterPath } from '@hpcpulse/document-store';
import type { JsonValue } from '@hpcpulse/shared';

import { sendError } from '../errors';
import type { AppContext } from '../types';

const userParamsSchema = z.object({ username: z.string().trim().min(1) });

export const registerUserRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/users/:username/jobs', async (request, reply) => {
    try {
      const { username } = userParamsSchema.parse(request.params);
      const path = `${filterPath(fieldPath('Jobs'), 'euser', username)}.id`;
      const jobs: JsonValue[] = [];
      for (const site of ctx.documents.listSites()) {
        jobs.push(...(await ctx.documents.queryFresh(site, path)));
      }
      return { result: true, data: { jobs } };
    } catch (error) {
      return sendError(reply, error);
    }
  });
};
