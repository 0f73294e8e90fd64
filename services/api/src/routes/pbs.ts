import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { fieldPath, filterPath, wildcardPath } from '@hpcpulse/document-store';
import { DOCUMENT_SUBJECTS, sanitizeKey, type DocumentSubject } from '@hpcpulse/pbs-model';
import { isJsonObject, type JsonObject, type JsonValue } from '@hpcpulse/shared';

import { sendError } from '../errors';
import type { AppContext } from '../types';

const ALL_ENTRIES = '*';

const siteParamsSchema = z.object({ site: z.string().min(1) });

const subjectParamsSchema = siteParamsSchema.extend({
  subject: z.enum(DOCUMENT_SUBJECTS, {
    errorMap: (_issue, ctx) => ({ message: `invalid subject ${String(ctx.data)}` })
  })
});

const detailParamsSchema = subjectParamsSchema.extend({ name: z.string().min(1) });

const detailQuerySchema = z.object({
  item: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]))
});

function firstObject(matches: JsonValue[]): JsonObject {
  const [first] = matches;
  return isJsonObject(first) ? first : {};
}

function recordIdentifier(key: string, record: JsonValue): string {
  return isJsonObject(record) && typeof record.id === 'string' ? record.id : key;
}

function hostOf(key: string, record: JsonValue): string {
  return isJsonObject(record) && typeof record.Mom === 'string' ? record.Mom : key;
}

/** Summary of one document section, as served by `GET /pbs/:site/:subject`. */
export function summarizeSubject(subject: DocumentSubject, section: JsonObject): { count?: number; data: JsonValue } {
  const entries = Object.entries(section);
  switch (subject) {
    case 'Jobs':
      return { count: entries.length, data: entries.map(([key, record]) => recordIdentifier(key, record)) };
    case 'nodes':
      return { count: entries.length, data: Array.from(new Set(entries.map(([key, record]) => hostOf(key, record)))) };
    case 'Queue':
      return { count: entries.length, data: entries.map(([key]) => key) };
    case 'Server': {
      const [first] = entries;
      return { data: first ? first[1] : null };
    }
  }
}

export function detailPath(subject: DocumentSubject, name: string): string {
  if (name === ALL_ENTRIES) {
    return wildcardPath(fieldPath(subject));
  }
  if (subject === 'nodes') {
    return filterPath(fieldPath('nodes'), 'Mom', name);
  }
  return fieldPath(subject, sanitizeKey(name));
}

export function projectItems(matches: JsonValue[], items: readonly string[]): JsonValue[] {
  if (items.length === 0) {
    return matches;
  }
  return matches.map((match) => {
    if (!isJsonObject(match)) {
      return match;
    }
    const projected: JsonObject = {};
    for (const item of items) {
      const value = match[item];
      if (value !== undefined) {
        projected[item] = value;
      }
    }
    return projected;
  });
}

export const registerPbsRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/pbs', async () => ({ result: true, site: ctx.documents.listSites() }));

  app.get('/pbs/:site', async (request, reply) => {
    try {
      const { site } = siteParamsSchema.parse(request.params);
      const data = await ctx.documents.queryFresh(site, '$');
      return { result: true, data };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.get('/pbs/:site/:subject', async (request, reply) => {
    try {
      const { site, subject } = subjectParamsSchema.parse(request.params);
      const matches = await ctx.documents.queryFresh(site, fieldPath(subject));
      return { result: true, ...summarizeSubject(subject, firstObject(matches)) };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.get('/pbs/:site/:subject/:name', async (request, reply) => {
    try {
      const { site, subject, name } = detailParamsSchema.parse(request.params);
      const { item } = detailQuerySchema.parse(request.query);
      const path = detailPath(subject, name);
      request.log.debug({ site, path }, 'Resolved detail query');
      const matches = await ctx.documents.queryFresh(site, path);
      return { result: true, data: projectItems(matches, item) };
    } catch (error) {
      return sendError(reply, error);
    }
  });
};
