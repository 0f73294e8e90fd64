import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { InvalidPathError } from '@hpcpulse/document-store';
import { StaleDataError } from '@hpcpulse/pbs-model';

/**
 * Failures answered with `{ result: false, msg }`. Clients branch on
 * `result`, so document-level failures keep a 200 status.
 */
export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

export class UnknownSiteError extends ApiError {
  constructor(site: string) {
    super(404, `invalid site ${site}`);
    this.name = 'UnknownSiteError';
  }
}

/** The site is configured but nothing has been published for it. */
export class MissingDocumentError extends ApiError {
  constructor(site: string) {
    super(200, `invalid site ${site}`);
    this.name = 'MissingDocumentError';
  }
}

export class BackendError extends ApiError {
  constructor(cause: unknown) {
    super(200, `backend failure, ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'BackendError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  msg: string;
}

export const STALE_MESSAGE = 'pbs info too old';

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof ApiError) {
    return { statusCode: error.statusCode, msg: error.message };
  }

  if (error instanceof StaleDataError) {
    return { statusCode: 200, msg: STALE_MESSAGE };
  }

  if (error instanceof InvalidPathError) {
    return { statusCode: 400, msg: `invalid name ${error.member}` };
  }

  if (error instanceof ZodError) {
    const [issue] = error.issues;
    const location = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { statusCode: 400, msg: `invalid request, ${location}${issue?.message ?? 'validation failed'}` };
  }

  return { statusCode: 500, msg: 'unexpected error' };
};

export const sendError = (reply: FastifyReply, error: unknown) => {
  const mapped = mapErrorToResponse(error);
  if (mapped.statusCode >= 500) {
    reply.log.error({ err: error }, 'Unhandled error');
  }
  return reply.status(mapped.statusCode).send({ result: false, msg: mapped.msg });
};
