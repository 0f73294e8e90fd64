import { createHash, timingSafeEqual } from 'node:crypto';

import type { FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyRequest {
    principal: string | null;
  }
}

type BasicAuthPluginOptions = {
  user: string;
  password: string;
  realm?: string;
};

type Credentials = {
  user: string;
  password: string;
};

const PUBLIC_PATHS = new Set(['/healthz', '/readyz']);

function isPublicRequest(request: FastifyRequest): boolean {
  const path = request.url.split('?')[0] ?? request.url;
  return PUBLIC_PATHS.has(path);
}

export function parseBasicCredentials(header: string | undefined): Credentials | null {
  if (!header) {
    return null;
  }
  const [scheme, value] = header.trim().split(/\s+/, 2);
  if (!scheme || !value || scheme.toLowerCase() !== 'basic') {
    return null;
  }
  const decoded = Buffer.from(value, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) {
    return null;
  }
  return { user: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

// Digests first so both sides have the same length.
function safeEqual(left: string, right: string): boolean {
  const leftDigest = createHash('sha256').update(left).digest();
  const rightDigest = createHash('sha256').update(right).digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

function unauthorized(reply: FastifyReply, realm: string, msg: string) {
  return reply.code(401).header('WWW-Authenticate', `Basic realm="${realm}"`).send({ result: false, msg });
}

export const basicAuthPlugin = fp<BasicAuthPluginOptions>(async (app, options) => {
  const realm = options.realm ?? 'hpc-pulse';

  app.decorateRequest('principal', null);

  app.addHook('onRequest', async (request, reply) => {
    if (isPublicRequest(request)) {
      return;
    }

    const credentials = parseBasicCredentials(request.headers.authorization);
    if (!credentials) {
      return unauthorized(reply, realm, 'missing credentials');
    }

    const userMatches = safeEqual(credentials.user, options.user);
    const passwordMatches = safeEqual(credentials.password, options.password);
    if (!(userMatches && passwordMatches)) {
      request.log.warn({ user: credentials.user }, 'Rejected credentials');
      return unauthorized(reply, realm, 'incorrect user or password');
    }

    request.principal = credentials.user;
  });
});
