import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../config/env.js';
import { sendApiError } from '../lib/apiError.js';

let openAccessAnnounced = false;

function presentedKey(req: FastifyRequest): string {
  const value = req.headers['x-api-key'];
  return (Array.isArray(value) ? value[0] : value) ?? '';
}

function digest(value: string) {
  return createHash('sha256').update(value).digest();
}

function keyMatches(presented: string, expected: string) {
  return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Guards every route that stores audio, drives a consultation or returns its products.
 * Reads are guarded as well: transcripts, SOAP notes, exports and audit events all carry
 * patient information.
 *
 * With no `API_KEY` configured, development stays open (announced once) and every other
 * environment refuses with `AUTH_MISCONFIGURED`.
 */
export async function requireApiKey(req: FastifyRequest, reply: FastifyReply) {
  if (!env.API_KEY) {
    if (env.NODE_ENV !== 'development') {
      return sendApiError(req, reply, 'AUTH_MISCONFIGURED', 'API_KEY must be configured to serve consultation data');
    }

    if (!openAccessAnnounced) {
      openAccessAnnounced = true;
      req.log.warn({ route: req.routeOptions.url }, 'auth.open_access_in_development');
    }
    return;
  }

  if (!keyMatches(presentedKey(req), env.API_KEY)) {
    return sendApiError(req, reply, 'UNAUTHORIZED', 'A valid x-api-key header is required');
  }
}
