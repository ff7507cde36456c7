import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PipelineErrorCode } from './pipelineErrors.js';

/** Failures raised at the HTTP boundary rather than by a pipeline stage. */
export type RouteErrorCode =
  | 'VALIDATION_ERROR'
  | 'REQUEST_ERROR'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'TRANSCRIPT_NOT_READY'
  | 'SOAP_NOTE_NOT_READY'
  | 'PAYLOAD_TOO_LARGE'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'TRANSCRIPT_REQUIRED'
  | 'INTERNAL_ERROR'
  | 'AUTH_MISCONFIGURED';

export type ApiErrorCode = PipelineErrorCode | RouteErrorCode;

export const ROUTE_ERROR_STATUS: Record<RouteErrorCode, number> = {
  VALIDATION_ERROR: 400,
  REQUEST_ERROR: 400,
  TRANSCRIPT_REQUIRED: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  TRANSCRIPT_NOT_READY: 409,
  SOAP_NOTE_NOT_READY: 409,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  INTERNAL_ERROR: 500,
  AUTH_MISCONFIGURED: 503
};

export type ErrorEnvelope = {
  ok: false;
  error: {
    code: ApiErrorCode;
    message: string;
  };
  correlationId: string;
};

function getCorrelationId(req: FastifyRequest, reply: FastifyReply): string {
  return String(reply.getHeader('x-correlation-id') ?? req.headers['x-correlation-id'] ?? '');
}

export function buildErrorEnvelope(
  req: FastifyRequest,
  reply: FastifyReply,
  code: ApiErrorCode,
  message: string
): ErrorEnvelope {
  return {
    ok: false,
    error: { code, message },
    correlationId: getCorrelationId(req, reply)
  };
}

export function sendApiError(req: FastifyRequest, reply: FastifyReply, code: RouteErrorCode, message: string) {
  return reply.code(ROUTE_ERROR_STATUS[code]).send(buildErrorEnvelope(req, reply, code, message));
}
