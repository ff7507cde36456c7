import fp from 'fastify-plugin';
import { FastifyPluginAsync } from 'fastify';
import { ZodError } from 'zod';
import { buildErrorEnvelope, ROUTE_ERROR_STATUS, sendApiError } from '../lib/apiError.js';
import type { ApiErrorCode } from '../lib/apiError.js';
import { isPipelineError } from '../lib/pipelineErrors.js';

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

type ErrorDetails = {
  name: string;
  message: string;
  statusCode?: number;
};

function toErrorDetails(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
    return { name: error.name, message: error.message, statusCode };
  }

  return {
    name: 'UnknownError',
    message: 'Unknown error',
    statusCode: 500
  };
}

function describeZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return error.message;
  }
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function resolveEnvelope(error: unknown): { statusCode: number; code: ApiErrorCode; message: string } {
  if (isPipelineError(error)) {
    return { statusCode: error.statusCode, code: error.code, message: error.message };
  }

  if (error instanceof ZodError) {
    return { statusCode: ROUTE_ERROR_STATUS.VALIDATION_ERROR, code: 'VALIDATION_ERROR', message: describeZodError(error) };
  }

  const details = toErrorDetails(error);
  const statusCode =
    typeof details.statusCode === 'number' && details.statusCode >= 400 ? details.statusCode : 500;

  if (statusCode >= 500) {
    return { statusCode, code: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE };
  }

  return {
    statusCode,
    code: statusCode === 413 ? 'PAYLOAD_TOO_LARGE' : 'REQUEST_ERROR',
    message: details.message
  };
}

const errorEnvelope: FastifyPluginAsync = async (app) => {
  app.setErrorHandler(async (error, req, reply) => {
    const { statusCode, code, message } = resolveEnvelope(error);
    const envelope = buildErrorEnvelope(req, reply, code, message);

    const record = { err: error, code, correlationId: envelope.correlationId };
    if (statusCode >= 500) {
      req.log.error(record, 'request.failed');
    } else {
      req.log.warn(record, 'request.rejected');
    }

    return reply.status(statusCode).send(envelope);
  });

  app.setNotFoundHandler(async (req, reply) => sendApiError(req, reply, 'NOT_FOUND', 'Route not found'));
};

export const errorEnvelopePlugin = fp(errorEnvelope);
