import fp from 'fastify-plugin';
import { FastifyPluginAsync } from 'fastify';
import { randomUUID } from 'node:crypto';

const correlationId: FastifyPluginAsync = async (app) => {
  app.addHook('onRequest', async (req, reply) => {
    const incoming = req.headers['x-correlation-id'];
    const value = (Array.isArray(incoming) ? incoming[0] : incoming) || randomUUID();

    req.headers['x-correlation-id'] = value;
    reply.header('x-correlation-id', value);
  });
};

export const correlationIdPlugin = fp(correlationId);
