import fp from 'fastify-plugin';
import { FastifyPluginAsync } from 'fastify';
import { redactSensitive } from '../lib/redaction.js';

const securityLogging: FastifyPluginAsync = async (app) => {
  app.addHook('preHandler', async (req) => {
    req.log.info(
      {
        request: redactSensitive({
          method: req.method,
          url: req.routeOptions.url ?? req.url,
          headers: req.headers,
          query: req.query,
          params: req.params,
          body: req.body
        })
      },
      'request.received'
    );
  });
};

export const securityLoggingPlugin = fp(securityLogging);
