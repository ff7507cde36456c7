import { env } from './config/env.js';
import { buildApp } from './app.js';

const app = buildApp();

const shutdown = async (signal: NodeJS.Signals) => {
  app.log.info({ signal }, 'server.shutting_down');
  await app.close();
};

const onSignal = (signal: NodeJS.Signals) => {
  shutdown(signal).catch((error: unknown) => {
    app.log.error({ err: error }, 'server.shutdown_failed');
    process.exitCode = 1;
  });
};

process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

try {
  await app.listen({ port: env.PORT, host: '0.0.0.0' });
} catch (error) {
  app.log.error({ err: error }, 'server.start_failed');
  process.exit(1);
}
