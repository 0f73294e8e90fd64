import process from 'node:process';

import { createApp } from './app';
import { loadConfig } from './config';

const start = async () => {
  const config = loadConfig();
  const { app } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info({ port: config.port, host: config.host, sites: config.sites }, 'PBS query API listening');
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start PBS query API');
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down PBS query API');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught error in PBS query API', error);
  process.exit(1);
});
