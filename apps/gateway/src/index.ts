import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { createApplication, type Application } from './application';

export { createApplication } from './application';

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  bootstrap().catch((error) => {
    console.error('Failed to start turnflow gateway', error);
    process.exitCode = 1;
  });
}

async function bootstrap(): Promise<void> {
  const app = await createApplication();

  await app.start();
  app.logger.info(
    {
      port: app.config.port,
      sessionStore: app.config.session.driver,
      pageSize: app.config.pagination.maxPageSize,
    },
    'turnflow gateway started',
  );

  process.once('SIGINT', (signal) => void shutdown(app, signal));
  process.once('SIGTERM', (signal) => void shutdown(app, signal));
}

async function shutdown(app: Application, signal: NodeJS.Signals): Promise<void> {
  app.logger.info({ signal }, 'Shutting down turnflow gateway');
  try {
    await app.stop();
    app.logger.info('Shutdown complete');
  } catch (error) {
    app.logger.error({ error }, 'Error during shutdown');
    process.exitCode = 1;
  }
}
