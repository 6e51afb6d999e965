import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const app = await createServer({ config });
  let closing = false;

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port, inputDir: config.inputDir, outputDir: config.outputDir, repo: config.repo.kind }, 'Spatial profile service started');

  // Graceful shutdown
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

start().catch((error: unknown) => {
  const logger = createLogger();
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, 'Invalid configuration');
  } else {
    logger.fatal({ err: error }, 'Failed to start server');
  }
  process.exit(1);
});
