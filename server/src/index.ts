import 'dotenv/config';
import { loadConfig } from './config';
import { createApp } from './app';
import { logger } from './utils/logger';

async function bootstrap() {
  const config = await loadConfig();
  const { app, adapter } = createApp(config);
  await adapter.ensureReady();

  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        imageRoot: config.imageRoot,
        annotationRoot: config.annotationRoot,
        maskRoot: config.maskRoot,
        importRoot: config.importRoot,
        readOnly: config.readOnly,
      },
      'server listening'
    );
  });
}

bootstrap().catch((error) => {
  logger.error(error, 'Failed to start server');
  process.exit(1);
});
