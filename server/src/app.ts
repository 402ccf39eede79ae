import express from 'express';
import morgan from 'morgan';
import { createFsAdapter } from './adapters/fsAdapter';
import type { ServerConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import { createAnnotationRouter } from './routes/annotations';
import { createConversionRouter } from './routes/conversions';
import { createImageRouter } from './routes/images';
import { AnnotationService } from './services/annotationService';

export const createApp = (config: ServerConfig) => {
  const app = express();
  const adapter = createFsAdapter({
    imageRoot: config.imageRoot,
    annotationRoot: config.annotationRoot,
    readOnly: config.readOnly,
    imageExtensions: config.imageExtensions,
  });
  const service = new AnnotationService(adapter);

  app.disable('x-powered-by');
  if (!process.env.VITEST) {
    app.use(morgan('tiny'));
  }
  app.use(express.json({ limit: '5mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/classes', (_req, res) => {
    res.json(config.classTable.toRecord());
  });

  app.use('/api/images', createImageRouter(service));
  app.use('/api/annotations', createAnnotationRouter(service));
  app.use('/api/conversions', createConversionRouter(config));

  app.use(errorHandler);

  return { app, adapter, service };
};
