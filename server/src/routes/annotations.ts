import { Router } from 'express';
import type { AnnotationService } from '../services/annotationService';
import { logger } from '../utils/logger';

export const createAnnotationRouter = (service: AnnotationService) => {
  const router = Router();

  router.get('/:imageId', async (req, res, next) => {
    try {
      res.json(await service.getAnnotation(req.params.imageId));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:imageId', async (req, res, next) => {
    try {
      const status = await service.saveAnnotation(req.params.imageId, req.body);
      logger.info({ imageId: req.params.imageId, status }, 'annotation saved');
      res.json({ status });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:imageId', async (req, res, next) => {
    try {
      const deleted = await service.deleteAnnotation(req.params.imageId);
      logger.info({ imageId: req.params.imageId, deleted }, 'annotation deleted');
      res.json({ deleted });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
