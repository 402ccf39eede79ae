import { Router } from 'express';
import { ReadOnlyStorageError } from '../adapters/fsAdapter';
import type { ServerConfig } from '../config';
import { runMaskExport, runMaskImport } from '../conversion/batch';
import type { MaskEncoding } from '../conversion/raster';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const encodingFrom = (value: unknown, fallback: MaskEncoding): MaskEncoding => {
  if (value === undefined) return fallback;
  if (value === 'visual' || value === 'raw') return value;
  throw new RangeError(`encoding must be 'visual' or 'raw', got '${String(value)}'`);
};

const thicknessFrom = (value: unknown, fallback: number) => {
  if (value === undefined) return fallback;
  if (typeof value !== 'number') {
    throw new RangeError('thickness must be a number');
  }
  return value;
};

/** Batch conversions between the configured record and mask roots. */
export const createConversionRouter = (config: ServerConfig) => {
  const router = Router();

  router.use((_req, _res, next) => {
    next(config.readOnly ? new ReadOnlyStorageError() : undefined);
  });

  router.post('/masks', async (req, res, next) => {
    try {
      const body = isRecord(req.body) ? req.body : {};
      const report = await runMaskExport({
        recordDir: config.annotationRoot,
        imageDir: config.imageRoot,
        outputDir: config.maskRoot,
        classTable: config.classTable,
        thickness: thicknessFrom(body.thickness, config.lineThickness),
        encoding: encodingFrom(body.encoding, config.maskEncoding),
      });
      res.json(report);
    } catch (error) {
      next(error);
    }
  });

  router.post('/annotations', async (req, res, next) => {
    try {
      const body = isRecord(req.body) ? req.body : {};
      const encoding = encodingFrom(body.encoding, config.maskEncoding);
      const report = await runMaskImport({
        maskDir: config.maskRoot,
        outputDir: config.importRoot,
        valueTable: encoding === 'visual' ? config.classTable.toVisualTable() : config.classTable,
        includeBackground: body.includeBackground === true,
      });
      res.json(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
