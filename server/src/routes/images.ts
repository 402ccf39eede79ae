import { Router } from 'express';
import fs from 'fs';
import mime from 'mime-types';
import type { ImageSummary } from '@annomask/shared';
import type { AnnotationService } from '../services/annotationService';

export const parseRange = (header: string, size: number) => {
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match) return null;
  const [, startText, endText] = match;
  const start = startText ? Number(startText) : Math.max(0, size - Number(endText));
  const end = startText && endText ? Math.min(Number(endText), size - 1) : size - 1;
  return start <= end && start < size ? { start, end } : null;
};

// Ids are relative paths; clients send them URI-encoded as a single segment.
export const createImageRouter = (service: AnnotationService) => {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const { cursor, limit } = req.query;
      const result = await service.listImages(
        typeof cursor === 'string' ? cursor : undefined,
        typeof limit === 'string' && limit ? Number(limit) : undefined
      );
      const items: ImageSummary[] = result.items.map(({ id, name, width, height }) => ({ id, name, width, height }));
      res.json({ items, nextCursor: result.nextCursor });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      const filePath = await service.getImagePath(req.params.id);
      const stat = await fs.promises.stat(filePath);
      const contentType = mime.lookup(filePath) || 'application/octet-stream';
      const range = req.headers.range ? parseRange(req.headers.range, stat.size) : null;
      if (req.headers.range && !range) {
        res.status(416).set('Content-Range', `bytes */${stat.size}`).end();
        return;
      }
      if (range) {
        res.status(206);
        res.set({
          'Content-Range': `bytes ${range.start}-${range.end}/${stat.size}`,
          'Accept-Ranges': 'bytes',
          'Content-Length': String(range.end - range.start + 1),
          'Content-Type': contentType,
        });
        fs.createReadStream(filePath, range).pipe(res);
      } else {
        res.set({
          'Content-Length': String(stat.size),
          'Content-Type': contentType,
          'Cache-Control': 'private, max-age=60',
        });
        fs.createReadStream(filePath).pipe(res);
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
};
