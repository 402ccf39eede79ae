import { DegenerateGeometryWarning, SchemaError } from './errors';
import type { Annotation, OriginalPoint, Point } from './types/annotations';

/** Smallest rectangle side or line length, in original pixels, worth keeping. */
export const MIN_SHAPE_EXTENT = 1;

export const toPoint = ([x, y]: OriginalPoint): Point => ({ x, y });

export const toOriginalPoint = ({ x, y }: Point): OriginalPoint => [x, y];

export const normalizeRectangle = (a: OriginalPoint, b: OriginalPoint): [OriginalPoint, OriginalPoint] => [
  [Math.min(a[0], b[0]), Math.min(a[1], b[1])],
  [Math.max(a[0], b[0]), Math.max(a[1], b[1])],
];

export const distanceToSegmentSquared = (p: Point, a: Point, b: Point) => {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSquared = dx * dx + dy * dy;
  let t = 0;
  if (lengthSquared > 0) {
    t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSquared));
  }
  const cx = a.x + t * dx - p.x;
  const cy = a.y + t * dy - p.y;
  return cx * cx + cy * cy;
};

export const bounds = (points: readonly Point[]) => {
  if (points.length === 0) return null;
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const { x, y } of points) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { minX, minY, maxX, maxY };
};

/**
 * Checks an annotation before it may enter a store. Returns the reason it is
 * unacceptable, or null.
 */
export const validateAnnotation = (annotation: Annotation): SchemaError | DegenerateGeometryWarning | null => {
  if (!annotation.label.trim()) {
    return new SchemaError('Annotation label must not be empty');
  }
  const points = annotation.coordinates_original;
  if (points.some(([x, y]) => !Number.isFinite(x) || !Number.isFinite(y))) {
    return new SchemaError('Annotation coordinates must be finite numbers');
  }
  switch (annotation.type) {
    case 'rectangle': {
      if (points.length !== 2) return new SchemaError(`Rectangle needs 2 points, got ${points.length}`);
      const [[x1, y1], [x2, y2]] = points;
      if (Math.abs(x2 - x1) < MIN_SHAPE_EXTENT || Math.abs(y2 - y1) < MIN_SHAPE_EXTENT) {
        return new DegenerateGeometryWarning('Rectangle is narrower than one pixel');
      }
      return null;
    }
    case 'line': {
      if (points.length !== 2) return new SchemaError(`Line needs 2 points, got ${points.length}`);
      const [[x1, y1], [x2, y2]] = points;
      if (Math.hypot(x2 - x1, y2 - y1) < MIN_SHAPE_EXTENT) {
        return new DegenerateGeometryWarning('Line is shorter than one pixel');
      }
      return null;
    }
    case 'freehand':
      return points.length >= 1 ? null : new SchemaError('Freehand needs at least one point');
  }
};
