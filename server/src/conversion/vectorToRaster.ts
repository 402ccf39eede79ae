import {
  DegenerateGeometryWarning,
  describeError,
  ImageSizeUnavailableError,
  SchemaError,
  UnknownLabelWarning,
  distanceToSegmentSquared,
  toPoint,
  type Annotation,
  type AnnotationSet,
  type ClassTable,
  type ImageSize,
  type ParsedAnnotationSet,
  type Point,
} from '@annomask/shared';
import { readImageMetadata } from '../utils/imageMetadata';
import { createRaster, type ClassRaster } from './raster';

export const DEFAULT_LINE_THICKNESS = 5;

export interface RasterizeOptions {
  /** Stroke width for lines and freehand polylines, in pixels. */
  thickness: number;
}

export interface ConversionWarning {
  index: number;
  label: string;
  error: UnknownLabelWarning | SchemaError | DegenerateGeometryWarning;
}

export interface RasterizeResult {
  raster: ClassRaster;
  warnings: ConversionWarning[];
}

export const assertThickness = (thickness: number) => {
  if (!Number.isInteger(thickness) || thickness <= 0) {
    throw new RangeError(`Line thickness must be a positive integer, got ${thickness}`);
  }
};

const fillRectangle = (raster: ClassRaster, a: Point, b: Point, value: number) => {
  const x0 = Math.max(0, Math.min(a.x, b.x));
  const x1 = Math.min(raster.width, Math.max(a.x, b.x));
  const y0 = Math.max(0, Math.min(a.y, b.y));
  const y1 = Math.min(raster.height, Math.max(a.y, b.y));
  for (let y = y0; y < y1; y += 1) {
    raster.data.fill(value, y * raster.width + x0, y * raster.width + x1);
  }
};

/** Paints every pixel whose index lies within `radius` of segment ab. */
const strokeSegment = (raster: ClassRaster, a: Point, b: Point, radius: number, value: number) => {
  const minX = Math.max(0, Math.floor(Math.min(a.x, b.x) - radius));
  const maxX = Math.min(raster.width - 1, Math.ceil(Math.max(a.x, b.x) + radius));
  const minY = Math.max(0, Math.floor(Math.min(a.y, b.y) - radius));
  const maxY = Math.min(raster.height - 1, Math.ceil(Math.max(a.y, b.y) + radius));
  const radiusSquared = radius * radius;
  for (let y = minY; y <= maxY; y += 1) {
    for (let x = minX; x <= maxX; x += 1) {
      if (distanceToSegmentSquared({ x, y }, a, b) <= radiusSquared) {
        raster.data[y * raster.width + x] = value;
      }
    }
  }
};

const strokePolyline = (raster: ClassRaster, points: Point[], radius: number, value: number) => {
  if (points.length === 1) {
    strokeSegment(raster, points[0], points[0], radius, value);
    return;
  }
  for (let i = 1; i < points.length; i += 1) {
    strokeSegment(raster, points[i - 1], points[i], radius, value);
  }
};

const arityError = (annotation: Annotation) => {
  const count = annotation.coordinates_original.length;
  if (annotation.type === 'freehand') {
    return count >= 1 ? null : new SchemaError('Freehand has no points');
  }
  return count === 2 ? null : new SchemaError(`${annotation.type} needs 2 points, got ${count}`);
};

/**
 * Paints the annotations into a class raster of `set.original_size`, in
 * stored order: later shapes overwrite earlier ones. Freehand strokes are
 * open polylines and are not filled.
 */
export const rasterizeAnnotationSet = (
  set: AnnotationSet,
  classTable: ClassTable,
  { thickness }: RasterizeOptions
): RasterizeResult => {
  assertThickness(thickness);
  classTable.assertRasterCompatible();
  const [width, height] = set.original_size;
  const raster = createRaster(width, height);
  const radius = thickness / 2;
  const warnings: ConversionWarning[] = [];

  set.annotations.forEach((annotation, index) => {
    const { label } = annotation;
    const classId = classTable.idOf(label);
    if (classId === undefined) {
      warnings.push({ index, label, error: new UnknownLabelWarning(label) });
      return;
    }
    const shapeError = arityError(annotation);
    if (shapeError) {
      warnings.push({ index, label, error: shapeError });
      return;
    }
    const points = annotation.coordinates_original.map(([x, y]) => toPoint([Math.round(x), Math.round(y)]));

    switch (annotation.type) {
      case 'rectangle': {
        const [a, b] = points;
        if (a.x === b.x || a.y === b.y) {
          warnings.push({ index, label, error: new DegenerateGeometryWarning('Rectangle has no area after rounding') });
          return;
        }
        fillRectangle(raster, a, b, classId);
        return;
      }
      case 'line':
        strokeSegment(raster, points[0], points[1], radius, classId);
        return;
      case 'freehand':
        strokePolyline(raster, points, radius, classId);
    }
  });

  return { raster, warnings };
};

/**
 * The record's own size when usable, else the size of the source image.
 */
export const resolveImageSize = async (
  parsed: ParsedAnnotationSet,
  recordName: string,
  sourceImagePath: string | null
): Promise<ImageSize> => {
  if (parsed.original_size) {
    return parsed.original_size;
  }
  if (!sourceImagePath) {
    throw new ImageSizeUnavailableError(recordName);
  }
  try {
    const { width, height } = await readImageMetadata(sourceImagePath);
    return [width, height];
  } catch (error) {
    throw new ImageSizeUnavailableError(recordName, describeError(error));
  }
};
