import { SchemaError } from './errors';
import { ANNOTATION_TYPES } from './types/annotations';
import type {
  Annotation,
  AnnotationSet,
  AnnotationType,
  ImageSize,
  OriginalPoint,
  ParsedAnnotationSet,
} from './types/annotations';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isAnnotationType = (value: unknown): value is AnnotationType =>
  typeof value === 'string' && ANNOTATION_TYPES.some((type) => type === value);

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const toPair = (value: unknown, index: number): OriginalPoint => {
  if (!Array.isArray(value) || value.length !== 2 || !isFiniteNumber(value[0]) || !isFiniteNumber(value[1])) {
    throw new SchemaError(`Coordinate ${index} is not an [x, y] pair of numbers`);
  }
  return [value[0], value[1]];
};

/**
 * Accepts `[[x, y], ...]`, the flat `[x1, y1, x2, y2]` form older files use
 * for rectangles and lines, and a bare `[x, y]` for a one-point freehand.
 */
const parseCoordinates = (type: AnnotationType, raw: unknown): OriginalPoint[] => {
  if (!Array.isArray(raw)) {
    throw new SchemaError('coordinates_original must be an array');
  }
  const flat = raw.length > 0 && raw.every(isFiniteNumber);
  let points: OriginalPoint[];
  if (flat && type !== 'freehand' && raw.length === 4) {
    points = [
      [raw[0], raw[1]],
      [raw[2], raw[3]],
    ];
  } else if (flat && type === 'freehand' && raw.length === 2) {
    points = [[raw[0], raw[1]]];
  } else {
    points = raw.map(toPair);
  }

  if (type === 'freehand') {
    if (points.length < 1) {
      throw new SchemaError('Freehand annotation needs at least one point');
    }
  } else if (points.length !== 2) {
    throw new SchemaError(`${type} annotation needs exactly 2 points, got ${points.length}`);
  }
  return points;
};

export const parseAnnotation = (raw: unknown): Annotation => {
  if (!isRecord(raw)) {
    throw new SchemaError('Annotation must be an object');
  }
  const { label, type, coordinates_original: coordinates } = raw;
  if (typeof label !== 'string' || !label.trim()) {
    throw new SchemaError('Annotation label is missing');
  }
  if (!isAnnotationType(type)) {
    throw new SchemaError(`Unknown annotation type '${String(type)}'`);
  }
  if (coordinates === undefined || coordinates === null) {
    throw new SchemaError('coordinates_original is missing');
  }
  return { label, type, coordinates_original: parseCoordinates(type, coordinates) };
};

export const parseImageSize = (raw: unknown): ImageSize | null => {
  if (!Array.isArray(raw) || raw.length !== 2) return null;
  const [width, height] = raw;
  if (!isFiniteNumber(width) || !isFiniteNumber(height)) return null;
  const w = Math.trunc(width);
  const h = Math.trunc(height);
  return w > 0 && h > 0 ? [w, h] : null;
};

const parseEnvelope = (raw: unknown) => {
  if (!isRecord(raw)) {
    throw new SchemaError('Annotation record must be an object');
  }
  const entries = raw.annotations;
  if (entries === undefined) {
    throw new SchemaError('annotations is missing');
  }
  if (!Array.isArray(entries)) {
    throw new SchemaError('annotations must be an array');
  }
  return { entries, originalSize: parseImageSize(raw.original_size) };
};

/** Strict: the first malformed entry fails the whole record. */
export const parseAnnotationSet = (raw: unknown): ParsedAnnotationSet => {
  const { entries, originalSize } = parseEnvelope(raw);
  const annotations = entries.map((entry, index) => {
    try {
      return parseAnnotation(entry);
    } catch (error) {
      if (error instanceof SchemaError) {
        throw new SchemaError(`annotations[${index}]: ${error.message}`);
      }
      throw error;
    }
  });
  return { annotations, original_size: originalSize };
};

export type LenientParseResult = {
  set: ParsedAnnotationSet;
  rejected: { index: number; error: SchemaError }[];
};

/** Keeps every well-formed entry and reports the rest. */
export const parseAnnotationSetLenient = (raw: unknown): LenientParseResult => {
  const { entries, originalSize } = parseEnvelope(raw);
  const annotations: Annotation[] = [];
  const rejected: LenientParseResult['rejected'] = [];
  entries.forEach((entry, index) => {
    try {
      annotations.push(parseAnnotation(entry));
    } catch (error) {
      if (!(error instanceof SchemaError)) throw error;
      rejected.push({ index, error });
    }
  });
  return { set: { annotations, original_size: originalSize }, rejected };
};

export const serializeAnnotationSet = (set: AnnotationSet): string =>
  JSON.stringify(
    {
      annotations: set.annotations.map(({ label, type, coordinates_original }) => ({
        label,
        type,
        coordinates_original: coordinates_original.map(([x, y]) => [x, y]),
      })),
      original_size: [set.original_size[0], set.original_size[1]],
    },
    null,
    2
  );

export const cloneAnnotationSet = (set: AnnotationSet): AnnotationSet => ({
  annotations: set.annotations.map((annotation) => ({
    ...annotation,
    coordinates_original: annotation.coordinates_original.map(([x, y]): OriginalPoint => [x, y]),
  })),
  original_size: [set.original_size[0], set.original_size[1]],
});
