export type AnnotationType = 'rectangle' | 'line' | 'freehand';

export const ANNOTATION_TYPES: readonly AnnotationType[] = ['rectangle', 'line', 'freehand'];

/** A point in original-image pixel space, as persisted. */
export type OriginalPoint = [number, number];

export type Annotation = {
  label: string;
  type: AnnotationType;
  coordinates_original: OriginalPoint[];
};

export type ImageSize = [width: number, height: number];

export type AnnotationSet = {
  annotations: Annotation[];
  original_size: ImageSize;
};

/**
 * A record as read from disk. `original_size` is null when the file lacks a
 * usable size and the caller has to recover it from the image itself.
 */
export type ParsedAnnotationSet = {
  annotations: Annotation[];
  original_size: ImageSize | null;
};

export type Point = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type ImageSummary = {
  id: string;
  name: string;
  width: number;
  height: number;
};
