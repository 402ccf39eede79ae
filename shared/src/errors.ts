export type AnnotationErrorCode =
  | 'PATH'
  | 'SCHEMA'
  | 'IMAGE_SIZE_UNAVAILABLE'
  | 'INVALID_CLASS_TABLE'
  | 'UNKNOWN_LABEL'
  | 'DEGENERATE_GEOMETRY';

export class AnnotationError extends Error {
  constructor(
    message: string,
    readonly code: AnnotationErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PathError extends AnnotationError {
  constructor(readonly path: string, message = `Directory not found: ${path}`) {
    super(message, 'PATH');
  }
}

export class SchemaError extends AnnotationError {
  constructor(message: string) {
    super(message, 'SCHEMA');
  }
}

export class ImageSizeUnavailableError extends AnnotationError {
  constructor(readonly source: string, detail?: string) {
    super(
      `No original_size and no readable source image for '${source}'${detail ? `: ${detail}` : ''}`,
      'IMAGE_SIZE_UNAVAILABLE'
    );
  }
}

export class InvalidClassTableError extends AnnotationError {
  constructor(message: string) {
    super(message, 'INVALID_CLASS_TABLE');
  }
}

/** Recoverable: the annotation is skipped, the batch goes on. */
export class UnknownLabelWarning extends AnnotationError {
  constructor(readonly label: string) {
    super(`Label '${label}' is not in the class table`, 'UNKNOWN_LABEL');
  }
}

/** Recoverable: zero or near-zero extent shape. */
export class DegenerateGeometryWarning extends AnnotationError {
  constructor(message: string) {
    super(message, 'DEGENERATE_GEOMETRY');
  }
}

export const isAnnotationError = (error: unknown): error is AnnotationError => error instanceof AnnotationError;

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
