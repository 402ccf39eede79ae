import {
  SchemaError,
  parseAnnotationSet,
  parseAnnotationSetLenient,
  serializeAnnotationSet,
  validateAnnotation,
  type ParsedAnnotationSet,
} from '@annomask/shared';
import type { StorageAdapter } from '../adapters/fsAdapter';
import { logger } from '../utils/logger';

export type SaveStatus = 'saved' | 'deleted' | 'unchanged';

export class AnnotationService {
  constructor(private readonly storage: StorageAdapter) {}

  async listImages(cursor?: string, limit?: number) {
    return this.storage.listImages(cursor, limit);
  }

  async getImagePath(id: string) {
    return this.storage.getImageStreamPath(id);
  }

  /** Malformed entries in a stored record are dropped with a warning. */
  async getAnnotation(id: string): Promise<ParsedAnnotationSet | null> {
    const raw = await this.storage.readAnnotation(id);
    if (raw === null) return null;
    const { set, rejected } = parseAnnotationSetLenient(JSON.parse(raw));
    if (rejected.length > 0) {
      logger.warn(
        { imageId: id, rejected: rejected.map(({ index, error }) => ({ index, message: error.message })) },
        'dropped malformed annotations'
      );
    }
    return set;
  }

  /**
   * Validates and persists a record. An empty annotation list removes the
   * record instead, so no stored file is ever empty.
   */
  async saveAnnotation(id: string, payload: unknown): Promise<SaveStatus> {
    const parsed = parseAnnotationSet(payload);
    parsed.annotations.forEach((annotation, index) => {
      const problem = validateAnnotation(annotation);
      if (problem) {
        throw new SchemaError(`annotations[${index}]: ${problem.message}`);
      }
    });

    if (parsed.annotations.length === 0) {
      return (await this.storage.deleteAnnotation(id)) ? 'deleted' : 'unchanged';
    }
    if (!parsed.original_size) {
      throw new SchemaError('original_size must be [width, height] of positive numbers');
    }

    const body = serializeAnnotationSet({ annotations: parsed.annotations, original_size: parsed.original_size });
    if ((await this.storage.readAnnotation(id)) === body) {
      return 'unchanged';
    }
    await this.storage.writeAnnotation(id, body);
    return 'saved';
  }

  async deleteAnnotation(id: string) {
    return this.storage.deleteAnnotation(id);
  }
}
