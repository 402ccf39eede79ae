import fs from 'fs/promises';
import path from 'path';
import { PathError, type ImageSummary } from '@annomask/shared';
import { assertDirectory, ensureDir, isMissing, removeIfExists, writeFileAtomic } from '../utils/files';
import { IMAGE_EXTENSIONS, readImageMetadata } from '../utils/imageMetadata';
import { logger } from '../utils/logger';

export interface StorageAdapter {
  listImages: (cursor?: string, limit?: number) => Promise<{ items: StorageImage[]; nextCursor?: string }>;
  getImageStreamPath: (id: string) => Promise<string>;
  readAnnotation: (id: string) => Promise<string | null>;
  writeAnnotation: (id: string, body: string) => Promise<void>;
  /** Resolves to whether a record existed. */
  deleteAnnotation: (id: string) => Promise<boolean>;
  ensureReady: () => Promise<void>;
}

export interface StorageImage extends ImageSummary {
  path: string;
}

export interface FsAdapterOptions {
  imageRoot: string;
  annotationRoot: string;
  readOnly?: boolean;
  imageExtensions?: string[];
}

export class ReadOnlyStorageError extends Error {
  constructor() {
    super('Storage adapter is read-only');
    this.name = 'ReadOnlyStorageError';
  }
}

const normalizeExtension = (value: string) => {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return null;
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
};

/** Joins `id` under `root`, refusing ids that climb out of it. */
const resolveInside = (root: string, id: string) => {
  const resolved = path.resolve(root, id);
  const relative = path.relative(root, resolved);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathError(id, `Invalid id: ${id}`);
  }
  return resolved;
};

/**
 * Records sit beside where the image would be, named after its stem:
 * `scans/a.png` -> `<annotationRoot>/scans/a.json`. Mask export relies on
 * this to find the source image of a record.
 */
export const annotationFileFor = (id: string) => {
  const parsed = path.parse(id);
  return path.join(parsed.dir, `${parsed.name}.json`);
};

export const createFsAdapter = ({ imageRoot, annotationRoot, readOnly, imageExtensions }: FsAdapterOptions): StorageAdapter => {
  const allowedExtensions = new Set(
    (imageExtensions && imageExtensions.length > 0 ? imageExtensions : IMAGE_EXTENSIONS)
      .map(normalizeExtension)
      .filter((ext): ext is string => Boolean(ext))
  );

  const resolveImagePath = (id: string) => resolveInside(imageRoot, id);
  const resolveAnnotationPath = (id: string) => resolveInside(annotationRoot, annotationFileFor(id));

  const assertWritable = () => {
    if (readOnly) {
      throw new ReadOnlyStorageError();
    }
  };

  const collectImageCandidates = async () => {
    const results: string[] = [];
    const queue: { absPath: string; relPath: string }[] = [{ absPath: imageRoot, relPath: '' }];
    for (let next = queue.shift(); next; next = queue.shift()) {
      const { absPath, relPath } = next;
      const entries = await fs.readdir(absPath, { withFileTypes: true });
      for (const entry of entries) {
        const entryRelPath = relPath ? path.join(relPath, entry.name) : entry.name;
        if (entry.isDirectory()) {
          queue.push({ absPath: path.join(absPath, entry.name), relPath: entryRelPath });
          continue;
        }
        if (entry.isFile() && allowedExtensions.has(path.extname(entry.name).toLowerCase())) {
          results.push(entryRelPath);
        }
      }
    }
    return results.sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
  };

  return {
    async ensureReady() {
      await assertDirectory(imageRoot);
      await ensureDir(annotationRoot);
    },
    async listImages(cursor = '', limit = 50) {
      const files = await collectImageCandidates();
      let startIndex = 0;
      if (cursor) {
        const idx = files.indexOf(cursor);
        startIndex = idx >= 0 ? idx + 1 : 0;
      }
      const slice = files.slice(startIndex, startIndex + limit);
      const items: StorageImage[] = [];
      for (const relativePath of slice) {
        const filePath = resolveImagePath(relativePath);
        try {
          const { width, height } = await readImageMetadata(filePath);
          items.push({ id: relativePath, name: path.basename(relativePath), width, height, path: filePath });
        } catch (error) {
          logger.warn({ err: error, filePath }, 'skipping unreadable image');
        }
      }
      const nextCursor = slice.length === limit ? slice[slice.length - 1] : undefined;
      return { items, nextCursor };
    },
    async getImageStreamPath(id: string) {
      const filePath = resolveImagePath(id);
      try {
        await fs.access(filePath);
      } catch (error) {
        if (isMissing(error)) {
          throw new PathError(id, `Image not found: ${id}`);
        }
        throw error;
      }
      return filePath;
    },
    async readAnnotation(id: string) {
      try {
        return await fs.readFile(resolveAnnotationPath(id), 'utf-8');
      } catch (error) {
        if (isMissing(error)) {
          return null;
        }
        throw error;
      }
    },
    async writeAnnotation(id: string, body: string) {
      assertWritable();
      await writeFileAtomic(resolveAnnotationPath(id), body);
    },
    async deleteAnnotation(id: string) {
      assertWritable();
      return removeIfExists(resolveAnnotationPath(id));
    },
  };
};
