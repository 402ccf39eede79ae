import fs from 'fs/promises';
import path from 'path';
import {
  describeError,
  parseAnnotationSetLenient,
  serializeAnnotationSet,
  type BatchItemResult,
  type BatchReport,
  type ClassTable,
} from '@annomask/shared';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { assertDirectory, ensureDir, listFilesRecursive, removeIfExists, stemOf, writeFileAtomic } from '../utils/files';
import { findImageByStem } from '../utils/imageMetadata';
import { decodePng, encodePng, toVisualRaster, type MaskEncoding } from './raster';
import { vectorizeRaster } from './rasterToVector';
import { assertThickness, rasterizeAnnotationSet, resolveImageSize } from './vectorToRaster';

export interface MaskExportOptions {
  recordDir: string;
  /** Where to look up `<stem>.<ext>` when a record has no usable original_size. */
  imageDir?: string | null;
  outputDir: string;
  classTable: ClassTable;
  thickness: number;
  encoding: MaskEncoding;
  logger?: Logger;
}

export interface MaskImportOptions {
  maskDir: string;
  outputDir: string;
  /** Pixel value -> label. Use `toVisualTable()` for visual masks. */
  valueTable: ClassTable;
  includeBackground?: boolean;
  logger?: Logger;
}

export const MASK_SUFFIX = '_mask';

/** Relative paths keep their directory: `scans/a.json` -> `scans/a_mask.png`. */
export const maskFileName = (recordFile: string) =>
  path.posix.join(path.posix.dirname(recordFile), `${stemOf(recordFile)}${MASK_SUFFIX}.png`);

export const recordFileName = (maskFile: string) => {
  const stem = stemOf(maskFile);
  const name = `${stem.endsWith(MASK_SUFFIX) ? stem.slice(0, -MASK_SUFFIX.length) : stem}.json`;
  return path.posix.join(path.posix.dirname(maskFile), name);
};

const summarize = (items: BatchItemResult[]): BatchReport => ({
  succeeded: items.filter((item) => item.status === 'succeeded').length,
  skipped: items.filter((item) => item.status === 'skipped').length,
  failed: items.filter((item) => item.status === 'failed').length,
  warnings: items.reduce((total, item) => total + item.warnings.length, 0),
  items,
});

/**
 * Vector records -> class rasters, one file at a time. Subdirectories are
 * mirrored in `outputDir` and in the image lookup. A failing file is
 * logged and counted; the batch always runs to the end.
 */
export const runMaskExport = async ({
  recordDir,
  imageDir = null,
  outputDir,
  classTable,
  thickness,
  encoding,
  logger = rootLogger,
}: MaskExportOptions): Promise<BatchReport> => {
  assertThickness(thickness);
  classTable.assertRasterCompatible();
  if (encoding === 'visual') {
    classTable.toVisualTable();
  }
  await assertDirectory(recordDir);
  if (imageDir) {
    await assertDirectory(imageDir);
  }
  await ensureDir(outputDir);

  const log = logger.child({ batch: 'mask-export' });
  const files = await listFilesRecursive(recordDir, ['.json']);
  log.info({ recordDir, outputDir, files: files.length, thickness, encoding }, 'mask export started');

  const items: BatchItemResult[] = [];
  for (const file of files) {
    const item: BatchItemResult = { file, status: 'failed', warnings: [] };
    items.push(item);
    try {
      const raw: unknown = JSON.parse(await fs.readFile(path.join(recordDir, file), 'utf-8'));
      const { set, rejected } = parseAnnotationSetLenient(raw);
      rejected.forEach(({ index, error }) => item.warnings.push(`annotations[${index}]: ${error.message}`));

      const sourceImage =
        !set.original_size && imageDir
          ? await findImageByStem(path.join(imageDir, path.posix.dirname(file)), stemOf(file))
          : null;
      const size = await resolveImageSize(set, file, sourceImage);
      const { raster, warnings } = rasterizeAnnotationSet(
        { annotations: set.annotations, original_size: size },
        classTable,
        { thickness }
      );
      warnings.forEach(({ index, error }) => item.warnings.push(`annotation ${index}: ${error.message}`));

      const output = path.join(outputDir, maskFileName(file));
      await writeFileAtomic(output, encodePng(encoding === 'visual' ? toVisualRaster(raster, classTable) : raster));
      item.status = 'succeeded';
      item.output = output;
      if (item.warnings.length > 0) {
        log.warn({ file, warnings: item.warnings }, 'annotations skipped');
      }
      log.info({ file, output, width: size[0], height: size[1] }, 'mask written');
    } catch (error) {
      item.error = describeError(error);
      log.error({ file, err: error }, 'mask export failed for file');
    }
  }

  const report = summarize(items);
  log.info(
    { succeeded: report.succeeded, skipped: report.skipped, failed: report.failed, warnings: report.warnings },
    'mask export finished'
  );
  return report;
};

/**
 * Class rasters -> vector records. A mask without any surviving contour
 * produces no record, and a stale record for it is removed.
 */
export const runMaskImport = async ({
  maskDir,
  outputDir,
  valueTable,
  includeBackground = false,
  logger = rootLogger,
}: MaskImportOptions): Promise<BatchReport> => {
  valueTable.assertRasterCompatible();
  await assertDirectory(maskDir);
  await ensureDir(outputDir);

  const log = logger.child({ batch: 'mask-import' });
  const files = await listFilesRecursive(maskDir, ['.png']);
  log.info({ maskDir, outputDir, files: files.length, classes: valueTable.toRecord() }, 'mask import started');

  const items: BatchItemResult[] = [];
  for (const file of files) {
    const item: BatchItemResult = { file, status: 'failed', warnings: [] };
    items.push(item);
    try {
      const raster = decodePng(await fs.readFile(path.join(maskDir, file)));
      const { set, contourCounts } = vectorizeRaster(raster, valueTable, { includeBackground });
      log.debug({ file, contourCounts }, 'contours found');

      const output = path.join(outputDir, recordFileName(file));
      if (set.annotations.length === 0) {
        item.status = 'skipped';
        item.warnings.push('No contours found for the configured classes');
        const removed = await removeIfExists(output);
        log.warn({ file, removedStaleRecord: removed }, 'no contours; record not written');
        continue;
      }
      await writeFileAtomic(output, serializeAnnotationSet(set));
      item.status = 'succeeded';
      item.output = output;
      log.info({ file, output, annotations: set.annotations.length }, 'record written');
    } catch (error) {
      item.error = describeError(error);
      log.error({ file, err: error }, 'mask import failed for file');
    }
  }

  const report = summarize(items);
  log.info(
    { succeeded: report.succeeded, skipped: report.skipped, failed: report.failed, warnings: report.warnings },
    'mask import finished'
  );
  return report;
};
