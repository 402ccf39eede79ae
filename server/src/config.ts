import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ClassTable, DEFAULT_CLASS_TABLE, InvalidClassTableError } from '@annomask/shared';
import type { MaskEncoding } from './conversion/raster';
import { DEFAULT_LINE_THICKNESS } from './conversion/vectorToRaster';

export interface ServerConfig {
  port: number;
  imageRoot: string;
  /** Vector records edited through the API and read by mask export. */
  annotationRoot: string;
  maskRoot: string;
  /** Records generated from masks. Kept apart so imports never clobber edits. */
  importRoot: string;
  imageExtensions?: string[];
  readOnly: boolean;
  lineThickness: number;
  maskEncoding: MaskEncoding;
  classTable: ClassTable;
}

export const resolveUserPath = (inputPath: string, cwd = process.cwd()) => {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (path.isAbsolute(inputPath)) {
    return inputPath;
  }
  return path.resolve(cwd, inputPath);
};

const readPositiveInteger = (name: string, value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new RangeError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
};

const readEncoding = (value: string | undefined): MaskEncoding => {
  if (value === undefined || value === 'visual') return 'visual';
  if (value === 'raw') return 'raw';
  throw new RangeError(`MASK_ENCODING must be 'visual' or 'raw', got '${value}'`);
};

const readClassTable = async (filePath: string | undefined, cwd: string) => {
  if (!filePath) return DEFAULT_CLASS_TABLE;
  const resolved = resolveUserPath(filePath, cwd);
  const parsed: unknown = JSON.parse(await fs.readFile(resolved, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidClassTableError(`${resolved} must hold a {"label": id} object`);
  }
  const table = ClassTable.fromRecord(Object.fromEntries(Object.entries(parsed)));
  table.assertRasterCompatible();
  return table;
};

export const loadConfig = async (env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Promise<ServerConfig> => {
  const rootOf = (value: string | undefined, fallback: string) => resolveUserPath(value ?? fallback, cwd);
  const imageExtensions = env.IMAGE_EXTENSIONS?.split(',')
    .map((ext) => ext.trim())
    .filter(Boolean);

  return {
    port: readPositiveInteger('PORT', env.PORT, 4000),
    imageRoot: rootOf(env.IMAGE_ROOT, 'mock-data/images'),
    annotationRoot: rootOf(env.ANNOTATION_ROOT, 'mock-data/annotations'),
    maskRoot: rootOf(env.MASK_ROOT, 'mock-data/masks'),
    importRoot: rootOf(env.IMPORT_ROOT, 'mock-data/imported'),
    imageExtensions: imageExtensions && imageExtensions.length > 0 ? imageExtensions : undefined,
    readOnly: env.READ_ONLY === 'true',
    lineThickness: readPositiveInteger('LINE_THICKNESS', env.LINE_THICKNESS, DEFAULT_LINE_THICKNESS),
    maskEncoding: readEncoding(env.MASK_ENCODING),
    classTable: await readClassTable(env.CLASS_TABLE_FILE, cwd),
  };
};
