import fs from 'fs/promises';
import path from 'path';
import { PathError } from '@annomask/shared';

export const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

export const isMissing = (error: unknown) => error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const assertDirectory = async (dir: string) => {
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      throw new PathError(dir, `Not a directory: ${dir}`);
    }
  } catch (error) {
    if (isMissing(error)) {
      throw new PathError(dir);
    }
    throw error;
  }
};

export const fileExists = async (filePath: string) => {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
};

/** Readers never see a half-written file. */
export const writeFileAtomic = async (filePath: string, body: string | Buffer) => {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp-${process.pid}`;
  await fs.writeFile(tmpPath, body);
  await fs.rename(tmpPath, filePath);
};

/** Resolves to whether there was a file to remove. */
export const removeIfExists = async (filePath: string) => {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
};

const byNaturalOrder = (a: string, b: string) => a.localeCompare(b, undefined, { numeric: true });

export const listFiles = async (dir: string, extensions: readonly string[]) => {
  const allowed = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && allowed.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort(byNaturalOrder);
};

/** Like `listFiles`, but descends into subdirectories; paths are `/`-separated and relative to `dir`. */
export const listFilesRecursive = async (dir: string, extensions: readonly string[]) => {
  const found: string[] = [];
  const walk = async (relative: string) => {
    const names = await listFiles(path.join(dir, relative), extensions);
    found.push(...names.map((name) => (relative ? `${relative}/${name}` : name)));
    const entries = await fs.readdir(path.join(dir, relative), { withFileTypes: true });
    for (const entry of entries.filter((item) => item.isDirectory())) {
      await walk(relative ? `${relative}/${entry.name}` : entry.name);
    }
  };
  await walk('');
  return found.sort(byNaturalOrder);
};

export const stemOf = (fileName: string) => path.basename(fileName, path.extname(fileName));
