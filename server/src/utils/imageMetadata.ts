import fs from 'fs/promises';
import path from 'path';
import { fileExists } from './files';

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.bmp', '.tiff', '.tif', '.webp'];

export async function readImageMetadata(filePath: string): Promise<{ width: number; height: number }> {
  const buffer = await fs.readFile(filePath);
  try {
    const sizeOf = (await import('image-size')).imageSize;
    const size = sizeOf(buffer);
    if (!size.width || !size.height) {
      throw new Error('Missing dimension');
    }
    return { width: size.width, height: size.height };
  } catch (error) {
    throw new Error(`Failed to read image metadata: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** First `<stem><ext>` in `dir` for the known image extensions. */
export const findImageByStem = async (dir: string, stem: string) => {
  for (const ext of IMAGE_EXTENSIONS) {
    const candidate = path.join(dir, `${stem}${ext}`);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return null;
};
