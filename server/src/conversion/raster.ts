import { PNG } from 'pngjs';
import { BACKGROUND_ID, type ClassTable } from '@annomask/shared';

/** Single-channel 8-bit raster, row-major. */
export interface ClassRaster {
  width: number;
  height: number;
  data: Uint8Array;
}

export type MaskEncoding = 'visual' | 'raw';

export const createRaster = (width: number, height: number): ClassRaster => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid raster size ${width}x${height}`);
  }
  return { width, height, data: new Uint8Array(width * height) };
};

export const pixelAt = (raster: ClassRaster, x: number, y: number) => raster.data[y * raster.width + x];

/**
 * Spreads class ids over 0..255 so a mask is readable by eye. Read such a
 * mask back with `classTable.toVisualTable()`, not the raw table.
 */
export const toVisualRaster = (raster: ClassRaster, classTable: ClassTable): ClassRaster => {
  const visual = classTable.toVisualTable();
  const lookup = new Uint8Array(256);
  for (const { label, id } of classTable.entries()) {
    if (id !== BACKGROUND_ID) {
      lookup[id] = visual.idOf(label) ?? 0;
    }
  }
  return { width: raster.width, height: raster.height, data: raster.data.map((id) => lookup[id]) };
};

export const encodePng = (raster: ClassRaster): Buffer => {
  const png = new PNG({ width: raster.width, height: raster.height });
  raster.data.forEach((value, index) => {
    const offset = index * 4;
    png.data[offset] = value;
    png.data[offset + 1] = value;
    png.data[offset + 2] = value;
    png.data[offset + 3] = 255;
  });
  return PNG.sync.write(png, { colorType: 0 });
};

/** Grayscale PNGs come back as-is; colour ones are reduced to luma. */
export const decodePng = (buffer: Buffer): ClassRaster => {
  const png = PNG.sync.read(buffer);
  const raster = createRaster(png.width, png.height);
  for (let index = 0; index < raster.data.length; index += 1) {
    const offset = index * 4;
    const red = png.data[offset];
    const green = png.data[offset + 1];
    const blue = png.data[offset + 2];
    raster.data[index] =
      red === green && green === blue ? red : Math.round(0.299 * red + 0.587 * green + 0.114 * blue);
  }
  return raster;
};
