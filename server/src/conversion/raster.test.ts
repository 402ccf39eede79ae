import { PNG } from 'pngjs';
import { describe, expect, it } from 'vitest';
import { ClassTable, DEFAULT_CLASS_TABLE, InvalidClassTableError } from '@annomask/shared';
import { createRaster, decodePng, encodePng, pixelAt, toVisualRaster } from './raster';

describe('raster', () => {
  it('rejects empty sizes', () => {
    expect(() => createRaster(0, 4)).toThrow(RangeError);
    expect(() => createRaster(3, 1.5)).toThrow(RangeError);
  });

  it('stores single-channel values through a grayscale PNG', () => {
    const raster = createRaster(3, 2);
    raster.data.set([0, 1, 2, 7, 128, 255]);

    const decoded = decodePng(encodePng(raster));

    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect(Array.from(decoded.data)).toEqual([0, 1, 2, 7, 128, 255]);
  });

  it('reduces colour PNGs to luma', () => {
    const png = new PNG({ width: 2, height: 1 });
    png.data.set([255, 0, 0, 255, 40, 40, 40, 255]);

    const decoded = decodePng(PNG.sync.write(png));

    expect(pixelAt(decoded, 0, 0)).toBe(76);
    expect(pixelAt(decoded, 1, 0)).toBe(40);
  });

  it('spreads class ids over the visible range', () => {
    const raster = createRaster(4, 1);
    raster.data.set([0, 1, 2, 7]);

    const visual = toVisualRaster(raster, DEFAULT_CLASS_TABLE);

    expect(Array.from(visual.data)).toEqual([0, 36, 73, 255]);
  });

  it('refuses visual encoding for sparse ids that would overflow', () => {
    const table = ClassTable.fromEntries([
      ['background', 0],
      ['lines', 1],
      ['object', 9],
    ]);
    expect(() => toVisualRaster(createRaster(1, 1), table)).toThrow(InvalidClassTableError);
  });
});
