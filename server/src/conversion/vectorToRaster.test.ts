import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CLASS_TABLE,
  DegenerateGeometryWarning,
  ImageSizeUnavailableError,
  SchemaError,
  UnknownLabelWarning,
  type AnnotationSet,
} from '@annomask/shared';
import { createRaster, encodePng, pixelAt, type ClassRaster } from './raster';
import { rasterizeAnnotationSet, resolveImageSize } from './vectorToRaster';

const countOf = (raster: ClassRaster, value: number) => raster.data.filter((pixel) => pixel === value).length;

describe('rasterizeAnnotationSet', () => {
  it('fills a rectangle over the half-open pixel range', () => {
    const set: AnnotationSet = {
      annotations: [{ label: 'object', type: 'rectangle', coordinates_original: [[10, 10], [50, 50]] }],
      original_size: [100, 100],
    };
    const { raster, warnings } = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 5 });

    expect(warnings).toEqual([]);
    expect(raster.width).toBe(100);
    expect(raster.height).toBe(100);
    expect(countOf(raster, 2)).toBe(1600);
    expect(pixelAt(raster, 10, 10)).toBe(2);
    expect(pixelAt(raster, 49, 49)).toBe(2);
    expect(pixelAt(raster, 50, 50)).toBe(0);
    expect(pixelAt(raster, 9, 10)).toBe(0);
  });

  it('accepts rectangle corners in any order', () => {
    const set: AnnotationSet = {
      annotations: [{ label: 'object', type: 'rectangle', coordinates_original: [[50, 10], [10, 50]] }],
      original_size: [100, 100],
    };
    expect(countOf(rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 5 }).raster, 2)).toBe(1600);
  });

  it('lets later annotations overwrite earlier ones', () => {
    const set: AnnotationSet = {
      annotations: [
        { label: 'object', type: 'rectangle', coordinates_original: [[0, 0], [10, 10]] },
        { label: 'person', type: 'rectangle', coordinates_original: [[5, 5], [15, 15]] },
      ],
      original_size: [20, 20],
    };
    const { raster } = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 5 });

    expect(pixelAt(raster, 2, 2)).toBe(2);
    expect(pixelAt(raster, 7, 7)).toBe(3);
    expect(countOf(raster, 2)).toBe(75);
    expect(countOf(raster, 3)).toBe(100);
  });

  it('strokes lines with half the thickness on each side', () => {
    const set: AnnotationSet = {
      annotations: [{ label: 'lines', type: 'line', coordinates_original: [[10, 20], [30, 20]] }],
      original_size: [40, 40],
    };
    const { raster } = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 5 });

    expect(pixelAt(raster, 20, 20)).toBe(1);
    expect(pixelAt(raster, 20, 22)).toBe(1);
    expect(pixelAt(raster, 20, 23)).toBe(0);
    expect(pixelAt(raster, 8, 20)).toBe(1);
    expect(pixelAt(raster, 7, 20)).toBe(0);
    expect(pixelAt(raster, 32, 20)).toBe(1);
    expect(pixelAt(raster, 33, 20)).toBe(0);
  });

  it('paints a dot for a one-point freehand', () => {
    const set: AnnotationSet = {
      annotations: [{ label: 'marker', type: 'freehand', coordinates_original: [[10, 10]] }],
      original_size: [20, 20],
    };
    const { raster } = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 1 });

    expect(countOf(raster, 6)).toBe(1);
    expect(pixelAt(raster, 10, 10)).toBe(6);
  });

  it('leaves freehand strokes open', () => {
    const set: AnnotationSet = {
      annotations: [
        {
          label: 'path',
          type: 'freehand',
          coordinates_original: [[2, 2], [17, 2], [17, 17], [2, 17]],
        },
      ],
      original_size: [20, 20],
    };
    const { raster } = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 1 });

    expect(pixelAt(raster, 10, 2)).toBe(7);
    expect(pixelAt(raster, 10, 10)).toBe(0);
    expect(pixelAt(raster, 2, 10)).toBe(0);
  });

  it('skips unknown labels, bad arity and degenerate rectangles with warnings', () => {
    const set: AnnotationSet = {
      annotations: [
        { label: 'unicorn', type: 'rectangle', coordinates_original: [[0, 0], [5, 5]] },
        { label: 'object', type: 'line', coordinates_original: [[0, 0]] },
        { label: 'object', type: 'rectangle', coordinates_original: [[5, 5], [5.4, 9]] },
      ],
      original_size: [10, 10],
    };
    const { raster, warnings } = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 3 });

    expect(countOf(raster, 0)).toBe(100);
    expect(warnings.map(({ index }) => index)).toEqual([0, 1, 2]);
    expect(warnings[0].error).toBeInstanceOf(UnknownLabelWarning);
    expect(warnings[1].error).toBeInstanceOf(SchemaError);
    expect(warnings[2].error).toBeInstanceOf(DegenerateGeometryWarning);
  });

  it('is deterministic', () => {
    const set: AnnotationSet = {
      annotations: [
        { label: 'lines', type: 'line', coordinates_original: [[0.4, 3.6], [17.2, 11.9]] },
        { label: 'animal', type: 'freehand', coordinates_original: [[1, 1], [4, 9], [12, 3]] },
      ],
      original_size: [20, 15],
    };
    const first = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 3 });
    const second = rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 3 });

    expect(Array.from(first.raster.data)).toEqual(Array.from(second.raster.data));
  });

  it('rejects a non-positive thickness', () => {
    const set: AnnotationSet = { annotations: [], original_size: [4, 4] };
    expect(() => rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 0 })).toThrow(RangeError);
    expect(() => rasterizeAnnotationSet(set, DEFAULT_CLASS_TABLE, { thickness: 2.5 })).toThrow(RangeError);
  });
});

describe('resolveImageSize', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'annomask-size-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('prefers the recorded size', async () => {
    await expect(resolveImageSize({ annotations: [], original_size: [64, 48] }, 'a.json', null)).resolves.toEqual([64, 48]);
  });

  it('falls back to the source image', async () => {
    const imagePath = path.join(dir, 'a.png');
    await fs.writeFile(imagePath, encodePng(createRaster(30, 20)));

    await expect(resolveImageSize({ annotations: [], original_size: null }, 'a.json', imagePath)).resolves.toEqual([30, 20]);
  });

  it('fails when neither is available', async () => {
    await expect(resolveImageSize({ annotations: [], original_size: null }, 'a.json', null)).rejects.toBeInstanceOf(
      ImageSizeUnavailableError
    );
    await expect(
      resolveImageSize({ annotations: [], original_size: null }, 'a.json', path.join(dir, 'missing.png'))
    ).rejects.toBeInstanceOf(ImageSizeUnavailableError);
  });
});
