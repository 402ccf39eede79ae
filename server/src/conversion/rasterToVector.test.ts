import { polygonArea } from 'd3';
import { describe, expect, it } from 'vitest';
import { ClassTable, DEFAULT_CLASS_TABLE, type OriginalPoint } from '@annomask/shared';
import { createRaster, type ClassRaster } from './raster';
import { MIN_CONTOUR_AREA, simplifyRing, vectorizeRaster } from './rasterToVector';
import { rasterizeAnnotationSet } from './vectorToRaster';

const paint = (raster: ClassRaster, x0: number, y0: number, size: number, value: number) => {
  for (let y = y0; y < y0 + size; y += 1) {
    for (let x = x0; x < x0 + size; x += 1) {
      raster.data[y * raster.width + x] = value;
    }
  }
};

const paintRect = (raster: ClassRaster, x0: number, y0: number, width: number, height: number, value: number) => {
  for (let y = y0; y < y0 + height; y += 1) {
    for (let x = x0; x < x0 + width; x += 1) {
      raster.data[y * raster.width + x] = value;
    }
  }
};

const BLOCK_5_TO_14: OriginalPoint[] = [
  [5, 5],
  [5, 14],
  [14, 14],
  [14, 5],
];

describe('simplifyRing', () => {
  it('drops the closing point and straight-run vertices', () => {
    expect(
      simplifyRing([
        [0, 0],
        [1, 0],
        [2, 0],
        [2, 2],
        [0, 2],
        [0, 0],
      ])
    ).toEqual([
      [0, 0],
      [2, 0],
      [2, 2],
      [0, 2],
    ]);
  });

  it('keeps the ends of a run that turns back on itself', () => {
    expect(
      simplifyRing([
        [2, 5],
        [3, 5],
        [4, 5],
        [3, 5],
      ])
    ).toEqual([
      [2, 5],
      [4, 5],
    ]);
  });
});

describe('vectorizeRaster', () => {
  it('traces a block along its boundary pixel centres', () => {
    const raster = createRaster(20, 20);
    paint(raster, 5, 5, 10, 2);

    const { set, contourCounts } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(set.original_size).toEqual([20, 20]);
    expect(set.annotations).toHaveLength(1);
    const [annotation] = set.annotations;
    expect(annotation.label).toBe('object');
    expect(annotation.type).toBe('freehand');
    expect(annotation.coordinates_original).toEqual(BLOCK_5_TO_14);
    expect(Math.abs(polygonArea(annotation.coordinates_original))).toBe(81);
    expect(contourCounts.object).toBe(1);
    expect(contourCounts.person).toBe(0);
  });

  it('drops holes', () => {
    const raster = createRaster(20, 20);
    paint(raster, 5, 5, 10, 2);
    paint(raster, 8, 8, 4, 0);

    const { set } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(set.annotations).toHaveLength(1);
    expect(set.annotations[0].coordinates_original).toEqual(BLOCK_5_TO_14);
  });

  it('ignores regions inside the hole of a same-class region', () => {
    const raster = createRaster(24, 24);
    paint(raster, 4, 4, 16, 1);
    paint(raster, 7, 7, 10, 0);
    paint(raster, 10, 10, 4, 1);

    const { set, contourCounts } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(contourCounts.lines).toBe(1);
    expect(set.annotations).toEqual([
      {
        label: 'lines',
        type: 'freehand',
        coordinates_original: [
          [4, 4],
          [4, 19],
          [19, 19],
          [19, 4],
        ],
      },
    ]);
  });

  it('keeps a region of another class inside a hole', () => {
    const raster = createRaster(24, 24);
    paint(raster, 4, 4, 16, 1);
    paint(raster, 7, 7, 10, 0);
    paint(raster, 10, 10, 4, 2);

    const { set } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(set.annotations.map(({ label }) => label)).toEqual(['lines', 'object']);
  });

  it('discards one-pixel-wide strokes and small blobs', () => {
    const raster = createRaster(20, 20);
    paintRect(raster, 2, 5, 8, 1, 1);
    paintRect(raster, 2, 10, 1, 9, 1);
    paintRect(raster, 12, 2, 2, 3, 2);

    const { set, contourCounts } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(set.annotations).toEqual([]);
    expect(contourCounts).toMatchObject({ lines: 2, object: 1 });
  });

  it('discards contours below the minimum area', () => {
    const raster = createRaster(20, 20);
    paint(raster, 1, 1, 2, 3);
    paint(raster, 10, 10, 3, 4);
    raster.data[18 * 20 + 18] = 5;

    const { set, contourCounts } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(set.annotations.map(({ label }) => label)).toEqual(['vehicle']);
    expect(contourCounts).toMatchObject({ person: 1, vehicle: 1, animal: 1 });
    for (const annotation of set.annotations) {
      expect(Math.abs(polygonArea(annotation.coordinates_original))).toBeGreaterThanOrEqual(MIN_CONTOUR_AREA);
    }
  });

  it('yields nothing for an all-background raster', () => {
    const { set } = vectorizeRaster(createRaster(16, 9), DEFAULT_CLASS_TABLE);
    expect(set).toEqual({ annotations: [], original_size: [16, 9] });
  });

  it('emits classes in table order and background only on request', () => {
    const raster = createRaster(20, 20);
    paint(raster, 12, 12, 5, 1);
    paint(raster, 2, 2, 5, 4);
    const table = ClassTable.fromEntries([
      ['background', 0],
      ['vehicle', 4],
      ['lines', 1],
    ]);

    expect(vectorizeRaster(raster, table).set.annotations.map(({ label }) => label)).toEqual(['vehicle', 'lines']);
    expect(
      vectorizeRaster(raster, table, { includeBackground: true }).set.annotations.map(({ label }) => label)
    ).toEqual(['background', 'vehicle', 'lines']);
  });

  it('recovers rectangles painted by the rasterizer', () => {
    const { raster } = rasterizeAnnotationSet(
      {
        annotations: [{ label: 'person', type: 'rectangle', coordinates_original: [[10, 10], [50, 50]] }],
        original_size: [64, 64],
      },
      DEFAULT_CLASS_TABLE,
      { thickness: 5 }
    );

    const { set } = vectorizeRaster(raster, DEFAULT_CLASS_TABLE);

    expect(set.annotations).toHaveLength(1);
    const xs = set.annotations[0].coordinates_original.map(([x]) => x);
    const ys = set.annotations[0].coordinates_original.map(([, y]) => y);
    expect([Math.min(...xs), Math.max(...xs), Math.min(...ys), Math.max(...ys)]).toEqual([10, 49, 10, 49]);
  });
});
