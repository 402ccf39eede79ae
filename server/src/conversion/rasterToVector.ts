import { polygonArea } from 'd3';
import { BACKGROUND_ID, type Annotation, type AnnotationSet, type ClassTable, type OriginalPoint } from '@annomask/shared';
import type { ClassRaster } from './raster';

/** Contours whose pixel-centre polygon encloses less than this are noise. */
export const MIN_CONTOUR_AREA = 4;

export interface VectorizeOptions {
  includeBackground?: boolean;
}

export interface VectorizeResult {
  set: AnnotationSet;
  /** External contours found per label before the noise filter. */
  contourCounts: Record<string, number>;
}

// Chain-code directions; a higher index turns counterclockwise on screen.
const STEPS: readonly (readonly [number, number])[] = [
  [1, 0],
  [1, -1],
  [0, -1],
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
];
const WEST = 4;

/**
 * Drops the closing duplicate and every vertex where the path keeps going
 * the same way. Vertices where a one-pixel-wide run turns back are kept.
 */
export const simplifyRing = (ring: OriginalPoint[]): OriginalPoint[] => {
  const open =
    ring.length > 1 && ring[0][0] === ring[ring.length - 1][0] && ring[0][1] === ring[ring.length - 1][1]
      ? ring.slice(0, -1)
      : ring;
  if (open.length < 3) return open;
  return open.filter((point, index) => {
    const prev = open[(index - 1 + open.length) % open.length];
    const next = open[(index + 1) % open.length];
    const inX = point[0] - prev[0];
    const inY = point[1] - prev[1];
    const outX = next[0] - point[0];
    const outY = next[1] - point[1];
    return inX * outY - inY * outX !== 0 || inX * outX + inY * outY <= 0;
  });
};

const createMask = (raster: ClassRaster, classId: number) => {
  const { width, height } = raster;
  const mask = Uint8Array.from(raster.data, (value) => (value === classId ? 1 : 0));
  const at = (x: number, y: number) => x >= 0 && y >= 0 && x < width && y < height && mask[y * width + x] === 1;
  return { mask, at };
};

/** Background reachable from outside the image through 4-connected steps. */
const markOutside = (mask: Uint8Array, width: number, height: number) => {
  const outside = new Uint8Array(mask.length);
  const queue: number[] = [];
  const visit = (x: number, y: number) => {
    const index = y * width + x;
    if (mask[index] === 0 && outside[index] === 0) {
      outside[index] = 1;
      queue.push(index);
    }
  };
  for (let x = 0; x < width; x += 1) {
    visit(x, 0);
    visit(x, height - 1);
  }
  for (let y = 0; y < height; y += 1) {
    visit(0, y);
    visit(width - 1, y);
  }
  for (let head = 0; head < queue.length; head += 1) {
    const x = queue[head] % width;
    const y = Math.floor(queue[head] / width);
    if (x > 0) visit(x - 1, y);
    if (x < width - 1) visit(x + 1, y);
    if (y > 0) visit(x, y - 1);
    if (y < height - 1) visit(x, y + 1);
  }
  return outside;
};

/**
 * Follows the outer border of the 8-connected region whose first pixel in
 * scan order is (x, y). Points are pixel centres in tracing order.
 */
const traceOuterBorder = (x: number, y: number, at: (x: number, y: number) => boolean): OriginalPoint[] => {
  const neighbour = (px: number, py: number, dir: number): [number, number] => [
    px + STEPS[dir][0],
    py + STEPS[dir][1],
  ];

  // First foreground neighbour clockwise from the west.
  let firstDir = -1;
  for (let k = 0; k < 8; k += 1) {
    const dir = (WEST - k + 8) % 8;
    const [nx, ny] = neighbour(x, y, dir);
    if (at(nx, ny)) {
      firstDir = dir;
      break;
    }
  }
  if (firstDir === -1) return [[x, y]];

  const [firstX, firstY] = neighbour(x, y, firstDir);
  const points: OriginalPoint[] = [];
  let cx = x;
  let cy = y;
  // Direction from the current pixel back to the previous one.
  let backDir = firstDir;
  for (;;) {
    let nextDir = backDir;
    for (let k = 1; k <= 8; k += 1) {
      const dir = (backDir + k) % 8;
      const [nx, ny] = neighbour(cx, cy, dir);
      if (at(nx, ny)) {
        nextDir = dir;
        break;
      }
    }
    points.push([cx, cy]);
    const [nx, ny] = neighbour(cx, cy, nextDir);
    if (nx === x && ny === y && cx === firstX && cy === firstY) break;
    backDir = (nextDir + 4) % 8;
    cx = nx;
    cy = ny;
  }
  return points;
};

/**
 * Outer borders of the outermost regions equal to `classId`, in scan order
 * of their first pixel. Holes are not returned, nor are regions lying inside
 * the hole of another region of the same class.
 */
export const extractExternalContours = (raster: ClassRaster, classId: number): OriginalPoint[][] => {
  const { width, height } = raster;
  const { mask, at } = createMask(raster, classId);
  if (!mask.includes(1)) return [];

  const outside = markOutside(mask, width, height);
  const seen = new Uint8Array(mask.length);
  const contours: OriginalPoint[][] = [];

  for (let start = 0; start < mask.length; start += 1) {
    if (mask[start] === 0 || seen[start] === 1) continue;
    let external = false;
    const queue = [start];
    seen[start] = 1;
    for (let head = 0; head < queue.length; head += 1) {
      const x = queue[head] % width;
      const y = Math.floor(queue[head] / width);
      if (x === 0 || y === 0 || x === width - 1 || y === height - 1) external = true;
      for (let dir = 0; dir < 8; dir += 1) {
        const nx = x + STEPS[dir][0];
        const ny = y + STEPS[dir][1];
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
        const index = ny * width + nx;
        if (mask[index] === 1) {
          if (seen[index] === 0) {
            seen[index] = 1;
            queue.push(index);
          }
        } else if (dir % 2 === 0 && outside[index] === 1) {
          external = true;
        }
      }
    }
    if (external) {
      contours.push(traceOuterBorder(start % width, Math.floor(start / width), at));
    }
  }
  return contours;
};

/**
 * Decomposes a class raster into one freehand annotation per external
 * contour, classes in table order, contours in discovery order.
 */
export const vectorizeRaster = (
  raster: ClassRaster,
  valueTable: ClassTable,
  { includeBackground = false }: VectorizeOptions = {}
): VectorizeResult => {
  const annotations: Annotation[] = [];
  const contourCounts: Record<string, number> = {};

  for (const { label, id } of valueTable.entries()) {
    if (id === BACKGROUND_ID && !includeBackground) continue;
    const rings = extractExternalContours(raster, id);
    contourCounts[label] = rings.length;
    for (const ring of rings) {
      const points = simplifyRing(ring);
      const area = points.length < 3 ? 0 : Math.abs(polygonArea(points));
      if (area < MIN_CONTOUR_AREA) continue;
      annotations.push({ label, type: 'freehand', coordinates_original: points });
    }
  }

  return { set: { annotations, original_size: [raster.width, raster.height] }, contourCounts };
};
