import type { Point, Size } from '@annomask/shared';

export const MIN_ZOOM = 0.02;
export const MAX_ZOOM = 100;
export const INITIAL_MAGNIFICATION = 1;
/** Zoom changes smaller than this are dropped; wheels fire in bursts. */
export const ZOOM_EPSILON = 1e-5;
export const SCALE_FLOOR = 0.01;
export const ZOOM_BUTTON_FACTOR = 1.2;
export const ZOOM_WHEEL_FACTOR = 1.04;

const MIN_SCALE = 1e-9;

export interface ViewState {
  zoomLevel: number;
  baseScale: number;
  effectiveScale: number;
  offset: Point;
  canvasSize: Size;
  imageSize: Size;
}

/** Visible part of the image in original pixels; x2/y2 exclusive. */
export interface CropBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** The crop box and the view rectangle it is stretched onto. */
export interface ViewFrame {
  crop: CropBox;
  display: Rect;
}

export interface PanBounds {
  x: [min: number, max: number];
  y: [min: number, max: number];
}

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

const isLaidOut = (size: Size) => size.width > 1 && size.height > 1;

/** One axis of the crop box: rounded, clamped to the image, at least 1 px. */
const cropAxis = (offset: number, scale: number, canvas: number, image: number): [number, number] => {
  let start = Math.round(-offset / scale);
  let end = start + Math.max(1, Math.round(canvas / scale));
  start = clamp(start, 0, image);
  end = clamp(end, 0, image);
  if (end <= start) {
    end = start + 1;
  }
  end = Math.min(image, end);
  start = Math.max(0, Math.min(start, end - 1));
  return [start, end];
};

/**
 * Per axis: an image smaller than the canvas moves freely inside it; a
 * larger one may not uncover the canvas edge.
 */
const panAxisBounds = (canvas: number, extent: number): [number, number] => {
  const available = canvas - extent;
  return [Math.min(0, available), Math.max(0, available)];
};

/**
 * Mapping between original image pixels and view (canvas) pixels under
 * zoom, pan and canvas resize. Owned by one rendering surface.
 */
export class ViewportTransform {
  private zoomLevel = 1;
  private baseScale = 1;
  private offset: Point = { x: 0, y: 0 };
  private canvasSize: Size = { width: 0, height: 0 };
  private imageSize: Size | null = null;
  private cachedFrame: ViewFrame | null | undefined;

  get hasImage() {
    return this.imageSize !== null;
  }

  get canvas(): Size {
    return { ...this.canvasSize };
  }

  get effectiveScale() {
    const scale = this.baseScale * this.zoomLevel;
    return scale < MIN_SCALE ? SCALE_FLOOR : scale;
  }

  get state(): ViewState | null {
    if (!this.imageSize) return null;
    return {
      zoomLevel: this.zoomLevel,
      baseScale: this.baseScale,
      effectiveScale: this.effectiveScale,
      offset: { ...this.offset },
      canvasSize: { ...this.canvasSize },
      imageSize: { ...this.imageSize },
    };
  }

  /**
   * Fits the image into the canvas, centred, at zoom 1. The image is
   * remembered even when the canvas is not laid out yet; the fit then
   * happens on the first usable resize.
   */
  fitToCanvas(canvasSize: Size, imageSize: Size) {
    if (imageSize.width <= 0 || imageSize.height <= 0) return false;
    this.imageSize = { ...imageSize };
    this.invalidate();
    if (!isLaidOut(canvasSize)) return false;

    this.canvasSize = { ...canvasSize };
    this.zoomLevel = 1;
    this.baseScale = this.fitScale();
    const scale = this.effectiveScale;
    this.offset = {
      x: (canvasSize.width - imageSize.width * scale) / 2,
      y: (canvasSize.height - imageSize.height * scale) / 2,
    };
    return true;
  }

  resetView() {
    if (!this.imageSize) return false;
    return this.fitToCanvas(this.canvasSize, this.imageSize);
  }

  clearImage() {
    this.imageSize = null;
    this.zoomLevel = 1;
    this.baseScale = 1;
    this.offset = { x: 0, y: 0 };
    this.invalidate();
  }

  /** Keeps the original point under `pivot` where it is. */
  adjustZoom(factor: number, pivot?: Point) {
    if (!this.isReady() || !Number.isFinite(factor) || factor <= 0) return false;
    const nextZoom = clamp(this.zoomLevel * factor, MIN_ZOOM, MAX_ZOOM);
    if (Math.abs(nextZoom - this.zoomLevel) < ZOOM_EPSILON) return false;

    const anchor = pivot ?? { x: this.canvasSize.width / 2, y: this.canvasSize.height / 2 };
    const before = this.toOriginalAffine(anchor);
    this.zoomLevel = nextZoom;
    const scale = this.effectiveScale;
    this.offset = { x: anchor.x - before.x * scale, y: anchor.y - before.y * scale };
    this.invalidate();
    return true;
  }

  panBounds(): PanBounds | null {
    if (!this.imageSize || !isLaidOut(this.canvasSize)) return null;
    const scale = this.effectiveScale;
    return {
      x: panAxisBounds(this.canvasSize.width, this.imageSize.width * scale),
      y: panAxisBounds(this.canvasSize.height, this.imageSize.height * scale),
    };
  }

  /** Resolves to whether the offset moved. */
  pan(delta: Point) {
    const bounds = this.panBounds();
    if (!bounds) return false;
    const next = {
      x: clamp(this.offset.x + delta.x, bounds.x[0], bounds.x[1]),
      y: clamp(this.offset.y + delta.y, bounds.y[0], bounds.y[1]),
    };
    if (next.x === this.offset.x && next.y === this.offset.y) return false;
    this.offset = next;
    this.invalidate();
    return true;
  }

  /**
   * Keeps the original point at the canvas centre centred. Sizes of 0 or 1
   * px mean the canvas is not laid out and are ignored.
   */
  onCanvasResize(size: Size) {
    if (!isLaidOut(size)) return false;
    if (!this.imageSize) {
      this.canvasSize = { ...size };
      return false;
    }
    if (!isLaidOut(this.canvasSize)) {
      return this.fitToCanvas(size, this.imageSize);
    }

    const centre = this.toOriginalAffine({ x: this.canvasSize.width / 2, y: this.canvasSize.height / 2 });
    this.canvasSize = { ...size };
    this.baseScale = this.fitScale();
    const scale = this.effectiveScale;
    this.offset = { x: size.width / 2 - centre.x * scale, y: size.height / 2 - centre.y * scale };
    this.invalidate();
    return true;
  }

  /**
   * Visible crop box and where it lands on the canvas. The crop is drawn
   * onto its own footprint (`crop * scale + offset`), not stretched over the
   * whole canvas, so view <-> original stays exactly affine.
   */
  frame(): ViewFrame | null {
    if (this.cachedFrame !== undefined) return this.cachedFrame;
    this.cachedFrame = this.computeFrame();
    return this.cachedFrame;
  }

  viewToOriginal(point: Point): Point | null {
    const frame = this.frame();
    if (!frame) return null;
    const { crop, display } = frame;
    return {
      x: crop.x1 + ((point.x - display.x) * (crop.x2 - crop.x1)) / display.width,
      y: crop.y1 + ((point.y - display.y) * (crop.y2 - crop.y1)) / display.height,
    };
  }

  originalToView(point: Point): Point | null {
    const frame = this.frame();
    if (!frame) return null;
    const { crop, display } = frame;
    return {
      x: display.x + ((point.x - crop.x1) * display.width) / (crop.x2 - crop.x1),
      y: display.y + ((point.y - crop.y1) * display.height) / (crop.y2 - crop.y1),
    };
  }

  private isReady() {
    return this.imageSize !== null && isLaidOut(this.canvasSize);
  }

  private fitScale() {
    if (!this.imageSize) return 1;
    return (
      Math.min(this.canvasSize.width / this.imageSize.width, this.canvasSize.height / this.imageSize.height) *
      INITIAL_MAGNIFICATION
    );
  }

  private toOriginalAffine(point: Point): Point {
    const scale = this.effectiveScale;
    return { x: (point.x - this.offset.x) / scale, y: (point.y - this.offset.y) / scale };
  }

  private computeFrame(): ViewFrame | null {
    if (!this.imageSize || !isLaidOut(this.canvasSize)) return null;
    const scale = this.effectiveScale;
    const [x1, x2] = cropAxis(this.offset.x, scale, this.canvasSize.width, this.imageSize.width);
    const [y1, y2] = cropAxis(this.offset.y, scale, this.canvasSize.height, this.imageSize.height);
    return {
      crop: { x1, y1, x2, y2 },
      display: {
        x: x1 * scale + this.offset.x,
        y: y1 * scale + this.offset.y,
        width: (x2 - x1) * scale,
        height: (y2 - y1) * scale,
      },
    };
  }

  private invalidate() {
    this.cachedFrame = undefined;
  }
}
