import {
  normalizeRectangle,
  toOriginalPoint,
  validateAnnotation,
  type Annotation,
  type AnnotationType,
  type ImageSize,
  type ImageSummary,
  type Point,
  type Size,
} from '@annomask/shared';
import { createAnnotationStore, type AnnotationStore, type SaveReport } from '../hooks/useAnnotationStore';
import type { AnnotationRepository } from './api';
import { createDebouncer, RESIZE_DEBOUNCE_MS, type Debouncer } from './debounce';
import { drawingReducer, IDLE, type DrawingEvent, type DrawingState, type DrawingTool } from './drawing';
import { HIT_TOLERANCE, hitTestAnnotations, toViewOutline } from './hitTest';
import { ViewportTransform, ZOOM_BUTTON_FACTOR } from './viewport';

export type CommitResult =
  | { status: 'committed'; index: number; annotation: Annotation }
  | { status: 'rejected'; reason: string }
  | { status: 'none' };

/** An annotation as it should be drawn right now, in view space. */
export interface RenderedShape {
  index: number;
  label: string;
  type: AnnotationType;
  points: Point[];
}

export interface SessionOptions {
  repository: AnnotationRepository;
  label: string;
  tool?: DrawingTool;
  store?: AnnotationStore;
  resizeDelayMs?: number;
}

type Listener = () => void;

const clampToImage = (point: Point, [width, height]: ImageSize): Point => ({
  x: Math.max(0, Math.min(width, point.x)),
  y: Math.max(0, Math.min(height, point.y)),
});

/**
 * One editing surface: a viewport, a store, the stroke in progress and the
 * resize debouncer. UI code forwards input here and redraws when notified.
 */
export class AnnotationSession {
  readonly viewport = new ViewportTransform();
  readonly store: AnnotationStore;
  private readonly repository: AnnotationRepository;
  private readonly resizeDebouncer: Debouncer<Size>;
  private readonly listeners = new Set<Listener>();
  private drawing: DrawingState = IDLE;
  private image: { id: string; size: ImageSize } | null = null;
  private currentTool: DrawingTool;
  private currentLabel: string;

  constructor({ repository, label, tool = 'freehand', store, resizeDelayMs = RESIZE_DEBOUNCE_MS }: SessionOptions) {
    this.repository = repository;
    this.store = store ?? createAnnotationStore();
    this.currentLabel = label;
    this.currentTool = tool;
    this.resizeDebouncer = createDebouncer(resizeDelayMs, (size) => {
      if (this.viewport.onCanvasResize(size)) {
        this.notify();
      }
    });
  }

  get imageId() {
    return this.image?.id ?? null;
  }

  get tool() {
    return this.currentTool;
  }

  get label() {
    return this.currentLabel;
  }

  get isDrawing() {
    return this.drawing.phase === 'drawing';
  }

  /**
   * Fits the view to the image and loads its record unless the session
   * already holds edits for it. Resolves to whether a record was loaded.
   */
  async openImage(image: ImageSummary, canvasSize: Size = this.viewport.canvas) {
    this.drawing = IDLE;
    this.image = { id: image.id, size: [image.width, image.height] };
    this.viewport.fitToCanvas(canvasSize, { width: image.width, height: image.height });
    this.notify();
    const loaded = await this.store.getState().load(image.id, this.repository, [image.width, image.height]);
    if (loaded) {
      this.notify();
    }
    return loaded;
  }

  closeImage() {
    this.image = null;
    this.drawing = IDLE;
    this.viewport.clearImage();
    this.notify();
  }

  setTool(tool: DrawingTool) {
    this.currentTool = tool;
    this.dispatch({ type: 'cancel' });
  }

  setLabel(label: string) {
    this.currentLabel = label;
  }

  pointerDown(point: Point) {
    if (!this.image) return;
    this.dispatch({ type: 'press', tool: this.currentTool, point });
  }

  pointerMove(point: Point) {
    if (this.drawing.phase !== 'drawing') return;
    this.dispatch({ type: 'drag', point });
  }

  pointerUp(point?: Point): CommitResult {
    if (this.drawing.phase !== 'drawing') return { status: 'none' };
    const released = drawingReducer(this.drawing, { type: 'release', point });
    this.drawing = IDLE;
    const result: CommitResult =
      released.phase === 'committed' ? this.commit(released.tool, released.points) : { status: 'none' };
    this.notify();
    return result;
  }

  pointerCancel() {
    this.dispatch({ type: 'cancel' });
  }

  zoomAt(factor: number, pivot?: Point) {
    return this.changed(this.viewport.adjustZoom(factor, pivot));
  }

  /** Button zoom about the canvas centre; positive steps zoom in. */
  zoomBy(steps: number) {
    return this.zoomAt(ZOOM_BUTTON_FACTOR ** steps);
  }

  panBy(delta: Point) {
    return this.changed(this.viewport.pan(delta));
  }

  resetView() {
    return this.changed(this.viewport.resetView());
  }

  notifyCanvasResize(size: Size) {
    this.resizeDebouncer.schedule(size);
  }

  hitTest(point: Point, tolerance = HIT_TOLERANCE) {
    if (!this.image) return null;
    return hitTestAnnotations(this.annotations(), this.viewport, point, tolerance);
  }

  deleteAnnotation(index: number) {
    if (!this.image) return false;
    return this.changed(this.store.getState().deleteAt(this.image.id, index));
  }

  clearAnnotations() {
    if (!this.image) return;
    this.store.getState().clear(this.image.id, this.image.size);
    this.notify();
  }

  annotations() {
    return this.image ? this.store.getState().list(this.image.id) : [];
  }

  renderAnnotations(): RenderedShape[] {
    const shapes: RenderedShape[] = [];
    this.annotations().forEach((annotation, index) => {
      const points = toViewOutline(annotation, this.viewport);
      if (points) {
        shapes.push({ index, label: annotation.label, type: annotation.type, points });
      }
    });
    return shapes;
  }

  /** The stroke in progress, in view space. */
  draftShape(): { tool: DrawingTool; points: Point[] } | null {
    if (this.drawing.phase !== 'drawing') return null;
    return { tool: this.drawing.tool, points: this.drawing.points };
  }

  save(): Promise<SaveReport> {
    return this.store.getState().save(this.repository);
  }

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose() {
    this.resizeDebouncer.cancel();
    this.listeners.clear();
  }

  private commit(tool: DrawingTool, viewPoints: Point[]): CommitResult {
    if (!this.image) return { status: 'none' };
    const { id, size } = this.image;
    const originals: Point[] = [];
    for (const point of viewPoints) {
      const original = this.viewport.viewToOriginal(point);
      if (!original) {
        return { status: 'rejected', reason: '表示領域が未確定のため描画できません' };
      }
      originals.push(clampToImage(original, size));
    }
    if (tool === 'freehand' && originals.length < 2) {
      return { status: 'rejected', reason: 'フリーハンドには2点以上が必要です' };
    }

    const coordinates = originals.map(toOriginalPoint);
    const annotation: Annotation = {
      label: this.currentLabel,
      type: tool,
      coordinates_original: tool === 'rectangle' ? normalizeRectangle(coordinates[0], coordinates[1]) : coordinates,
    };
    const problem = validateAnnotation(annotation);
    if (problem) {
      return { status: 'rejected', reason: problem.message };
    }
    if (!this.store.getState().append(id, annotation, size)) {
      return { status: 'rejected', reason: 'アノテーションを追加できませんでした' };
    }
    return { status: 'committed', index: this.store.getState().list(id).length - 1, annotation };
  }

  private dispatch(event: DrawingEvent) {
    const next = drawingReducer(this.drawing, event);
    if (next !== this.drawing) {
      this.drawing = next;
      this.notify();
    }
  }

  private changed(didChange: boolean) {
    if (didChange) {
      this.notify();
    }
    return didChange;
  }

  private notify() {
    this.listeners.forEach((listener) => listener());
  }
}
