import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ImageSummary } from '@annomask/shared';
import { createMemoryRepository } from '../test/memoryRepository';
import { AnnotationSession } from './session';

// 400x300 image on an 800x600 canvas: original = view / 2
const image: ImageSummary = { id: 'scan.png', name: 'scan.png', width: 400, height: 300 };
const canvas = { width: 800, height: 600 };

const openSession = async (initial = {}) => {
  const { records, repository } = createMemoryRepository(initial);
  const session = new AnnotationSession({ repository, label: 'object' });
  await session.openImage(image, canvas);
  return { session, records };
};

describe('AnnotationSession', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('commits freehand strokes in original coordinates', async () => {
    const { session } = await openSession();
    session.setTool('freehand');

    session.pointerDown({ x: 10, y: 10 });
    session.pointerMove({ x: 20, y: 20 });
    session.pointerMove({ x: 20.5, y: 20 });
    expect(session.draftShape()?.points).toHaveLength(2);
    const result = session.pointerUp({ x: 40, y: 40 });

    expect(result).toEqual({
      status: 'committed',
      index: 0,
      annotation: {
        label: 'object',
        type: 'freehand',
        coordinates_original: [
          [5, 5],
          [10, 10],
          [20, 20],
        ],
      },
    });
    expect(session.draftShape()).toBeNull();
  });

  it('normalizes rectangles dragged in any direction', async () => {
    const { session } = await openSession();
    session.setTool('rectangle');
    session.setLabel('person');

    session.pointerDown({ x: 100, y: 80 });
    session.pointerMove({ x: 20, y: 10 });
    session.pointerUp();

    expect(session.annotations()).toEqual([
      { label: 'person', type: 'rectangle', coordinates_original: [[10, 5], [50, 40]] },
    ]);
  });

  it('clamps strokes to the image', async () => {
    const { session } = await openSession();
    session.setTool('line');

    session.pointerDown({ x: -100, y: 10 });
    session.pointerUp({ x: 900, y: 10 });

    expect(session.annotations()[0].coordinates_original).toEqual([
      [0, 5],
      [400, 5],
    ]);
  });

  it('rejects clicks that do not make a shape', async () => {
    const { session } = await openSession();

    session.setTool('freehand');
    session.pointerDown({ x: 10, y: 10 });
    expect(session.pointerUp({ x: 10, y: 10 })).toMatchObject({ status: 'rejected' });

    session.setTool('rectangle');
    session.pointerDown({ x: 10, y: 10 });
    expect(session.pointerUp({ x: 10, y: 10 })).toMatchObject({ status: 'rejected' });

    expect(session.annotations()).toEqual([]);
    expect(session.store.getState().isDirty).toBe(false);
  });

  it('abandons a stroke on cancel', async () => {
    const { session } = await openSession();
    session.pointerDown({ x: 10, y: 10 });
    session.pointerMove({ x: 30, y: 30 });

    session.pointerCancel();

    expect(session.pointerUp({ x: 50, y: 50 })).toEqual({ status: 'none' });
    expect(session.annotations()).toEqual([]);
  });

  it('renders, hit-tests and deletes annotations in view space', async () => {
    const { session } = await openSession({
      'scan.png': {
        annotations: [{ label: 'object', type: 'rectangle', coordinates_original: [[10, 5], [50, 40]] }],
        original_size: [400, 300],
      },
    });

    expect(session.renderAnnotations()).toEqual([
      {
        index: 0,
        label: 'object',
        type: 'rectangle',
        points: [
          { x: 20, y: 10 },
          { x: 100, y: 10 },
          { x: 100, y: 80 },
          { x: 20, y: 80 },
          { x: 20, y: 10 },
        ],
      },
    ]);
    expect(session.hitTest({ x: 50, y: 50 })).toBe(0);
    expect(session.hitTest({ x: 500, y: 500 })).toBeNull();

    expect(session.deleteAnnotation(0)).toBe(true);
    expect(session.deleteAnnotation(0)).toBe(false);
  });

  it('removes the stored record after clearing and saving', async () => {
    const { session, records } = await openSession({
      'scan.png': {
        annotations: [{ label: 'object', type: 'rectangle', coordinates_original: [[10, 5], [50, 40]] }],
        original_size: [400, 300],
      },
    });

    session.clearAnnotations();
    const report = await session.save();

    expect(report).toMatchObject({ saved: 0, deleted: 1, failed: 0 });
    expect(records.has('scan.png')).toBe(false);
  });

  it('notifies subscribers after view changes until unsubscribed', async () => {
    const { session } = await openSession();
    const listener = vi.fn();
    const unsubscribe = session.subscribe(listener);

    expect(session.zoomBy(1)).toBe(true);
    expect(session.panBy({ x: -10, y: 0 })).toBe(true);
    expect(session.zoomAt(1 + 1e-9)).toBe(false);
    expect(listener).toHaveBeenCalledTimes(2);

    unsubscribe();
    session.resetView();
    expect(listener).toHaveBeenCalledTimes(2);
    expect(session.viewport.state?.zoomLevel).toBe(1);
  });

  it('coalesces canvas resizes', async () => {
    vi.useFakeTimers();
    const { session } = await openSession();
    const listener = vi.fn();
    session.subscribe(listener);

    session.notifyCanvasResize({ width: 900, height: 600 });
    session.notifyCanvasResize({ width: 1000, height: 700 });
    session.notifyCanvasResize({ width: 1200, height: 900 });
    expect(session.viewport.canvas).toEqual(canvas);

    vi.advanceTimersByTime(300);

    expect(session.viewport.canvas).toEqual({ width: 1200, height: 900 });
    expect(session.viewport.state?.baseScale).toBe(3);
    expect(listener).toHaveBeenCalledTimes(1);
    session.dispose();
  });

  it('does nothing with pointers while no image is open', async () => {
    const { session } = await openSession();
    session.closeImage();

    session.pointerDown({ x: 10, y: 10 });

    expect(session.isDrawing).toBe(false);
    expect(session.annotations()).toEqual([]);
    expect(session.imageId).toBeNull();
  });
});
