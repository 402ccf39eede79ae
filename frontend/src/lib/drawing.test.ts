import { describe, expect, it } from 'vitest';
import { drawingReducer, IDLE, type DrawingState } from './drawing';

describe('drawingReducer', () => {
  it('collects freehand points spaced at least the minimum distance apart', () => {
    let state: DrawingState = drawingReducer(IDLE, { type: 'press', tool: 'freehand', point: { x: 0, y: 0 } });
    state = drawingReducer(state, { type: 'drag', point: { x: 1, y: 1 } });
    state = drawingReducer(state, { type: 'drag', point: { x: 3, y: 0 } });
    state = drawingReducer(state, { type: 'release', point: { x: 3, y: 1 } });

    expect(state).toEqual({
      phase: 'committed',
      tool: 'freehand',
      points: [
        { x: 0, y: 0 },
        { x: 3, y: 0 },
      ],
    });
  });

  it('keeps only the anchor and the latest point for two-point tools', () => {
    let state: DrawingState = drawingReducer(IDLE, { type: 'press', tool: 'rectangle', point: { x: 5, y: 5 } });
    expect(state).toEqual({ phase: 'drawing', tool: 'rectangle', points: [{ x: 5, y: 5 }, { x: 5, y: 5 }] });

    state = drawingReducer(state, { type: 'drag', point: { x: 9, y: 2 } });
    state = drawingReducer(state, { type: 'drag', point: { x: 12, y: 20 } });
    state = drawingReducer(state, { type: 'release' });

    expect(state).toEqual({ phase: 'committed', tool: 'rectangle', points: [{ x: 5, y: 5 }, { x: 12, y: 20 }] });
  });

  it('ignores drags and releases outside a stroke', () => {
    expect(drawingReducer(IDLE, { type: 'drag', point: { x: 1, y: 1 } })).toBe(IDLE);
    expect(drawingReducer(IDLE, { type: 'release', point: { x: 1, y: 1 } })).toBe(IDLE);
  });

  it('does not restart a stroke in progress', () => {
    const drawing = drawingReducer(IDLE, { type: 'press', tool: 'line', point: { x: 0, y: 0 } });
    expect(drawingReducer(drawing, { type: 'press', tool: 'freehand', point: { x: 9, y: 9 } })).toBe(drawing);
  });

  it('returns to idle on cancel and reset', () => {
    const drawing = drawingReducer(IDLE, { type: 'press', tool: 'line', point: { x: 0, y: 0 } });
    expect(drawingReducer(drawing, { type: 'cancel' })).toEqual({ phase: 'idle' });
    const committed = drawingReducer(drawing, { type: 'release' });
    expect(drawingReducer(committed, { type: 'reset' })).toEqual({ phase: 'idle' });
  });
});
