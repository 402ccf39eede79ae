import type { AnnotationType, Point } from '@annomask/shared';

/** Freehand samples closer than this (view px) to the previous one are dropped. */
export const MIN_POINT_DISTANCE = 2;

export type DrawingTool = AnnotationType;

export type DrawingState =
  | { phase: 'idle' }
  | { phase: 'drawing'; tool: DrawingTool; points: Point[] }
  | { phase: 'committed'; tool: DrawingTool; points: Point[] };

export type DrawingEvent =
  | { type: 'press'; tool: DrawingTool; point: Point }
  | { type: 'drag'; point: Point }
  | { type: 'release'; point?: Point }
  | { type: 'cancel' }
  | { type: 'reset' };

export const IDLE: DrawingState = { phase: 'idle' };

const extend = (tool: DrawingTool, points: Point[], point: Point): Point[] => {
  if (tool !== 'freehand') {
    return [points[0], point];
  }
  const last = points[points.length - 1];
  if (Math.hypot(point.x - last.x, point.y - last.y) < MIN_POINT_DISTANCE) {
    return points;
  }
  return [...points, point];
};

/**
 * Press starts a stroke, drag extends it, release hands the points over as
 * `committed` for the caller to convert and store. Points are view space.
 */
export const drawingReducer = (state: DrawingState, event: DrawingEvent): DrawingState => {
  switch (event.type) {
    case 'press':
      if (state.phase === 'drawing') return state;
      return {
        phase: 'drawing',
        tool: event.tool,
        points: event.tool === 'freehand' ? [event.point] : [event.point, event.point],
      };
    case 'drag': {
      if (state.phase !== 'drawing') return state;
      const points = extend(state.tool, state.points, event.point);
      return points === state.points ? state : { ...state, points };
    }
    case 'release':
      if (state.phase !== 'drawing') return state;
      return {
        phase: 'committed',
        tool: state.tool,
        points: event.point ? extend(state.tool, state.points, event.point) : state.points,
      };
    case 'cancel':
    case 'reset':
      return IDLE;
  }
};
