import { useCallback, useEffect, useRef, useState } from 'react';
import { Stage, Layer as KonvaLayer, Line, Image as KonvaImage } from 'react-konva';
import type Konva from 'konva';
import type { Point } from '@annomask/shared';
import { imageUrl } from '../lib/api';
import type { DrawingTool } from '../lib/drawing';
import type { AnnotationSession } from '../lib/session';
import { ZOOM_WHEEL_FACTOR } from '../lib/viewport';

export type CanvasMode = DrawingTool | 'pan' | 'erase';

interface CanvasStageProps {
  session: AnnotationSession;
  mode: CanvasMode;
  colorOf: (label: string) => string;
  onShapeRejected?: (reason: string) => void;
  onShapeDeleted?: (index: number) => void;
}

const flatten = (points: Point[]) => points.flatMap((pt) => [pt.x, pt.y]);

const CanvasStage = ({ session, mode, colorOf, onShapeRejected, onShapeDeleted }: CanvasStageProps) => {
  const wrapperRef = useRef<HTMLDivElement | null>(null);
  const stageRef = useRef<Konva.Stage>(null);
  const panAnchor = useRef<Point | null>(null);
  const [containerSize, setContainerSize] = useState({ width: 0, height: 0 });
  const [imageNode, setImageNode] = useState<HTMLImageElement | null>(null);
  const imageId = session.imageId;

  useEffect(() => {
    if (!wrapperRef.current) return;
    const observer = new ResizeObserver((entries) => {
      const entry = entries[0];
      if (!entry) return;
      const { width, height } = entry.contentRect;
      setContainerSize({ width, height });
      session.notifyCanvasResize({ width, height });
    });
    observer.observe(wrapperRef.current);
    return () => observer.disconnect();
  }, [session]);

  useEffect(() => {
    setImageNode(null);
    if (!imageId) return;
    const img = new window.Image();
    img.crossOrigin = 'anonymous';
    img.src = imageUrl(imageId);
    img.onload = () => setImageNode(img);
    img.onerror = () => console.error('image load failed:', img.src);
  }, [imageId]);

  const pointer = () => stageRef.current?.getPointerPosition() ?? null;

  const handlePointerDown = (evt: Konva.KonvaEventObject<PointerEvent>) => {
    evt.evt.preventDefault();
    const pos = pointer();
    if (!pos) return;
    if (mode === 'pan') {
      panAnchor.current = pos;
    } else if (mode === 'erase') {
      const index = session.hitTest(pos);
      if (index !== null && session.deleteAnnotation(index)) {
        onShapeDeleted?.(index);
      }
    } else {
      session.pointerDown(pos);
    }
  };

  const handlePointerMove = () => {
    const pos = pointer();
    if (!pos) return;
    if (panAnchor.current) {
      session.panBy({ x: pos.x - panAnchor.current.x, y: pos.y - panAnchor.current.y });
      panAnchor.current = pos;
    } else {
      session.pointerMove(pos);
    }
  };

  const handlePointerUp = () => {
    panAnchor.current = null;
    const result = session.pointerUp(pointer() ?? undefined);
    if (result.status === 'rejected') {
      onShapeRejected?.(result.reason);
    }
  };

  const handlePointerCancel = () => {
    panAnchor.current = null;
    session.pointerCancel();
  };

  const handleWheel = (e: Konva.KonvaEventObject<WheelEvent>) => {
    e.evt.preventDefault();
    const pos = pointer();
    if (!pos) return;
    session.zoomAt(e.evt.deltaY > 0 ? 1 / ZOOM_WHEEL_FACTOR : ZOOM_WHEEL_FACTOR, pos);
  };

  const handleKey = useCallback(
    (ev: KeyboardEvent) => {
      if (ev.key === 'Escape') {
        session.pointerCancel();
      }
      if ((ev.ctrlKey || ev.metaKey) && ev.key === '0') {
        session.resetView();
      }
    },
    [session]
  );

  useEffect(() => {
    window.addEventListener('keydown', handleKey);
    return () => window.removeEventListener('keydown', handleKey);
  }, [handleKey]);

  if (!containerSize.width || !containerSize.height) {
    return <div className="stage-wrapper" ref={wrapperRef} />;
  }

  const frame = session.viewport.frame();
  const draft = session.draftShape();

  return (
    <div className="stage-wrapper" ref={wrapperRef}>
      <Stage
        ref={stageRef}
        width={containerSize.width}
        height={containerSize.height}
        onPointerDown={handlePointerDown}
        onPointerMove={handlePointerMove}
        onPointerUp={handlePointerUp}
        onPointerCancel={handlePointerCancel}
        onWheel={handleWheel}
        style={{ touchAction: 'none', background: '#000', cursor: mode === 'pan' ? 'grab' : 'crosshair' }}
      >
        <KonvaLayer listening={false}>
          {imageNode && frame && (
            <KonvaImage
              image={imageNode}
              crop={{
                x: frame.crop.x1,
                y: frame.crop.y1,
                width: frame.crop.x2 - frame.crop.x1,
                height: frame.crop.y2 - frame.crop.y1,
              }}
              x={frame.display.x}
              y={frame.display.y}
              width={frame.display.width}
              height={frame.display.height}
            />
          )}
        </KonvaLayer>
        <KonvaLayer listening={false}>
          {session.renderAnnotations().map((shape) => (
            <Line
              key={`${shape.index}-${shape.label}`}
              points={flatten(shape.points)}
              stroke={colorOf(shape.label)}
              strokeWidth={shape.type === 'rectangle' ? 2 : 3}
              lineCap="round"
              lineJoin="round"
              fill={shape.type === 'rectangle' ? `${colorOf(shape.label)}22` : undefined}
              closed={shape.type === 'rectangle'}
            />
          ))}
          {draft && (
            <Line
              points={flatten(
                draft.tool === 'rectangle'
                  ? [
                      draft.points[0],
                      { x: draft.points[1].x, y: draft.points[0].y },
                      draft.points[1],
                      { x: draft.points[0].x, y: draft.points[1].y },
                    ]
                  : draft.points
              )}
              stroke={colorOf(session.label)}
              strokeWidth={3}
              dash={[10, 6]}
              closed={draft.tool === 'rectangle'}
            />
          )}
        </KonvaLayer>
      </Stage>
    </div>
  );
};

export default CanvasStage;
