import { useEffect, useMemo, useRef, useState } from 'react';
import { DEFAULT_CLASS_TABLE, type BatchReport, type ClassTable, type ImageSummary } from '@annomask/shared';
import { createApiClient, createHttpRepository, exportMasks, fetchClassTable, fetchImages, importMasks } from './lib/api';
import { createLabelColors } from './lib/labelColors';
import { useAnnotationStore } from './hooks/useAnnotationStore';
import { useSession } from './hooks/useSession';
import CanvasStage, { type CanvasMode } from './components/CanvasStage';
import ImagePager from './components/ImagePager';
import LabelPalette from './components/LabelPalette';
import AnnotationList from './components/AnnotationList';

const client = createApiClient();
const repository = createHttpRepository(client);

const MODES: { mode: CanvasMode; name: string }[] = [
  { mode: 'freehand', name: 'フリーハンド' },
  { mode: 'line', name: '線' },
  { mode: 'rectangle', name: '矩形' },
  { mode: 'pan', name: 'パン' },
  { mode: 'erase', name: '消しゴム' },
];

const describeBatch = (title: string, report: BatchReport) =>
  `${title}: 成功 ${report.succeeded} / スキップ ${report.skipped} / 失敗 ${report.failed}`;

function App() {
  const { session } = useSession({ repository, label: 'object' });
  const isDirty = useAnnotationStore(session.store, (state) => state.isDirty);
  const [images, setImages] = useState<ImageSummary[]>([]);
  const [classTable, setClassTable] = useState<ClassTable>(DEFAULT_CLASS_TABLE);
  const [currentIndex, setCurrentIndex] = useState(0);
  const [mode, setMode] = useState<CanvasMode>(session.tool);
  const [label, setLabel] = useState(session.label);
  const [loading, setLoading] = useState(true);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [toast, setToast] = useState<string | null>(null);
  const toastTimer = useRef<number | null>(null);

  const colorOf = useMemo(() => createLabelColors(classTable), [classTable]);

  const showToast = (message: string) => {
    setToast(message);
    if (toastTimer.current) {
      window.clearTimeout(toastTimer.current);
    }
    toastTimer.current = window.setTimeout(() => setToast(null), 3000);
  };

  const openImage = async (list: ImageSummary[], index: number) => {
    const image = list[index];
    if (!image) return;
    setCurrentIndex(index);
    try {
      await session.openImage(image);
    } catch (err) {
      console.error(err);
      // 注釈が読めなくても空の状態で開く
      showToast('アノテーションの読み込みに失敗しました');
    }
  };

  useEffect(() => {
    let mounted = true;
    const bootstrap = async () => {
      try {
        const [items, table] = await Promise.all([fetchImages(client), fetchClassTable(client)]);
        if (!mounted) return;
        setImages(items);
        setClassTable(table);
        const first = table.foreground()[0];
        if (first) {
          session.setLabel(first.label);
          setLabel(first.label);
        }
        await openImage(items, 0);
      } catch (err) {
        console.error(err);
        setError('画像リストの取得に失敗しました');
      } finally {
        if (mounted) setLoading(false);
      }
    };
    void bootstrap();
    return () => {
      mounted = false;
    };
  }, [session]);

  useEffect(() => {
    if (!isDirty) return;
    const handler = (ev: BeforeUnloadEvent) => {
      ev.preventDefault();
    };
    window.addEventListener('beforeunload', handler);
    return () => window.removeEventListener('beforeunload', handler);
  }, [isDirty]);

  useEffect(() => {
    return () => {
      if (toastTimer.current) {
        window.clearTimeout(toastTimer.current);
      }
    };
  }, []);

  const changeMode = (next: CanvasMode) => {
    setMode(next);
    if (next !== 'pan' && next !== 'erase') {
      session.setTool(next);
    } else {
      session.pointerCancel();
    }
  };

  const changeLabel = (next: string) => {
    session.setLabel(next);
    setLabel(next);
  };

  const save = async () => {
    const report = await session.save();
    if (report.failed > 0) {
      showToast(`保存に失敗しました (${report.failed} 件)`);
    } else {
      showToast('保存しました');
    }
  };

  const runBatch = async (title: string, task: () => Promise<BatchReport>) => {
    setBusy(true);
    try {
      if (session.store.getState().isDirty) {
        await save();
      }
      showToast(describeBatch(title, await task()));
    } catch (err) {
      console.error(err);
      showToast(`${title}に失敗しました`);
    } finally {
      setBusy(false);
    }
  };

  if (loading) {
    return <div className="app-shell">読み込み中...</div>;
  }

  if (error) {
    return <div className="app-shell">{error}</div>;
  }

  const currentImage = images[currentIndex];
  if (!currentImage) {
    return <div className="app-shell">画像がありません</div>;
  }

  return (
    <div className="app-shell">
      <div className="toolbar" role="toolbar">
        <div className="toolbar-row">
          <div className="toolbar-group">
            <span>
              {currentImage.name} ({currentImage.width}x{currentImage.height}){isDirty ? ' *' : ''}
            </span>
          </div>
          <div className="toolbar-group pager-group">
            <ImagePager
              position={currentIndex}
              total={images.length}
              onPrev={() => void openImage(images, currentIndex - 1)}
              onNext={() => void openImage(images, currentIndex + 1)}
              onJump={(index) => void openImage(images, index)}
            />
          </div>
        </div>
        <div className="toolbar-row wrap">
          <div className="toolbar-group">
            <LabelPalette
              classes={classTable.foreground()}
              selectedLabel={label}
              colorOf={colorOf}
              onLabelChange={changeLabel}
            />
          </div>
          <div className="toolbar-group">
            {MODES.map(({ mode: option, name }) => (
              <button
                key={option}
                className={`control-button ${mode === option ? 'active' : ''}`}
                onClick={() => changeMode(option)}
              >
                {name}
              </button>
            ))}
          </div>
          <div className="toolbar-group">
            <button className="control-button" onClick={() => session.zoomBy(1)}>
              拡大
            </button>
            <button className="control-button" onClick={() => session.zoomBy(-1)}>
              縮小
            </button>
            <button className="control-button" onClick={() => session.resetView()}>
              ズームリセット
            </button>
            <button className="control-button" onClick={() => session.clearAnnotations()}>
              全消去
            </button>
            <button className="control-button" onClick={() => void save()} disabled={!isDirty}>
              保存
            </button>
            <button
              className="control-button"
              disabled={busy}
              onClick={() => void runBatch('マスク出力', () => exportMasks(client))}
            >
              マスク出力
            </button>
            <button
              className="control-button"
              disabled={busy}
              onClick={() => void runBatch('マスク取込', () => importMasks(client))}
            >
              マスク取込
            </button>
          </div>
        </div>
      </div>
      <div className="workspace">
        <div className="canvas-container">
          <CanvasStage
            session={session}
            mode={mode}
            colorOf={colorOf}
            onShapeRejected={showToast}
            onShapeDeleted={() => showToast('図形を削除しました')}
          />
          {toast && <div className="toast">{toast}</div>}
        </div>
        <div className="info-panel">
          <AnnotationList
            annotations={session.annotations()}
            colorOf={colorOf}
            onDelete={(index) => {
              if (session.deleteAnnotation(index)) {
                showToast('図形を削除しました');
              }
            }}
          />
        </div>
      </div>
    </div>
  );
}

export default App;
