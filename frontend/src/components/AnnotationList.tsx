import type { Annotation } from '@annomask/shared';

interface AnnotationListProps {
  annotations: Annotation[];
  colorOf: (label: string) => string;
  onDelete: (index: number) => void;
}

const TYPE_NAMES: Record<Annotation['type'], string> = {
  rectangle: '矩形',
  line: '線',
  freehand: 'フリーハンド',
};

const AnnotationList = ({ annotations, colorOf, onDelete }: AnnotationListProps) => {
  return (
    <div className="shape-list">
      <h3>アノテーション一覧</h3>
      {annotations.length === 0 && <p style={{ color: '#666' }}>まだありません</p>}
      {annotations.map((annotation, index) => (
        <div key={index} className="shape-row">
          <span>#{index + 1}</span>
          <span style={{ display: 'inline-flex', alignItems: 'center', gap: 4 }}>
            <span style={{ width: 12, height: 12, borderRadius: '50%', background: colorOf(annotation.label) }} />
            {annotation.label}
          </span>
          <span style={{ fontSize: 12, color: '#666' }}>
            {TYPE_NAMES[annotation.type]} / {annotation.coordinates_original.length} 点
          </span>
          <button className="control-button" onClick={() => onDelete(index)}>
            削除
          </button>
        </div>
      ))}
    </div>
  );
};

export default AnnotationList;
