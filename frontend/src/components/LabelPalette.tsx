import type { ClassEntry } from '@annomask/shared';

interface LabelPaletteProps {
  classes: ClassEntry[];
  selectedLabel: string;
  colorOf: (label: string) => string;
  onLabelChange: (label: string) => void;
}

const LabelPalette = ({ classes, selectedLabel, colorOf, onLabelChange }: LabelPaletteProps) => {
  return (
    <div className="palette" onPointerDown={(e) => e.stopPropagation()}>
      {classes.map(({ label, id }) => (
        <button
          key={label}
          className={label === selectedLabel ? 'active' : ''}
          title={`${label} (id ${id})`}
          onClick={() => onLabelChange(label)}
          onPointerDown={(e) => {
            if (e.pointerType === 'pen') {
              e.currentTarget.setPointerCapture(e.pointerId);
            }
          }}
          onPointerUp={(e) => {
            if (e.pointerType === 'pen') {
              e.currentTarget.releasePointerCapture(e.pointerId);
            }
          }}
        >
          <span style={{ background: colorOf(label) }} />
          {label}
        </button>
      ))}
    </div>
  );
};

export default LabelPalette;
