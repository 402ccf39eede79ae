import { useEffect, useState } from 'react';
import { parseJumpTarget } from '../lib/pager';

interface ImagePagerProps {
  position: number;
  total: number;
  onPrev: () => void;
  onNext: () => void;
  onJump: (index: number) => void;
}

const ImagePager = ({ position, total, onPrev, onNext, onJump }: ImagePagerProps) => {
  const [draft, setDraft] = useState(String(position + 1));

  useEffect(() => {
    setDraft(String(position + 1));
  }, [position]);

  const jump = () => {
    const index = parseJumpTarget(draft, total);
    if (index === null) {
      setDraft(String(position + 1));
      return;
    }
    if (index !== position) onJump(index);
  };

  return (
    <div style={{ display: 'flex', gap: 8, alignItems: 'center' }}>
      <button className="control-button" onClick={onPrev} disabled={position <= 0}>
        前へ
      </button>
      <span>
        {total === 0 ? 0 : position + 1}/{total}
      </span>
      <button className="control-button" onClick={onNext} disabled={position >= total - 1}>
        次へ
      </button>
      <input
        type="number"
        min={1}
        max={total}
        value={draft}
        style={{ width: 64 }}
        aria-label="画像番号"
        onChange={(e) => setDraft(e.target.value)}
        onKeyDown={(e) => {
          if (e.key === 'Enter') jump();
        }}
      />
      <button className="control-button" onClick={jump} disabled={total === 0}>
        移動
      </button>
    </div>
  );
};

export default ImagePager;
