/** 1-based page text from the jump box -> image index, or null when out of range. */
export const parseJumpTarget = (text: string, total: number): number | null => {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const position = Number(trimmed);
  return position >= 1 && position <= total ? position - 1 : null;
};
