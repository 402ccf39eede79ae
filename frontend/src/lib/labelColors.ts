import type { ClassTable } from '@annomask/shared';

export const DEFAULT_PALETTE = ['#FF3B30', '#34C759', '#007AFF', '#FF9500', '#AF52DE', '#5AC8FA', '#FFCC00'];

const UNKNOWN_LABEL_COLOR = '#8E8E93';

/**
 * Assigns palette colours to the foreground classes in table order, cycling
 * when there are more classes than colours.
 */
export const createLabelColors = (table: ClassTable, palette: string[] = DEFAULT_PALETTE) => {
  const colors = new Map<string, string>();
  table.foreground().forEach((entry, index) => {
    colors.set(entry.label, palette[index % palette.length]);
  });
  return (label: string) => colors.get(label) ?? UNKNOWN_LABEL_COLOR;
};
