import { InvalidClassTableError } from './errors';

export const BACKGROUND_ID = 0;
export const MAX_RASTER_VALUE = 255;

export type ClassEntry = {
  label: string;
  id: number;
};

/**
 * Bidirectional label <-> class id table. Id 0 is background.
 * Construction rejects duplicate labels and duplicate ids.
 */
export class ClassTable {
  private readonly idByLabel: Map<string, number>;
  private readonly labelById: Map<number, string>;

  private constructor(private readonly ordered: readonly ClassEntry[]) {
    this.idByLabel = new Map(ordered.map((entry) => [entry.label, entry.id]));
    this.labelById = new Map(ordered.map((entry) => [entry.id, entry.label]));
  }

  static fromEntries(entries: Iterable<readonly [string, number]>): ClassTable {
    const ordered: ClassEntry[] = [];
    const seenLabels = new Set<string>();
    const seenIds = new Set<number>();
    for (const [rawLabel, id] of entries) {
      const label = rawLabel.trim();
      if (!label) {
        throw new InvalidClassTableError('Class labels must not be empty');
      }
      if (!Number.isInteger(id) || id < 0) {
        throw new InvalidClassTableError(`Class id for '${label}' must be a non-negative integer, got ${id}`);
      }
      if (seenLabels.has(label)) {
        throw new InvalidClassTableError(`Duplicate class label '${label}'`);
      }
      if (seenIds.has(id)) {
        throw new InvalidClassTableError(`Duplicate class id ${id} (label '${label}')`);
      }
      seenLabels.add(label);
      seenIds.add(id);
      ordered.push({ label, id });
    }
    if (ordered.length === 0) {
      throw new InvalidClassTableError('Class table is empty');
    }
    return new ClassTable(ordered);
  }

  static fromRecord(record: Record<string, unknown>): ClassTable {
    return ClassTable.fromEntries(
      Object.entries(record).map(([label, id]): [string, number] => {
        if (typeof id !== 'number') {
          throw new InvalidClassTableError(`Class id for '${label}' must be a number`);
        }
        return [label, id];
      })
    );
  }

  /**
   * Parses `value, label` lines, as typed by whoever maps mask intensities
   * back to labels. Blank lines are ignored.
   */
  static parseValueTable(text: string): ClassTable {
    const entries: [string, number][] = [];
    text.split(/\r?\n/).forEach((line, index) => {
      if (!line.trim()) return;
      const parts = line.split(',').map((part) => part.trim());
      if (parts.length !== 2) {
        throw new InvalidClassTableError(`Invalid format on line ${index + 1}: '${line}'. Expected 'value, label'`);
      }
      const [valueText, label] = parts;
      if (!/^\d+$/.test(valueText)) {
        throw new InvalidClassTableError(`Invalid pixel value on line ${index + 1}: '${valueText}'`);
      }
      if (!label) {
        throw new InvalidClassTableError(`Empty label on line ${index + 1}`);
      }
      entries.push([label, Number(valueText)]);
    });
    return ClassTable.fromEntries(entries);
  }

  get size() {
    return this.ordered.length;
  }

  get maxId() {
    return Math.max(...this.ordered.map((entry) => entry.id));
  }

  idOf(label: string): number | undefined {
    return this.idByLabel.get(label);
  }

  labelOf(id: number): string | undefined {
    return this.labelById.get(id);
  }

  entries(): readonly ClassEntry[] {
    return this.ordered;
  }

  foreground(): ClassEntry[] {
    return this.ordered.filter((entry) => entry.id !== BACKGROUND_ID);
  }

  assertRasterCompatible() {
    const tooLarge = this.ordered.find((entry) => entry.id > MAX_RASTER_VALUE);
    if (tooLarge) {
      throw new InvalidClassTableError(
        `Class '${tooLarge.label}' has id ${tooLarge.id}; 8-bit rasters hold ids up to ${MAX_RASTER_VALUE}`
      );
    }
  }

  /** Intensity a class id is written with in a human-viewable mask. */
  visualValueOf(id: number): number {
    if (id === BACKGROUND_ID) return 0;
    const count = this.foreground().length;
    return Math.round((id * MAX_RASTER_VALUE) / count);
  }

  /**
   * Same labels, ids replaced by their visual intensities. Reading a visual
   * mask with this table recovers the labels; the raw table would not.
   */
  toVisualTable(): ClassTable {
    const entries = this.ordered.map(({ label, id }): [string, number] => {
      const value = this.visualValueOf(id);
      if (value > MAX_RASTER_VALUE) {
        throw new InvalidClassTableError(
          `Class '${label}' (id ${id}) scales past ${MAX_RASTER_VALUE}; visual masks need ids 1..${this.foreground().length}`
        );
      }
      return [label, value];
    });
    return ClassTable.fromEntries(entries);
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.ordered.map(({ label, id }) => [label, id]));
  }
}

export const DEFAULT_CLASS_TABLE = ClassTable.fromEntries([
  ['background', 0],
  ['lines', 1],
  ['object', 2],
  ['person', 3],
  ['vehicle', 4],
  ['animal', 5],
  ['marker', 6],
  ['path', 7],
]);
