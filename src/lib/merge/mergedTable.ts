import type { CellValue } from '../../types/workbook';
import type { Confidence, MergedCell } from '../../types/fusion';

function cellKey(rosterIndex: number, sheetId: number, columnOffset: number): string {
  return `${rosterIndex}:${sheetId}:${columnOffset}`;
}

/** Score cells addressed by (student, sheet, column offset within the sheet's block). */
export class MergedTable {
  private readonly byKey = new Map<string, MergedCell>();

  constructor(readonly rowCount: number) {}

  set(rosterIndex: number, sheetId: number, columnOffset: number, value: CellValue, confidence: Confidence): void {
    if (rosterIndex < 0 || rosterIndex >= this.rowCount) {
      throw new RangeError(`Roster index ${rosterIndex} is outside the table (${this.rowCount} rows)`);
    }
    const key = cellKey(rosterIndex, sheetId, columnOffset);
    if (this.byKey.has(key)) {
      throw new Error(`Cell ${key} is already set`);
    }
    this.byKey.set(key, { rosterIndex, sheetId, columnOffset, value, confidence });
  }

  get(rosterIndex: number, sheetId: number, columnOffset: number): MergedCell | undefined {
    return this.byKey.get(cellKey(rosterIndex, sheetId, columnOffset));
  }

  row(rosterIndex: number): MergedCell[] {
    return this.cells.filter((c) => c.rosterIndex === rosterIndex);
  }

  confidenceOf(rosterIndex: number, sheetId: number): Confidence | null {
    return this.row(rosterIndex).find((c) => c.sheetId === sheetId)?.confidence ?? null;
  }

  /** All cells, ordered by student, then sheet, then column. */
  get cells(): MergedCell[] {
    return [...this.byKey.values()].sort(
      (a, b) => a.rosterIndex - b.rosterIndex || a.sheetId - b.sheetId || a.columnOffset - b.columnOffset,
    );
  }
}
