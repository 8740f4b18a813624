import type { CellValue, OutputCell, OutputSheet } from '../../types/workbook';
import type { SheetBlock } from '../../types/fusion';
import type { FusionConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { needsReview } from '../matching/confidence';
import { assignmentIndex } from '../merge/mergeEngine';
import type { MergeResult } from '../merge/mergeEngine';

const EMPTY: OutputCell = { value: null, highlight: false };

/** First column of each sheet's block; column 0 holds the roster names. */
export function blockPositions(blocks: readonly SheetBlock[]): number[] {
  const positions: number[] = [];
  let pos = 1;
  for (const block of blocks) {
    positions.push(pos);
    pos += block.scoreColumns + 1;
  }
  return positions;
}

function totalColumns(blocks: readonly SheetBlock[]): number {
  return blocks.reduce((sum, b) => sum + b.scoreColumns + 1, 1);
}

function blankRow(width: number): OutputCell[] {
  return Array.from({ length: width }, () => ({ ...EMPTY }));
}

function writeRun(row: OutputCell[], start: number, values: readonly CellValue[], highlight: boolean): void {
  values.forEach((value, k) => {
    row[start + k] = { value, highlight };
  });
}

/**
 * Lays out the merged table: one row per roster student, then, if anything
 * stayed unmatched, a blank row, a notice, and the unmatched rows under their
 * sheet's block.
 */
export function composeFusionSheet(result: MergeResult, config: FusionConfig = DEFAULT_CONFIG): OutputSheet {
  const width = totalColumns(result.blocks);
  const positions = blockPositions(result.blocks);
  const assignments = assignmentIndex(result);
  const rows: OutputCell[][] = [];

  for (const student of result.students) {
    const row = blankRow(width);
    row[0] = { value: student.displayName, highlight: false };

    result.blocks.forEach((block, b) => {
      const assignment = assignments.get(`${student.rosterIndex}:${block.sheetId}`);
      if (!assignment) return;
      const highlight = needsReview(assignment.match);
      const scores = result.table.row(student.rosterIndex).filter((c) => c.sheetId === block.sheetId);
      row[positions[b]] = { value: assignment.entry.displayName, highlight };
      for (const cell of scores) {
        row[positions[b] + 1 + cell.columnOffset] = { value: cell.value, highlight };
      }
    });

    rows.push(row);
  }

  if (result.unmatched.length > 0) {
    rows.push(blankRow(width));
    const noticeRow = rows.length;
    const depth = new Map<number, number>();

    for (const item of result.unmatched) {
      const b = result.blocks.findIndex((blk) => blk.sheetId === item.sheetId);
      if (b < 0) continue;
      const offset = depth.get(item.sheetId) ?? 0;
      depth.set(item.sheetId, offset + 1);

      const r = noticeRow + offset;
      while (rows.length <= r) rows.push(blankRow(width));
      writeRun(rows[r], positions[b], [item.entry.displayName, ...item.entry.scores], true);
    }

    if (rows.length === noticeRow) rows.push(blankRow(width));
    rows[noticeRow][0] = { value: config.unmatchedNotice, highlight: true };
  }

  return { name: config.outputSheetName, rows, columnWidth: config.columnWidth };
}
