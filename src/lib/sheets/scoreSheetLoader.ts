import type { CellValue, LayoutDecision, SheetData } from '../../types/workbook';
import type { RawNameEntry } from '../../types/fusion';
import type { FusionConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { displayNameOf } from '../names/normalize';
import { cellText, isBlankCell } from './cells';
import { detectLayout, namePartsAt } from './layoutDetector';

export interface ScoreSheetLoadResult {
  entries: RawNameEntry[];
  layout: LayoutDecision;
  scoreColumns: number;
}

/** Scores run from `firstColumn` up to, not including, the first blank cell of the row. */
export function collectScores(row: readonly CellValue[], firstColumn: number): CellValue[] {
  const scores: CellValue[] = [];
  for (let c = firstColumn; c < row.length; c++) {
    const value = row[c];
    if (isBlankCell(value)) break;
    scores.push(value);
  }
  return scores;
}

export function loadScoreSheet(
  sheet: SheetData,
  sheetId: number,
  config: FusionConfig = DEFAULT_CONFIG,
): ScoreSheetLoadResult {
  const layout = detectLayout(sheet.rows, config.layoutSampleRows);
  const entries: RawNameEntry[] = [];
  let scoreColumns = 0;

  for (let rowIndex = 0; rowIndex < sheet.rows.length; rowIndex++) {
    const row = sheet.rows[rowIndex];
    const cells = namePartsAt(row, layout);
    if (cells.every((c) => isBlankCell(c))) break;

    const nameParts = cells.filter((c) => !isBlankCell(c)).map(cellText);
    const scores = collectScores(row, layout.firstDataColumn);
    scoreColumns = Math.max(scoreColumns, scores.length);

    entries.push({
      sheetId,
      rowIndex,
      nameParts,
      displayName: displayNameOf(nameParts),
      scores,
    });
  }

  return { entries, layout, scoreColumns };
}
