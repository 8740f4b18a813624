import type { CellValue, LayoutDecision } from '../../types/workbook';
import { cellAt, isBlankCell, looksLikeNameToken } from './cells';

function sampleNameRows(rows: readonly CellValue[][], sampleSize: number): CellValue[][] {
  const sample: CellValue[][] = [];
  for (const row of rows) {
    if (sample.length >= sampleSize) break;
    if (isBlankCell(cellAt(row, 0))) break;
    sample.push(row);
  }
  return sample;
}

/**
 * Decides whether names occupy column A alone or columns A and B.
 * Two columns are assumed unless column B of the sampled rows is consistently
 * empty or non-alphabetic.
 */
export function detectLayout(rows: readonly CellValue[][], sampleSize = 5): LayoutDecision {
  const sample = sampleNameRows(rows, sampleSize);

  if (sample.length === 0) {
    return {
      layout: 'one_column',
      nameWidth: 1,
      firstDataColumn: 1,
      sampledRows: 0,
      nameLikeRows: 0,
      confidence: 0,
    };
  }

  const nameLikeRows = sample.filter((row) => looksLikeNameToken(cellAt(row, 1))).length;

  if (nameLikeRows === 0) {
    return {
      layout: 'one_column',
      nameWidth: 1,
      firstDataColumn: 1,
      sampledRows: sample.length,
      nameLikeRows,
      confidence: 1,
    };
  }

  return {
    layout: 'two_columns',
    nameWidth: 2,
    firstDataColumn: 2,
    sampledRows: sample.length,
    nameLikeRows,
    confidence: Math.round((nameLikeRows / sample.length) * 100) / 100,
  };
}

export function isAmbiguousLayout(decision: LayoutDecision): boolean {
  return decision.sampledRows > 0 && decision.confidence < 1;
}

export function namePartsAt(row: readonly CellValue[], decision: LayoutDecision): CellValue[] {
  const parts: CellValue[] = [];
  for (let c = 0; c < decision.nameWidth; c++) {
    parts.push(cellAt(row, c));
  }
  return parts;
}
