import type { CellValue } from '../../types/workbook';

const HAS_LETTER = /\p{L}/u;
const NUMERIC = /^[-+]?\d+(?:[.,]\d+)?$/;

export function isBlankCell(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value).trim();
}

/** A cell that could hold a name token: text with at least one letter that is not a number. */
export function looksLikeNameToken(value: CellValue | undefined): boolean {
  if (typeof value !== 'string') return false;
  const text = value.trim();
  if (!text || NUMERIC.test(text)) return false;
  return HAS_LETTER.test(text);
}

export function cellAt(row: readonly CellValue[] | undefined, column: number): CellValue {
  if (!row || column >= row.length) return null;
  return row[column] ?? null;
}
