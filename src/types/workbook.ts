export type CellValue = string | number | boolean | Date | null;

export interface SheetData {
  name: string;
  rows: CellValue[][];
}

export interface OutputCell {
  value: CellValue;
  highlight: boolean;
}

export interface OutputSheet {
  name: string;
  rows: OutputCell[][];
  columnWidth: number;
}

export type ColumnLayout = 'one_column' | 'two_columns';

export interface LayoutDecision {
  layout: ColumnLayout;
  nameWidth: 1 | 2;
  firstDataColumn: number;
  sampledRows: number;
  nameLikeRows: number;
  confidence: number;
}
