import path from 'node:path';
import * as ExcelJS from 'exceljs';
import type { CellValue, OutputSheet, SheetData } from '../../types/workbook';
import { WorkbookFormatError } from '../errors';

const SUPPORTED_EXTENSIONS = new Set(['.xlsx']);
const MAX_SHEET_NAME = 31;

/** A hyperlink whose text carries formatting is read back with rich text in place of a string. */
interface LinkedCellValue {
  text: ExcelJS.CellValue;
  hyperlink: string;
}

export function toCellValue(value: ExcelJS.CellValue | LinkedCellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map((r) => r.text).join('');
  if ('hyperlink' in value) return toCellValue(value.text);
  if ('error' in value) return null;
  return toCellValue(value.result ?? null);
}

export function outputPathFor(inputPath: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}_output${ext}`);
}

function worksheetRows(ws: ExcelJS.Worksheet): CellValue[][] {
  const rows: CellValue[][] = [];
  for (let r = 1; r <= ws.rowCount; r++) {
    const row = ws.getRow(r);
    const cells: CellValue[] = [];
    for (let c = 1; c <= row.cellCount; c++) {
      cells.push(toCellValue(row.getCell(c).value));
    }
    rows.push(cells);
  }
  return rows;
}

export class ExcelWorkbook {
  constructor(private readonly workbook: ExcelJS.Workbook) {}

  static async open(filePath: string): Promise<ExcelWorkbook> {
    const ext = path.extname(filePath).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.has(ext)) {
      throw new WorkbookFormatError(`File ${filePath} does not seem to be a .xlsx file`);
    }
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new WorkbookFormatError(`Cannot read workbook ${filePath}: ${msg}`);
    }
    return new ExcelWorkbook(workbook);
  }

  sheets(): SheetData[] {
    return this.workbook.worksheets.map((ws) => ({ name: ws.name, rows: worksheetRows(ws) }));
  }

  /** Picks `base`, or `base (2)`, `base (3)`... when a sheet already uses the name. */
  uniqueSheetName(base: string): string {
    const taken = new Set(this.workbook.worksheets.map((ws) => ws.name.toLowerCase()));
    let candidate = base.slice(0, MAX_SHEET_NAME);
    for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
      const suffix = ` (${n})`;
      candidate = `${base.slice(0, MAX_SHEET_NAME - suffix.length)}${suffix}`;
    }
    return candidate;
  }

  /** Adds the sheet after the existing ones, fills highlighted cells and makes it the active tab. */
  appendSheet(output: OutputSheet, highlightColor: string): ExcelJS.Worksheet {
    const ws = this.workbook.addWorksheet(this.uniqueSheetName(output.name));
    let width = 0;

    output.rows.forEach((row, r) => {
      width = Math.max(width, row.length);
      row.forEach((cell, c) => {
        if (cell.value === null && !cell.highlight) return;
        const target = ws.getCell(r + 1, c + 1);
        target.value = cell.value;
        if (cell.highlight) {
          target.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: highlightColor } };
        }
      });
    });

    for (let c = 1; c <= width; c++) {
      ws.getColumn(c).width = output.columnWidth;
    }

    this.workbook.views = [
      {
        x: 0,
        y: 0,
        width: 10000,
        height: 20000,
        firstSheet: 0,
        activeTab: this.workbook.worksheets.indexOf(ws),
        visibility: 'visible',
      },
    ];
    return ws;
  }

  async save(filePath: string): Promise<void> {
    await this.workbook.xlsx.writeFile(filePath);
  }
}
