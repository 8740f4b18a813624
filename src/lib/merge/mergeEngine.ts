import type { LayoutDecision, SheetData } from '../../types/workbook';
import type {
  MergeWarning,
  SheetAssignment,
  SheetBlock,
  Student,
  UnmatchedEntry,
} from '../../types/fusion';
import type { FusionConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { WorkbookFormatError } from '../errors';
import { matchSheet } from '../matching/matcher';
import { isAmbiguousLayout } from '../sheets/layoutDetector';
import { loadRoster } from '../sheets/rosterLoader';
import { loadScoreSheet } from '../sheets/scoreSheetLoader';
import { MergedTable } from './mergedTable';

export interface MergeResult {
  rosterSheetName: string;
  rosterLayout: LayoutDecision;
  students: Student[];
  blocks: SheetBlock[];
  table: MergedTable;
  assignments: SheetAssignment[];
  unmatched: UnmatchedEntry[];
  warnings: MergeWarning[];
}

interface SheetMergeOutcome {
  block: SheetBlock;
  assignments: SheetAssignment[];
  unmatched: UnmatchedEntry[];
  warnings: MergeWarning[];
}

function mergeScoreSheet(
  sheet: SheetData,
  sheetId: number,
  students: readonly Student[],
  table: MergedTable,
  config: FusionConfig,
): SheetMergeOutcome {
  const { entries, layout, scoreColumns } = loadScoreSheet(sheet, sheetId, config);
  const block: SheetBlock = { sheetId, sheetName: sheet.name, scoreColumns, layout, rowCount: entries.length };
  const warnings: MergeWarning[] = [];
  const assignments: SheetAssignment[] = [];
  const unmatched: UnmatchedEntry[] = [];

  if (entries.length === 0) {
    warnings.push({ kind: 'empty_sheet', sheetName: sheet.name });
  } else if (isAmbiguousLayout(layout)) {
    warnings.push({ kind: 'ambiguous_layout', sheetName: sheet.name, layout });
  }

  for (const { entry, match } of matchSheet(entries, students, config)) {
    if (match.kind === 'not_found') {
      unmatched.push({ sheetId, entry, reason: match.reason });
      warnings.push({
        kind: 'unmatched_row',
        sheetName: sheet.name,
        sourceName: entry.displayName,
        reason: match.reason,
      });
      continue;
    }

    const { rosterIndex, confidence } = match;
    assignments.push({ rosterIndex, sheetId, entry, match });
    entry.scores.forEach((value, offset) => {
      table.set(rosterIndex, sheetId, offset, value, confidence);
    });

    if (match.kind === 'ambiguous') {
      warnings.push({
        kind: 'ambiguous_match',
        sheetName: sheet.name,
        sourceName: entry.displayName,
        rosterIndex: match.rosterIndex,
        candidates: match.candidates,
      });
    } else if (match.kind === 'fuzzy') {
      warnings.push({
        kind: 'low_confidence_match',
        sheetName: sheet.name,
        sourceName: entry.displayName,
        rosterIndex: match.rosterIndex,
        method: match.method,
      });
    }
  }

  if (entries.length > 0) {
    const matched = new Set(assignments.map((a) => a.rosterIndex));
    for (const s of students) {
      if (!matched.has(s.rosterIndex)) {
        warnings.push({ kind: 'missing_student', sheetName: sheet.name, rosterIndex: s.rosterIndex });
      }
    }
  }

  return { block, assignments, unmatched, warnings };
}

/**
 * Merges every score sheet into one table keyed by the roster on the first sheet.
 * Rows follow roster order; sheet blocks follow workbook order.
 */
export function mergeSheets(sheets: readonly SheetData[], config: FusionConfig = DEFAULT_CONFIG): MergeResult {
  if (sheets.length === 0) {
    throw new WorkbookFormatError('Workbook contains no sheet');
  }

  const [rosterSheet, ...scoreSheets] = sheets;
  const roster = loadRoster(rosterSheet, config);
  const table = new MergedTable(roster.students.length);

  const result: MergeResult = {
    rosterSheetName: rosterSheet.name,
    rosterLayout: roster.layout,
    students: roster.students,
    blocks: [],
    table,
    assignments: [],
    unmatched: [],
    warnings: [...roster.warnings],
  };

  scoreSheets.forEach((sheet, i) => {
    const outcome = mergeScoreSheet(sheet, i + 1, roster.students, table, config);
    result.blocks.push(outcome.block);
    result.assignments.push(...outcome.assignments);
    result.unmatched.push(...outcome.unmatched);
    result.warnings.push(...outcome.warnings);
  });

  return result;
}

export function assignmentIndex(result: MergeResult): Map<string, SheetAssignment> {
  return new Map(result.assignments.map((a) => [`${a.rosterIndex}:${a.sheetId}`, a]));
}
