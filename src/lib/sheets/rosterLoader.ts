import type { LayoutDecision, SheetData } from '../../types/workbook';
import type { MergeWarning, Student } from '../../types/fusion';
import type { FusionConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { EmptyRosterError } from '../errors';
import { displayNameOf, nameTokens } from '../names/normalize';
import { cellText, isBlankCell } from './cells';
import { detectLayout, isAmbiguousLayout, namePartsAt } from './layoutDetector';

export interface RosterLoadResult {
  students: Student[];
  layout: LayoutDecision;
  warnings: MergeWarning[];
}

function duplicateKeyWarnings(students: readonly Student[]): MergeWarning[] {
  const byKey = new Map<string, number[]>();
  for (const s of students) {
    const list = byKey.get(s.canonicalKey) ?? [];
    list.push(s.rosterIndex);
    byKey.set(s.canonicalKey, list);
  }
  const warnings: MergeWarning[] = [];
  for (const [canonicalKey, rosterIndices] of byKey) {
    if (rosterIndices.length > 1) {
      warnings.push({ kind: 'duplicate_roster_key', canonicalKey, rosterIndices });
    }
  }
  return warnings;
}

export function loadRoster(sheet: SheetData, config: FusionConfig = DEFAULT_CONFIG): RosterLoadResult {
  const layout = detectLayout(sheet.rows, config.layoutSampleRows);
  const students: Student[] = [];

  for (const row of sheet.rows) {
    const cells = namePartsAt(row, layout);
    if (cells.every((c) => isBlankCell(c))) break;

    const parts = cells.filter((c) => !isBlankCell(c)).map(cellText);
    const tokens = nameTokens(parts);
    students.push(
      Object.freeze({
        canonicalKey: tokens.join(' '),
        displayName: displayNameOf(parts),
        rosterIndex: students.length,
        tokens: Object.freeze(tokens),
      }),
    );
  }

  if (students.length === 0) {
    throw new EmptyRosterError(sheet.name);
  }

  const warnings = duplicateKeyWarnings(students);
  if (isAmbiguousLayout(layout)) {
    warnings.unshift({ kind: 'ambiguous_layout', sheetName: sheet.name, layout });
  }

  return { students, layout, warnings };
}
