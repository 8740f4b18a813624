import type { FuzzyMethod, MergeWarning, NotFoundReason, Student } from '../../types/fusion';
import { needsReview } from '../matching/confidence';
import type { MergeResult } from './mergeEngine';

const METHOD_LABELS: Record<FuzzyMethod, string> = {
  token_subset: 'partial name',
  edit_distance: 'close spelling',
  shared_token: 'one shared name',
};

const REASON_LABELS: Record<NotFoundReason, string> = {
  empty_name: 'empty name',
  no_candidate: 'no matching student',
  already_matched: 'student already matched on this sheet',
};

export interface MergeSummary {
  students: number;
  sheets: number;
  highConfidence: number;
  lowConfidence: number;
  unmatched: number;
  warnings: number;
}

function nameOf(students: readonly Student[], rosterIndex: number): string {
  return students[rosterIndex]?.displayName ?? `#${rosterIndex + 1}`;
}

function rowLabel(students: readonly Student[], indices: readonly number[]): string {
  return indices.map((i) => `${nameOf(students, i)} (row ${i + 1})`).join(', ');
}

export function formatWarning(warning: MergeWarning, students: readonly Student[]): string {
  switch (warning.kind) {
    case 'duplicate_roster_key':
      return `Roster lists indistinguishable names: ${rowLabel(students, warning.rosterIndices)}`;
    case 'ambiguous_layout':
      return `Sheet '${warning.sheetName}': name columns unclear, assumed ${warning.layout.nameWidth} (${warning.layout.nameLikeRows}/${warning.layout.sampledRows} rows agree)`;
    case 'empty_sheet':
      return `Sheet '${warning.sheetName}': no rows to merge`;
    case 'ambiguous_match':
      return `Sheet '${warning.sheetName}': '${warning.sourceName}' matches ${warning.candidates.length} students, assigned to ${rowLabel(students, [warning.rosterIndex])}`;
    case 'low_confidence_match':
      return `Sheet '${warning.sheetName}': '${warning.sourceName}' assigned to ${nameOf(students, warning.rosterIndex)} by ${METHOD_LABELS[warning.method]}`;
    case 'unmatched_row':
      return `Sheet '${warning.sheetName}': '${warning.sourceName}' not merged (${REASON_LABELS[warning.reason]})`;
    case 'missing_student':
      return `Sheet '${warning.sheetName}': no score for ${nameOf(students, warning.rosterIndex)}`;
  }
}

export function formatWarnings(warnings: readonly MergeWarning[], students: readonly Student[]): string[] {
  return warnings.map((w) => formatWarning(w, students));
}

export function summarizeMerge(result: MergeResult): MergeSummary {
  const lowConfidence = result.assignments.filter((a) => needsReview(a.match)).length;
  return {
    students: result.students.length,
    sheets: result.blocks.length,
    highConfidence: result.assignments.length - lowConfidence,
    lowConfidence,
    unmatched: result.unmatched.length,
    warnings: result.warnings.length,
  };
}
