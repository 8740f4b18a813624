import type { CellValue, LayoutDecision } from './workbook';

export type Confidence = 'high' | 'low';

export interface Student {
  readonly canonicalKey: string;
  readonly displayName: string;
  readonly rosterIndex: number;
  readonly tokens: readonly string[];
}

export interface RawNameEntry {
  sheetId: number;
  rowIndex: number;
  nameParts: string[];
  displayName: string;
  scores: CellValue[];
}

export type FuzzyMethod = 'token_subset' | 'edit_distance' | 'shared_token';

export type NotFoundReason = 'empty_name' | 'no_candidate' | 'already_matched';

export type MatchResult =
  | { kind: 'exact'; rosterIndex: number; confidence: 'high' }
  | { kind: 'normalized'; rosterIndex: number; confidence: 'high' }
  | { kind: 'ambiguous'; rosterIndex: number; confidence: 'low'; candidates: number[] }
  | {
      kind: 'fuzzy';
      rosterIndex: number;
      confidence: 'low';
      method: FuzzyMethod;
      distance: number;
      tied: number[];
    }
  | { kind: 'not_found'; reason: NotFoundReason };

export type ResolvedMatch = Exclude<MatchResult, { kind: 'not_found' }>;

export interface MergedCell {
  rosterIndex: number;
  sheetId: number;
  columnOffset: number;
  value: CellValue;
  confidence: Confidence;
}

export interface SheetAssignment {
  rosterIndex: number;
  sheetId: number;
  entry: RawNameEntry;
  match: ResolvedMatch;
}

export interface UnmatchedEntry {
  sheetId: number;
  entry: RawNameEntry;
  reason: NotFoundReason;
}

export interface SheetBlock {
  sheetId: number;
  sheetName: string;
  scoreColumns: number;
  layout: LayoutDecision;
  rowCount: number;
}

export type MergeWarning =
  | { kind: 'duplicate_roster_key'; canonicalKey: string; rosterIndices: number[] }
  | { kind: 'ambiguous_layout'; sheetName: string; layout: LayoutDecision }
  | { kind: 'empty_sheet'; sheetName: string }
  | {
      kind: 'ambiguous_match';
      sheetName: string;
      sourceName: string;
      rosterIndex: number;
      candidates: number[];
    }
  | {
      kind: 'low_confidence_match';
      sheetName: string;
      sourceName: string;
      rosterIndex: number;
      method: FuzzyMethod;
    }
  | { kind: 'unmatched_row'; sheetName: string; sourceName: string; reason: NotFoundReason }
  | { kind: 'missing_student'; sheetName: string; rosterIndex: number };
