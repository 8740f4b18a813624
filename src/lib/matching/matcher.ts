import type { FuzzyMethod, MatchResult, RawNameEntry, Student } from '../../types/fusion';
import type { FusionConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { nameTokens } from '../names/normalize';
import { editDistance, isTokenSubset, sharesToken } from '../names/similarity';
import { CandidatePool } from './candidatePool';

interface EntryContext {
  entry: RawNameEntry;
  key: string;
  tokens: string[];
}

type MatchTier = (
  ctx: EntryContext,
  roster: readonly Student[],
  pool: CandidatePool,
  config: FusionConfig,
) => MatchResult | null;

export interface SheetMatch {
  entry: RawNameEntry;
  match: MatchResult;
}

function contextOf(entry: RawNameEntry): EntryContext {
  const tokens = nameTokens(entry.nameParts);
  return { entry, key: tokens.join(' '), tokens };
}

function matchByKey(ctx: EntryContext, roster: readonly Student[], pool: CandidatePool): MatchResult | null {
  if (!ctx.key) return { kind: 'not_found', reason: 'empty_name' };

  const holders = roster.filter((s) => s.canonicalKey === ctx.key);
  if (holders.length === 0) return null;

  const available = holders.filter((s) => pool.has(s.rosterIndex));
  if (available.length === 0) return { kind: 'not_found', reason: 'already_matched' };

  const chosen = available[0];
  pool.take(chosen.rosterIndex);

  if (holders.length > 1) {
    return {
      kind: 'ambiguous',
      rosterIndex: chosen.rosterIndex,
      confidence: 'low',
      candidates: holders.map((s) => s.rosterIndex),
    };
  }

  const kind = ctx.entry.displayName === chosen.displayName ? 'exact' : 'normalized';
  return { kind, rosterIndex: chosen.rosterIndex, confidence: 'high' };
}

interface Closest {
  student: Student;
  distance: number;
  tied: number[];
}

/** Smallest edit distance between keys; ties go to the earliest roster position. */
function pickClosest(ctx: EntryContext, candidates: readonly Student[]): Closest | null {
  let best: Closest | null = null;
  for (const student of candidates) {
    const distance = editDistance(ctx.key, student.canonicalKey);
    if (!best || distance < best.distance) {
      best = { student, distance, tied: [student.rosterIndex] };
    } else if (distance === best.distance) {
      best.tied.push(student.rosterIndex);
    }
  }
  if (best && best.tied.length === 1) best.tied = [];
  return best;
}

function fuzzyMatch(closest: Closest, method: FuzzyMethod, pool: CandidatePool): MatchResult {
  pool.take(closest.student.rosterIndex);
  return {
    kind: 'fuzzy',
    rosterIndex: closest.student.rosterIndex,
    confidence: 'low',
    method,
    distance: closest.distance,
    tied: closest.tied,
  };
}

const matchByTokenSubset: MatchTier = (ctx, roster, pool) => {
  const candidates = pool.remaining(roster).filter((s) => isTokenSubset(ctx.tokens, s.tokens));
  const closest = pickClosest(ctx, candidates);
  return closest ? fuzzyMatch(closest, 'token_subset', pool) : null;
};

const matchByEditDistance: MatchTier = (ctx, roster, pool, config) => {
  const candidates = pool
    .remaining(roster)
    .filter((s) => editDistance(ctx.key, s.canonicalKey) <= config.maxEditDistance);
  const closest = pickClosest(ctx, candidates);
  return closest ? fuzzyMatch(closest, 'edit_distance', pool) : null;
};

const matchBySharedToken: MatchTier = (ctx, roster, pool, config) => {
  if (!config.partialTokenMatch) return null;
  const candidates = pool.remaining(roster).filter((s) => sharesToken(ctx.tokens, s.tokens));
  if (candidates.length !== 1) return null;
  const closest = pickClosest(ctx, candidates);
  return closest ? fuzzyMatch(closest, 'shared_token', pool) : null;
};

export const MATCH_TIERS: readonly MatchTier[] = [
  (ctx, roster, pool) => matchByKey(ctx, roster, pool),
  matchByTokenSubset,
  matchByEditDistance,
  matchBySharedToken,
];

/** Runs the full cascade for one row, consuming the matched student from `pool`. */
export function matchEntry(
  entry: RawNameEntry,
  roster: readonly Student[],
  pool: CandidatePool,
  config: FusionConfig = DEFAULT_CONFIG,
): MatchResult {
  const ctx = contextOf(entry);
  for (const tier of MATCH_TIERS) {
    const result = tier(ctx, roster, pool, config);
    if (result) return result;
  }
  return { kind: 'not_found', reason: 'no_candidate' };
}

/**
 * Matches every row of one sheet against a fresh pool. Tiers run breadth-first,
 * so a heuristic match never takes a student that another row names exactly.
 */
export function matchSheet(
  entries: readonly RawNameEntry[],
  roster: readonly Student[],
  config: FusionConfig = DEFAULT_CONFIG,
): SheetMatch[] {
  const pool = new CandidatePool(roster);
  const contexts = entries.map(contextOf);
  const results: Array<MatchResult | null> = entries.map(() => null);

  for (const tier of MATCH_TIERS) {
    contexts.forEach((ctx, i) => {
      if (results[i]) return;
      results[i] = tier(ctx, roster, pool, config);
    });
  }

  return entries.map((entry, i) => ({
    entry,
    match: results[i] ?? { kind: 'not_found', reason: 'no_candidate' },
  }));
}
