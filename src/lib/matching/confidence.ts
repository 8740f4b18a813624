import type { Confidence, MatchResult } from '../../types/fusion';

export const CONFIDENCE_BY_KIND: Record<Exclude<MatchResult['kind'], 'not_found'>, Confidence> = {
  exact: 'high',
  normalized: 'high',
  ambiguous: 'low',
  fuzzy: 'low',
};

export function confidenceFor(match: MatchResult): Confidence | null {
  if (match.kind === 'not_found') return null;
  return CONFIDENCE_BY_KIND[match.kind];
}

export function needsReview(match: MatchResult): boolean {
  return confidenceFor(match) === 'low';
}
