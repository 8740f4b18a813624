export { matchEntry, matchSheet, MATCH_TIERS } from './matcher';
export type { SheetMatch } from './matcher';
export { CandidatePool } from './candidatePool';
export { confidenceFor, needsReview, CONFIDENCE_BY_KIND } from './confidence';
