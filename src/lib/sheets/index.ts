export { detectLayout, isAmbiguousLayout, namePartsAt } from './layoutDetector';
export { loadRoster } from './rosterLoader';
export type { RosterLoadResult } from './rosterLoader';
export { loadScoreSheet, collectScores } from './scoreSheetLoader';
export type { ScoreSheetLoadResult } from './scoreSheetLoader';
export { isBlankCell, cellText, looksLikeNameToken, cellAt } from './cells';
