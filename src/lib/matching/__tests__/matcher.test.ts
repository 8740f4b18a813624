import { describe, it, expect } from 'vitest';
import { matchEntry, matchSheet } from '../matcher';
import { CandidatePool } from '../candidatePool';
import { loadConfig } from '../../config';
import { nameTokens } from '../../names/normalize';
import type { RawNameEntry, Student } from '../../../types/fusion';

function makeRoster(names: string[]): Student[] {
  return names.map((displayName, rosterIndex) => {
    const tokens = nameTokens([displayName]);
    return { canonicalKey: tokens.join(' '), displayName, rosterIndex, tokens };
  });
}

function makeEntry(name: string, rowIndex = 0): RawNameEntry {
  return { sheetId: 1, rowIndex, nameParts: [name], displayName: name, scores: [rowIndex] };
}

describe('matchEntry', () => {
  it('returns exact when the raw text equals the roster text', () => {
    const roster = makeRoster(['Alice Dupont', 'Bob Martin']);
    const pool = new CandidatePool(roster);
    expect(matchEntry(makeEntry('Alice Dupont'), roster, pool)).toEqual({
      kind: 'exact',
      rosterIndex: 0,
      confidence: 'high',
    });
    expect(pool.has(0)).toBe(false);
    expect(pool.size).toBe(1);
  });

  it('returns normalized for reordered, upper-cased names', () => {
    const roster = makeRoster(['Alice Dupont', 'Bob Martin']);
    const pool = new CandidatePool(roster);
    expect(matchEntry(makeEntry('MARTIN Bob'), roster, pool)).toEqual({
      kind: 'normalized',
      rosterIndex: 1,
      confidence: 'high',
    });
  });

  it('resolves duplicate roster keys in roster order at low confidence', () => {
    const roster = makeRoster(['Marie Martin', 'Marie Martin']);
    const pool = new CandidatePool(roster);
    expect(matchEntry(makeEntry('Martin Marie'), roster, pool)).toEqual({
      kind: 'ambiguous',
      rosterIndex: 0,
      confidence: 'low',
      candidates: [0, 1],
    });
    expect(matchEntry(makeEntry('Martin Marie'), roster, pool)).toMatchObject({
      kind: 'ambiguous',
      rosterIndex: 1,
    });
    expect(matchEntry(makeEntry('Martin Marie'), roster, pool)).toEqual({
      kind: 'not_found',
      reason: 'already_matched',
    });
  });

  it('never reroutes a name whose student is already taken', () => {
    const roster = makeRoster(['Alice Dupont', 'Alicia Dupont']);
    const pool = new CandidatePool(roster);
    matchEntry(makeEntry('Alice Dupont'), roster, pool);
    expect(matchEntry(makeEntry('Alice Dupont'), roster, pool)).toEqual({
      kind: 'not_found',
      reason: 'already_matched',
    });
    expect(pool.has(1)).toBe(true);
  });

  it('reports empty names as not found', () => {
    const roster = makeRoster(['Alice Dupont']);
    expect(matchEntry(makeEntry(' -- '), roster, new CandidatePool(roster))).toEqual({
      kind: 'not_found',
      reason: 'empty_name',
    });
  });

  it('matches a name missing its middle name by token subset', () => {
    const roster = makeRoster(['Anne Marie Durand', 'Paul Durand']);
    expect(matchEntry(makeEntry('Anne Durand'), roster, new CandidatePool(roster))).toEqual({
      kind: 'fuzzy',
      rosterIndex: 0,
      confidence: 'low',
      method: 'token_subset',
      distance: 6,
      tied: [],
    });
  });

  it('breaks token-subset ties by roster order and records them', () => {
    const roster = makeRoster(['Léa Petit Martin', 'Léa Petit Durand']);
    expect(matchEntry(makeEntry('Lea Petit'), roster, new CandidatePool(roster))).toEqual({
      kind: 'fuzzy',
      rosterIndex: 0,
      confidence: 'low',
      method: 'token_subset',
      distance: 7,
      tied: [0, 1],
    });
  });

  it('matches a spelling variant within the edit distance threshold', () => {
    const roster = makeRoster(['Jean Dupont']);
    expect(matchEntry(makeEntry('Jean Dupond'), roster, new CandidatePool(roster))).toEqual({
      kind: 'fuzzy',
      rosterIndex: 0,
      confidence: 'low',
      method: 'edit_distance',
      distance: 1,
      tied: [],
    });
  });

  it('falls back to a single shared token when spelling is too far', () => {
    const roster = makeRoster(['Jean Dupont']);
    const config = loadConfig({ maxEditDistance: 0 });
    expect(matchEntry(makeEntry('Jean Dupond'), roster, new CandidatePool(roster), config)).toMatchObject({
      kind: 'fuzzy',
      method: 'shared_token',
      rosterIndex: 0,
    });
  });

  it('returns not found when every tolerant tier is disabled or fails', () => {
    const roster = makeRoster(['Jean Dupont']);
    const config = loadConfig({ maxEditDistance: 0, partialTokenMatch: false });
    expect(matchEntry(makeEntry('Jean Dupond'), roster, new CandidatePool(roster), config)).toEqual({
      kind: 'not_found',
      reason: 'no_candidate',
    });
  });

  it('refuses a shared token held by several students', () => {
    const roster = makeRoster(['Jean Dupont', 'Jean Martin']);
    expect(matchEntry(makeEntry('Jean Durand'), roster, new CandidatePool(roster))).toEqual({
      kind: 'not_found',
      reason: 'no_candidate',
    });
  });
});

describe('matchSheet', () => {
  it('resolves exact names before heuristic guesses', () => {
    const roster = makeRoster(['Jean Dupont', 'Jean Dupond']);
    const results = matchSheet([makeEntry('Jean Dupon', 0), makeEntry('Jean Dupont', 1)], roster);
    expect(results[0].match).toEqual({
      kind: 'fuzzy',
      rosterIndex: 1,
      confidence: 'low',
      method: 'edit_distance',
      distance: 1,
      tied: [],
    });
    expect(results[1].match).toEqual({ kind: 'exact', rosterIndex: 0, confidence: 'high' });
  });

  it('never assigns two rows to the same student', () => {
    const roster = makeRoster(['Alice Dupont', 'Alicia Dupont']);
    const results = matchSheet([makeEntry('Alice Dupont', 0), makeEntry('Alice Dupont', 1)], roster);
    expect(results.map((r) => r.match.kind)).toEqual(['exact', 'not_found']);
  });

  it('uses a fresh pool for every sheet', () => {
    const roster = makeRoster(['Alice Dupont']);
    const first = matchSheet([makeEntry('Alice Dupont')], roster);
    const second = matchSheet([makeEntry('Alice Dupont')], roster);
    expect(first[0].match.kind).toBe('exact');
    expect(second[0].match.kind).toBe('exact');
  });

  it('keeps entries in sheet order', () => {
    const roster = makeRoster(['Alice Dupont', 'Bob Martin']);
    const entries = [makeEntry('Bob Martin', 0), makeEntry('Alice Dupont', 1)];
    const results = matchSheet(entries, roster);
    expect(results.map((r) => r.entry)).toEqual(entries);
  });
});

describe('CandidatePool', () => {
  it('lists remaining students in roster order', () => {
    const roster = makeRoster(['A One', 'B Two', 'C Three']);
    const pool = new CandidatePool(roster);
    pool.take(1);
    expect(pool.remaining(roster).map((s) => s.rosterIndex)).toEqual([0, 2]);
  });

  it('refuses to hand out a student twice', () => {
    const roster = makeRoster(['A One']);
    const pool = new CandidatePool(roster);
    pool.take(0);
    expect(() => pool.take(0)).toThrow('not available');
  });
});
