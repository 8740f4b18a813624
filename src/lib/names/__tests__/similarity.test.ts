import { describe, it, expect } from 'vitest';
import { editDistance, isTokenSubset, sharesToken } from '../similarity';

describe('editDistance', () => {
  it('counts insertions, deletions and substitutions', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
  });

  it('returns length of the other string when one is empty', () => {
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('abc', '')).toBe(3);
  });

  it('returns 0 for identical strings', () => {
    expect(editDistance('dupont jean', 'dupont jean')).toBe(0);
  });

  it('detects a one-letter spelling variant', () => {
    expect(editDistance('dupond jean', 'dupont jean')).toBe(1);
  });
});

describe('isTokenSubset', () => {
  it('accepts a middle name on either side', () => {
    expect(isTokenSubset(['alice', 'dupont'], ['alice', 'dupont', 'marie'])).toBe(true);
    expect(isTokenSubset(['alice', 'dupont', 'marie'], ['alice', 'dupont'])).toBe(true);
  });

  it('rejects sets where neither contains the other', () => {
    expect(isTokenSubset(['alice', 'x'], ['alice', 'dupont'])).toBe(false);
  });

  it('rejects empty token lists', () => {
    expect(isTokenSubset([], ['alice'])).toBe(false);
  });
});

describe('sharesToken', () => {
  it('is true when one token is common', () => {
    expect(sharesToken(['alice', 'martin'], ['bob', 'martin'])).toBe(true);
  });

  it('is false without overlap', () => {
    expect(sharesToken(['alice', 'dupont'], ['bob', 'martin'])).toBe(false);
  });
});
