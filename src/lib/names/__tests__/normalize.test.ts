import { describe, it, expect } from 'vitest';
import { displayNameOf, foldName, nameTokens, normalizeNameParts } from '../normalize';

describe('foldName', () => {
  it('lower-cases, strips accents, and turns punctuation into spaces', () => {
    expect(foldName('  Élise  Van-Der_Berg ')).toBe('elise van der berg');
  });

  it('expands ligatures', () => {
    expect(foldName('Lætitia Cœur')).toBe('laetitia coeur');
  });

  it('handles empty string', () => {
    expect(foldName('')).toBe('');
  });
});

describe('normalizeNameParts', () => {
  it('is invariant to name order, case, hyphens, and column split', () => {
    const expected = 'dupont jean';
    expect(normalizeNameParts(['Jean', 'Dupont'])).toBe(expected);
    expect(normalizeNameParts(['Dupont', 'Jean'])).toBe(expected);
    expect(normalizeNameParts(['JEAN DUPONT'])).toBe(expected);
    expect(normalizeNameParts(['jean-dupont'])).toBe(expected);
  });

  it('splits apostrophes into separate tokens', () => {
    expect(normalizeNameParts(["O'Brien Seán"])).toBe('brien o sean');
  });

  it('returns empty key for blank input', () => {
    expect(normalizeNameParts([])).toBe('');
    expect(normalizeNameParts(['   '])).toBe('');
  });
});

describe('nameTokens', () => {
  it('returns sorted folded tokens', () => {
    expect(nameTokens(['Van der Berg', 'Élise'])).toEqual(['berg', 'der', 'elise', 'van']);
  });
});

describe('displayNameOf', () => {
  it('joins trimmed non-empty parts with one space', () => {
    expect(displayNameOf([' Alice ', '', 'Dupont'])).toBe('Alice Dupont');
  });
});
