const COMBINING_MARKS = /[\u0300-\u036f]/g;
const LIGATURES: Record<string, string> = { 'œ': 'oe', 'æ': 'ae', 'ß': 'ss', 'ø': 'o', 'ł': 'l', 'đ': 'd' };
const LIGATURE_CHARS = /[œæßøłđ]/g;
const NOISE = /[^\p{L}\p{N}\s]/gu;
const MULTI_SPACE = /\s+/g;

/** Lower-cases, strips diacritics and turns punctuation into single spaces. Token order is kept. */
export function foldName(raw: string): string {
  return raw
    .toLowerCase()
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(LIGATURE_CHARS, (ch) => LIGATURES[ch] ?? ch)
    .replace(NOISE, ' ')
    .replace(MULTI_SPACE, ' ')
    .trim();
}

export function nameTokens(parts: readonly string[]): string[] {
  const folded = foldName(parts.join(' '));
  if (!folded) return [];
  return folded.split(' ').sort();
}

/**
 * Order-independent identity key for one or two raw name fields.
 * "Jean Dupont", ["Dupont", "Jean"] and "JEAN-DUPONT" all give "dupont jean".
 */
export function normalizeNameParts(parts: readonly string[]): string {
  return nameTokens(parts).join(' ');
}

export function displayNameOf(parts: readonly string[]): string {
  return parts
    .map((p) => p.trim())
    .filter(Boolean)
    .join(' ')
    .replace(MULTI_SPACE, ' ');
}
