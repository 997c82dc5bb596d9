/**
 * Lower-case, replace punctuation with spaces and collapse whitespace.
 */
export function normalizeQuery(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeQuery(text);
  return normalized === "" ? [] : normalized.split(" ");
}

export function isNumericToken(token: string): boolean {
  return /^\p{N}+$/u.test(token);
}

const WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Case-insensitive substring test that refuses matches glued to a letter or
 * digit, so `q1` is found in `q1 totals` but not in `q10 totals`.
 */
export function containsPhrase(haystackLower: string, needleLower: string): boolean {
  if (needleLower === "") return false;
  let from = 0;
  for (;;) {
    const index = haystackLower.indexOf(needleLower, from);
    if (index === -1) return false;
    const before = haystackLower.charAt(index - 1);
    const after = haystackLower.charAt(index + needleLower.length);
    if (!WORD_CHAR.test(before) && !WORD_CHAR.test(after)) return true;
    from = index + 1;
  }
}
