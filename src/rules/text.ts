export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-term pattern. Terms may contain spaces or
 * punctuation ("master/slave", "the end user").
 */
export function termPattern(term: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term)}(?![\\p{L}\\p{N}_])`, "giu");
}

export function findTerm(text: string, term: string): string[] {
  if (!text) {
    return [];
  }
  return Array.from(text.matchAll(termPattern(term)), (match) => match[0]);
}

export function normalizeHeadingText(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}
