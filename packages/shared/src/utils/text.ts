/**
 * Lower-case, trim and collapse runs of whitespace into single spaces.
 * All source-grounding comparisons run against this form of the input.
 */
export function normalizeSourceText(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a regex source for a lexicon phrase: special characters escaped and
 * single spaces widened to `\s+` so line breaks inside the phrase still match.
 */
export function phraseToPattern(phrase: string): string {
  return phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
}
