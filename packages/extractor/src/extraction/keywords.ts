import { phraseToPattern } from '@clinorder/shared';
import type { KeywordRule } from '../lexicons.js';

export interface CompiledKeywordRule<T extends string> {
  value: T;
  pattern: RegExp;
}

/** Whole-word, case-insensitive alternation of a list of phrases. */
export function wordAlternation(phrases: readonly string[], flags = 'i'): RegExp | null {
  if (phrases.length === 0) return null;
  return new RegExp(`\\b(${phrases.map(phraseToPattern).join('|')})\\b`, flags);
}

export function compileKeywordRules<T extends string>(
  rules: readonly KeywordRule<T>[],
): CompiledKeywordRule<T>[] {
  return rules.flatMap((rule) => {
    const pattern = wordAlternation(rule.keywords);
    return pattern ? [{ value: rule.value, pattern }] : [];
  });
}

/** Value of the first rule, in table order, whose keywords occur in the text. */
export function firstKeywordMatch<T extends string>(
  rules: readonly CompiledKeywordRule<T>[],
  text: string,
): T | undefined {
  return rules.find((rule) => rule.pattern.test(text))?.value;
}

/**
 * "patient Firstname Lastname", case-sensitive. Shared by the pattern
 * extractor and the escalation policy so both agree on what a name is.
 */
export function patientNamePattern(flags = ''): RegExp {
  return new RegExp('\\bpatient\\s+([A-Z][a-z]+\\s+[A-Z][a-z]+)\\b', flags);
}
