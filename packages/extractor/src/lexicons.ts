import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { MEDICATION_ROUTES, URGENCY_LEVELS, CLINICAL_SETTINGS } from '@clinorder/shared';
import { config } from './config.js';

const wordList = z.array(z.string().trim().toLowerCase().min(1));

function keywordTable<T extends readonly [string, ...string[]]>(values: T) {
  return z.array(z.object({ value: z.enum(values), keywords: wordList.min(1) }));
}

const MedicationLexiconSchema = z.object({
  known: wordList,
  hard_to_extract: wordList,
  name_stopwords: wordList,
});

const ConditionLexiconSchema = z.object({
  complex_phrases: wordList,
  common: wordList,
  stopwords: wordList,
});

const ContextLexiconSchema = z.object({
  routes: keywordTable(MEDICATION_ROUTES),
  order_urgency: keywordTable(URGENCY_LEVELS),
  document_urgency: keywordTable(URGENCY_LEVELS),
  settings: keywordTable(CLINICAL_SETTINGS),
  safety_keywords: wordList,
});

const EscalationLexiconSchema = z.object({
  noise_words: wordList,
  dosing_keywords: wordList,
  medical_actions: wordList,
});

export type MedicationLexicon = z.output<typeof MedicationLexiconSchema>;
export type ConditionLexicon = z.output<typeof ConditionLexiconSchema>;
export type ContextLexicon = z.output<typeof ContextLexiconSchema>;
export type EscalationLexicon = z.output<typeof EscalationLexiconSchema>;

export interface KeywordRule<T extends string> {
  value: T;
  keywords: string[];
}

/**
 * Every word list the extractor, policy and validator match against. The
 * algorithms are generic over these tables so they can grow without code
 * changes.
 */
export interface Lexicons {
  medications: MedicationLexicon;
  conditions: ConditionLexicon;
  context: ContextLexicon;
  escalation: EscalationLexicon;
}

function readTable<T extends z.ZodTypeAny>(dir: string, file: string, schema: T): z.output<T> {
  const path = join(dir, file);
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid lexicon table ${path}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Read and validate the lexicon tables. Called once at startup; a missing or
 * malformed table is a deployment error and throws.
 */
export function loadLexicons(dir: string = config.lexiconDir): Lexicons {
  return {
    medications: readTable(dir, 'medications.json', MedicationLexiconSchema),
    conditions: readTable(dir, 'conditions.json', ConditionLexiconSchema),
    context: readTable(dir, 'context.json', ContextLexiconSchema),
    escalation: readTable(dir, 'escalation.json', EscalationLexiconSchema),
  };
}
