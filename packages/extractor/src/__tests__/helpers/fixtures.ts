import { pino } from 'pino';
import type { ConverseResponseLike } from '../../generative/generative-extractor.js';
import { loadLexicons, type Lexicons } from '../../lexicons.js';
import type { Logger } from '../../logger.js';

/** Logger that writes nothing, for components under test. */
export const silentLogger: Logger = pino({ level: 'silent' });

let cached: Lexicons | undefined;

/** The shipped lexicon tables, read once per test file. */
export function testLexicons(): Lexicons {
  cached ??= loadLexicons();
  return cached;
}

/** A Converse response whose only content block is a call to the clinical structure tool. */
export function toolUseResponse(
  input: Record<string, unknown>,
  usage = { inputTokens: 1200, outputTokens: 150 },
): ConverseResponseLike {
  return {
    output: {
      message: {
        content: [
          {
            toolUse: {
              toolUseId: 'tool-use-1',
              name: 'record_clinical_structure',
              input,
            },
          },
        ],
      },
    },
    stopReason: 'tool_use',
    usage,
  };
}

export const SCENARIO_NAMED_PATIENT =
  'Prescribed patient Mary Johnson amoxicillin 500mg three times daily for acute bacterial sinusitis.';
export const SCENARIO_NO_DOSAGE = 'Patient on insulin for diabetes.';
export const SCENARIO_NON_CLINICAL = 'The weather is nice today.';
