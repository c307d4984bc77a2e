import type { MedicationOrder, MedicationRoute } from '@clinorder/shared';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { requireName, optionalText, textList } from './fields.js';

export interface MedicationOrderFields {
  name: string;
  dosage?: string | null;
  frequency?: string | null;
  route?: MedicationRoute;
  indication?: string | null;
  duration?: string | null;
  special_instructions?: readonly string[];
}

/**
 * Build a medication order. The name is trimmed and lower-cased; the safety
 * flag is derived here and cannot be supplied by the caller.
 *
 * @throws EntityValidationError when the name is empty
 */
export function createMedicationOrder(
  fields: MedicationOrderFields,
  log: Logger = defaultLogger,
): MedicationOrder {
  const name = requireName('medication', fields.name);
  const dosage = optionalText(fields.dosage);
  const frequency = optionalText(fields.frequency);
  const safetyFlag = dosage === null || frequency === null;

  if (safetyFlag) {
    log.warn(
      { medication: name, hasDosage: dosage !== null, hasFrequency: frequency !== null },
      'Medication missing critical safety information',
    );
  }

  return Object.freeze({
    name,
    dosage,
    frequency,
    route: fields.route ?? 'unknown',
    indication: optionalText(fields.indication),
    duration: optionalText(fields.duration),
    special_instructions: textList(fields.special_instructions),
    safety_flag: safetyFlag,
  });
}
