import { escapeRegExp, normalizeSourceText } from '@clinorder/shared';
import type {
  ClinicalStructure,
  DiagnosticProcedure,
  LabTest,
  MedicalCondition,
  MedicationOrder,
} from '@clinorder/shared';
import { logger as defaultLogger, forRequest, type Logger } from '../logger.js';
import { createMedicationOrder } from '../models/medication-order.js';
import { createClinicalStructure } from '../models/clinical-structure.js';

export type GroundedEntity = 'medication' | 'lab_test' | 'procedure' | 'condition' | 'patient';

export interface GroundingRejection {
  entity: GroundedEntity;
  name: string;
  /** `name` when the whole entity was dropped, otherwise the nulled field. */
  field: string;
  reason: string;
}

export interface GroundingReport {
  structure: ClinicalStructure;
  rejections: GroundingRejection[];
}

// Words between two significant words of a condition name may be this far apart.
const CONDITION_WORD_GAP = 20;

function significantWords(name: string): string[] {
  return name.split(' ').filter((word) => word.length > 2);
}

/**
 * Removes every entity, or optional field, whose text cannot be found in the
 * source document. Applied to generative output only.
 */
export class SourceGroundingValidator {
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  validate(extracted: ClinicalStructure, sourceText: string, requestId?: string): ClinicalStructure {
    return this.validateWithReport(extracted, sourceText, requestId).structure;
  }

  validateWithReport(extracted: ClinicalStructure, sourceText: string, requestId?: string): GroundingReport {
    const log = forRequest(this.logger, requestId);
    const source = normalizeSourceText(sourceText);
    const rejections: GroundingRejection[] = [];

    const reject = (rejection: GroundingRejection): void => {
      rejections.push(rejection);
      log.warn(rejection, 'Rejected ungrounded value');
    };

    const medications = extracted.medications.flatMap((med) => {
      const grounded = this.groundMedication(med, source, reject, log);
      return grounded ? [grounded] : [];
    });

    const labTests = extracted.lab_tests.filter((test: LabTest) =>
      this.groundByName('lab_test', test.name, source, reject),
    );
    const procedures = extracted.procedures.filter((procedure: DiagnosticProcedure) =>
      this.groundByName('procedure', procedure.name, source, reject),
    );

    const conditions = extracted.conditions.filter((condition: MedicalCondition) => {
      if (this.conditionGrounded(normalizeSourceText(condition.name), source)) return true;
      reject({ entity: 'condition', name: condition.name, field: 'name', reason: 'words not found in order in source' });
      return false;
    });

    const patients = extracted.patients.filter((patient) => {
      const name = normalizeSourceText(patient);
      if (source.includes(name) || name.split(' ').every((word) => source.includes(word))) {
        return true;
      }
      reject({ entity: 'patient', name: patient, field: 'name', reason: 'name not found in source' });
      return false;
    });

    const structure = createClinicalStructure(
      {
        medications,
        lab_tests: labTests,
        procedures,
        conditions,
        patients,
        clinical_instructions: extracted.clinical_instructions,
        urgency_level: extracted.urgency_level,
        clinical_setting: extracted.clinical_setting,
        patient_safety_alerts: extracted.patient_safety_alerts,
      },
      log,
    );

    if (rejections.length > 0) {
      log.info({ rejected: rejections.length }, 'Source grounding removed values');
    }
    return { structure, rejections };
  }

  private groundMedication(
    med: MedicationOrder,
    source: string,
    reject: (rejection: GroundingRejection) => void,
    log: Logger,
  ): MedicationOrder | null {
    if (!source.includes(normalizeSourceText(med.name))) {
      reject({ entity: 'medication', name: med.name, field: 'name', reason: 'name not found in source' });
      return null;
    }

    const grounded = (field: string, value: string | null): string | null => {
      if (value === null || source.includes(normalizeSourceText(value))) return value;
      reject({ entity: 'medication', name: med.name, field, reason: `${field} "${value}" not found in source` });
      return null;
    };

    const dosage = grounded('dosage', med.dosage);
    const frequency = grounded('frequency', med.frequency);
    const indication = grounded('indication', med.indication);
    const duration = grounded('duration', med.duration);
    const specialInstructions = med.special_instructions.filter(
      (instruction) => grounded('special_instructions', instruction) !== null,
    );

    if (
      dosage === med.dosage &&
      frequency === med.frequency &&
      indication === med.indication &&
      duration === med.duration &&
      specialInstructions.length === med.special_instructions.length
    ) {
      return med;
    }
    // Rebuilt so the safety flag reflects the nulled fields.
    return createMedicationOrder(
      { ...med, dosage, frequency, indication, duration, special_instructions: specialInstructions },
      log,
    );
  }

  private groundByName(
    entity: 'lab_test' | 'procedure',
    name: string,
    source: string,
    reject: (rejection: GroundingRejection) => void,
  ): boolean {
    if (source.includes(normalizeSourceText(name))) return true;
    reject({ entity, name, field: 'name', reason: 'name not found in source' });
    return false;
  }

  private conditionGrounded(name: string, source: string): boolean {
    const words = significantWords(name);
    if (words.length === 0) {
      return name.length > 0 && source.includes(name);
    }
    if (!words.every((word) => source.includes(word))) {
      return false;
    }
    const ordered = words
      .map((word) => `\\b${escapeRegExp(word)}\\b`)
      .join(`.{0,${CONDITION_WORD_GAP}}`);
    return new RegExp(ordered).test(source);
  }
}
