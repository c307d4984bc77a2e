import type {
  ClinicalStructure,
  ClinicalSetting,
  DiagnosticProcedure,
  LabTest,
  MedicalCondition,
  MedicationOrder,
  UrgencyLevel,
} from '@clinorder/shared';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { textList } from './fields.js';

export interface ClinicalStructureFields {
  medications?: readonly MedicationOrder[];
  lab_tests?: readonly LabTest[];
  procedures?: readonly DiagnosticProcedure[];
  conditions?: readonly MedicalCondition[];
  patients?: readonly string[];
  clinical_instructions?: readonly string[];
  urgency_level?: UrgencyLevel;
  clinical_setting?: ClinicalSetting;
  patient_safety_alerts?: readonly string[];
}

/**
 * Assemble the aggregate. Finding no orders at all is legitimate, so it is
 * only logged.
 */
export function createClinicalStructure(
  fields: ClinicalStructureFields = {},
  log: Logger = defaultLogger,
): ClinicalStructure {
  const medications = Object.freeze([...(fields.medications ?? [])]);
  const labTests = Object.freeze([...(fields.lab_tests ?? [])]);
  const procedures = Object.freeze([...(fields.procedures ?? [])]);

  if (medications.length === 0 && labTests.length === 0 && procedures.length === 0) {
    log.warn('No clinical orders found in structured output');
  }

  return Object.freeze({
    medications,
    lab_tests: labTests,
    procedures,
    conditions: Object.freeze([...(fields.conditions ?? [])]),
    patients: textList(fields.patients),
    clinical_instructions: textList(fields.clinical_instructions),
    urgency_level: fields.urgency_level ?? 'routine',
    clinical_setting: fields.clinical_setting ?? 'outpatient',
    patient_safety_alerts: textList(fields.patient_safety_alerts),
  });
}

/** The structure returned when extraction fails outright. */
export function emptyClinicalStructure(): ClinicalStructure {
  return Object.freeze({
    medications: [],
    lab_tests: [],
    procedures: [],
    conditions: [],
    patients: [],
    clinical_instructions: [],
    urgency_level: 'routine',
    clinical_setting: 'outpatient',
    patient_safety_alerts: [],
  });
}

export function countEntities(structure: ClinicalStructure): number {
  return (
    structure.medications.length
    + structure.lab_tests.length
    + structure.procedures.length
    + structure.conditions.length
  );
}
