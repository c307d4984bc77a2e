export const MEDICATION_ROUTES = [
  'oral',
  'intravenous',
  'intramuscular',
  'sublingual',
  'topical',
  'inhalation',
  'unknown',
] as const;

export const URGENCY_LEVELS = ['routine', 'urgent', 'stat', 'asap'] as const;

export const CLINICAL_SETTINGS = [
  'outpatient',
  'inpatient',
  'emergency',
  'intensive_care',
  'unknown',
] as const;

export type MedicationRoute = (typeof MEDICATION_ROUTES)[number];
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];
export type ClinicalSetting = (typeof CLINICAL_SETTINGS)[number];

/**
 * A single medication mention. `safety_flag` is derived when the order is
 * built and is true whenever dosage or frequency could not be determined.
 */
export interface MedicationOrder {
  readonly name: string;
  readonly dosage: string | null;
  readonly frequency: string | null;
  readonly route: MedicationRoute;
  readonly indication: string | null;
  readonly duration: string | null;
  readonly special_instructions: readonly string[];
  readonly safety_flag: boolean;
}

export interface LabTest {
  readonly name: string;
  readonly test_type: string;
  readonly urgency: UrgencyLevel;
  readonly fasting_required: boolean;
  readonly special_instructions: readonly string[];
  readonly expected_turnaround: string | null;
}

export interface DiagnosticProcedure {
  readonly name: string;
  readonly procedure_type: string;
  readonly urgency: UrgencyLevel;
  readonly body_site: string | null;
  readonly contrast_needed: boolean;
  readonly special_prep: readonly string[];
}

export interface MedicalCondition {
  readonly name: string;
  readonly severity: string | null;
  readonly onset: string | null;
  readonly status: string;
}

/**
 * Aggregate produced by every extraction call. Field names are the contract
 * with the downstream record-assembly layer and must not change.
 */
export interface ClinicalStructure {
  readonly medications: readonly MedicationOrder[];
  readonly lab_tests: readonly LabTest[];
  readonly procedures: readonly DiagnosticProcedure[];
  readonly conditions: readonly MedicalCondition[];
  readonly patients: readonly string[];
  readonly clinical_instructions: readonly string[];
  readonly urgency_level: UrgencyLevel;
  readonly clinical_setting: ClinicalSetting;
  readonly patient_safety_alerts: readonly string[];
}
