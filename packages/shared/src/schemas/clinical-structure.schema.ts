import { z } from 'zod';
import {
  MEDICATION_ROUTES,
  URGENCY_LEVELS,
  CLINICAL_SETTINGS,
} from '../types/clinical.js';

// Absent, null and blank strings all collapse to null.
const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const textList = z.array(z.string()).nullish().transform((value) => value ?? []);

export const MedicationOrderSchema = z.object({
  name: z.string(),
  dosage: optionalText,
  frequency: optionalText,
  route: z.enum(MEDICATION_ROUTES).nullish().transform((value) => value ?? 'unknown'),
  indication: optionalText,
  duration: optionalText,
  special_instructions: textList,
  // Accepted for shape compatibility; always re-derived when the order is built.
  safety_flag: z.boolean().optional(),
});

export const LabTestSchema = z.object({
  name: z.string(),
  test_type: z.string().default('laboratory'),
  urgency: z.enum(URGENCY_LEVELS).default('routine'),
  fasting_required: z.boolean().default(false),
  special_instructions: textList,
  expected_turnaround: optionalText,
});

export const DiagnosticProcedureSchema = z.object({
  name: z.string(),
  procedure_type: z.string().default('diagnostic'),
  urgency: z.enum(URGENCY_LEVELS).default('routine'),
  body_site: optionalText,
  contrast_needed: z.boolean().default(false),
  special_prep: textList,
});

export const MedicalConditionSchema = z.object({
  name: z.string(),
  severity: optionalText,
  onset: optionalText,
  status: z.string().default('active'),
});

// Older model prompts returned bare condition names.
const conditionEntry = z.union([
  z.string().transform((name) => ({ name, severity: null, onset: null, status: 'active' })),
  MedicalConditionSchema,
]);

export const ClinicalStructureSchema = z.object({
  medications: z.array(MedicationOrderSchema).default([]),
  lab_tests: z.array(LabTestSchema).default([]),
  procedures: z.array(DiagnosticProcedureSchema).default([]),
  conditions: z.array(conditionEntry).default([]),
  patients: textList,
  clinical_instructions: textList,
  urgency_level: z.enum(URGENCY_LEVELS).default('routine'),
  clinical_setting: z.enum(CLINICAL_SETTINGS).default('outpatient'),
  patient_safety_alerts: textList,
});

export type MedicationOrderInput = z.input<typeof MedicationOrderSchema>;
export type ClinicalStructureInput = z.input<typeof ClinicalStructureSchema>;
export type ParsedClinicalStructure = z.output<typeof ClinicalStructureSchema>;
