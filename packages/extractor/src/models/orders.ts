import type {
  LabTest,
  DiagnosticProcedure,
  MedicalCondition,
  UrgencyLevel,
} from '@clinorder/shared';
import { requireName, optionalText, textList } from './fields.js';

export interface LabTestFields {
  name: string;
  test_type?: string;
  urgency?: UrgencyLevel;
  fasting_required?: boolean;
  special_instructions?: readonly string[];
  expected_turnaround?: string | null;
}

export interface DiagnosticProcedureFields {
  name: string;
  procedure_type?: string;
  urgency?: UrgencyLevel;
  body_site?: string | null;
  contrast_needed?: boolean;
  special_prep?: readonly string[];
}

export interface MedicalConditionFields {
  name: string;
  severity?: string | null;
  onset?: string | null;
  status?: string;
}

export function createLabTest(fields: LabTestFields): LabTest {
  return Object.freeze({
    name: requireName('lab_test', fields.name),
    test_type: optionalText(fields.test_type) ?? 'laboratory',
    urgency: fields.urgency ?? 'routine',
    fasting_required: fields.fasting_required ?? false,
    special_instructions: textList(fields.special_instructions),
    expected_turnaround: optionalText(fields.expected_turnaround),
  });
}

export function createDiagnosticProcedure(fields: DiagnosticProcedureFields): DiagnosticProcedure {
  return Object.freeze({
    name: requireName('procedure', fields.name),
    procedure_type: optionalText(fields.procedure_type) ?? 'diagnostic',
    urgency: fields.urgency ?? 'routine',
    body_site: optionalText(fields.body_site),
    contrast_needed: fields.contrast_needed ?? false,
    special_prep: textList(fields.special_prep),
  });
}

export function createMedicalCondition(fields: MedicalConditionFields): MedicalCondition {
  return Object.freeze({
    name: requireName('condition', fields.name),
    severity: optionalText(fields.severity),
    onset: optionalText(fields.onset),
    status: optionalText(fields.status) ?? 'active',
  });
}
