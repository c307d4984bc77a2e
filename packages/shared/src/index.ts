// Types
export {
  MEDICATION_ROUTES,
  URGENCY_LEVELS,
  CLINICAL_SETTINGS,
} from './types/clinical.js';
export type {
  MedicationRoute,
  UrgencyLevel,
  ClinicalSetting,
  MedicationOrder,
  LabTest,
  DiagnosticProcedure,
  MedicalCondition,
  ClinicalStructure,
} from './types/clinical.js';

export type {
  ExtractionMethod,
  ProcessingStatus,
  EscalationRule,
  EscalationSummary,
  TokenUsage,
  ProcessingEnvelope,
} from './types/envelope.js';

// Schemas
export {
  MedicationOrderSchema,
  LabTestSchema,
  DiagnosticProcedureSchema,
  MedicalConditionSchema,
  ClinicalStructureSchema,
} from './schemas/clinical-structure.schema.js';
export type {
  MedicationOrderInput,
  ClinicalStructureInput,
  ParsedClinicalStructure,
} from './schemas/clinical-structure.schema.js';

// Utils
export { normalizeSourceText, escapeRegExp, phraseToPattern } from './utils/text.js';
