export { config, loadConfig } from './config.js';
export type { ExtractorConfig, GenerativeConfig } from './config.js';
export { logger, forRequest } from './logger.js';
export type { Logger } from './logger.js';
export { EntityValidationError, GenerativeExtractionError, errorMessage } from './errors.js';
export type { EntityKind } from './errors.js';

export { loadLexicons } from './lexicons.js';
export type { Lexicons, KeywordRule } from './lexicons.js';

// Entity factories
export { createMedicationOrder } from './models/medication-order.js';
export type { MedicationOrderFields } from './models/medication-order.js';
export { createLabTest, createDiagnosticProcedure, createMedicalCondition } from './models/orders.js';
export type { LabTestFields, DiagnosticProcedureFields, MedicalConditionFields } from './models/orders.js';
export { createClinicalStructure, emptyClinicalStructure, countEntities } from './models/clinical-structure.js';
export type { ClinicalStructureFields } from './models/clinical-structure.js';

// Extraction
export { PatternExtractor } from './extraction/pattern-extractor.js';
export { EscalationPolicy } from './extraction/escalation-policy.js';
export type { EscalationDecision } from './extraction/escalation-policy.js';
export { SourceGroundingValidator } from './extraction/grounding-validator.js';
export type { GroundingRejection, GroundingReport, GroundedEntity } from './extraction/grounding-validator.js';

// Generative
export {
  BedrockGenerativeExtractor,
  DisabledGenerativeExtractor,
  createGenerativeExtractor,
  bedrockConverse,
} from './generative/generative-extractor.js';
export type {
  ConverseFn,
  CredentialsResolver,
  ConverseResponseLike,
  GenerativeExtractor,
  GenerativeExtractorOptions,
  GenerativeExtractorStatus,
  GenerativeResult,
} from './generative/generative-extractor.js';
export { PROMPT_VERSION } from './generative/prompt-builder.js';

// Pipeline
export { ExtractionPipeline, createExtractionPipeline } from './pipeline/extraction-pipeline.js';
export type { PipelineStatus, CreatePipelineOptions } from './pipeline/extraction-pipeline.js';
