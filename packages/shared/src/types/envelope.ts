import type { ClinicalStructure } from './clinical.js';

export type ExtractionMethod = 'regex_enhanced' | 'escalated_to_llm' | 'fallback';

export type ProcessingStatus = 'completed' | 'failed';

export type EscalationRule =
  | 'zero_yield'
  | 'noise_only'
  | 'hard_medication_missed'
  | 'dosing_without_medication'
  | 'actions_without_quality'
  | 'patient_name_missed';

export interface EscalationSummary {
  escalate: boolean;
  rule: EscalationRule | null;
  reason: string;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Result envelope returned by the pipeline for every call, successful or not.
 */
export interface ProcessingEnvelope {
  structured_output: ClinicalStructure;
  processing_time_ms: number;
  method: ExtractionMethod;
  status: ProcessingStatus;
  error?: string;
  escalation?: EscalationSummary;
  token_usage?: TokenUsage;
}
