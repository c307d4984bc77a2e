import type { ClinicalStructure, EscalationRule } from '@clinorder/shared';
import type { Lexicons } from '../lexicons.js';
import { logger as defaultLogger, forRequest, type Logger } from '../logger.js';
import { countEntities } from '../models/clinical-structure.js';
import { patientNamePattern } from './keywords.js';

export interface EscalationDecision {
  escalate: boolean;
  rule: EscalationRule | null;
  reason: string | null;
  totalEntities: number;
  qualityEntities: number;
}

/**
 * Decides whether a pattern-extraction result is too weak to return and the
 * text should go to the generative extractor.
 *
 * Rules are evaluated in a fixed order and the first that fires wins. The
 * keyword checks are plain substring tests over the lower-cased text, so
 * "iv" also fires inside "give".
 */
export class EscalationPolicy {
  private readonly logger: Logger;
  private readonly noiseWords: Set<string>;
  private readonly hardMedications: readonly string[];
  private readonly dosingKeywords: readonly string[];
  private readonly medicalActions: readonly string[];

  constructor(lexicons: Lexicons, logger: Logger = defaultLogger) {
    this.logger = logger;
    this.noiseWords = new Set(lexicons.escalation.noise_words);
    this.hardMedications = lexicons.medications.hard_to_extract;
    this.dosingKeywords = lexicons.escalation.dosing_keywords;
    this.medicalActions = lexicons.escalation.medical_actions;
  }

  shouldEscalate(structure: ClinicalStructure, text: string, requestId?: string): boolean {
    return this.evaluate(structure, text, requestId).escalate;
  }

  evaluate(structure: ClinicalStructure, text: string, requestId?: string): EscalationDecision {
    const log = forRequest(this.logger, requestId);
    const totalEntities = countEntities(structure);
    const qualityEntities = this.countQualityEntities(structure);
    const lower = text.toLowerCase();

    const fire = (rule: EscalationRule, reason: string): EscalationDecision => {
      log.info({ rule, reason, totalEntities, qualityEntities }, 'Escalating to generative extraction');
      return { escalate: true, rule, reason, totalEntities, qualityEntities };
    };

    if (totalEntities === 0) {
      return fire('zero_yield', 'No entities extracted');
    }

    if (qualityEntities === 0) {
      return fire('noise_only', `All ${totalEntities} extracted entities are noise`);
    }

    const extracted = new Set(structure.medications.map((m) => m.name));
    const missed = this.hardMedications.find((name) => lower.includes(name) && !extracted.has(name));
    if (missed) {
      return fire('hard_medication_missed', `Text mentions ${missed} but it was not extracted`);
    }

    const dosing = this.dosingKeywords.find((keyword) => lower.includes(keyword));
    if (dosing && structure.medications.length === 0) {
      return fire('dosing_without_medication', `Dosing language "${dosing}" found but no medication extracted`);
    }

    const action = this.medicalActions.find((verb) => lower.includes(verb));
    if (action && qualityEntities < 2) {
      return fire('actions_without_quality', `Order verb "${action}" found with only ${qualityEntities} quality entities`);
    }

    if (patientNamePattern().test(text) && structure.patients.length === 0) {
      return fire('patient_name_missed', 'Patient name present but not extracted');
    }

    log.debug({ totalEntities, qualityEntities }, 'Pattern extraction accepted');
    return { escalate: false, rule: null, reason: null, totalEntities, qualityEntities };
  }

  private countQualityEntities(structure: ClinicalStructure): number {
    const names = [
      ...structure.medications.map((m) => m.name),
      ...structure.lab_tests.map((t) => t.name),
      ...structure.procedures.map((p) => p.name),
      ...structure.conditions.map((c) => c.name),
    ];
    return names.filter((name) => name.length > 2 && !this.noiseWords.has(name)).length;
  }
}
