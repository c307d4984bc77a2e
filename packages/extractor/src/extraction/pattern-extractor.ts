import { escapeRegExp } from '@clinorder/shared';
import type {
  ClinicalStructure,
  ClinicalSetting,
  DiagnosticProcedure,
  LabTest,
  MedicalCondition,
  MedicationOrder,
  MedicationRoute,
  UrgencyLevel,
} from '@clinorder/shared';
import { errorMessage, type EntityKind } from '../errors.js';
import type { Lexicons } from '../lexicons.js';
import { logger as defaultLogger, forRequest, type Logger } from '../logger.js';
import { createMedicationOrder } from '../models/medication-order.js';
import {
  createLabTest,
  createDiagnosticProcedure,
  createMedicalCondition,
} from '../models/orders.js';
import { createClinicalStructure } from '../models/clinical-structure.js';
import {
  compileKeywordRules,
  firstKeywordMatch,
  patientNamePattern,
  wordAlternation,
  type CompiledKeywordRule,
} from './keywords.js';

// ---------------------------------------------------------------------------
// Pattern building blocks
// ---------------------------------------------------------------------------

const DOSE = String.raw`\d+\s*(?:mg|%|gram|tablet|capsule|ml|mcg|iu)`;
const ORDER_VERB = String.raw`(?:start|prescribe|give|administer|initiated|recommended)`;
const PATIENT_ON = String.raw`(?:patient\s+.*?\s+on\s+)?`;
const FREQUENCY_ADVERB = String.raw`(?:daily|twice\s+daily|three\s+times|once|bid|tid|qid|prn|orally|at\s+bedtime)`;
const FREQUENCY = String.raw`\b(daily|twice\s+daily|three\s+times\s+daily|once|bid|tid|qid|prn|at\s+bedtime|as\s+needed)\b`;

// A condition phrase runs until clause punctuation, a conjunction or a
// treatment noun, whichever comes first.
const CONDITION_PHRASE = String.raw`([a-z][a-z0-9'\-]*(?:\s+[a-z0-9'\-]+){0,5}?)`;
const CONDITION_END = String.raw`(?=\s*(?:[.;,:)]|$)|\s+(?:and|with|secondary\s+to|due\s+to|management|treatment|therapy|starting|on)\b)`;

const LAB_PATTERNS = [
  String.raw`\border\s+(.*?(?:level|panel|test|screen))`,
  String.raw`\b(cbc|complete\s+blood\s+count)\b`,
  String.raw`\b(comprehensive\s+metabolic\s+panel|cmp)\b`,
  String.raw`\b(hba1c|hemoglobin\s+a1c)\b`,
  String.raw`\b(lipid\s+panel)\b`,
  String.raw`\b(liver\s+function\s+.*?tests?)\b`,
  String.raw`\b(thyroid\s+.*?tests?|tsh)\b`,
  String.raw`\b(blood\s+cultures?)\b`,
  String.raw`\b(urinalysis|ua)\b`,
];

const PROCEDURE_PATTERNS = [
  String.raw`\border\s+(.*?\b(?:x-ray|ct|mri|ultrasound|scan|ecg|ekg))\b`,
  String.raw`\b(chest\s+x-ray)\b`,
  String.raw`\b(ct\s+scan)\b`,
  String.raw`\b(mri)\b`,
  String.raw`\b(ultrasound)\b`,
  String.raw`\b(ecg|ekg|electrocardiogram)\b`,
  String.raw`\b(endoscopy)\b`,
  String.raw`\b(biopsy)\b`,
  String.raw`\b(holter\s+monitor)\b`,
  String.raw`\b(pulmonary\s+function\s+tests?)\b`,
];

const BODY_SITE = /^\s+of\s+(?:the\s+)?([a-z]+)/i;

const INSTRUCTION_VERBS = ['take', 'start', 'continue', 'stop', 'follow', 'monitor', 'schedule'];
const ALERT_LEADS = [String.raw`allergy\s+to`, 'contraindicated', 'caution', 'warning', 'avoid'];

interface MedicationTemplate {
  id: string;
  pattern: RegExp;
  nameGroup: number;
  dosageGroup?: number;
}

function templates(knownDrugs: RegExp | null): MedicationTemplate[] {
  const list: MedicationTemplate[] = [
    { id: 'verb_dose_name', pattern: new RegExp(String.raw`${ORDER_VERB}\s+${PATIENT_ON}(${DOSE})\s+(\w+)`, 'gi'), nameGroup: 2, dosageGroup: 1 },
    { id: 'verb_name_dose', pattern: new RegExp(String.raw`${ORDER_VERB}\s+${PATIENT_ON}(\w+)\s+(${DOSE})`, 'gi'), nameGroup: 1, dosageGroup: 2 },
    { id: 'name_dose_frequency', pattern: new RegExp(String.raw`\b(\w+)\s+(${DOSE})\s+${FREQUENCY_ADVERB}`, 'gi'), nameGroup: 1, dosageGroup: 2 },
    { id: 'inhaler_puffs', pattern: /\b(\w+)\s+inhaler\s+(\d+\s+puffs?)/gi, nameGroup: 1, dosageGroup: 2 },
    { id: 'topical_form', pattern: /\b(\w+)\s+(?:topical\s+cream|patch|gel)\b/gi, nameGroup: 1 },
  ];
  if (knownDrugs) {
    list.push({ id: 'known_drug', pattern: knownDrugs, nameGroup: 1 });
  }
  list.push(
    { id: 'monoclonal_antibody', pattern: /\b(RSV\s+monoclonal\s+antibody|monoclonal\s+antibody)\b/gi, nameGroup: 1 },
    { id: 'extended_release', pattern: /\b(\w+)\s+(?:XL|SR|CR|LA)\s+\d+\s*(?:mg|%|tablet)/gi, nameGroup: 1 },
    { id: 'patch', pattern: /\b(\w+)\s+patch\b/gi, nameGroup: 1 },
    { id: 'vaginal_or_cream', pattern: /\b(\w+)\s+(?:vaginal\s+gel|topical\s+cream)/gi, nameGroup: 1 },
  );
  return list;
}

function captures(text: string, pattern: RegExp): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(pattern)) {
    const value = match[1]?.trim();
    if (value) found.push(value);
  }
  return found;
}

// ---------------------------------------------------------------------------
// PatternExtractor — deterministic first pass over the order text
// ---------------------------------------------------------------------------

/**
 * Rule-based extraction of medications, lab tests, procedures, conditions,
 * patient names, instructions and safety alerts.
 *
 * Every value it returns is a substring of the input, so its output is not
 * run through source grounding. `extract` never throws: a failing entity is
 * skipped and a failing section yields an empty list.
 *
 * Medications are not de-duplicated; overlapping templates can report the
 * same drug more than once.
 */
export class PatternExtractor {
  private readonly logger: Logger;
  private readonly medicationTemplates: MedicationTemplate[];
  private readonly medicationStopwords: Set<string>;
  private readonly labPatterns: RegExp[];
  private readonly procedurePatterns: RegExp[];
  private readonly genericConditionPatterns: RegExp[];
  private readonly lexiconConditionPatterns: RegExp[];
  private readonly conditionStopwords: Set<string>;
  private readonly routes: CompiledKeywordRule<MedicationRoute>[];
  private readonly orderUrgency: CompiledKeywordRule<UrgencyLevel>[];
  private readonly documentUrgency: CompiledKeywordRule<UrgencyLevel>[];
  private readonly settings: CompiledKeywordRule<ClinicalSetting>[];
  private readonly safetyKeywords: string[];

  constructor(lexicons: Lexicons, logger: Logger = defaultLogger) {
    this.logger = logger;

    this.medicationTemplates = templates(wordAlternation(lexicons.medications.known, 'gi'));
    this.medicationStopwords = new Set(lexicons.medications.name_stopwords);

    this.labPatterns = LAB_PATTERNS.map((source) => new RegExp(source, 'gi'));
    this.procedurePatterns = PROCEDURE_PATTERNS.map((source) => new RegExp(source, 'gi'));

    this.genericConditionPatterns = [
      String.raw`\bfor\s+${CONDITION_PHRASE}${CONDITION_END}`,
      String.raw`\bdiagnosis\s+of\s+${CONDITION_PHRASE}${CONDITION_END}`,
      String.raw`\bpatient\s+(?:has|with)\s+${CONDITION_PHRASE}${CONDITION_END}`,
    ].map((source) => new RegExp(source, 'gim'));
    this.lexiconConditionPatterns = [
      wordAlternation(lexicons.conditions.complex_phrases, 'gi'),
      wordAlternation(lexicons.conditions.common, 'gi'),
    ].filter((pattern): pattern is RegExp => pattern !== null);
    this.conditionStopwords = new Set(lexicons.conditions.stopwords);

    this.routes = compileKeywordRules(lexicons.context.routes);
    this.orderUrgency = compileKeywordRules(lexicons.context.order_urgency);
    this.documentUrgency = compileKeywordRules(lexicons.context.document_urgency);
    this.settings = compileKeywordRules(lexicons.context.settings);
    this.safetyKeywords = lexicons.context.safety_keywords;
  }

  extract(text: string, requestId?: string): ClinicalStructure {
    const log = forRequest(this.logger, requestId);
    const start = performance.now();

    const structure = createClinicalStructure(
      {
        medications: this.section(log, 'medications', () => this.extractMedications(text, log)),
        lab_tests: this.section(log, 'lab_tests', () => this.extractLabTests(text, log)),
        procedures: this.section(log, 'procedures', () => this.extractProcedures(text, log)),
        conditions: this.section(log, 'conditions', () => this.extractConditions(text, log)),
        patients: this.section(log, 'patients', () => this.extractPatients(text)),
        clinical_instructions: this.section(log, 'clinical_instructions', () => this.extractInstructions(text)),
        urgency_level: firstKeywordMatch(this.documentUrgency, text) ?? 'routine',
        clinical_setting: firstKeywordMatch(this.settings, text) ?? 'outpatient',
        patient_safety_alerts: this.section(log, 'patient_safety_alerts', () => this.extractSafetyAlerts(text)),
      },
      log,
    );

    log.debug(
      {
        medications: structure.medications.length,
        labTests: structure.lab_tests.length,
        procedures: structure.procedures.length,
        conditions: structure.conditions.length,
        durationMs: Math.round(performance.now() - start),
      },
      'Pattern extraction finished',
    );
    return structure;
  }

  // --- Medications ---------------------------------------------------------

  private extractMedications(text: string, log: Logger): MedicationOrder[] {
    // Route is a document-level signal: the first route keyword anywhere wins.
    const route = firstKeywordMatch(this.routes, text) ?? 'unknown';
    const orders: MedicationOrder[] = [];

    for (const template of this.medicationTemplates) {
      for (const match of text.matchAll(template.pattern)) {
        const name = match[template.nameGroup]?.trim() ?? '';
        if (name.length < 3 || this.medicationStopwords.has(name.toLowerCase())) {
          continue;
        }

        const captured = template.dosageGroup === undefined
          ? undefined
          : match[template.dosageGroup]?.trim();
        const dosage = captured || this.findDosage(text, name);
        const frequency = this.findFrequency(text, name);

        const order = this.tryBuild(log, 'medication', name, () =>
          createMedicationOrder({ name, dosage, frequency, route }, log),
        );
        if (order) orders.push(order);
      }
    }
    return orders;
  }

  private findDosage(text: string, name: string): string | null {
    const match = new RegExp(`${escapeRegExp(name)}\\s+(${DOSE})`, 'i').exec(text);
    return match?.[1] ?? null;
  }

  private findFrequency(text: string, name: string): string | null {
    const match = new RegExp(`${escapeRegExp(name)}.*?${FREQUENCY}`, 'i').exec(text);
    return match?.[1] ?? null;
  }

  // --- Lab tests and procedures ------------------------------------------

  private extractLabTests(text: string, log: Logger): LabTest[] {
    const urgency = firstKeywordMatch(this.orderUrgency, text) ?? 'routine';
    const fasting = /\bfasting\b/i.test(text);
    const tests: LabTest[] = [];

    for (const pattern of this.labPatterns) {
      for (const name of captures(text, pattern)) {
        const test = this.tryBuild(log, 'lab_test', name, () =>
          createLabTest({ name, urgency, fasting_required: fasting }),
        );
        if (test) tests.push(test);
      }
    }
    return tests;
  }

  private extractProcedures(text: string, log: Logger): DiagnosticProcedure[] {
    const urgency = firstKeywordMatch(this.orderUrgency, text) ?? 'routine';
    const contrast = /\bcontrast\b/i.test(text) && !/\b(?:without|no)\s+contrast\b/i.test(text);
    const procedures: DiagnosticProcedure[] = [];

    for (const pattern of this.procedurePatterns) {
      for (const match of text.matchAll(pattern)) {
        const name = match[1]?.trim() ?? '';
        const end = (match.index ?? 0) + match[0].length;
        const bodySite = BODY_SITE.exec(text.slice(end))?.[1] ?? null;

        const procedure = this.tryBuild(log, 'procedure', name, () =>
          createDiagnosticProcedure({ name, urgency, contrast_needed: contrast, body_site: bodySite }),
        );
        if (procedure) procedures.push(procedure);
      }
    }
    return procedures;
  }

  // --- Conditions ----------------------------------------------------------

  private extractConditions(text: string, log: Logger): MedicalCondition[] {
    const byName = new Map<string, MedicalCondition>();

    for (const pattern of [...this.genericConditionPatterns, ...this.lexiconConditionPatterns]) {
      for (const name of captures(text, pattern)) {
        const key = name.toLowerCase();
        if (byName.has(key) || this.isNonCondition(key)) continue;

        const condition = this.tryBuild(log, 'condition', name, () =>
          createMedicalCondition({ name, status: 'active' }),
        );
        if (condition) byName.set(key, condition);
      }
    }
    return [...byName.values()];
  }

  /** "routine monitoring" is as much a non-condition as "routine". */
  private isNonCondition(name: string): boolean {
    return name.split(/\s+/).some((word) => this.conditionStopwords.has(word));
  }

  // --- Patients, instructions, alerts ------------------------------------

  private extractPatients(text: string): string[] {
    return [...new Set(captures(text, patientNamePattern('g')))];
  }

  private extractInstructions(text: string): string[] {
    return INSTRUCTION_VERBS.flatMap((verb) =>
      captures(text, new RegExp(String.raw`\b(${verb}\s+.*?)(?=\.|\bfor\b|$)`, 'gim'))
        .filter((clause) => clause.length > verb.length),
    );
  }

  private extractSafetyAlerts(text: string): string[] {
    const alerts = ALERT_LEADS.flatMap((lead) =>
      captures(text, new RegExp(String.raw`\b(${lead}\b.*?)(?=\.|$)`, 'gim')),
    );

    const lower = text.toLowerCase();
    for (const keyword of this.safetyKeywords) {
      if (lower.includes(keyword)) {
        alerts.push(`Consider ${keyword}`);
      }
    }
    return alerts;
  }

  // --- Failure containment -----------------------------------------------

  private tryBuild<T>(log: Logger, entity: EntityKind, name: string, build: () => T): T | null {
    try {
      return build();
    } catch (err) {
      log.warn({ entity, name, err: errorMessage(err) }, 'Skipping entity that failed validation');
      return null;
    }
  }

  private section<T>(log: Logger, section: string, run: () => T[]): T[] {
    try {
      return run();
    } catch (err) {
      log.error({ err, section }, 'Pattern extraction section failed');
      return [];
    }
  }
}
