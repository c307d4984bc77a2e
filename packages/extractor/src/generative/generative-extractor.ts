import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ConverseCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import { ClinicalStructureSchema } from '@clinorder/shared';
import type { ClinicalStructure, ParsedClinicalStructure, TokenUsage } from '@clinorder/shared';
import type { GenerativeConfig } from '../config.js';
import { GenerativeExtractionError, errorMessage } from '../errors.js';
import type { SourceGroundingValidator } from '../extraction/grounding-validator.js';
import { logger as defaultLogger, forRequest, type Logger } from '../logger.js';
import { createClinicalStructure } from '../models/clinical-structure.js';
import { createMedicationOrder } from '../models/medication-order.js';
import { createDiagnosticProcedure, createLabTest, createMedicalCondition } from '../models/orders.js';
import { PROMPT_VERSION, SYSTEM_PROMPT, buildUserPrompt } from './prompt-builder.js';
import { CLINICAL_STRUCTURE_TOOL_NAME, clinicalStructureToolConfig } from './tool-spec.js';

// ---------------------------------------------------------------------------
// Types for injected dependencies (loose to allow mocking in tests)
// ---------------------------------------------------------------------------

export interface ConverseResponseLike {
  output?: {
    message?: {
      content?: ContentBlockLike[];
    };
  };
  stopReason?: string;
  usage?: { inputTokens?: number; outputTokens?: number };
}

interface ContentBlockLike {
  text?: string;
  toolUse?: {
    toolUseId?: string;
    name?: string;
    input?: unknown;
  };
}

export type ConverseFn = (input: ConverseCommandInput, abortSignal: AbortSignal) => Promise<ConverseResponseLike>;

export interface GenerativeResult {
  structure: ClinicalStructure;
  usage: TokenUsage;
  /** Entities or fields removed by source grounding. */
  rejections: number;
}

export interface GenerativeExtractorStatus {
  available: boolean;
  reason: string | null;
  model_id: string | null;
  prompt_version: string;
  last_usage: TokenUsage | null;
}

/**
 * Model-backed extraction used when the pattern pass is escalated. Callers
 * check `isAvailable()` first; `extract` throws GenerativeExtractionError on
 * any failure.
 */
export interface GenerativeExtractor {
  isAvailable(): boolean;
  extract(text: string, requestId?: string): Promise<GenerativeResult>;
  getStatus(): GenerativeExtractorStatus;
}

export type CredentialsResolver = () => Promise<unknown>;

export function bedrockConverse(client: BedrockRuntimeClient): ConverseFn {
  return (input, abortSignal) => client.send(new ConverseCommand(input), { abortSignal });
}

export interface BedrockExtractorDeps {
  config: GenerativeConfig;
  converse: ConverseFn;
  validator: SourceGroundingValidator;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// BedrockGenerativeExtractor — one forced tool call per text
// ---------------------------------------------------------------------------

export class BedrockGenerativeExtractor implements GenerativeExtractor {
  private config: GenerativeConfig;
  private converse: ConverseFn;
  private validator: SourceGroundingValidator;
  private logger: Logger;
  private lastUsage: TokenUsage | null = null;

  constructor(deps: BedrockExtractorDeps) {
    this.config = deps.config;
    this.converse = deps.converse;
    this.validator = deps.validator;
    this.logger = deps.logger ?? defaultLogger;
  }

  isAvailable(): boolean {
    return true;
  }

  getStatus(): GenerativeExtractorStatus {
    return {
      available: true,
      reason: null,
      model_id: this.config.modelId,
      prompt_version: PROMPT_VERSION,
      last_usage: this.lastUsage,
    };
  }

  async extract(text: string, requestId?: string): Promise<GenerativeResult> {
    const log = forRequest(this.logger, requestId);

    if (text.length > this.config.maxInputChars) {
      throw new GenerativeExtractionError(
        `Input of ${text.length} characters exceeds the ${this.config.maxInputChars} character limit`,
      );
    }

    const input: ConverseCommandInput = {
      modelId: this.config.modelId,
      system: [{ text: SYSTEM_PROMPT }],
      messages: [{ role: 'user', content: [{ text: buildUserPrompt(text) }] }],
      toolConfig: clinicalStructureToolConfig,
      inferenceConfig: {
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      },
    };

    const start = performance.now();
    let response: ConverseResponseLike;
    try {
      response = await this.converse(input, AbortSignal.timeout(this.config.timeoutMs));
    } catch (err) {
      throw new GenerativeExtractionError(`Bedrock Converse call failed: ${errorMessage(err)}`, { cause: err });
    }

    const usage: TokenUsage = {
      input_tokens: response.usage?.inputTokens ?? 0,
      output_tokens: response.usage?.outputTokens ?? 0,
    };
    this.lastUsage = usage;

    const toolUse = response.output?.message?.content
      ?.find((block) => block.toolUse?.name === CLINICAL_STRUCTURE_TOOL_NAME)
      ?.toolUse;
    if (!toolUse) {
      throw new GenerativeExtractionError(
        `Model did not call ${CLINICAL_STRUCTURE_TOOL_NAME} (stop reason: ${response.stopReason ?? 'unknown'})`,
      );
    }

    const parsed = ClinicalStructureSchema.safeParse(toolUse.input ?? {});
    if (!parsed.success) {
      throw new GenerativeExtractionError(
        `Tool input does not match the clinical structure schema: ${parsed.error.message}`,
        { cause: parsed.error },
      );
    }

    const report = this.validator.validateWithReport(this.build(parsed.data, log), text, requestId);

    log.info(
      {
        modelId: this.config.modelId,
        ...usage,
        rejected: report.rejections.length,
        durationMs: Math.round(performance.now() - start),
      },
      'Generative extraction finished',
    );

    return { structure: report.structure, usage, rejections: report.rejections.length };
  }

  // Entities with an empty name are dropped rather than failing the call.
  private build(parsed: ParsedClinicalStructure, log: Logger): ClinicalStructure {
    const keep = <T>(entity: string, build: () => T): T[] => {
      try {
        return [build()];
      } catch (err) {
        log.warn({ entity, err: errorMessage(err) }, 'Dropping invalid entity from model output');
        return [];
      }
    };

    return createClinicalStructure(
      {
        medications: parsed.medications.flatMap((med) =>
          keep('medication', () =>
            createMedicationOrder(
              {
                name: med.name,
                dosage: med.dosage,
                frequency: med.frequency,
                route: med.route,
                indication: med.indication,
                duration: med.duration,
                special_instructions: med.special_instructions,
              },
              log,
            ),
          ),
        ),
        lab_tests: parsed.lab_tests.flatMap((test) => keep('lab_test', () => createLabTest(test))),
        procedures: parsed.procedures.flatMap((procedure) =>
          keep('procedure', () => createDiagnosticProcedure(procedure)),
        ),
        conditions: parsed.conditions.flatMap((condition) =>
          keep('condition', () => createMedicalCondition(condition)),
        ),
        patients: parsed.patients,
        clinical_instructions: parsed.clinical_instructions,
        urgency_level: parsed.urgency_level,
        clinical_setting: parsed.clinical_setting,
        patient_safety_alerts: parsed.patient_safety_alerts,
      },
      log,
    );
  }
}

// ---------------------------------------------------------------------------
// DisabledGenerativeExtractor — used when Bedrock is not configured
// ---------------------------------------------------------------------------

export class DisabledGenerativeExtractor implements GenerativeExtractor {
  private reason: string;

  constructor(reason: string) {
    this.reason = reason;
  }

  isAvailable(): boolean {
    return false;
  }

  getStatus(): GenerativeExtractorStatus {
    return {
      available: false,
      reason: this.reason,
      model_id: null,
      prompt_version: PROMPT_VERSION,
      last_usage: null,
    };
  }

  async extract(): Promise<GenerativeResult> {
    throw new GenerativeExtractionError(`Generative extraction unavailable: ${this.reason}`);
  }
}

export interface GenerativeExtractorOptions {
  validator: SourceGroundingValidator;
  logger?: Logger;
  /** Overrides the SDK client; credentials are then not resolved. */
  converse?: ConverseFn;
  /** Defaults to the Bedrock client's default credential provider chain. */
  resolveCredentials?: CredentialsResolver;
}

/**
 * Resolve the extractor once at startup. Credentials come from the AWS SDK's
 * default provider chain (environment, shared profile files, SSO, container
 * and instance roles); if the chain yields nothing the extractor is disabled.
 */
export async function createGenerativeExtractor(
  config: GenerativeConfig,
  options: GenerativeExtractorOptions,
): Promise<GenerativeExtractor> {
  const log = options.logger ?? defaultLogger;

  if (!config.enabled) {
    log.info('Generative extraction disabled by configuration');
    return new DisabledGenerativeExtractor('disabled by configuration');
  }

  let converse = options.converse;
  if (!converse) {
    const client = new BedrockRuntimeClient({ region: config.region });
    const resolveCredentials = options.resolveCredentials ?? (() => client.config.credentials());
    try {
      await resolveCredentials();
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'No AWS credentials resolved; generative extraction unavailable');
      return new DisabledGenerativeExtractor('no AWS credentials');
    }
    converse = bedrockConverse(client);
  }

  return new BedrockGenerativeExtractor({
    config,
    converse,
    validator: options.validator,
    logger: log,
  });
}
