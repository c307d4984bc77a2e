import { randomUUID } from 'node:crypto';
import type {
  ClinicalStructure,
  EscalationSummary,
  ExtractionMethod,
  ProcessingEnvelope,
  TokenUsage,
} from '@clinorder/shared';
import { config as defaultConfig, type ExtractorConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { EscalationPolicy } from '../extraction/escalation-policy.js';
import { SourceGroundingValidator } from '../extraction/grounding-validator.js';
import { PatternExtractor } from '../extraction/pattern-extractor.js';
import {
  createGenerativeExtractor,
  type ConverseFn,
  type CredentialsResolver,
  type GenerativeExtractor,
} from '../generative/generative-extractor.js';
import { loadLexicons, type Lexicons } from '../lexicons.js';
import { logger as defaultLogger, forRequest, type Logger } from '../logger.js';
import { emptyClinicalStructure } from '../models/clinical-structure.js';

export interface PipelineStatus {
  initialized: boolean;
  method: 'regex_with_llm_escalation' | 'regex_only';
  api_available: boolean;
  fallback_active: boolean;
  model_id: string | null;
  prompt_version: string;
}

export interface ExtractionPipelineDeps {
  patternExtractor: PatternExtractor;
  escalationPolicy: EscalationPolicy;
  generativeExtractor: GenerativeExtractor;
  logger?: Logger;
}

/**
 * Runs the pattern pass, asks the escalation policy whether the result is
 * good enough, and hands weak results to the generative extractor when one
 * is available. `process` always resolves with an envelope.
 */
export class ExtractionPipeline {
  private patternExtractor: PatternExtractor;
  private escalationPolicy: EscalationPolicy;
  private generativeExtractor: GenerativeExtractor;
  private logger: Logger;

  constructor(deps: ExtractionPipelineDeps) {
    this.patternExtractor = deps.patternExtractor;
    this.escalationPolicy = deps.escalationPolicy;
    this.generativeExtractor = deps.generativeExtractor;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * @param entities Pre-extracted entities from an upstream stage. Accepted
   * for interface compatibility and not used.
   */
  async process(
    text: string,
    entities: readonly unknown[] = [],
    requestId: string = randomUUID(),
  ): Promise<ProcessingEnvelope> {
    const log = forRequest(this.logger, requestId);
    const start = performance.now();
    const elapsed = () => performance.now() - start;

    log.debug({ chars: text.length, upstreamEntities: entities.length }, 'Extraction started');

    try {
      let structure: ClinicalStructure = this.patternExtractor.extract(text, requestId);
      let method: ExtractionMethod = 'regex_enhanced';
      let escalation: EscalationSummary | undefined;
      let tokenUsage: TokenUsage | undefined;

      const decision = this.escalationPolicy.evaluate(structure, text, requestId);
      if (decision.escalate) {
        escalation = { escalate: true, rule: decision.rule, reason: decision.reason ?? '' };

        if (this.generativeExtractor.isAvailable()) {
          const result = await this.generativeExtractor.extract(text, requestId);
          structure = result.structure;
          tokenUsage = result.usage;
          method = 'escalated_to_llm';
        } else {
          log.info({ rule: decision.rule }, 'Escalation requested but generative extraction unavailable');
        }
      }

      const envelope: ProcessingEnvelope = {
        structured_output: structure,
        processing_time_ms: elapsed(),
        method,
        status: 'completed',
        ...(escalation && { escalation }),
        ...(tokenUsage && { token_usage: tokenUsage }),
      };
      log.info({ method, durationMs: Math.round(envelope.processing_time_ms) }, 'Extraction completed');
      return envelope;
    } catch (err) {
      const message = errorMessage(err);
      log.error({ err }, 'Extraction failed');
      return {
        structured_output: emptyClinicalStructure(),
        processing_time_ms: elapsed(),
        method: 'fallback',
        status: 'failed',
        error: message,
      };
    }
  }

  getStatus(): PipelineStatus {
    const generative = this.generativeExtractor.getStatus();
    return {
      initialized: true,
      method: generative.available ? 'regex_with_llm_escalation' : 'regex_only',
      api_available: generative.available,
      fallback_active: !generative.available,
      model_id: generative.model_id,
      prompt_version: generative.prompt_version,
    };
  }
}

export interface CreatePipelineOptions {
  config?: ExtractorConfig;
  lexicons?: Lexicons;
  logger?: Logger;
  converse?: ConverseFn;
  resolveCredentials?: CredentialsResolver;
  generativeExtractor?: GenerativeExtractor;
}

/** Wire a pipeline from configuration; each call builds fresh components. */
export async function createExtractionPipeline(options: CreatePipelineOptions = {}): Promise<ExtractionPipeline> {
  const config = options.config ?? defaultConfig;
  const logger = options.logger ?? defaultLogger;
  const lexicons = options.lexicons ?? loadLexicons(config.lexiconDir);

  const generativeExtractor = options.generativeExtractor
    ?? await createGenerativeExtractor(config.generative, {
      validator: new SourceGroundingValidator(logger),
      logger,
      converse: options.converse,
      resolveCredentials: options.resolveCredentials,
    });

  return new ExtractionPipeline({
    patternExtractor: new PatternExtractor(lexicons, logger),
    escalationPolicy: new EscalationPolicy(lexicons, logger),
    generativeExtractor,
    logger,
  });
}
