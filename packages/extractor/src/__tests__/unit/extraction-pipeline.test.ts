import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../../config.js';
import { GenerativeExtractionError } from '../../errors.js';
import {
  DisabledGenerativeExtractor,
  type ConverseFn,
  type GenerativeExtractor,
  type GenerativeResult,
} from '../../generative/generative-extractor.js';
import { PROMPT_VERSION } from '../../generative/prompt-builder.js';
import { createClinicalStructure, emptyClinicalStructure } from '../../models/clinical-structure.js';
import { createMedicationOrder } from '../../models/medication-order.js';
import { createExtractionPipeline } from '../../pipeline/extraction-pipeline.js';
import {
  silentLogger,
  testLexicons,
  toolUseResponse,
  SCENARIO_NAMED_PATIENT,
  SCENARIO_NON_CLINICAL,
} from '../helpers/fixtures.js';

const generated: GenerativeResult = {
  structure: createClinicalStructure(
    { medications: [createMedicationOrder({ name: 'aspirin', dosage: '81mg', frequency: 'daily' }, silentLogger)] },
    silentLogger,
  ),
  usage: { input_tokens: 800, output_tokens: 60 },
  rejections: 0,
};

function availableExtractor(extract: GenerativeExtractor['extract']): GenerativeExtractor {
  return {
    isAvailable: () => true,
    extract,
    getStatus: () => ({
      available: true,
      reason: null,
      model_id: 'test-model',
      prompt_version: PROMPT_VERSION,
      last_usage: null,
    }),
  };
}

function pipelineWith(generativeExtractor: GenerativeExtractor) {
  return createExtractionPipeline({ lexicons: testLexicons(), logger: silentLogger, generativeExtractor });
}

describe('ExtractionPipeline', () => {
  it('returns the pattern result when escalation is not needed', async () => {
    const extract = vi.fn<GenerativeExtractor['extract']>().mockResolvedValue(generated);
    const pipeline = await pipelineWith(availableExtractor(extract));
    const envelope = await pipeline.process(SCENARIO_NAMED_PATIENT);

    expect(envelope.status).toBe('completed');
    expect(envelope.method).toBe('regex_enhanced');
    expect(envelope.escalation).toBeUndefined();
    expect(envelope.token_usage).toBeUndefined();
    expect(envelope.structured_output.patients).toEqual(['Mary Johnson']);
    expect(envelope.processing_time_ms).toBeGreaterThanOrEqual(0);
    expect(extract).not.toHaveBeenCalled();
  });

  it('keeps the pattern result when escalation is wanted but unavailable', async () => {
    const pipeline = await pipelineWith(new DisabledGenerativeExtractor('disabled by configuration'));
    const envelope = await pipeline.process(SCENARIO_NON_CLINICAL);

    expect(envelope).toMatchObject({
      status: 'completed',
      method: 'regex_enhanced',
      escalation: { escalate: true, rule: 'zero_yield', reason: 'No entities extracted' },
    });
    expect(envelope.structured_output).toEqual(emptyClinicalStructure());
    expect(envelope.error).toBeUndefined();
  });

  it('replaces the pattern result with the generative one on escalation', async () => {
    const extract = vi.fn<GenerativeExtractor['extract']>().mockResolvedValue(generated);
    const pipeline = await pipelineWith(availableExtractor(extract));
    const envelope = await pipeline.process(SCENARIO_NON_CLINICAL, [], 'req-42');

    expect(extract).toHaveBeenCalledWith(SCENARIO_NON_CLINICAL, 'req-42');
    expect(envelope.method).toBe('escalated_to_llm');
    expect(envelope.structured_output).toBe(generated.structure);
    expect(envelope.token_usage).toEqual({ input_tokens: 800, output_tokens: 60 });
  });

  it('degrades to an empty failed envelope when generation throws', async () => {
    const extract = vi
      .fn<GenerativeExtractor['extract']>()
      .mockRejectedValue(new GenerativeExtractionError('Bedrock Converse call failed: timeout'));
    const pipeline = await pipelineWith(availableExtractor(extract));
    const envelope = await pipeline.process(SCENARIO_NON_CLINICAL);

    expect(envelope).toEqual({
      structured_output: emptyClinicalStructure(),
      processing_time_ms: expect.any(Number),
      method: 'fallback',
      status: 'failed',
      error: 'Bedrock Converse call failed: timeout',
    });
  });

  it('grounds generative output end to end', async () => {
    const converse = vi.fn<ConverseFn>().mockResolvedValue(
      toolUseResponse({
        medications: [{ name: 'tadalafil', dosage: '20mg', frequency: 'daily' }],
        conditions: ['erectile dysfunction'],
        patients: ['John Doe'],
      }),
    );
    const config = loadConfig({ GENERATIVE_EXTRACTION_ENABLED: 'true' });
    const pipeline = await createExtractionPipeline({ config, lexicons: testLexicons(), logger: silentLogger, converse });

    const envelope = await pipeline.process('Take tadalafil20mg for erectile dysfunction.');

    expect(envelope.method).toBe('escalated_to_llm');
    expect(envelope.escalation?.rule).toBe('hard_medication_missed');
    expect(envelope.structured_output.medications).toEqual([
      expect.objectContaining({ name: 'tadalafil', dosage: '20mg', frequency: null, safety_flag: true }),
    ]);
    expect(envelope.structured_output.conditions.map((c) => c.name)).toEqual(['erectile dysfunction']);
    expect(envelope.structured_output.patients).toEqual([]);
    expect(envelope.token_usage).toEqual({ input_tokens: 1200, output_tokens: 150 });
  });

  describe('getStatus', () => {
    it('reports regex-only operation when generation is disabled', async () => {
      const config = loadConfig({ GENERATIVE_EXTRACTION_ENABLED: 'false' });
      const pipeline = await createExtractionPipeline({ config, lexicons: testLexicons(), logger: silentLogger });

      expect(pipeline.getStatus()).toEqual({
        initialized: true,
        method: 'regex_only',
        api_available: false,
        fallback_active: true,
        model_id: null,
        prompt_version: PROMPT_VERSION,
      });
    });

    it('falls back to regex-only operation when no credentials resolve', async () => {
      const config = loadConfig({ GENERATIVE_EXTRACTION_ENABLED: 'true' });
      const pipeline = await createExtractionPipeline({
        config,
        lexicons: testLexicons(),
        logger: silentLogger,
        resolveCredentials: () => Promise.reject(new Error('Could not load credentials from any providers')),
      });

      expect(pipeline.getStatus()).toMatchObject({ method: 'regex_only', api_available: false });
    });

    it('reports the model when generation is available', async () => {
      const pipeline = await pipelineWith(availableExtractor(vi.fn<GenerativeExtractor['extract']>()));

      expect(pipeline.getStatus()).toMatchObject({
        method: 'regex_with_llm_escalation',
        api_available: true,
        fallback_active: false,
        model_id: 'test-model',
      });
    });
  });
});
