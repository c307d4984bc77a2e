/**
 * Unit tests for the generative extractor. The Converse call is injected, so
 * no Bedrock client or network is involved.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../config.js';
import { GenerativeExtractionError } from '../../errors.js';
import { SourceGroundingValidator } from '../../extraction/grounding-validator.js';
import {
  BedrockGenerativeExtractor,
  DisabledGenerativeExtractor,
  createGenerativeExtractor,
  type ConverseFn,
  type CredentialsResolver,
} from '../../generative/generative-extractor.js';
import { PROMPT_VERSION, SYSTEM_PROMPT, buildUserPrompt } from '../../generative/prompt-builder.js';
import {
  silentLogger,
  toolUseResponse,
  SCENARIO_NAMED_PATIENT,
  SCENARIO_NO_DOSAGE,
} from '../helpers/fixtures.js';

const generativeConfig = loadConfig({}).generative;
const validator = new SourceGroundingValidator(silentLogger);

let converse: Mock<ConverseFn>;
let extractor: BedrockGenerativeExtractor;

beforeEach(() => {
  converse = vi.fn<ConverseFn>();
  extractor = new BedrockGenerativeExtractor({
    config: generativeConfig,
    converse,
    validator,
    logger: silentLogger,
  });
});

describe('BedrockGenerativeExtractor', () => {
  it('forces a single call to the clinical structure tool', async () => {
    converse.mockResolvedValue(toolUseResponse({ medications: [], conditions: [], patients: [] }));

    await extractor.extract(SCENARIO_NAMED_PATIENT, 'req-1');

    expect(converse).toHaveBeenCalledTimes(1);
    expect(converse).toHaveBeenCalledWith(
      expect.objectContaining({
        modelId: 'anthropic.claude-3-5-haiku-20241022-v1:0',
        system: [{ text: SYSTEM_PROMPT }],
        messages: [{ role: 'user', content: [{ text: buildUserPrompt(SCENARIO_NAMED_PATIENT) }] }],
        inferenceConfig: { maxTokens: 2000, temperature: 0 },
        toolConfig: expect.objectContaining({
          toolChoice: { tool: { name: 'record_clinical_structure' } },
        }),
      }),
      expect.any(AbortSignal),
    );
  });

  it('grounds the model output against the source text', async () => {
    converse.mockResolvedValue(
      toolUseResponse({
        medications: [{ name: 'Insulin', dosage: '10 units', frequency: null, route: null }],
        conditions: ['diabetes', { name: 'type 2 diabetes mellitus' }],
        patients: ['Unknown Patient'],
      }),
    );

    const result = await extractor.extract(SCENARIO_NO_DOSAGE);

    expect(result.structure.medications).toEqual([
      {
        name: 'insulin',
        dosage: null,
        frequency: null,
        route: 'unknown',
        indication: null,
        duration: null,
        special_instructions: [],
        safety_flag: true,
      },
    ]);
    expect(result.structure.conditions.map((c) => c.name)).toEqual(['diabetes']);
    expect(result.structure.patients).toEqual([]);
    expect(result.rejections).toBe(3);
    expect(result.usage).toEqual({ input_tokens: 1200, output_tokens: 150 });
  });

  it('keeps a fully grounded extraction intact', async () => {
    converse.mockResolvedValue(
      toolUseResponse({
        medications: [{ name: 'amoxicillin', dosage: '500mg', frequency: 'three times daily', route: 'oral' }],
        conditions: [{ name: 'acute bacterial sinusitis', status: 'active' }],
        patients: ['Mary Johnson'],
      }),
    );

    const { structure, rejections } = await extractor.extract(SCENARIO_NAMED_PATIENT);

    expect(rejections).toBe(0);
    expect(structure.medications[0]).toMatchObject({
      name: 'amoxicillin',
      dosage: '500mg',
      frequency: 'three times daily',
      route: 'oral',
      safety_flag: false,
    });
    expect(structure.conditions.map((c) => c.name)).toEqual(['acute bacterial sinusitis']);
    expect(structure.patients).toEqual(['Mary Johnson']);
  });

  it('drops entities with an empty name instead of failing', async () => {
    converse.mockResolvedValue(toolUseResponse({ medications: [{ name: '  ' }, { name: 'insulin' }] }));

    const { structure } = await extractor.extract(SCENARIO_NO_DOSAGE);
    expect(structure.medications.map((m) => m.name)).toEqual(['insulin']);
  });

  it('fails when the model does not call the tool', async () => {
    converse.mockResolvedValue({
      output: { message: { content: [{ text: 'I cannot help with that.' }] } },
      stopReason: 'end_turn',
    });

    await expect(extractor.extract(SCENARIO_NO_DOSAGE)).rejects.toThrow(
      'Model did not call record_clinical_structure (stop reason: end_turn)',
    );
  });

  it('fails when the tool input does not match the schema', async () => {
    converse.mockResolvedValue(toolUseResponse({ medications: [{ dosage: '5mg' }] }));

    await expect(extractor.extract(SCENARIO_NO_DOSAGE)).rejects.toThrow(
      /^Tool input does not match the clinical structure schema/,
    );
  });

  it('wraps transport errors', async () => {
    const cause = new Error('ThrottlingException');
    converse.mockRejectedValue(cause);

    const error = await extractor.extract(SCENARIO_NO_DOSAGE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerativeExtractionError);
    expect(error).toMatchObject({
      message: 'Bedrock Converse call failed: ThrottlingException',
      cause,
    });
  });

  it('rejects input longer than the configured limit without calling the model', async () => {
    const limited = new BedrockGenerativeExtractor({
      config: { ...generativeConfig, maxInputChars: 10 },
      converse,
      validator,
      logger: silentLogger,
    });

    await expect(limited.extract(SCENARIO_NO_DOSAGE)).rejects.toThrow(
      'Input of 32 characters exceeds the 10 character limit',
    );
    expect(converse).not.toHaveBeenCalled();
  });

  it('reports the last token usage in its status', async () => {
    expect(extractor.getStatus().last_usage).toBeNull();

    converse.mockResolvedValue(toolUseResponse({}, { inputTokens: 900, outputTokens: 40 }));
    await extractor.extract(SCENARIO_NO_DOSAGE);

    expect(extractor.getStatus()).toEqual({
      available: true,
      reason: null,
      model_id: 'anthropic.claude-3-5-haiku-20241022-v1:0',
      prompt_version: PROMPT_VERSION,
      last_usage: { input_tokens: 900, output_tokens: 40 },
    });
  });
});

describe('DisabledGenerativeExtractor', () => {
  it('is unavailable and refuses to extract', async () => {
    const disabled = new DisabledGenerativeExtractor('disabled by configuration');

    expect(disabled.isAvailable()).toBe(false);
    expect(disabled.getStatus().reason).toBe('disabled by configuration');
    await expect(disabled.extract()).rejects.toThrow(
      'Generative extraction unavailable: disabled by configuration',
    );
  });
});

describe('createGenerativeExtractor', () => {
  it('returns the disabled variant when switched off', async () => {
    const result = await createGenerativeExtractor(
      { ...generativeConfig, enabled: false },
      { validator, logger: silentLogger, converse },
    );
    expect(result).toBeInstanceOf(DisabledGenerativeExtractor);
  });

  it('returns the disabled variant when no credentials resolve', async () => {
    const resolveCredentials = vi.fn<CredentialsResolver>().mockRejectedValue(new Error('Could not load credentials from any providers'));

    const result = await createGenerativeExtractor(generativeConfig, {
      validator,
      logger: silentLogger,
      resolveCredentials,
    });

    expect(resolveCredentials).toHaveBeenCalledTimes(1);
    expect(result.isAvailable()).toBe(false);
    expect(result.getStatus().reason).toBe('no AWS credentials');
  });

  it('uses an injected converse function without resolving credentials', async () => {
    const resolveCredentials = vi.fn<CredentialsResolver>().mockRejectedValue(new Error('unreachable'));

    const result = await createGenerativeExtractor(generativeConfig, {
      validator,
      logger: silentLogger,
      converse,
      resolveCredentials,
    });

    expect(result).toBeInstanceOf(BedrockGenerativeExtractor);
    expect(resolveCredentials).not.toHaveBeenCalled();
  });

  describe('with the default credential chain', () => {
    const saved = { profile: process.env.AWS_PROFILE };
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'aws-'));
      const credentialsFile = join(dir, 'credentials');
      writeFileSync(credentialsFile, '[default]\naws_access_key_id = test-key\naws_secret_access_key = test-secret\n');

      delete process.env.AWS_PROFILE;
      vi.stubEnv('AWS_ACCESS_KEY_ID', '');
      vi.stubEnv('AWS_SECRET_ACCESS_KEY', '');
      vi.stubEnv('AWS_SHARED_CREDENTIALS_FILE', credentialsFile);
      vi.stubEnv('AWS_CONFIG_FILE', join(dir, 'config'));
    });

    afterEach(() => {
      vi.unstubAllEnvs();
      if (saved.profile !== undefined) process.env.AWS_PROFILE = saved.profile;
      rmSync(dir, { recursive: true, force: true });
    });

    it('is available with only a default profile in the shared credentials file', async () => {
      const result = await createGenerativeExtractor(generativeConfig, { validator, logger: silentLogger });

      expect(result).toBeInstanceOf(BedrockGenerativeExtractor);
      expect(result.getStatus()).toMatchObject({ available: true, reason: null });
    });
  });
});
