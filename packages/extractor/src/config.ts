import { fileURLToPath } from 'node:url';

const defaultLexiconDir = fileURLToPath(new URL('../data/', import.meta.url));

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    logLevel: env.LOG_LEVEL ?? 'info',
    lexiconDir: env.LEXICON_DIR ?? defaultLexiconDir,

    generative: {
      enabled: (env.GENERATIVE_EXTRACTION_ENABLED ?? 'true') !== 'false',
      region: env.AWS_REGION ?? 'us-east-1',
      modelId: env.BEDROCK_MODEL_ID ?? 'anthropic.claude-3-5-haiku-20241022-v1:0',
      temperature: floatFromEnv(env.GENERATIVE_TEMPERATURE, 0),
      maxTokens: intFromEnv(env.GENERATIVE_MAX_TOKENS, 2000),
      timeoutMs: intFromEnv(env.GENERATIVE_TIMEOUT_MS, 30_000),
      maxInputChars: intFromEnv(env.GENERATIVE_MAX_INPUT_CHARS, 8000),
    },
  } as const;
}

export type ExtractorConfig = ReturnType<typeof loadConfig>;
export type GenerativeConfig = ExtractorConfig['generative'];

export const config = loadConfig();
