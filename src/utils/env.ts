import dotenv from 'dotenv';

dotenv.config();

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  return value.toLowerCase() === 'true' || value === '1';
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? '',
  aiProvider: (process.env.AI_PROVIDER ?? 'openai').toLowerCase(),
  openAiApiKey: process.env.OPENAI_API_KEY ?? '',
  openAiBaseUrl: process.env.OPENAI_BASE_URL ?? '',
  openAiModel: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
  llmTemperature: numberFromEnv(process.env.LLM_TEMPERATURE, 0),
  aiMaxRetries: numberFromEnv(process.env.AI_MAX_RETRIES, 3),
  aiRetryDelayMs: numberFromEnv(process.env.AI_RETRY_DELAY_MS, 500),
  sourceLanguage: process.env.SOURCE_LANGUAGE ?? 'auto',
  targetLanguage: process.env.TARGET_LANGUAGE ?? 'German',
  tone: process.env.TRANSLATION_TONE ?? 'neutral',
  domain: process.env.TRANSLATION_DOMAIN ?? '',
  glossary: process.env.TRANSLATION_GLOSSARY ?? '',
  maxChunkLength: numberFromEnv(process.env.MAX_CHUNK_LENGTH, 5000),
  chunkOverlap: numberFromEnv(process.env.CHUNK_OVERLAP, 200),
  maxContextLength: numberFromEnv(process.env.MAX_CONTEXT_LENGTH, 1000),
  unitTimeoutMs: numberFromEnv(process.env.UNIT_TIMEOUT_MS, 120_000),
  abortOnFailure: booleanFromEnv(process.env.ABORT_ON_FAILURE, false),
};
