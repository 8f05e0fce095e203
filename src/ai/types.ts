import { z } from 'zod';
import { InvalidConfigError } from '../utils/pipelineError';

export const TONES = ['neutral', 'formal', 'informal', 'technical'] as const;
export type Tone = (typeof TONES)[number];

export const UNIT_MODES = ['segment', 'paragraph'] as const;
export type UnitMode = (typeof UNIT_MODES)[number];

export const AUTO_DETECT = 'auto';

export const translationConfigSchema = z.object({
  sourceLanguage: z.string().trim().optional(),
  targetLanguage: z.string().trim().min(1).default('German'),
  // Unrecognised tones are kept so the prompt can fall back to the neutral clause
  tone: z.string().trim().toLowerCase().default('neutral'),
  domain: z.string().trim().optional(),
  glossary: z.string().optional(),
  context: z.string().default(''),
  maxChunkLength: z.number().int().positive().default(5000),
  overlap: z.number().int().nonnegative().default(200),
  maxContextLength: z.number().int().nonnegative().default(1000),
  unitMode: z.enum(UNIT_MODES).default('segment'),
  abortOnFailure: z.boolean().default(false),
  unitTimeoutMs: z.number().int().positive().default(120_000),
});

export type TranslationConfigInput = z.input<typeof translationConfigSchema>;
export type TranslationConfig = z.output<typeof translationConfigSchema>;

export const resolveTranslationConfig = (input: TranslationConfigInput = {}): TranslationConfig => {
  const parsed = translationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(`Invalid translation config: ${details}`, parsed.error);
  }
  return parsed.data;
};

export const isAutoDetect = (sourceLanguage?: string): boolean =>
  !sourceLanguage || sourceLanguage.toLowerCase() === AUTO_DETECT;

export type TranslationRequest = {
  text: string;
  /** Empty when the language could not be determined; the model infers it */
  sourceLanguage: string;
  targetLanguage: string;
  tone: string;
  domain?: string;
  glossary?: string;
  context: string;
  signal?: AbortSignal;
};

/**
 * The translation model seen from the pipeline. Resolves to `null` (or an empty
 * string) when no usable translation came back.
 */
export interface TranslationCapability {
  translate(request: TranslationRequest): Promise<string | null>;
}

export interface LanguageDetector {
  /** Resolves to an ISO 639-1 code; rejects when the language cannot be determined. */
  detect(text: string, signal?: AbortSignal): Promise<string>;
}
