import { logger } from '../utils/logger';
import { errorMessage } from '../utils/pipelineError';
import { isKnownLanguageCode } from '../utils/languages';
import { ProviderError } from './providers/baseProvider';
import type { AIProvider, ProviderPromptRequest } from './providers/types';
import { buildTranslationPrompt, TRANSLATOR_SYSTEM_PROMPT } from './translationPrompt';
import type { LanguageDetector, TranslationCapability, TranslationRequest } from './types';

export type RetryOptions = {
  /** Attempts in total, including the first call */
  retries?: number;
  /** Delay before the second attempt; doubles for each further attempt */
  retryDelayMs?: number;
};

export type ProviderTranslatorOptions = RetryOptions & {
  model?: string;
  temperature?: number;
  maxTokens?: number;
};

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

const isRetryable = (error: unknown) => !(error instanceof ProviderError) || error.retryable;

/**
 * Call the provider, retrying retryable failures with exponential backoff.
 * Aborts stop the loop immediately.
 */
export const callWithRetry = async (
  provider: AIProvider,
  request: ProviderPromptRequest,
  options: RetryOptions = {},
): Promise<string> => {
  const retries = Math.max(1, options.retries ?? 3);
  const baseDelay = options.retryDelayMs ?? 500;
  let attempt = 0;

  for (;;) {
    try {
      const response = await provider.callModel(request);
      if (response.finishReason === 'length') {
        logger.warn({ provider: provider.name, model: response.model, usage: response.usage }, 'Model output hit the token limit');
      }
      return response.outputText;
    } catch (error) {
      attempt += 1;
      if (request.signal?.aborted || attempt >= retries || !isRetryable(error)) {
        throw error;
      }
      const delay = baseDelay * 2 ** (attempt - 1);
      logger.warn({ provider: provider.name, attempt, delay, error: errorMessage(error) }, 'Provider call failed, retrying');
      await sleep(delay, request.signal);
    }
  }
};

export class ProviderTranslator implements TranslationCapability {
  constructor(
    private readonly provider: AIProvider,
    private readonly options: ProviderTranslatorOptions = {},
  ) {}

  async translate(request: TranslationRequest): Promise<string | null> {
    const output = await callWithRetry(
      this.provider,
      {
        prompt: buildTranslationPrompt(request),
        systemPrompt: TRANSLATOR_SYSTEM_PROMPT,
        model: this.options.model,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        signal: request.signal,
      },
      this.options,
    );
    return output || null;
  }
}

const LANGUAGE_CODE = /^[a-z]{2}$/;
const DETECTION_SAMPLE_LENGTH = 500;

export class ProviderLanguageDetector implements LanguageDetector {
  constructor(
    private readonly provider: AIProvider,
    private readonly options: RetryOptions & { model?: string } = {},
  ) {}

  async detect(text: string, signal?: AbortSignal): Promise<string> {
    const output = await callWithRetry(
      this.provider,
      {
        prompt: [
          'Identify the language of the text enclosed in <text></text>.',
          'Answer with the two-letter ISO 639-1 code only, for example "de".',
          `<text>${text.slice(0, DETECTION_SAMPLE_LENGTH)}</text>`,
        ].join('\n'),
        model: this.options.model,
        temperature: 0,
        maxTokens: 5,
        signal,
      },
      this.options,
    );
    const code = output.trim().toLowerCase().replace(/["'`.]/g, '');
    if (!LANGUAGE_CODE.test(code) || !isKnownLanguageCode(code)) {
      throw new Error(`Could not detect language (model answered "${output.trim()}")`);
    }
    return code;
  }
}
