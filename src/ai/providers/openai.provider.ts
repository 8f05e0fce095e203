import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { BaseProvider, ProviderError } from './baseProvider';
import type { ProviderPromptRequest, ProviderPromptResponse } from './types';
import { logger } from '../../utils/logger';

export type OpenAIProviderOptions = {
  apiKey?: string;
  /** OpenAI-compatible endpoint, e.g. a self-hosted inference server */
  baseUrl?: string;
  defaultModel?: string;
  temperature?: number;
};

// Errors without a status are connection failures and worth retrying
const toProviderError = (status: number | undefined, message: string, cause: unknown): ProviderError => {
  if (status === 401) {
    return new ProviderError('Invalid OpenAI API key. Please check your OPENAI_API_KEY.', false, status, { cause });
  }
  if (status === 429) {
    return new ProviderError('OpenAI API rate limit exceeded.', true, status, { cause });
  }
  if (status !== undefined && status >= 500) {
    return new ProviderError(`OpenAI API server error (${status}): ${message}`, true, status, { cause });
  }
  return new ProviderError(
    `OpenAI API error${status ? ` (${status})` : ''}: ${message}`,
    status === undefined,
    status,
    { cause },
  );
};

export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai';
  readonly defaultModel: string;
  private readonly client: OpenAI | null;
  private readonly temperature: number;

  constructor(options: OpenAIProviderOptions = {}) {
    super();
    this.defaultModel = options.defaultModel ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0;
    // Self-hosted endpoints accept any key
    const apiKey = options.apiKey || (options.baseUrl ? 'not-required' : '');
    this.client = apiKey
      ? new OpenAI({ apiKey, baseURL: options.baseUrl || undefined, maxRetries: 0 })
      : null;
  }

  async callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse> {
    if (!this.client) {
      throw new ProviderError('Missing OPENAI_API_KEY (or OPENAI_BASE_URL for a self-hosted endpoint)', false);
    }

    const model = this.ensureModel(request.model);
    const messages: ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    try {
      const completion = await this.client.chat.completions.create(
        {
          model,
          messages,
          temperature: request.temperature ?? this.temperature,
          ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
        },
        { signal: request.signal },
      );

      const [choice] = completion.choices;
      const outputText = choice?.message?.content ?? '';
      if (!outputText) {
        this.logEmptyResponse(model, request);
      }

      return {
        outputText,
        model: completion.model,
        finishReason: choice?.finish_reason,
        usage: {
          inputTokens: completion.usage?.prompt_tokens,
          outputTokens: completion.usage?.completion_tokens,
        },
      };
    } catch (error) {
      if (error instanceof OpenAI.APIUserAbortError) {
        throw error;
      }
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ provider: this.name, model, status, error: message }, 'OpenAI provider failed');
      throw toProviderError(status, message, error);
    }
  }
}
