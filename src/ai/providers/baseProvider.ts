import { logger, safeLogText } from '../../utils/logger';
import type { AIProvider, ProviderPromptRequest, ProviderPromptResponse } from './types';

export abstract class BaseProvider implements AIProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  abstract callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse>;

  protected ensureModel(requested?: string) {
    return requested ?? this.defaultModel;
  }

  protected logEmptyResponse(model: string, request: ProviderPromptRequest) {
    logger.warn(
      { provider: this.name, model, promptPreview: safeLogText(request.prompt, 200) },
      'Provider returned an empty response',
    );
  }
}

/** Failure reported by a provider; `retryable` marks rate limits, server and network errors. */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}
