import { env } from '../../utils/env';
import { OpenAIProvider } from './openai.provider';
import type { AIProvider } from './types';

type ProviderFactory = () => AIProvider;

const providers: Record<string, ProviderFactory> = {
  openai: () =>
    new OpenAIProvider({
      apiKey: env.openAiApiKey,
      baseUrl: env.openAiBaseUrl,
      defaultModel: env.openAiModel,
      temperature: env.llmTemperature,
    }),
};

export const getProvider = (name?: string): AIProvider => {
  const normalized = (name ?? env.aiProvider).toLowerCase();
  const factory = providers[normalized];
  if (!factory) {
    throw new Error(`Unknown AI provider "${normalized}". Available: ${listProviders().join(', ')}`);
  }
  return factory();
};

export const listProviders = () => Object.keys(providers);
