export type ProviderUsage = {
  inputTokens?: number;
  outputTokens?: number;
};

export type ProviderPromptRequest = {
  prompt: string;
  systemPrompt?: string;
  /** Falls back to the provider's default model */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type ProviderPromptResponse = {
  outputText: string;
  model: string;
  /** `length` means the answer was cut off at the token limit */
  finishReason?: string;
  usage?: ProviderUsage;
};

export interface AIProvider {
  readonly name: string;
  readonly defaultModel: string;
  callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse>;
}
