export { translateBuffer, translateDocument, translateText } from './services/documentTranslation.service';
export type { BufferTranslationResult, TextTranslationResult } from './services/documentTranslation.service';
export { translateMarkupTrees, translateUnits } from './ai/orchestrator';
export type { TranslationDeps, TranslationReport, TranslationWarning } from './ai/orchestrator';
export { resolveTranslationConfig, translationConfigSchema, TONES, UNIT_MODES } from './ai/types';
export type {
  LanguageDetector,
  TranslationCapability,
  TranslationConfig,
  TranslationConfigInput,
  TranslationRequest,
} from './ai/types';
export { ProviderLanguageDetector, ProviderTranslator, callWithRetry } from './ai/providerTranslator';
export { getProvider, listProviders } from './ai/providers/registry';
export { OpenAIProvider } from './ai/providers/openai.provider';
export type { AIProvider } from './ai/providers/types';
export { buildTranslationPrompt, postProcessTranslation } from './ai/translationPrompt';
export { TranslationContext, truncateContext } from './ai/translationContext';
export { splitIntoChunks, joinDelimited, splitDelimited, SEGMENT_DELIMITER } from './services/segmentation.service';
export type { Chunk } from './services/segmentation.service';
export { MarkupTree } from './utils/file-handlers/docx.markup';
export type { MergedSegment } from './utils/file-handlers/docx.markup';
export { extractPackage, readPackage, reassemblePackage, writePackageAtomic } from './utils/file-handlers/docx.package';
export type { DocumentPackage } from './utils/file-handlers/docx.package';
export { DocxHandler, TextHandler, resolveHandler } from './utils/file-handlers';
export * from './utils/pipelineError';
