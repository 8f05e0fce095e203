#!/usr/bin/env node
import path from 'path';
import { ProviderLanguageDetector, ProviderTranslator } from './ai/providerTranslator';
import { getProvider } from './ai/providers/registry';
import { UNIT_MODES } from './ai/types';
import type { TranslationConfigInput, UnitMode } from './ai/types';
import { translateDocument } from './services/documentTranslation.service';
import { env } from './utils/env';
import { logger } from './utils/logger';
import { InvalidConfigError, PipelineError, errorMessage } from './utils/pipelineError';

const HELP = `Usage: doc-translate <input> [output] [options]

Translates a .docx (or .txt) file and keeps its formatting.

Options:
  --target <language>     Target language (default: $TARGET_LANGUAGE or German)
  --source <language>     Source language, "auto" to detect (default: $SOURCE_LANGUAGE or auto)
  --tone <tone>           neutral | formal | informal | technical
  --domain <domain>       Subject field used for terminology
  --glossary <entries>    "term:definition;term:definition"
  --max-chunk <n>         Maximum characters per translation call (default: 5000)
  --overlap <n>           Window searched for a sentence end around a cut (default: 200)
  --max-context <n>       Characters of previous translation sent as context (default: 1000)
  --unit-mode <mode>      segment | paragraph (default: segment)
  --strict                Stop at the first unit that cannot be translated
  -h, --help              Show this help
`;

export type CliOptions = {
  input: string;
  output: string;
  config: TranslationConfigInput;
};

type CliDefaults = Pick<
  typeof env,
  | 'sourceLanguage'
  | 'targetLanguage'
  | 'tone'
  | 'domain'
  | 'glossary'
  | 'maxChunkLength'
  | 'chunkOverlap'
  | 'maxContextLength'
  | 'unitTimeoutMs'
  | 'abortOnFailure'
>;

const VALUE_FLAGS = new Set([
  '--target',
  '--source',
  '--tone',
  '--domain',
  '--glossary',
  '--max-chunk',
  '--overlap',
  '--max-context',
  '--unit-mode',
]);

const parseInteger = (flag: string, value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidConfigError(`${flag} expects an integer, got "${value}"`);
  }
  return parsed;
};

const isUnitMode = (value: string): value is UnitMode => UNIT_MODES.some((mode) => mode === value);

export const defaultOutputPath = (input: string): string => {
  const { dir, name, ext } = path.parse(input);
  return path.join(dir, `${name}_translated${ext}`);
};

/** Returns `null` when help was requested or nothing was given. */
export const parseCliArgs = (args: string[], defaults: CliDefaults = env): CliOptions | null => {
  if (args.length === 0) {
    return null;
  }
  const positional: string[] = [];
  const values = new Map<string, string>();
  let strict = defaults.abortOnFailure;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return null;
    }
    if (arg === '--strict') {
      strict = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new InvalidConfigError(`${arg} expects a value`);
      }
      values.set(arg, value);
      i += 1;
    } else if (arg.startsWith('--')) {
      throw new InvalidConfigError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [input, output, ...extra] = positional;
  if (!input) {
    throw new InvalidConfigError('Missing input file');
  }
  if (extra.length > 0) {
    throw new InvalidConfigError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const unitMode = values.get('--unit-mode') ?? 'segment';
  if (!isUnitMode(unitMode)) {
    throw new InvalidConfigError(`--unit-mode must be one of ${UNIT_MODES.join(', ')}`);
  }
  const integer = (flag: string, fallback: number) => {
    const value = values.get(flag);
    return value === undefined ? fallback : parseInteger(flag, value);
  };

  return {
    input,
    output: output ?? defaultOutputPath(input),
    config: {
      sourceLanguage: values.get('--source') ?? defaults.sourceLanguage,
      targetLanguage: values.get('--target') ?? defaults.targetLanguage,
      tone: values.get('--tone') ?? defaults.tone,
      domain: values.get('--domain') ?? (defaults.domain || undefined),
      glossary: values.get('--glossary') ?? (defaults.glossary || undefined),
      maxChunkLength: integer('--max-chunk', defaults.maxChunkLength),
      overlap: integer('--overlap', defaults.chunkOverlap),
      maxContextLength: integer('--max-context', defaults.maxContextLength),
      unitMode,
      abortOnFailure: strict,
      unitTimeoutMs: defaults.unitTimeoutMs,
    },
  };
};

const main = async () => {
  const options = parseCliArgs(process.argv.slice(2));
  if (!options) {
    console.log(HELP);
    return;
  }

  const provider = getProvider();
  const retry = { retries: env.aiMaxRetries, retryDelayMs: env.aiRetryDelayMs };
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, cancelling translation');
    controller.abort();
  });

  const report = await translateDocument(options.input, options.output, options.config, {
    translator: new ProviderTranslator(provider, retry),
    detector: new ProviderLanguageDetector(provider, retry),
    signal: controller.signal,
  });

  for (const warning of report.warnings) {
    logger.warn(warning, warning.kind);
  }
  logger.info(
    { output: options.output, translated: report.translated, failed: report.failed, skipped: report.skipped },
    'Done',
  );
};

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof PipelineError) {
      logger.error({ code: error.code, cause: error.cause ? errorMessage(error.cause) : undefined }, error.message);
    } else {
      logger.error({ err: error }, 'Translation failed');
    }
    process.exitCode = 1;
  });
}
