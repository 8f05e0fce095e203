import fs from 'fs/promises';
import path from 'path';
import { translateUnits } from '../ai/orchestrator';
import type { TranslationDeps, TranslationReport } from '../ai/orchestrator';
import { resolveTranslationConfig } from '../ai/types';
import type { TranslationConfigInput } from '../ai/types';
import { resolveHandler, TextHandler } from '../utils/file-handlers';
import { writePackageAtomic } from '../utils/file-handlers/docx.package';
import { logger } from '../utils/logger';
import {
  EmptyTranslationResultError,
  MalformedPackageError,
  PackagingError,
  UnsupportedFormatError,
  errorMessage,
} from '../utils/pipelineError';

export type BufferTranslationResult = {
  output: Buffer;
  report: TranslationReport;
};

export type TextTranslationResult = {
  text: string;
  report: TranslationReport;
};

/** Translate a document held in memory; `filename` selects the format handler. */
export const translateBuffer = async (
  input: Uint8Array,
  filename: string,
  configInput: TranslationConfigInput,
  deps: TranslationDeps,
  mimetype?: string,
): Promise<BufferTranslationResult> => {
  const config = resolveTranslationConfig(configInput);
  const handler = resolveHandler(filename, mimetype);
  if (!handler) {
    throw new UnsupportedFormatError(filename);
  }

  const document = await handler.open(input, config);
  const report = await translateUnits(document.units, config, deps);
  const output = await document.build();
  return { output, report };
};

/**
 * Translate the document at `inputPath` into `outputPath`.
 *
 * The output is staged in a working directory created beside it and renamed into
 * place; the directory is removed whether or not the translation succeeds.
 */
export const translateDocument = async (
  inputPath: string,
  outputPath: string,
  configInput: TranslationConfigInput,
  deps: TranslationDeps,
): Promise<TranslationReport> => {
  const startedAt = Date.now();

  let input: Buffer;
  try {
    input = await fs.readFile(inputPath);
  } catch (error) {
    throw new MalformedPackageError(`Cannot read ${inputPath}: ${errorMessage(error)}`, error);
  }

  let workDir: string;
  try {
    workDir = await fs.mkdtemp(path.join(path.dirname(outputPath), '.doc-translate-'));
  } catch (error) {
    throw new PackagingError(`Cannot create a working directory for ${outputPath}: ${errorMessage(error)}`, error);
  }

  try {
    const { output, report } = await translateBuffer(input, inputPath, configInput, deps);
    await writePackageAtomic(output, outputPath, workDir);

    logger.info(
      {
        input: inputPath,
        output: outputPath,
        units: report.unitsTotal,
        translated: report.translated,
        skipped: report.skipped,
        failed: report.failed,
        durationMs: Date.now() - startedAt,
      },
      'Document translated',
    );
    return report;
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
};

/** Translate a plain string, chunked on sentence boundaries. */
export const translateText = async (
  text: string,
  configInput: TranslationConfigInput,
  deps: TranslationDeps,
): Promise<TextTranslationResult> => {
  const config = resolveTranslationConfig(configInput);
  const document = new TextHandler().openText(text, config);
  const report = await translateUnits(document.units, config, deps);
  const translated = (await document.build()).toString('utf8');

  if (text.trim() && !translated.trim()) {
    throw new EmptyTranslationResultError();
  }
  return { text: translated, report };
};
