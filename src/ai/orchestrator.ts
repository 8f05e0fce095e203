import { logger, safeLogText } from '../utils/logger';
import {
  EmptyTranslationResultError,
  TranslationCancelledError,
  TranslationFailedError,
  errorMessage,
} from '../utils/pipelineError';
import { SEGMENT_DELIMITER } from '../services/segmentation.service';
import { buildMarkupUnits, toMarkupPart } from '../utils/file-handlers/docx.handler';
import type { MarkupTree } from '../utils/file-handlers/docx.markup';
import type { TranslationUnit, UnitLocation } from '../utils/file-handlers/types';
import { TranslationContext } from './translationContext';
import { postProcessTranslation } from './translationPrompt';
import { isAutoDetect } from './types';
import type { LanguageDetector, TranslationCapability, TranslationConfig, TranslationRequest } from './types';

export type TranslationDeps = {
  translator: TranslationCapability;
  /** Used when the source language is unset or `auto`; without one the model infers it */
  detector?: LanguageDetector;
  signal?: AbortSignal;
};

export type TranslationWarning =
  | {
      kind: 'TranslationUnitFailed';
      unitIndex: number;
      location: UnitLocation;
      reason: string;
    }
  | {
      kind: 'SegmentCountMismatch';
      unitIndex: number;
      location: UnitLocation;
      expected: number;
      received: number;
    };

export type TranslationReport = {
  unitsTotal: number;
  translated: number;
  skipped: number;
  failed: number;
  warnings: TranslationWarning[];
  /** Rolling context after the last unit */
  context: string;
};

/** All whitespace, or a single visible character. */
export const isTrivialText = (text: string): boolean => text.trim().length <= 1;

const abortRejection = (signal: AbortSignal) =>
  new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

/**
 * Run one capability call with its own deadline. The caller's signal is forwarded so a
 * cancelled document also aborts the request in flight.
 */
const withTimeout = async <T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> => {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', forwardAbort, { once: true });
  const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs} ms`)), timeoutMs);

  try {
    return await Promise.race([call(controller.signal), abortRejection(controller.signal)]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
};

const resolveSourceLanguage = async (text: string, config: TranslationConfig, deps: TranslationDeps): Promise<string> => {
  if (!isAutoDetect(config.sourceLanguage)) {
    return config.sourceLanguage ?? '';
  }
  const { detector } = deps;
  if (!detector) {
    return '';
  }
  const sample = text.split(SEGMENT_DELIMITER).join(' ');
  try {
    return await withTimeout((signal) => detector.detect(sample, signal), config.unitTimeoutMs, deps.signal);
  } catch (error) {
    // Timeouts land here too; the prompt then names no source language
    logger.debug({ error: errorMessage(error) }, 'Language detection failed, leaving source language unset');
    return '';
  }
};

/**
 * Translate `units` strictly in order, threading one rolling context through the pass.
 *
 * A unit that comes back empty, throws or times out keeps its original text and is
 * reported as a warning, unless `abortOnFailure` is set. Throws
 * `EmptyTranslationResultError` when units were sent and none was translated.
 */
export const translateUnits = async (
  units: TranslationUnit[],
  config: TranslationConfig,
  deps: TranslationDeps,
): Promise<TranslationReport> => {
  const context = new TranslationContext(config.maxContextLength, config.context);
  const report: TranslationReport = {
    unitsTotal: units.length,
    translated: 0,
    skipped: 0,
    failed: 0,
    warnings: [],
    context: '',
  };

  for (const unit of units) {
    if (deps.signal?.aborted) {
      throw new TranslationCancelledError(unit.index);
    }
    if (isTrivialText(unit.text)) {
      report.skipped++;
      continue;
    }

    const sourceLanguage = await resolveSourceLanguage(unit.text, config, deps);
    if (deps.signal?.aborted) {
      throw new TranslationCancelledError(unit.index);
    }
    const request: TranslationRequest = {
      text: unit.text,
      sourceLanguage,
      targetLanguage: config.targetLanguage,
      tone: config.tone,
      domain: config.domain,
      glossary: config.glossary,
      context: context.value,
    };

    let translation: string | null = null;
    let failure: unknown;
    try {
      const output = await withTimeout(
        (signal) => deps.translator.translate({ ...request, signal }),
        config.unitTimeoutMs,
        deps.signal,
      );
      // Drops XML-illegal characters, the delimiter too unless the unit was sent delimited
      translation = postProcessTranslation(output, unit.text);
    } catch (error) {
      if (deps.signal?.aborted) {
        throw new TranslationCancelledError(unit.index);
      }
      failure = error;
    }

    if (translation === null) {
      if (config.abortOnFailure) {
        throw new TranslationFailedError(unit.index, failure);
      }
      const reason = failure === undefined ? 'Empty translation' : errorMessage(failure);
      logger.warn({ unit: unit.index, location: unit.location, reason, text: safeLogText(unit.text) }, 'Translation unit failed, keeping original text');
      report.failed++;
      report.warnings.push({ kind: 'TranslationUnitFailed', unitIndex: unit.index, location: unit.location, reason });
      // A failed unit adds nothing to the context
      continue;
    }

    // Paragraph units pad or truncate their parts and report the difference
    const { mismatch } = unit.apply(translation);
    if (mismatch) {
      logger.warn({ unit: unit.index, location: unit.location, ...mismatch }, 'Segment count mismatch in delimited translation');
      report.warnings.push({ kind: 'SegmentCountMismatch', unitIndex: unit.index, location: unit.location, ...mismatch });
    }
    // Delimited parts read as running text in the next prompt
    context.update(translation.split(SEGMENT_DELIMITER).join(' '));
    report.translated++;
    logger.debug({ unit: unit.index, sourceLanguage, text: safeLogText(translation) }, 'Translated unit');
  }

  const attempted = report.translated + report.failed;
  if (attempted > 0 && report.translated === 0) {
    throw new EmptyTranslationResultError(`None of ${attempted} translation units produced a translation`);
  }

  report.context = context.value;
  return report;
};

/** Merge, translate and write back the text of already parsed markup parts. */
export const translateMarkupTrees = (
  trees: Array<{ path: string; tree: MarkupTree }>,
  config: TranslationConfig,
  deps: TranslationDeps,
): Promise<TranslationReport> => {
  const parts = trees.map(({ path, tree }) => toMarkupPart(path, tree));
  return translateUnits(buildMarkupUnits(parts, config), config, deps);
};
