import { logger } from '../utils/logger';

export type Chunk = {
  index: number;
  start: number;
  end: number;
  text: string;
};

/**
 * Separates the parts of a delimited unit. U+001F is not a legal character in
 * XML 1.0 text, so it never occurs inside text extracted from a document part.
 */
export const SEGMENT_DELIMITER = '\u001F';

// Everything outside the XML 1.0 Char production, lone surrogates included
const XML_ILLEGAL = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uD800-\uDFFF\uFFFE\uFFFF]/gu;
const XML_ILLEGAL_EXCEPT_DELIMITER = /[\u0000-\u0008\u000B\u000C\u000E-\u001E\uD800-\uDFFF\uFFFE\uFFFF]/gu;

/**
 * Drop characters that cannot appear in XML text. The segment delimiter survives only
 * when `keepDelimiter` is set, so a delimited unit can still be split afterwards.
 */
export const removeXmlIllegalCharacters = (text: string, keepDelimiter = false): string =>
  text.replace(keepDelimiter ? XML_ILLEGAL_EXCEPT_DELIMITER : XML_ILLEGAL, '');

const SENTENCE_TERMINATOR = '.';

const assertChunkBounds = (maxLength: number, overlap: number) => {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new RangeError(`overlap must be a non-negative integer, got ${overlap}`);
  }
};

/**
 * Returns the offset right after the last period found in the window
 * `[max(start, end - overlap), min(end + overlap, length))`, scanning from the far edge.
 * Without a period in the window the cut falls on the far edge.
 */
export const findChunkBoundary = (text: string, start: number, end: number, overlap: number): number => {
  const windowStart = Math.max(start, end - overlap);
  const windowEnd = Math.min(end + overlap, text.length);
  for (let i = windowEnd - 1; i >= windowStart; i--) {
    if (text[i] === SENTENCE_TERMINATOR) {
      return i + 1;
    }
  }
  return windowEnd;
};

/**
 * Split text into contiguous chunks of roughly `maxLength` characters, cutting after a
 * sentence-ending period found within `overlap` characters of the proposed end.
 * The chunks concatenate back to the input.
 */
export const splitIntoChunks = (text: string, maxLength: number, overlap: number): Chunk[] => {
  assertChunkBounds(maxLength, overlap);
  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    const proposedEnd = start + maxLength;
    const end = proposedEnd >= text.length
      ? text.length
      : findChunkBoundary(text, start, proposedEnd, overlap);
    chunks.push({ index: chunks.length, start, end, text: text.slice(start, end) });
    start = end;
  }

  if (chunks.length > 1) {
    logger.debug({ length: text.length, maxLength, overlap, chunks: chunks.length }, 'Split text into chunks');
  }
  return chunks;
};

export const joinDelimited = (parts: string[]): string => parts.join(SEGMENT_DELIMITER);

export type DelimitedSplit = {
  parts: string[];
  /** Number of parts the translated text actually contained */
  receivedCount: number;
  mismatch: boolean;
};

/**
 * Split a translated delimited unit back into `expectedCount` parts.
 * Missing parts are padded with empty strings and surplus parts are dropped.
 */
export const splitDelimited = (text: string, expectedCount: number): DelimitedSplit => {
  const received = text.split(SEGMENT_DELIMITER);
  if (received.length === expectedCount) {
    return { parts: received, receivedCount: received.length, mismatch: false };
  }

  const parts = received.slice(0, expectedCount);
  while (parts.length < expectedCount) {
    parts.push('');
  }
  return { parts, receivedCount: received.length, mismatch: true };
};
