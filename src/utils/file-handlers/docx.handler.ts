import { logger } from '../logger';
import { MalformedPackageError } from '../pipelineError';
import { joinDelimited, splitDelimited, splitIntoChunks } from '../../services/segmentation.service';
import { restoreEdgeWhitespace } from '../../ai/translationPrompt';
import type { TranslationConfig } from '../../ai/types';
import { extractPackage, reassemblePackage } from './docx.package';
import type { DocumentPackage } from './docx.package';
import { MarkupParseError, MarkupTree } from './docx.markup';
import type { MergedSegment } from './docx.markup';
import type { FileHandler, OpenedDocument, TranslationUnit, UnitApplyResult, UnitLocation } from './types';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export type MarkupPart = {
  path: string;
  tree: MarkupTree;
  segments: MergedSegment[];
};

export const toMarkupPart = (path: string, tree: MarkupTree): MarkupPart => ({
  path,
  tree,
  segments: tree.mergeAdjacent(),
});

export const parseMarkupParts = (pkg: DocumentPackage): MarkupPart[] =>
  pkg.targetPartPaths.map((partPath) => {
    const bytes = pkg.parts.get(partPath);
    if (!bytes) {
      throw new MalformedPackageError(`Invalid DOCX: missing ${partPath}`);
    }
    try {
      return toMarkupPart(partPath, MarkupTree.parse(bytes));
    } catch (error) {
      if (error instanceof MarkupParseError) {
        throw new MalformedPackageError(`Invalid DOCX: ${partPath} is not well-formed XML (${error.message})`, error);
      }
      throw error;
    }
  });

/** Consecutive segments of the same paragraph. */
const groupByParagraph = (segments: MergedSegment[]): MergedSegment[][] => {
  const groups: MergedSegment[][] = [];
  let current: MergedSegment[] = [];
  for (const segment of segments) {
    const previous = current[current.length - 1];
    if (previous && previous.paragraphIndex !== segment.paragraphIndex) {
      groups.push(current);
      current = [];
    }
    current.push(segment);
  }
  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
};

/**
 * Translation units for the merged segments of `parts`, in document order.
 *
 * In `segment` mode every merged segment is one unit. In `paragraph` mode the segments of a
 * paragraph travel together as one delimited unit; a paragraph that would exceed
 * `maxChunkLength` falls back to one unit per segment. A segment longer than
 * `maxChunkLength` is cut into chunk units that all write into the same anchor leaf.
 */
export const buildMarkupUnits = (parts: MarkupPart[], config: TranslationConfig): TranslationUnit[] => {
  const units: TranslationUnit[] = [];
  const push = (text: string, location: UnitLocation, apply: (translation: string) => UnitApplyResult) => {
    units.push({ index: units.length, text, location, apply });
  };

  const addSegment = (part: MarkupPart, segment: MergedSegment) => {
    const location = { part: part.path, paragraphIndex: segment.paragraphIndex, segmentIndex: segment.index };
    if (segment.text.length <= config.maxChunkLength) {
      push(segment.text, location, (translation) => {
        part.tree.writeBack(segment, translation);
        return {};
      });
      return;
    }

    const chunks = splitIntoChunks(segment.text, config.maxChunkLength, config.overlap);
    // Untranslated chunks keep their source text in the joined anchor value
    const outputs = chunks.map((chunk) => chunk.text);
    for (const chunk of chunks) {
      push(chunk.text, { ...location, chunkIndex: chunk.index }, (translation) => {
        outputs[chunk.index] = translation;
        part.tree.writeBack(segment, outputs.join(''));
        return {};
      });
    }
  };

  const addParagraph = (part: MarkupPart, segments: MergedSegment[]) => {
    const [first] = segments;
    const text = joinDelimited(segments.map((segment) => segment.text));
    // A lone segment needs no delimiter; an oversized paragraph cannot go in one call
    if (!first || segments.length === 1 || text.length > config.maxChunkLength) {
      segments.forEach((segment) => addSegment(part, segment));
      return;
    }

    push(text, { part: part.path, paragraphIndex: first.paragraphIndex }, (translation) => {
      const split = splitDelimited(translation, segments.length);
      const values = segments.map((segment, position) => {
        const value = split.parts[position] ?? '';
        // Padded parts stay empty rather than taking on the source's whitespace
        return value.trim() ? restoreEdgeWhitespace(segment.text, value) : '';
      });
      part.tree.writeBackParts(segments, values);
      return split.mismatch ? { mismatch: { expected: segments.length, received: split.receivedCount } } : {};
    });
  };

  for (const part of parts) {
    if (config.unitMode === 'paragraph') {
      groupByParagraph(part.segments).forEach((segments) => addParagraph(part, segments));
    } else {
      part.segments.forEach((segment) => addSegment(part, segment));
    }
  }
  return units;
};

export class DocxHandler implements FileHandler {
  readonly format = 'docx' as const;

  supports(mimeType: string | undefined, extension: string): boolean {
    return mimeType === DOCX_MIME || extension === '.docx';
  }

  async open(buffer: Uint8Array, config: TranslationConfig): Promise<OpenedDocument> {
    const pkg = await extractPackage(buffer);
    const parts = parseMarkupParts(pkg);
    const units = buildMarkupUnits(parts, config);

    logger.info(
      {
        parts: parts.map((part) => ({ path: part.path, segments: part.segments.length })),
        units: units.length,
        unitMode: config.unitMode,
      },
      'Opened DOCX document',
    );

    return {
      format: this.format,
      units,
      build: () => {
        // Parts without text are left exactly as they were read
        const mutated = new Map(
          parts
            .filter((part) => part.segments.length > 0)
            .map((part): [string, string] => [part.path, part.tree.serialize()]),
        );
        return reassemblePackage(pkg, mutated);
      },
    };
  }
}
