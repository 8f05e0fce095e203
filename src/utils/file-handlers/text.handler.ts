import { splitIntoChunks } from '../../services/segmentation.service';
import type { TranslationConfig } from '../../ai/types';
import type { FileHandler, OpenedDocument, TranslationUnit } from './types';

/** Plain text: the whole text is cut into sentence-bounded chunks. */
export class TextHandler implements FileHandler {
  readonly format = 'text' as const;

  supports(mimeType: string | undefined, extension: string): boolean {
    return mimeType === 'text/plain' || extension === '.txt';
  }

  async open(buffer: Uint8Array, config: TranslationConfig): Promise<OpenedDocument> {
    return this.openText(new TextDecoder('utf-8').decode(buffer), config);
  }

  openText(text: string, config: TranslationConfig): OpenedDocument {
    const chunks = splitIntoChunks(text, config.maxChunkLength, config.overlap);
    const outputs = chunks.map((chunk) => chunk.text);

    const units: TranslationUnit[] = chunks.map((chunk) => ({
      index: chunk.index,
      text: chunk.text,
      location: { chunkIndex: chunk.index },
      apply: (translation) => {
        outputs[chunk.index] = translation;
        return {};
      },
    }));

    return {
      format: this.format,
      units,
      build: async () => Buffer.from(outputs.join(''), 'utf8'),
    };
  }
}
