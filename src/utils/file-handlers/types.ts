import type { TranslationConfig } from '../../ai/types';

export type DocumentFormat = 'docx' | 'text';

export type UnitLocation = {
  part?: string;
  paragraphIndex?: number;
  segmentIndex?: number;
  chunkIndex?: number;
};

export type UnitApplyResult = {
  /** Set when a delimited translation did not split into the expected number of parts */
  mismatch?: { expected: number; received: number };
};

/** One call's worth of text, translated in document order. */
export interface TranslationUnit {
  index: number;
  text: string;
  location: UnitLocation;
  apply(translation: string): UnitApplyResult;
}

export interface OpenedDocument {
  readonly format: DocumentFormat;
  readonly units: TranslationUnit[];
  /** Serialise the document with every applied translation */
  build(): Promise<Buffer>;
}

export interface FileHandler {
  readonly format: DocumentFormat;
  supports(mimeType: string | undefined, extension: string): boolean;
  open(buffer: Uint8Array, config: TranslationConfig): Promise<OpenedDocument>;
}
