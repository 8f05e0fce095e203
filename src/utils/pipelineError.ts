export type PipelineErrorCode =
  | 'MALFORMED_PACKAGE'
  | 'PACKAGING_ERROR'
  | 'TRANSLATION_FAILED'
  | 'EMPTY_TRANSLATION_RESULT'
  | 'TRANSLATION_CANCELLED'
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_FORMAT';

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input archive cannot be opened or one of its markup parts is unusable. */
export class MalformedPackageError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('MALFORMED_PACKAGE', message, { cause });
  }
}

export class PackagingError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('PACKAGING_ERROR', message, { cause });
  }
}

/** Raised in strict mode for the first unit the capability could not translate. */
export class TranslationFailedError extends PipelineError {
  constructor(
    public readonly unitIndex: number,
    cause?: unknown,
  ) {
    super('TRANSLATION_FAILED', `Translation failed for unit ${unitIndex}`, { cause });
  }
}

export class EmptyTranslationResultError extends PipelineError {
  constructor(message = 'Produced an empty translation') {
    super('EMPTY_TRANSLATION_RESULT', message);
  }
}

export class TranslationCancelledError extends PipelineError {
  constructor(public readonly unitIndex: number) {
    super('TRANSLATION_CANCELLED', `Translation cancelled before unit ${unitIndex}`);
  }
}

export class InvalidConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_CONFIG', message, { cause });
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(filename: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported file type: ${filename}`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
