const SENTENCE_BOUNDARIES = ['. ', '! ', '? ', '.\n', '!\n', '?\n'];

/** Offset just past the earliest sentence boundary in `text`, or -1. */
const firstSentenceStart = (text: string): number => {
  let earliest = -1;
  for (const boundary of SENTENCE_BOUNDARIES) {
    const position = text.indexOf(boundary);
    if (position !== -1 && (earliest === -1 || position < earliest)) {
      earliest = position;
    }
  }
  if (earliest === -1 || earliest + 2 >= text.length) {
    return -1;
  }
  return earliest + 2;
};

/**
 * Keep at most `maxLength` trailing characters of `text`, starting at a sentence
 * boundary when one exists inside the kept tail.
 */
export const truncateContext = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) {
    return text;
  }
  const tail = maxLength > 0 ? text.slice(-maxLength) : '';
  const sentenceStart = firstSentenceStart(tail);
  return sentenceStart === -1 ? tail : tail.slice(sentenceStart);
};

/**
 * Rolling window of previously translated output for one document pass.
 * Each translated unit is appended and the window is trimmed from the front.
 */
export class TranslationContext {
  private text: string;

  constructor(
    readonly maxLength: number,
    initial = '',
  ) {
    this.text = truncateContext(initial, maxLength);
  }

  get value(): string {
    return this.text;
  }

  update(translation: string): string {
    const addition = translation.trim();
    if (!addition) {
      return this.text;
    }
    const separator = this.text ? ' ' : '';
    this.text = truncateContext(`${this.text}${separator}${addition}`, this.maxLength);
    return this.text;
  }

  reset(initial = ''): void {
    this.text = truncateContext(initial, this.maxLength);
  }
}
