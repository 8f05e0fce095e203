import type { LanguageDetector, TranslationCapability, TranslationRequest } from '../ai/types';

type Responder = (request: TranslationRequest, call: number) => string | null | Promise<string | null>;

/** Records every request and answers through `respond`. */
export class FakeTranslator implements TranslationCapability {
  readonly requests: TranslationRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async translate(request: TranslationRequest): Promise<string | null> {
    this.requests.push(request);
    return this.respond(request, this.requests.length - 1);
  }

  get texts(): string[] {
    return this.requests.map((request) => request.text);
  }
}

export const wrapTranslation = (text: string) => `<translation_text>${text}</translation_text>`;

/** Looks the trimmed source up in `dictionary`; unknown text comes back prefixed with `[de] `. */
export const dictionaryTranslator = (dictionary: Record<string, string> = {}) =>
  new FakeTranslator((request) => {
    const source = request.text.trim();
    return wrapTranslation(dictionary[source] ?? `[de] ${source}`);
  });

export class FakeDetector implements LanguageDetector {
  calls = 0;

  constructor(private readonly result: string | Error) {}

  async detect(): Promise<string> {
    this.calls++;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}
