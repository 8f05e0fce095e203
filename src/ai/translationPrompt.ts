import { getLanguageName } from '../utils/languages';
import { SEGMENT_DELIMITER, removeXmlIllegalCharacters } from '../services/segmentation.service';
import type { TranslationRequest } from './types';

export const TRANSLATION_OPEN_TAG = '<translation_text>';
export const TRANSLATION_CLOSE_TAG = '</translation_text>';

export const TRANSLATOR_SYSTEM_PROMPT =
  'You are an expert translator. Follow all instructions in the user prompt and answer only with the translated text in the requested markers.';

const FEW_SHOT_EXAMPLE = [
  '<example>',
  'Translate the text enclosed in <source_text></source_text> from English to German.',
  '<context>Imagine this text is part of a "Contact Us" section on the US website of a company that also operates in Germany. They want to provide their German customers with a translated version of this section.</context>',
  '<source_text>Visit our website at www.example.com or call us at +1-555-123-4567.',
  'Our office is located at 123 Main Street, Anytown, USA.</source_text>',
  '<translation_text>Besuchen Sie unsere Website unter www.example.com oder rufen Sie uns an unter +1-555-123-4567.',
  'Unser Büro befindet sich in der 123 Main Street, Anytown, USA.</translation_text>',
  '</example>',
].join('\n');

const NEUTRAL_TONE = 'Use a neutral tone that is objective, informative, and unbiased.';

const TONE_CLAUSES: Record<string, (domain?: string) => string> = {
  neutral: () => NEUTRAL_TONE,
  formal: () => 'Use a formal and professional tone appropriate for official documents.',
  informal: () => 'Use an informal and conversational tone that is friendly and engaging.',
  technical: (domain) => `Use a technical tone appropriate for ${domain || 'professional'} writing.`,
};

/** Character replacements applied to every translation (Swiss German orthography). */
const ORTHOGRAPHIC_SUBSTITUTIONS: Array<[string, string]> = [
  ['ß', 'ss'],
  ['ẞ', 'SS'],
];

export const buildToneClause = (tone?: string, domain?: string): string => {
  const clause = TONE_CLAUSES[(tone ?? '').trim().toLowerCase()];
  return clause ? clause(domain?.trim()) : NEUTRAL_TONE;
};

export const buildDomainClause = (domain?: string): string => {
  const trimmed = domain?.trim();
  return trimmed ? `Use terminology specific to the ${trimmed} field.` : 'No specific domain requirements.';
};

/**
 * `"API:Programmierschnittstelle;UI:Benutzeroberfläche"` becomes one `term: definition`
 * line per entry. Returns an empty string when there is no usable entry.
 */
export const formatGlossary = (glossary?: string): string => {
  if (!glossary) return '';
  return glossary
    .split(';')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const separator = entry.indexOf(':');
      if (separator === -1) return entry;
      return `${entry.slice(0, separator).trim()}: ${entry.slice(separator + 1).trim()}`;
    })
    .join('\n');
};

export const buildGlossaryClause = (glossary?: string): string => {
  const lines = formatGlossary(glossary);
  return lines ? `Use the following glossary to ensure accurate translations:\n${lines}` : '';
};

export const buildTranslationPrompt = (request: TranslationRequest): string => {
  const sourceLanguage = request.sourceLanguage ? getLanguageName(request.sourceLanguage) : 'the detected source language';
  const targetLanguage = getLanguageName(request.targetLanguage);
  const glossaryClause = buildGlossaryClause(request.glossary);

  const requirements = [
    'Accuracy: The translation must convey the same meaning as the original text.',
    'Fluency: The translated text must read naturally in the target language.',
    'Style: Keep the original style of the text as much as possible.',
    'Context: Consider the context enclosed in <context></context> when translating. The context may be empty and must not be translated.',
    'No Unnecessary Translations: Keep names, brands, places, addresses, URLs, email addresses and phone numbers in their original form.',
    `Domain-Specific Terminology: ${buildDomainClause(request.domain)}`,
    `Tone: ${buildToneClause(request.tone, request.domain)}`,
    'Idioms and Cultural References: Adapt idiomatic expressions to their equivalents in the target language.',
    'Source Text Errors: If there are obvious errors or typos in the source text, correct them in the translation.',
    'Formatting: Preserve line breaks, bullet points and emphasis as in the source text. Keep carriage return characters if they are used in the source text.',
    // Only delimited paragraph units carry separators
    ...(request.text.includes(SEGMENT_DELIMITER)
      ? ['Separators: Keep every \\u001F separator character exactly where it appears and do not add new ones.']
      : []),
    `Output Requirements: Provide only the translated text enclosed within ${TRANSLATION_OPEN_TAG}${TRANSLATION_CLOSE_TAG}. Do not add explanations or notes.`,
    ...(glossaryClause ? [`Glossary: ${glossaryClause}`] : []),
  ];

  return [
    'You are an expert translator.',
    '',
    'Requirements:',
    ...requirements.map((requirement, index) => `${index + 1}. ${requirement}`),
    '',
    FEW_SHOT_EXAMPLE,
    '',
    `Translate the text enclosed in <source_text></source_text> from ${sourceLanguage} to ${targetLanguage}.`,
    '',
    `<context>${request.context}</context>`,
    `<source_text>${request.text}</source_text>`,
    TRANSLATION_OPEN_TAG,
  ].join('\n');
};

/** Text between the translation markers; tolerates a missing opening or closing marker. */
export const stripTranslationMarkers = (output: string): string => {
  let text = output.trim();
  const open = text.indexOf(TRANSLATION_OPEN_TAG);
  if (open !== -1) {
    text = text.slice(open + TRANSLATION_OPEN_TAG.length);
  }
  const close = text.indexOf(TRANSLATION_CLOSE_TAG);
  if (close !== -1) {
    text = text.slice(0, close);
  }
  return text;
};

export const applyOrthography = (text: string): string =>
  ORTHOGRAPHIC_SUBSTITUTIONS.reduce((result, [from, to]) => result.split(from).join(to), text);

const LEADING_WHITESPACE = /^\s*/;
const TRAILING_WHITESPACE = /\s*$/;

/** Give `translation` the leading and trailing whitespace of `source` (spaces, tabs, `\r`, `\n`). */
export const restoreEdgeWhitespace = (source: string, translation: string): string => {
  const leading = LEADING_WHITESPACE.exec(source)?.[0] ?? '';
  const trailing = source.trim() ? (TRAILING_WHITESPACE.exec(source)?.[0] ?? '') : '';
  return `${leading}${translation.trim()}${trailing}`;
};

/**
 * Clean up raw model output for `source`: markers removed, orthography normalised and
 * the source's edge whitespace reattached. Returns `null` when nothing is left.
 */
export const postProcessTranslation = (output: string | null | undefined, source: string): string | null => {
  if (!output) return null;
  const cleaned = removeXmlIllegalCharacters(stripTranslationMarkers(output), source.includes(SEGMENT_DELIMITER));
  const text = applyOrthography(cleaned).trim();
  if (!text) return null;
  return restoreEdgeWhitespace(source, text);
};
