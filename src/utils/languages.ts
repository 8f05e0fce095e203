import languageTable from '../data/languages.json';

export interface Language {
  code: string; // ISO 639-1 code (e.g., 'en', 'de')
  name: string; // English name used in prompts (e.g., 'German')
  nativeName?: string;
}

export const SUPPORTED_LANGUAGES: Language[] = languageTable;

/**
 * Resolve a language designation to the English name used in prompts.
 * Accepts ISO codes ('de', 'de-CH'), English names ('German') and native names ('Deutsch').
 * Unknown values are returned as given so the model can still interpret them.
 */
export const getLanguageName = (designation: string): string => {
  const trimmed = designation.trim();
  if (!trimmed) return '';
  const lowered = trimmed.toLowerCase();
  const baseCode = lowered.split(/[-_]/)[0];
  const match = SUPPORTED_LANGUAGES.find(
    (language) =>
      language.code === lowered ||
      language.code === baseCode ||
      language.name.toLowerCase() === lowered ||
      language.nativeName?.toLowerCase() === lowered,
  );
  return match?.name ?? trimmed;
};

export const isKnownLanguageCode = (code: string): boolean =>
  SUPPORTED_LANGUAGES.some((language) => language.code === code.toLowerCase().split(/[-_]/)[0]);
