import type { BotConfig, KeywordTable } from '../core/schema.js';

export const FALLBACK_LANGUAGE = 'en';

export type CanonicalPronoun = 'he/him' | 'she/her' | 'they/them';

export type GenderKey = 'male' | 'female' | 'other';

/** Own-property lookup; stored tables are plain JSON objects. */
export const lookup = <T>(record: Record<string, T> | undefined, key: string): T | undefined => {
  if (!record || !Object.prototype.hasOwnProperty.call(record, key)) return undefined;
  return record[key];
};

/**
 * Resolves a user-typed keyword to its canonical token, trying the requested
 * language first and English second. Returns null when neither knows it.
 */
export const resolveKeyword = (keyword: string, language: string, table: KeywordTable): string | null => {
  const normalized = keyword.toLowerCase();
  return lookup(lookup(table, language), normalized)
    ?? lookup(lookup(table, FALLBACK_LANGUAGE), normalized)
    ?? null;
};

export const isKnownLanguage = (config: BotConfig, code: string): boolean =>
  lookup(config.languageMap, code) !== undefined;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const matchesWholeWord = (text: string, keyword: string): boolean =>
  new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`).test(text);

// Tested in this order; the first set with a whole-word match wins.
const PRONOUN_PRECEDENCE: readonly CanonicalPronoun[] = ['they/them', 'she/her', 'he/him'];

export const isCanonicalPronoun = (value: string): value is CanonicalPronoun =>
  value === 'he/him' || value === 'she/her' || value === 'they/them';

/**
 * Classifies a free-text pronoun phrase into one of the canonical sets using
 * every language's keywords in the pronoun table. Unmatched phrases are neutral.
 */
export const normalizePronoun = (phrase: string, config: BotConfig): CanonicalPronoun => {
  const text = phrase.toLowerCase().trim();
  const keywords = new Map<CanonicalPronoun, string[]>(PRONOUN_PRECEDENCE.map((pronoun) => [pronoun, []]));

  for (const languageTable of Object.values(config.pronounNormalizationMap)) {
    for (const [keyword, canonical] of Object.entries(languageTable)) {
      if (isCanonicalPronoun(canonical)) keywords.get(canonical)?.push(keyword);
    }
  }

  for (const pronoun of PRONOUN_PRECEDENCE) {
    if (keywords.get(pronoun)?.some((keyword) => matchesWholeWord(text, keyword))) {
      return pronoun;
    }
  }

  return 'they/them';
};

export const genderKeyFor = (pronouns: string | null, config: BotConfig): GenderKey => {
  if (!pronouns || !pronouns.trim()) return 'other';

  switch (normalizePronoun(pronouns, config)) {
    case 'he/him':
      return 'male';
    case 'she/her':
      return 'female';
    default:
      return 'other';
  }
};
