import type { BotConfig } from '../core/schema.js';
import { FALLBACK_LANGUAGE, lookup } from './keywords.js';

export interface SettingPair {
  key: string;
  value: string;
}

/**
 * A pair is valid for a language when that language's setting table knows the
 * key and, for `style`, its style table knows the value.
 */
export const isPairValidForLanguage = (pair: SettingPair, language: string, config: BotConfig): boolean => {
  const internalKey = lookup(lookup(config.settingMap, language), pair.key.toLowerCase());
  if (internalKey === undefined) return false;
  if (internalKey !== 'style') return true;
  return lookup(lookup(config.styleMap, language), pair.value.toLowerCase()) !== undefined;
};

/**
 * Picks the language a settings command was written in. Stays on the caller's
 * language when every pair validates there; otherwise the only other language
 * where all pairs validate wins, with ties broken by `inferencePriority`.
 */
export const inferProcessingLanguage = (
  pairs: readonly SettingPair[],
  currentLanguage: string,
  config: BotConfig
): string => {
  if (pairs.length === 0) return currentLanguage;
  if (pairs.every((pair) => isPairValidForLanguage(pair, currentLanguage, config))) {
    return currentLanguage;
  }

  const candidates = Object.keys(config.settingMap).filter(
    (language) =>
      language !== FALLBACK_LANGUAGE &&
      language !== currentLanguage &&
      pairs.every((pair) => isPairValidForLanguage(pair, language, config))
  );

  if (candidates.length === 1) return candidates[0];
  if (candidates.length > 1) {
    return config.inferencePriority.find((language) => candidates.includes(language)) ?? currentLanguage;
  }
  return currentLanguage;
};
