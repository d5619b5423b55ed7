import { resolveKeyword } from '../i18n/keywords.js';
import type { BotConfig } from './schema.js';
import { DEFAULT_TARGET, type UserProfile } from './types.js';

/**
 * Builds a first-sighting profile from `defaultBotPersona` ("<lang>-<style>").
 * Parts that do not resolve keep the built-in `en` / `normal` defaults.
 */
export const createDefaultProfile = (config: BotConfig, userId: string, username: string): UserProfile => {
  const profile: UserProfile = {
    userId,
    username,
    targetLanguage: DEFAULT_TARGET,
    speakingLanguage: 'en',
    speakingStyle: 'normal',
    pronouns: null
  };

  const persona = config.defaultSettings.defaultBotPersona.trim();
  if (!persona) return profile;

  const separator = persona.indexOf('-');
  const languagePart = (separator === -1 ? persona : persona.slice(0, separator)).toLowerCase();
  const stylePart = separator === -1 ? null : persona.slice(separator + 1).toLowerCase();

  if (Object.prototype.hasOwnProperty.call(config.languageMap, languagePart)) {
    profile.speakingLanguage = languagePart;
  }

  if (stylePart) {
    let style = resolveKeyword(stylePart, languagePart, config.styleMap);
    for (const language of Object.keys(config.styleMap)) {
      if (style !== null) break;
      style = resolveKeyword(stylePart, language, config.styleMap);
    }
    if (style !== null) profile.speakingStyle = style;
  }

  return profile;
};

export const hasCustomSettings = (profile: UserProfile, defaults: UserProfile): boolean =>
  profile.targetLanguage !== defaults.targetLanguage ||
  profile.speakingLanguage !== defaults.speakingLanguage ||
  profile.speakingStyle !== defaults.speakingStyle ||
  Boolean(profile.pronouns);
