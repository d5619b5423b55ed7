import type { BotConfig, TemplateTable } from '../core/schema.js';
import type { MessageProfile } from '../core/types.js';
import { FALLBACK_LANGUAGE, genderKeyFor, lookup } from './keywords.js';
import { renderTemplate } from './template.js';

export interface TemplateArgs {
  /** Rendered into `{0}`; empty when the message addresses nobody. */
  mention?: string;
  /** Rendered into `{1}` onwards. */
  values?: readonly string[];
}

const APRIL_FOOLS_KEYS: Readonly<Record<string, string>> = {
  userBlocked: 'aprilFoolsBlocked',
  blocked: 'aprilFoolsBlocked',
  apiError: 'aprilFoolsApiError',
  dailyLimit: 'aprilFoolsApiError',
  rateLimit: 'aprilFoolsRateLimit',
  unknownTranslation: 'aprilFoolsUnknownTranslation',
  translationHeader: 'aprilFoolsHeader'
};

export const aprilFoolsKey = (key: string): string => lookup(APRIL_FOOLS_KEYS, key) ?? key;

export const missingTemplateText = (key: string): string => `${key} (Message template not found)`;

export class MessageCatalog {
  constructor(
    private readonly templates: TemplateTable,
    private readonly config: BotConfig
  ) {}

  hasLanguage(language: string): boolean {
    return lookup(this.templates, language) !== undefined;
  }

  /**
   * `{key}_{style}`, then `{key}_normal`, then `{key}`, first in the speaking
   * language and then in English.
   */
  resolveTemplate(profile: MessageProfile, key: string): string | null {
    const candidates = [`${key}_${profile.speakingStyle}`, `${key}_normal`, key];
    const languages = profile.speakingLanguage === FALLBACK_LANGUAGE
      ? [FALLBACK_LANGUAGE]
      : [profile.speakingLanguage, FALLBACK_LANGUAGE];

    for (const language of languages) {
      const table = lookup(this.templates, language);
      for (const candidate of candidates) {
        const template = lookup(table, candidate);
        if (template !== undefined) return template;
      }
    }

    return null;
  }

  format(profile: MessageProfile, key: string, args: TemplateArgs = {}): string {
    const template = this.resolveTemplate(profile, key);
    if (template === null) {
      console.warn(`[Templates] missing template "${key}" for ${profile.speakingLanguage}`);
      return missingTemplateText(key);
    }

    const positional = [args.mention ?? '', ...(args.values ?? [])];
    return renderTemplate(template, genderKeyFor(profile.pronouns, this.config), positional).trim();
  }

  /** Wraps text in the language's quote marks, or the fallback pair. */
  quote(profile: MessageProfile, text: string, fallback: readonly [string, string] = ['"', '"']): string {
    const start = this.resolveTemplate(profile, 'quote_start') ?? fallback[0];
    const end = this.resolveTemplate(profile, 'quote_end') ?? fallback[1];
    return `${start}${text}${end}`;
  }

  /** Display name for a language or style code in the profile's language. */
  friendlyName(profile: MessageProfile, code: string): string {
    const name =
      this.resolveExactName(profile.speakingLanguage, code) ??
      this.resolveExactName(FALLBACK_LANGUAGE, code) ??
      lookup(this.config.languageMap, code) ??
      code;

    return this.config.lowercaseLanguageNames.includes(profile.speakingLanguage) ? name.toLowerCase() : name;
  }

  private resolveExactName(language: string, code: string): string | undefined {
    return lookup(lookup(this.templates, language), `${code}_normal`);
  }
}
