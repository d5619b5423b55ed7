import type { UserProfile } from '../core/types.js';
import type { SettingPair } from '../i18n/inference.js';
import { lookup, resolveKeyword } from '../i18n/keywords.js';
import type { RequestScope } from './context.js';

/** Quote marks used in settings replies when the language defines none. */
export const SETTINGS_QUOTES: readonly [string, string] = ["'", "'"];

export type SettingName = 'speaking' | 'target' | 'style' | 'pronouns';

export type SettingProblem =
  | { kind: 'invalidKey'; key: string }
  | { kind: 'invalidValue'; key: string; value: string };

export interface ParsedSettings {
  tokens: string[];
  pairs: SettingPair[];
  /** First `key:` token that has no value. */
  incompleteToken: string | null;
}

/** Splits `key: value key2:value2` into pairs; a later pair overrides an earlier one with the same key. */
export const parseSettingTokens = (input: string): ParsedSettings => {
  const tokens = input.replace(/:\s+/g, ':').split(/\s+/).filter(Boolean);
  const byKey = new Map<string, string>();
  let incompleteToken: string | null = null;

  for (const token of tokens) {
    const separator = token.indexOf(':');
    if (separator === -1) continue;

    const key = token.slice(0, separator).toLowerCase();
    const value = token.slice(separator + 1);
    if (!value) {
      incompleteToken ??= token;
      continue;
    }
    byKey.set(key, value);
  }

  return {
    tokens,
    pairs: [...byKey].map(([key, value]) => ({ key, value })),
    incompleteToken
  };
};

export const isClearRequest = (tokens: readonly string[], language: string, scope: RequestScope): boolean =>
  tokens.length === 1 && resolveKeyword(tokens[0], language, scope.config.settingMap) === 'clear';

export interface SettingsUpdate {
  profile: UserProfile;
  changed: Set<SettingName>;
  problems: SettingProblem[];
}

/**
 * Applies pairs to a copy of `profile`, resolving keys and style values in
 * `language`. Invalid pairs are reported and skipped.
 */
export const applySettingPairs = (
  profile: UserProfile,
  pairs: readonly SettingPair[],
  language: string,
  scope: RequestScope
): SettingsUpdate => {
  const { config, catalog } = scope;
  const updated: UserProfile = { ...profile };
  const changed = new Set<SettingName>();
  const problems: SettingProblem[] = [];

  for (const { key, value } of pairs) {
    const setting = resolveKeyword(key, language, config.settingMap);
    const lowered = value.toLowerCase();

    switch (setting) {
      case 'target':
        if (lookup(config.languageMap, lowered) === undefined) {
          problems.push({ kind: 'invalidValue', key, value });
        } else {
          updated.targetLanguage = lowered;
          changed.add('target');
        }
        break;
      case 'speaking':
        if (!catalog.hasLanguage(lowered)) {
          problems.push({ kind: 'invalidValue', key, value });
        } else {
          updated.speakingLanguage = lowered;
          changed.add('speaking');
        }
        break;
      case 'style': {
        const style = resolveKeyword(lowered, language, config.styleMap);
        if (style === null) {
          problems.push({ kind: 'invalidValue', key, value });
        } else {
          updated.speakingStyle = style;
          changed.add('style');
        }
        break;
      }
      case 'pronouns':
        updated.pronouns = value;
        changed.add('pronouns');
        break;
      case 'clear':
        // Only meaningful on its own; mixed with other pairs it is ignored.
        break;
      default:
        problems.push({ kind: 'invalidKey', key });
    }
  }

  return { profile: updated, changed, problems };
};

const CONFIRMATION_ORDER: readonly SettingName[] = ['speaking', 'target', 'style', 'pronouns'];

const CONFIRMATION_KEYS: Readonly<Record<SettingName, string>> = {
  speaking: 'confirmPartSpeaking',
  target: 'confirmPartTarget',
  style: 'confirmPartStyle',
  pronouns: 'confirmPartPronouns'
};

/** Joined `confirmPart*` fragments describing `changed`, rendered for `reader`. */
export const describeChanges = (
  reader: UserProfile,
  updated: UserProfile,
  changed: ReadonlySet<SettingName>,
  scope: RequestScope
): string => {
  const { catalog } = scope;
  const valueFor = (setting: SettingName): string => {
    switch (setting) {
      case 'speaking':
        return catalog.friendlyName(reader, updated.speakingLanguage);
      case 'target':
        return catalog.friendlyName(reader, updated.targetLanguage);
      case 'style':
        return catalog.friendlyName(reader, updated.speakingStyle);
      case 'pronouns':
        return catalog.quote(reader, updated.pronouns ?? '', SETTINGS_QUOTES);
    }
  };

  return CONFIRMATION_ORDER.filter((setting) => changed.has(setting))
    .map((setting) => scope.message(reader, CONFIRMATION_KEYS[setting], { values: [valueFor(setting)] }))
    .join(', ');
};

/** Target, speaking language, style and pronouns of `subject` as display values for `reader`. */
export const describeProfile = (reader: UserProfile, subject: UserProfile, scope: RequestScope): string[] => {
  const { catalog } = scope;
  const pronouns = subject.pronouns
    ? catalog.quote(reader, subject.pronouns, SETTINGS_QUOTES)
    : catalog.friendlyName(reader, 'none');

  return [
    catalog.friendlyName(reader, subject.targetLanguage),
    catalog.friendlyName(reader, subject.speakingLanguage),
    catalog.friendlyName(reader, subject.speakingStyle),
    pronouns
  ];
};
