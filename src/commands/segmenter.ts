import type { BotConfig } from '../core/schema.js';
import type { UserProfile } from '../core/types.js';
import { isKnownLanguage, normalizePronoun, resolveKeyword, type CanonicalPronoun } from '../i18n/keywords.js';

export const ESCAPED_PERCENT_MARKER = '__ESCAPED_PERCENT__';

export const NEUTRAL_TONE = 'neutral';

export interface TextSegment {
  text: string;
  tone: string;
  properNouns: string[];
  /** `[P1]`, `[P2]`, … in encounter order. */
  placeholders: Map<string, CanonicalPronoun>;
  speakerPronoun: CanonicalPronoun | null;
}

export interface ParsedCommand {
  languagePrefix: string;
  stylePrefix: string | null;
  tone: string;
  explicitTone: boolean;
  forceStrong: boolean;
  forceFast: boolean;
  segments: TextSegment[];
}

const TAG_SPLIT = /(&[^&]+&)/;
const PROPER_NOUN = /\*([^*]+?)\*/g;
const PRONOUN_PHRASE = /%([\p{L}\p{N}_\s/-]+)%/gu;

const isTag = (piece: string): boolean => piece.length > 2 && piece.startsWith('&') && piece.endsWith('&');

const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const restoreEscapes = (text: string): string => text.split(ESCAPED_PERCENT_MARKER).join('%');

interface PrefixResult {
  languagePrefix: string;
  stylePrefix: string | null;
  rest: string;
}

const parsePrefix = (text: string, profile: UserProfile, config: BotConfig): PrefixResult => {
  const space = text.indexOf(' ');
  const firstToken = (space === -1 ? text : text.slice(0, space)).toLowerCase();
  const remainder = space === -1 ? '' : text.slice(space + 1);
  const hasRemainder = remainder.trim().length > 0;

  if (firstToken.includes('-')) {
    let language: string | null = null;
    let style: string | null = null;

    for (const part of firstToken.split('-')) {
      const resolvedStyle = resolveKeyword(part, profile.speakingLanguage, config.styleMap);
      if (resolvedStyle !== null && style === null) {
        style = resolvedStyle;
        continue;
      }
      if (language === null && isKnownLanguage(config, part)) {
        language = part;
      }
    }

    if ((language !== null || style !== null) && hasRemainder) {
      return { languagePrefix: language ?? '', stylePrefix: style, rest: remainder };
    }
  }

  if (hasRemainder && isKnownLanguage(config, firstToken)) {
    return { languagePrefix: firstToken, stylePrefix: null, rest: remainder };
  }

  return { languagePrefix: '', stylePrefix: null, rest: text };
};

const buildSegment = (piece: string, tone: string, speakerPronoun: CanonicalPronoun | null, config: BotConfig): TextSegment => {
  const properNouns: string[] = [];
  const placeholders = new Map<string, CanonicalPronoun>();

  const withoutStars = piece.trim().replace(PROPER_NOUN, (_match, noun: string) => {
    properNouns.push(noun);
    return noun;
  });

  const withPlaceholders = withoutStars.replace(PRONOUN_PHRASE, (_match, phrase: string) => {
    const placeholder = `[P${placeholders.size + 1}]`;
    placeholders.set(placeholder, normalizePronoun(phrase.trim(), config));
    return placeholder;
  });

  return { text: collapseWhitespace(withPlaceholders), tone, properNouns, placeholders, speakerPronoun };
};

/**
 * Parses everything after the command token: an optional `lang` or
 * `lang-style` prefix, `&tag&` markers, `*proper nouns*` and `%pronoun%`
 * placeholders. A leading backslash turns the rest into one literal segment.
 */
export const segmentCommand = (rawInput: string, command: string, profile: UserProfile, config: BotConfig): ParsedCommand => {
  const text = rawInput.replace(/\\%/g, ESCAPED_PERCENT_MARKER);
  const speakerPronoun = profile.pronouns && profile.pronouns.trim() ? normalizePronoun(profile.pronouns, config) : null;
  const parsed: ParsedCommand = {
    languagePrefix: '',
    stylePrefix: null,
    tone: NEUTRAL_TONE,
    explicitTone: false,
    forceStrong: command.endsWith('!'),
    forceFast: false,
    segments: []
  };

  if (text.startsWith('\\')) {
    const literal = collapseWhitespace(text.slice(1));
    if (literal) {
      parsed.segments.push({ text: literal, tone: NEUTRAL_TONE, properNouns: [], placeholders: new Map(), speakerPronoun });
    }
    return parsed;
  }

  const prefix = parsePrefix(text, profile, config);
  parsed.languagePrefix = prefix.languagePrefix;
  parsed.stylePrefix = prefix.stylePrefix;
  parsed.tone = prefix.stylePrefix ?? NEUTRAL_TONE;

  const pieces = prefix.rest.split(TAG_SPLIT);
  const tags = pieces.filter(isTag).map((piece) => piece.slice(1, -1).trim().toLowerCase());
  const toneTags: string[] = [];

  for (const tag of tags) {
    const model = resolveKeyword(tag, profile.speakingLanguage, config.modelMap);
    if (model === 'strong') parsed.forceStrong = true;
    else if (model === 'fast') parsed.forceFast = true;
    else if (model === null) toneTags.push(tag);
  }

  const lastToneTag = toneTags.at(-1);
  if (lastToneTag !== undefined) {
    const tone = resolveKeyword(lastToneTag, profile.speakingLanguage, config.toneMap);
    if (tone !== null) {
      parsed.tone = tone;
      parsed.explicitTone = true;
    }
  }

  for (const piece of pieces) {
    if (isTag(piece) || !piece.trim()) continue;
    const segment = buildSegment(piece, parsed.tone, speakerPronoun, config);
    if (segment.text) parsed.segments.push(segment);
  }

  return parsed;
};
