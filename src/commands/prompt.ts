import type { BotConfig } from '../core/schema.js';
import { lookup } from '../i18n/keywords.js';
import { NEUTRAL_TONE, type TextSegment } from './segmenter.js';

export const UNDETERMINED = 'und';
export const UNRECOGNIZED_REPLY = 'UNDEF';

export const buildDetectionPrompt = (text: string): string =>
  'Identify the language of the text below. Reply with only its ISO 639-1 code in lowercase ' +
  `(for example "en" or "es"). If the language cannot be identified, reply with "${UNDETERMINED}".\n\n` +
  `Text: """${text}"""`;

/** Lowercase 2-3 letter codes pass; anything else is undetermined. */
export const sanitizeLanguageCode = (raw: string): string => {
  const cleaned = raw.trim().toLowerCase();
  return /^[a-z]{2,3}$/.test(cleaned) ? cleaned : UNDETERMINED;
};

export interface PromptInput {
  segment: TextSegment;
  speaker: string;
  detectedLanguage: string;
  targetCode: string;
  targetName: string;
}

const genderClause = ({ segment, speaker, targetCode }: PromptInput, config: BotConfig): string => {
  if (segment.placeholders.size > 0) {
    const pairs = [...segment.placeholders].map(([placeholder, pronoun]) => `${placeholder} = '${pronoun}'`);
    return (
      ` The text contains pronoun placeholders [${pairs.join('; ')}].` +
      ' Inflect the words around each placeholder for that pronoun, and keep every placeholder token exactly as written in your answer.'
    );
  }

  if (segment.speakerPronoun) {
    const hint = lookup(lookup(config.languagePronounHints, targetCode), segment.speakerPronoun);
    return (
      ` The speaker is '${speaker}', whose pronouns are '${segment.speakerPronoun}'.` +
      ' Apply them to any first-person references to the speaker.' +
      (hint ? ` ${hint}` : '')
    );
  }

  return ' The speaker\'s gender is unknown: use gender-neutral phrasing wherever the grammar would otherwise force a gender on the speaker.';
};

/** One prompt per segment; the segment text always comes last. */
export const buildTranslationPrompt = (input: PromptInput, config: BotConfig): string => {
  const { segment, detectedLanguage, targetName } = input;

  const opening = detectedLanguage === UNDETERMINED
    ? 'Decide whether the text below is a real human language or random gibberish.' +
      ` If it is gibberish, reply with exactly ${UNRECOGNIZED_REPLY}.` +
      ` Otherwise translate it into ${targetName}.`
    : `Translate the text below into ${targetName}.`;

  const completeness = ' The translation must be a complete, grammatical sentence with proper capitalization and punctuation.';

  const properNouns = segment.properNouns.length > 0
    ? ` Do not translate these proper nouns: [${segment.properNouns.join(', ')}].`
    : '';

  const tone = segment.tone !== NEUTRAL_TONE ? ` Write the translation in a '${segment.tone}' style.` : '';

  return (
    `${opening}${completeness}${genderClause(input, config)}${properNouns}${tone}` +
    ` Reply with the translation only.\n\nText: ${segment.text}`
  );
};
