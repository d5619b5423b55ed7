import type { ModelTier } from '../ai/types.js';
import type { BotConfig } from '../core/schema.js';
import { DEFAULT_TARGET, type MessageProfile, type UserProfile } from '../core/types.js';
import { FALLBACK_LANGUAGE, isKnownLanguage, lookup } from '../i18n/keywords.js';
import { logger } from '../ops/logger.js';
import type { QuotaCheck } from '../quota/tracker.js';
import { RequestScope, SETTINGS_UNAVAILABLE_REPLY, mentionFor, type CommandContext } from './context.js';
import {
  UNDETERMINED,
  UNRECOGNIZED_REPLY,
  buildDetectionPrompt,
  buildTranslationPrompt,
  sanitizeLanguageCode
} from './prompt.js';
import { restoreEscapes, segmentCommand, type ParsedCommand } from './segmenter.js';

export type TranslationStatus =
  | 'settings-unavailable'
  | 'user-blocked'
  | 'throttled'
  | 'help'
  | 'word-blocked'
  | 'echo'
  | 'quota-exceeded'
  | 'api-error'
  | 'already-translated'
  | 'unrecognized'
  | 'translated';

export interface TranslationOutcome {
  status: TranslationStatus;
  /** What was sent to chat, if anything. */
  reply?: string;
  detectedLanguage?: string;
  targetLanguage?: string;
  tier?: ModelTier;
}

/** Request details attached to every log record for one invocation. */
interface RequestLog {
  platform: string;
  user: string;
  input: string;
  detectedLanguage?: string;
  targetLanguage?: string;
  tier?: ModelTier;
  prompt?: string;
  quota?: Pick<QuotaCheck, 'dailyCount' | 'minuteCount'>;
}

export const chooseTier = (parsed: ParsedCommand, detectedLanguage: string): ModelTier => {
  if (parsed.forceStrong) return 'strong';
  if (parsed.forceFast) return 'fast';
  if (detectedLanguage === UNDETERMINED) return 'strong';

  const complex =
    parsed.explicitTone ||
    parsed.stylePrefix !== null ||
    parsed.segments.some((segment) => segment.placeholders.size > 0 || segment.speakerPronoun !== null);

  return complex ? 'strong' : 'fast';
};

export const resolveTargetLanguage = (
  parsed: ParsedCommand,
  profile: UserProfile,
  detectedLanguage: string,
  config: BotConfig
): string => {
  if (parsed.languagePrefix) return parsed.languagePrefix;

  const preferred = profile.targetLanguage;
  if (preferred && preferred !== DEFAULT_TARGET) {
    return detectedLanguage === preferred ? profile.speakingLanguage : preferred;
  }

  const { autoTranslateFrom, autoTranslateTo } = config.defaultSettings;
  return detectedLanguage === autoTranslateFrom ? autoTranslateTo : autoTranslateFrom;
};

/** The persona language renders the header; a persona without a style falls back to English. */
export const streamerProfile = (config: BotConfig, caller: UserProfile): MessageProfile => {
  const persona = config.defaultSettings.defaultBotPersona;
  const separator = persona.indexOf('-');
  return {
    speakingLanguage: separator === -1 ? FALLBACK_LANGUAGE : persona.slice(0, separator).toLowerCase(),
    speakingStyle: caller.speakingStyle,
    pronouns: null
  };
};

const stripPlaceholders = (text: string): string => text.replace(/\[P\d+\]/g, '').replace(/\s+/g, ' ').trim();

const containsBlockedWord = (input: string, blocklist: readonly string[]): boolean => {
  const lowered = input.toLowerCase();
  return blocklist.some((word) => word.length > 0 && lowered.includes(word.toLowerCase()));
};

/**
 * `!tr` / `!tr!`: detects the input language, picks a tier and a target, then
 * translates each segment and replies with a localized header.
 */
export const runTranslation = async (context: CommandContext): Promise<TranslationOutcome> => {
  const { invocation, deps } = context;
  const mention = mentionFor(invocation.username);
  const request: RequestLog = { platform: invocation.platform, user: invocation.username, input: invocation.rawInput };

  let scope: RequestScope;
  try {
    scope = await RequestScope.load(deps);
  } catch (error) {
    logger.error({ error, ...request }, '[Translate] configuration unavailable');
    await context.reply(SETTINGS_UNAVAILABLE_REPLY);
    return { status: 'settings-unavailable', reply: SETTINGS_UNAVAILABLE_REPLY };
  }

  const { config, catalog } = scope;
  let profile: UserProfile | null = null;

  const respond = async (
    status: TranslationStatus,
    message: string,
    extra: Omit<TranslationOutcome, 'status' | 'reply'> = {}
  ): Promise<TranslationOutcome> => {
    await context.reply(message);
    return { status, reply: message, ...extra };
  };

  try {
    profile = await scope.loadProfile(deps, invocation.userId, invocation.username);
    const caller = profile;
    const rawInput = invocation.rawInput;

    if (lookup(config.userBlocklist, invocation.userId) !== undefined) {
      return respond('user-blocked', scope.message(caller, 'userBlocked', { mention }));
    }

    const precheck = await deps.quota.checkAndReserve(config, 'fast', 1, false);
    if (!precheck.allowed) {
      logger.info({ ...request, reason: precheck.reason }, '[Translate] quota exhausted, ignoring request');
      return { status: 'throttled' };
    }

    if (!rawInput.trim()) {
      const link = lookup(config.helpLinks, FALLBACK_LANGUAGE) ?? lookup(config.helpLinks, 'default') ?? '';
      return respond('help', scope.message(caller, 'helpTranslate', { mention, values: [link] }));
    }

    if (containsBlockedWord(rawInput, config.wordBlocklist)) {
      logger.info(request, '[Translate] blocked word in input');
      return respond('word-blocked', scope.message(caller, 'blocked', { mention }));
    }

    const parsed = segmentCommand(rawInput, invocation.command, caller, config);
    if (parsed.segments.length === 0) {
      return respond('echo', rawInput);
    }

    const quotaReply = (check: QuotaCheck): string =>
      scope.message(caller, check.reason === 'daily' ? 'dailyLimit' : 'rateLimit', { mention });

    const detectionQuota = await deps.quota.checkAndReserve(config, 'fast', 1, true);
    request.quota = { dailyCount: detectionQuota.dailyCount, minuteCount: detectionQuota.minuteCount };
    if (!detectionQuota.allowed) {
      return respond('quota-exceeded', quotaReply(detectionQuota));
    }

    const combined = parsed.segments.map((segment) => segment.text).join(' ');
    request.prompt = buildDetectionPrompt(combined);
    const detection = await deps.completion.complete(request.prompt, 'fast');
    if (!detection) {
      logger.warn(request, '[Translate] language detection returned nothing');
      return respond('api-error', scope.message(caller, 'apiError', { mention }));
    }

    const detectedLanguage = sanitizeLanguageCode(detection);
    const tier = chooseTier(parsed, detectedLanguage);
    const targetLanguage = resolveTargetLanguage(parsed, caller, detectedLanguage, config);
    Object.assign(request, { detectedLanguage, targetLanguage, tier });
    const details = { detectedLanguage, targetLanguage, tier };

    if (!isKnownLanguage(config, targetLanguage)) {
      logger.error(request, '[Translate] target language missing from languageMap');
      return respond('api-error', scope.message(caller, 'apiError', { mention }), details);
    }

    if (detectedLanguage === targetLanguage && detectedLanguage !== UNDETERMINED && parsed.stylePrefix === null) {
      const targetName = catalog.friendlyName(caller, targetLanguage);
      return respond('already-translated', scope.message(caller, 'alreadyTranslated', { mention, values: [targetName] }), details);
    }

    const reservation = await deps.quota.checkAndReserve(config, tier, parsed.segments.length, true);
    request.quota = { dailyCount: reservation.dailyCount, minuteCount: reservation.minuteCount };
    if (!reservation.allowed) {
      return respond('quota-exceeded', quotaReply(reservation), details);
    }

    const targetName = lookup(config.languageMap, targetLanguage) ?? targetLanguage;
    const translations: string[] = [];

    for (const segment of parsed.segments) {
      request.prompt = buildTranslationPrompt(
        { segment, speaker: invocation.username, detectedLanguage, targetCode: targetLanguage, targetName },
        config
      );

      const result = (await deps.completion.complete(request.prompt, tier)).trim();
      if (!result) {
        logger.warn(request, '[Translate] translation returned nothing');
        return respond('api-error', scope.message(caller, 'apiError', { mention }), details);
      }
      if (result.toUpperCase() === UNRECOGNIZED_REPLY) {
        return respond('unrecognized', scope.message(caller, 'unknownTranslation', { mention }), details);
      }

      translations.push(stripPlaceholders(result));
    }

    const headerProfile = streamerProfile(config, caller);
    const header = scope.message(headerProfile, 'translationHeader', {
      mention,
      values: [catalog.friendlyName(headerProfile, targetLanguage)]
    });
    const body = catalog.quote(headerProfile, translations.join(' '));
    const message = restoreEscapes(`${header} ${body}`);

    logger.info({ ...request, segments: parsed.segments.length }, '[Translate] translated');
    return respond('translated', message, details);
  } catch (error) {
    logger.error({ error, ...request }, '[Translate] request failed');
    const fallbackProfile = profile ?? scope.defaultProfile(invocation.userId, invocation.username);
    return respond('api-error', scope.message(fallbackProfile, 'apiError', { mention }));
  }
};

export const translateCommand = async (context: CommandContext): Promise<void> => {
  await runTranslation(context);
};
