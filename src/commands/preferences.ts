import { hasCustomSettings } from '../core/profiles.js';
import type { UserProfile } from '../core/types.js';
import { inferProcessingLanguage } from '../i18n/inference.js';
import { isKnownLanguage, lookup } from '../i18n/keywords.js';
import { logger } from '../ops/logger.js';
import { RequestScope, SETTINGS_UNAVAILABLE_REPLY, mentionFor, type CommandContext } from './context.js';
import {
  SETTINGS_QUOTES,
  applySettingPairs,
  describeChanges,
  describeProfile,
  isClearRequest,
  parseSettingTokens,
  type SettingName
} from './settings.js';

/**
 * `!sl`: shows, changes or clears the caller's own translation settings.
 * Keywords may be typed in any configured language; the one that makes every
 * pair valid becomes the caller's speaking language.
 */
export const preferencesCommand = async (context: CommandContext): Promise<void> => {
  const { invocation, deps } = context;
  const mention = mentionFor(invocation.username);

  let scope: RequestScope;
  try {
    scope = await RequestScope.load(deps);
  } catch (error) {
    logger.error({ error, platform: invocation.platform }, '[Preferences] configuration unavailable');
    await context.reply(SETTINGS_UNAVAILABLE_REPLY);
    return;
  }

  const { config, catalog } = scope;
  const profile = await scope.loadProfile(deps, invocation.userId, invocation.username);
  const quote = (text: string, reader: UserProfile = profile): string => catalog.quote(reader, text, SETTINGS_QUOTES);

  if (lookup(config.userBlocklist, invocation.userId) !== undefined) {
    await context.reply(scope.message(profile, 'userBlockedSl', { mention }));
    return;
  }

  const input = invocation.rawInput.trim();
  if (!input) {
    await context.reply(scope.message(profile, 'setLangCheck', { mention, values: describeProfile(profile, profile, scope) }));
    return;
  }

  const parsed = parseSettingTokens(input);

  if (isClearRequest(parsed.tokens, profile.speakingLanguage, scope)) {
    const defaults = scope.defaultProfile(invocation.userId, invocation.username);
    if (!hasCustomSettings(profile, defaults)) {
      await context.reply(scope.message(profile, 'clearNone', { mention }));
      return;
    }
    await deps.profiles.save(defaults);
    await context.reply(scope.message(defaults, 'clearConfirm', { mention }));
    return;
  }

  if (parsed.incompleteToken !== null) {
    await context.reply(scope.message(profile, 'invalidPair', { mention, values: [quote(parsed.incompleteToken)] }));
    return;
  }

  const changed = new Set<SettingName>();
  let updated: UserProfile = { ...profile };

  const processingLanguage = inferProcessingLanguage(parsed.pairs, profile.speakingLanguage, config);
  if (processingLanguage !== profile.speakingLanguage) {
    updated.speakingLanguage = processingLanguage;
    changed.add('speaking');
  }

  const result = applySettingPairs(updated, parsed.pairs, processingLanguage, scope);
  updated = result.profile;
  result.changed.forEach((setting) => changed.add(setting));

  for (const problem of result.problems) {
    const values = problem.kind === 'invalidKey'
      ? [quote(problem.key, updated)]
      : [quote(problem.value, updated), quote(problem.key, updated)];
    await context.reply(scope.message(updated, problem.kind, { mention, values }));
  }

  const [onlyToken] = parsed.tokens;
  if (parsed.tokens.length === 1 && !onlyToken.includes(':')) {
    const code = onlyToken.toLowerCase();
    if (!isKnownLanguage(config, code)) {
      await context.reply(scope.message(updated, 'invalidCode', { mention, values: [quote(onlyToken, updated)] }));
      return;
    }
    updated.targetLanguage = code;
    changed.add('target');
  }

  if (changed.size === 0) return;

  await deps.profiles.save(updated);
  logger.info(
    { platform: invocation.platform, user: invocation.username, changed: [...changed] },
    '[Preferences] profile updated'
  );

  const details = describeChanges(updated, updated, changed, scope);
  await context.reply(scope.message(updated, 'setLangConfirmMulti', { mention, values: [details] }));
};
