import { logger } from '../ops/logger.js';
import { RequestScope, mentionFor, type CommandContext } from './context.js';
import { applySettingPairs, describeChanges, describeProfile, isClearRequest, parseSettingTokens } from './settings.js';
import { isKnownLanguage } from '../i18n/keywords.js';
import { resolveUser } from './users.js';

/**
 * `!sul @user [settings]`: a moderator views, changes or clears another
 * user's settings. Keywords resolve in the moderator's language and invalid
 * tokens are skipped without a reply.
 */
export const adminPreferencesCommand = async (context: CommandContext): Promise<void> => {
  const { invocation, deps } = context;
  const mention = mentionFor(invocation.username);

  let scope: RequestScope;
  try {
    scope = await RequestScope.load(deps);
  } catch (error) {
    logger.error({ error, platform: invocation.platform }, '[AdminPreferences] configuration unavailable');
    return;
  }

  const moderator = await scope.loadProfile(deps, invocation.userId, invocation.username);
  const input = invocation.rawInput.trim();
  const space = input.indexOf(' ');
  const targetName = space === -1 ? input : input.slice(0, space);
  const settingsInput = space === -1 ? '' : input.slice(space + 1).trim();

  const target = targetName ? await resolveUser(deps, invocation.platform, targetName) : null;
  if (!target) {
    await context.reply(scope.message(moderator, 'sulNoUser', { mention }));
    return;
  }

  const stored = await deps.profiles.get(target.userId);
  const subject = stored ?? scope.defaultProfile(target.userId, target.username);
  const targetMention = mentionFor(subject.username);

  if (!settingsInput) {
    const values = [targetMention, ...describeProfile(moderator, subject, scope)];
    await context.reply(scope.message(moderator, 'sulCheck', { mention, values }));
    return;
  }

  const parsed = parseSettingTokens(settingsInput);

  if (isClearRequest(parsed.tokens, moderator.speakingLanguage, scope)) {
    await deps.profiles.save(scope.defaultProfile(target.userId, subject.username));
    logger.info({ moderator: invocation.username, target: subject.username }, '[AdminPreferences] profile cleared');
    await context.reply(scope.message(moderator, 'sulClearConfirm', { mention, values: [targetMention] }));
    return;
  }

  const result = applySettingPairs(subject, parsed.pairs, moderator.speakingLanguage, scope);
  const updated = { ...result.profile };
  const changed = new Set(result.changed);

  const [onlyToken] = parsed.tokens;
  if (parsed.tokens.length === 1 && !onlyToken.includes(':') && isKnownLanguage(scope.config, onlyToken.toLowerCase())) {
    updated.targetLanguage = onlyToken.toLowerCase();
    changed.add('target');
  }

  if (changed.size === 0) return;

  await deps.profiles.save(updated);
  logger.info(
    { moderator: invocation.username, target: subject.username, changed: [...changed] },
    '[AdminPreferences] profile updated'
  );

  const details = describeChanges(moderator, updated, changed, scope);
  await context.reply(scope.message(moderator, 'sulConfirmMulti', { mention, values: [targetMention, details] }));
};
