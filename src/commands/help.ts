import { lookup } from '../i18n/keywords.js';
import { logger } from '../ops/logger.js';
import { RequestScope, SETTINGS_UNAVAILABLE_REPLY, mentionFor, type CommandContext } from './context.js';

/** `!translatehelp [lang]` */
export const helpCommand = async (context: CommandContext): Promise<void> => {
  const { invocation, deps } = context;
  const mention = mentionFor(invocation.username);

  let scope: RequestScope;
  try {
    scope = await RequestScope.load(deps);
  } catch (error) {
    logger.error({ error, platform: invocation.platform }, '[Help] configuration unavailable');
    await context.reply(SETTINGS_UNAVAILABLE_REPLY);
    return;
  }

  const profile = await scope.loadProfile(deps, invocation.userId, invocation.username);
  const requested = invocation.rawInput.trim().toLowerCase();
  const links = scope.config.helpLinks;

  const link =
    (requested ? lookup(links, requested) : undefined) ??
    lookup(links, profile.speakingLanguage) ??
    lookup(links, 'default');

  if (!link) {
    await context.reply(scope.message(profile, 'helpLinkNotFound', { mention }));
    return;
  }

  await context.reply(scope.message(profile, 'translateHelp', { mention, values: [link] }));
};
