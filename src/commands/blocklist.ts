import type { ConfigChange, UserProfile } from '../core/types.js';
import { lookup } from '../i18n/keywords.js';
import { logger } from '../ops/logger.js';
import { RequestScope, mentionFor, type CommandContext } from './context.js';
import { SETTINGS_QUOTES } from './settings.js';
import { resolveUser, stripMention, type ResolvedUser } from './users.js';

export type ToggleResult = 'added' | 'removed' | 'exists' | 'missing';

/** Returns the updated list, or the same list when `word` is already present (case-insensitive). */
export const addBlockedWord = (words: readonly string[], word: string): { words: string[]; result: ToggleResult } => {
  const lowered = word.toLowerCase();
  if (words.some((entry) => entry.toLowerCase() === lowered)) {
    return { words: [...words], result: 'exists' };
  }
  return { words: [...words, word], result: 'added' };
};

export const removeBlockedWord = (words: readonly string[], word: string): { words: string[]; result: ToggleResult } => {
  const lowered = word.toLowerCase();
  const index = words.findIndex((entry) => entry.toLowerCase() === lowered);
  if (index === -1) return { words: [...words], result: 'missing' };
  return { words: words.filter((_, position) => position !== index), result: 'removed' };
};

interface AdminScope {
  scope: RequestScope;
  moderator: UserProfile;
  mention: string;
  quote(text: string): string;
}

/** Admin commands stay silent when configuration cannot be loaded. */
const loadAdminScope = async (context: CommandContext, tag: string): Promise<AdminScope | null> => {
  const { invocation, deps } = context;
  let scope: RequestScope;
  try {
    scope = await RequestScope.load(deps);
  } catch (error) {
    logger.error({ error, platform: invocation.platform }, `[${tag}] configuration unavailable`);
    return null;
  }

  const moderator = await scope.loadProfile(deps, invocation.userId, invocation.username);
  return {
    scope,
    moderator,
    mention: mentionFor(invocation.username),
    quote: (text) => scope.catalog.quote(moderator, text, SETTINGS_QUOTES)
  };
};

const unchanged = <T>(result: T): ConfigChange<T> => ({ config: null, result });

/** `!translateblock [@user]`: blocks a user, or the last chatter when no name is given. */
export const blockUserCommand = async (context: CommandContext): Promise<void> => {
  const admin = await loadAdminScope(context, 'BlockUser');
  if (!admin) return;

  const { invocation, deps } = context;
  const { scope, moderator, mention, quote } = admin;
  const input = stripMention(invocation.rawInput.trim());

  let target: ResolvedUser | null;
  if (!input) {
    target = context.lastChatter();
  } else {
    target = await resolveUser(deps, invocation.platform, input);
  }

  if (!target) {
    await context.reply(scope.message(moderator, 'adminBlockNoUser', { mention }));
    return;
  }

  if (target.userId === invocation.userId) {
    logger.warn({ moderator: invocation.username }, '[BlockUser] ignoring attempt to block self');
    return;
  }

  const blocked = target;
  const result = await deps.settings.updateConfig<ToggleResult>((config) => {
    if (lookup(config.userBlocklist, blocked.userId) !== undefined) return unchanged('exists');
    return {
      config: { ...config, userBlocklist: { ...config.userBlocklist, [blocked.userId]: blocked.username } },
      result: 'added'
    };
  });

  if (result === 'exists') {
    await context.reply(scope.message(moderator, 'adminBlockAlreadyExists', { mention, values: [quote(target.username)] }));
    return;
  }

  logger.info({ moderator: invocation.username, target: target.username, userId: target.userId }, '[BlockUser] user blocked');
  await context.reply(scope.message(moderator, 'adminBlockConfirm', { mention, values: [quote(target.username)] }));
};

/** `!translateunblock @user`: on Twitch a numeric input is also accepted as a raw id. */
export const unblockUserCommand = async (context: CommandContext): Promise<void> => {
  const admin = await loadAdminScope(context, 'UnblockUser');
  if (!admin) return;

  const { invocation, deps } = context;
  const { scope, moderator, mention, quote } = admin;
  const input = stripMention(invocation.rawInput.trim());

  if (!input) {
    await context.reply(scope.message(moderator, 'adminUnblockNoUser', { mention }));
    return;
  }

  let target = await resolveUser(deps, invocation.platform, input);
  if (!target && invocation.platform === 'twitch' && /^\d+$/.test(input)) {
    target = { userId: input, username: input };
  }

  if (!target) {
    await context.reply(scope.message(moderator, 'adminUnblockNotFound', { mention, values: [quote(input)] }));
    return;
  }

  const userId = target.userId;
  const storedName = await deps.settings.updateConfig<string | undefined>((config) => {
    const name = lookup(config.userBlocklist, userId);
    if (name === undefined) return unchanged(undefined);
    const remaining = Object.fromEntries(Object.entries(config.userBlocklist).filter(([id]) => id !== userId));
    return { config: { ...config, userBlocklist: remaining }, result: name };
  });

  if (storedName === undefined) {
    await context.reply(scope.message(moderator, 'adminUnblockNotFound', { mention, values: [quote(target.username)] }));
    return;
  }

  logger.info({ moderator: invocation.username, userId }, '[UnblockUser] user unblocked');
  await context.reply(
    scope.message(moderator, 'adminUnblockConfirm', { mention, values: [quote(storedName || target.username)] })
  );
};

export const blockWordCommand = async (context: CommandContext): Promise<void> => {
  const admin = await loadAdminScope(context, 'BlockWord');
  if (!admin) return;

  const { scope, moderator, mention, quote } = admin;
  const word = context.invocation.rawInput.trim();
  if (!word) {
    await context.reply(scope.message(moderator, 'blocklistNoWord', { mention }));
    return;
  }

  const result = await context.deps.settings.updateConfig<ToggleResult>((config) => {
    const change = addBlockedWord(config.wordBlocklist, word);
    if (change.result === 'exists') return unchanged(change.result);
    return { config: { ...config, wordBlocklist: change.words }, result: change.result };
  });
  if (result === 'exists') {
    await context.reply(scope.message(moderator, 'blocklistAlreadyExists', { mention, values: [quote(word)] }));
    return;
  }

  logger.info({ moderator: context.invocation.username }, '[BlockWord] word added to blocklist');
  await context.reply(scope.message(moderator, 'blocklistAddConfirm', { mention, values: [quote(word)] }));
};

export const unblockWordCommand = async (context: CommandContext): Promise<void> => {
  const admin = await loadAdminScope(context, 'UnblockWord');
  if (!admin) return;

  const { scope, moderator, mention, quote } = admin;
  const word = context.invocation.rawInput.trim();
  if (!word) {
    await context.reply(scope.message(moderator, 'blocklistNoWord', { mention }));
    return;
  }

  const result = await context.deps.settings.updateConfig<ToggleResult>((config) => {
    const change = removeBlockedWord(config.wordBlocklist, word);
    if (change.result === 'missing') return unchanged(change.result);
    return { config: { ...config, wordBlocklist: change.words }, result: change.result };
  });
  if (result === 'missing') {
    await context.reply(scope.message(moderator, 'blocklistNotFound', { mention, values: [quote(word)] }));
    return;
  }

  logger.info({ moderator: context.invocation.username }, '[UnblockWord] word removed from blocklist');
  await context.reply(scope.message(moderator, 'blocklistRemoveConfirm', { mention, values: [quote(word)] }));
};
