import type { Platform } from '../core/types.js';
import type { CommandDependencies } from './context.js';

export interface ResolvedUser {
  userId: string;
  username: string;
}

export const stripMention = (name: string): string => (name.startsWith('@') ? name.slice(1) : name);

/**
 * Finds a user id for a chat name: stored profiles first, then the
 * platform's directory. YouTube has no directory, so the name is trusted as
 * the id there.
 */
export const resolveUser = async (
  deps: CommandDependencies,
  platform: Platform,
  name: string
): Promise<ResolvedUser | null> => {
  const username = stripMention(name.trim());
  if (!username) return null;

  const storedId = await deps.profiles.findIdByUsername(username);
  if (storedId) return { userId: storedId, username };

  const directory = deps.directories[platform];
  if (directory) {
    const found = await directory.lookup(username);
    if (found) return { userId: found.userId, username: found.displayName };
  }

  if (platform === 'youtube') return { userId: username, username };
  return null;
};
