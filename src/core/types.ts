import type { BotConfig, TemplateTable } from './schema.js';

export type Platform = 'twitch' | 'youtube';

export type ChatRole = 'broadcaster' | 'moderator' | 'viewer';

/** Sentinel for "no preferred target language". */
export const DEFAULT_TARGET = 'default';

export interface UserProfile {
  userId: string;
  username: string;
  targetLanguage: string;
  speakingLanguage: string;
  speakingStyle: string;
  pronouns: string | null;
}

/** The parts of a profile that drive template rendering. */
export type MessageProfile = Pick<UserProfile, 'speakingLanguage' | 'speakingStyle' | 'pronouns'>;

/** Outcome of a configuration edit; `config` is null when nothing is written. */
export interface ConfigChange<T> {
  config: BotConfig | null;
  result: T;
}

export interface SettingsStore {
  loadConfig(): Promise<BotConfig>;
  /** Applies `change` to the current configuration while no other edit can run. */
  updateConfig<T>(change: (config: BotConfig) => ConfigChange<T>): Promise<T>;
  loadTemplates(): Promise<TemplateTable>;
}

export interface ProfileStore {
  /**
   * Returns the stored profile, creating it from `defaults` on first sight and
   * syncing the username when the platform reports a different one.
   */
  getOrUpdate(userId: string, username: string, defaults: () => UserProfile): Promise<UserProfile>;
  get(userId: string): Promise<UserProfile | null>;
  save(profile: UserProfile): Promise<void>;
  /** Case-insensitive reverse lookup over stored usernames. */
  findIdByUsername(username: string): Promise<string | null>;
}

export interface DirectoryUser {
  userId: string;
  displayName: string;
}

export interface UserDirectory {
  lookup(login: string): Promise<DirectoryUser | null>;
}
