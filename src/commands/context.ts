import type { TextCompletion } from '../ai/types.js';
import { createDefaultProfile } from '../core/profiles.js';
import type { BotConfig, TemplateTable } from '../core/schema.js';
import type {
  ChatRole,
  MessageProfile,
  Platform,
  ProfileStore,
  SettingsStore,
  UserDirectory,
  UserProfile
} from '../core/types.js';
import { MessageCatalog, aprilFoolsKey, type TemplateArgs } from '../i18n/catalog.js';
import type { Clock, QuotaTracker } from '../quota/tracker.js';
import { isAprilFirst } from '../quota/windows.js';

export interface CommandInvocation {
  platform: Platform;
  userId: string;
  username: string;
  role: ChatRole;
  /** Lowercased command token, including a trailing `!`. */
  command: string;
  /** Everything after the command token, trimmed. */
  rawInput: string;
}

export interface CommandDependencies {
  settings: SettingsStore;
  profiles: ProfileStore;
  quota: QuotaTracker;
  completion: TextCompletion;
  directories: Partial<Record<Platform, UserDirectory>>;
  timeZone: string;
  clock: Clock;
}

export interface CommandContext {
  invocation: CommandInvocation;
  deps: CommandDependencies;
  reply(message: string): Promise<void>;
  /** Last non-command chatter seen on the invocation's platform. */
  lastChatter(): LastChatter | null;
}

export interface LastChatter {
  userId: string;
  username: string;
}

export type CommandHandler = (context: CommandContext) => Promise<void>;

/** Sent when configuration or templates cannot be loaded; no template exists to render it. */
export const SETTINGS_UNAVAILABLE_REPLY = 'Translation is unavailable right now. Please let a moderator know.';

export const mentionFor = (username: string): string => `@${username}`;

/** Configuration, templates and the catalog over them, read fresh for one invocation. */
export class RequestScope {
  readonly catalog: MessageCatalog;

  constructor(
    readonly config: BotConfig,
    readonly templates: TemplateTable,
    private readonly aprilFools: boolean
  ) {
    this.catalog = new MessageCatalog(templates, config);
  }

  static async load(deps: CommandDependencies): Promise<RequestScope> {
    const [config, templates] = await Promise.all([deps.settings.loadConfig(), deps.settings.loadTemplates()]);
    return new RequestScope(config, templates, isAprilFirst(deps.clock(), deps.timeZone));
  }

  /** Renders `key` for `profile`, switching to the April 1st variant where one exists. */
  message(profile: MessageProfile, key: string, args?: TemplateArgs): string {
    return this.catalog.format(profile, this.aprilFools ? aprilFoolsKey(key) : key, args);
  }

  defaultProfile(userId: string, username: string): UserProfile {
    return createDefaultProfile(this.config, userId, username);
  }

  async loadProfile(deps: CommandDependencies, userId: string, username: string): Promise<UserProfile> {
    return deps.profiles.getOrUpdate(userId, username, () => this.defaultProfile(userId, username));
  }
}
