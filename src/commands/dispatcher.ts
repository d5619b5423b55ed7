import type { ChatSurface, IncomingChatMessage } from '../channels/types.js';
import { permissions } from '../core/permissions.js';
import type { Platform } from '../core/types.js';
import { logger } from '../ops/logger.js';
import type { Sleeper } from '../ops/rate-limiter.js';
import { adminPreferencesCommand } from './admin-preferences.js';
import { blockUserCommand, blockWordCommand, unblockUserCommand, unblockWordCommand } from './blocklist.js';
import type { CommandDependencies, CommandHandler, CommandInvocation, LastChatter } from './context.js';
import { helpCommand } from './help.js';
import { preferencesCommand } from './preferences.js';
import { ReplySender } from './replies.js';
import { translateCommand } from './translate.js';

export const COMMAND_HANDLERS: Readonly<Record<string, CommandHandler>> = {
  '!tr': translateCommand,
  '!tr!': translateCommand,
  '!sl': preferencesCommand,
  '!sul': adminPreferencesCommand,
  '!translateblock': blockUserCommand,
  '!translateunblock': unblockUserCommand,
  '!blockword': blockWordCommand,
  '!unblockword': unblockWordCommand,
  '!translatehelp': helpCommand
};

export interface DispatcherOptions {
  chunkDelayMs: number;
  wait?: Sleeper;
}

/** Splits `!cmd rest of line` into a lowercased command token and the trimmed remainder. */
export const parseCommandLine = (text: string): { command: string; rawInput: string } | null => {
  const trimmed = text.trim();
  if (!trimmed.startsWith('!')) return null;

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  if (!match) return null;
  return { command: match[1].toLowerCase(), rawInput: match[2].trim() };
};

export class CommandDispatcher {
  private readonly lastChatters = new Map<Platform, LastChatter>();
  private readonly senders = new Map<ChatSurface, ReplySender>();

  constructor(
    private readonly deps: CommandDependencies,
    private readonly options: DispatcherOptions
  ) {}

  /**
   * Routes one chat message. Plain chat only updates the last-chatter record;
   * nothing a handler throws escapes this method.
   */
  async handle(message: IncomingChatMessage, surface: ChatSurface): Promise<void> {
    const parsed = parseCommandLine(message.text);
    const handler = parsed ? COMMAND_HANDLERS[parsed.command] : undefined;

    if (!parsed || !handler) {
      this.lastChatters.set(message.platform, { userId: message.userId, username: message.username });
      return;
    }

    const permission = permissions.canUseCommand(message.role, parsed.command);
    if (!permission.allowed) {
      logger.debug({ user: message.username, command: parsed.command }, `[Dispatcher] ${permission.reason}`);
      return;
    }

    const invocation: CommandInvocation = {
      platform: message.platform,
      userId: message.userId,
      username: message.username,
      role: message.role,
      command: parsed.command,
      rawInput: parsed.rawInput
    };
    const sender = this.senderFor(surface);

    try {
      await handler({
        invocation,
        deps: this.deps,
        reply: (text) => sender.send(text),
        lastChatter: () => this.lastChatters.get(message.platform) ?? null
      });
    } catch (error) {
      logger.error(
        { error, platform: invocation.platform, user: invocation.username, command: invocation.command, input: invocation.rawInput },
        '[Dispatcher] command failed'
      );
    }
  }

  lastChatter(platform: Platform): LastChatter | null {
    return this.lastChatters.get(platform) ?? null;
  }

  private senderFor(surface: ChatSurface): ReplySender {
    let sender = this.senders.get(surface);
    if (!sender) {
      sender = new ReplySender(surface, this.options.chunkDelayMs, this.options.wait);
      this.senders.set(surface, sender);
    }
    return sender;
  }
}
