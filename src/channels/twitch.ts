import tmi from 'tmi.js';
import type { ChatRole } from '../core/types.js';
import type { ChatChannel, ChatMessageHandler } from './types.js';

export const TWITCH_MESSAGE_LIMIT = 500;

export interface TwitchChannelConfig {
  enabled: boolean;
  channel: string;
  botUsername: string;
  oauthToken: string;
}

export const roleFromUserstate = (userstate: tmi.ChatUserstate): ChatRole => {
  if (userstate.badges?.broadcaster) return 'broadcaster';
  if (userstate.mod || userstate.badges?.moderator) return 'moderator';
  return 'viewer';
};

export class TwitchChatChannel implements ChatChannel {
  readonly platform = 'twitch' as const;
  readonly maxMessageLength = TWITCH_MESSAGE_LIMIT;
  private client?: tmi.Client;

  constructor(private readonly config: TwitchChannelConfig) {}

  async start(onMessage: ChatMessageHandler): Promise<void> {
    if (!this.config.enabled) {
      console.log('[Twitch] Channel disabled by configuration.');
      return;
    }

    if (!this.config.channel || !this.config.botUsername || !this.config.oauthToken) {
      console.warn('[Twitch] TWITCH_CHANNEL, TWITCH_BOT_USERNAME or TWITCH_OAUTH_TOKEN missing; channel disabled.');
      return;
    }

    const client = new tmi.Client({
      options: { debug: false },
      connection: { reconnect: true, secure: true },
      identity: { username: this.config.botUsername, password: this.config.oauthToken },
      channels: [this.config.channel]
    });

    client.on('message', (_channel, userstate, text, self) => {
      if (self) return;

      const userId = userstate['user-id'];
      const username = userstate['display-name'] || userstate.username;
      if (!userId || !username) return;

      void onMessage({ platform: 'twitch', userId, username, role: roleFromUserstate(userstate), text }, this).catch(
        (error: unknown) => {
          console.error('[Twitch] message handler failed:', error);
        }
      );
    });

    client.on('disconnected', (reason) => {
      console.warn(`[Twitch] disconnected: ${reason}`);
    });

    await client.connect();
    this.client = client;
    console.log(`[Twitch] Connected to #${this.config.channel} as ${this.config.botUsername}`);
  }

  async send(text: string): Promise<void> {
    if (!this.client) {
      console.warn('[Twitch] send skipped, client not connected');
      return;
    }
    await this.client.say(this.config.channel, text);
  }

  async stop(): Promise<void> {
    if (!this.client) return;
    await this.client.disconnect();
    this.client = undefined;
  }
}
