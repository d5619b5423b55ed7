import { env } from '../config/env.js';
import { TwitchUserDirectory } from './directory.js';
import { TwitchChatChannel } from './twitch.js';
import { YouTubeLiveChatChannel } from './youtube.js';

export type { ChatChannel, ChatMessageHandler, ChatSurface, IncomingChatMessage } from './types.js';

const positiveNumber = (raw: string, fallback: number): number => {
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
};

export const createTwitchChannel = (): TwitchChatChannel =>
  new TwitchChatChannel({
    enabled: env.TWITCH_ENABLED === 'true',
    channel: env.TWITCH_CHANNEL || '',
    botUsername: env.TWITCH_BOT_USERNAME || '',
    oauthToken: env.TWITCH_OAUTH_TOKEN || ''
  });

/** Null unless both a client id and a token are configured. */
export const createTwitchDirectory = (): TwitchUserDirectory | null => {
  if (!env.TWITCH_CLIENT_ID || !env.TWITCH_OAUTH_TOKEN) return null;
  return new TwitchUserDirectory({
    clientId: env.TWITCH_CLIENT_ID,
    oauthToken: env.TWITCH_OAUTH_TOKEN,
    timeoutMs: positiveNumber(env.AI_TIMEOUT_MS, 30000)
  });
};

export const createYouTubeChannel = (): YouTubeLiveChatChannel =>
  new YouTubeLiveChatChannel({
    enabled: env.YOUTUBE_ENABLED === 'true',
    accessToken: env.YOUTUBE_ACCESS_TOKEN || '',
    liveChatId: env.YOUTUBE_LIVE_CHAT_ID || '',
    pollIntervalMs: positiveNumber(env.YOUTUBE_POLL_INTERVAL_MS, 5000),
    timeoutMs: positiveNumber(env.AI_TIMEOUT_MS, 30000)
  });
