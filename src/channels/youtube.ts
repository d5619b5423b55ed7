import { z } from 'zod';
import type { ChatRole } from '../core/types.js';
import { HttpRequestError, fetchWithTimeout, isRetryableStatus } from '../ops/http.js';
import type { ChatChannel, ChatMessageHandler } from './types.js';

export const YOUTUBE_MESSAGE_LIMIT = 200;

const LIVE_CHAT_URL = 'https://www.googleapis.com/youtube/v3/liveChat/messages';

const liveChatPageSchema = z.object({
  nextPageToken: z.string().optional(),
  pollingIntervalMillis: z.number().optional(),
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          type: z.string(),
          displayMessage: z.string().optional()
        }),
        authorDetails: z.object({
          channelId: z.string(),
          displayName: z.string(),
          isChatOwner: z.boolean().optional(),
          isChatModerator: z.boolean().optional()
        })
      })
    )
    .default([])
});

type LiveChatPage = z.infer<typeof liveChatPageSchema>;
type LiveChatItem = LiveChatPage['items'][number];

export interface YouTubeChannelConfig {
  enabled: boolean;
  accessToken: string;
  liveChatId: string;
  pollIntervalMs: number;
  timeoutMs: number;
}

export const roleFromAuthor = (author: LiveChatItem['authorDetails']): ChatRole => {
  if (author.isChatOwner) return 'broadcaster';
  if (author.isChatModerator) return 'moderator';
  return 'viewer';
};

/** Polls a live chat through the YouTube Data API and posts replies to it. */
export class YouTubeLiveChatChannel implements ChatChannel {
  readonly platform = 'youtube' as const;
  readonly maxMessageLength = YOUTUBE_MESSAGE_LIMIT;
  private pollTimer?: NodeJS.Timeout;
  private pageToken?: string;
  private running = false;

  constructor(private readonly config: YouTubeChannelConfig) {}

  async start(onMessage: ChatMessageHandler): Promise<void> {
    if (!this.config.enabled) {
      console.log('[YouTube] Channel disabled by configuration.');
      return;
    }

    if (!this.config.accessToken || !this.config.liveChatId) {
      console.warn('[YouTube] YOUTUBE_ACCESS_TOKEN or YOUTUBE_LIVE_CHAT_ID missing; channel disabled.');
      return;
    }

    // The first page is backlog from before start-up and is skipped.
    const first = await this.fetchPage();
    this.pageToken = first.nextPageToken;
    this.running = true;
    this.schedulePoll(onMessage, first.pollingIntervalMillis);
    console.log(`[YouTube] Polling live chat ${this.config.liveChatId}`);
  }

  async send(text: string): Promise<void> {
    const response = await fetchWithTimeout(
      `${LIVE_CHAT_URL}?part=snippet`,
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          snippet: {
            liveChatId: this.config.liveChatId,
            type: 'textMessageEvent',
            textMessageDetails: { messageText: text }
          }
        })
      },
      this.config.timeoutMs,
      'youtube-live-chat'
    );

    if (!response.ok) {
      throw new HttpRequestError(`Live chat insert failed with status ${response.status}`, 'youtube-live-chat', {
        retryable: isRetryableStatus(response.status)
      });
    }
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) clearTimeout(this.pollTimer);
    this.pollTimer = undefined;
  }

  private schedulePoll(onMessage: ChatMessageHandler, suggestedMs?: number): void {
    if (!this.running) return;
    const delay = Math.max(this.config.pollIntervalMs, suggestedMs ?? 0);
    this.pollTimer = setTimeout(() => {
      void this.poll(onMessage);
    }, delay);
  }

  private async poll(onMessage: ChatMessageHandler): Promise<void> {
    let suggestedMs: number | undefined;
    try {
      const page = await this.fetchPage();
      this.pageToken = page.nextPageToken ?? this.pageToken;
      suggestedMs = page.pollingIntervalMillis;

      for (const item of page.items) {
        if (item.snippet.type !== 'textMessageEvent' || !item.snippet.displayMessage) continue;
        await onMessage(
          {
            platform: 'youtube',
            userId: item.authorDetails.channelId,
            username: item.authorDetails.displayName,
            role: roleFromAuthor(item.authorDetails),
            text: item.snippet.displayMessage
          },
          this
        );
      }
    } catch (error) {
      console.error('[YouTube] poll failed:', error);
    } finally {
      this.schedulePoll(onMessage, suggestedMs);
    }
  }

  private async fetchPage(): Promise<LiveChatPage> {
    const params = new URLSearchParams({
      liveChatId: this.config.liveChatId,
      part: 'snippet,authorDetails'
    });
    if (this.pageToken) params.set('pageToken', this.pageToken);

    const response = await fetchWithTimeout(
      `${LIVE_CHAT_URL}?${params.toString()}`,
      { headers: this.headers() },
      this.config.timeoutMs,
      'youtube-live-chat'
    );

    if (!response.ok) {
      throw new HttpRequestError(`Live chat poll failed with status ${response.status}`, 'youtube-live-chat', {
        retryable: isRetryableStatus(response.status)
      });
    }

    const parsed = liveChatPageSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new HttpRequestError('Unexpected live chat payload', 'youtube-live-chat', { retryable: false, cause: parsed.error });
    }
    return parsed.data;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.accessToken}`,
      'Content-Type': 'application/json'
    };
  }
}
