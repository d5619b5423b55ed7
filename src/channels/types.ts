import type { ChatRole, Platform } from '../core/types.js';

/** Outbound side of a chat platform. */
export interface ChatSurface {
  readonly platform: Platform;
  readonly maxMessageLength: number;
  send(text: string): Promise<void>;
}

export interface IncomingChatMessage {
  platform: Platform;
  userId: string;
  username: string;
  role: ChatRole;
  text: string;
}

export type ChatMessageHandler = (message: IncomingChatMessage, surface: ChatSurface) => Promise<void>;

export interface ChatChannel extends ChatSurface {
  start(onMessage: ChatMessageHandler): Promise<void>;
  stop(): Promise<void>;
}
