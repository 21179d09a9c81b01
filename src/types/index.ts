// Common types used across the bot

export type Platform = 'discord' | 'twitch';

export type RequestOrigin = 'live-chat' | 'manual';

export interface SongRequest {
  title: string;
  requestedBy: string;
  origin: RequestOrigin;
  requestedAt: Date;
}

export interface QueueEntry {
  seq: number;
  request: SongRequest;
}

export type EntryStatus = 'played' | 'current' | 'upcoming';

export interface ListedEntry extends QueueEntry {
  status: EntryStatus;
}

export interface ChatMessage {
  platform: Platform;
  channelId: string;
  username: string;
  userId: string;
  message: string;
  timestamp: Date;
  isMod: boolean;
  isBroadcaster: boolean;
}

export interface CardField {
  name: string;
  value: string;
}

/**
 * Platform-neutral rich message. Discord renders it as an embed,
 * Twitch flattens it to plain text.
 */
export interface Card {
  title?: string;
  description?: string;
  color: number;
  author?: string;
  fields?: CardField[];
  footer?: string;
}

export type OutgoingMessage = string | Card;

export type Reply = (content: OutgoingMessage) => Promise<void>;

export interface BotConfig {
  discord: {
    token: string;
  };
  twitch: {
    username: string;
    oauthToken: string;
    channels: string[];
  };
  youtube: {
    apiKey?: string;
  };
  web: {
    port: number;
  };
  bot: {
    commandPrefix: string;
    requestMarker: string;
    minPollIntervalSeconds: number;
    manualRequestLabel: string;
    resetQueueOnStart: boolean;
  };
}

export interface CommandContext {
  message: ChatMessage;
  scope: string;
  args: string[];
  argText: string;
  reply: Reply;
}

export type CommandHandler = (ctx: CommandContext) => Promise<void>;

export interface ChatClient {
  readonly platform: Platform;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  sendMessage(channelId: string, content: OutgoingMessage): Promise<void>;
  onMessage(handler: (message: ChatMessage) => void): void;
}

export interface LiveChatItem {
  id: string;
  text: string;
  authorName: string;
}

export interface LiveChatPage {
  items: LiveChatItem[];
  nextCursor: string | null;
  suggestedIntervalSeconds: number;
}

/**
 * Upstream live chat feed. `resolveChatHandle` yields null when the video
 * is not live or has no chat; `fetchChatPage` rejects on transport or quota
 * failures.
 */
export interface LiveChatSource {
  resolveChatHandle(videoId: string): Promise<string | null>;
  fetchChatPage(handle: string, cursor: string | null): Promise<LiveChatPage>;
}

export function scopeKey(platform: Platform, channelId: string): string {
  return `${platform}:${channelId}`;
}
