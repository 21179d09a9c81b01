import * as tmi from 'tmi.js';
import { BotConfig, ChatClient, ChatMessage, OutgoingMessage } from '../types';
import { cardToText } from '../utils/cards';

/** Twitch rejects chat messages longer than this. */
export const TWITCH_MESSAGE_LIMIT = 500;

/**
 * Split text into chat-sized messages, breaking on line boundaries where
 * possible and hard-wrapping lines that are too long on their own.
 * Lengths count code points so emoji are never cut in half.
 */
export function splitMessage(text: string, limit: number = TWITCH_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current) chunks.push(current);
    current = '';
  };

  for (const rawLine of text.split('\n')) {
    let chars = Array.from(rawLine);
    while (chars.length > limit) {
      flush();
      chunks.push(chars.slice(0, limit).join(''));
      chars = chars.slice(limit);
    }
    const line = chars.join('');
    if (!line) continue;

    const candidate = current ? `${current} | ${line}` : line;
    if (Array.from(candidate).length > limit) {
      flush();
      current = line;
    } else {
      current = candidate;
    }
  }
  flush();

  return chunks;
}

function normalizeChannel(channel: string): string {
  return channel.replace(/^#/, '').toLowerCase();
}

export class TwitchClient implements ChatClient {
  readonly platform = 'twitch' as const;
  private client: tmi.Client;
  private channels: string[];
  private messageHandlers: ((message: ChatMessage) => void)[] = [];

  constructor(config: BotConfig['twitch']) {
    this.channels = config.channels.map(normalizeChannel);

    this.client = new tmi.Client({
      options: { debug: false },
      connection: {
        secure: true,
        reconnect: true,
      },
      identity: {
        username: config.username,
        password: config.oauthToken,
      },
      channels: this.channels,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.on('message', (channel, tags, message, self) => {
      // Ignore messages from the bot itself
      if (self) return;

      const chatMessage: ChatMessage = {
        platform: 'twitch',
        channelId: normalizeChannel(channel),
        username: tags['display-name'] || tags.username || 'Anonymous',
        userId: tags['user-id'] || '',
        message: message,
        timestamp: new Date(),
        isMod: tags.mod === true,
        isBroadcaster: tags.badges?.broadcaster === '1',
      };

      this.messageHandlers.forEach(handler => handler(chatMessage));
    });

    this.client.on('connected', (addr, port) => {
      console.log(`[Twitch] Connected to ${addr}:${port}`);
    });

    this.client.on('disconnected', (reason) => {
      console.log(`[Twitch] Disconnected: ${reason}`);
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    console.log(`[Twitch] Joined channels: ${this.channels.join(', ')}`);
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  async sendMessage(channelId: string, content: OutgoingMessage): Promise<void> {
    const text = typeof content === 'string' ? content : cardToText(content);
    for (const chunk of splitMessage(text)) {
      await this.client.say(channelId, chunk);
    }
  }

  onMessage(handler: (message: ChatMessage) => void): void {
    this.messageHandlers.push(handler);
  }
}
