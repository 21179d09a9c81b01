import {
  Client,
  EmbedBuilder,
  Events,
  GatewayIntentBits,
  Message,
  PermissionFlagsBits,
} from 'discord.js';
import { BotConfig, Card, ChatClient, ChatMessage, OutgoingMessage } from '../types';

export function cardToEmbed(card: Card): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(card.color);

  if (card.title) embed.setTitle(card.title);
  if (card.description) embed.setDescription(card.description);
  if (card.author) embed.setAuthor({ name: card.author });
  if (card.fields && card.fields.length > 0) {
    embed.addFields(card.fields.map(field => ({ name: field.name, value: field.value, inline: false })));
  }
  if (card.footer) embed.setFooter({ text: card.footer });

  return embed;
}

/**
 * Group chat surface on Discord guild text channels. Channel ids are the
 * scope of sessions and queues.
 */
export class DiscordClient implements ChatClient {
  readonly platform = 'discord' as const;
  private client: Client;
  private messageHandlers: ((message: ChatMessage) => void)[] = [];

  constructor(private config: BotConfig['discord']) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, (ready) => {
      console.log(`[Discord] Logged in as ${ready.user.tag}`);
    });

    this.client.on(Events.MessageCreate, (message: Message) => {
      // Ignore other bots and ourselves
      if (message.author.bot) return;

      const chatMessage: ChatMessage = {
        platform: 'discord',
        channelId: message.channelId,
        username: message.member?.displayName || message.author.username,
        userId: message.author.id,
        message: message.content,
        timestamp: message.createdAt,
        isMod: message.member?.permissions.has(PermissionFlagsBits.ManageMessages) ?? false,
        isBroadcaster: message.guild?.ownerId === message.author.id,
      };

      this.messageHandlers.forEach(handler => handler(chatMessage));
    });

    this.client.on(Events.Error, (error) => {
      console.error('[Discord] Client error:', error);
    });
  }

  async connect(): Promise<void> {
    await this.client.login(this.config.token);
  }

  async disconnect(): Promise<void> {
    await this.client.destroy();
    console.log('[Discord] Disconnected');
  }

  async sendMessage(channelId: string, content: OutgoingMessage): Promise<void> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      console.warn(`[Discord] Cannot send message - channel ${channelId} is not a text channel`);
      return;
    }

    if (typeof content === 'string') {
      await channel.send(content);
    } else {
      await channel.send({ embeds: [cardToEmbed(content)] });
    }
  }

  onMessage(handler: (message: ChatMessage) => void): void {
    this.messageHandlers.push(handler);
  }
}
