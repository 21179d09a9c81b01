import { loadConfig } from './config';
import { DiscordClient, TwitchClient, YouTubeClient } from './clients';
import { ChatPoller, QueueManager, SessionRegistry } from './services';
import { CommandProcessor } from './commands';
import { WebServer } from './web';
import { CardFormatter } from './utils/cards';
import { BotConfig, ChatClient, ChatMessage, OutgoingMessage } from './types';

class LiveRequestBot {
  private config: BotConfig;
  private clients: ChatClient[] = [];
  private queues: QueueManager;
  private sessions: SessionRegistry;
  private commandProcessor: CommandProcessor;
  private webServer: WebServer;

  constructor() {
    this.config = loadConfig();

    // Initialize services
    this.queues = new QueueManager();
    this.sessions = new SessionRegistry();
    const formatter = new CardFormatter(this.config.bot.manualRequestLabel, this.config.bot.commandPrefix);

    let poller: ChatPoller | null = null;
    if (this.config.youtube.apiKey) {
      poller = new ChatPoller(new YouTubeClient(this.config.youtube), this.queues, this.sessions, {
        requestMarker: this.config.bot.requestMarker,
        minPollIntervalSeconds: this.config.bot.minPollIntervalSeconds,
        formatter,
      });
      console.log('[YouTube] API client initialized');
    } else {
      console.warn('[YouTube] YOUTUBE_API_KEY not set - live chat monitoring disabled');
    }

    // Initialize command processor
    this.commandProcessor = new CommandProcessor({
      queues: this.queues,
      sessions: this.sessions,
      poller,
      formatter,
      config: this.config.bot,
    });

    // Initialize web server
    this.webServer = new WebServer(this.queues, this.sessions, this.config.web);
  }

  async start(): Promise<void> {
    console.log('='.repeat(50));
    console.log('🎶 Live Chat Request Bot');
    console.log('='.repeat(50));

    // Start web server
    this.webServer.start();

    // Connect to Discord
    if (this.config.discord.token) {
      await this.connectClient(() => new DiscordClient(this.config.discord), 'Discord');
    } else {
      console.log('[Discord] Not configured - skipping');
    }

    // Connect to Twitch
    if (this.config.twitch.username && this.config.twitch.oauthToken && this.config.twitch.channels.length > 0) {
      await this.connectClient(() => new TwitchClient(this.config.twitch), 'Twitch');
    } else {
      console.log('[Twitch] Not configured - skipping');
    }

    // Check if at least one platform is connected
    if (this.clients.length === 0) {
      console.error('\n⚠️  No chat platforms configured!');
      console.error('Please configure Discord or Twitch in your .env file.');
      console.error('See .env.example for configuration options.\n');
    }

    console.log('='.repeat(50));
    console.log('Bot is running! Press Ctrl+C to stop.');
    console.log('='.repeat(50));

    // Handle shutdown
    process.on('SIGINT', () => void this.shutdown());
    process.on('SIGTERM', () => void this.shutdown());
  }

  private async connectClient(create: () => ChatClient, name: string): Promise<void> {
    try {
      const client = create();
      this.setupChatHandler(client);
      await client.connect();
      this.clients.push(client);
    } catch (error) {
      console.error(`[${name}] Failed to connect:`, error);
    }
  }

  private setupChatHandler(client: ChatClient): void {
    client.onMessage((message: ChatMessage) => {
      // Replies and poller notices go back to the channel the command came from
      const reply = async (content: OutgoingMessage) => {
        await client.sendMessage(message.channelId, content);
      };

      this.commandProcessor.processMessage(message, reply).catch(error => {
        console.error(`[${client.platform}] Unhandled command failure:`, error);
      });
    });
  }

  private async shutdown(): Promise<void> {
    console.log('\nShutting down...');

    const stopped = this.sessions.stopAll();
    if (stopped > 0) {
      console.log(`Stopped ${stopped} live chat session(s)`);
      await this.commandProcessor.idle();
    }

    for (const client of this.clients) {
      await client.disconnect();
    }
    this.webServer.stop();

    console.log('Goodbye! 👋');
    process.exit(0);
  }
}

// Start the bot
const bot = new LiveRequestBot();
bot.start().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
