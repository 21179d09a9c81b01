import { BotConfig, ChatMessage, CommandContext, CommandHandler, Reply, SongRequest, scopeKey } from '../types';
import { BotError, ConflictError, NotFoundError, ValidationError, isBotError } from '../errors';
import { ChatPoller, DeleteFailure, LiveSession, QueueManager, SessionRegistry } from '../services';
import { CardFormatter } from '../utils/cards';
import { extractVideoId } from '../utils/youtube';
import { parseAddArgument } from './parseAddArgument';

export interface CommandProcessorDeps {
  queues: QueueManager;
  sessions: SessionRegistry;
  /** Null when no YouTube API key is configured. */
  poller: ChatPoller | null;
  formatter: CardFormatter;
  config: BotConfig['bot'];
}

export class CommandProcessor {
  private commands: Map<string, CommandHandler> = new Map();
  private readonly queues: QueueManager;
  private readonly sessions: SessionRegistry;
  private readonly poller: ChatPoller | null;
  private readonly formatter: CardFormatter;
  private readonly prefix: string;
  private readonly pollTasks: Set<Promise<void>> = new Set();

  constructor(private deps: CommandProcessorDeps) {
    this.queues = deps.queues;
    this.sessions = deps.sessions;
    this.poller = deps.poller;
    this.formatter = deps.formatter;
    this.prefix = deps.config.commandPrefix;
    this.registerCommands();
  }

  private registerCommands(): void {
    // Live chat session
    this.commands.set('start_live_chat', this.handleStart.bind(this));
    this.commands.set('start', this.handleStart.bind(this)); // Alias
    this.commands.set('stop_live_chat', this.handleStop.bind(this));
    this.commands.set('end_live_chat', this.handleStop.bind(this)); // Alias
    this.commands.set('stop', this.handleStop.bind(this)); // Alias
    this.commands.set('live_status', this.handleStatus.bind(this));
    this.commands.set('status', this.handleStatus.bind(this)); // Alias

    // Queue
    this.commands.set('add', this.handleAdd.bind(this));
    this.commands.set('current_song', this.handleCurrent.bind(this));
    this.commands.set('current', this.handleCurrent.bind(this)); // Alias
    this.commands.set('next', this.handleNext.bind(this));
    this.commands.set('list_song', this.handleList.bind(this));
    this.commands.set('list', this.handleList.bind(this)); // Alias
    this.commands.set('delete', this.handleDelete.bind(this));

    // Misc
    this.commands.set('help_live', this.handleHelp.bind(this));
    this.commands.set('help', this.handleHelp.bind(this)); // Alias
    this.commands.set('hello', this.handleHello.bind(this));
  }

  async processMessage(message: ChatMessage, sendReply: Reply): Promise<void> {
    const text = message.message.trim();

    if (!text.startsWith(this.prefix)) {
      return;
    }

    const body = text.slice(this.prefix.length);
    const commandName = body.split(/\s+/, 1)[0].toLowerCase();
    const handler = this.commands.get(commandName);
    if (!handler) {
      return;
    }

    const argText = body.slice(commandName.length).trim();
    const ctx: CommandContext = {
      message,
      scope: scopeKey(message.platform, message.channelId),
      args: argText ? argText.split(/\s+/) : [],
      argText,
      reply: sendReply,
    };

    try {
      await handler(ctx);
    } catch (error) {
      if (isBotError(error)) {
        await this.safeReply(sendReply, `❌ ${error.message}`);
        return;
      }
      console.error(`[Command] Error handling ${commandName}:`, error);
      await this.safeReply(sendReply, '❌ Sorry, something went wrong processing that command.');
    }
  }

  private async safeReply(reply: Reply, text: string): Promise<void> {
    try {
      await reply(text);
    } catch (error) {
      console.error('[Command] Failed to send reply:', error);
    }
  }

  /** Resolves once every poll task spawned so far has finished. */
  async idle(): Promise<void> {
    await Promise.all([...this.pollTasks]);
  }

  // ============ Live chat session ============

  private async handleStart(ctx: CommandContext): Promise<void> {
    const { scope, args, reply } = ctx;

    if (args.length === 0) {
      throw new ValidationError(`Missing required argument. Use \`${this.prefix}help_live\` for command usage.`);
    }
    if (!this.poller) {
      throw new ValidationError('YouTube API is not configured. Please check your API key.');
    }

    const videoId = extractVideoId(args[0]);
    if (!videoId) {
      throw new ValidationError("That doesn't look like a valid YouTube URL.");
    }

    const result = this.sessions.start(scope, videoId);
    if (!result.ok) {
      throw new ConflictError(
        `Already monitoring a live chat in this channel. Use \`${this.prefix}stop_live_chat\` first.`
      );
    }

    if (this.deps.config.resetQueueOnStart) {
      this.queues.reset(scope);
    }

    this.spawn(this.poller, result.session, reply);
    await reply(`🔄 Starting to monitor live chat for video: \`${videoId}\``);
  }

  private spawn(poller: ChatPoller, session: LiveSession, reply: Reply): void {
    const task = poller
      .run(session, reply)
      .then(state => {
        console.log(`[Command] Poll task for ${session.scope} finished: ${state}`);
      })
      .catch(error => {
        console.error(`[Command] Poll task for ${session.scope} crashed:`, error);
        this.sessions.release(session);
      })
      .finally(() => {
        this.pollTasks.delete(task);
      });
    this.pollTasks.add(task);
  }

  private async handleStop(ctx: CommandContext): Promise<void> {
    const result = this.sessions.stop(ctx.scope);
    if (!result.ok) {
      throw new NotFoundError('No active live chat monitoring in this channel.');
    }
    await ctx.reply('🛑 Stopped live chat monitoring for this channel.');
  }

  private async handleStatus(ctx: CommandContext): Promise<void> {
    const videoId = this.sessions.status(ctx.scope);
    if (videoId) {
      await ctx.reply(`✅ Currently monitoring live chat for video: \`${videoId}\``);
    } else {
      await ctx.reply('❌ No active live chat monitoring in this channel.');
    }
  }

  // ============ Queue ============

  private async handleAdd(ctx: CommandContext): Promise<void> {
    const { scope, argText, message, reply } = ctx;

    if (!this.sessions.status(scope)) {
      throw new NotFoundError('No active live chat monitoring in this channel.');
    }

    const parsed = parseAddArgument(argText);
    if (!parsed) {
      throw new ValidationError(`Usage: \`${this.prefix}add <song>-<requester>\` (e.g. \`${this.prefix}add Miniature-Ryo\`)`);
    }

    const request: SongRequest = {
      title: parsed.title,
      requestedBy: parsed.requester,
      origin: 'manual',
      requestedAt: message.timestamp,
    };
    const seq = this.queues.append(scope, request);
    await reply(this.formatter.manualRequest({ seq, request }));
  }

  private async handleCurrent(ctx: CommandContext): Promise<void> {
    const queue = this.queues.view(ctx.scope);
    await ctx.reply(this.formatter.currentSong(queue.current()));
  }

  private async handleNext(ctx: CommandContext): Promise<void> {
    const queue = this.queues.view(ctx.scope);
    await ctx.reply(this.formatter.advance(queue.advance()));
  }

  private async handleList(ctx: CommandContext): Promise<void> {
    const queue = this.queues.view(ctx.scope);
    await ctx.reply(this.formatter.queueList(queue.list()));
  }

  private async handleDelete(ctx: CommandContext): Promise<void> {
    const { scope, args, reply } = ctx;

    if (args.length === 0 || !/^-?\d+$/.test(args[0])) {
      throw new ValidationError(`Usage: \`${this.prefix}delete <number in the list>\``);
    }

    const queue = this.queues.view(scope);
    const result = queue.delete(parseInt(args[0], 10));
    if (!result.ok) {
      throw this.deleteError(result.reason, result.size, args[0]);
    }

    await reply(this.formatter.deleted(result.removed, result.remaining));
  }

  private deleteError(reason: DeleteFailure, size: number, requested: string): BotError {
    switch (reason) {
      case 'empty':
        return new ValidationError('Queue is empty! No songs to delete.');
      case 'out-of-range':
        return new ValidationError(`Invalid song ID! Please use a number between 1 and ${size}`);
      case 'not-found':
        return new NotFoundError(`Song #${requested} not found in queue!`);
      case 'protected':
        return new ConflictError(`Cannot delete the currently playing song! Use \`${this.prefix}next\` to skip it.`);
    }
  }

  // ============ Misc ============

  private async handleHelp(ctx: CommandContext): Promise<void> {
    await ctx.reply(this.formatter.help(this.deps.config.requestMarker));
  }

  private async handleHello(ctx: CommandContext): Promise<void> {
    await ctx.reply(`Hello ${ctx.message.username}! 👋`);
  }
}
