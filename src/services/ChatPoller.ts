import { LiveChatItem, LiveChatSource, OutgoingMessage, Reply, SongRequest } from '../types';
import { errorMessage } from '../errors';
import { CardFormatter } from '../utils/cards';
import { QueueManager } from './QueueManager';
import { LiveSession, SessionRegistry } from './SessionRegistry';

export type PollerState = 'starting' | 'polling' | 'stopped' | 'failed' | 'ended';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ChatPollerOptions {
  requestMarker: string;
  minPollIntervalSeconds: number;
  formatter: CardFormatter;
  sleep?: Sleep;
}

/**
 * Wait for `ms`, returning early once `signal` aborts.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Polls the live chat of one session's video and queues every message that
 * starts with the request marker.
 *
 * Appends are synchronous and happen between the loop's awaits (fetch, relay,
 * sleep), so they never interleave with command handlers on the same queue.
 */
export class ChatPoller {
  private sleep: Sleep;

  constructor(
    private source: LiveChatSource,
    private queues: QueueManager,
    private sessions: SessionRegistry,
    private options: ChatPollerOptions
  ) {
    this.sleep = options.sleep || abortableSleep;
  }

  /**
   * Run the session until it is stopped, the stream has no chat, or a fetch
   * fails. Resolves with the terminal state; notices go to `notify`.
   */
  async run(session: LiveSession, notify: Reply): Promise<PollerState> {
    const tag = `[Poller] ${session.scope}`;
    let state: PollerState = 'starting';

    try {
      const handle = await this.source.resolveChatHandle(session.videoId);
      if (!handle) {
        state = 'ended';
        console.log(`${tag} ${session.videoId} has no active live chat`);
        this.sessions.release(session);
        await this.send(notify, "❌ This video doesn't have an active live chat or isn't currently live.");
        return state;
      }

      state = 'polling';
      await this.send(notify, `✅ Started monitoring live chat for video: \`${session.videoId}\``);
      state = await this.poll(session, handle, notify);
    } catch (error) {
      state = 'failed';
      console.error(`${tag} Live chat fetch error:`, error);
      await this.send(notify, `❌ Error while fetching live chat: ${errorMessage(error)}`);
    }

    this.sessions.release(session);
    console.log(`${tag} ${state}`);
    await this.send(notify, '🛑 Stopped monitoring live chat.');
    return state;
  }

  private async poll(session: LiveSession, handle: string, notify: Reply): Promise<PollerState> {
    const seen: Set<string> = new Set();
    let cursor: string | null = null;

    while (this.sessions.isCurrent(session)) {
      const page = await this.source.fetchChatPage(handle, cursor);

      for (const item of page.items) {
        if (seen.has(item.id)) continue;
        if (!this.sessions.isCurrent(session)) {
          return 'stopped';
        }

        seen.add(item.id);
        await this.handleItem(session, item, notify);
      }

      cursor = page.nextCursor;

      const seconds = Math.max(page.suggestedIntervalSeconds, this.options.minPollIntervalSeconds);
      await this.sleep(seconds * 1000, session.signal);
    }

    return 'stopped';
  }

  private async handleItem(session: LiveSession, item: LiveChatItem, notify: Reply): Promise<void> {
    const marker = this.options.requestMarker;
    if (!item.text.toLowerCase().startsWith(marker.toLowerCase())) {
      return;
    }

    const title = item.text.slice(marker.length).trim();
    if (!title) {
      return;
    }

    const request: SongRequest = {
      title,
      requestedBy: item.authorName,
      origin: 'live-chat',
      requestedAt: new Date(),
    };
    const seq = this.queues.append(session.scope, request);
    await this.send(notify, this.options.formatter.liveChatRequest({ seq, request }, item.text));
  }

  private async send(notify: Reply, content: OutgoingMessage): Promise<void> {
    try {
      await notify(content);
    } catch (error) {
      console.error('[Poller] Failed to send notice:', error);
    }
  }
}
