import { google, youtube_v3 } from 'googleapis';
import { BotConfig, LiveChatItem, LiveChatPage, LiveChatSource } from '../types';
import { UpstreamError, errorMessage } from '../errors';

const DEFAULT_POLLING_INTERVAL_MS = 5000;

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error) {
    const code = error.code;
    if (typeof code === 'number') return code;
    if (typeof code === 'string' && /^\d+$/.test(code)) return parseInt(code, 10);
  }
  return undefined;
}

/**
 * Read-only live chat access through the YouTube Data API v3 with an API key.
 */
export class YouTubeClient implements LiveChatSource {
  private youtube: youtube_v3.Youtube;

  constructor(config: BotConfig['youtube']) {
    if (!config.apiKey) {
      throw new Error('YouTube API key required');
    }
    this.youtube = google.youtube({ version: 'v3', auth: config.apiKey });
  }

  async resolveChatHandle(videoId: string): Promise<string | null> {
    try {
      const response = await this.youtube.videos.list({
        part: ['liveStreamingDetails'],
        id: [videoId],
      });

      const details = response.data.items?.[0]?.liveStreamingDetails;
      return details?.activeLiveChatId || null;
    } catch (error) {
      console.error('[YouTube] Error getting live chat ID:', errorMessage(error));
      return null;
    }
  }

  async fetchChatPage(handle: string, cursor: string | null): Promise<LiveChatPage> {
    try {
      const response = await this.youtube.liveChatMessages.list({
        liveChatId: handle,
        part: ['snippet', 'authorDetails'],
        pageToken: cursor || undefined,
      });
      return this.toPage(response.data);
    } catch (error) {
      const status = statusOf(error);
      if (status === 403) {
        console.error('[YouTube] API quota exceeded or insufficient permissions');
      } else if (status === 404) {
        console.error('[YouTube] Live chat not found. Stream may have ended.');
      }
      throw new UpstreamError(errorMessage(error), status);
    }
  }

  private toPage(data: youtube_v3.Schema$LiveChatMessageListResponse): LiveChatPage {
    const items: LiveChatItem[] = [];
    for (const msg of data.items || []) {
      if (!msg.id) continue;
      items.push({
        id: msg.id,
        text: msg.snippet?.displayMessage || '',
        authorName: msg.authorDetails?.displayName || 'Anonymous',
      });
    }

    return {
      items,
      nextCursor: data.nextPageToken || null,
      suggestedIntervalSeconds: (data.pollingIntervalMillis ?? DEFAULT_POLLING_INTERVAL_MS) / 1000,
    };
  }
}
