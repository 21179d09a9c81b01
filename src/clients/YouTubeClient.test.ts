import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UpstreamError } from '../errors';

const { videosList, chatMessagesList } = vi.hoisted(() => ({
  videosList: vi.fn(),
  chatMessagesList: vi.fn(),
}));

vi.mock('googleapis', () => ({
  google: {
    youtube: () => ({
      videos: { list: videosList },
      liveChatMessages: { list: chatMessagesList },
    }),
  },
}));

import { YouTubeClient } from './YouTubeClient';

describe('YouTubeClient', () => {
  let client: YouTubeClient;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    videosList.mockReset();
    chatMessagesList.mockReset();
    client = new YouTubeClient({ apiKey: 'test-api-key' });
  });

  it('requires an API key', () => {
    expect(() => new YouTubeClient({})).toThrow('YouTube API key required');
  });

  describe('resolveChatHandle', () => {
    it('returns the active live chat id', async () => {
      videosList.mockResolvedValueOnce({
        data: { items: [{ liveStreamingDetails: { activeLiveChatId: 'chat-123' } }] },
      });

      await expect(client.resolveChatHandle('dQw4w9WgXcQ')).resolves.toBe('chat-123');
      expect(videosList).toHaveBeenCalledWith({ part: ['liveStreamingDetails'], id: ['dQw4w9WgXcQ'] });
    });

    it('returns null for a video that is not live', async () => {
      videosList.mockResolvedValueOnce({ data: { items: [{ liveStreamingDetails: {} }] } });

      await expect(client.resolveChatHandle('dQw4w9WgXcQ')).resolves.toBeNull();
    });

    it('returns null for an unknown video', async () => {
      videosList.mockResolvedValueOnce({ data: { items: [] } });

      await expect(client.resolveChatHandle('dQw4w9WgXcQ')).resolves.toBeNull();
    });

    it('returns null when the lookup fails', async () => {
      videosList.mockRejectedValueOnce(new Error('network down'));

      await expect(client.resolveChatHandle('dQw4w9WgXcQ')).resolves.toBeNull();
    });
  });

  describe('fetchChatPage', () => {
    it('maps chat items and paging hints', async () => {
      chatMessagesList.mockResolvedValueOnce({
        data: {
          nextPageToken: 'page-2',
          pollingIntervalMillis: 7000,
          items: [
            { id: 'm1', snippet: { displayMessage: '!req Song A' }, authorDetails: { displayName: 'Alice' } },
            { snippet: { displayMessage: 'no id' }, authorDetails: { displayName: 'Ghost' } },
            { id: 'm2', snippet: {}, authorDetails: {} },
          ],
        },
      });

      const page = await client.fetchChatPage('chat-123', null);

      expect(chatMessagesList).toHaveBeenCalledWith({
        liveChatId: 'chat-123',
        part: ['snippet', 'authorDetails'],
        pageToken: undefined,
      });
      expect(page).toEqual({
        items: [
          { id: 'm1', text: '!req Song A', authorName: 'Alice' },
          { id: 'm2', text: '', authorName: 'Anonymous' },
        ],
        nextCursor: 'page-2',
        suggestedIntervalSeconds: 7,
      });
    });

    it('passes the cursor and defaults missing hints', async () => {
      chatMessagesList.mockResolvedValueOnce({ data: {} });

      const page = await client.fetchChatPage('chat-123', 'page-2');

      expect(chatMessagesList.mock.calls[0][0]).toMatchObject({ pageToken: 'page-2' });
      expect(page).toEqual({ items: [], nextCursor: null, suggestedIntervalSeconds: 5 });
    });

    it('wraps API failures in an UpstreamError', async () => {
      chatMessagesList.mockRejectedValueOnce(Object.assign(new Error('quotaExceeded'), { code: 403 }));

      const failure = client.fetchChatPage('chat-123', null);

      await expect(failure).rejects.toBeInstanceOf(UpstreamError);
      await expect(failure).rejects.toMatchObject({ message: 'quotaExceeded', status: 403, kind: 'upstream' });
    });
  });
});
