import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { WebServer } from './WebServer';
import { QueueManager, SessionRegistry } from '../services';

describe('WebServer', () => {
  let queues: QueueManager;
  let sessions: SessionRegistry;
  let server: WebServer;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    queues = new QueueManager();
    sessions = new SessionRegistry();
    server = new WebServer(queues, sessions, { port: 0 });
  });

  it('answers the keep-alive probe', async () => {
    const res = await request(server.handler).get('/');

    expect(res.status).toBe(200);
    expect(res.text).toBe('Bot is alive!');
  });

  it('lists active sessions', async () => {
    sessions.start('discord:1', 'dQw4w9WgXcQ');

    const res = await request(server.handler).get('/api/sessions');

    expect(res.status).toBe(200);
    expect(res.body.sessions).toHaveLength(1);
    expect(res.body.sessions[0]).toMatchObject({ scope: 'discord:1', videoId: 'dQw4w9WgXcQ' });
  });

  it('returns 404 for a scope without a queue', async () => {
    const res = await request(server.handler).get('/api/queue/discord%3A9');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'No queue for discord:9' });
  });

  it('shows a queue with entry statuses', async () => {
    queues.append('discord:1', {
      title: 'Song A',
      requestedBy: 'Alice',
      origin: 'live-chat',
      requestedAt: new Date('2024-01-01T00:00:00.000Z'),
    });
    queues.append('discord:1', {
      title: 'Song B',
      requestedBy: 'Bob',
      origin: 'manual',
      requestedAt: new Date('2024-01-01T00:01:00.000Z'),
    });
    queues.forScope('discord:1').advance();

    const res = await request(server.handler).get('/api/queue/discord%3A1');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      scope: 'discord:1',
      total: 2,
      playedIndex: 1,
      skipped: 0,
      liveVideoId: null,
      entries: [
        {
          seq: 1,
          status: 'current',
          title: 'Song A',
          requestedBy: 'Alice',
          origin: 'live-chat',
          requestedAt: '2024-01-01T00:00:00.000Z',
        },
        {
          seq: 2,
          status: 'upcoming',
          title: 'Song B',
          requestedBy: 'Bob',
          origin: 'manual',
          requestedAt: '2024-01-01T00:01:00.000Z',
        },
      ],
    });
  });
});
