import express, { Application, Request, Response } from 'express';
import { Server } from 'http';
import { QueueManager, SessionRegistry } from '../services';
import { BotConfig } from '../types';

/**
 * Keep-alive endpoint for hosts that idle processes without inbound traffic,
 * plus a read-only view of sessions and queues.
 */
export class WebServer {
  private app: Application;
  private server: Server | null = null;

  constructor(
    private queues: QueueManager,
    private sessions: SessionRegistry,
    private config: BotConfig['web']
  ) {
    this.app = express();
    this.setupRoutes();
  }

  get handler(): Application {
    return this.app;
  }

  private setupRoutes(): void {
    this.app.get('/', (req: Request, res: Response) => {
      res.type('text/plain').send('Bot is alive!');
    });

    this.app.get('/api/sessions', (req: Request, res: Response) => {
      res.json({
        sessions: this.sessions.list().map(session => ({
          scope: session.scope,
          videoId: session.videoId,
          startedAt: session.startedAt.toISOString(),
        })),
      });
    });

    this.app.get('/api/queue/:scope', (req: Request, res: Response) => {
      const scope = req.params.scope;
      const queue = this.queues.find(scope);
      if (!queue) {
        res.status(404).json({ error: `No queue for ${scope}` });
        return;
      }

      const listing = queue.list();
      res.json({
        scope,
        total: listing.total,
        playedIndex: listing.playedIndex,
        skipped: listing.skipped,
        liveVideoId: this.sessions.status(scope),
        entries: listing.entries.map(entry => ({
          seq: entry.seq,
          status: entry.status,
          title: entry.request.title,
          requestedBy: entry.request.requestedBy,
          origin: entry.request.origin,
          requestedAt: entry.request.requestedAt.toISOString(),
        })),
      });
    });
  }

  start(): void {
    this.server = this.app.listen(this.config.port, () => {
      console.log(`[Web] Server running on port ${this.config.port}`);
    });
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
