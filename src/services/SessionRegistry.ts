export interface LiveSession {
  scope: string;
  videoId: string;
  startedAt: Date;
  /** Aborted when the session is stopped or released. */
  signal: AbortSignal;
}

export type StartSessionResult =
  | { ok: true; session: LiveSession }
  | { ok: false; reason: 'already-active'; videoId: string };

export type StopSessionResult =
  | { ok: true; videoId: string }
  | { ok: false; reason: 'no-active-session' };

interface SessionRecord {
  session: LiveSession;
  controller: AbortController;
}

/**
 * At most one live chat session per scope. Removing a scope's record is the
 * stop signal its poller observes.
 */
export class SessionRegistry {
  private sessions: Map<string, SessionRecord> = new Map();

  start(scope: string, videoId: string): StartSessionResult {
    const existing = this.sessions.get(scope);
    if (existing) {
      return { ok: false, reason: 'already-active', videoId: existing.session.videoId };
    }

    const controller = new AbortController();
    const session: LiveSession = {
      scope,
      videoId,
      startedAt: new Date(),
      signal: controller.signal,
    };
    this.sessions.set(scope, { session, controller });
    console.log(`[Sessions] ${scope} -> ${videoId}`);

    return { ok: true, session };
  }

  stop(scope: string): StopSessionResult {
    const record = this.sessions.get(scope);
    if (!record) {
      return { ok: false, reason: 'no-active-session' };
    }

    this.sessions.delete(scope);
    record.controller.abort();
    console.log(`[Sessions] ${scope} stopped (${record.session.videoId})`);

    return { ok: true, videoId: record.session.videoId };
  }

  status(scope: string): string | null {
    return this.sessions.get(scope)?.session.videoId ?? null;
  }

  get(scope: string): LiveSession | null {
    return this.sessions.get(scope)?.session ?? null;
  }

  /** True while `session` is still the one registered for its scope. */
  isCurrent(session: LiveSession): boolean {
    return !session.signal.aborted && this.sessions.get(session.scope)?.session === session;
  }

  /**
   * Drop `session` if it is still registered. A newer session on the same
   * scope is left alone.
   */
  release(session: LiveSession): boolean {
    const record = this.sessions.get(session.scope);
    if (!record || record.session !== session) {
      return false;
    }

    this.sessions.delete(session.scope);
    record.controller.abort();
    console.log(`[Sessions] ${session.scope} released (${session.videoId})`);
    return true;
  }

  list(): LiveSession[] {
    return [...this.sessions.values()].map(record => record.session);
  }

  stopAll(): number {
    const scopes = [...this.sessions.keys()];
    scopes.forEach(scope => this.stop(scope));
    return scopes.length;
  }
}
