import { ListedEntry, QueueEntry, SongRequest } from '../types';

/** Beyond this many entries the listing is windowed. */
export const LIST_DISPLAY_LIMIT = 24;
const LIST_WINDOW_ROWS = LIST_DISPLAY_LIMIT - 1;
const RECENT_PLAYED_SHOWN = 3;

export type CurrentResult =
  | { kind: 'empty' }
  | { kind: 'not-started'; upcoming: QueueEntry }
  | { kind: 'playing'; current: QueueEntry; next: QueueEntry | null };

export type AdvanceResult =
  | { kind: 'empty' }
  | { kind: 'advanced'; current: QueueEntry; next: QueueEntry | null }
  | { kind: 'at-end'; current: QueueEntry };

export type DeleteFailure = 'empty' | 'out-of-range' | 'not-found' | 'protected';

export type DeleteResult =
  | { ok: true; removed: QueueEntry; remaining: number }
  | { ok: false; reason: DeleteFailure; size: number };

export interface QueueListing {
  entries: ListedEntry[];
  /** Entries hidden ahead of the first shown row; 0 when no marker is due. */
  skipped: number;
  playedIndex: number;
  total: number;
}

/**
 * Request queue for a single scope.
 *
 * Entries are addressed by dense 1-based sequence numbers which are compacted
 * on every delete. `playedIndex` is the number of the entry currently playing
 * (0 before the first advance).
 *
 * Every method runs to completion without awaiting, so callers on the event
 * loop always observe a fully renumbered queue.
 */
export class SongQueue {
  private entries: Map<number, SongRequest> = new Map();
  private nextSeq: number = 0;
  private played: number = 0;

  get size(): number {
    return this.entries.size;
  }

  get playedIndex(): number {
    return this.played;
  }

  append(request: SongRequest): number {
    const seq = this.nextSeq + 1;
    this.entries.set(seq, request);
    this.nextSeq = seq;
    return seq;
  }

  at(seq: number): QueueEntry | null {
    const request = this.entries.get(seq);
    return request ? { seq, request } : null;
  }

  current(): CurrentResult {
    if (this.size === 0) {
      return { kind: 'empty' };
    }

    const current = this.at(this.played);
    if (!current) {
      const upcoming = this.at(1);
      return upcoming ? { kind: 'not-started', upcoming } : { kind: 'empty' };
    }

    return { kind: 'playing', current, next: this.at(this.played + 1) };
  }

  advance(): AdvanceResult {
    const total = this.size;
    if (total === 0) {
      return { kind: 'empty' };
    }

    if (this.played >= total) {
      const current = this.at(this.played);
      return current ? { kind: 'at-end', current } : { kind: 'empty' };
    }

    this.played += 1;
    const current = this.at(this.played);
    if (!current) {
      // Unreachable while numbering stays dense
      throw new Error(`Queue entry #${this.played} is missing`);
    }

    return {
      kind: 'advanced',
      current,
      next: this.played < total ? this.at(this.played + 1) : null,
    };
  }

  delete(seq: number): DeleteResult {
    const size = this.size;
    if (size === 0) {
      return { ok: false, reason: 'empty', size };
    }
    if (!Number.isInteger(seq) || seq < 1 || seq > this.nextSeq) {
      return { ok: false, reason: 'out-of-range', size };
    }

    const request = this.entries.get(seq);
    if (!request) {
      return { ok: false, reason: 'not-found', size };
    }
    if (seq === this.played) {
      return { ok: false, reason: 'protected', size };
    }

    this.entries.delete(seq);
    this.renumber();

    return { ok: true, removed: { seq, request }, remaining: this.size };
  }

  /**
   * Compact the remaining entries into 1..N keeping their order, and move
   * `playedIndex` along with the entry it pointed at.
   */
  private renumber(): void {
    const ordered = [...this.entries.entries()].sort(([a], [b]) => a - b);
    const compacted: Map<number, SongRequest> = new Map();
    let played = 0;

    ordered.forEach(([oldSeq, request], index) => {
      const newSeq = index + 1;
      compacted.set(newSeq, request);
      if (oldSeq === this.played) {
        played = newSeq;
      }
    });

    this.entries = compacted;
    this.nextSeq = compacted.size;
    this.played = played;
  }

  list(): QueueListing {
    const total = this.size;
    const played = this.played;
    const seqs = this.windowSeqs(total, played);

    const entries: ListedEntry[] = [];
    for (const seq of seqs) {
      const entry = this.at(seq);
      if (!entry) continue;
      entries.push({
        ...entry,
        status: seq < played ? 'played' : seq === played ? 'current' : 'upcoming',
      });
    }

    const firstShown = entries.length > 0 ? entries[0].seq : 1;
    const showMarker = total > LIST_DISPLAY_LIMIT && played > RECENT_PLAYED_SHOWN;

    return {
      entries,
      skipped: showMarker ? firstShown - 1 : 0,
      playedIndex: played,
      total,
    };
  }

  private windowSeqs(total: number, played: number): number[] {
    if (total <= LIST_DISPLAY_LIMIT) {
      return range(1, total);
    }

    let seqs: number[] = [];
    if (played > 0) {
      seqs.push(...range(Math.max(1, played - (RECENT_PLAYED_SHOWN - 1)), played));
    }
    if (played < total) {
      seqs.push(...range(played + 1, total));
    }

    if (seqs.length > LIST_WINDOW_ROWS) {
      if (played > 0) {
        const upcoming = Math.min(LIST_WINDOW_ROWS - 1, total - played);
        seqs = [played, ...range(played + 1, played + upcoming)];
      } else {
        seqs = range(1, Math.min(LIST_WINDOW_ROWS, total));
      }
    }

    return seqs;
  }

  reset(): void {
    this.entries.clear();
    this.nextSeq = 0;
    this.played = 0;
  }
}

function range(from: number, to: number): number[] {
  const result: number[] = [];
  for (let i = from; i <= to; i++) {
    result.push(i);
  }
  return result;
}

/**
 * Owns one SongQueue per scope. Queues outlive live chat sessions.
 */
export class QueueManager {
  private queues: Map<string, SongQueue> = new Map();

  forScope(scope: string): SongQueue {
    let queue = this.queues.get(scope);
    if (!queue) {
      queue = new SongQueue();
      this.queues.set(scope, queue);
    }
    return queue;
  }

  find(scope: string): SongQueue | null {
    return this.queues.get(scope) || null;
  }

  /**
   * The scope's queue, or a detached empty one when the scope has none yet.
   * Lets read-only commands answer without registering a queue.
   */
  view(scope: string): SongQueue {
    return this.queues.get(scope) || new SongQueue();
  }

  append(scope: string, request: SongRequest): number {
    const seq = this.forScope(scope).append(request);
    console.log(`[Queue] ${scope} #${seq}: ${request.title} (${request.requestedBy})`);
    return seq;
  }

  reset(scope: string): void {
    const queue = this.queues.get(scope);
    if (queue) {
      queue.reset();
      console.log(`[Queue] ${scope} cleared`);
    }
  }

  scopes(): string[] {
    return [...this.queues.keys()];
  }
}
