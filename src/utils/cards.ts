import { Card, CardField, QueueEntry, SongRequest } from '../types';
import { AdvanceResult, CurrentResult, QueueListing } from '../services/QueueManager';

export const COLORS = {
  red: 0xe74c3c,
  blue: 0x3498db,
  darkPurple: 0x71368a,
  magenta: 0xe91e63,
  purple: 0x9b59b6,
} as const;

export const LIVE_CHAT_FOOTER = 'YouTube Live Chat';

/**
 * Builds the cards the bot posts. Manual requests carry the configured label,
 * e.g. "(Trakteer) - Song".
 */
export class CardFormatter {
  constructor(
    private manualLabel: string,
    private prefix: string = '!'
  ) {}

  songTitle(request: SongRequest): string {
    return request.origin === 'manual' ? `(${this.manualLabel}) - ${request.title}` : request.title;
  }

  describe(request: SongRequest): string {
    return `${this.songTitle(request)} - ${request.requestedBy}`;
  }

  liveChatRequest(entry: QueueEntry, originalText: string): Card {
    return {
      title: `Request #${entry.seq}`,
      description: originalText,
      color: COLORS.red,
      author: entry.request.requestedBy,
      footer: LIVE_CHAT_FOOTER,
    };
  }

  manualRequest(entry: QueueEntry): Card {
    return {
      title: `Request #${entry.seq}`,
      description: this.songTitle(entry.request),
      color: COLORS.red,
      author: entry.request.requestedBy,
      footer: `${this.manualLabel} Request Chat`,
    };
  }

  private currentValue(result: CurrentResult): string {
    switch (result.kind) {
      case 'empty':
        return 'There are no songs in the queue right now!';
      case 'not-started':
        return `Nothing has been played yet. Next: ${this.describe(result.upcoming.request)}`;
      case 'playing':
        return this.describe(result.current.request);
    }
  }

  currentSong(result: CurrentResult): Card {
    const fields: CardField[] = [{ name: 'Current Song', value: this.currentValue(result) }];
    if (result.kind === 'playing' && result.next) {
      fields.push({ name: 'Next Song', value: this.describe(result.next.request) });
    }

    return { title: 'Current Song', color: COLORS.blue, fields };
  }

  advance(result: AdvanceResult): Card {
    const card: Card = { title: 'Move to the next song', color: COLORS.darkPurple, fields: [] };

    switch (result.kind) {
      case 'empty':
        card.fields = [{ name: 'Queue Empty', value: 'There are no songs in the queue!' }];
        break;
      case 'at-end':
        card.fields = [{ name: 'Info', value: 'Already at the last song!' }];
        break;
      case 'advanced':
        card.fields = [
          { name: 'Now Playing', value: this.describe(result.current.request) },
          {
            name: 'Next Song',
            value: result.next ? this.describe(result.next.request) : 'No more songs after this one!',
          },
        ];
        break;
    }

    return card;
  }

  queueList(listing: QueueListing): Card {
    const card: Card = { title: 'List song', color: COLORS.magenta, fields: [] };

    if (listing.total === 0) {
      card.fields = [{ name: 'Queue Status', value: 'There are no songs in the queue!' }];
      card.footer = 'No songs in queue';
      return card;
    }

    const fields: CardField[] = [];
    for (const entry of listing.entries) {
      if (listing.skipped > 0 && entry.status === 'current') {
        fields.push({ name: '...', value: `⏸️ ${listing.skipped} songs skipped for display` });
      }

      const text = this.describe(entry.request);
      switch (entry.status) {
        case 'played':
          fields.push({ name: `#${entry.seq}`, value: `✅ ${text}` });
          break;
        case 'current':
          fields.push({ name: `#${entry.seq} 🎵`, value: `▶️ ${text}` });
          break;
        case 'upcoming':
          fields.push({ name: `#${entry.seq}`, value: `⏳ ${text}` });
          break;
      }
    }

    card.fields = fields;
    card.footer = `${listing.playedIndex}/${listing.total} played | Total: ${listing.total} songs`;
    return card;
  }

  deleted(removed: QueueEntry, remaining: number): Card {
    return {
      title: 'Song Deleted',
      color: COLORS.red,
      fields: [
        { name: `Deleted Song #${removed.seq}`, value: `🗑️ ${this.describe(removed.request)}` },
        { name: 'Queue Status', value: `Remaining songs: ${remaining}` },
      ],
    };
  }

  help(requestMarker: string): Card {
    const p = this.prefix;
    return {
      title: '🎶 Live Request Bot',
      description: 'Collects song requests from YouTube live chat while the stream is running.',
      color: COLORS.purple,
      fields: [
        {
          name: '📥 Live chat requests',
          value: `Any live chat message starting with \`${requestMarker}\` is added to the queue together with who requested it.`,
        },
        {
          name: `💖 ${this.manualLabel} requests`,
          value: `\`${p}add <song>-<requester>\`, e.g. \`${p}add Miniature-Ryo\`. Use \`\\-\` for a hyphen inside the song.`,
        },
        { name: '🗑️ Delete a song', value: `\`${p}delete <number in the list>\`` },
        {
          name: '⚙️ Commands',
          value: [
            `${p}start_live_chat <link>  start monitoring a live stream`,
            `${p}stop_live_chat          stop monitoring`,
            `${p}live_status             show the monitored video`,
            `${p}list_song               list songs with their status`,
            `${p}current_song            show the song being played`,
            `${p}next                    move to the next song`,
            `${p}help_live               show this help`,
          ].join('\n'),
        },
      ],
      footer: 'Live Request Bot',
    };
  }
}

/**
 * Flatten a card for text-only chats, one line per part.
 */
export function cardToText(card: Card): string {
  const lines: string[] = [];
  if (card.title) lines.push(card.title);
  if (card.author && card.description) {
    lines.push(`${card.author}: ${card.description}`);
  } else if (card.author) {
    lines.push(card.author);
  } else if (card.description) {
    lines.push(card.description);
  }
  for (const field of card.fields || []) {
    lines.push(`${field.name}: ${field.value}`);
  }
  if (card.footer) lines.push(`(${card.footer})`);
  return lines.join('\n');
}
