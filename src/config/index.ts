import * as dotenv from 'dotenv';
import { BotConfig } from '../types';

dotenv.config();

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function parseFlag(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value || '').trim().toLowerCase());
}

/** Floor between live chat polls, in seconds. */
export const MIN_POLL_INTERVAL_SECONDS = 20;

function parsePollInterval(value: string | undefined): number {
  const seconds = Number(value);
  if (!value || !Number.isFinite(seconds)) {
    return MIN_POLL_INTERVAL_SECONDS;
  }
  return Math.max(seconds, MIN_POLL_INTERVAL_SECONDS);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  return {
    discord: {
      token: env.DISCORD_TOKEN || '',
    },
    twitch: {
      username: env.TWITCH_USERNAME || '',
      oauthToken: env.TWITCH_OAUTH_TOKEN || '',
      channels: parseList(env.TWITCH_CHANNELS),
    },
    youtube: {
      apiKey: env.YOUTUBE_API_KEY || undefined,
    },
    web: {
      port: parseInt(env.WEB_PORT || '8080', 10),
    },
    bot: {
      commandPrefix: env.COMMAND_PREFIX || '!',
      requestMarker: env.REQUEST_MARKER || '!req',
      minPollIntervalSeconds: parsePollInterval(env.POLL_MIN_INTERVAL_SECONDS),
      manualRequestLabel: env.MANUAL_REQUEST_LABEL || 'Trakteer',
      resetQueueOnStart: parseFlag(env.RESET_QUEUE_ON_START),
    },
  };
}
