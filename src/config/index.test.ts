import { describe, it, expect } from 'vitest';
import { loadConfig } from './index';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.discord.token).toBe('');
    expect(config.twitch.channels).toEqual([]);
    expect(config.youtube.apiKey).toBeUndefined();
    expect(config.web.port).toBe(8080);
    expect(config.bot).toEqual({
      commandPrefix: '!',
      requestMarker: '!req',
      minPollIntervalSeconds: 20,
      manualRequestLabel: 'Trakteer',
      resetQueueOnStart: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      DISCORD_TOKEN: 'test-token',
      TWITCH_USERNAME: 'relaybot',
      TWITCH_OAUTH_TOKEN: 'oauth:test-secret',
      TWITCH_CHANNELS: ' first, second ,,',
      YOUTUBE_API_KEY: 'test-api-key',
      WEB_PORT: '3000',
      COMMAND_PREFIX: '?',
      REQUEST_MARKER: '#song',
      POLL_MIN_INTERVAL_SECONDS: '30',
      MANUAL_REQUEST_LABEL: 'Donation',
      RESET_QUEUE_ON_START: 'Yes',
    });

    expect(config.discord.token).toBe('test-token');
    expect(config.twitch).toEqual({ username: 'relaybot', oauthToken: 'oauth:test-secret', channels: ['first', 'second'] });
    expect(config.youtube.apiKey).toBe('test-api-key');
    expect(config.web.port).toBe(3000);
    expect(config.bot).toEqual({
      commandPrefix: '?',
      requestMarker: '#song',
      minPollIntervalSeconds: 30,
      manualRequestLabel: 'Donation',
      resetQueueOnStart: true,
    });
  });

  it('keeps the poll interval at or above 20 seconds', () => {
    expect(loadConfig({ POLL_MIN_INTERVAL_SECONDS: 'twenty' }).bot.minPollIntervalSeconds).toBe(20);
    expect(loadConfig({ POLL_MIN_INTERVAL_SECONDS: '5' }).bot.minPollIntervalSeconds).toBe(20);
    expect(loadConfig({ POLL_MIN_INTERVAL_SECONDS: '0' }).bot.minPollIntervalSeconds).toBe(20);
    expect(loadConfig({ POLL_MIN_INTERVAL_SECONDS: '' }).bot.minPollIntervalSeconds).toBe(20);
  });
});
