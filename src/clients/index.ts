export * from './DiscordClient';
export * from './TwitchClient';
export * from './YouTubeClient';
