const VIDEO_ID = '([a-zA-Z0-9_-]{11})';

const VIDEO_URL_PATTERNS: RegExp[] = [
  new RegExp(`(?:https?://)?(?:www\\.|m\\.)?youtube\\.com/watch\\?(?:[^#\\s]*&)?v=${VIDEO_ID}`),
  new RegExp(`(?:https?://)?(?:www\\.|m\\.)?youtube\\.com/live/${VIDEO_ID}`),
  new RegExp(`(?:https?://)?youtu\\.be/${VIDEO_ID}`),
  new RegExp(`(?:https?://)?(?:www\\.|m\\.)?youtube\\.com/embed/${VIDEO_ID}`),
  new RegExp(`(?:https?://)?(?:www\\.|m\\.)?youtube\\.com/shorts/${VIDEO_ID}`),
];

/**
 * Extract the 11-character video id from a watch, live, short-link, embed or
 * shorts URL. Returns null when nothing matches.
 */
export function extractVideoId(url: string): string | null {
  const input = url.trim();
  for (const pattern of VIDEO_URL_PATTERNS) {
    const match = pattern.exec(input);
    if (match) {
      return match[1];
    }
  }
  return null;
}
