export interface AddArgument {
  title: string;
  requester: string;
}

/**
 * Parse `<title>-<requester>`. The first unescaped hyphen separates the two
 * parts; `\-` is a literal hyphen and `\\` a literal backslash on either
 * side. Returns null when the separator is missing or either side is blank.
 */
export function parseAddArgument(input: string): AddArgument | null {
  const parts = ['', ''];
  let side = 0;
  let index = 0;

  while (index < input.length) {
    const char = input[index];
    const following = input[index + 1];

    if (char === '\\' && (following === '-' || following === '\\')) {
      parts[side] += following;
      index += 2;
      continue;
    }
    if (char === '-' && side === 0) {
      side = 1;
      index += 1;
      continue;
    }

    parts[side] += char;
    index += 1;
  }

  if (side === 0) {
    return null;
  }

  const title = parts[0].trim();
  const requester = parts[1].trim();
  if (!title || !requester) {
    return null;
  }

  return { title, requester };
}
