import { describe, it, expect } from 'vitest';
import { parseAddArgument } from './parseAddArgument';

describe('parseAddArgument', () => {
  it('splits on the first hyphen', () => {
    expect(parseAddArgument('Miniature-Ryo')).toEqual({ title: 'Miniature', requester: 'Ryo' });
  });

  it('trims both sides', () => {
    expect(parseAddArgument('  Blue Bird  -  Some Viewer ')).toEqual({ title: 'Blue Bird', requester: 'Some Viewer' });
  });

  it('keeps later hyphens in the requester', () => {
    expect(parseAddArgument('Song-Mary-Jane')).toEqual({ title: 'Song', requester: 'Mary-Jane' });
  });

  it('treats an escaped hyphen as part of the title', () => {
    expect(parseAddArgument('Spider\\-Man Theme-Peter')).toEqual({ title: 'Spider-Man Theme', requester: 'Peter' });
  });

  it('unescapes a doubled backslash', () => {
    expect(parseAddArgument('A\\\\B-Viewer')).toEqual({ title: 'A\\B', requester: 'Viewer' });
  });

  it('decodes escapes in the requester too', () => {
    expect(parseAddArgument('Song-Ryo\\-Chan')).toEqual({ title: 'Song', requester: 'Ryo-Chan' });
    expect(parseAddArgument('Song-A\\\\B')).toEqual({ title: 'Song', requester: 'A\\B' });
  });

  it.each(['Miniature', '-Ryo', 'Miniature-', '  -  ', '', 'Only\\-Escaped'])('rejects %j', input => {
    expect(parseAddArgument(input)).toBeNull();
  });
});
