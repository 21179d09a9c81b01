import { describe, it, expect } from 'vitest';
import { splitMessage } from './TwitchClient';

describe('splitMessage', () => {
  it('joins short lines into one message', () => {
    expect(splitMessage('List song\n#1: Song A\n#2: Song B')).toEqual(['List song | #1: Song A | #2: Song B']);
  });

  it('starts a new message when the next line would not fit', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 11)).toEqual(['aaaa | bbbb', 'cccc']);
  });

  it('hard-wraps a line longer than the limit', () => {
    expect(splitMessage('abcdefghij\nxy', 4)).toEqual(['abcd', 'efgh', 'ij', 'xy']);
  });

  it('drops blank lines', () => {
    expect(splitMessage('one\n\ntwo')).toEqual(['one | two']);
  });

  it('never splits an emoji when hard-wrapping', () => {
    expect(splitMessage('🎵🎵🎵🎵', 3)).toEqual(['🎵🎵🎵', '🎵']);
  });
});
