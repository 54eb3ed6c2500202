import { describe, it, expect } from 'vitest';
import { formatSeconds, previewLine, previewLines, wordData } from '../src/core/transcript/preview.js';
import { word } from './fixtures/words.js';

describe('formatSeconds', () => {
  it('renders milliseconds as seconds with two decimals', () => {
    expect(formatSeconds(0)).toBe('0.00');
    expect(formatSeconds(1005)).toBe('1.01');
    expect(formatSeconds(75030)).toBe('75.03');
  });
});

describe('previewLines', () => {
  const words = [word('Hello', 1230, 1680), word('there', 12_000, 12_450)];

  it('lists each word with its range and duration', () => {
    expect(previewLine(words[0])).toBe('  1.23s -   1.68s (0.45s) : Hello');
    expect(previewLines(words)).toEqual([
      '  1.23s -   1.68s (0.45s) : Hello',
      ' 12.00s -  12.45s (0.45s) : there',
    ]);
  });

  it('truncates to the limit', () => {
    expect(previewLines(words, 1)).toEqual(['  1.23s -   1.68s (0.45s) : Hello']);
  });
});

describe('wordData', () => {
  it('converts words to seconds', () => {
    expect(wordData([word("Don't", 1230, 1680)])).toEqual([
      { word: "Don't", start: 1.23, end: 1.68, duration: 0.45 },
    ]);
  });
});
