import { describe, expect, it } from '@jest/globals';
import { computeLineDiff, splitLines } from '../src/utils/lineDiff';

describe('splitLines', () => {
  it('splits on both line break styles', () => {
    expect(splitLines('a\r\nb\nc')).toEqual(['a', 'b', 'c']);
  });

  it('keeps an empty last line after a trailing break', () => {
    expect(splitLines('a\n')).toEqual(['a', '']);
  });
});

describe('computeLineDiff', () => {
  it('reports no hunks for equal texts', () => {
    const result = computeLineDiff('same\ntext', 'same\ntext');

    expect(result.hunks).toEqual([]);
    expect(result.to).toEqual({ lines: ['same', 'text'], text: 'text' });
  });

  it('starts a replaced line at its first differing column', () => {
    const result = computeLineDiff('x = 0', 'x = 1');

    expect(result.hunks).toEqual([{ pos: { line: 0, character: 4 }, before: ['x = 0'], after: ['x = 1'] }]);
  });

  it('places a change after unchanged lines on its own line', () => {
    const result = computeLineDiff('a\nb\nc\n', 'a\nB\nc\n');

    expect(result.hunks).toEqual([{ pos: { line: 1, character: 0 }, before: ['b'], after: ['B'] }]);
  });

  it('reports pure insertions at column zero', () => {
    const result = computeLineDiff('a\nc\n', 'a\nb\nc\n');

    expect(result.hunks).toEqual([{ pos: { line: 1, character: 0 }, before: [], after: ['b'] }]);
  });

  it('treats an empty range filled with text as one insertion', () => {
    const result = computeLineDiff('', 'first\nsecond');

    expect(result.hunks).toEqual([{ pos: { line: 0, character: 0 }, before: [], after: ['first', 'second'] }]);
    expect(result.to).toEqual({ lines: ['first', 'second'], text: 'second' });
  });

  it('reports separate hunks for separate changes', () => {
    const result = computeLineDiff('a\nb\nc\nd\n', 'A\nb\nc\nD\n');

    expect(result.hunks.map((hunk) => hunk.pos)).toEqual([
      { line: 0, character: 0 },
      { line: 3, character: 0 },
    ]);
  });
});
