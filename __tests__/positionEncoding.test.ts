import { describe, expect, it } from '@jest/globals';
import { fromUtf16Column, toUtf16Column } from '../src/utils/positionEncoding';

// "a", "é" (two UTF-8 bytes), an emoji outside the BMP (four bytes, a surrogate pair), "b"
const LINE = 'aé\u{1F600}b';

describe('toUtf16Column', () => {
  it('clamps utf-16 columns to the line', () => {
    expect(toUtf16Column(LINE, 3, 'utf-16')).toBe(3);
    expect(toUtf16Column(LINE, 9, 'utf-16')).toBe(5);
  });

  it('converts utf-8 byte offsets', () => {
    expect(toUtf16Column(LINE, 3, 'utf-8')).toBe(2);
    expect(toUtf16Column(LINE, 7, 'utf-8')).toBe(4);
    expect(toUtf16Column(LINE, 100, 'utf-8')).toBe(5);
  });

  it('snaps an offset inside a code point to its end', () => {
    expect(toUtf16Column(LINE, 4, 'utf-8')).toBe(4);
  });

  it('converts utf-32 code point offsets', () => {
    expect(toUtf16Column(LINE, 3, 'utf-32')).toBe(4);
  });
});

describe('fromUtf16Column', () => {
  it('converts to utf-8 byte offsets', () => {
    expect(fromUtf16Column(LINE, 2, 'utf-8')).toBe(3);
    expect(fromUtf16Column(LINE, 4, 'utf-8')).toBe(7);
    expect(fromUtf16Column(LINE, 5, 'utf-8')).toBe(8);
  });

  it('converts to utf-32 code point offsets', () => {
    expect(fromUtf16Column(LINE, 4, 'utf-32')).toBe(3);
  });

  it('leaves utf-16 columns alone inside the line', () => {
    expect(fromUtf16Column(LINE, 2, 'utf-16')).toBe(2);
  });
});
