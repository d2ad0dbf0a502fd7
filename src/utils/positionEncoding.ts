import { PositionEncoding } from '../context/types';

function unitsOf(codePoint: number, encoding: PositionEncoding): number {
  switch (encoding) {
    case 'utf-8':
      if (codePoint < 0x80) return 1;
      if (codePoint < 0x800) return 2;
      if (codePoint < 0x10000) return 3;
      return 4;
    case 'utf-32':
      return 1;
    case 'utf-16':
      return codePoint > 0xffff ? 2 : 1;
  }
}

/**
 * Convert a column counted in `encoding` code units to UTF-16 code units.
 * Columns past the end of the line clamp to the line length; a column in the
 * middle of a code point snaps to its end.
 */
export function toUtf16Column(line: string, column: number, encoding: PositionEncoding): number {
  if (encoding === 'utf-16') {
    return Math.min(column, line.length);
  }
  let consumed = 0;
  let utf16 = 0;
  for (const char of line) {
    if (consumed >= column) {
      break;
    }
    const codePoint = char.codePointAt(0) ?? 0;
    consumed += unitsOf(codePoint, encoding);
    utf16 += char.length;
  }
  return utf16;
}

/**
 * Convert a UTF-16 column to `encoding` code units.
 */
export function fromUtf16Column(line: string, column: number, encoding: PositionEncoding): number {
  if (encoding === 'utf-16') {
    return Math.min(column, line.length);
  }
  let units = 0;
  let utf16 = 0;
  for (const char of line) {
    if (utf16 >= column) {
      break;
    }
    const codePoint = char.codePointAt(0) ?? 0;
    units += unitsOf(codePoint, encoding);
    utf16 += char.length;
  }
  return units;
}
