import { diffLines } from 'diff';
import { IDiffProvider } from '../context/contracts';
import { DiffResult, Hunk } from '../context/types';

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Lines of one diff chunk. Chunks end with the line break of their last line,
 * except the last chunk of a text without a trailing newline.
 */
function chunkLines(value: string): string[] {
  const trimmed = value.endsWith('\n') ? value.slice(0, value.endsWith('\r\n') ? -2 : -1) : value;
  return splitLines(trimmed);
}

function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a.charCodeAt(i) === b.charCodeAt(i)) {
    i++;
  }
  return i;
}

/**
 * Line diff between two texts. Hunk positions are relative to the start of
 * `before`: a hunk replacing lines starts at the first differing column of
 * its first line.
 */
export function computeLineDiff(before: string, after: string): DiffResult {
  const hunks: Hunk[] = [];
  const changes = before === after ? [] : diffLines(before, after);

  let line = 0;
  let i = 0;
  while (i < changes.length) {
    const change = changes[i];
    if (!change.added && !change.removed) {
      line += chunkLines(change.value).length;
      i++;
      continue;
    }

    const removed: string[] = [];
    const added: string[] = [];
    while (i < changes.length && (changes[i].added || changes[i].removed)) {
      const lines = chunkLines(changes[i].value);
      if (changes[i].removed) {
        removed.push(...lines);
      } else {
        added.push(...lines);
      }
      i++;
    }

    const character = removed.length > 0 && added.length > 0 ? commonPrefixLength(removed[0], added[0]) : 0;
    hunks.push({ pos: { line, character }, before: removed, after: added });
    line += removed.length;
  }

  const lines = splitLines(after);
  return {
    hunks,
    to: { lines, text: lines[lines.length - 1] },
  };
}

export class LineDiffProvider implements IDiffProvider {
  diff(before: string, after: string): DiffResult {
    return computeLineDiff(before, after);
  }
}
