import type { Command, Position, Range, TextEdit } from 'vscode-languageserver-protocol';
import { IBackendConnection, IDiffProvider, IDocumentHost } from '../context/contracts';
import { ConnectionId, DiffResult, DocumentId, Hunk, RawNesEdit } from '../context/types';

function comparePositions(a: Position, b: Position): number {
  return a.line === b.line ? a.character - b.character : a.line - b.line;
}

/**
 * One edit proposed by the language server, bound to the document version it
 * was computed against. `range` is as received, in the encoding of the
 * connection that proposed it; `from`/`to` are the same range in host
 * positions, valid for as long as the version does not move.
 */
export class NesEdit {
  private cachedDiff: DiffResult | undefined;

  private constructor(
    readonly documentId: DocumentId,
    readonly expectedVersion: number,
    readonly range: Range,
    readonly text: string,
    readonly command: Command | undefined,
    readonly connectionId: ConnectionId,
    readonly from: Position,
    readonly to: Position,
    private readonly host: IDocumentHost,
    private readonly diffProvider: IDiffProvider
  ) {}

  static fromRaw(
    raw: RawNesEdit,
    connection: IBackendConnection,
    host: IDocumentHost,
    diffProvider: IDiffProvider
  ): NesEdit {
    const documentId = raw.textDocument.uri;
    const encoding = connection.positionEncoding;
    return new NesEdit(
      documentId,
      raw.textDocument.version,
      raw.range,
      raw.text,
      raw.command,
      connection.id,
      host.toHostPosition(documentId, raw.range.start, encoding),
      host.toHostPosition(documentId, raw.range.end, encoding),
      host,
      diffProvider
    );
  }

  /**
   * Well-formed: the document is open, the range is ordered and starts inside
   * the document, and the edit changes text or at least carries a command.
   */
  isValid(): boolean {
    if (!this.host.isValid(this.documentId)) {
      return false;
    }
    if (comparePositions(this.from, this.to) > 0) {
      return false;
    }
    if (this.from.line >= this.host.getLineCount(this.documentId)) {
      return false;
    }
    const emptyRange = comparePositions(this.from, this.to) === 0;
    return this.text !== '' || !emptyRange || this.command !== undefined;
  }

  isEmpty(): boolean {
    return this.diff().hunks.length === 0;
  }

  /**
   * Diff between the text under the range and the replacement, with hunk
   * positions in document coordinates. Computed once.
   */
  diff(): DiffResult {
    if (!this.cachedDiff) {
      const before = this.host.getText(this.documentId, { start: this.from, end: this.to }) ?? '';
      const relative = this.diffProvider.diff(before, this.text);
      this.cachedDiff = {
        hunks: relative.hunks.map((hunk) => this.toDocumentHunk(hunk)),
        to: relative.to,
      };
    }
    return this.cachedDiff;
  }

  /**
   * Host position right after the inserted text
   */
  endOfInsertion(): Position {
    const { lines, text } = this.diff().to;
    if (lines.length <= 1) {
      return { line: this.from.line, character: this.from.character + text.length };
    }
    return { line: this.from.line + lines.length - 1, character: text.length };
  }

  /**
   * The edit in host positions
   */
  toTextEdit(): TextEdit {
    return { range: { start: this.from, end: this.to }, newText: this.text };
  }

  private toDocumentHunk(hunk: Hunk): Hunk {
    const pos =
      hunk.pos.line === 0
        ? { line: this.from.line, character: this.from.character + hunk.pos.character }
        : { line: this.from.line + hunk.pos.line, character: hunk.pos.character };
    return { pos, before: hunk.before, after: hunk.after };
  }
}
