import { Disposable, Emitter, Position, TextEdit } from 'vscode-languageserver-protocol';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { IDocumentHost } from '../context/contracts';
import { DocumentId, DocumentKind, EditorEvent, PositionEncoding } from '../context/types';
import { fromUtf16Column, toUtf16Column } from '../utils/positionEncoding';

export interface OpenDocumentOptions {
  readonly languageId?: string;
  readonly version?: number;
  readonly kind?: DocumentKind;
}

interface DocumentEntry {
  document: TextDocument;
  readonly kind: DocumentKind;
  loaded: boolean;
  cursor: Position;
}

export interface JumplistEntry {
  readonly documentId: DocumentId;
  readonly position: Position;
}

export interface DocumentChangeEvent {
  readonly documentId: DocumentId;
  readonly version: number;
}

/**
 * Document host kept in memory: open documents, the focused one, its cursor
 * and a jump list. Versions go up by one on every change.
 */
export class InMemoryWorkspace implements IDocumentHost, Disposable {
  private readonly documents = new Map<DocumentId, DocumentEntry>();
  private readonly jumplist: JumplistEntry[] = [];
  private activeId: DocumentId | undefined;

  private readonly _onDidEmitEditorEvent = new Emitter<EditorEvent>();
  readonly onDidEmitEditorEvent = this._onDidEmitEditorEvent.event;
  private readonly _onDidChangeActiveDocument = new Emitter<DocumentId | undefined>();
  readonly onDidChangeActiveDocument = this._onDidChangeActiveDocument.event;
  private readonly _onDidChangeTextDocument = new Emitter<DocumentChangeEvent>();
  readonly onDidChangeTextDocument = this._onDidChangeTextDocument.event;
  private readonly _onDidCloseTextDocument = new Emitter<DocumentId>();
  readonly onDidCloseTextDocument = this._onDidCloseTextDocument.event;

  openDocument(uri: DocumentId, text: string, options: OpenDocumentOptions = {}): void {
    this.documents.set(uri, {
      document: TextDocument.create(uri, options.languageId ?? 'plaintext', options.version ?? 0, text),
      kind: options.kind ?? 'file',
      loaded: true,
      cursor: { line: 0, character: 0 },
    });
  }

  closeDocument(uri: DocumentId): void {
    if (!this.documents.delete(uri)) {
      return;
    }
    if (this.activeId === uri) {
      this.setActiveDocument(undefined);
    }
    this._onDidCloseTextDocument.fire(uri);
  }

  setActiveDocument(uri: DocumentId | undefined): void {
    if (uri !== undefined && !this.documents.has(uri)) {
      throw new Error(`Document "${uri}" is not open`);
    }
    if (this.activeId === uri) {
      return;
    }
    this.activeId = uri;
    this._onDidChangeActiveDocument.fire(uri);
  }

  /**
   * Unloaded documents stay open but their content is not available to suggestions
   */
  setLoaded(uri: DocumentId, loaded: boolean): void {
    const entry = this.documents.get(uri);
    if (entry) {
      entry.loaded = loaded;
    }
  }

  /**
   * Replace the whole content, as typing would. Bumps the version.
   */
  setText(uri: DocumentId, text: string): boolean {
    const entry = this.documents.get(uri);
    if (!entry) {
      return false;
    }
    this.commit(uri, entry, text);
    return true;
  }

  emitEditorEvent(event: EditorEvent): void {
    this._onDidEmitEditorEvent.fire(event);
  }

  getJumplist(): readonly JumplistEntry[] {
    return this.jumplist;
  }

  getActiveDocumentId(): DocumentId | undefined {
    return this.activeId;
  }

  isValid(documentId: DocumentId): boolean {
    return this.documents.has(documentId);
  }

  isLoaded(documentId: DocumentId): boolean {
    return this.documents.get(documentId)?.loaded ?? false;
  }

  getKind(documentId: DocumentId): DocumentKind | undefined {
    return this.documents.get(documentId)?.kind;
  }

  getVersion(documentId: DocumentId): number | undefined {
    return this.documents.get(documentId)?.document.version;
  }

  getLineCount(documentId: DocumentId): number {
    return this.documents.get(documentId)?.document.lineCount ?? 0;
  }

  getLine(documentId: DocumentId, line: number): string | undefined {
    const document = this.documents.get(documentId)?.document;
    if (!document || line < 0 || line >= document.lineCount) {
      return undefined;
    }
    const text = document.getText({ start: { line, character: 0 }, end: { line: line + 1, character: 0 } });
    return text.replace(/\r?\n$/, '');
  }

  getText(documentId: DocumentId, range?: { start: Position; end: Position }): string | undefined {
    return this.documents.get(documentId)?.document.getText(range);
  }

  toHostPosition(documentId: DocumentId, position: Position, encoding: PositionEncoding): Position {
    const line = this.getLine(documentId, position.line);
    if (line === undefined) {
      return position;
    }
    return { line: position.line, character: toUtf16Column(line, position.character, encoding) };
  }

  fromHostPosition(documentId: DocumentId, position: Position, encoding: PositionEncoding): Position {
    const line = this.getLine(documentId, position.line);
    if (line === undefined) {
      return position;
    }
    return { line: position.line, character: fromUtf16Column(line, position.character, encoding) };
  }

  applyTextEdits(documentId: DocumentId, edits: readonly TextEdit[], encoding: PositionEncoding): boolean {
    const entry = this.documents.get(documentId);
    if (!entry) {
      return false;
    }
    const hostEdits = edits.map((edit) => ({
      range: {
        start: this.toHostPosition(documentId, edit.range.start, encoding),
        end: this.toHostPosition(documentId, edit.range.end, encoding),
      },
      newText: edit.newText,
    }));
    this.commit(documentId, entry, TextDocument.applyEdits(entry.document, hostEdits));
    return true;
  }

  getCursor(): Position | undefined {
    return this.activeEntry()?.cursor;
  }

  setCursor(position: Position): void {
    const entry = this.activeEntry();
    if (entry) {
      entry.cursor = { line: position.line, character: position.character };
    }
  }

  pushJumplist(): void {
    const entry = this.activeEntry();
    if (entry && this.activeId !== undefined) {
      this.jumplist.push({ documentId: this.activeId, position: entry.cursor });
    }
  }

  dispose(): void {
    this._onDidEmitEditorEvent.dispose();
    this._onDidChangeActiveDocument.dispose();
    this._onDidChangeTextDocument.dispose();
    this._onDidCloseTextDocument.dispose();
    this.documents.clear();
  }

  private activeEntry(): DocumentEntry | undefined {
    return this.activeId === undefined ? undefined : this.documents.get(this.activeId);
  }

  private commit(documentId: DocumentId, entry: DocumentEntry, text: string): void {
    const version = entry.document.version + 1;
    entry.document = TextDocument.update(entry.document, [{ text }], version);
    this._onDidChangeTextDocument.fire({ documentId, version });
  }
}
