import type { Command, Disposable, Event, Position, TextEdit } from 'vscode-languageserver-protocol';
import {
  ConnectionId,
  DiffResult,
  DocumentId,
  DocumentKind,
  EditorEvent,
  NesConfig,
  NesConfigOverrides,
  PositionEncoding,
} from './types';

export interface ILogger extends Disposable {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export interface IConfigService extends Disposable {
  readonly config: NesConfig;
  readonly onDidChange: Event<NesConfig>;
  update(overrides: NesConfigOverrides): void;
}

/**
 * Opaque handle of an issued request, only meaningful to the connection that returned it
 */
export type RequestHandle = number;

export interface ResponseContext {
  readonly connectionId: ConnectionId;
  readonly method: string;
}

/**
 * Invoked once per issued request, never synchronously from `request()`.
 * A cancelled request may complete with an error or not at all.
 */
export type ResponseCallback<R> = (error: Error | undefined, result: R | undefined, context: ResponseContext) => void;

export interface IBackendConnection {
  readonly id: ConnectionId;
  readonly name: string;
  readonly positionEncoding: PositionEncoding;
  readonly isClosed: boolean;
  /** Returns `undefined` when the request could not be sent */
  request<P, R>(method: string, params: P, callback: ResponseCallback<R>): RequestHandle | undefined;
  cancelRequest(handle: RequestHandle): void;
  notify<P>(method: string, params: P): void;
  execCommand(command: Command, context: { readonly documentId: DocumentId }): Promise<void>;
}

export interface IConnectionRegistry {
  readonly onDidAttach: Event<{ readonly connection: IBackendConnection; readonly documentId: DocumentId }>;
  readonly onDidClose: Event<ConnectionId>;
  get(id: ConnectionId): IBackendConnection | undefined;
  /** NES-capable connections attached to the document */
  getConnections(documentId: DocumentId): IBackendConnection[];
  /** The connection that serves requests for the document */
  getConnection(documentId: DocumentId): IBackendConnection | undefined;
}

/**
 * The editor side: documents, versions, cursor and edit application.
 * Positions are UTF-16 based unless an encoding is passed.
 */
export interface IDocumentHost {
  readonly onDidEmitEditorEvent: Event<EditorEvent>;
  readonly onDidChangeActiveDocument: Event<DocumentId | undefined>;
  readonly onDidCloseTextDocument: Event<DocumentId>;
  getActiveDocumentId(): DocumentId | undefined;
  isValid(documentId: DocumentId): boolean;
  isLoaded(documentId: DocumentId): boolean;
  getKind(documentId: DocumentId): DocumentKind | undefined;
  getVersion(documentId: DocumentId): number | undefined;
  getLineCount(documentId: DocumentId): number;
  getLine(documentId: DocumentId, line: number): string | undefined;
  getText(documentId: DocumentId, range?: { start: Position; end: Position }): string | undefined;
  /** Converts a position expressed in `encoding` to the host's own addressing */
  toHostPosition(documentId: DocumentId, position: Position, encoding: PositionEncoding): Position;
  /** Converts a host position to `encoding` */
  fromHostPosition(documentId: DocumentId, position: Position, encoding: PositionEncoding): Position;
  /** Applies all edits as one change, ranges in `encoding`. Returns false when the document is gone. */
  applyTextEdits(documentId: DocumentId, edits: readonly TextEdit[], encoding: PositionEncoding): boolean;
  getCursor(): Position | undefined;
  setCursor(position: Position): void;
  /** Records the current cursor in the navigation history */
  pushJumplist(): void;
}

export interface IDiffProvider {
  diff(before: string, after: string): DiffResult;
}

export interface ITaskScheduler {
  /** Runs `task` at the next safe point, after every task scheduled before it */
  schedule(task: () => void): void;
}

export interface IDebounceManager extends Disposable {
  debounce(key: string, delayMs: number, action: () => void): void;
  cancel(key: string): void;
  clear(): void;
  getPendingCount(): number;
}
