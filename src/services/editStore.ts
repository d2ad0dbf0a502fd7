import { Disposable, Emitter } from 'vscode-languageserver-protocol';
import { IConnectionRegistry, IDocumentHost, ILogger } from '../context/contracts';
import { ConnectionId, DebugCategory, DocumentId, EditSource } from '../context/types';
import { DebugLogger } from './debugLogger';
import { FeatureGate } from './featureGate';
import { InFlightRequest, NesState } from './nesState';
import { NesEdit } from './nesEdit';

/**
 * Pending and active edits plus the in-flight request table. Stale entries
 * are not pruned eagerly; every read filters them out instead.
 */
export class EditStore implements Disposable {
  private readonly _onDidUpdate = new Emitter<void>();
  /** Render signal: the set of visible edits may have changed */
  readonly onDidUpdate = this._onDidUpdate.event;
  private readonly _onDidChangeState = new Emitter<void>();
  /** Pending edits or in-flight requests changed, nothing new to render */
  readonly onDidChangeState = this._onDidChangeState.event;

  constructor(
    private readonly state: NesState,
    private readonly host: IDocumentHost,
    private readonly registry: IConnectionRegistry,
    private readonly gate: FeatureGate,
    private readonly logger: ILogger,
    private readonly debug: DebugLogger
  ) {}

  dispose(): void {
    this._onDidUpdate.dispose();
    this._onDidChangeState.dispose();
  }

  /**
   * Read-eligible edits from `source`, optionally narrowed to one document
   */
  query(documentId: DocumentId | undefined, source: EditSource = 'active'): NesEdit[] {
    const edits = source === 'pending' ? this.state.pending : this.state.active;
    return edits.filter((edit) => this.isEligible(edit) && (documentId === undefined || edit.documentId === documentId));
  }

  /**
   * The document still exists and is loaded, its version did not move, the
   * feature is on for it and the edit changes something.
   */
  isEligible(edit: NesEdit): boolean {
    if (!this.host.isValid(edit.documentId)) {
      return false;
    }
    if (edit.expectedVersion !== this.host.getVersion(edit.documentId)) {
      return false;
    }
    if (!this.gate.isEnabled(edit.documentId)) {
      return false;
    }
    return !edit.isEmpty();
  }

  setPending(edits: NesEdit[]): void {
    this.state.pending = edits;
    this.debug.log(DebugCategory.Store, `pending <- ${edits.length} edit(s)`);
    this._onDidChangeState.fire();
  }

  /**
   * Replace the active generation of `documentId` with `edits`
   */
  replaceActive(documentId: DocumentId, edits: NesEdit[]): void {
    this.state.active = [...this.state.active.filter((edit) => edit.documentId !== documentId), ...edits];
  }

  removePending(documentId: DocumentId): void {
    this.state.pending = this.state.pending.filter((edit) => edit.documentId !== documentId);
  }

  trackRequest(connectionId: ConnectionId, request: InFlightRequest): void {
    this.state.requests.set(connectionId, request);
    this._onDidChangeState.fire();
  }

  getRequest(connectionId: ConnectionId): InFlightRequest | undefined {
    return this.state.requests.get(connectionId);
  }

  untrackRequest(connectionId: ConnectionId): void {
    if (this.state.requests.delete(connectionId)) {
      this._onDidChangeState.fire();
    }
  }

  getInFlightCount(): number {
    return this.state.requests.size;
  }

  /**
   * Cancel every in-flight request. Safe to call repeatedly.
   */
  cancel(): void {
    for (const [connectionId, request] of [...this.state.requests]) {
      this.state.requests.delete(connectionId);
      const connection = this.registry.get(connectionId);
      if (connection && !connection.isClosed) {
        connection.cancelRequest(request.handle);
        this.logger.info(`[EditStore] Cancelled request ${request.generation.slice(0, 8)} on ${connection.name}`);
      }
    }
  }

  /**
   * Forget everything tied to a document that closed: its edits and any
   * request issued for it.
   */
  discard(documentId: DocumentId): void {
    for (const [connectionId, request] of [...this.state.requests]) {
      if (request.documentId !== documentId) {
        continue;
      }
      this.state.requests.delete(connectionId);
      const connection = this.registry.get(connectionId);
      if (connection && !connection.isClosed) {
        connection.cancelRequest(request.handle);
      }
    }
    this.state.pending = this.state.pending.filter((edit) => edit.documentId !== documentId);
    this.state.active = this.state.active.filter((edit) => edit.documentId !== documentId);
    this.debug.log(DebugCategory.Store, `discarded ${documentId}`);
    this._onDidChangeState.fire();
    this.signalUpdate();
  }

  /**
   * Cancel requests, drop all edits and tell the renderer
   */
  clear(): void {
    this.cancel();
    this.state.pending = [];
    this.state.active = [];
    this.signalUpdate();
  }

  signalUpdate(): void {
    this._onDidUpdate.fire();
  }
}
