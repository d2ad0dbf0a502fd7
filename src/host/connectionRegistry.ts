import { Disposable, Emitter } from 'vscode-languageserver-protocol';
import { IBackendConnection, IConnectionRegistry, ILogger } from '../context/contracts';
import { ConnectionId, DocumentId } from '../context/types';

export interface RegisterOptions {
  /** Whether the server behind the connection offers inline edits. Defaults to true. */
  readonly supportsNes?: boolean;
}

interface RegistryEntry {
  readonly connection: IBackendConnection;
  readonly supportsNes: boolean;
  readonly documents: Set<DocumentId>;
}

/**
 * Known backend connections and the documents each one is attached to
 */
export class ConnectionRegistry implements IConnectionRegistry, Disposable {
  private readonly entries = new Map<ConnectionId, RegistryEntry>();

  private readonly _onDidAttach = new Emitter<{ connection: IBackendConnection; documentId: DocumentId }>();
  readonly onDidAttach = this._onDidAttach.event;
  private readonly _onDidClose = new Emitter<ConnectionId>();
  readonly onDidClose = this._onDidClose.event;

  constructor(private readonly logger: ILogger) {}

  register(connection: IBackendConnection, options: RegisterOptions = {}): Disposable {
    if (this.entries.has(connection.id)) {
      throw new Error(`Connection "${connection.id}" is already registered`);
    }
    this.entries.set(connection.id, {
      connection,
      supportsNes: options.supportsNes ?? true,
      documents: new Set(),
    });
    this.logger.info(`[ConnectionRegistry] Registered ${connection.name} (${connection.id})`);
    return Disposable.create(() => this.close(connection.id));
  }

  attach(connectionId: ConnectionId, documentId: DocumentId): void {
    const entry = this.entries.get(connectionId);
    if (!entry || entry.documents.has(documentId)) {
      return;
    }
    entry.documents.add(documentId);
    this._onDidAttach.fire({ connection: entry.connection, documentId });
  }

  detach(connectionId: ConnectionId, documentId: DocumentId): void {
    this.entries.get(connectionId)?.documents.delete(documentId);
  }

  close(connectionId: ConnectionId): void {
    const entry = this.entries.get(connectionId);
    if (!entry) {
      return;
    }
    this.entries.delete(connectionId);
    this.logger.info(`[ConnectionRegistry] Closed ${entry.connection.name} (${connectionId})`);
    this._onDidClose.fire(connectionId);
  }

  get(id: ConnectionId): IBackendConnection | undefined {
    return this.entries.get(id)?.connection;
  }

  getConnections(documentId: DocumentId): IBackendConnection[] {
    const connections: IBackendConnection[] = [];
    for (const entry of this.entries.values()) {
      if (entry.supportsNes && !entry.connection.isClosed && entry.documents.has(documentId)) {
        connections.push(entry.connection);
      }
    }
    return connections;
  }

  getConnection(documentId: DocumentId): IBackendConnection | undefined {
    return this.getConnections(documentId)[0];
  }

  dispose(): void {
    this._onDidAttach.dispose();
    this._onDidClose.dispose();
    this.entries.clear();
  }
}
