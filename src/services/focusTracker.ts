import { IConnectionRegistry, IDocumentHost, ILogger } from '../context/contracts';
import { DID_FOCUS_METHOD } from '../context/requestBuilder';
import { ConnectionId, DebugCategory } from '../context/types';
import { DebugLogger } from './debugLogger';
import { FeatureGate } from './featureGate';
import { NesState } from './nesState';

/**
 * Sends `textDocument/didFocus` once per connection and document. The server
 * relies on it to know which document the user is looking at.
 */
export class FocusTracker {
  constructor(
    private readonly state: NesState,
    private readonly host: IDocumentHost,
    private readonly registry: IConnectionRegistry,
    private readonly gate: FeatureGate,
    private readonly logger: ILogger,
    private readonly debug: DebugLogger
  ) {}

  notifyFocus(): void {
    const documentId = this.host.getActiveDocumentId();
    if (documentId === undefined || !this.gate.isEnabled(documentId)) {
      return;
    }
    if (this.host.getKind(documentId) !== 'file') {
      return;
    }

    for (const connection of this.registry.getConnections(documentId)) {
      if (connection.isClosed || this.state.focusNotified.get(connection.id) === documentId) {
        continue;
      }
      this.state.focusNotified.set(connection.id, documentId);
      connection.notify(DID_FOCUS_METHOD, { textDocument: { uri: documentId } });
      this.debug.log(DebugCategory.Focus, `${connection.name} focused ${documentId}`);
    }
  }

  /**
   * Drop what we know about a closed connection
   */
  forget(connectionId: ConnectionId): void {
    if (this.state.focusNotified.delete(connectionId)) {
      this.logger.info(`[FocusTracker] Forgot connection ${connectionId}`);
    }
  }
}
