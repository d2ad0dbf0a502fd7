import { IBackendConnection, IDocumentHost } from './contracts';
import { DocumentId, InlineEditParams, NesTriggerKind } from './types';

export const INLINE_EDIT_METHOD = 'textDocument/copilotInlineEdit';
export const DID_FOCUS_METHOD = 'textDocument/didFocus';

export interface InlineEditRequestOptions {
  readonly host: IDocumentHost;
  readonly connection: IBackendConnection;
  readonly documentId: DocumentId;
  readonly triggerKind?: NesTriggerKind;
}

/**
 * Position params for the current cursor, tagged with the document version so
 * the response can be checked for staleness. Returns undefined when the
 * document or cursor is unavailable.
 */
export function buildInlineEditParams(options: InlineEditRequestOptions): InlineEditParams | undefined {
  const { host, connection, documentId } = options;
  const version = host.getVersion(documentId);
  const cursor = host.getCursor();
  if (version === undefined || cursor === undefined) {
    return undefined;
  }

  return {
    textDocument: { uri: documentId, version },
    position: host.fromHostPosition(documentId, cursor, connection.positionEncoding),
    context: { triggerKind: options.triggerKind ?? NesTriggerKind.Automatic },
  };
}
