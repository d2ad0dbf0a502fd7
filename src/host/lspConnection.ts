import {
  CancellationTokenSource,
  Command,
  Disposable,
  ExecuteCommandRequest,
  ProtocolConnection,
} from 'vscode-languageserver-protocol';
import { IBackendConnection, ILogger, RequestHandle, ResponseCallback } from '../context/contracts';
import { ConnectionId, DocumentId, PositionEncoding } from '../context/types';

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Backend connection over a JSON-RPC language server connection. Request
 * handles are local numbers mapped to cancellation sources; cancelling sends
 * `$/cancelRequest` through the token.
 */
export class LspBackendConnection implements IBackendConnection, Disposable {
  private readonly inFlight = new Map<RequestHandle, CancellationTokenSource>();
  private readonly disposables: Disposable[] = [];
  private nextHandle = 1;
  private closed = false;

  constructor(
    readonly id: ConnectionId,
    readonly name: string,
    private readonly connection: ProtocolConnection,
    private readonly logger: ILogger,
    readonly positionEncoding: PositionEncoding = 'utf-16'
  ) {
    this.disposables.push(
      connection.onClose(() => {
        this.closed = true;
        this.cancelAll();
      })
    );
  }

  get isClosed(): boolean {
    return this.closed;
  }

  request<P, R>(method: string, params: P, callback: ResponseCallback<R>): RequestHandle | undefined {
    if (this.closed) {
      return undefined;
    }

    const handle = this.nextHandle++;
    const source = new CancellationTokenSource();
    this.inFlight.set(handle, source);
    const context = { connectionId: this.id, method };

    this.connection
      .sendRequest<R>(method, params, source.token)
      .then(
        (result) => {
          this.release(handle);
          callback(undefined, result, context);
        },
        (err: unknown) => {
          this.release(handle);
          callback(toError(err), undefined, context);
        }
      )
      .catch((err: unknown) => this.logger.error(`[LspBackendConnection] ${method} callback failed`, err));

    return handle;
  }

  cancelRequest(handle: RequestHandle): void {
    const source = this.inFlight.get(handle);
    if (!source) {
      return;
    }
    source.cancel();
    this.release(handle);
  }

  notify<P>(method: string, params: P): void {
    if (this.closed) {
      return;
    }
    this.connection
      .sendNotification(method, params)
      .catch((err: unknown) => this.logger.warn(`[LspBackendConnection] ${method} notification failed: ${toError(err).message}`));
  }

  async execCommand(command: Command, context: { readonly documentId: DocumentId }): Promise<void> {
    if (this.closed) {
      throw new Error(`${this.name} is closed`);
    }
    this.logger.info(`[LspBackendConnection] Executing ${command.command} for ${context.documentId}`);
    await this.connection.sendRequest(ExecuteCommandRequest.type, {
      command: command.command,
      arguments: command.arguments,
    });
  }

  dispose(): void {
    this.cancelAll();
    this.disposables.forEach((d) => d.dispose());
    this.disposables.length = 0;
  }

  private cancelAll(): void {
    for (const handle of [...this.inFlight.keys()]) {
      this.cancelRequest(handle);
    }
  }

  private release(handle: RequestHandle): void {
    const source = this.inFlight.get(handle);
    if (source) {
      this.inFlight.delete(handle);
      source.dispose();
    }
  }
}
