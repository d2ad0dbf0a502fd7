import { randomUUID } from 'crypto';
import { IConnectionRegistry, IDiffProvider, IDocumentHost, ILogger, ResponseContext } from '../context/contracts';
import { buildInlineEditParams, INLINE_EDIT_METHOD } from '../context/requestBuilder';
import { DebugCategory, InlineEditParams, RawNesEdit, UpdateOptions } from '../context/types';
import { DebugLogger } from './debugLogger';
import { EditStore } from './editStore';
import { FeatureGate } from './featureGate';
import { NesEdit } from './nesEdit';

export interface IRenderTarget {
  /** Promote pending edits of the current document */
  render(): void;
}

function isPosition(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'line' in value &&
    'character' in value &&
    Number.isInteger(value.line) &&
    Number.isInteger(value.character)
  );
}

function isCommand(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'command' in value && typeof value.command === 'string';
}

/**
 * Shape check for one server edit; anything else is dropped on its own
 */
export function isRawNesEdit(value: unknown): value is RawNesEdit {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('textDocument' in value && 'range' in value && 'text' in value)) {
    return false;
  }
  const { textDocument, range, text } = value;
  if (typeof textDocument !== 'object' || textDocument === null || typeof range !== 'object' || range === null) {
    return false;
  }
  if (!('uri' in textDocument && 'version' in textDocument && 'start' in range && 'end' in range)) {
    return false;
  }
  if ('command' in value && value.command !== undefined && !isCommand(value.command)) {
    return false;
  }
  return (
    typeof textDocument.uri === 'string' &&
    typeof textDocument.version === 'number' &&
    isPosition(range.start) &&
    isPosition(range.end) &&
    typeof text === 'string'
  );
}

function readEdits(result: unknown): unknown[] {
  if (typeof result !== 'object' || result === null || !('edits' in result)) {
    return [];
  }
  return Array.isArray(result.edits) ? result.edits : [];
}

/**
 * Issues inline edit requests, one in flight per connection, and turns the
 * latest successful response into pending edits.
 */
export class RequestCoordinator {
  constructor(
    private readonly store: EditStore,
    private readonly host: IDocumentHost,
    private readonly registry: IConnectionRegistry,
    private readonly gate: FeatureGate,
    private readonly diffProvider: IDiffProvider,
    private readonly renderTarget: IRenderTarget,
    private readonly logger: ILogger,
    private readonly debug: DebugLogger
  ) {}

  /**
   * Start a new suggestion cycle for the current document. Always clears the
   * previous cycle first, across all documents.
   */
  update(options: UpdateOptions = {}): void {
    const documentId = this.host.getActiveDocumentId();
    this.store.clear();

    if (documentId === undefined || !this.gate.isEnabled(documentId)) {
      return;
    }

    const connection = this.registry.getConnection(documentId);
    if (!connection) {
      return;
    }

    const params = buildInlineEditParams({
      host: this.host,
      connection,
      documentId,
      triggerKind: options.triggerKind,
    });
    if (!params) {
      return;
    }

    const generation = randomUUID();
    const forceRender = options.forceRender ?? false;
    const handle = connection.request<InlineEditParams, unknown>(INLINE_EDIT_METHOD, params, (error, result, context) =>
      this.handleResponse(generation, error, result, context, forceRender)
    );
    if (handle === undefined) {
      this.logger.warn(`[RequestCoordinator] ${connection.name} refused ${INLINE_EDIT_METHOD}`);
      return;
    }

    this.store.trackRequest(connection.id, { handle, generation, documentId });
    this.debug.log(DebugCategory.Request, `issued ${generation.slice(0, 8)} on ${connection.name}`, params);
  }

  /**
   * Cancel all in-flight requests. Safe to call repeatedly.
   */
  cancel(): void {
    this.store.cancel();
  }

  private handleResponse(
    generation: string,
    error: Error | undefined,
    result: unknown,
    context: ResponseContext,
    forceRender: boolean
  ): void {
    const inFlight = this.store.getRequest(context.connectionId);
    if (inFlight?.generation !== generation) {
      this.debug.log(DebugCategory.Request, `ignoring superseded response ${generation.slice(0, 8)}`);
      return;
    }
    this.store.untrackRequest(context.connectionId);

    const connection = this.registry.get(context.connectionId);
    if (error || !connection || connection.isClosed) {
      if (error) {
        this.logger.warn(`[RequestCoordinator] ${context.method} failed: ${error.message}`);
      }
      return;
    }

    const rawEdits = readEdits(result);
    const edits: NesEdit[] = [];
    for (const raw of rawEdits) {
      if (!isRawNesEdit(raw)) {
        this.debug.log(DebugCategory.Request, 'dropping malformed edit', raw);
        continue;
      }
      const edit = NesEdit.fromRaw(raw, connection, this.host, this.diffProvider);
      if (edit.isValid() && this.store.isEligible(edit)) {
        edits.push(edit);
      }
    }

    this.store.setPending(edits);
    this.logger.info(
      `[RequestCoordinator] ${generation.slice(0, 8)}: ${edits.length}/${rawEdits.length} edit(s) pending from ${connection.name}`
    );

    if (forceRender) {
      this.renderTarget.render();
    }
  }
}
