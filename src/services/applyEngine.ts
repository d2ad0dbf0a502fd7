import { Disposable, Emitter, Position } from 'vscode-languageserver-protocol';
import { IConfigService, IConnectionRegistry, IDocumentHost, ILogger, ITaskScheduler } from '../context/contracts';
import { DebugCategory, DocumentId, NesAppliedEvent, PositionEncoding } from '../context/types';
import { DebugLogger } from './debugLogger';
import { EditStore } from './editStore';
import { FeatureGate } from './featureGate';
import { NesEdit } from './nesEdit';
import { IRenderTarget } from './requestCoordinator';

const HOST_ENCODING: PositionEncoding = 'utf-16';

/**
 * Clamp a position into the document: line to the last line, column to the
 * length of that line.
 */
export function fixPosition(host: IDocumentHost, documentId: DocumentId, pos: Position): Position {
  const lineCount = host.getLineCount(documentId);
  const line = Math.max(0, Math.min(pos.line, lineCount - 1));
  const text = host.getLine(documentId, line) ?? '';
  const character = Math.max(0, Math.min(pos.character, text.length));
  return { line, character };
}

/**
 * Moves pending edits into view and carries out the accepted ones
 */
export class ApplyEngine implements IRenderTarget, Disposable {
  private readonly _onDidApply = new Emitter<NesAppliedEvent>();
  readonly onDidApply = this._onDidApply.event;

  constructor(
    private readonly store: EditStore,
    private readonly host: IDocumentHost,
    private readonly registry: IConnectionRegistry,
    private readonly gate: FeatureGate,
    private readonly scheduler: ITaskScheduler,
    private readonly configService: IConfigService,
    private readonly logger: ILogger,
    private readonly debug: DebugLogger
  ) {}

  dispose(): void {
    this._onDidApply.dispose();
  }

  render(): void {
    const documentId = this.host.getActiveDocumentId();
    if (documentId === undefined || !this.gate.isEnabled(documentId)) {
      return;
    }
    this.promote(documentId);
  }

  /**
   * Make the pending edits of `documentId` the active ones. Without pending
   * edits nothing changes and no render signal fires.
   */
  promote(documentId: DocumentId): boolean {
    const pending = this.store.query(documentId, 'pending');
    if (pending.length === 0) {
      return false;
    }

    this.store.replaceActive(documentId, pending);
    this.store.removePending(documentId);
    this.debug.log(DebugCategory.Store, `promoted ${pending.length} edit(s) for ${documentId}`);
    this.store.signalUpdate();
    return true;
  }

  /**
   * Apply the active edits of the current document. The document mutation,
   * follow-up commands and cursor jump run on the scheduler; state is cleared
   * right away so a new cycle can start.
   */
  apply(): boolean {
    const documentId = this.host.getActiveDocumentId();
    if (documentId === undefined || !this.gate.isEnabled(documentId)) {
      this.store.clear();
      return false;
    }

    const edits = this.store.query(documentId, 'active');
    if (edits.length === 0) {
      return false;
    }

    const textEdits = edits.map((edit) => edit.toTextEdit());
    const last = edits[edits.length - 1];
    const target = last.endOfInsertion();

    this.scheduler.schedule(() => {
      if (!this.host.applyTextEdits(documentId, textEdits, HOST_ENCODING)) {
        this.logger.warn(`[ApplyEngine] ${documentId} went away before its edits could be applied`);
        return;
      }
      this.debug.log(DebugCategory.Apply, `applied ${textEdits.length} edit(s) to ${documentId}`);

      this.scheduler.schedule(() => {
        for (const edit of edits) {
          this.runCommand(edit, documentId);
        }
        this._onDidApply.fire({ connectionId: last.connectionId, documentId });
      });

      this.jumpTo(documentId, target);
    });

    this.store.clear();
    return true;
  }

  /**
   * Move the cursor to the first change of the first active edit
   */
  jump(): boolean {
    const documentId = this.host.getActiveDocumentId();
    if (documentId === undefined || !this.gate.isEnabled(documentId)) {
      return false;
    }
    const edit = this.store.query(documentId, 'active')[0];
    if (!edit) {
      return false;
    }

    const hunk = edit.diff().hunks[0];
    if (!hunk) {
      // Servers occasionally send edits without changes
      return false;
    }
    return this.jumpTo(documentId, hunk.pos);
  }

  /**
   * Schedule a cursor move to `pos`. Returns false when the cursor is already there.
   */
  jumpTo(documentId: DocumentId, pos: Position): boolean {
    const target = fixPosition(this.host, documentId, pos);
    const cursor = this.host.getCursor();
    if (cursor && cursor.line === target.line && cursor.character === target.character) {
      return false;
    }

    this.scheduler.schedule(() => {
      if (this.host.getActiveDocumentId() !== documentId || !this.host.isValid(documentId)) {
        return;
      }
      if (this.configService.config.jump.jumplist) {
        this.host.pushJumplist();
      }
      this.host.setCursor(target);
      this.debug.log(DebugCategory.Apply, `cursor -> ${target.line}:${target.character}`);
    });
    return true;
  }

  /**
   * Follow-up commands go back to the connection that proposed the edit
   */
  private runCommand(edit: NesEdit, documentId: DocumentId): void {
    const { command } = edit;
    const connection = this.registry.get(edit.connectionId);
    if (!command || !connection || connection.isClosed) {
      return;
    }
    void connection.execCommand(command, { documentId }).catch((err: unknown) => {
      this.logger.warn(`[ApplyEngine] Command ${command.command} failed: ${String(err)}`);
    });
  }
}
