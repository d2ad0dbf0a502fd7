import type { Disposable, Event } from 'vscode-languageserver-protocol';
import { IConfigService, IConnectionRegistry, IDebounceManager, IDocumentHost, ILogger } from '../context/contracts';
import {
  ConnectionId,
  DebugCategory,
  EditorEvent,
  EditorEventKind,
  NesAppliedEvent,
  UpdateOptions,
} from '../context/types';
import { DebugLogger } from './debugLogger';

const UPDATE_KEY = 'update';
const FOCUS_KEY = 'focus';

/**
 * What the triggerer drives
 */
export interface NesTriggerTarget {
  update(options: UpdateOptions): void;
  clear(): void;
  notifyFocus(): void;
  forgetConnection(connectionId: ConnectionId): void;
}

/**
 * Routes editor events to suggestion cycles: trigger events start a debounced
 * update, clear events dismiss immediately, focus changes are reported to the
 * server through their own debounce.
 */
export class NesTriggerer implements Disposable {
  private readonly disposables: Disposable[] = [];
  private started = false;
  private enabled = true;

  constructor(
    private readonly host: IDocumentHost,
    private readonly registry: IConnectionRegistry,
    private readonly onDidApply: Event<NesAppliedEvent>,
    private readonly configService: IConfigService,
    private readonly debounceManager: IDebounceManager,
    private readonly target: NesTriggerTarget,
    private readonly logger: ILogger,
    private readonly debug: DebugLogger
  ) {}

  /**
   * Register listeners. Only the first call has an effect.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    this.disposables.push(
      this.host.onDidEmitEditorEvent((event) => this.handleEvent(event)),
      this.host.onDidChangeActiveDocument(() => this.scheduleFocus()),
      this.registry.onDidAttach(({ connection, documentId }) => {
        const capable = this.registry.getConnections(documentId).some((c) => c.id === connection.id);
        if (this.enabled && capable) {
          this.target.notifyFocus();
        }
      }),
      this.registry.onDidClose((connectionId) => this.target.forgetConnection(connectionId)),
      this.onDidApply(({ documentId }) => this.handleEvent({ kind: EditorEventKind.SuggestionApplied, documentId }))
    );
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.debounceManager.clear();
    }
  }

  handleEvent(event: EditorEvent): void {
    if (!this.enabled) {
      return;
    }
    const config = this.configService.config;

    const clears = config.clear.events.includes(event.kind) || (event.kind === EditorEventKind.Escape && config.clear.escape);
    if (clears) {
      this.debug.log(DebugCategory.Trigger, `clear on ${event.kind}`);
      this.debounceManager.cancel(UPDATE_KEY);
      this.target.clear();
    }

    if (config.trigger.events.includes(event.kind)) {
      const forceRender = this.shouldForceRender(event);
      this.debug.log(DebugCategory.Trigger, `trigger on ${event.kind} (forceRender=${forceRender})`);
      this.debounceManager.debounce(UPDATE_KEY, config.debounceMs, () => this.target.update({ forceRender }));
    }
  }

  dispose(): void {
    this.disposables.forEach((d) => d.dispose());
    this.disposables.length = 0;
    this.debounceManager.clear();
  }

  private scheduleFocus(): void {
    if (!this.enabled) {
      return;
    }
    this.debounceManager.debounce(FOCUS_KEY, this.configService.config.focusDebounceMs, () => this.target.notifyFocus());
  }

  private shouldForceRender(event: EditorEvent): boolean {
    const autoRender = this.configService.config.autoRender;
    if (typeof autoRender === 'function') {
      try {
        return autoRender(event);
      } catch (err) {
        this.logger.error('[NesTriggerer] autoRender predicate threw', err);
        return false;
      }
    }
    return autoRender;
  }
}
