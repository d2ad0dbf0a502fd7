import type { Disposable, Event } from 'vscode-languageserver-protocol';
import {
  IConfigService,
  IConnectionRegistry,
  IDebounceManager,
  IDiffProvider,
  IDocumentHost,
  ILogger,
  ITaskScheduler,
} from '../context/contracts';
import { ConnectionId, EditSource, NesAppliedEvent, NesTriggerKind, UpdateOptions } from '../context/types';
import { LineDiffProvider } from '../utils/lineDiff';
import { ApplyEngine } from './applyEngine';
import { DebugLogger } from './debugLogger';
import { EditStore } from './editStore';
import { FeatureGate } from './featureGate';
import { FocusTracker } from './focusTracker';
import { NesEdit } from './nesEdit';
import { createNesState, NesState } from './nesState';
import { NesTriggerer, NesTriggerTarget } from './nesTriggerer';
import { RequestCoordinator } from './requestCoordinator';

export interface NesControllerOptions {
  readonly host: IDocumentHost;
  readonly registry: IConnectionRegistry;
  readonly configService: IConfigService;
  readonly scheduler: ITaskScheduler;
  readonly debounceManager: IDebounceManager;
  readonly logger: ILogger;
  readonly debugLogger?: DebugLogger;
  readonly diffProvider?: IDiffProvider;
}

/**
 * Public surface of next edit suggestions. Keybindings, status line and
 * renderers talk to this class only.
 */
export class NesController implements Disposable, NesTriggerTarget {
  readonly state: NesState = createNesState();
  private readonly gate: FeatureGate;
  private readonly store: EditStore;
  private readonly coordinator: RequestCoordinator;
  private readonly engine: ApplyEngine;
  private readonly focusTracker: FocusTracker;
  private readonly triggerer: NesTriggerer;
  private readonly host: IDocumentHost;
  private readonly configService: IConfigService;
  private readonly logger: ILogger;
  private readonly disposables: Disposable[] = [];
  private didSetup = false;

  /** Render signal */
  readonly onDidUpdate: Event<void>;
  /** Pending edits or in-flight requests changed */
  readonly onDidChangeState: Event<void>;
  /** Fired after a suggestion was applied */
  readonly onDidApply: Event<NesAppliedEvent>;

  constructor(options: NesControllerOptions) {
    const { host, registry, configService, scheduler, debounceManager, logger } = options;
    const debug = options.debugLogger ?? new DebugLogger(logger, configService.config.debug);
    const diffProvider = options.diffProvider ?? new LineDiffProvider();

    this.host = host;
    this.configService = configService;
    this.logger = logger;
    this.gate = new FeatureGate(host, configService);
    this.store = new EditStore(this.state, host, registry, this.gate, logger, debug);
    this.engine = new ApplyEngine(this.store, host, registry, this.gate, scheduler, configService, logger, debug);
    this.coordinator = new RequestCoordinator(this.store, host, registry, this.gate, diffProvider, this.engine, logger, debug);
    this.focusTracker = new FocusTracker(this.state, host, registry, this.gate, logger, debug);
    this.triggerer = new NesTriggerer(host, registry, this.engine.onDidApply, configService, debounceManager, this, logger, debug);

    this.onDidUpdate = this.store.onDidUpdate;
    this.onDidChangeState = this.store.onDidChangeState;
    this.onDidApply = this.engine.onDidApply;

    this.disposables.push(
      this.triggerer,
      this.engine,
      this.store,
      host.onDidCloseTextDocument((documentId) => this.store.discard(documentId)),
      configService.onDidChange((config) => debug.configure(config.debug))
    );
  }

  get enabled(): boolean {
    return this.gate.isOn;
  }

  enable(enable = true): void {
    if (this.gate.isOn === enable) {
      return;
    }
    this.gate.setOn(enable);
    this.triggerer.setEnabled(enable);
    this.logger.info(`[NesController] ${enable ? 'Enabled' : 'Disabled'}`);

    if (enable) {
      if (this.configService.config.enabled === false) {
        this.configService.update({ enabled: true });
      }
      this.setup();
      this.update();
    } else {
      this.clear();
    }
  }

  toggle(): void {
    this.enable(!this.gate.isOn);
  }

  disable(): void {
    this.enable(false);
  }

  /**
   * Request new edits for the current document
   */
  update(options: UpdateOptions = {}): void {
    this.coordinator.update(options);
  }

  /**
   * Request new edits on explicit user action and show them once they arrive
   */
  trigger(): void {
    this.coordinator.update({ forceRender: true, triggerKind: NesTriggerKind.Invoked });
  }

  /**
   * Cancel in-flight requests, keep edits that already arrived
   */
  cancel(): void {
    this.coordinator.cancel();
  }

  /**
   * Cancel requests and drop every edit
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Show pending edits of the current document
   */
  render(): void {
    this.engine.render();
  }

  jump(): boolean {
    return this.engine.jump();
  }

  apply(): boolean {
    return this.engine.apply();
  }

  /**
   * Jump to the suggestion if the cursor is elsewhere, apply it otherwise
   */
  jumpOrApply(): boolean {
    return this.jump() || this.apply();
  }

  /**
   * Whether edits are waiting to be shown in the current document
   */
  have(): boolean {
    return this.gate.isEnabled() && this.getEdits('pending').length > 0;
  }

  /**
   * Whether edits are shown in the current document
   */
  haveRendered(): boolean {
    return this.gate.isEnabled() && this.getEdits('active').length > 0;
  }

  /**
   * Read-eligible edits of the current document
   */
  getEdits(source: EditSource = 'active'): NesEdit[] {
    const documentId = this.host.getActiveDocumentId();
    return documentId === undefined ? [] : this.store.query(documentId, source);
  }

  getInFlightCount(): number {
    return this.store.getInFlightCount();
  }

  notifyFocus(): void {
    this.focusTracker.notifyFocus();
  }

  /**
   * A closed connection answers nothing: drop its focus record and its request
   */
  forgetConnection(connectionId: ConnectionId): void {
    this.focusTracker.forget(connectionId);
    this.store.untrackRequest(connectionId);
  }

  dispose(): void {
    this.coordinator.cancel();
    this.disposables.forEach((d) => d.dispose());
    this.disposables.length = 0;
  }

  private setup(): void {
    if (this.didSetup) {
      return;
    }
    this.didSetup = true;
    this.triggerer.start();
    this.focusTracker.notifyFocus();
  }
}
