import { Disposable, Emitter } from 'vscode-languageserver-protocol';
import { IConfigService } from '../context/contracts';
import { NesController } from '../services/nesController';

/**
 * Status bar state enum
 */
export enum StatusBarState {
  Disabled = 'disabled',
  Idle = 'idle',
  Requesting = 'requesting',
  Pending = 'pending',
  Shown = 'shown',
}

/**
 * Status line item for next edit suggestions. Recomputed whenever the
 * suggestion state or the configuration changes.
 */
export class StatusBar implements Disposable {
  private readonly disposables: Disposable[] = [];
  private currentState: StatusBarState = StatusBarState.Disabled;
  private currentText = '';

  private readonly _onDidChangeText = new Emitter<string>();
  readonly onDidChangeText = this._onDidChangeText.event;

  constructor(
    private readonly controller: NesController,
    configService: IConfigService
  ) {
    this.disposables.push(
      controller.onDidUpdate(() => this.updateStatusIndicator()),
      controller.onDidChangeState(() => this.updateStatusIndicator()),
      configService.onDidChange(() => this.updateStatusIndicator())
    );
    this.updateStatusIndicator();
  }

  get state(): StatusBarState {
    return this.currentState;
  }

  get text(): string {
    return this.currentText;
  }

  updateStatusIndicator(): void {
    let state: StatusBarState;
    let text: string;

    if (!this.controller.enabled) {
      state = StatusBarState.Disabled;
      text = 'NES: off';
    } else if (this.controller.getInFlightCount() > 0) {
      state = StatusBarState.Requesting;
      text = 'NES: requesting';
    } else if (this.controller.haveRendered()) {
      state = StatusBarState.Shown;
      text = `NES: ${this.controller.getEdits('active').length} shown`;
    } else if (this.controller.have()) {
      state = StatusBarState.Pending;
      text = `NES: ${this.controller.getEdits('pending').length} pending`;
    } else {
      state = StatusBarState.Idle;
      text = 'NES: idle';
    }

    this.currentState = state;
    if (text !== this.currentText) {
      this.currentText = text;
      this._onDidChangeText.fire(text);
    }
  }

  dispose(): void {
    this.disposables.forEach((d) => d.dispose());
    this._onDidChangeText.dispose();
  }
}
