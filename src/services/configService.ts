import { Emitter } from 'vscode-languageserver-protocol';
import { IConfigService } from '../context/contracts';
import { EditorEventKind, NesConfig, NesConfigOverrides } from '../context/types';
import { DEFAULT_DEBUG_CONFIG } from './debugLogger';

export const DEFAULT_CONFIG: NesConfig = {
  enabled: true,
  autoRender: true,
  debounceMs: 100,
  focusDebounceMs: 10,
  trigger: {
    events: [EditorEventKind.TypingStopped, EditorEventKind.TextChanged, EditorEventKind.SuggestionApplied],
  },
  clear: {
    events: [EditorEventKind.TypingStarted, EditorEventKind.TextChangedWhileTyping],
    escape: true,
  },
  jump: { jumplist: true },
  debug: DEFAULT_DEBUG_CONFIG,
};

export class ConfigService implements IConfigService {
  private readonly emitter = new Emitter<NesConfig>();
  readonly onDidChange = this.emitter.event;
  private current: NesConfig;

  constructor(overrides: NesConfigOverrides = {}) {
    this.current = mergeConfig(DEFAULT_CONFIG, overrides);
  }

  get config(): NesConfig {
    return this.current;
  }

  update(overrides: NesConfigOverrides): void {
    this.current = mergeConfig(this.current, overrides);
    this.emitter.fire(this.current);
  }

  dispose(): void {
    this.emitter.dispose();
  }
}

function mergeConfig(base: NesConfig, overrides: NesConfigOverrides): NesConfig {
  return {
    enabled: overrides.enabled ?? base.enabled,
    autoRender: overrides.autoRender ?? base.autoRender,
    debounceMs: readDelay(overrides.debounceMs, base.debounceMs),
    focusDebounceMs: readDelay(overrides.focusDebounceMs, base.focusDebounceMs),
    trigger: { ...base.trigger, ...overrides.trigger },
    clear: { ...base.clear, ...overrides.clear },
    jump: { ...base.jump, ...overrides.jump },
    debug: {
      ...base.debug,
      ...overrides.debug,
      categories: { ...base.debug.categories, ...overrides.debug?.categories },
    },
  };
}

function readDelay(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return fallback;
  }
  return value;
}
