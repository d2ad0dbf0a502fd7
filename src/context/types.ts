import type { Command, Position, Range } from 'vscode-languageserver-protocol';

/** Documents are identified by their URI. */
export type DocumentId = string;

export type ConnectionId = string;

export type PositionEncoding = 'utf-8' | 'utf-16' | 'utf-32';

/**
 * Kind of buffer a document lives in. Only `file` documents take part in
 * focus notifications.
 */
export type DocumentKind = 'file' | 'scratch' | 'special';

/**
 * What caused a suggestion request. Values match the LSP inline completion
 * trigger kinds.
 */
export enum NesTriggerKind {
  Invoked = 1,
  Automatic = 2,
}

/**
 * Editor events the trigger router reacts to.
 */
export enum EditorEventKind {
  TextChanged = 'textChanged',
  TextChangedWhileTyping = 'textChangedWhileTyping',
  TypingStarted = 'typingStarted',
  TypingStopped = 'typingStopped',
  Escape = 'escape',
  SuggestionApplied = 'suggestionApplied',
}

export interface EditorEvent {
  readonly kind: EditorEventKind;
  readonly documentId?: DocumentId;
}

export type EnabledSetting = boolean | ((documentId: DocumentId) => boolean);

export type AutoRenderSetting = boolean | ((event: EditorEvent) => boolean);

/**
 * Debug log categories, each can be switched independently
 */
export enum DebugCategory {
  Request = 'request',
  Store = 'store',
  Apply = 'apply',
  Focus = 'focus',
  Debounce = 'debounce',
  Trigger = 'trigger',
}

export interface DebugConfig {
  readonly enabled: boolean;
  readonly categories: Partial<Record<DebugCategory, boolean>>;
  /** Maximum length of a logged JSON payload */
  readonly maxPayloadLength: number;
}

export interface NesConfig {
  readonly enabled: EnabledSetting;
  /** Whether a finished request is shown right away instead of waiting for `render()` */
  readonly autoRender: AutoRenderSetting;
  readonly debounceMs: number;
  readonly focusDebounceMs: number;
  readonly trigger: { readonly events: readonly EditorEventKind[] };
  readonly clear: { readonly events: readonly EditorEventKind[]; readonly escape: boolean };
  readonly jump: { readonly jumplist: boolean };
  readonly debug: DebugConfig;
}

export type NesConfigOverrides = Partial<Omit<NesConfig, 'trigger' | 'clear' | 'jump' | 'debug'>> & {
  readonly trigger?: Partial<NesConfig['trigger']>;
  readonly clear?: Partial<NesConfig['clear']>;
  readonly jump?: Partial<NesConfig['jump']>;
  readonly debug?: Partial<DebugConfig>;
};

/**
 * Edit as sent by the language server
 */
export interface RawNesEdit {
  readonly textDocument: { readonly uri: string; readonly version: number };
  readonly range: Range;
  readonly text: string;
  readonly command?: Command;
}

export interface InlineEditParams {
  readonly textDocument: { readonly uri: string; readonly version: number };
  readonly position: Position;
  readonly context: { readonly triggerKind: NesTriggerKind };
}

/**
 * One contiguous region of difference. `pos` is where the change starts.
 */
export interface Hunk {
  readonly pos: Position;
  readonly before: readonly string[];
  readonly after: readonly string[];
}

export interface DiffResult {
  readonly hunks: readonly Hunk[];
  readonly to: {
    /** Replacement text split into lines */
    readonly lines: readonly string[];
    /** Last line of the replacement text */
    readonly text: string;
  };
}

export type EditSource = 'pending' | 'active';

export interface UpdateOptions {
  readonly forceRender?: boolean;
  readonly triggerKind?: NesTriggerKind;
}

/**
 * Fired after a suggestion was applied to its document
 */
export interface NesAppliedEvent {
  readonly connectionId: ConnectionId;
  readonly documentId: DocumentId;
}
