export { activate, type ActivateOptions, type NesSession } from './activate';
export * from './context/types';
export * from './context/contracts';
export { buildInlineEditParams, DID_FOCUS_METHOD, INLINE_EDIT_METHOD } from './context/requestBuilder';
export { ServiceContainer } from './container/serviceContainer';
export { NesCommandIds, registerNesCommands } from './commands/nesCommands';
export { CommandRegistry, type CommandHandler } from './host/commandRegistry';
export { ConnectionRegistry, type RegisterOptions } from './host/connectionRegistry';
export { LspBackendConnection } from './host/lspConnection';
export {
  InMemoryWorkspace,
  type DocumentChangeEvent,
  type JumplistEntry,
  type OpenDocumentOptions,
} from './host/workspace';
export { ApplyEngine, fixPosition } from './services/applyEngine';
export { ConfigService, DEFAULT_CONFIG } from './services/configService';
export { DebounceManager } from './services/debounceManager';
export { DebugLogger, DEFAULT_DEBUG_CONFIG } from './services/debugLogger';
export { EditStore } from './services/editStore';
export { FeatureGate } from './services/featureGate';
export { FocusTracker } from './services/focusTracker';
export { Logger, LogLevel, StreamOutputChannel, type OutputChannel } from './services/logger';
export { NesController, type NesControllerOptions } from './services/nesController';
export { NesEdit } from './services/nesEdit';
export { createNesState, type InFlightRequest, type NesState } from './services/nesState';
export { NesTriggerer, type NesTriggerTarget } from './services/nesTriggerer';
export { RequestCoordinator, isRawNesEdit, type IRenderTarget } from './services/requestCoordinator';
export { TaskQueue, type TaskQueueOptions } from './services/taskQueue';
export { StatusBar, StatusBarState } from './ui/statusBar';
export { computeLineDiff, LineDiffProvider, splitLines } from './utils/lineDiff';
export { fromUtf16Column, toUtf16Column } from './utils/positionEncoding';
