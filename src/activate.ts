import type { Disposable } from 'vscode-languageserver-protocol';
import { ServiceContainer } from './container/serviceContainer';
import { IConnectionRegistry, IDiffProvider, IDocumentHost } from './context/contracts';
import { NesConfigOverrides } from './context/types';
import { registerNesCommands } from './commands/nesCommands';
import { CommandRegistry } from './host/commandRegistry';
import { ConfigService } from './services/configService';
import { DebounceManager } from './services/debounceManager';
import { DebugLogger } from './services/debugLogger';
import { Logger, OutputChannel } from './services/logger';
import { NesController } from './services/nesController';
import { TaskQueue } from './services/taskQueue';
import { StatusBar } from './ui/statusBar';

export interface ActivateOptions {
  readonly host: IDocumentHost;
  readonly registry: IConnectionRegistry;
  readonly commands?: CommandRegistry;
  readonly configOverrides?: NesConfigOverrides;
  readonly outputChannel?: OutputChannel;
  readonly diffProvider?: IDiffProvider;
  /** Drain scheduled tasks on the next event loop turn. Defaults to true. */
  readonly autoDrain?: boolean;
  /** Turn suggestions on right away. Defaults to true. */
  readonly enable?: boolean;
}

export interface NesSession extends Disposable {
  readonly controller: NesController;
  readonly statusBar: StatusBar;
  readonly commands: CommandRegistry;
  readonly logger: Logger;
  readonly config: ConfigService;
  readonly scheduler: TaskQueue;
}

/**
 * Wire the coordinator against a document host and its connections
 */
export function activate(options: ActivateOptions): NesSession {
  const container = new ServiceContainer();
  const subscriptions: Disposable[] = [];

  container.registerSingleton('logger', () => new Logger(options.outputChannel));
  container.registerSingleton('config', () => new ConfigService(options.configOverrides));
  container.registerSingleton(
    'debugLogger',
    (c) => new DebugLogger(c.resolve<Logger>('logger'), c.resolve<ConfigService>('config').config.debug)
  );
  container.registerSingleton(
    'debounceManager',
    (c) => new DebounceManager(c.resolve('logger'), c.resolve('debugLogger'))
  );
  container.registerSingleton(
    'scheduler',
    (c) => new TaskQueue(c.resolve('logger'), { autoDrain: options.autoDrain })
  );
  container.registerSingleton(
    'controller',
    (c) =>
      new NesController({
        host: options.host,
        registry: options.registry,
        configService: c.resolve('config'),
        scheduler: c.resolve('scheduler'),
        debounceManager: c.resolve('debounceManager'),
        logger: c.resolve('logger'),
        debugLogger: c.resolve('debugLogger'),
        diffProvider: options.diffProvider,
      })
  );
  container.registerSingleton('statusBar', (c) => new StatusBar(c.resolve('controller'), c.resolve('config')));

  const logger = container.resolve<Logger>('logger');
  const config = container.resolve<ConfigService>('config');
  const scheduler = container.resolve<TaskQueue>('scheduler');
  const controller = container.resolve<NesController>('controller');
  const statusBar = container.resolve<StatusBar>('statusBar');
  const commands = options.commands ?? new CommandRegistry();

  registerNesCommands(controller, commands, logger, subscriptions);

  if (options.enable ?? true) {
    controller.enable();
  }
  logger.info('[Activate] Next edit suggestions ready');

  return {
    controller,
    statusBar,
    commands,
    logger,
    config,
    scheduler,
    dispose: () => {
      subscriptions.forEach((d) => d.dispose());
      subscriptions.length = 0;
      container.dispose();
    },
  };
}
