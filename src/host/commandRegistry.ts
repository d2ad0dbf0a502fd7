import { Disposable } from 'vscode-languageserver-protocol';

export type CommandHandler = (...args: unknown[]) => unknown;

/**
 * Named actions that keybindings and menus invoke
 */
export class CommandRegistry {
  private readonly handlers = new Map<string, CommandHandler>();

  registerCommand(id: string, handler: CommandHandler): Disposable {
    if (this.handlers.has(id)) {
      throw new Error(`Command "${id}" is already registered`);
    }
    this.handlers.set(id, handler);
    return Disposable.create(() => {
      if (this.handlers.get(id) === handler) {
        this.handlers.delete(id);
      }
    });
  }

  async executeCommand(id: string, ...args: unknown[]): Promise<unknown> {
    const handler = this.handlers.get(id);
    if (!handler) {
      throw new Error(`Command "${id}" is not registered`);
    }
    return handler(...args);
  }

  getCommands(): string[] {
    return [...this.handlers.keys()];
  }
}
