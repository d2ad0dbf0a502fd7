import type { Disposable } from 'vscode-languageserver-protocol';
import { ILogger } from '../context/contracts';
import { CommandRegistry } from '../host/commandRegistry';
import { NesController } from '../services/nesController';

export const NesCommandIds = {
  update: 'nes.update',
  trigger: 'nes.trigger',
  clear: 'nes.clear',
  jump: 'nes.jump',
  apply: 'nes.apply',
  jumpOrApply: 'nes.jumpOrApply',
  toggle: 'nes.toggle',
  enable: 'nes.enable',
  disable: 'nes.disable',
} as const;

/**
 * Register the public NES actions as commands. Actions that report success
 * resolve to a boolean; failures are logged and resolve to false.
 */
export function registerNesCommands(
  controller: NesController,
  commands: CommandRegistry,
  logger: ILogger,
  subscriptions: Disposable[]
): void {
  const register = (id: string, action: () => boolean | void): void => {
    subscriptions.push(
      commands.registerCommand(id, () => {
        try {
          const result = action();
          return typeof result === 'boolean' ? result : true;
        } catch (error) {
          logger.error(`Failed to run ${id}`, error);
          return false;
        }
      })
    );
  };

  register(NesCommandIds.update, () => controller.update());
  register(NesCommandIds.trigger, () => controller.trigger());
  register(NesCommandIds.clear, () => controller.clear());
  register(NesCommandIds.jump, () => controller.jump());
  register(NesCommandIds.apply, () => {
    const applied = controller.apply();
    if (!applied) {
      logger.info('No next edit suggestion to apply');
    }
    return applied;
  });
  register(NesCommandIds.jumpOrApply, () => controller.jumpOrApply());
  register(NesCommandIds.toggle, () => controller.toggle());
  register(NesCommandIds.enable, () => controller.enable());
  register(NesCommandIds.disable, () => controller.disable());
}
