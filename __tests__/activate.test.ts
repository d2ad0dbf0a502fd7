import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { activate, NesSession } from '../src/activate';
import { NesCommandIds } from '../src/commands/nesCommands';
import { CommandRegistry } from '../src/host/commandRegistry';
import { ConnectionRegistry } from '../src/host/connectionRegistry';
import { InMemoryWorkspace } from '../src/host/workspace';
import { Logger } from '../src/services/logger';
import { FakeConnection } from './mocks/FakeConnection';
import { DOC_A, rawEdit, SAMPLE_TEXT } from './mocks/harness';
import { MemoryOutputChannel } from './mocks/MemoryOutputChannel';

class CursorlessWorkspace extends InMemoryWorkspace {
  getCursor(): never {
    throw new Error('cursor unavailable');
  }
}

describe('activate', () => {
  let channel: MemoryOutputChannel;
  let workspace: InMemoryWorkspace;
  let registry: ConnectionRegistry;
  let connection: FakeConnection;
  let session: NesSession | undefined;

  const setup = (host: InMemoryWorkspace = new InMemoryWorkspace()): void => {
    workspace = host;
    workspace.openDocument(DOC_A, SAMPLE_TEXT, { version: 3 });
    workspace.setActiveDocument(DOC_A);
    registry = new ConnectionRegistry(new Logger(channel));
    connection = new FakeConnection('conn-1', 'test-server');
    registry.register(connection);
    registry.attach(connection.id, DOC_A);
  };

  beforeEach(() => {
    jest.useFakeTimers();
    channel = new MemoryOutputChannel();
  });

  afterEach(() => {
    session?.dispose();
    session = undefined;
    registry.dispose();
    workspace.dispose();
    jest.useRealTimers();
  });

  it('registers every command and starts enabled', () => {
    setup();
    session = activate({ host: workspace, registry, outputChannel: channel, autoDrain: false });

    expect(session.commands.getCommands().sort()).toEqual(Object.values(NesCommandIds).sort());
    expect(session.controller.enabled).toBe(true);
    expect(session.statusBar.text).toBe('NES: requesting');
    expect(channel.messages()).toContain('[info] [Activate] Next edit suggestions ready');
  });

  it('stays disabled when asked to', () => {
    setup();
    session = activate({ host: workspace, registry, outputChannel: channel, enable: false });

    expect(session.controller.enabled).toBe(false);
    expect(connection.requests).toEqual([]);
  });

  it('passes configuration overrides through', () => {
    setup();
    session = activate({
      host: workspace,
      registry,
      outputChannel: channel,
      configOverrides: { debounceMs: 40 },
      autoDrain: false,
    });

    expect(session.config.config.debounceMs).toBe(40);
  });

  it('drives a full cycle through commands', async () => {
    setup();
    session = activate({ host: workspace, registry, outputChannel: channel, autoDrain: false });
    const { commands, scheduler, statusBar } = session;

    await expect(commands.executeCommand(NesCommandIds.trigger)).resolves.toBe(true);
    connection.respond({ edits: [rawEdit({ start: [1, 0], end: [1, 5] }, 'x = 1')] });
    expect(statusBar.text).toBe('NES: 1 shown');

    await expect(commands.executeCommand(NesCommandIds.jumpOrApply)).resolves.toBe(true);
    scheduler.flush();
    expect(workspace.getCursor()).toEqual({ line: 1, character: 4 });

    await expect(commands.executeCommand(NesCommandIds.jumpOrApply)).resolves.toBe(true);
    scheduler.flush();
    expect(workspace.getText(DOC_A)).toBe('import os\nx = 1\nprint(x)\n');
    expect(workspace.getCursor()).toEqual({ line: 1, character: 5 });
    expect(statusBar.text).toBe('NES: idle');
  });

  it('reports a missing suggestion on apply', async () => {
    setup();
    session = activate({ host: workspace, registry, outputChannel: channel, autoDrain: false });

    await expect(session.commands.executeCommand(NesCommandIds.apply)).resolves.toBe(false);
    expect(channel.messages()).toContain('[info] No next edit suggestion to apply');
  });

  it('toggles through commands', async () => {
    setup();
    session = activate({ host: workspace, registry, outputChannel: channel, autoDrain: false });

    await session.commands.executeCommand(NesCommandIds.toggle);
    expect(session.controller.enabled).toBe(false);
    expect(session.statusBar.text).toBe('NES: off');

    await session.commands.executeCommand(NesCommandIds.enable);
    expect(session.controller.enabled).toBe(true);
  });

  it('logs a failing command and resolves false', async () => {
    setup(new CursorlessWorkspace());
    session = activate({ host: workspace, registry, outputChannel: channel, enable: false });

    await expect(session.commands.executeCommand(NesCommandIds.enable)).resolves.toBe(false);
    expect(
      channel.messages().some((line) => line.startsWith('[error] Failed to run nes.enable :: Error: cursor unavailable'))
    ).toBe(true);
  });

  it('uses a provided command registry and releases it on dispose', () => {
    setup();
    const commands = new CommandRegistry();
    session = activate({ host: workspace, registry, commands, outputChannel: channel, autoDrain: false });
    expect(commands.getCommands()).toHaveLength(9);

    session.dispose();
    session = undefined;

    expect(commands.getCommands()).toEqual([]);
    expect(channel.disposed).toBe(true);
  });
});

describe('CommandRegistry', () => {
  it('rejects unknown and duplicate commands', async () => {
    const commands = new CommandRegistry();
    commands.registerCommand('demo.run', () => 'ran');

    await expect(commands.executeCommand('demo.run')).resolves.toBe('ran');
    await expect(commands.executeCommand('demo.missing')).rejects.toThrow('Command "demo.missing" is not registered');
    expect(() => commands.registerCommand('demo.run', () => undefined)).toThrow('Command "demo.run" is already registered');
  });
});
