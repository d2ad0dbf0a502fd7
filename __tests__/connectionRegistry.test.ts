import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { IBackendConnection } from '../src/context/contracts';
import { ConnectionRegistry } from '../src/host/connectionRegistry';
import { Logger } from '../src/services/logger';
import { FakeConnection } from './mocks/FakeConnection';
import { MemoryOutputChannel } from './mocks/MemoryOutputChannel';

const DOC = 'file:///main.ts';

describe('ConnectionRegistry', () => {
  let channel: MemoryOutputChannel;
  let logger: Logger;
  let registry: ConnectionRegistry;

  beforeEach(() => {
    channel = new MemoryOutputChannel();
    logger = new Logger(channel);
    registry = new ConnectionRegistry(logger);
  });

  afterEach(() => {
    registry.dispose();
    logger.dispose();
  });

  it('serves attached, capable and open connections in registration order', () => {
    const first = new FakeConnection('one');
    const plain = new FakeConnection('plain');
    const second = new FakeConnection('two');
    const detached = new FakeConnection('detached');
    registry.register(first);
    registry.register(plain, { supportsNes: false });
    registry.register(second);
    registry.register(detached);
    for (const id of ['one', 'plain', 'two']) {
      registry.attach(id, DOC);
    }

    expect(registry.getConnections(DOC).map((c) => c.id)).toEqual(['one', 'two']);
    expect(registry.getConnection(DOC)?.id).toBe('one');

    first.isClosed = true;
    expect(registry.getConnection(DOC)?.id).toBe('two');
  });

  it('announces each attachment once', () => {
    const attached: Array<{ connection: IBackendConnection; documentId: string }> = [];
    registry.onDidAttach((event) => attached.push(event));
    const connection = new FakeConnection('one');
    registry.register(connection);

    registry.attach('one', DOC);
    registry.attach('one', DOC);
    registry.attach('unknown', DOC);

    expect(attached).toEqual([{ connection, documentId: DOC }]);
  });

  it('stops serving a document after detach', () => {
    registry.register(new FakeConnection('one'));
    registry.attach('one', DOC);

    registry.detach('one', DOC);

    expect(registry.getConnections(DOC)).toEqual([]);
  });

  it('rejects duplicate ids', () => {
    registry.register(new FakeConnection('one'));

    expect(() => registry.register(new FakeConnection('one'))).toThrow('Connection "one" is already registered');
  });

  it('closes a connection through its registration', () => {
    const closed: string[] = [];
    registry.onDidClose((id) => closed.push(id));
    const registration = registry.register(new FakeConnection('one', 'test-server'));
    registry.attach('one', DOC);

    registration.dispose();
    registration.dispose();

    expect(closed).toEqual(['one']);
    expect(registry.get('one')).toBeUndefined();
    expect(registry.getConnection(DOC)).toBeUndefined();
    expect(channel.messages()).toEqual([
      '[info] [ConnectionRegistry] Registered test-server (one)',
      '[info] [ConnectionRegistry] Closed test-server (one)',
    ]);
  });
});
