import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { buildInlineEditParams } from '../src/context/requestBuilder';
import { NesTriggerKind } from '../src/context/types';
import { InMemoryWorkspace } from '../src/host/workspace';
import { FakeConnection } from './mocks/FakeConnection';

const DOC = 'file:///greeting.txt';

describe('buildInlineEditParams', () => {
  let workspace: InMemoryWorkspace;

  beforeEach(() => {
    workspace = new InMemoryWorkspace();
    workspace.openDocument(DOC, 'héllo wörld\n', { version: 7 });
  });

  afterEach(() => {
    workspace.dispose();
  });

  it('encodes the cursor for the connection', () => {
    workspace.setActiveDocument(DOC);
    workspace.setCursor({ line: 0, character: 6 });
    const connection = new FakeConnection('conn-8', 'conn-8', 'utf-8');

    const params = buildInlineEditParams({
      host: workspace,
      connection,
      documentId: DOC,
      triggerKind: NesTriggerKind.Invoked,
    });

    expect(params).toEqual({
      textDocument: { uri: DOC, version: 7 },
      position: { line: 0, character: 7 },
      context: { triggerKind: NesTriggerKind.Invoked },
    });
  });

  it('gives up without a cursor', () => {
    const params = buildInlineEditParams({ host: workspace, connection: new FakeConnection('conn'), documentId: DOC });

    expect(params).toBeUndefined();
  });

  it('gives up for documents that are not open', () => {
    workspace.setActiveDocument(DOC);

    const params = buildInlineEditParams({
      host: workspace,
      connection: new FakeConnection('conn'),
      documentId: 'file:///missing.txt',
    });

    expect(params).toBeUndefined();
  });
});
