import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { DocumentChangeEvent, InMemoryWorkspace } from '../src/host/workspace';

const DOC = 'file:///notes.md';
const OTHER = 'file:///other.md';

describe('InMemoryWorkspace', () => {
  let workspace: InMemoryWorkspace;

  beforeEach(() => {
    workspace = new InMemoryWorkspace();
    workspace.openDocument(DOC, 'é = 1\nsecond\r\nthird');
  });

  afterEach(() => {
    workspace.dispose();
  });

  it('reads lines without their line breaks', () => {
    expect(workspace.getLineCount(DOC)).toBe(3);
    expect(workspace.getLine(DOC, 0)).toBe('é = 1');
    expect(workspace.getLine(DOC, 1)).toBe('second');
    expect(workspace.getLine(DOC, 2)).toBe('third');
    expect(workspace.getLine(DOC, 3)).toBeUndefined();
  });

  it('bumps the version on every change', () => {
    const changes: DocumentChangeEvent[] = [];
    workspace.onDidChangeTextDocument((event) => changes.push(event));

    expect(workspace.getVersion(DOC)).toBe(0);
    workspace.setText(DOC, 'replaced');

    expect(workspace.getVersion(DOC)).toBe(1);
    expect(workspace.getText(DOC)).toBe('replaced');
    expect(changes).toEqual([{ documentId: DOC, version: 1 }]);
    expect(workspace.setText(OTHER, 'nothing')).toBe(false);
  });

  it('applies edits expressed in utf-8 offsets', () => {
    const applied = workspace.applyTextEdits(
      DOC,
      [{ range: { start: { line: 0, character: 5 }, end: { line: 0, character: 6 } }, newText: '2' }],
      'utf-8'
    );

    expect(applied).toBe(true);
    expect(workspace.getLine(DOC, 0)).toBe('é = 2');
    expect(workspace.getVersion(DOC)).toBe(1);
  });

  it('refuses edits for documents that are not open', () => {
    expect(
      workspace.applyTextEdits(OTHER, [{ range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } }, newText: 'x' }], 'utf-16')
    ).toBe(false);
  });

  it('converts positions between encodings', () => {
    expect(workspace.toHostPosition(DOC, { line: 0, character: 2 }, 'utf-8')).toEqual({ line: 0, character: 1 });
    expect(workspace.fromHostPosition(DOC, { line: 0, character: 1 }, 'utf-8')).toEqual({ line: 0, character: 2 });
    expect(workspace.toHostPosition(DOC, { line: 9, character: 4 }, 'utf-8')).toEqual({ line: 9, character: 4 });
  });

  it('keeps a cursor per document', () => {
    workspace.openDocument(OTHER, 'other');
    workspace.setActiveDocument(DOC);
    workspace.setCursor({ line: 1, character: 3 });

    workspace.setActiveDocument(OTHER);
    expect(workspace.getCursor()).toEqual({ line: 0, character: 0 });

    workspace.setActiveDocument(DOC);
    expect(workspace.getCursor()).toEqual({ line: 1, character: 3 });
  });

  it('has no cursor without an active document', () => {
    expect(workspace.getActiveDocumentId()).toBeUndefined();
    expect(workspace.getCursor()).toBeUndefined();
  });

  it('records the cursor in the jump list', () => {
    workspace.setActiveDocument(DOC);
    workspace.setCursor({ line: 2, character: 1 });

    workspace.pushJumplist();

    expect(workspace.getJumplist()).toEqual([{ documentId: DOC, position: { line: 2, character: 1 } }]);
  });

  it('rejects focusing a document that is not open', () => {
    expect(() => workspace.setActiveDocument(OTHER)).toThrow(`Document "${OTHER}" is not open`);
  });

  it('drops focus when the active document closes', () => {
    const focus: Array<string | undefined> = [];
    const closed: string[] = [];
    workspace.setActiveDocument(DOC);
    workspace.onDidChangeActiveDocument((id) => focus.push(id));
    workspace.onDidCloseTextDocument((id) => closed.push(id));

    workspace.closeDocument(DOC);

    expect(focus).toEqual([undefined]);
    expect(closed).toEqual([DOC]);
    expect(workspace.isValid(DOC)).toBe(false);
    expect(workspace.getVersion(DOC)).toBeUndefined();
  });

  it('reports load state and kind', () => {
    workspace.openDocument(OTHER, '', { kind: 'special' });
    workspace.setLoaded(DOC, false);

    expect(workspace.isLoaded(DOC)).toBe(false);
    expect(workspace.isLoaded(OTHER)).toBe(true);
    expect(workspace.getKind(DOC)).toBe('file');
    expect(workspace.getKind(OTHER)).toBe('special');
  });
});
