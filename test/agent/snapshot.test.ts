import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { SnapshotBuilder, pickLocalScopes, summarizeFailure } from '../../src/agent/snapshot.js';
import { NO_EXCEPTION } from '../../src/agent/types.js';
import type { FrameHandle } from '../../src/agent/types.js';
import { FakeDebugSession, captureConsole, localsScope, variable } from '../helpers.js';

describe('summarizeFailure', () => {
  it('reports the no-exception marker without a failure', () => {
    expect(summarizeFailure(null)).toBe(NO_EXCEPTION);
    expect(summarizeFailure(undefined)).toBe('Breakpoint (No Exception)');
  });

  it('joins type and message', () => {
    expect(summarizeFailure({ type: 'ZeroDivisionError', message: 'division by zero' })).toBe(
      'ZeroDivisionError: division by zero'
    );
  });

  it('uses the type alone when the message is blank', () => {
    expect(summarizeFailure({ type: 'KeyboardInterrupt', message: '  ' })).toBe('KeyboardInterrupt');
  });
});

describe('pickLocalScopes', () => {
  it('selects locals and arguments', () => {
    const scopes = [
      { name: 'Locals', variablesReference: 1, expensive: false },
      { name: 'Globals', variablesReference: 2, expensive: false },
      { name: 'Params', presentationHint: 'arguments', variablesReference: 3, expensive: false },
    ];
    expect(pickLocalScopes(scopes).map((s) => s.name)).toEqual(['Locals', 'Params']);
  });

  it('falls back to the first cheap scope', () => {
    const scopes = [
      { name: 'Registers', variablesReference: 1, expensive: true },
      { name: 'Frame', variablesReference: 2, expensive: false },
    ];
    expect(pickLocalScopes(scopes).map((s) => s.name)).toEqual(['Frame']);
  });
});

describe('SnapshotBuilder', () => {
  let dir: string;
  let file: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'snapshot-'));
    file = path.join(dir, 'calc.py');
    const lines = Array.from({ length: 50 }, (_, i) => (i + 1 === 42 ? '    return x / y' : `line ${i + 1}`));
    await fs.writeFile(file, lines.join('\n') + '\n');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function divideSession(): FakeDebugSession {
    const session = new FakeDebugSession();
    session.scopesByFrame.set(1, [localsScope(100)]);
    session.children.set(100, [variable('x', '10', { type: 'int' }), variable('y', '0', { type: 'int' })]);
    return session;
  }

  function frameAt(line: number, sourcePath: string | null = file): FrameHandle {
    return { frameId: 1, functionName: 'divide', line, sourcePath };
  }

  it('captures a failing frame', async () => {
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(divideSession(), console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(42), { type: 'ZeroDivisionError', message: 'division by zero' });

    expect(snapshot.functionName).toBe('divide');
    expect(snapshot.lineNumber).toBe(42);
    expect(snapshot.sourcePath).toBe(file);
    expect(snapshot.variables).toEqual({ x: '10', y: '0' });
    expect(snapshot.exceptionSummary).toBe('ZeroDivisionError: division by zero');
    expect(snapshot.sourceWindow).toHaveLength(11);
    expect(snapshot.sourceWindow[0]).toBe('    37: line 37');
    expect(snapshot.sourceWindow[5]).toBe('--> 42:     return x / y');
    expect(snapshot.sourceWindow[10]).toBe('    47: line 47');
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('reports a breakpoint stop without an exception', async () => {
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(divideSession(), console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(42), null);

    expect(snapshot.exceptionSummary).toBe('Breakpoint (No Exception)');
  });

  it('clamps the window at the first line', async () => {
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(divideSession(), console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(2));

    expect(snapshot.sourceWindow).toHaveLength(7);
    expect(snapshot.sourceWindow.slice(0, 2)).toEqual(['    1: line 1', '--> 2: line 2']);
  });

  it('treats lines below 1 as line 1', async () => {
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(divideSession(), console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(0));

    expect(snapshot.lineNumber).toBe(1);
    expect(snapshot.sourceWindow[0]).toBe('--> 1: line 1');
  });

  it('uses a placeholder when the source cannot be read', async () => {
    const { console, lines } = captureConsole();
    const builder = new SnapshotBuilder(divideSession(), console, { maxValueLength: 500 });
    const missing = path.join(dir, 'gone.py');

    const snapshot = await builder.capture(frameAt(3, missing));

    expect(snapshot.sourceWindow).toEqual([`<Source not available for ${missing}>`]);
    expect(lines()).toHaveLength(1);
    expect(lines()[0].startsWith('[crashlens WARN] Could not read source:')).toBe(true);
  });

  it('uses a placeholder when the frame has no source', async () => {
    const { console, lines } = captureConsole();
    const builder = new SnapshotBuilder(divideSession(), console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(3, null));

    expect(snapshot.sourceWindow).toEqual(['<Source not available for <unknown>>']);
    expect(snapshot.sourcePath).toBeNull();
    expect(lines()).toEqual(["[crashlens WARN] No source path for frame 'divide'"]);
  });

  it('bounds every string by the maximum value length', async () => {
    const session = divideSession();
    session.children.set(100, [variable('blob', 'z'.repeat(100))]);
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(session, console, { maxValueLength: 20 });

    const snapshot = await builder.capture(frameAt(42), { type: 'ValueError', message: 'm'.repeat(100) });

    expect(snapshot.variables.blob).toHaveLength(20);
    expect(snapshot.exceptionSummary).toHaveLength(20);
    expect(snapshot.sourcePath).toHaveLength(20);
    for (const line of snapshot.sourceWindow) {
      expect(line.length).toBeLessThanOrEqual(20);
    }
  });

  it('bounds variable names by the maximum value length', async () => {
    const session = divideSession();
    session.children.set(100, [variable('a'.repeat(30), '1')]);
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(session, console, { maxValueLength: 10 });

    const snapshot = await builder.capture(frameAt(42));

    expect(snapshot.variables).toEqual({ 'aaa...aaaa': '1' });
  });

  it('keeps the first binding of a repeated name', async () => {
    const session = divideSession();
    session.scopesByFrame.set(1, [localsScope(100), { name: 'Arguments', variablesReference: 101, expensive: false }]);
    session.children.set(101, [variable('x', '99')]);
    const { console } = captureConsole();
    const builder = new SnapshotBuilder(session, console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(42));

    expect(snapshot.variables).toEqual({ x: '10', y: '0' });
  });

  it('captures without variables when the frame cannot be read', async () => {
    const session = divideSession();
    session.scopes.mockRejectedValueOnce(new Error('frame gone'));
    const { console, lines } = captureConsole();
    const builder = new SnapshotBuilder(session, console, { maxValueLength: 500 });

    const snapshot = await builder.capture(frameAt(42));

    expect(snapshot.variables).toEqual({});
    expect(lines()).toEqual(['[crashlens WARN] Could not read locals: frame gone']);
  });
});
