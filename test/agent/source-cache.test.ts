import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SourceCache, sourceWindow } from '../../src/agent/source-cache.js';

describe('sourceWindow', () => {
  const lines = Array.from({ length: 20 }, (_, i) => `line ${i + 1}`);

  it('marks the current line and indents the rest', () => {
    expect(sourceWindow(['a', 'b', 'c'], 2)).toEqual(['    1: a', '--> 2: b', '    3: c']);
  });

  it('spans five lines either side', () => {
    const window = sourceWindow(lines, 10);
    expect(window).toHaveLength(11);
    expect(window[0]).toBe('    5: line 5');
    expect(window[5]).toBe('--> 10: line 10');
    expect(window[10]).toBe('    15: line 15');
  });

  it('clamps at the start and end of the file', () => {
    expect(sourceWindow(lines, 1)[0]).toBe('--> 1: line 1');
    expect(sourceWindow(lines, 1)).toHaveLength(6);
    expect(sourceWindow(lines, 20).at(-1)).toBe('--> 20: line 20');
  });

  it('is empty for a line far past the end', () => {
    expect(sourceWindow(lines, 40)).toEqual([]);
  });

  it('strips trailing whitespace', () => {
    expect(sourceWindow(['x = 1   \t'], 1)).toEqual(['--> 1: x = 1']);
  });
});

describe('SourceCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'source-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('splits lines and drops the final newline', async () => {
    const file = path.join(dir, 'app.py');
    await fs.writeFile(file, 'a = 1\r\nb = 2\n');

    expect(await new SourceCache().getLines(file)).toEqual(['a = 1', 'b = 2']);
  });

  it('serves unchanged files from the cache', async () => {
    const file = path.join(dir, 'app.py');
    await fs.writeFile(file, 'a = 1\n');
    const cache = new SourceCache();

    const first = await cache.getLines(file);
    const second = await cache.getLines(file);

    expect(second).toBe(first);
  });

  it('re-reads a file whose size changed', async () => {
    const file = path.join(dir, 'app.py');
    await fs.writeFile(file, 'a = 1\n');
    const cache = new SourceCache();
    await cache.getLines(file);

    await fs.writeFile(file, 'a = 1\nb = 2\n');

    expect(await cache.getLines(file)).toEqual(['a = 1', 'b = 2']);
  });

  it('rejects for missing files', async () => {
    await expect(new SourceCache().getLines(path.join(dir, 'missing.py'))).rejects.toThrow('ENOENT');
  });
});
