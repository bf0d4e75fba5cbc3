/**
 * Source Line Cache
 *
 * Keeps the lines of source files seen in snapshots. An entry is re-read when the
 * file's size or modification time changes.
 */

import { readFile, stat } from 'node:fs/promises';

export const CURRENT_LINE_MARKER = '--> ';
export const LINE_INDENT = '    ';
export const WINDOW_RADIUS = 5;

interface CacheEntry {
  mtimeMs: number;
  size: number;
  lines: string[];
}

export class SourceCache {
  private entries: Map<string, CacheEntry> = new Map();

  /**
   * Lines of a file, 0-indexed. Rejects when the file cannot be read.
   */
  async getLines(file: string): Promise<string[]> {
    const info = await stat(file);
    const cached = this.entries.get(file);
    if (cached && cached.mtimeMs === info.mtimeMs && cached.size === info.size) {
      return cached.lines;
    }

    const text = await readFile(file, 'utf-8');
    const lines = text.split(/\r?\n/);
    // A trailing newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    this.entries.set(file, { mtimeMs: info.mtimeMs, size: info.size, lines });
    return lines;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Annotate the lines around a 1-based line number.
 *
 * Covers `line - radius` .. `line + radius`, clamped at line 1 and at the end of the
 * file. The current line is marked with an arrow; the rest are indented to match.
 */
export function sourceWindow(lines: readonly string[], line: number, radius = WINDOW_RADIUS): string[] {
  const start = Math.max(1, line - radius);
  const end = Math.min(lines.length, line + radius);
  const window: string[] = [];

  for (let n = start; n <= end; n++) {
    const prefix = n === line ? CURRENT_LINE_MARKER : LINE_INDENT;
    window.push(`${prefix}${n}: ${lines[n - 1].trimEnd()}`);
  }

  return window;
}
