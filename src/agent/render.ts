/**
 * Bounded Value Rendering
 *
 * Turns a DAP variable (and whatever it references) into a single line of text
 * whose length never exceeds the configured maximum. Expansion is limited in depth,
 * in items per container and by a shared character budget, and a reference already
 * on the expansion path renders as a cycle marker, so huge or cyclic values cost a
 * bounded number of adapter round-trips.
 */

import type { FrameStateReader } from '../dap/client-interface.js';
import type { Variable } from '../dap/protocol.js';

export const ELLIPSIS = '...';
export const CYCLE_MARKER = '<cycle>';

/**
 * Property names that carry no debugging value.
 * Adapters group these under synthetic children (debugpy, js-debug, .NET).
 */
const BLOCKED_PROPERTIES = new Set([
  'special variables',
  'function variables',
  'class variables',
  'protected variables',
  'len()',
  '[[Prototype]]',
  '__proto__',
  'Raw View',
  'Static members',
  'Non-Public members',
  '[More]',
]);

/** Types whose children are reflection metadata rather than data */
const BLOCKED_TYPE_PATTERNS = [
  /^System\.Reflection\./,
  /^System\.RuntimeType$/,
  /^(builtin_function_or_method|function|method|module|type)$/,
];

const COLLECTION_TYPES = ['list', 'tuple', 'set', 'frozenset', 'deque', 'Array', 'List', 'Set', '[]'];

export interface RenderOptions {
  /** Hard upper bound on the rendered length */
  maxLength: number;
  /** Container nesting to expand (default: 2) */
  maxDepth?: number;
  /** Children fetched per container (default: 20) */
  maxItems?: number;
}

interface Budget {
  remaining: number;
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/** End index at or before `end` that does not split a surrogate pair */
function headEnd(text: string, end: number): number {
  return end > 0 && isHighSurrogate(text.charCodeAt(end - 1)) ? end - 1 : end;
}

/** Start index at or after `start` that does not split a surrogate pair */
function tailStart(text: string, start: number): number {
  return start < text.length && isLowSurrogate(text.charCodeAt(start)) ? start + 1 : start;
}

/**
 * Cut text to at most maxLength UTF-16 units, keeping its head and tail.
 * Cuts never fall inside a surrogate pair, so the result may come out a unit short.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= ELLIPSIS.length) return text.slice(0, headEnd(text, maxLength));

  const keep = maxLength - ELLIPSIS.length;
  const head = Math.floor(keep / 2);
  const tail = keep - head;
  return text.slice(0, headEnd(text, head)) + ELLIPSIS + text.slice(tailStart(text, text.length - tail));
}

export function isBlockedProperty(name: string): boolean {
  return BLOCKED_PROPERTIES.has(name);
}

export class BoundedRenderer {
  private reader: FrameStateReader;
  private maxLength: number;
  private maxDepth: number;
  private maxItems: number;

  constructor(reader: FrameStateReader, options: RenderOptions) {
    this.reader = reader;
    this.maxLength = options.maxLength;
    this.maxDepth = options.maxDepth ?? 2;
    this.maxItems = options.maxItems ?? 20;
  }

  /**
   * Render one variable. The result is at most maxLength characters long.
   */
  async render(variable: Variable): Promise<string> {
    const budget: Budget = { remaining: this.maxLength };
    const text = await this.renderNode(variable, this.maxDepth, new Set(), budget);
    return truncate(text, this.maxLength);
  }

  private async renderNode(
    variable: Variable,
    depth: number,
    path: Set<number>,
    budget: Budget
  ): Promise<string> {
    const display = truncate(variable.value, this.maxLength);
    const ref = variable.variablesReference;

    if (ref <= 0 || depth <= 0 || budget.remaining <= 0 || this.isBlockedType(variable.type)) {
      return display;
    }
    if (path.has(ref)) {
      return CYCLE_MARKER;
    }

    let children: Variable[];
    try {
      const response = await this.reader.variables({ variablesReference: ref, count: this.maxItems });
      children = response.variables.filter((child) => !isBlockedProperty(child.name));
    } catch {
      // Keep the display string if expansion fails
      return display;
    }

    const collection = this.isCollection(variable, children);
    const shown = children.slice(0, this.maxItems);
    const parts: string[] = [];

    path.add(ref);
    try {
      for (const child of shown) {
        if (budget.remaining <= 0) break;
        const childText = await this.renderNode(child, depth - 1, path, budget);
        const part = collection ? childText : `${child.name}: ${childText}`;
        budget.remaining -= part.length + 2;
        parts.push(part);
      }
    } finally {
      path.delete(ref);
    }

    const total = this.childCount(variable, children.length);
    if (parts.length < total) {
      parts.push(ELLIPSIS);
    }

    return collection ? `[${parts.join(', ')}]` : `{${parts.join(', ')}}`;
  }

  private isBlockedType(type: string | undefined): boolean {
    if (!type) return false;
    return BLOCKED_TYPE_PATTERNS.some((pattern) => pattern.test(type));
  }

  private isCollection(variable: Variable, children: Variable[]): boolean {
    if (variable.indexedVariables !== undefined && variable.indexedVariables > 0) return true;
    const type = variable.type;
    if (type && COLLECTION_TYPES.some((t) => type.includes(t))) return true;
    return children.length > 0 && children.every((child) => /^\[?\d+\]?$/.test(child.name));
  }

  private childCount(variable: Variable, fetched: number): number {
    const known = (variable.indexedVariables ?? 0) + (variable.namedVariables ?? 0);
    return Math.max(known, fetched);
  }
}
