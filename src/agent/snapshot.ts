/**
 * Snapshot Capture
 *
 * Builds the bounded diagnostic record sent to the model: frame location, a source
 * window, rendered locals and the active failure. Capture never rejects; a field that
 * cannot be resolved degrades to a placeholder and a warning is printed.
 */

import type { FrameStateReader } from '../dap/client-interface.js';
import type { Scope, Variable } from '../dap/protocol.js';
import type { AgentConsole } from '../output/console.js';
import { errorMessage } from '../output/console.js';
import { BoundedRenderer, isBlockedProperty, truncate } from './render.js';
import { SourceCache, sourceWindow } from './source-cache.js';
import { NO_EXCEPTION } from './types.js';
import type { FailureContext, FrameHandle, Snapshot } from './types.js';

export interface SnapshotBuilderOptions {
  /** Upper bound for every string in the snapshot */
  maxValueLength: number;
  /** Container nesting to expand when rendering values (default: 2) */
  maxDepth?: number;
  /** Children rendered per container (default: 20) */
  maxItems?: number;
  /** Shared source cache (default: a private one) */
  sources?: SourceCache;
}

const LOCAL_SCOPE_NAMES = /^(locals?|arguments)$/i;

/**
 * One-line summary of a failure, "Type: message".
 */
export function summarizeFailure(failure: FailureContext | null | undefined): string {
  if (!failure) return NO_EXCEPTION;
  const message = failure.message.trim();
  return message ? `${failure.type}: ${message}` : failure.type;
}

export function sourceUnavailable(file: string | null): string {
  return `<Source not available for ${file ?? '<unknown>'}>`;
}

export class SnapshotBuilder {
  private reader: FrameStateReader;
  private console: AgentConsole;
  private renderer: BoundedRenderer;
  private sources: SourceCache;
  private maxValueLength: number;

  constructor(reader: FrameStateReader, console: AgentConsole, options: SnapshotBuilderOptions) {
    this.reader = reader;
    this.console = console;
    this.maxValueLength = options.maxValueLength;
    this.sources = options.sources ?? new SourceCache();
    this.renderer = new BoundedRenderer(reader, {
      maxLength: options.maxValueLength,
      maxDepth: options.maxDepth,
      maxItems: options.maxItems,
    });
  }

  async capture(frame: FrameHandle, failure?: FailureContext | null): Promise<Snapshot> {
    const variables = await this.captureVariables(frame);
    const window = await this.captureSource(frame);

    return Object.freeze({
      functionName: truncate(frame.functionName || '<unknown>', this.maxValueLength),
      lineNumber: Math.max(1, frame.line),
      sourcePath: frame.sourcePath === null ? null : truncate(frame.sourcePath, this.maxValueLength),
      sourceWindow: Object.freeze(window),
      variables: Object.freeze(variables),
      exceptionSummary: truncate(summarizeFailure(failure), this.maxValueLength),
    });
  }

  /**
   * Render every binding in the frame's local scopes, first occurrence winning.
   */
  private async captureVariables(frame: FrameHandle): Promise<Record<string, string>> {
    const result: Record<string, string> = {};

    let bindings: Variable[];
    try {
      bindings = await this.localBindings(frame.frameId);
    } catch (error) {
      this.console.warn(`Could not read locals: ${errorMessage(error)}`);
      return result;
    }

    for (const binding of bindings) {
      const key = truncate(binding.name, this.maxValueLength);
      if (isBlockedProperty(binding.name) || Object.hasOwn(result, key)) continue;
      try {
        result[key] = await this.renderer.render(binding);
      } catch (error) {
        this.console.warn(`Could not render '${key}': ${errorMessage(error)}`);
        result[key] = truncate(binding.value, this.maxValueLength);
      }
    }

    return result;
  }

  private async localBindings(frameId: number): Promise<Variable[]> {
    const { scopes } = await this.reader.scopes({ frameId });
    const selected = pickLocalScopes(scopes);
    const bindings: Variable[] = [];

    for (const scope of selected) {
      const response = await this.reader.variables({ variablesReference: scope.variablesReference });
      bindings.push(...response.variables);
    }

    return bindings;
  }

  private async captureSource(frame: FrameHandle): Promise<string[]> {
    const placeholder = [truncate(sourceUnavailable(frame.sourcePath), this.maxValueLength)];
    if (!frame.sourcePath) {
      this.console.warn(`No source path for frame '${frame.functionName || '<unknown>'}'`);
      return placeholder;
    }

    try {
      const lines = await this.sources.getLines(frame.sourcePath);
      const window = sourceWindow(lines, Math.max(1, frame.line));
      if (window.length === 0) {
        this.console.warn(`Line ${frame.line} is outside ${frame.sourcePath}`);
        return placeholder;
      }
      return window.map((line) => truncate(line, this.maxValueLength));
    } catch (error) {
      this.console.warn(`Could not read source: ${errorMessage(error)}`);
      return placeholder;
    }
  }
}

/**
 * Scopes holding the frame's own bindings.
 * Falls back to the first cheap scope when an adapter names them differently.
 */
export function pickLocalScopes(scopes: readonly Scope[]): Scope[] {
  const locals = scopes.filter(
    (scope) =>
      scope.presentationHint === 'locals' ||
      scope.presentationHint === 'arguments' ||
      LOCAL_SCOPE_NAMES.test(scope.name)
  );
  if (locals.length > 0) return locals;

  const first = scopes.find((scope) => !scope.expensive);
  return first ? [first] : [];
}
