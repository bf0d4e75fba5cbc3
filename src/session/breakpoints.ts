/**
 * Breakpoints
 *
 * `file:line[?condition][#hits]` specs from the command line and the prompt's `b`
 * command, grouped per source file. DAP replaces every breakpoint of a source on each
 * setBreakpoints request, so a file is always sent whole.
 */

import * as path from 'node:path';
import type { IDapClient } from '../dap/client-interface.js';
import type { Breakpoint, SourceBreakpoint } from '../dap/protocol.js';
import type { AgentConsole } from '../output/console.js';
import { errorMessage } from '../output/console.js';

export interface BreakpointSpec {
  file: string;
  line: number;
  condition?: string;
  hitCondition?: string;
}

export interface TrackedBreakpoint extends BreakpointSpec {
  id?: number;
  verified: boolean;
  message?: string;
}

export interface PathResolutionOptions {
  /** Base for relative paths */
  cwd?: string;
  /** Its directory is the base when no cwd is given */
  programPath?: string;
}

const SPEC_PATTERN = /^(?<file>.+):(?<line>\d+)(?:\?(?<condition>.+)|#(?<hits>\d+))?$/;

function resolveFile(file: string, { cwd, programPath }: PathResolutionOptions): string {
  if (path.isAbsolute(file)) return file;
  const base = cwd ?? (programPath ? path.dirname(programPath) : undefined);
  return base ? path.resolve(base, file) : path.resolve(file);
}

/**
 * Parse `file:line`, `file:line?condition` or `file:line#hits`.
 * Relative files resolve against cwd, then the program's directory, then process.cwd().
 */
export function parseBreakpointSpec(spec: string, pathOptions: PathResolutionOptions = {}): BreakpointSpec {
  const groups = SPEC_PATTERN.exec(spec)?.groups;
  if (!groups) {
    throw new Error(`Invalid breakpoint format: "${spec}". Expected "file:line" or "file:line?condition"`);
  }

  const line = Number(groups.line);
  if (line < 1) {
    throw new Error(`Invalid line number: ${groups.line}`);
  }

  return {
    file: resolveFile(groups.file, pathOptions),
    line,
    condition: groups.condition || undefined,
    hitCondition: groups.hits || undefined,
  };
}

export class BreakpointManager {
  private client: Pick<IDapClient, 'setBreakpoints'>;
  private console: AgentConsole;
  private pathOptions: PathResolutionOptions;
  private byFile = new Map<string, TrackedBreakpoint[]>();
  private nextId = 1;

  constructor(client: Pick<IDapClient, 'setBreakpoints'>, console: AgentConsole, pathOptions: PathResolutionOptions = {}) {
    this.client = client;
    this.console = console;
    this.pathOptions = pathOptions;
  }

  /** Record a breakpoint; nothing is sent until setAllBreakpoints or addAndSet */
  addBreakpoint(spec: string): BreakpointSpec {
    const parsed = parseBreakpointSpec(spec, this.pathOptions);
    const group = this.byFile.get(parsed.file);
    const tracked: TrackedBreakpoint = { ...parsed, verified: false };
    if (group) {
      group.push(tracked);
    } else {
      this.byFile.set(parsed.file, [tracked]);
    }
    return parsed;
  }

  /** Record a breakpoint during the session and resend its file */
  async addAndSet(spec: string): Promise<TrackedBreakpoint[]> {
    const { file } = this.addBreakpoint(spec);
    const group = this.byFile.get(file) ?? [];
    await this.send(file, group);
    return group;
  }

  async setAllBreakpoints(): Promise<void> {
    for (const [file, group] of this.byFile) {
      await this.send(file, group);
    }
  }

  getAllBreakpoints(): TrackedBreakpoint[] {
    return [...this.byFile.values()].flat();
  }

  private async send(file: string, group: TrackedBreakpoint[]): Promise<void> {
    const breakpoints: SourceBreakpoint[] = group.map(({ line, condition, hitCondition }) => ({
      line,
      condition,
      hitCondition,
    }));

    let answered: Breakpoint[];
    try {
      ({ breakpoints: answered } = await this.client.setBreakpoints({ source: { path: file }, breakpoints }));
    } catch (error) {
      const message = errorMessage(error);
      for (const bp of group) {
        Object.assign(bp, { id: bp.id ?? this.nextId++, verified: false, message });
        this.report(bp);
      }
      return;
    }

    group.forEach((bp, index) => {
      const result = answered[index];
      if (!result) return;
      bp.id = result.id ?? bp.id ?? this.nextId++;
      bp.verified = result.verified;
      bp.message = result.message;
      bp.line = result.line ?? bp.line;
      this.report(bp);
    });
  }

  private report(bp: TrackedBreakpoint): void {
    const where = `${bp.file}:${bp.line}${bp.condition ? ` if ${bp.condition}` : ''}`;
    if (bp.verified) {
      this.console.info(`Breakpoint ${bp.id} at ${where}`);
      return;
    }
    this.console.warn(`Breakpoint ${bp.id} at ${where} not verified${bp.message ? `: ${bp.message}` : ''}`);
  }
}
