/**
 * Shared test doubles: a captured console, an in-memory debug adapter session
 * and a scripted line reader.
 */

import { Writable } from 'node:stream';
import { vi } from 'vitest';
import { AgentConsole } from '../src/output/console.js';
import type { SessionDriver } from '../src/dap/client-interface.js';
import type {
  Capabilities,
  EvaluateArguments,
  EvaluateResponse,
  ExceptionInfoResponse,
  Scope,
  ScopesArguments,
  ScopesResponse,
  StackFrame,
  StackTraceResponse,
  Variable,
  VariablesArguments,
  VariablesResponse,
} from '../src/dap/protocol.js';
import type { LineReader } from '../src/session/line-reader.js';

export function captureConsole(): { console: AgentConsole; output: () => string; lines: () => string[] } {
  let text = '';
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += String(chunk);
      callback();
    },
  });
  return {
    console: new AgentConsole({ stream }),
    output: () => text,
    lines: () => text.split('\n').filter((line) => line !== ''),
  };
}

export function variable(name: string, value: string, extra: Partial<Variable> = {}): Variable {
  return { name, value, variablesReference: 0, ...extra };
}

export function localsScope(variablesReference: number): Scope {
  return { name: 'Locals', presentationHint: 'locals', variablesReference, expensive: false };
}

/**
 * In-memory adapter session. Variables are keyed by reference; every call is a spy.
 */
export class FakeDebugSession implements SessionDriver {
  frames: StackFrame[] = [];
  scopesByFrame = new Map<number, Scope[]>();
  children = new Map<number, Variable[]>();
  values = new Map<string, string>();
  capabilities: Capabilities = {};
  exception: ExceptionInfoResponse | null = null;

  stackTrace = vi.fn(
    async (): Promise<StackTraceResponse> => ({ stackFrames: this.frames })
  );

  scopes = vi.fn(async (args: ScopesArguments): Promise<ScopesResponse> => ({
    scopes: this.scopesByFrame.get(args.frameId) ?? [],
  }));

  variables = vi.fn(async (args: VariablesArguments): Promise<VariablesResponse> => {
    const all = this.children.get(args.variablesReference);
    if (!all) {
      throw new Error(`Unknown variablesReference ${args.variablesReference}`);
    }
    const start = args.start ?? 0;
    const end = args.count !== undefined ? start + args.count : undefined;
    return { variables: all.slice(start, end) };
  });

  evaluate = vi.fn(async (args: EvaluateArguments): Promise<EvaluateResponse> => {
    const result = this.values.get(args.expression);
    if (result === undefined) {
      throw new Error(`name '${args.expression}' is not defined`);
    }
    return { result, variablesReference: 0 };
  });

  exceptionInfo = vi.fn(async (): Promise<ExceptionInfoResponse> => {
    if (!this.exception) {
      throw new Error('No exception');
    }
    return this.exception;
  });

  continue = vi.fn(async () => ({ allThreadsContinued: true }));
  next = vi.fn(async () => undefined);
  stepIn = vi.fn(async () => undefined);
  stepOut = vi.fn(async () => undefined);

  getCapabilities = vi.fn((): Capabilities => this.capabilities);
}

/**
 * Answers questions from a script; null once the script runs out.
 */
export class ScriptedLineReader implements LineReader {
  prompts: string[] = [];
  closed = false;
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async question(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}
