/**
 * Interactive Debugger
 *
 * The prompt the user lands in whenever the debuggee stops. It keeps the selected
 * frame, runs prompt commands against the adapter, and hosts the `ai` command.
 *
 * Two entry points:
 * - interaction(): a live stop (breakpoint, `breakpoint()` / `debugger` statement, step)
 * - postMortem(): an exception stop; the failure is captured and the session is
 *   reset and rooted at the failing frame
 *
 * Commands typed at the prompt that resume the program end the interaction. The same
 * commands run by the agent wait for the next stop instead, so the rest of a
 * suggested sequence runs where the program stopped.
 */

import type { SessionDriver } from '../dap/client-interface.js';
import type { StackFrame, StoppedEventBody } from '../dap/protocol.js';
import type { AgentController } from '../agent/controller.js';
import { isAffirmative } from '../agent/driver.js';
import { SourceCache, sourceWindow } from '../agent/source-cache.js';
import { summarizeFailure, sourceUnavailable } from '../agent/snapshot.js';
import { truncate } from '../agent/render.js';
import type { Confirm, DebuggerCapability, FailureContext, FrameHandle } from '../agent/types.js';
import type { AgentConsole } from '../output/console.js';
import { errorMessage } from '../output/console.js';
import type { BreakpointManager } from './breakpoints.js';
import { HELP_TEXT, RESUMING_COMMANDS, parseCommand, parseCount } from './commands.js';
import type { ParsedCommand } from './commands.js';
import type { LineReader } from './line-reader.js';
import type { SessionSignal } from './stops.js';

export const PROMPT = '(crashlens) ';

const STACK_LEVELS = 50;

/** How an interaction ended */
export type InteractionResult = 'resumed' | 'quit';

type Outcome = 'stay' | InteractionResult;

export interface StopContext {
  threadId: number;
  reason: string;
  description?: string;
  text?: string;
}

export class SessionResumedError extends Error {
  constructor(command: string, endedReason?: string) {
    super(
      endedReason
        ? `The session has ended (${endedReason}); '${command}' was not executed`
        : `The program is running; '${command}' was not executed`
    );
    this.name = 'SessionResumedError';
  }
}

export interface InteractiveDebuggerOptions {
  /** Run an `ai` analysis as soon as the prompt opens */
  autoAnalyze?: boolean;
  /** Length bound for values printed by `locals` (default: 500) */
  maxValueLength?: number;
  sources?: SourceCache;
  breakpoints?: Pick<BreakpointManager, 'addAndSet'>;
  /** Next stop or end of the session; lets agent-driven steps continue at the new stop */
  nextStop?: () => Promise<SessionSignal>;
}

type AgentCommand = Pick<AgentController, 'ai'>;

export function stopContext(body: StoppedEventBody): StopContext {
  return {
    threadId: body.threadId ?? 1,
    reason: body.reason,
    description: body.description,
    text: body.text,
  };
}

/**
 * Read the failure the thread is stopped on.
 * Prefers the adapter's exceptionInfo; falls back to the stopped event's text.
 */
export async function readFailure(
  client: Pick<SessionDriver, 'exceptionInfo' | 'getCapabilities'>,
  stop: StopContext,
  console: AgentConsole
): Promise<FailureContext> {
  const fallback: FailureContext = {
    type: stop.text || 'Exception',
    message: stop.description && stop.description !== stop.text ? stop.description : '',
  };

  if (!client.getCapabilities().supportsExceptionInfoRequest) {
    return fallback;
  }

  try {
    const info = await client.exceptionInfo({ threadId: stop.threadId });
    return {
      type: info.details?.typeName || info.exceptionId || fallback.type,
      message: info.details?.message ?? info.description ?? fallback.message,
    };
  } catch (error) {
    console.warn(`Could not read exception details: ${errorMessage(error)}`);
    return fallback;
  }
}

/**
 * Confirmation through the prompt's line reader. End of input counts as no.
 */
export function confirmWith(reader: LineReader): Confirm {
  return async (question) => {
    const answer = await reader.question(`⚠️  ${question} [y/N]: `);
    return answer !== null && isAffirmative(answer);
  };
}

export function frameHandle(frame: StackFrame): FrameHandle {
  return {
    frameId: frame.id,
    functionName: frame.name,
    line: frame.line,
    sourcePath: frame.source?.path ?? null,
  };
}

export class InteractiveDebugger implements DebuggerCapability {
  private client: SessionDriver;
  private console: AgentConsole;
  private reader: LineReader;
  private agent: AgentCommand;
  private options: InteractiveDebuggerOptions;
  private sources: SourceCache;

  private stop: StopContext | null = null;
  private frames: StackFrame[] = [];
  private frameIndex = 0;
  private failureContext: FailureContext | null = null;
  private resumed = false;
  private quitting = false;
  private endedReason: string | null = null;
  private lastCommand = '';

  constructor(
    client: SessionDriver,
    console: AgentConsole,
    reader: LineReader,
    agent: AgentCommand,
    options: InteractiveDebuggerOptions = {}
  ) {
    this.client = client;
    this.console = console;
    this.reader = reader;
    this.agent = agent;
    this.options = options;
    this.sources = options.sources ?? new SourceCache();
  }

  currentFrame(): FrameHandle | null {
    if (this.resumed) return null;
    const frame = this.frames[this.frameIndex];
    return frame ? frameHandle(frame) : null;
  }

  failure(): FailureContext | null {
    return this.failureContext;
  }

  /**
   * Forget everything about the previous stop.
   */
  reset(): void {
    this.stop = null;
    this.frames = [];
    this.frameIndex = 0;
    this.failureContext = null;
    this.resumed = false;
    this.quitting = false;
    this.endedReason = null;
    this.lastCommand = '';
  }

  /**
   * Open the prompt at a live stop.
   */
  async interaction(stop: StopContext): Promise<InteractionResult> {
    this.reset();
    return this.begin(stop);
  }

  /**
   * Open the prompt rooted at a failure.
   */
  async postMortem(stop: StopContext, failure: FailureContext): Promise<InteractionResult> {
    this.reset();
    this.failureContext = failure;
    this.console.warn('Crash detected! Spawning AI agent...');
    this.console.print(summarizeFailure(failure));
    return this.begin(stop);
  }

  /**
   * Run one command against the session (the command driver's entry point).
   * Errors are not contained here.
   */
  async execute(command: string): Promise<void> {
    await this.run(parseCommand(command), command, true);
  }

  private async begin(stop: StopContext): Promise<InteractionResult> {
    await this.enter(stop);

    if (this.options.autoAnalyze) {
      const outcome = await this.dispatch('ai');
      if (outcome !== 'stay') return outcome;
    }

    for (;;) {
      const line = await this.reader.question(PROMPT);
      if (line === null) {
        this.quitting = true;
        return 'quit';
      }

      const outcome = await this.dispatch(line);
      if (outcome !== 'stay') return outcome;
    }
  }

  /**
   * Run a prompt line. Command failures are printed and the prompt stays open.
   */
  private async dispatch(line: string): Promise<Outcome> {
    const text = line.trim() === '' ? this.lastCommand : line;
    if (text.trim() === '') return 'stay';
    this.lastCommand = text;

    try {
      await this.run(parseCommand(text), text);
    } catch (error) {
      this.console.print(`*** ${errorMessage(error)}`);
    }
    return this.outcome();
  }

  /**
   * Take over a stop: read its stack and show where the program is.
   */
  private async enter(stop: StopContext): Promise<void> {
    this.stop = stop;
    this.frames = [];
    this.frameIndex = 0;
    try {
      const response = await this.client.stackTrace({ threadId: stop.threadId, levels: STACK_LEVELS });
      this.frames = response.stackFrames;
    } catch (error) {
      this.console.error(`Could not read the stack: ${errorMessage(error)}`);
    }
    this.printLocation();
  }

  /**
   * After a driven command resumed the program, wait until it stops again.
   * An exception stop roots the session at the new failure.
   */
  private async follow(nextStop: () => Promise<SessionSignal>): Promise<void> {
    const signal = await nextStop();
    if (signal.kind === 'ended') {
      this.endedReason = signal.reason;
      this.console.info(`The program finished (${signal.reason})`);
      return;
    }

    const { stop } = signal;
    this.resumed = false;
    this.failureContext = null;
    if (stop.reason === 'exception') {
      this.failureContext = await readFailure(this.client, stop, this.console);
      this.console.print(summarizeFailure(this.failureContext));
    }
    await this.enter(stop);
  }

  private outcome(): Outcome {
    if (this.quitting) return 'quit';
    return this.resumed ? 'resumed' : 'stay';
  }

  private async run(command: ParsedCommand, text: string, driven = false): Promise<void> {
    if (command.name === 'help') {
      this.console.print(HELP_TEXT);
      return;
    }
    if (command.name === 'quit') {
      this.quitting = true;
      return;
    }
    if (this.resumed || this.quitting || !this.stop) {
      throw new SessionResumedError(text, this.endedReason ?? undefined);
    }

    if (RESUMING_COMMANDS.has(command.name)) {
      await this.resume(command, this.stop.threadId);
      if (driven && this.options.nextStop) {
        await this.follow(this.options.nextStop);
      }
      return;
    }

    switch (command.name) {
      case 'ai':
        await this.agent.ai(this, command.arg);
        break;
      case 'print':
      case 'eval':
        await this.evaluate(command.arg);
        break;
      case 'where':
        this.printStack();
        break;
      case 'up':
        this.selectFrame(this.frameIndex + parseCount(command.arg));
        break;
      case 'down':
        this.selectFrame(this.frameIndex - parseCount(command.arg));
        break;
      case 'list':
        await this.printSource();
        break;
      case 'locals':
        await this.printLocals();
        break;
      case 'break':
        await this.addBreakpoint(command.arg);
        break;
    }
  }

  private async resume(command: ParsedCommand, threadId: number): Promise<void> {
    switch (command.name) {
      case 'next':
        await this.client.next({ threadId });
        break;
      case 'step':
        await this.client.stepIn({ threadId });
        break;
      case 'return':
        await this.client.stepOut({ threadId });
        break;
      default:
        await this.client.continue({ threadId });
    }
    this.resumed = true;
  }

  private async evaluate(expression: string): Promise<void> {
    if (expression === '') {
      throw new Error('Nothing to evaluate');
    }
    const frame = this.frames[this.frameIndex];
    try {
      const result = await this.client.evaluate({ expression, frameId: frame?.id, context: 'repl' });
      this.console.print(result.result);
    } catch (error) {
      // Bad expressions are reported, not fatal: the next command still runs
      this.console.print(`*** ${errorMessage(error)}`);
    }
  }

  private selectFrame(index: number): void {
    if (index < 0) {
      this.console.print('*** Newest frame');
      return;
    }
    if (index >= this.frames.length) {
      this.console.print('*** Oldest frame');
      return;
    }
    this.frameIndex = index;
    this.printLocation();
  }

  private printLocation(): void {
    const frame = this.frames[this.frameIndex];
    if (!frame) {
      this.console.print('> <no frame>');
      return;
    }
    this.console.print(`> ${describeFrame(frame)}`);
  }

  private printStack(): void {
    this.frames.forEach((frame, index) => {
      const marker = index === this.frameIndex ? '>' : ' ';
      this.console.print(`${marker} ${describeFrame(frame)}`);
    });
  }

  private async printSource(): Promise<void> {
    const frame = this.currentFrame();
    if (!frame) return;
    if (!frame.sourcePath) {
      this.console.print(sourceUnavailable(null));
      return;
    }
    try {
      const lines = await this.sources.getLines(frame.sourcePath);
      for (const line of sourceWindow(lines, frame.line)) {
        this.console.print(line);
      }
    } catch (error) {
      this.console.print(`*** ${errorMessage(error)}`);
    }
  }

  private async printLocals(): Promise<void> {
    const frame = this.frames[this.frameIndex];
    if (!frame) return;
    const maxLength = this.options.maxValueLength ?? 500;

    const { scopes } = await this.client.scopes({ frameId: frame.id });
    for (const scope of scopes.filter((s) => !s.expensive)) {
      const { variables } = await this.client.variables({ variablesReference: scope.variablesReference });
      this.console.print(`${scope.name}:`);
      for (const variable of variables) {
        this.console.print(`  ${variable.name} = ${truncate(variable.value, maxLength)}`);
      }
    }
  }

  private async addBreakpoint(arg: string): Promise<void> {
    if (!this.options.breakpoints) {
      throw new Error('Breakpoints cannot be added in this session');
    }
    if (arg === '') {
      throw new Error('Usage: break [file:]line[?condition]');
    }

    let spec = arg;
    if (/^\d+(\?.*|#\d+)?$/.test(arg)) {
      const file = this.currentFrame()?.sourcePath;
      if (!file) {
        throw new Error('No current file; use break file:line');
      }
      spec = `${file}:${arg}`;
    }
    await this.options.breakpoints.addAndSet(spec);
  }
}

function describeFrame(frame: StackFrame): string {
  const file = frame.source?.path ?? frame.source?.name ?? '<unknown>';
  return `${frame.name} (${file}:${frame.line})`;
}
