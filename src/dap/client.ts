/**
 * DAP Client
 *
 * Spawns a stdio debug adapter and exposes the requests the session makes.
 * Adapter events are re-emitted by name ('stopped', 'terminated', 'exited', 'output',
 * 'initialized'); 'exit' and 'error' report the adapter process itself.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { DapTransport } from './transport.js';
import type { IDapClient } from './client-interface.js';
import type {
  AttachRequestArguments,
  Capabilities,
  ContinueArguments,
  ContinueResponse,
  EvaluateArguments,
  EvaluateResponse,
  Event,
  ExceptionInfoArguments,
  ExceptionInfoResponse,
  InitializeRequestArguments,
  InitializeResponse,
  LaunchRequestArguments,
  NextArguments,
  ScopesArguments,
  ScopesResponse,
  SetBreakpointsArguments,
  SetBreakpointsResponse,
  SetExceptionBreakpointsArguments,
  StackTraceArguments,
  StackTraceResponse,
  StepInArguments,
  StepOutArguments,
  VariablesArguments,
  VariablesResponse,
} from './protocol.js';

export interface DapClientOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Per-request timeout in ms (default: 30000) */
  timeout?: number;
}

/** Adapter events the session listens for */
const FORWARDED_EVENTS = new Set(['stopped', 'terminated', 'exited', 'output', 'initialized']);

const INITIALIZED_WAIT_MS = 10000;

export class DapClient extends EventEmitter implements IDapClient {
  private options: DapClientOptions;
  private child: ChildProcess | null = null;
  private transport: DapTransport | null = null;
  private capabilities: Capabilities = {};
  private ready = false;

  constructor(options: DapClientOptions) {
    super();
    this.options = options;
  }

  async connect(): Promise<void> {
    if (this.transport) {
      throw new Error('Already connected');
    }

    const child = spawn(this.options.command, this.options.args ?? [], {
      cwd: this.options.cwd,
      env: { ...process.env, ...this.options.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    if (!child.stdout || !child.stdin) {
      throw new Error(`Could not open the stdio pipes of ${this.options.command}`);
    }
    this.child = child;

    const transport = new DapTransport(
      { input: child.stdout, output: child.stdin, errors: child.stderr },
      this.options.timeout
    );
    this.transport = transport;

    transport.on('event', (event: Event) => {
      if (FORWARDED_EVENTS.has(event.event)) {
        this.emit(event.event, event.body);
      }
    });
    transport.on('stderr', (text: string) => this.emit('stderr', text));
    transport.on('malformed', (raw: string) => this.emit('stderr', `unreadable adapter message: ${raw}\n`));

    child.on('exit', (code, signal) => {
      transport.close(new Error(`Debug adapter exited (code ${code}, signal ${signal})`));
      this.emit('exit', code, signal);
    });
    child.on('error', (error) => {
      transport.close(error);
      this.emit('error', error);
    });
  }

  /**
   * Send initialize and give the adapter a moment to announce 'initialized'.
   * Adapters that only announce it after launch are not waited on past the limit.
   */
  async initialize(args: Partial<InitializeRequestArguments> = {}): Promise<Capabilities> {
    const transport = this.requireTransport();
    const announced = new Promise<void>((resolve) => this.once('initialized', () => resolve()));

    const body = await transport.request<InitializeResponse | Capabilities | undefined>('initialize', {
      clientID: 'crashlens',
      clientName: 'crashlens',
      adapterID: args.adapterID ?? 'unknown',
      pathFormat: 'path',
      linesStartAt1: true,
      columnsStartAt1: true,
      supportsVariableType: true,
      supportsVariablePaging: true,
      supportsRunInTerminalRequest: false,
      ...args,
    });
    // Some adapters wrap the capabilities, most send them as the body itself
    this.capabilities = body && 'capabilities' in body ? body.capabilities : body ?? {};

    let timer: NodeJS.Timeout | undefined;
    await Promise.race([
      announced,
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, INITIALIZED_WAIT_MS);
      }),
    ]);
    clearTimeout(timer);

    this.ready = true;
    return this.capabilities;
  }

  async launch(args: LaunchRequestArguments): Promise<void> {
    await this.call('launch', args);
  }

  async attach(args: AttachRequestArguments): Promise<void> {
    await this.call('attach', args);
  }

  async configurationDone(): Promise<void> {
    await this.call('configurationDone');
  }

  setBreakpoints(args: SetBreakpointsArguments): Promise<SetBreakpointsResponse> {
    return this.call('setBreakpoints', args);
  }

  async setExceptionBreakpoints(args: SetExceptionBreakpointsArguments): Promise<void> {
    await this.call('setExceptionBreakpoints', args);
  }

  stackTrace(args: StackTraceArguments): Promise<StackTraceResponse> {
    return this.call('stackTrace', args);
  }

  scopes(args: ScopesArguments): Promise<ScopesResponse> {
    return this.call('scopes', args);
  }

  variables(args: VariablesArguments): Promise<VariablesResponse> {
    return this.call('variables', args);
  }

  evaluate(args: EvaluateArguments): Promise<EvaluateResponse> {
    return this.call('evaluate', args);
  }

  /** Only answers while the thread is stopped with reason 'exception' */
  exceptionInfo(args: ExceptionInfoArguments): Promise<ExceptionInfoResponse> {
    return this.call('exceptionInfo', args);
  }

  async continue(args: ContinueArguments): Promise<ContinueResponse> {
    return (await this.call<ContinueResponse | undefined>('continue', args)) ?? {};
  }

  async next(args: NextArguments): Promise<void> {
    await this.call('next', args);
  }

  async stepIn(args: StepInArguments): Promise<void> {
    await this.call('stepIn', args);
  }

  async stepOut(args: StepOutArguments): Promise<void> {
    await this.call('stepOut', args);
  }

  /**
   * End the session and stop the adapter.
   * @param terminateDebuggee false leaves an attached process running
   */
  async disconnect(terminateDebuggee = true): Promise<void> {
    const transport = this.transport;
    if (!transport?.isOpen()) return;

    try {
      await transport.request('disconnect', { restart: false, terminateDebuggee });
    } catch (error) {
      // Adapters often exit before answering disconnect
      this.emit('stderr', `disconnect: ${error instanceof Error ? error.message : String(error)}\n`);
    } finally {
      transport.close();
      this.child?.kill();
    }
  }

  getCapabilities(): Capabilities {
    return this.capabilities;
  }

  isConnected(): boolean {
    return this.transport?.isOpen() ?? false;
  }

  private call<T = unknown>(command: string, args?: unknown): Promise<T> {
    const transport = this.requireTransport();
    if (!this.ready) {
      return Promise.reject(new Error(`Cannot send '${command}' before initialize`));
    }
    return transport.request<T>(command, args);
  }

  private requireTransport(): DapTransport {
    if (!this.transport) {
      throw new Error('Not connected. Call connect() first.');
    }
    return this.transport;
  }
}
