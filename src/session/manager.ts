/**
 * Debug Session Manager
 *
 * Orchestrates the debug session lifecycle:
 * - Spawns the debug adapter and initializes the DAP session
 * - Sets breakpoints and exception filters in the order the adapter expects
 * - Hands every stop to the interactive prompt (live stop or post-mortem)
 * - Disconnects and releases the terminal when the session ends
 */

import type { AdapterConfig } from '../adapters/base.js';
import { DapClient } from '../dap/client.js';
import type { DapClientOptions } from '../dap/client.js';
import type { IDapClient } from '../dap/client-interface.js';
import type { ExitedEventBody, OutputEventBody, StoppedEventBody } from '../dap/protocol.js';
import type { AgentConfig } from '../config.js';
import { AgentController } from '../agent/controller.js';
import { InferenceClient } from '../agent/inference.js';
import { SnapshotBuilder } from '../agent/snapshot.js';
import { SourceCache } from '../agent/source-cache.js';
import { AgentConsole, errorMessage } from '../output/console.js';
import { BreakpointManager } from './breakpoints.js';
import { InteractiveDebugger, confirmWith, readFailure, stopContext } from './interactive.js';
import type { InteractionResult } from './interactive.js';
import { TerminalLineReader } from './line-reader.js';
import type { LineReader } from './line-reader.js';
import { StopQueue } from './stops.js';

const INITIALIZED_WAIT_MS = 30000;

export interface SessionConfig {
  adapter: AdapterConfig;
  agent: AgentConfig;
  program?: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  breakpoints: string[];
  exceptionFilters?: string[];
  /** Stop on crashes (the adapter's crash filters) and open the post-mortem prompt */
  postMortem?: boolean;
  stopOnEntry?: boolean;
  /** Run an analysis as soon as the prompt opens */
  autoAnalyze?: boolean;
  /** Attach to a running process instead of launching */
  attach?: boolean;
  /** Process ID to attach to */
  pid?: number;
  /** DAP request timeout in ms */
  requestTimeout?: number;
}

export interface SessionDependencies {
  console?: AgentConsole;
  reader?: LineReader;
  createClient?: (options: DapClientOptions) => IDapClient;
  fetch?: typeof fetch;
}

type SessionState = 'created' | 'connecting' | 'initializing' | 'configuring' | 'running' | 'stopped' | 'terminated';

export class DebugSession {
  private config: SessionConfig;
  private console: AgentConsole;
  private reader: LineReader | null;
  private createClient: (options: DapClientOptions) => IDapClient;
  private fetchImpl: typeof fetch | undefined;

  private client: IDapClient | null = null;
  private breakpointManager: BreakpointManager | null = null;
  private stops = new StopQueue();
  private state: SessionState = 'created';

  constructor(config: SessionConfig, deps: SessionDependencies = {}) {
    this.config = config;
    this.console = deps.console ?? new AgentConsole();
    this.reader = deps.reader ?? null;
    this.createClient = deps.createClient ?? ((options) => new DapClient(options));
    this.fetchImpl = deps.fetch;
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Run the session until the program ends or the user quits.
   */
  async run(): Promise<void> {
    const reader = this.reader ?? new TerminalLineReader();
    this.reader = reader;

    try {
      const client = await this.start();
      await this.loop(client, reader);
    } finally {
      await this.cleanup();
    }
  }

  private async start(): Promise<IDapClient> {
    const { adapter } = this.config;

    this.state = 'connecting';
    const client = this.createClient({
      command: adapter.command,
      args: adapter.args,
      cwd: this.config.cwd,
      env: { ...adapter.env, ...this.config.env },
      timeout: this.config.requestTimeout,
    });
    this.client = client;
    this.setupEventHandlers(client);
    await client.connect();

    this.state = 'initializing';
    await client.initialize({ adapterID: adapter.id });

    const breakpoints = new BreakpointManager(client, this.console, {
      cwd: this.config.cwd,
      programPath: this.config.program,
    });
    this.breakpointManager = breakpoints;
    for (const spec of this.config.breakpoints) {
      breakpoints.addBreakpoint(spec);
    }

    // Some adapters (like debugpy) require launch before breakpoints can be set
    const requiresLaunchFirst = adapter.requiresLaunchFirst === true;

    if (!requiresLaunchFirst) {
      this.state = 'configuring';
      await breakpoints.setAllBreakpoints();
      await this.setExceptionBreakpoints(client);
    }

    if (this.config.attach) {
      await client.attach(adapter.attachConfig({ pid: this.config.pid }));

      if (requiresLaunchFirst) {
        await this.waitForInitialized(client);
        this.state = 'configuring';
        await breakpoints.setAllBreakpoints();
        await this.setExceptionBreakpoints(client);
      }
      await client.configurationDone();
      this.console.info(`Attached to process ${this.config.pid ?? '<adapter default>'}`);
    } else {
      const program = this.config.program;
      if (!program) {
        throw new Error('No program to launch');
      }
      const launchConfig = adapter.launchConfig({
        program,
        args: this.config.args,
        cwd: this.config.cwd,
        env: this.config.env,
        stopAtEntry: this.config.stopOnEntry,
      });

      if (process.env.DEBUG_DAP) {
        this.console.info(`Launch config: ${JSON.stringify(launchConfig)}`);
      }

      if (requiresLaunchFirst) {
        // Launch starts the debuggee server; breakpoints go in once it reports initialized
        const launched = client.launch(launchConfig);
        await this.waitForInitialized(client);
        this.state = 'configuring';
        await breakpoints.setAllBreakpoints();
        await this.setExceptionBreakpoints(client);
        await client.configurationDone();
        await launched;
      } else {
        await client.launch(launchConfig);
        await client.configurationDone();
      }
      this.console.info(`Launched ${program} under ${adapter.name}`);
    }

    this.state = 'running';
    return client;
  }

  /**
   * Hand each stop to the prompt until the program ends or the user quits.
   */
  private async loop(client: IDapClient, reader: LineReader): Promise<void> {
    const sources = new SourceCache();
    const agent = new AgentController({
      snapshots: new SnapshotBuilder(client, this.console, {
        maxValueLength: this.config.agent.maxValueLength,
        sources,
      }),
      inference: new InferenceClient(this.config.agent, this.console, this.fetchImpl),
      confirm: confirmWith(reader),
      console: this.console,
    });
    const prompt = new InteractiveDebugger(client, this.console, reader, agent, {
      autoAnalyze: this.config.autoAnalyze,
      maxValueLength: this.config.agent.maxValueLength,
      sources,
      breakpoints: this.breakpointManager ?? undefined,
      nextStop: () => this.stops.next(),
    });

    for (;;) {
      const signal = await this.stops.next();
      if (signal.kind === 'ended') {
        this.console.info(`Session ended (${signal.reason})`);
        return;
      }

      this.state = 'stopped';
      const { stop } = signal;
      let result: InteractionResult;
      if (stop.reason === 'exception') {
        const failure = await readFailure(client, stop, this.console);
        result = await prompt.postMortem(stop, failure);
      } else {
        result = await prompt.interaction(stop);
      }

      if (result === 'quit') {
        this.console.info('Quitting');
        return;
      }
      this.state = 'running';
    }
  }

  /**
   * Wait for the 'initialized' event from the debug adapter
   */
  private waitForInitialized(client: IDapClient): Promise<void> {
    return new Promise((resolve) => {
      const onInitialized = (): void => {
        clearTimeout(timeout);
        resolve();
      };
      // Continue anyway after the wait: some adapters never send this event
      const timeout = setTimeout(() => {
        client.removeListener('initialized', onInitialized);
        resolve();
      }, INITIALIZED_WAIT_MS);
      client.once('initialized', onInitialized);
    });
  }

  private async setExceptionBreakpoints(client: IDapClient): Promise<void> {
    const filters = new Set(this.config.exceptionFilters ?? []);
    if (this.config.postMortem) {
      for (const filter of this.config.adapter.crashFilters) {
        filters.add(filter);
      }
    }
    if (filters.size === 0) return;

    await client.setExceptionBreakpoints({ filters: [...filters] });
    this.console.info(`Breaking on exceptions: ${[...filters].join(', ')}`);
  }

  private setupEventHandlers(client: IDapClient): void {
    client.on('stopped', (body: StoppedEventBody) => {
      this.stops.push({ kind: 'stopped', stop: stopContext(body) });
    });

    client.on('exited', (body: ExitedEventBody) => {
      this.console.info(`Program exited with code ${body.exitCode}`);
    });

    client.on('terminated', () => {
      this.stops.push({ kind: 'ended', reason: 'program terminated' });
    });

    client.on('exit', () => {
      this.stops.push({ kind: 'ended', reason: 'debug adapter exited' });
    });

    client.on('output', (body: OutputEventBody) => {
      const category = body.category ?? 'console';
      if (category === 'stdout' || category === 'stderr' || category === 'console') {
        this.console.write(body.output);
      }
    });

    client.on('stderr', (data: string) => {
      if (process.env.DEBUG_DAP) {
        this.console.warn(`Adapter stderr: ${data.trimEnd()}`);
      }
    });

    client.on('error', (error: Error) => {
      this.console.error(`Debug adapter error: ${error.message}`);
    });
  }

  private async cleanup(): Promise<void> {
    this.state = 'terminated';
    this.reader?.close();

    // In attach mode, don't terminate the debuggee - leave the process running
    if (this.client?.isConnected()) {
      try {
        await this.client.disconnect(!this.config.attach);
      } catch (error) {
        this.console.warn(`Disconnect failed: ${errorMessage(error)}`);
      }
    }
  }
}
