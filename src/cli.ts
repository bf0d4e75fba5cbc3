/**
 * CLI Interface
 *
 * Argument parsing and command handling using Commander.
 */

import { Command, Option } from "commander";
import { getAdapter, getAdapterNames } from "./adapters/index.js";
import { ConfigError, loadConfig, parseTimeout } from "./config.js";
import type { AgentConfig } from "./config.js";
import { DebugSession } from "./session/manager.js";

export { parseTimeout };

export interface CliOptions {
  adapter?: string;
  args?: string[];
  cwd?: string;
  breakpoint: string[];
  breakOnException?: string[];
  postMortem?: boolean;
  stopOnEntry?: boolean;
  autoAnalyze?: boolean;
  url?: string;
  model?: string;
  contextSize?: string;
  maxValueLength?: string;
  requestTimeout?: string;
  dapTimeout: string;
  env?: string[];
  attach?: boolean;
  pid?: number;
}

/**
 * Parse KEY=VALUE pairs. Items without "=" or with an empty key are ignored.
 */
export function parseEnvPairs(items: string[] = []): Record<string, string> {
  const env: Record<string, string> = {};
  for (const item of items) {
    const [key, ...valueParts] = item.split("=");
    if (key && valueParts.length > 0) {
      env[key] = valueParts.join("=");
    }
  }
  return env;
}

export function createCli(): Command {
  const program = new Command();

  program
    .name("crashlens")
    .description("Interactive debugger with a model-backed crash analyst and command driver")
    .version("0.1.0");

  program
    .argument("[program]", "Program to debug")
    .option("-a, --adapter <name>", `Debug adapter to use (${getAdapterNames().join(", ")})`)
    .option("--args <args...>", "Arguments to pass to the program")
    .option("--cwd <path>", "Working directory for the program")
    .option(
      "-b, --breakpoint <spec...>",
      'Breakpoint specifications (e.g., "app.py:45" or "app.py:45?x > 3")',
      []
    )
    .option("--break-on-exception <filter...>", 'Extra exception filters (e.g., "raised", "uncaught")')
    .option("--post-mortem", "Open the post-mortem prompt when the program crashes", false)
    .option("--stop-on-entry", "Stop at the program's first line", false)
    .option("--auto-analyze", "Run an analysis as soon as the prompt opens", false)
    .option("--url <url>", "Inference endpoint (env: CRASHLENS_URL)")
    .option("--model <name>", "Model identifier (env: CRASHLENS_MODEL)")
    .option("--context-size <tokens>", "Context window for the model (env: CRASHLENS_CONTEXT_SIZE)")
    .option("--max-value-length <chars>", "Bound for each value sent to the model (env: CRASHLENS_MAX_VALUE_LENGTH)")
    .option("--request-timeout <duration>", "Inference timeout, e.g. 480s or 8m (env: CRASHLENS_TIMEOUT)")
    .option("--dap-timeout <duration>", "Timeout for each debug adapter request", "30s")
    .addOption(new Option("--env <key=value...>", "Environment variables for the program"))
    .option("--attach", "Attach to a running process instead of launching", false)
    .option("--pid <processId>", "Process ID to attach to (requires --attach)", (val: string) => parseInt(val, 10))
    .action(async (programPath: string | undefined, options: CliOptions) => {
      if (options.attach) {
        if (!options.pid) {
          console.error("Error: --pid is required when using --attach");
          console.error("Usage: crashlens --attach --pid <processId> -a <adapter>");
          process.exit(1);
        }
      } else if (!programPath) {
        console.error("Error: <program> argument is required (or use --attach --pid)");
        console.error("Usage: crashlens <program> -a <adapter> [-b <breakpoint>] [--post-mortem]");
        process.exit(1);
      }

      if (!options.adapter) {
        console.error("Error: --adapter is required");
        console.error(`Available adapters: ${getAdapterNames().join(", ")}`);
        process.exit(1);
      }
      await runDebugSession(programPath, { ...options, adapter: options.adapter });
    });

  program
    .command("list-adapters")
    .description("List available debug adapters and their installation status")
    .action(async () => {
      await listAdapters();
    });

  return program;
}

async function runDebugSession(programPath: string | undefined, options: CliOptions & { adapter: string }): Promise<void> {
  const adapter = getAdapter(options.adapter);
  if (!adapter) {
    console.error(`Unknown adapter: ${options.adapter}`);
    console.error(`Available adapters: ${getAdapterNames().join(", ")}`);
    process.exit(1);
  }

  const adapterPath = await adapter.detect();
  if (!adapterPath) {
    console.error(`Adapter "${adapter.name}" is not installed.`);
    console.error(adapter.installHint);
    process.exit(1);
  }

  const exceptionFilters = options.breakOnException ?? [];
  for (const filter of exceptionFilters) {
    if (!adapter.exceptionFilters.includes(filter)) {
      console.error(`Error: Adapter "${adapter.name}" does not support exception filter "${filter}"`);
      console.error(`Supported filters: ${adapter.exceptionFilters.join(", ")}`);
      process.exit(1);
    }
  }

  let agent: AgentConfig;
  let dapTimeout: number;
  try {
    agent = loadConfig(process.env, {
      url: options.url,
      model: options.model,
      contextSize: options.contextSize,
      maxValueLength: options.maxValueLength,
      requestTimeoutMs: options.requestTimeout,
    });
    dapTimeout = parseTimeout(options.dapTimeout);
  } catch (error) {
    const label = error instanceof ConfigError ? "Configuration error" : "Error";
    console.error(`${label}: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const env = parseEnvPairs(options.env);

  const session = new DebugSession({
    adapter,
    agent,
    program: programPath,
    args: options.args,
    cwd: options.cwd,
    env: Object.keys(env).length > 0 ? env : undefined,
    breakpoints: options.breakpoint,
    exceptionFilters,
    postMortem: options.postMortem,
    stopOnEntry: options.stopOnEntry,
    autoAnalyze: options.autoAnalyze,
    attach: options.attach,
    pid: options.pid,
    requestTimeout: dapTimeout,
  });

  try {
    await session.run();
  } catch (error) {
    console.error(`Session failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

async function listAdapters(): Promise<void> {
  console.log("Available debug adapters:\n");

  for (const name of getAdapterNames()) {
    const adapter = getAdapter(name);
    if (!adapter) continue;

    const path = await adapter.detect();
    const status = path ? `✓ installed (${path})` : "✗ not installed";

    console.log(`  ${adapter.name}`);
    console.log(`    ID: ${adapter.id}`);
    console.log(`    Status: ${status}`);
    console.log(`    Crash filters: ${adapter.crashFilters.join(", ")}`);
    console.log();
  }
}
