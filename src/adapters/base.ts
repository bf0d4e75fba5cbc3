/**
 * Debug adapter descriptions.
 *
 * An adapter is a program that speaks DAP on its stdin/stdout. The description says
 * how to start it, how to ask it to launch or attach, and which exception filters
 * mean "stop when the program crashes".
 */

import type { AttachRequestArguments, LaunchRequestArguments } from "../dap/protocol.js";

export interface LaunchOptions {
  program: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  stopAtEntry?: boolean;
}

export interface AttachOptions {
  pid?: number;
  host?: string;
  port?: number;
}

export interface AdapterConfig {
  /** adapterID sent with initialize */
  id: string;
  name: string;
  command: string;
  args?: string[];
  env?: Record<string, string>;

  /**
   * The adapter only reports 'initialized' once the debuggee is launched, so
   * breakpoints go in after launch instead of before it.
   */
  requiresLaunchFirst?: boolean;

  /** Where the adapter was found, or null when it is not installed */
  detect: () => Promise<string | null>;
  installHint: string;

  launchConfig: (options: LaunchOptions) => LaunchRequestArguments;
  attachConfig: (options: AttachOptions) => AttachRequestArguments;

  /** Every exception filter the adapter accepts */
  exceptionFilters: string[];
  /** The subset that stops on an unhandled failure, used by --post-mortem */
  crashFilters: string[];
}
