/**
 * Agent Types
 *
 * Value objects passed between snapshot capture, inference and the command driver,
 * and the capability surface the agent needs from a debugging session.
 */

/** Exception summary used when the session is not stopped on a failure */
export const NO_EXCEPTION = 'Breakpoint (No Exception)';

/** Location of one active function invocation */
export interface FrameHandle {
  /** DAP frame id, valid while the thread stays stopped */
  frameId: number;
  functionName: string;
  /** 1-based line in sourcePath */
  line: number;
  sourcePath: string | null;
}

/** The failure the debuggee is stopped on */
export interface FailureContext {
  type: string;
  message: string;
}

/** Bounded textual capture of a frame's diagnostic state */
export interface Snapshot {
  readonly functionName: string;
  readonly lineNumber: number;
  readonly sourcePath: string | null;
  readonly sourceWindow: readonly string[];
  /** Binding name to rendered value, in frame binding order */
  readonly variables: Readonly<Record<string, string>>;
  readonly exceptionSummary: string;
}

/** Result of one inference round-trip */
export interface Diagnosis {
  readonly diagnosis: string;
  readonly suggestedFix: string;
  /** Debugger commands to run, in order */
  readonly commands: readonly string[];
}

/**
 * What the agent needs from a live debugging session.
 * Any interactive runtime offering these operations can host the `ai` command.
 */
export interface DebuggerCapability {
  /** Frame currently selected at the prompt, or null when not stopped */
  currentFrame(): FrameHandle | null;
  /** Failure the session is rooted at, or null for a live breakpoint */
  failure(): FailureContext | null;
  /** Run one command against the session. Failures propagate. */
  execute(command: string): Promise<void>;
}

/** Human confirmation: resolves true only on an explicit yes */
export type Confirm = (question: string) => Promise<boolean>;

/** Runs a single command against the session */
export type Execute = (command: string) => Promise<void>;
