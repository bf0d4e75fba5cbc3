/**
 * DAP Protocol Types
 *
 * Only what crashlens sends or reads. Field names follow the Debug Adapter Protocol;
 * everything an adapter may add beyond these is ignored.
 */

// Envelopes

export interface ProtocolMessage {
  seq: number;
  type: 'request' | 'response' | 'event';
}

export interface Request extends ProtocolMessage {
  type: 'request';
  command: string;
  arguments?: unknown;
}

export interface Response extends ProtocolMessage {
  type: 'response';
  request_seq: number;
  command: string;
  success: boolean;
  message?: string;
  body?: unknown;
}

export interface Event extends ProtocolMessage {
  type: 'event';
  event: string;
  body?: unknown;
}

/** Adapter feature flags; only the ones the session branches on */
export interface Capabilities {
  supportsConfigurationDoneRequest?: boolean;
  supportsConditionalBreakpoints?: boolean;
  supportsHitConditionalBreakpoints?: boolean;
  supportsExceptionInfoRequest?: boolean;
}

// Model

export interface Source {
  name?: string;
  path?: string;
}

export interface StackFrame {
  id: number;
  name: string;
  line: number;
  column: number;
  source?: Source;
}

export interface Scope {
  name: string;
  variablesReference: number;
  expensive: boolean;
  presentationHint?: string;
}

export interface Variable {
  name: string;
  value: string;
  variablesReference: number;
  type?: string;
  namedVariables?: number;
  indexedVariables?: number;
}

export interface SourceBreakpoint {
  line: number;
  condition?: string;
  hitCondition?: string;
}

export interface Breakpoint {
  verified: boolean;
  id?: number;
  line?: number;
  message?: string;
}

// Requests

export interface InitializeRequestArguments {
  adapterID: string;
  clientID?: string;
  clientName?: string;
  pathFormat?: 'path' | 'uri';
  linesStartAt1?: boolean;
  columnsStartAt1?: boolean;
  supportsVariableType?: boolean;
  supportsVariablePaging?: boolean;
  supportsRunInTerminalRequest?: boolean;
}

/** Launch and attach bodies are adapter specific */
export type LaunchRequestArguments = Record<string, unknown>;
export type AttachRequestArguments = Record<string, unknown>;

export interface SetBreakpointsArguments {
  source: Source;
  breakpoints?: SourceBreakpoint[];
}

export interface SetExceptionBreakpointsArguments {
  filters: string[];
}

export interface StackTraceArguments {
  threadId: number;
  levels?: number;
}

export interface ScopesArguments {
  frameId: number;
}

export interface VariablesArguments {
  variablesReference: number;
  start?: number;
  count?: number;
}

export interface EvaluateArguments {
  expression: string;
  frameId?: number;
  context?: 'repl' | 'watch' | 'hover';
}

/** Execution-control and exception requests all address one thread */
export interface ThreadArguments {
  threadId: number;
}

export type ExceptionInfoArguments = ThreadArguments;
export type ContinueArguments = ThreadArguments;
export type NextArguments = ThreadArguments;
export type StepInArguments = ThreadArguments;
export type StepOutArguments = ThreadArguments;

// Response bodies

export interface InitializeResponse {
  capabilities: Capabilities;
}

export interface SetBreakpointsResponse {
  breakpoints: Breakpoint[];
}

export interface StackTraceResponse {
  stackFrames: StackFrame[];
}

export interface ScopesResponse {
  scopes: Scope[];
}

export interface VariablesResponse {
  variables: Variable[];
}

export interface EvaluateResponse {
  result: string;
  variablesReference: number;
  type?: string;
}

export interface ContinueResponse {
  allThreadsContinued?: boolean;
}

export interface ExceptionInfoResponse {
  exceptionId: string;
  breakMode: string;
  description?: string;
  details?: {
    typeName?: string;
    message?: string;
  };
}

// Event bodies

export interface StoppedEventBody {
  /** 'breakpoint', 'exception', 'step', 'entry', 'pause', ... */
  reason: string;
  threadId?: number;
  description?: string;
  text?: string;
}

export interface ExitedEventBody {
  exitCode: number;
}

export interface OutputEventBody {
  output: string;
  category?: string;
}
