/**
 * DAP Client Interface
 *
 * What the session layer needs from a debug adapter connection.
 */

import type { EventEmitter } from 'node:events';
import type {
  InitializeRequestArguments,
  LaunchRequestArguments,
  AttachRequestArguments,
  SetBreakpointsArguments,
  SetBreakpointsResponse,
  SetExceptionBreakpointsArguments,
  StackTraceArguments,
  StackTraceResponse,
  ScopesArguments,
  ScopesResponse,
  VariablesArguments,
  VariablesResponse,
  EvaluateArguments,
  EvaluateResponse,
  ExceptionInfoArguments,
  ExceptionInfoResponse,
  ContinueArguments,
  ContinueResponse,
  NextArguments,
  StepInArguments,
  StepOutArguments,
  Capabilities,
} from './protocol.js';

export interface IDapClient extends EventEmitter {
  connect(): Promise<void>;
  initialize(args?: Partial<InitializeRequestArguments>): Promise<Capabilities>;
  launch(args: LaunchRequestArguments): Promise<void>;
  attach(args: AttachRequestArguments): Promise<void>;
  configurationDone(): Promise<void>;
  setBreakpoints(args: SetBreakpointsArguments): Promise<SetBreakpointsResponse>;
  setExceptionBreakpoints(args: SetExceptionBreakpointsArguments): Promise<void>;
  stackTrace(args: StackTraceArguments): Promise<StackTraceResponse>;
  scopes(args: ScopesArguments): Promise<ScopesResponse>;
  variables(args: VariablesArguments): Promise<VariablesResponse>;
  evaluate(args: EvaluateArguments): Promise<EvaluateResponse>;
  exceptionInfo(args: ExceptionInfoArguments): Promise<ExceptionInfoResponse>;
  continue(args: ContinueArguments): Promise<ContinueResponse>;
  next(args: NextArguments): Promise<void>;
  stepIn(args: StepInArguments): Promise<void>;
  stepOut(args: StepOutArguments): Promise<void>;
  disconnect(terminateDebuggee?: boolean): Promise<void>;
  getCapabilities(): Capabilities;
  isConnected(): boolean;
}

/** The slice of the client that reads frame state, used by snapshot capture. */
export type FrameStateReader = Pick<IDapClient, 'scopes' | 'variables'>;

/** The slice of the client the interactive command interpreter drives. */
export type SessionDriver = Pick<
  IDapClient,
  | 'stackTrace'
  | 'scopes'
  | 'variables'
  | 'evaluate'
  | 'exceptionInfo'
  | 'continue'
  | 'next'
  | 'stepIn'
  | 'stepOut'
  | 'getCapabilities'
>;
