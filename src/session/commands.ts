/**
 * Prompt Command Parsing
 *
 * Maps a line typed at the prompt (or suggested by the model) to a command.
 * Anything that is not a known command is evaluated as an expression in the
 * selected frame.
 */

export type CommandName =
  | 'print'
  | 'where'
  | 'up'
  | 'down'
  | 'list'
  | 'locals'
  | 'break'
  | 'next'
  | 'step'
  | 'return'
  | 'continue'
  | 'quit'
  | 'help'
  | 'ai'
  | 'eval';

export interface ParsedCommand {
  name: CommandName;
  /** Text after the command word, trimmed */
  arg: string;
}

const ALIASES: ReadonlyMap<string, CommandName> = new Map<string, CommandName>([
  ['p', 'print'],
  ['pp', 'print'],
  ['print', 'print'],
  ['w', 'where'],
  ['bt', 'where'],
  ['where', 'where'],
  ['u', 'up'],
  ['up', 'up'],
  ['d', 'down'],
  ['down', 'down'],
  ['l', 'list'],
  ['list', 'list'],
  ['locals', 'locals'],
  ['b', 'break'],
  ['break', 'break'],
  ['n', 'next'],
  ['next', 'next'],
  ['s', 'step'],
  ['step', 'step'],
  ['r', 'return'],
  ['return', 'return'],
  ['c', 'continue'],
  ['cont', 'continue'],
  ['continue', 'continue'],
  ['q', 'quit'],
  ['quit', 'quit'],
  ['exit', 'quit'],
  ['h', 'help'],
  ['help', 'help'],
  ['ai', 'ai'],
]);

/** Commands that let the debuggee run */
export const RESUMING_COMMANDS: ReadonlySet<CommandName> = new Set<CommandName>(['next', 'step', 'return', 'continue']);

export const HELP_TEXT = `
Commands:
  ai [query]          Ask the model about the current frame (default: root cause analysis)
  p <expr>            Evaluate and print an expression in the selected frame
  where (w, bt)       Show the stack, marking the selected frame
  up [n] / down [n]   Select an older / newer frame
  list (l)            Show source around the current line
  locals              Show local variables of the selected frame
  break (b) [file:]line[?cond]
                      Add a breakpoint (file defaults to the selected frame's file)
  next (n)            Step over
  step (s)            Step into
  return (r)          Step out of the current function
  continue (c)        Resume until the next stop
  quit (q)            End the session
  !<expr> or <expr>   Evaluate an expression
An empty line repeats the previous command.
`.trim();

export function parseCommand(line: string): ParsedCommand {
  const text = line.trim();
  if (text.startsWith('!')) {
    return { name: 'eval', arg: text.slice(1).trim() };
  }

  const match = text.match(/^(\S+)\s*(.*)$/s);
  if (!match) {
    return { name: 'eval', arg: '' };
  }

  const [, word, rest] = match;
  const name = ALIASES.get(word.toLowerCase());
  if (!name) {
    return { name: 'eval', arg: text };
  }
  return { name, arg: rest.trim() };
}

/**
 * Parse the optional frame count of up/down.
 */
export function parseCount(arg: string): number {
  if (arg === '') return 1;
  const count = Number(arg);
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Invalid count: ${arg}`);
  }
  return count;
}
