/**
 * Agent Console
 *
 * Line-oriented human output for the interactive session.
 * Diagnostics carry a prefix so they stand apart from debuggee and command output.
 */

export interface ConsoleOptions {
  /** Write to a custom stream (default: stdout) */
  stream?: NodeJS.WritableStream;
  /** Prefix tag for diagnostic lines (default: "crashlens") */
  tag?: string;
}

export class AgentConsole {
  private stream: NodeJS.WritableStream;
  private tag: string;

  constructor(options: ConsoleOptions = {}) {
    this.stream = options.stream ?? process.stdout;
    this.tag = options.tag ?? 'crashlens';
  }

  /** Raw text, as received (debuggee output) */
  write(text: string): void {
    this.stream.write(text);
  }

  /** Plain output line */
  print(line = ''): void {
    this.stream.write(line + '\n');
  }

  info(message: string): void {
    this.print(`[${this.tag}] ${message}`);
  }

  warn(message: string): void {
    this.print(`[${this.tag} WARN] ${message}`);
  }

  error(message: string): void {
    this.print(`[${this.tag} ERROR] ${message}`);
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
