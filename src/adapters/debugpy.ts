/**
 * debugpy
 *
 * Python debug adapter, started as `python -m debugpy.adapter` from whichever
 * interpreter can import it. A `breakpoint()` call in the debuggee stops into the
 * crashlens prompt like any breakpoint.
 */

import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { promisify } from 'node:util';
import type { AdapterConfig } from './base.js';

const execFileAsync = promisify(execFile);

/** Interpreters tried in order; python3 is the explicit name where both exist */
export const PYTHON_CANDIDATES = ['python3', 'python'];

/** The attach port `debugpy --listen` uses by default */
export const DEFAULT_LISTEN_PORT = 5678;

let interpreter: string | null = null;

async function importsDebugpy(python: string): Promise<boolean> {
  try {
    await execFileAsync(python, ['-c', 'import debugpy']);
    return true;
  } catch {
    return false;
  }
}

export const debugpyAdapter: AdapterConfig = {
  id: 'debugpy',
  name: 'debugpy',
  requiresLaunchFirst: true,

  get command() {
    return interpreter ?? PYTHON_CANDIDATES[0];
  },
  args: ['-m', 'debugpy.adapter'],

  detect: async () => {
    interpreter = null;
    for (const python of PYTHON_CANDIDATES) {
      if (await importsDebugpy(python)) {
        interpreter = python;
        return `${python} -m debugpy`;
      }
    }
    return null;
  },

  installHint: [
    'debugpy is not importable from python3 or python.',
    'Install it into the interpreter that runs your program:',
    '  python3 -m pip install debugpy',
  ].join('\n'),

  launchConfig: (options) => {
    const program = path.resolve(options.program);
    return {
      type: 'debugpy',
      request: 'launch',
      program,
      args: options.args ?? [],
      cwd: options.cwd ?? path.dirname(program),
      env: options.env ?? {},
      stopOnEntry: options.stopAtEntry ?? false,
      console: 'internalConsole',
      // Library frames matter when the crash is raised inside them
      justMyCode: false,
    };
  },

  attachConfig: (options) => ({
    type: 'debugpy',
    request: 'attach',
    processId: options.pid,
    connect: { host: options.host ?? 'localhost', port: options.port ?? DEFAULT_LISTEN_PORT },
  }),

  exceptionFilters: ['raised', 'uncaught', 'userUnhandled'],
  crashFilters: ['uncaught'],
};
