import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_LISTEN_PORT, debugpyAdapter, getAdapter, getAdapterNames } from '../../src/adapters/index.js';

describe('adapter registry', () => {
  it('lists each adapter once', () => {
    expect(getAdapterNames()).toEqual(['debugpy']);
  });

  it('resolves aliases without regard to case', () => {
    expect(getAdapter('python')).toBe(debugpyAdapter);
    expect(getAdapter('DebugPy')).toBe(debugpyAdapter);
    expect(getAdapter('gdb')).toBeUndefined();
  });
});

describe('debugpy', () => {
  it('sets breakpoints only after launch', () => {
    expect(debugpyAdapter.requiresLaunchFirst).toBe(true);
    expect(debugpyAdapter.args).toEqual(['-m', 'debugpy.adapter']);
  });

  it('stops on uncaught exceptions for post-mortem sessions', () => {
    expect(debugpyAdapter.crashFilters).toEqual(['uncaught']);
    for (const filter of debugpyAdapter.crashFilters) {
      expect(debugpyAdapter.exceptionFilters).toContain(filter);
    }
  });

  it('launches the program with its arguments and library frames visible', () => {
    const config = debugpyAdapter.launchConfig({
      program: '/work/calc.py',
      args: ['--rows', '3'],
      env: { CALC_MODE: 'strict' },
    });

    expect(config).toEqual({
      type: 'debugpy',
      request: 'launch',
      program: '/work/calc.py',
      args: ['--rows', '3'],
      cwd: '/work',
      env: { CALC_MODE: 'strict' },
      stopOnEntry: false,
      console: 'internalConsole',
      justMyCode: false,
    });
  });

  it('resolves a relative program and keeps an explicit working directory', () => {
    const config = debugpyAdapter.launchConfig({ program: 'calc.py', cwd: '/srv/jobs', stopAtEntry: true });

    expect(config.program).toBe(path.resolve('calc.py'));
    expect(config.cwd).toBe('/srv/jobs');
    expect(config.stopOnEntry).toBe(true);
  });

  it('attaches to a listening process on the default port', () => {
    expect(debugpyAdapter.attachConfig({ pid: 4242 })).toEqual({
      type: 'debugpy',
      request: 'attach',
      processId: 4242,
      connect: { host: 'localhost', port: DEFAULT_LISTEN_PORT },
    });
    expect(debugpyAdapter.attachConfig({ host: 'worker-1', port: 5679 }).connect).toEqual({
      host: 'worker-1',
      port: 5679,
    });
  });
});
