#!/usr/bin/env node

/**
 * crashlens: an interactive debugger with a model-backed analyst
 *
 * Drives a Python program through debugpy over DAP. At any stop,
 * `ai [query]` sends a bounded snapshot of the frame to a local inference server
 * and can run the debugger commands it suggests once you confirm.
 */

import { createCli } from "./cli.js";

const cli = createCli();
await cli.parseAsync();
