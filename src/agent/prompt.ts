/**
 * Prompt construction for the diagnosis request.
 */

import type { Snapshot } from './types.js';

export const DEFAULT_QUERY = 'Analyze the root cause of the current state/error.';

export const SYSTEM_INSTRUCTION = [
  'You are a debugging analysis agent attached to a program stopped in a debugger.',
  'You have the current frame, the source around the current line, the local variables and the active exception.',
  'Analyze the root cause and provide a fix.',
  'If you need to verify assumptions, suggest specific debugger commands (p <expr>, where, up, down, list, locals, next, step).',
  "Respond only with valid JSON with keys: 'diagnosis', 'suggested_fix', 'pdb_commands'.",
].join(' ');

/**
 * The query to send: the user's text, or the default root-cause request.
 */
export function resolveQuery(userQuery: string | undefined): string {
  const trimmed = userQuery?.trim();
  return trimmed ? trimmed : DEFAULT_QUERY;
}

/**
 * Compose the full prompt: instruction, snapshot, then the query verbatim.
 */
export function buildPrompt(snapshot: Snapshot, query: string): string {
  return [
    SYSTEM_INSTRUCTION,
    '',
    '--- SNAPSHOT ---',
    `Error: ${snapshot.exceptionSummary}`,
    `Function: ${snapshot.functionName}`,
    `Line: ${snapshot.lineNumber}`,
    'Code Context:',
    snapshot.sourceWindow.join('\n'),
    '',
    'Variables:',
    JSON.stringify(snapshot.variables, null, 2),
    '',
    '--- USER QUERY ---',
    query,
  ].join('\n');
}
