/**
 * Inference Client
 *
 * One blocking round-trip to a local generate endpoint (Ollama's /api/generate wire
 * format). Every outcome, including transport failures and replies that are not the
 * requested JSON, comes back as a Diagnosis; query() never rejects.
 */

import { z } from 'zod';
import type { AgentConfig } from '../config.js';
import type { AgentConsole } from '../output/console.js';
import { errorMessage } from '../output/console.js';
import { truncate } from './render.js';
import { buildPrompt, resolveQuery } from './prompt.js';
import type { Diagnosis, Snapshot } from './types.js';

export const TEMPERATURE = 0.2;
export const CONNECTION_ERROR = 'Connection Error';
export const CONNECTION_FIX = 'Start the inference server (e.g. run `ollama serve`)';
export const UNPARSED_FIX = 'Could not parse specific fix from model output.';

export interface GenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  format: 'json';
  options: {
    num_ctx: number;
    temperature: number;
  };
}

/** Anything that can answer a snapshot with a diagnosis */
export interface DiagnosisService {
  query(snapshot: Snapshot, userQuery?: string): Promise<Diagnosis>;
}

const GenerateEnvelopeSchema = z.object({
  response: z.string(),
});

const textField = z.unknown().transform((value) => {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
});

const commandsField = z.unknown().transform((value) => {
  if (!Array.isArray(value)) return [];
  return value
    .filter((command): command is string => typeof command === 'string')
    .map((command) => command.trim())
    .filter((command) => command.length > 0);
});

const DiagnosisPayloadSchema = z.object({
  diagnosis: textField,
  suggested_fix: textField,
  pdb_commands: commandsField,
});

/**
 * First stage: pull the model's text out of the generate envelope.
 * Returns null when the body is not the expected envelope.
 */
export function parseGenerateBody(body: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const envelope = GenerateEnvelopeSchema.safeParse(json);
  return envelope.success ? envelope.data.response : null;
}

/**
 * Second stage: decode the model's text as a diagnosis object.
 * Missing keys default to empty values. Returns null when the text is not a JSON object.
 */
export function parseDiagnosis(text: string): Diagnosis | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    return null;
  }

  const payload = DiagnosisPayloadSchema.safeParse(json);
  if (!payload.success) return null;

  return freezeDiagnosis(payload.data.diagnosis, payload.data.suggested_fix, payload.data.pdb_commands);
}

function freezeDiagnosis(diagnosis: string, suggestedFix: string, commands: string[] = []): Diagnosis {
  return Object.freeze({ diagnosis, suggestedFix, commands: Object.freeze([...commands]) });
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class InferenceClient implements DiagnosisService {
  private config: AgentConfig;
  private console: AgentConsole;
  private fetchImpl: typeof fetch;

  constructor(config: AgentConfig, console: AgentConsole, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.console = console;
    this.fetchImpl = fetchImpl;
  }

  buildRequest(snapshot: Snapshot, query: string): GenerateRequest {
    return {
      model: this.config.model,
      prompt: buildPrompt(snapshot, query),
      stream: false,
      format: 'json',
      options: {
        num_ctx: this.config.contextSize,
        temperature: TEMPERATURE,
      },
    };
  }

  async query(snapshot: Snapshot, userQuery?: string): Promise<Diagnosis> {
    const request = this.buildRequest(snapshot, resolveQuery(userQuery));

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      this.console.info(`Connecting to ${this.config.url} using model '${this.config.model}'...`);
      const response = await this.fetchImpl(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (error) {
      return this.transportFailure(error);
    }

    if (!ok) {
      const detail = truncate(body.trim(), this.config.maxValueLength);
      this.console.error(`Inference backend returned HTTP ${status}`);
      return freezeDiagnosis(`Error: HTTP ${status}${detail ? ` ${detail}` : ''}`, 'N/A');
    }

    const text = parseGenerateBody(body);
    const diagnosis = text === null ? null : parseDiagnosis(text);
    if (diagnosis) {
      return diagnosis;
    }

    this.console.warn('Model reply was not the requested JSON; showing it verbatim');
    return freezeDiagnosis(text ?? body, UNPARSED_FIX);
  }

  private transportFailure(error: unknown): Diagnosis {
    if (isTimeout(error)) {
      const seconds = Math.round(this.config.requestTimeoutMs / 1000);
      this.console.error(`Inference request timed out after ${seconds}s`);
      return freezeDiagnosis(`Request timed out after ${seconds}s`, 'Retry, or raise CRASHLENS_TIMEOUT for slow models');
    }

    this.console.error(`Could not connect to ${this.config.url}: ${errorMessage(error)}. Is the server running?`);
    return freezeDiagnosis(CONNECTION_ERROR, CONNECTION_FIX);
  }
}
