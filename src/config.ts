/**
 * Agent Configuration
 *
 * Read once at start from the environment, overridden by CLI flags,
 * validated and frozen. Nothing below this module looks at process.env.
 */

import { z } from 'zod';

export const DEFAULT_INFERENCE_URL = 'http://localhost:11434/api/generate';
export const DEFAULT_MODEL = 'qwen3:8b';
export const DEFAULT_CONTEXT_SIZE = 4096;
export const DEFAULT_MAX_VALUE_LENGTH = 500;
export const DEFAULT_REQUEST_TIMEOUT = '480s';

export interface AgentConfig {
  /** Inference endpoint (Ollama-style /api/generate) */
  readonly url: string;
  /** Model identifier sent with every request */
  readonly model: string;
  /** Context window requested from the backend (options.num_ctx) */
  readonly contextSize: number;
  /** Upper bound for every string in a snapshot */
  readonly maxValueLength: number;
  /** Inference round-trip timeout in ms */
  readonly requestTimeoutMs: number;
}

export type ConfigOverrides = Partial<Record<keyof AgentConfig, string | number | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a duration string ("30s", "5000ms", "2m", or a bare number of ms).
 */
export function parseTimeout(value: string): number {
  const match = value.match(/^(\d+)(ms|s|m)?$/);
  if (!match) {
    throw new Error(`Invalid timeout format: ${value}. Use format like "30s", "5000ms", or "2m"`);
  }

  const num = parseInt(match[1], 10);
  const unit = match[2] || 'ms';

  switch (unit) {
    case 's':
      return num * 1000;
    case 'm':
      return num * 60 * 1000;
    default:
      return num;
  }
}

const positiveInt = z.coerce.number().int().positive();

const durationMs = z.union([
  z.number().int().nonnegative(),
  z.string().transform((value, ctx) => {
    try {
      return parseTimeout(value.trim());
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  }),
]);

const AgentConfigSchema = z.object({
  url: z.string().url(),
  model: z.string().trim().min(1),
  contextSize: positiveInt,
  maxValueLength: positiveInt.min(16),
  requestTimeoutMs: durationMs,
});

/** Environment variable backing each setting */
export const CONFIG_ENV_VARS: Readonly<Record<keyof AgentConfig, string>> = {
  url: 'CRASHLENS_URL',
  model: 'CRASHLENS_MODEL',
  contextSize: 'CRASHLENS_CONTEXT_SIZE',
  maxValueLength: 'CRASHLENS_MAX_VALUE_LENGTH',
  requestTimeoutMs: 'CRASHLENS_TIMEOUT',
};

/**
 * Build the agent configuration.
 *
 * Precedence: overrides (CLI flags), then environment, then defaults.
 * Empty environment values count as unset.
 *
 * @throws ConfigError naming the offending setting
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AgentConfig {
  const fromEnv = (key: keyof AgentConfig): string | undefined => {
    const raw = env[CONFIG_ENV_VARS[key]];
    return raw === undefined || raw.trim() === '' ? undefined : raw;
  };

  const raw = {
    url: overrides.url ?? fromEnv('url') ?? DEFAULT_INFERENCE_URL,
    model: overrides.model ?? fromEnv('model') ?? DEFAULT_MODEL,
    contextSize: overrides.contextSize ?? fromEnv('contextSize') ?? DEFAULT_CONTEXT_SIZE,
    maxValueLength: overrides.maxValueLength ?? fromEnv('maxValueLength') ?? DEFAULT_MAX_VALUE_LENGTH,
    requestTimeoutMs: overrides.requestTimeoutMs ?? fromEnv('requestTimeoutMs') ?? DEFAULT_REQUEST_TIMEOUT,
  };

  const result = AgentConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0];
    const setting = typeof key === 'string' && isConfigKey(key) ? CONFIG_ENV_VARS[key] : 'configuration';
    throw new ConfigError(`Invalid ${setting}: ${issue?.message ?? 'invalid value'}`);
  }

  return Object.freeze({ ...result.data });
}

function isConfigKey(key: string): key is keyof AgentConfig {
  return key in CONFIG_ENV_VARS;
}
