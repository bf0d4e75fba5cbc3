/**
 * Adapter registry: adapters by name, with aliases.
 */

export * from "./base.js";
export * from "./debugpy.js";

import type { AdapterConfig } from "./base.js";
import { debugpyAdapter } from "./debugpy.js";

const adapters = new Map<string, AdapterConfig>([
  ["debugpy", debugpyAdapter],
  ["python", debugpyAdapter],
]);

export function getAdapter(name: string): AdapterConfig | undefined {
  return adapters.get(name.toLowerCase());
}

/** Adapter names without aliases */
export function getAdapterNames(): string[] {
  return [...new Set([...adapters.values()].map((adapter) => adapter.name))];
}
