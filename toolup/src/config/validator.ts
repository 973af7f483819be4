import type { SchemaRegistry } from "../schema/registry.js";
import type { ToolupConfig } from "../types/config.js";
import { loadConfig, type LoadConfigOptions } from "./loader.js";

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

/** Validate a loaded config against `config.schema.json`. */
export function validateConfig(registry: SchemaRegistry, config: unknown): ConfigValidationResult {
  return registry.validate("config", config);
}

/** Loads and validates in one step; throws `CONFIG_INVALID`. */
export function resolveConfig(registry: SchemaRegistry, opts: LoadConfigOptions = {}): ToolupConfig {
  return registry.parse("config", loadConfig(opts), "CONFIG_INVALID", "invalid configuration");
}
