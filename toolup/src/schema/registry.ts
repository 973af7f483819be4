import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ToolupError, type ErrorCode } from "../errors.js";
import type { ToolupConfig } from "../types/config.js";
import type { ChannelJson, ManifestJson, ToolchainFileJson } from "../types/manifest.js";
import { loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

/** Shape each bundled schema validates. */
export type SchemaTypes = {
  manifest: ManifestJson;
  channel: ChannelJson;
  config: ToolupConfig;
  "toolchain-file": ToolchainFileJson;
};

export type SchemaName = keyof SchemaTypes;

type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

/**
 * Schema registry: discovers and loads all JSON Schemas from a directory.
 * Validators are compiled on first use.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();

  private constructor(
    private readonly schemaDir: string,
    private readonly ajv: AjvInstance,
  ) {}

  static async load(schemaDir: string): Promise<SchemaRegistry> {
    if (!fs.existsSync(schemaDir)) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }
    const registry = new SchemaRegistry(schemaDir, await loadAjv());

    for (const file of fs.readdirSync(schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "manifest.schema.json" → "manifest"
      const name = file.replace(/\.schema\.json$/, "");
      registry.entries.set(name, { name, filePath, schema });
      // Registered up front so `$ref`s between schema files resolve.
      registry.ajv.addSchema(schema);
    }
    return registry;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Ajv caches compiled validators per schema object. */
  private validator<N extends SchemaName>(name: N): AjvValidateFn<SchemaTypes[N]> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name} (in ${this.schemaDir})`);
    }
    return this.ajv.compile<SchemaTypes[N]>(entry.schema);
  }

  validate(name: SchemaName, data: unknown): { valid: boolean; errors: string | null } {
    const validate = this.validator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors) };
  }

  /** Validates `data` and returns it typed, or throws `code` naming `label`. */
  parse<N extends SchemaName>(name: N, data: unknown, code: ErrorCode, label: string): SchemaTypes[N] {
    const validate = this.validator(name);
    if (validate(data)) return data;
    throw new ToolupError(code, `${label}: ${this.ajv.errorsText(validate.errors)}`);
  }
}

/** Bundled schemas: `toolup/schemas`, two levels above both `src/schema` and `dist/schema`. */
export function defaultSchemaDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  return SchemaRegistry.load(schemaDir ?? defaultSchemaDir());
}
