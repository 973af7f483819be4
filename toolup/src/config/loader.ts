import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { ToolupError, errorMessage } from "../errors.js";

export const CONFIG_FILE = "config.yaml";

/** Placeholder location; installs point `manifest_uri` at their published manifest. */
export const DEFAULT_MANIFEST_URI = "https://toolup.invalid/channel-manifest.json";

export const DEFAULTS = {
  schema_version: "1.0.0",
  manifest_uri: DEFAULT_MANIFEST_URI,
  build_tool: "cargo",
  default_components: [],
  verbose: false,
  path_update: "off",
} satisfies Record<string, unknown>;

type Layer = Record<string, unknown>;

function isLayer(value: unknown): value is Layer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isLayer(val)) {
      const current = result[key];
      result[key] = deepMerge(isLayer(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if the file is absent. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ToolupError("CONFIG_INVALID", `${filePath}: ${errorMessage(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isLayer(parsed)) throw new ToolupError("CONFIG_INVALID", `${filePath}: expected a mapping at the top level`);
  return parsed;
}

const ENV_PREFIX = "TOOLUP_";

function coerceBoolean(raw: string): boolean | string {
  if (["1", "true", "yes", "on"].includes(raw.toLowerCase())) return true;
  if (["0", "false", "no", "off", ""].includes(raw.toLowerCase())) return false;
  return raw;
}

const ENV_KEYS: Record<string, (raw: string) => unknown> = {
  manifest_uri: (raw) => raw,
  build_tool: (raw) => raw,
  path_update: (raw) => raw,
  verbose: coerceBoolean,
  default_components: (raw) =>
    raw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
};

/** Apply TOOLUP_ prefixed environment variable overrides for known keys. */
function envOverrides(env: NodeJS.ProcessEnv): Layer {
  const out: Layer = {};
  for (const [key, coerce] of Object.entries(ENV_KEYS)) {
    // manifest_uri → TOOLUP_MANIFEST_URI
    const value = env[ENV_PREFIX + key.toUpperCase()];
    if (value !== undefined) out[key] = coerce(value);
  }
  return out;
}

/** `--home` ⇒ `TOOLUP_HOME` ⇒ `$XDG_DATA_HOME/toolup` ⇒ `~/.local/share/toolup`. */
export function resolveHome(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  if (flag) return path.resolve(flag);
  if (env.TOOLUP_HOME) return path.resolve(env.TOOLUP_HOME);
  const dataHome = env.XDG_DATA_HOME || path.join(os.homedir(), ".local", "share");
  return path.join(dataHome, "toolup");
}

export type LoadConfigOptions = {
  home?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: defaults ← `<home>/config.yaml` ← environment variables.
 * The result still has to go through `validateConfig`.
 */
export function loadConfig(opts: LoadConfigOptions = {}): Layer {
  const env = opts.env ?? process.env;
  const home = resolveHome(opts.home, env);

  let merged: Layer = { ...DEFAULTS };
  merged = deepMerge(merged, loadYaml(path.join(home, CONFIG_FILE)));
  merged = deepMerge(merged, envOverrides(env));

  return { ...merged, home };
}
