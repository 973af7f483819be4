import { readFile } from "node:fs/promises";
import { ToolupError, errnoCode, errorMessage } from "../errors.js";
import { decodeManifest } from "../model/codec.js";
import type { Manifest } from "../model/manifest.js";
import type { SchemaRegistry } from "../schema/registry.js";

export type FetchLike = (url: string) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

function parseJson(raw: string, uri: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ToolupError("MANIFEST_INVALID", `manifest at ${uri} is not valid JSON: ${errorMessage(e)}`);
  }
}

/** Decodes manifest text that was read from `uri`. */
export function parseManifest(registry: SchemaRegistry, raw: string, uri: string): Manifest {
  const json = registry.parse("manifest", parseJson(raw, uri), "MANIFEST_INVALID", `manifest at ${uri}`);
  return decodeManifest(json);
}

const FILE_SCHEME = "file://";

/**
 * Everything after `file://` is a plain path, read as written: relative paths
 * resolve against the working directory and `%` is not an escape.
 */
export function fileSourcePath(uri: string): string {
  return uri.slice(FILE_SCHEME.length);
}

async function readFileSource(uri: string): Promise<string> {
  const filePath = fileSourcePath(uri);
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      throw new ToolupError("MANIFEST_MISSING", `manifest file not found: ${filePath}`, { path: filePath });
    }
    throw e;
  }
  if (raw.trim().length === 0) {
    throw new ToolupError("MANIFEST_EMPTY", `manifest file is empty: ${filePath}`, { path: filePath });
  }
  return raw;
}

async function readHttpsSource(uri: string, fetchImpl: FetchLike): Promise<string> {
  let res: Awaited<ReturnType<FetchLike>>;
  try {
    res = await fetchImpl(uri);
  } catch (e) {
    throw new ToolupError("MANIFEST_UNREACHABLE", `could not fetch manifest from ${uri}: ${errorMessage(e)}`);
  }
  if (res.status >= 400 && res.status <= 499) {
    throw new ToolupError("MANIFEST_NOT_FOUND", `manifest not found at ${uri} (HTTP ${res.status})`, {
      status: res.status,
    });
  }
  if (!res.ok) {
    throw new ToolupError("MANIFEST_UNREACHABLE", `manifest request to ${uri} failed (HTTP ${res.status})`, {
      status: res.status,
    });
  }
  const body = await res.text();
  if (body.trim().length === 0) {
    throw new ToolupError("MANIFEST_EMPTY_BODY", `manifest response from ${uri} is empty`);
  }
  return body;
}

/**
 * Loads the upstream manifest from a `file://` or `https://` URI.
 * One attempt, no retries.
 */
export async function loadManifest(
  registry: SchemaRegistry,
  uri: string,
  fetchImpl: FetchLike = fetch,
): Promise<Manifest> {
  let raw: string;
  if (uri.startsWith(FILE_SCHEME)) raw = await readFileSource(uri);
  else if (uri.startsWith("https://")) raw = await readHttpsSource(uri, fetchImpl);
  else throw new ToolupError("MANIFEST_UNSUPPORTED_URI", `unsupported manifest URI: ${uri}`);
  return parseManifest(registry, raw, uri);
}
