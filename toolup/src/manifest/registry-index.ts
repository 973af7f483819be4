import { ToolupError, errorMessage } from "../errors.js";
import { parseVersion, type SemVer } from "../model/version.js";
import type { FetchLike } from "./source.js";

export const DEFAULT_INDEX_URL = "https://index.crates.io";

/** Published versions of registry packages. */
export interface ReleaseIndex {
  releasedVersions(packageName: string): Promise<SemVer[]>;
}

/** Index file location: `1/a`, `2/ab`, `3/a/abc`, then `ab/cd/abcd...`. */
export function sparseIndexPath(packageName: string): string {
  const name = packageName.toLowerCase();
  switch (name.length) {
    case 1:
      return `1/${name}`;
    case 2:
      return `2/${name}`;
    case 3:
      return `3/${name.slice(0, 1)}/${name}`;
    default:
      return `${name.slice(0, 2)}/${name.slice(2, 4)}/${name}`;
  }
}

type IndexLine = { vers?: unknown; yanked?: unknown };

function isIndexLine(value: unknown): value is IndexLine {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a sparse registry index: one JSON object per line, one line per
 * published version. Yanked versions are left out.
 */
export function parseIndexFile(raw: string, source: string): SemVer[] {
  const versions: SemVer[] = [];
  for (const [i, line] of raw.split("\n").entries()) {
    if (line.trim().length === 0) continue;
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch (e) {
      throw new ToolupError("REGISTRY_INDEX_INVALID", `${source}:${i + 1}: ${errorMessage(e)}`);
    }
    const version = isIndexLine(entry) && typeof entry.vers === "string" ? parseVersion(entry.vers) : undefined;
    if (!isIndexLine(entry) || version === undefined) {
      throw new ToolupError("REGISTRY_INDEX_INVALID", `${source}:${i + 1}: entry has no valid "vers"`);
    }
    if (entry.yanked !== true) versions.push(version);
  }
  return versions;
}

export class SparseIndex implements ReleaseIndex {
  constructor(
    private readonly baseUrl: string = DEFAULT_INDEX_URL,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async releasedVersions(packageName: string): Promise<SemVer[]> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/${sparseIndexPath(packageName)}`;
    let res: Awaited<ReturnType<FetchLike>>;
    try {
      res = await this.fetchImpl(url);
    } catch (e) {
      throw new ToolupError("REGISTRY_INDEX_UNREACHABLE", `could not fetch ${url}: ${errorMessage(e)}`);
    }
    if (!res.ok) {
      throw new ToolupError("REGISTRY_INDEX_UNREACHABLE", `index request to ${url} failed (HTTP ${res.status})`, {
        status: res.status,
      });
    }
    return parseIndexFile(await res.text(), url);
  }
}
