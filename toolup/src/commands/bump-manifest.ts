import path from "node:path";
import { atomicWriteJson } from "../fs/atomic-write.js";
import { bumpRegistryVersions } from "../manifest/bump.js";
import { SparseIndex, type ReleaseIndex } from "../manifest/registry-index.js";
import { loadManifest } from "../manifest/source.js";
import { encodeManifest } from "../model/codec.js";
import { Reporter } from "../report/reporter.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type BumpManifestOptions = {
  index?: ReleaseIndex;
  registry?: SchemaRegistry;
  reporter?: Reporter;
  now?: Date;
};

export type BumpManifestResult = { path: string; changedPackages: string[]; date?: number };

/**
 * Maintainer command: bumps the registry-pinned components of a published
 * manifest file to their newest patch releases and rewrites the file when
 * anything moved.
 */
export async function bumpManifestCommand(file: string, opts: BumpManifestOptions = {}): Promise<BumpManifestResult> {
  const registry = opts.registry ?? (await createRegistry());
  const reporter = opts.reporter ?? new Reporter();
  const target = path.resolve(file);

  const manifest = await loadManifest(registry, `file://${target}`);
  const result = await bumpRegistryVersions(manifest, opts.index ?? new SparseIndex(), reporter, opts.now);
  if (result.changedPackages.length === 0) {
    reporter.info("UP_TO_DATE", `Every registry component in ${target} is on its latest patch release`);
    return { path: target, changedPackages: [] };
  }

  await atomicWriteJson(target, encodeManifest(manifest));
  return { path: target, ...result };
}
