import type { Component } from "../model/component.js";
import { packageName } from "../model/component.js";
import type { Manifest } from "../model/manifest.js";
import { comparePrecedence, formatVersion, type SemVer } from "../model/version.js";
import type { Reporter } from "../report/reporter.js";
import type { ReleaseIndex } from "./registry-index.js";

export type BumpResult = {
  /** Registry package names whose pinned version moved. */
  changedPackages: string[];
  /** New manifest date, set only when something changed. */
  date?: number;
};

function latestPatch(releases: SemVer[], current: SemVer): SemVer | undefined {
  let best: SemVer | undefined;
  for (const r of releases) {
    if (r.major !== current.major || r.minor !== current.minor || r.prerelease.length > 0) continue;
    if (!best || comparePrecedence(r, best) > 0) best = r;
  }
  return best;
}

/**
 * Moves every registry-pinned component to the newest published patch of
 * its major.minor line, in every channel. Components pinned past the newest
 * published patch are left alone. Each package is looked up once.
 */
export async function bumpRegistryVersions(
  manifest: Manifest,
  index: ReleaseIndex,
  reporter: Reporter,
  now: Date = new Date(),
): Promise<BumpResult> {
  const releases = new Map<string, SemVer[]>();
  const changed = new Set<string>();

  for (const channel of manifest.getChannels()) {
    const components: Component[] = [];
    for (const component of channel.components) {
      const a = component.authority;
      if (a.kind !== "registry") {
        components.push(component);
        continue;
      }
      const pkg = packageName(component);
      let published = releases.get(pkg);
      if (!published) {
        published = await index.releasedVersions(pkg);
        releases.set(pkg, published);
      }
      const latest = latestPatch(published, a.version);
      if (!latest || comparePrecedence(latest, a.version) <= 0) {
        components.push(component);
        continue;
      }
      reporter.info(
        "COMPONENT_BUMP",
        `${channel.describe()}: ${component.name} ${formatVersion(a.version)} -> ${formatVersion(latest)}`,
      );
      components.push({ ...component, authority: { ...a, version: latest } });
      changed.add(pkg);
    }
    channel.components = components;
  }

  if (changed.size === 0) return { changedPackages: [] };
  manifest.date = Math.floor(now.getTime() / 1000);
  return { changedPackages: [...changed].sort(), date: manifest.date };
}
