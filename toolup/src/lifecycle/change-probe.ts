import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { GitOperations } from "../git/operations.js";
import type { Channel } from "../model/channel.js";
import type { Component } from "../model/component.js";
import type { Reporter } from "../report/reporter.js";
import type { PathUpdatePolicy } from "../types/config.js";

/**
 * Observes the live state behind branch-tracking git and path authorities.
 * `undefined` means the state could not be observed.
 */
export interface ChangeProbe {
  latestRevision(repositoryUrl: string, branch: string): Promise<string | undefined>;
  latestModification(root: string): Promise<number | undefined>;
}

/** Most recent mtime (unix ms) of `root` or anything below it. */
export async function latestModification(root: string): Promise<number> {
  const info = await stat(root);
  let latest = Math.floor(info.mtimeMs);
  if (!info.isDirectory()) return latest;
  for (const entry of await readdir(root, { withFileTypes: true })) {
    const child = path.join(root, entry.name);
    const mtime = entry.isDirectory() ? await latestModification(child) : Math.floor((await stat(child)).mtimeMs);
    latest = Math.max(latest, mtime);
  }
  return latest;
}

/** Probe backed by `git ls-remote` and the filesystem. Failures become warnings. */
export class LiveChangeProbe implements ChangeProbe {
  constructor(
    private readonly git: GitOperations,
    private readonly reporter: Reporter,
  ) {}

  async latestRevision(repositoryUrl: string, branch: string): Promise<string | undefined> {
    try {
      const rev = await this.git.latestBranchRevision(repositoryUrl, branch);
      if (rev === undefined) {
        this.reporter.warn("PROBE_FAILED", `branch ${branch} not found in ${repositoryUrl}`);
      }
      return rev;
    } catch (e) {
      this.reporter.warn("PROBE_FAILED", `could not query ${repositoryUrl}: ${errorMessage(e)}`);
      return undefined;
    }
  }

  async latestModification(root: string): Promise<number | undefined> {
    try {
      return await latestModification(root);
    } catch (e) {
      this.reporter.warn("PROBE_FAILED", `could not scan ${root}: ${errorMessage(e)}`);
      return undefined;
    }
  }
}

/** Refreshes one component's cache in place. Returns false when the probe failed. */
async function probeComponent(component: Component, probe: ChangeProbe): Promise<boolean> {
  const a = component.authority;
  if (a.kind === "git" && a.target.kind === "branch") {
    a.target.latestRevision = await probe.latestRevision(a.repositoryUrl, a.target.name);
    return a.target.latestRevision !== undefined;
  }
  if (a.kind === "path") {
    a.lastModification = await probe.latestModification(a.path);
    return a.lastModification !== undefined;
  }
  return true;
}

/** Copy of `channel` with every change-detection cache refreshed. */
export async function refreshAuthorities(channel: Channel, probe: ChangeProbe): Promise<Channel> {
  const refreshed = channel.clone();
  for (const component of refreshed.components) {
    await probeComponent(component, probe);
  }
  return refreshed;
}

export type ObservedChannel = {
  channel: Channel;
  /** Components whose live state could not be observed; update treats them as changed. */
  unverified: string[];
};

/**
 * Copy of the upstream channel carrying the caches as they would read if it
 * were installed now, ready to be diffed against the installed `local` channel.
 * With `pathUpdate: "off"` path components keep the installed cache, so they
 * only count as changed when their definition changes.
 */
export async function observeChannel(
  upstream: Channel,
  local: Channel,
  probe: ChangeProbe,
  pathUpdate: PathUpdatePolicy,
): Promise<ObservedChannel> {
  const observed = upstream.clone();
  const unverified: string[] = [];

  for (const component of observed.components) {
    const a = component.authority;
    if (a.kind === "path" && pathUpdate === "off") {
      const installed = local.getComponent(component.name)?.authority;
      if (installed?.kind === "path" && installed.path === a.path) {
        a.lastModification = installed.lastModification;
      }
      continue;
    }
    if (!(await probeComponent(component, probe))) unverified.push(component.name);
  }
  return { channel: observed, unverified };
}
