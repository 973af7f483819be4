import fs from "node:fs";
import { rm } from "node:fs/promises";
import { ToolupError } from "../errors.js";
import { describeAuthority } from "../model/authority.js";
import { componentsToUpdate, type Channel } from "../model/channel.js";
import { installedArtifact, packageName, type Component } from "../model/component.js";
import type { Manifest } from "../model/manifest.js";
import { formatUserChannel, type UserChannel } from "../model/user-channel.js";
import { comparePrecedence, formatVersion } from "../model/version.js";
import type { PathUpdatePolicy } from "../types/config.js";
import { observeChannel } from "./change-probe.js";
import type { ToolupContext } from "./context.js";
import { install } from "./install.js";
import type { SysrootLayout } from "./layout.js";
import { demoteCompletion, readInstallState, rewriteMarker } from "./markers.js";

export type UpdateOptions = {
  pathUpdate: PathUpdatePolicy;
};

export type UpdateOutcome = {
  channel: string;
  status: "updated" | "up-to-date" | "skipped";
  /** Components that were reinstalled. */
  components: string[];
};

/** Deletes what an earlier install of `component` left in the sysroot. */
async function removeInstalled(ctx: ToolupContext, sysroot: SysrootLayout, component: Component): Promise<void> {
  const artifact = sysroot.artifact(component);
  if (installedArtifact(component).kind === "executable" && fs.existsSync(artifact)) {
    await ctx.buildTool.uninstall(packageName(component), sysroot.root);
  }
  await rm(artifact, { force: true });
}

/**
 * Brings one installed channel in line with its upstream definition.
 *
 * Upstream is observed first (branch tips, path mtimes) so that the plain
 * structural diff sees live changes. Components that could not be observed
 * count as changed.
 */
export async function updateChannel(
  ctx: ToolupContext,
  installed: Channel,
  upstream: Channel,
  local: Manifest,
  options: UpdateOptions,
): Promise<UpdateOutcome> {
  const name = formatVersion(installed.name);
  const observed = await observeChannel(upstream, installed, ctx.probe, options.pathUpdate);
  const target = installed.isPartial()
    ? (observed.channel.createSubset(installed.components.map((c) => c.name))?.channel ?? observed.channel)
    : observed.channel;

  const changed = new Set(componentsToUpdate(installed, target).map((c) => c.name));
  const updates = target.components.filter((c) => changed.has(c.name) || observed.unverified.includes(c.name));
  if (updates.length === 0) {
    ctx.reporter.info("UP_TO_DATE", `Nothing to update, ${installed.describe()} is up to date`);
    return { channel: name, status: "up-to-date", components: [] };
  }

  const sysroot = ctx.layout.sysroot(installed.name);
  await demoteCompletion(sysroot);
  for (const next of updates) {
    const previous = installed.getComponent(next.name);
    ctx.reporter.info(
      "COMPONENT_UPDATE",
      previous
        ? `Updating ${next.name}: ${describeAuthority(previous.authority)} -> ${describeAuthority(next.authority)}`
        : `Adding ${next.name} ${describeAuthority(next.authority)}`,
    );
    if (previous) await removeInstalled(ctx, sysroot, previous);
    await rm(sysroot.artifact(next), { force: true });
  }
  // The progress log now lists only what is still in place; the install
  // script appends the reinstalled components.
  const state = await readInstallState(sysroot);
  if (state.kind === "in-progress") {
    const removed = new Set(updates.map((c) => c.name));
    await rewriteMarker(sysroot, state, state.completed.filter((c) => !removed.has(c)));
  }

  await install(ctx, target, local);
  return { channel: name, status: "updated", components: updates.map((c) => c.name) };
}

async function updateStable(ctx: ToolupContext, local: Manifest, options: UpdateOptions): Promise<UpdateOutcome[]> {
  const localStable = local.getLatestStable();
  if (!localStable) {
    throw new ToolupError("NOT_INSTALLED", "no stable toolchain is installed; run `toolup install stable`");
  }
  const upstreamStable = ctx.upstream.getLatestStable();
  if (!upstreamStable) {
    throw new ToolupError("CHANNEL_NOT_FOUND", "the upstream manifest has no stable channel");
  }

  if (comparePrecedence(upstreamStable.name, localStable.name) <= 0) {
    ctx.reporter.info("UP_TO_DATE", "Nothing to update, you are all up to date");
    return [{ channel: formatVersion(localStable.name), status: "up-to-date", components: [] }];
  }

  const alreadyInstalled = local.getChannelByName(upstreamStable.name);
  if (alreadyInstalled) return [await updateChannel(ctx, alreadyInstalled, upstreamStable, local, options)];

  const saved = await install(ctx, upstreamStable, local);
  return [{ channel: formatVersion(saved.name), status: "updated", components: saved.components.map((c) => c.name) }];
}

/**
 * Update dispatch: `stable`, one version, or every installed channel when
 * `target` is undefined. Nightly and tag targets have no update rule.
 */
export async function update(
  ctx: ToolupContext,
  target: UserChannel | undefined,
  local: Manifest,
  options: UpdateOptions,
): Promise<UpdateOutcome[]> {
  if (target === undefined) {
    const outcomes: UpdateOutcome[] = [];
    for (const installed of local.getChannels()) {
      const upstream = ctx.upstream.getChannelByName(installed.name);
      if (!upstream) {
        // Local-only channels are developer builds or were withdrawn upstream.
        ctx.reporter.info("UPDATE_SKIPPED", `Skipping ${installed.describe()}: not in the upstream manifest`);
        outcomes.push({ channel: formatVersion(installed.name), status: "skipped", components: [] });
        continue;
      }
      outcomes.push(await updateChannel(ctx, installed, upstream, local, options));
    }
    return outcomes;
  }

  switch (target.kind) {
    case "stable":
      return updateStable(ctx, local, options);
    case "version": {
      const version = formatVersion(target.version);
      const installed = local.getChannelByName(target.version);
      if (!installed) throw new ToolupError("NOT_INSTALLED", `no installed channel found with version ${version}`);
      const upstream = ctx.upstream.getChannelByName(target.version);
      if (!upstream) {
        throw new ToolupError("CHANNEL_NOT_FOUND", `no upstream channel with version ${version}; it may have been removed`);
      }
      return [await updateChannel(ctx, installed, upstream, local, options)];
    }
    case "nightly":
    case "other":
      throw new ToolupError(
        "UNSUPPORTED_UPDATE_TARGET",
        `updating '${formatUserChannel(target)}' is not supported; update by version or stable instead`,
      );
  }
}
