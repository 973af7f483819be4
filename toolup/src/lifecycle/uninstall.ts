import fs from "node:fs";
import { rm } from "node:fs/promises";
import { ToolupError } from "../errors.js";
import type { Channel } from "../model/channel.js";
import { installedArtifact, packageName } from "../model/component.js";
import type { Manifest } from "../model/manifest.js";
import { formatUserChannel, type UserChannel } from "../model/user-channel.js";
import type { ToolupContext } from "./context.js";
import type { SysrootLayout } from "./layout.js";
import { readInstallState, readSnapshot, rewriteMarker } from "./markers.js";
import { pointsAt, removePointer } from "./pointers.js";

/**
 * Removes the components listed in the marker, using the snapshot taken at
 * install time to know how each one was installed. The marker is rewritten
 * after every removal so a retry resumes where this one stopped.
 */
async function removeComponents(ctx: ToolupContext, sysroot: SysrootLayout): Promise<void> {
  const state = await readInstallState(sysroot);
  if (state.kind === "not-started") {
    ctx.reporter.warn(
      "NO_INSTALL_MARKER",
      `could not find installation-successful or .installation-in-progress at ${sysroot.root}; deleting the toolchain directory directly`,
    );
    return;
  }

  const snapshot = await readSnapshot(ctx.registry, sysroot);
  let remaining = [...state.completed];
  for (const name of state.completed) {
    const component = snapshot.getComponent(name);
    if (!component) {
      ctx.reporter.warn("UNKNOWN_COMPONENT", `${name} is listed as installed but missing from ${sysroot.snapshot}`);
    } else {
      const artifact = sysroot.artifact(component);
      if (installedArtifact(component).kind === "executable" && fs.existsSync(artifact)) {
        await ctx.buildTool.uninstall(packageName(component), sysroot.root);
      }
      await rm(artifact, { force: true });
    }
    remaining = remaining.filter((n) => n !== name);
    await rewriteMarker(sysroot, state, remaining);
  }
}

/**
 * Uninstalls a channel: its components, the pointers aimed at it, its local
 * manifest entry and finally its sysroot directory.
 */
export async function uninstall(ctx: ToolupContext, request: UserChannel, local: Manifest): Promise<Channel> {
  const channel = local.getChannel(request) ?? ctx.upstream.getChannel(request);
  if (!channel) {
    throw new ToolupError("CHANNEL_NOT_FOUND", `channel '${formatUserChannel(request)}' doesn't exist or is unavailable`);
  }
  const sysroot = ctx.layout.sysroot(channel.name);
  if (!fs.existsSync(sysroot.root)) {
    throw new ToolupError("NOT_INSTALLED", `${channel.describe()} is not installed, nothing to uninstall`);
  }

  await removeComponents(ctx, sysroot);

  for (const pointer of [ctx.layout.stablePointer, ctx.layout.defaultPointer]) {
    if (await pointsAt(pointer, sysroot.root)) await removePointer(pointer);
  }

  local.removeChannel(channel.name);
  await ctx.store.save(local);

  await rm(sysroot.root, { recursive: true, force: true });
  ctx.reporter.info("UNINSTALLED", `Uninstalled ${channel.describe()}`);
  return channel;
}
