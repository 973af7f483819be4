import { chmod, mkdir, writeFile } from "node:fs/promises";
import { ToolupError, errorMessage } from "../errors.js";
import { renderInstallScript } from "../build/install-script.js";
import type { Channel } from "../model/channel.js";
import type { Component } from "../model/component.js";
import type { Manifest } from "../model/manifest.js";
import { expandSteps, toolEnvironment } from "../toolchain/pipeline.js";
import { refreshAuthorities } from "./change-probe.js";
import type { ToolupContext } from "./context.js";
import type { SysrootLayout } from "./layout.js";
import { readInstallState, writeSnapshot } from "./markers.js";
import { replacePointer } from "./pointers.js";

/** Carries the `initialized` flags of a previous install of the same channel. */
function carryInitialization(channel: Channel, previous: Channel | undefined): void {
  if (!previous) return;
  for (const c of channel.components) {
    if (previous.getComponent(c.name)?.initialized) c.initialized = true;
  }
}

/**
 * Runs each pending one-time setup command through the component's call
 * format. Failures only warn; the component stays uninitialized.
 */
async function initializeComponents(ctx: ToolupContext, channel: Channel, sysroot: SysrootLayout): Promise<void> {
  const lookup = (name: string): Component => {
    const c = channel.getComponent(name);
    if (!c) throw new ToolupError("COMPONENT_UNAVAILABLE", `component ${name} is not part of ${channel.describe()}`);
    return c;
  };

  for (const component of channel.components) {
    if (component.initialization.length === 0 || component.initialized) continue;
    try {
      const argv = [...expandSteps(component.callFormat, lookup, sysroot), ...component.initialization];
      const { exitCode } = await ctx.buildTool.runCommand(argv, {
        env: toolEnvironment(ctx.layout.home, sysroot, ctx.env),
        cwd: ctx.workingDirectory,
      });
      if (exitCode === 0) {
        component.initialized = true;
      } else {
        ctx.reporter.warn("INIT_FAILED", `initialization of ${component.name} exited with status ${exitCode}`);
      }
    } catch (e) {
      ctx.reporter.warn("INIT_FAILED", `initialization of ${component.name} failed: ${errorMessage(e)}`);
    }
  }
}

/**
 * Installs `channel` into its sysroot and records it in `local`.
 *
 * Disk state moves NotStarted → InProgress → Complete through the markers the
 * install script writes. The local manifest is only saved once the script has
 * finished, so an interrupted install leaves the progress log as the record.
 *
 * Returns the channel as saved in the local manifest.
 */
export async function install(ctx: ToolupContext, channel: Channel, local: Manifest): Promise<Channel> {
  const sysroot = ctx.layout.sysroot(channel.name);
  await mkdir(ctx.layout.toolchainsDir, { recursive: true });

  if ((await readInstallState(sysroot)).kind === "complete") {
    throw new ToolupError("ALREADY_INSTALLED", `the '${channel.describe()}' toolchain is already installed`, {
      sysroot: sysroot.root,
    });
  }

  for (const dir of [sysroot.opt, sysroot.lib, sysroot.bin, sysroot.var]) {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(sysroot.script, renderInstallScript(channel, { buildTool: ctx.config.build_tool }), "utf8");
  await chmod(sysroot.script, 0o755);
  await writeSnapshot(sysroot, channel);

  ctx.reporter.info("INSTALL_START", `Installing ${channel.describe()}`, { path: sysroot.root });
  const { exitCode } = await ctx.buildTool.runInstall({
    sysroot: sysroot.root,
    scriptPath: sysroot.script,
    verbose: ctx.config.verbose,
  });
  if (exitCode !== 0) {
    throw new ToolupError("INSTALL_FAILED", `installing ${channel.describe()} failed with status ${exitCode}`, {
      exitCode,
    });
  }
  if ((await readInstallState(sysroot)).kind !== "complete") {
    throw new ToolupError(
      "INSTALL_INCOMPLETE",
      `install script for ${channel.describe()} exited without marking the installation complete`,
    );
  }

  const saved = await refreshAuthorities(channel, ctx.probe);
  if (channel.isStable() && ctx.upstream.isLatestStable(channel)) {
    await replacePointer(ctx.layout.stablePointer, sysroot.root);
    saved.alias = { kind: "stable" };
  }

  carryInitialization(saved, local.getChannelByName(channel.name));
  await initializeComponents(ctx, saved, sysroot);

  await writeSnapshot(sysroot, saved);
  local.addChannel(saved);
  await ctx.store.save(local);

  ctx.reporter.info("INSTALL_DONE", `Installed ${saved.describe()}`, { path: sysroot.root });
  return saved;
}
