import fs from "node:fs";
import { ToolupError } from "../errors.js";
import { install } from "../lifecycle/install.js";
import type { ToolupContext } from "../lifecycle/context.js";
import { syncOptPointer } from "../lifecycle/pointers.js";
import type { Channel } from "../model/channel.js";
import type { Manifest } from "../model/manifest.js";
import { formatUserChannel } from "../model/user-channel.js";
import { formatVersion } from "../model/version.js";
import { ToolchainEnvironment } from "../toolchain/environment.js";
import { expandResolution, toolEnvironment } from "../toolchain/pipeline.js";
import { activeSelection } from "../toolchain/toolchain.js";
import type { Session } from "./context.js";
import { defaultHelp, toolchainHelp, versionReport } from "./help.js";
import { selectForInstall, upstreamChannel } from "./install.js";
import { activeToolchain } from "./toolchain-sources.js";

/** The installed channel of the current toolchain, installing it first when needed. */
async function ensureInstalled(ctx: ToolupContext, local: Manifest): Promise<{ installed: Channel; active?: Channel }> {
  const { toolchain, installed } = await activeToolchain(ctx, local);
  if (installed && fs.existsSync(ctx.layout.sysroot(installed.name).completionMarker)) {
    return { installed, active: activeSelection(installed, toolchain) };
  }

  const raw = formatUserChannel(toolchain.channel);
  ctx.reporter.info("AUTO_INSTALL", `The current toolchain (${raw}) is not installed; installing it`);
  const channel = upstreamChannel(ctx, toolchain.channel, raw);
  const saved = await install(ctx, await selectForInstall(ctx, channel), local);
  return { installed: saved, active: activeSelection(saved, toolchain) };
}

export type RunRequest =
  | { kind: "help" }
  | { kind: "help-toolchain" }
  | { kind: "help-component"; token: string }
  | { kind: "version" }
  | { kind: "tool"; token: string; args: string[] };

/** `help`, `help toolchain`, `help <token>` and `--version` are handled by toolup itself. */
export function parseRunRequest(token: string, args: string[]): RunRequest {
  if (token === "--version") return { kind: "version" };
  if (token !== "help") return { kind: "tool", token, args };
  const [topic] = args;
  if (topic === undefined) return { kind: "help" };
  if (topic === "toolchain") return { kind: "help-toolchain" };
  return { kind: "help-component", token: topic };
}

export type RunOutcome = {
  exitCode: number;
  /** Text printed by toolup rather than by a tool. */
  output?: string[];
};

/** Upstream version of the current toolchain's channel, or undefined when it cannot be determined. */
async function currentToolchainVersion(ctx: ToolupContext, local: Manifest): Promise<string | undefined> {
  try {
    const { toolchain } = await activeToolchain(ctx, local);
    const channel = ctx.upstream.getChannel(toolchain.channel);
    return channel && formatVersion(channel.name);
  } catch (e) {
    if (!(e instanceof ToolupError)) throw e;
    ctx.reporter.warn(e.code, `could not determine the active toolchain: ${e.message}`);
    return undefined;
  }
}

/**
 * Runs `token` from the current toolchain with `args` appended. Help and
 * version requests print text instead; all but plain `help` and `--version`
 * install the current toolchain first when it is missing.
 */
export async function runTool(session: Session, token: string, args: string[]): Promise<RunOutcome> {
  const { ctx, local } = session;
  const request = parseRunRequest(token, args);
  if (request.kind === "help") return { exitCode: 0, output: defaultHelp() };
  if (request.kind === "version") {
    return { exitCode: 0, output: versionReport(await currentToolchainVersion(ctx, local)) };
  }

  const { installed, active } = await ensureInstalled(ctx, local);
  const env = new ToolchainEnvironment(installed, active, ctx.reporter);
  if (request.kind === "help-toolchain") return { exitCode: 0, output: toolchainHelp(env) };

  const sysroot = ctx.layout.sysroot(installed.name);
  const invocation =
    request.kind === "tool"
      ? expandResolution(env.resolve(request.token), env, sysroot, request.args)
      : expandResolution(env.resolve(request.token), env, sysroot, ["--help"]);
  const { exitCode } = await ctx.buildTool.runCommand([invocation.command, ...invocation.args], {
    env: toolEnvironment(ctx.layout.home, sysroot, ctx.env),
    cwd: ctx.workingDirectory,
  });
  if (exitCode !== 0) {
    throw new ToolupError("COMMAND_FAILED", `'toolup run ${token}' failed with status ${exitCode}`, { exitCode });
  }
  return { exitCode };
}

/** Re-aims `<home>/opt` at the active toolchain's `opt/` after a command. */
export async function syncOpt(session: Session): Promise<void> {
  const { installed } = await activeToolchain(session.ctx, session.local);
  const optDir = installed && session.ctx.layout.sysroot(installed.name).opt;
  await syncOptPointer(session.ctx.layout.optPointer, optDir);
}
