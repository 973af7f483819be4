import { ToolupError } from "../errors.js";
import { install } from "../lifecycle/install.js";
import type { ToolupContext } from "../lifecycle/context.js";
import { describeMotive, type Channel } from "../model/channel.js";
import { parseUserChannel, type UserChannel } from "../model/user-channel.js";
import { formatVersion, sameVersion } from "../model/version.js";
import { currentToolchain } from "../toolchain/toolchain.js";
import { toolchainSources } from "./toolchain-sources.js";
import type { Session } from "./context.js";

export type InstallCommandResult = { channel: string; components: string[] };

export function upstreamChannel(ctx: ToolupContext, request: UserChannel, raw: string): Channel {
  const channel = ctx.upstream.getChannel(request);
  if (!channel) throw new ToolupError("CHANNEL_NOT_FOUND", `channel '${raw}' doesn't exist or is unavailable`);
  return channel;
}

/**
 * What to install for `channel`: the subset named by a project toolchain file
 * when that file selects this very channel, else the whole channel.
 */
export async function selectForInstall(ctx: ToolupContext, channel: Channel): Promise<Channel> {
  const { toolchain, justification } = await currentToolchain(toolchainSources(ctx));
  if (justification.kind !== "project-file" || toolchain.components.length === 0) return channel;

  const selected = ctx.upstream.getChannel(toolchain.channel);
  if (!selected || !sameVersion(selected.name, channel.name)) return channel;

  const subset = channel.createSubset(toolchain.components);
  if (!subset) return channel;
  for (const { name, motives } of subset.missing) {
    ctx.reporter.warn(
      "COMPONENT_MISSING_UPSTREAM",
      `${name}, which ${motives.map(describeMotive).join(" and ")}, is missing in ${channel.describe()} and will be ignored`,
      { path: justification.path },
    );
  }
  return subset.channel;
}

export async function installCommand(session: Session, raw: string): Promise<InstallCommandResult> {
  const { ctx, local } = session;
  const channel = upstreamChannel(ctx, parseUserChannel(raw), raw);
  const saved = await install(ctx, await selectForInstall(ctx, channel), local);
  return { channel: formatVersion(saved.name), components: saved.components.map((c) => c.name) };
}
