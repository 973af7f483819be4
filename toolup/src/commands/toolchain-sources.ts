import type { ToolupContext } from "../lifecycle/context.js";
import type { Manifest } from "../model/manifest.js";
import type { Channel } from "../model/channel.js";
import { currentToolchain, type CurrentToolchain, type ToolchainSources } from "../toolchain/toolchain.js";

export function toolchainSources(ctx: ToolupContext): ToolchainSources {
  return {
    workingDirectory: ctx.workingDirectory,
    layout: ctx.layout,
    registry: ctx.registry,
    defaultComponents: ctx.config.default_components,
  };
}

export type ActiveToolchain = CurrentToolchain & {
  /** The installed channel the toolchain resolves to, when there is one. */
  installed?: Channel;
};

export async function activeToolchain(ctx: ToolupContext, local: Manifest): Promise<ActiveToolchain> {
  const current = await currentToolchain(toolchainSources(ctx));
  return { ...current, installed: local.getChannel(current.toolchain.channel) };
}
