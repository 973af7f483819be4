import { resolveHome } from "../config/loader.js";
import { pointsAt } from "../lifecycle/pointers.js";
import { formatChannelAlias } from "../model/channel.js";
import { formatUserChannel } from "../model/user-channel.js";
import { formatVersion } from "../model/version.js";
import { describeJustification } from "../toolchain/toolchain.js";
import type { Session } from "./context.js";
import { activeToolchain } from "./toolchain-sources.js";

export type ActiveToolchainResult = {
  channel: string;
  components: string[];
  justification: string;
  /** Installed version the channel resolves to. */
  installed?: string;
};

export async function showActiveToolchain(session: Session): Promise<ActiveToolchainResult> {
  const { toolchain, justification, installed } = await activeToolchain(session.ctx, session.local);
  return {
    channel: formatUserChannel(toolchain.channel),
    components: toolchain.components,
    justification: describeJustification(justification),
    installed: installed && formatVersion(installed.name),
  };
}

export function showHome(opts: { home?: string; env?: NodeJS.ProcessEnv }): { home: string } {
  return { home: resolveHome(opts.home, opts.env) };
}

export type InstalledEntry = {
  name: string;
  alias?: string;
  partial: boolean;
  isDefault: boolean;
};

export async function showList(session: Session): Promise<{ toolchains: InstalledEntry[] }> {
  const { ctx, local } = session;
  const toolchains: InstalledEntry[] = [];
  for (const channel of local.getChannels()) {
    toolchains.push({
      name: formatVersion(channel.name),
      alias: channel.alias && formatChannelAlias(channel.alias),
      partial: channel.isPartial(),
      isDefault: await pointsAt(ctx.layout.defaultPointer, ctx.layout.sysroot(channel.name).root),
    });
  }
  return { toolchains };
}
