import { ToolupError } from "../errors.js";
import { readInstallState } from "../lifecycle/markers.js";
import { formatUserChannel, parseUserChannel } from "../model/user-channel.js";
import { writeToolchainFile } from "../toolchain/toolchain.js";
import type { Session } from "./context.js";

/** Pins the working directory to an installed channel and the components it has. */
export async function setCommand(session: Session, raw: string): Promise<{ path: string; components: string[] }> {
  const { ctx, local } = session;
  const request = parseUserChannel(raw);
  const channel = local.getChannel(request);
  if (!channel) {
    throw new ToolupError("NOT_INSTALLED", `channel '${raw}' is not installed; try \`toolup install ${raw}\``);
  }
  const state = await readInstallState(ctx.layout.sysroot(channel.name));
  if (state.kind !== "complete") {
    throw new ToolupError("NOT_INSTALLED", `the installation of ${channel.describe()} is not complete`);
  }

  const file = await writeToolchainFile(ctx.workingDirectory, { channel: request, components: state.completed });
  ctx.reporter.info("TOOLCHAIN_SET", `Set ${formatUserChannel(request)} as the toolchain for ${ctx.workingDirectory}`, {
    path: file,
  });
  return { path: file, components: state.completed };
}
