import { mkdir } from "node:fs/promises";
import { ToolupError } from "../errors.js";
import { replacePointer } from "../lifecycle/pointers.js";
import { parseUserChannel } from "../model/user-channel.js";
import type { Session } from "./context.js";

/**
 * Sets the system default toolchain. `stable` targets the stable pointer
 * itself so the default follows later stable releases.
 */
export async function overrideCommand(session: Session, raw: string): Promise<{ target: string }> {
  const { ctx, local } = session;
  const request = parseUserChannel(raw);

  let target: string;
  if (request.kind === "stable") {
    target = ctx.layout.stablePointer;
  } else {
    const channel = local.getChannel(request) ?? ctx.upstream.getChannel(request);
    if (!channel) {
      throw new ToolupError(
        "CHANNEL_NOT_FOUND",
        `failed to set ${raw} as the system default; try installing it: toolup install ${raw}`,
      );
    }
    target = ctx.layout.sysroot(channel.name).root;
  }

  await mkdir(ctx.layout.toolchainsDir, { recursive: true });
  await replacePointer(ctx.layout.defaultPointer, target);
  ctx.reporter.info("DEFAULT_SET", `Setting ${raw} as the new default toolchain`);
  return { target };
}
