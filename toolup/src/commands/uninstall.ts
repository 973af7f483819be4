import { uninstall } from "../lifecycle/uninstall.js";
import { parseUserChannel } from "../model/user-channel.js";
import { formatVersion } from "../model/version.js";
import type { Session } from "./context.js";

export async function uninstallCommand(session: Session, raw: string): Promise<{ channel: string }> {
  const removed = await uninstall(session.ctx, parseUserChannel(raw), session.local);
  return { channel: formatVersion(removed.name) };
}
