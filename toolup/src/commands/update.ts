import { update, type UpdateOutcome } from "../lifecycle/update.js";
import { parseUserChannel } from "../model/user-channel.js";
import type { PathUpdatePolicy } from "../types/config.js";
import type { Session } from "./context.js";

export async function updateCommand(
  session: Session,
  raw: string | undefined,
  opts: { pathUpdate?: PathUpdatePolicy } = {},
): Promise<{ outcomes: UpdateOutcome[] }> {
  const { ctx, local } = session;
  const target = raw === undefined ? undefined : parseUserChannel(raw);
  const outcomes = await update(ctx, target, local, { pathUpdate: opts.pathUpdate ?? ctx.config.path_update });
  return { outcomes };
}
