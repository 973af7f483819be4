import { mkdir } from "node:fs/promises";
import { ToolupError } from "../errors.js";
import { install } from "../lifecycle/install.js";
import { readPointer } from "../lifecycle/pointers.js";
import { formatVersion } from "../model/version.js";
import type { Session } from "./context.js";

export type InitResult = { home: string; installed?: string };

/** Creates the home layout and installs upstream stable unless a stable toolchain is present. */
export async function init(session: Session): Promise<InitResult> {
  const { ctx, local } = session;
  await mkdir(ctx.layout.toolchainsDir, { recursive: true });

  let installed: string | undefined;
  if ((await readPointer(ctx.layout.stablePointer)) === undefined) {
    const stable = ctx.upstream.getLatestStable();
    if (!stable) throw new ToolupError("CHANNEL_NOT_FOUND", "the upstream manifest has no stable channel");
    ctx.reporter.info("INIT_STABLE", "About to install the stable toolchain");
    installed = formatVersion((await install(ctx, stable, local)).name);
  }

  ctx.reporter.info("INIT_DONE", `toolup was successfully initialized in ${ctx.layout.home}`);
  return { home: ctx.layout.home, installed };
}
