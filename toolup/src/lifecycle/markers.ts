import { readFile, rename, writeFile } from "node:fs/promises";
import fs from "node:fs";
import { ToolupError, errnoCode, errorMessage } from "../errors.js";
import { decodeChannel, encodeChannel } from "../model/codec.js";
import type { Channel } from "../model/channel.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { atomicWriteJson } from "../fs/atomic-write.js";
import type { SysrootLayout } from "./layout.js";

/**
 * On-disk install progress of one sysroot.
 *
 * - `in-progress`: the progress log exists and lists the components finished so far.
 * - `complete`: the log was renamed to the completion marker.
 */
export type InstallState =
  | { kind: "not-started" }
  | { kind: "in-progress"; completed: string[] }
  | { kind: "complete"; completed: string[] };

function markerLines(raw: string): string[] {
  return raw
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

async function readLines(file: string): Promise<string[] | undefined> {
  try {
    return markerLines(await readFile(file, "utf8"));
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return undefined;
    throw e;
  }
}

/** The completion marker wins over a stale progress log. */
export async function readInstallState(sysroot: SysrootLayout): Promise<InstallState> {
  const complete = await readLines(sysroot.completionMarker);
  if (complete) return { kind: "complete", completed: complete };
  const progress = await readLines(sysroot.progressLog);
  if (progress) return { kind: "in-progress", completed: progress };
  return { kind: "not-started" };
}

/** Rewrites the current marker file with `completed`. No-op when no marker exists. */
export async function rewriteMarker(sysroot: SysrootLayout, state: InstallState, completed: string[]): Promise<void> {
  if (state.kind === "not-started") return;
  const file = state.kind === "complete" ? sysroot.completionMarker : sysroot.progressLog;
  await writeFile(file, completed.map((c) => `${c}\n`).join(""), "utf8");
}

/**
 * Turns a finished install back into an in-progress one, keeping the list of
 * installed components, so the install script can run again.
 */
export async function demoteCompletion(sysroot: SysrootLayout): Promise<void> {
  if (!fs.existsSync(sysroot.completionMarker)) return;
  await rename(sysroot.completionMarker, sysroot.progressLog);
}

export async function writeSnapshot(sysroot: SysrootLayout, channel: Channel): Promise<void> {
  await atomicWriteJson(sysroot.snapshot, encodeChannel(channel));
}

/** The channel exactly as it was installed into `sysroot`. */
export async function readSnapshot(registry: SchemaRegistry, sysroot: SysrootLayout): Promise<Channel> {
  let raw: string;
  try {
    raw = await readFile(sysroot.snapshot, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      throw new ToolupError("SNAPSHOT_MISSING", `no channel snapshot at ${sysroot.snapshot}`, {
        path: sysroot.snapshot,
      });
    }
    throw e;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ToolupError("SNAPSHOT_INVALID", `${sysroot.snapshot}: ${errorMessage(e)}`);
  }
  const channelJson = registry.parse("channel", json, "SNAPSHOT_INVALID", sysroot.snapshot);
  try {
    return decodeChannel(channelJson);
  } catch (e) {
    throw new ToolupError("SNAPSHOT_INVALID", `${sysroot.snapshot}: ${errorMessage(e)}`);
  }
}
