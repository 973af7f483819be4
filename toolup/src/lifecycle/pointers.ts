import fs from "node:fs";
import { readlink, rename, rm, symlink } from "node:fs/promises";
import path from "node:path";
import { errnoCode } from "../errors.js";

// Pointers are symlinks: toolchains/stable, toolchains/default and <home>/opt.

/** Target of the pointer at `link`, or undefined when there is none. */
export async function readPointer(link: string): Promise<string | undefined> {
  try {
    return await readlink(link);
  } catch (e) {
    const code = errnoCode(e);
    if (code === "ENOENT" || code === "EINVAL") return undefined;
    throw e;
  }
}

/** Points `link` at `target` by renaming a fresh symlink over it. */
export async function replacePointer(link: string, target: string): Promise<void> {
  const tmp = `${link}.tmp.${process.pid}`;
  await rm(tmp, { force: true });
  await symlink(target, tmp);
  await rename(tmp, link);
}

export async function removePointer(link: string): Promise<void> {
  if ((await readPointer(link)) === undefined) return;
  await rm(link, { force: true });
}

/** Whether `link` resolves (one level, relative to its directory) to `target`. */
export async function pointsAt(link: string, target: string): Promise<boolean> {
  const current = await readPointer(link);
  if (current === undefined) return false;
  return path.resolve(path.dirname(link), current) === path.resolve(target);
}

/**
 * Keeps `<home>/opt` aimed at the active channel's `opt/`, or removes it when
 * that directory does not exist.
 */
export async function syncOptPointer(link: string, optDir: string | undefined): Promise<void> {
  if (optDir === undefined || !fs.existsSync(optDir)) {
    await removePointer(link);
    return;
  }
  if (await pointsAt(link, optDir)) return;
  await replacePointer(link, optDir);
}
