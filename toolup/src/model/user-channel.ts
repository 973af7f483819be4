import type { SemVer } from "semver";
import { formatVersion, parseVersion } from "./version.js";

/** How a user names a channel on the command line or in a toolchain file. */
export type UserChannel =
  | { kind: "version"; version: SemVer }
  | { kind: "stable" }
  | { kind: "nightly" }
  | { kind: "other"; name: string };

export function parseUserChannel(raw: string): UserChannel {
  if (raw === "stable") return { kind: "stable" };
  if (raw === "nightly") return { kind: "nightly" };
  const version = parseVersion(raw);
  if (version) return { kind: "version", version };
  return { kind: "other", name: raw };
}

export function formatUserChannel(channel: UserChannel): string {
  switch (channel.kind) {
    case "version":
      return formatVersion(channel.version);
    case "stable":
    case "nightly":
      return channel.kind;
    case "other":
      return channel.name;
  }
}
