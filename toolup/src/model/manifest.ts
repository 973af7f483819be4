import type { SemVer } from "semver";
import type { Channel } from "./channel.js";
import type { UserChannel } from "./user-channel.js";
import { comparePrecedence, sameVersion } from "./version.js";

export const MANIFEST_VERSION = "1.0.0";

const NIGHTLY_PREFIX = "nightly-";

/** Highest-precedence channel; on ties the later one wins. */
function maxByPrecedence(channels: Channel[]): Channel | undefined {
  let best: Channel | undefined;
  for (const c of channels) {
    if (!best || comparePrecedence(c.name, best.name) >= 0) best = c;
  }
  return best;
}

/**
 * Ordered catalog of channels. The published (upstream) catalog and the
 * record of what is installed locally are both Manifests.
 *
 * Invariants: channel names are unique, and at most one channel carries the
 * `stable` alias once `addChannel` has run.
 */
export class Manifest {
  private channels: Channel[];

  constructor(
    public manifestVersion: string,
    /** Generation time, unix seconds. */
    public date: number,
    channels: Channel[] = [],
  ) {
    this.channels = [...channels];
  }

  static empty(now: Date = new Date()): Manifest {
    return new Manifest(MANIFEST_VERSION, Math.floor(now.getTime() / 1000));
  }

  getChannels(): Channel[] {
    return [...this.channels];
  }

  getLatestStable(): Channel | undefined {
    const explicit = this.channels.find((c) => c.alias?.kind === "stable");
    if (explicit) return explicit;
    return maxByPrecedence(this.channels.filter((c) => c.isStable()));
  }

  getLatestNightly(): Channel | undefined {
    const current = this.channels.find((c) => c.isLatestNightly());
    if (current) return current;
    return maxByPrecedence(this.channels.filter((c) => c.isNightly()));
  }

  getNamedNightly(tag: string): Channel | undefined {
    return this.channels.find((c) => c.alias?.kind === "nightly" && c.alias.tag === tag);
  }

  getChannelByName(version: SemVer): Channel | undefined {
    return this.channels.find((c) => sameVersion(c.name, version));
  }

  getNamedTag(tag: string): Channel | undefined {
    return this.channels.find((c) => c.alias?.kind === "tag" && c.alias.name === tag);
  }

  getChannel(request: UserChannel): Channel | undefined {
    switch (request.kind) {
      case "stable":
        return this.getLatestStable();
      case "nightly":
        return this.getLatestNightly();
      case "version":
        return this.getChannelByName(request.version);
      case "other":
        return request.name.startsWith(NIGHTLY_PREFIX)
          ? this.getNamedNightly(request.name.slice(NIGHTLY_PREFIX.length))
          : this.getNamedTag(request.name);
    }
  }

  /** True when `candidate` is at least as recent as every stable-eligible channel. */
  isLatestStable(candidate: Channel): boolean {
    return this.channels.filter((c) => c.isStable()).every((c) => comparePrecedence(candidate.name, c.name) >= 0);
  }

  /**
   * Inserts or replaces (by name) a channel. When it is the new latest
   * stable, every other channel loses its `stable` alias first.
   */
  addChannel(channel: Channel): void {
    const strip = this.isLatestStable(channel)
      ? this.channels.filter((c) => c.alias?.kind === "stable" && !sameVersion(c.name, channel.name))
      : [];
    for (const c of strip) c.alias = undefined;

    this.channels = this.channels.filter((c) => !sameVersion(c.name, channel.name));
    this.channels.push(channel);
  }

  removeChannel(version: SemVer): void {
    this.channels = this.channels.filter((c) => !sameVersion(c.name, version));
  }
}
