import type { SemVer } from "semver";
import { formatVersion, sameVersion } from "./version.js";
import { cloneComponent, componentsEqual, type AliasStep, type Component } from "./component.js";

/**
 * Human label on a channel. Wire forms: `stable`, `nightly`, `nightly-<tag>`,
 * anything else is a custom tag.
 */
export type ChannelAlias = { kind: "stable" } | { kind: "nightly"; tag?: string } | { kind: "tag"; name: string };

export type ChannelTag = "partial";

const NIGHTLY_PREFIX = "nightly-";

export function parseChannelAlias(raw: string): ChannelAlias {
  if (raw === "stable") return { kind: "stable" };
  if (raw === "nightly") return { kind: "nightly" };
  if (raw.startsWith(NIGHTLY_PREFIX)) return { kind: "nightly", tag: raw.slice(NIGHTLY_PREFIX.length) };
  return { kind: "tag", name: raw };
}

export function formatChannelAlias(alias: ChannelAlias): string {
  switch (alias.kind) {
    case "stable":
      return "stable";
    case "nightly":
      return alias.tag === undefined ? "nightly" : `${NIGHTLY_PREFIX}${alias.tag}`;
    case "tag":
      return alias.name;
  }
}

export type InstallationMotive = { kind: "selected" } | { kind: "dependency"; of: string };

export type MissingComponent = { name: string; motives: InstallationMotive[] };

export function describeMotive(m: InstallationMotive): string {
  return m.kind === "selected" ? "was explicitly selected for installation" : `is a dependency of component ${m.of}`;
}

export class Channel {
  constructor(
    public name: SemVer,
    public components: Component[],
    public alias?: ChannelAlias,
    public tags: ChannelTag[] = [],
  ) {}

  /** Channels without an alias count as stable releases. */
  isStable(): boolean {
    return this.alias === undefined || this.alias.kind === "stable";
  }

  isNightly(): boolean {
    return this.alias?.kind === "nightly";
  }

  isLatestNightly(): boolean {
    return this.alias?.kind === "nightly" && this.alias.tag === undefined;
  }

  isPartial(): boolean {
    return this.tags.includes("partial");
  }

  getComponent(name: string): Component | undefined {
    return this.components.find((c) => c.name === name);
  }

  /** Every alias declared by the channel's components, with the component declaring it. */
  getAliases(): Map<string, { component: string; steps: AliasStep[] }> {
    const out = new Map<string, { component: string; steps: AliasStep[] }>();
    for (const c of this.components) {
      for (const [alias, steps] of Object.entries(c.aliases)) {
        out.set(alias, { component: c.name, steps });
      }
    }
    return out;
  }

  clone(): Channel {
    return new Channel(
      this.name,
      this.components.map(cloneComponent),
      this.alias ? { ...this.alias } : undefined,
      [...this.tags],
    );
  }

  /**
   * Partial channel holding `names` and their direct requirements.
   * Requirements are not followed transitively.
   */
  createSubset(names: string[]): { channel: Channel; missing: MissingComponent[] } | undefined {
    if (names.length === 0) return undefined;

    const picked: Component[] = [];
    const missing = new Map<string, InstallationMotive[]>();
    const pick = (c: Component) => {
      if (!picked.some((p) => p.name === c.name)) picked.push(cloneComponent(c));
    };
    const miss = (name: string, motive: InstallationMotive) => {
      const motives = missing.get(name) ?? [];
      motives.push(motive);
      missing.set(name, motives);
    };

    for (const name of names) {
      const component = this.getComponent(name);
      if (!component) {
        miss(name, { kind: "selected" });
        continue;
      }
      pick(component);
      for (const dep of component.requires) {
        const dependency = this.getComponent(dep);
        if (dependency) pick(dependency);
        else miss(dep, { kind: "dependency", of: name });
      }
    }

    return {
      channel: new Channel(this.name, picked, this.alias ? { ...this.alias } : undefined, ["partial"]),
      missing: [...missing].map(([name, motives]) => ({ name, motives })),
    };
  }

  describe(): string {
    const name = formatVersion(this.name);
    switch (this.alias?.kind) {
      case "stable":
        return `Channel stable (${name})`;
      case "tag":
        return `Channel ${name}-${this.alias.name}`;
      case "nightly":
        return `Nightly channel ${name}${this.alias.tag === undefined ? "" : `-${this.alias.tag}`}`;
      case undefined:
        return `Channel ${name}`;
    }
  }
}

function containsEqual(haystack: Component[], needle: Component): boolean {
  return haystack.some((c) => componentsEqual(c, needle));
}

/** Same name (build metadata included) and the same component set. Alias and tags are ignored. */
export function channelsEqual(a: Channel, b: Channel): boolean {
  if (!sameVersion(a.name, b.name)) return false;
  return (
    a.components.every((c) => containsEqual(b.components, c)) &&
    b.components.every((c) => containsEqual(a.components, c))
  );
}

/**
 * Components of `next` that are new or differ from their namesake in `old`,
 * in `next`'s order. Components dropped from `next` are never reported.
 */
export function componentsToUpdate(old: Channel, next: Channel): Component[] {
  return next.components.filter((c) => {
    const previous = old.getComponent(c.name);
    return previous === undefined || !componentsEqual(previous, c);
  });
}
