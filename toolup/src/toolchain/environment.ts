import { ToolupError } from "../errors.js";
import type { Channel } from "../model/channel.js";
import { installedArtifact, type AliasStep, type Component } from "../model/component.js";
import type { Reporter } from "../report/reporter.js";

/** Which view of the channel a resolution came from. */
export type Origin = "active" | "installed";

export type Resolution =
  | { kind: "alias"; name: string; component: Component; steps: AliasStep[]; origin: Origin }
  | { kind: "component"; component: Component; origin: Origin };

/**
 * Resolves user tokens against the active toolchain, falling back to the full
 * installed channel with a warning.
 *
 * `active` is the (possibly component-restricted) selection in effect. Without
 * one, the installed channel is the active view and no fallback ever warns.
 */
export class ToolchainEnvironment {
  constructor(
    readonly installed: Channel,
    private readonly active: Channel | undefined,
    private readonly reporter: Reporter,
  ) {}

  activeChannel(): Channel {
    return this.active ?? this.installed;
  }

  private channelFor(origin: Origin): Channel {
    return origin === "active" ? this.activeChannel() : this.installed;
  }

  private static aliasOwner(channel: Channel, token: string): Component | undefined {
    return channel.components.find((c) => Object.hasOwn(c.aliases, token));
  }

  resolve(token: string): Resolution {
    const active = this.activeChannel();

    const activeOwner = ToolchainEnvironment.aliasOwner(active, token);
    if (activeOwner) {
      return { kind: "alias", name: token, component: activeOwner, steps: activeOwner.aliases[token], origin: "active" };
    }

    const installedOwner = ToolchainEnvironment.aliasOwner(this.installed, token);
    if (installedOwner) {
      this.reporter.warn(
        "ALIAS_NOT_ACTIVE",
        `${token} is an alias from component ${installedOwner.name}, which is installed but is not part of the current active toolchain.`,
      );
      return {
        kind: "alias",
        name: token,
        component: installedOwner,
        steps: installedOwner.aliases[token],
        origin: "installed",
      };
    }

    const activeComponent = active.getComponent(token);
    if (activeComponent) return { kind: "component", component: activeComponent, origin: "active" };

    const installedComponent = this.installed.getComponent(token);
    if (installedComponent) {
      this.reporter.warn(
        "COMPONENT_NOT_ACTIVE",
        `${installedComponent.name} is installed, but it is not part of the current active toolchain.`,
      );
      return { kind: "component", component: installedComponent, origin: "installed" };
    }

    throw new ToolupError("UNKNOWN_ARGUMENT", `failed to resolve '${token}': neither a known alias nor a component`, {
      help: this.helpListing(),
    });
  }

  /**
   * Component referenced by one pipeline step. Looks in the channel the
   * pipeline came from first, then in the other one with a warning.
   */
  resolveComponentForStep(name: string, preferred: Origin): { component: Component; origin: Origin } {
    const primary = this.channelFor(preferred).getComponent(name);
    if (primary) return { component: primary, origin: preferred };

    const fallbackOrigin: Origin = preferred === "active" ? "installed" : "active";
    const fallback = this.channelFor(fallbackOrigin).getComponent(name);
    if (fallback) {
      this.reporter.warn(
        "STEP_FALLBACK",
        fallbackOrigin === "installed"
          ? `${name} is not part of the current active toolchain, using the one from the installed channel.`
          : `${name} is not part of the installed channel, using the one from the current active toolchain.`,
      );
      return { component: fallback, origin: fallbackOrigin };
    }

    throw new ToolupError("COMPONENT_UNAVAILABLE", `component ${name} is not available in the current toolchain`);
  }

  /** Aliases, executables and libraries of the active view, one section each. */
  helpListing(): string {
    const channel = this.activeChannel();
    const aliases = [...channel.getAliases().keys()].sort();
    const executables = channel.components.filter((c) => installedArtifact(c).kind === "executable");
    const libraries = channel.components.filter((c) => installedArtifact(c).kind === "library");

    const lines = ["Available aliases:", ...aliases.map((a) => `  ${a}`), "", "Available components:"];
    for (const c of executables) {
      const init = c.initialization.length > 0 ? ` (requires init: \`toolup run ${c.name} ${c.initialization.join(" ")}\`)` : "";
      lines.push(`  ${c.name}${init}`);
    }
    lines.push("", "Available libraries:", ...libraries.map((c) => `  ${installedArtifact(c).file}`));
    return lines.join("\n");
  }
}
