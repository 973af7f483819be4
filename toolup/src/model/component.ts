import path from "node:path";
import { authoritiesEqual, type Authority } from "./authority.js";

/** One step of an alias pipeline or a component's call format. */
export type AliasStep =
  | { kind: "resolve"; component: string }
  | { kind: "verbatim"; value: string }
  | { kind: "lib_path" }
  | { kind: "var_path" };

export type ArtifactKind = "executable" | "library";

export type InstalledArtifact = { kind: ArtifactKind; file: string };

export type Component = {
  name: string;
  authority: Authority;
  features: string[];
  requires: string[];
  /** Overrides the build tool's toolchain (`+<selector>`) for this component. */
  toolchainSelector?: string;
  artifact?: InstalledArtifact;
  aliases: Record<string, AliasStep[]>;
  callFormat: AliasStep[];
  /** Arguments of the one-time setup command, run through the component's own call format. */
  initialization: string[];
  initialized?: boolean;
};

export function createComponent(
  name: string,
  authority: Authority,
  extra: Partial<Omit<Component, "name" | "authority">> = {},
): Component {
  return {
    name,
    authority,
    features: extra.features ?? [],
    requires: extra.requires ?? [],
    toolchainSelector: extra.toolchainSelector,
    artifact: extra.artifact,
    aliases: extra.aliases ?? {},
    callFormat: extra.callFormat ?? [{ kind: "resolve", component: name }],
    initialization: extra.initialization ?? [],
    initialized: extra.initialized,
  };
}

export function installedArtifact(component: Component): InstalledArtifact {
  return component.artifact ?? { kind: "executable", file: component.name };
}

/** Absolute location of the component's artifact inside a sysroot. */
export function artifactPath(component: Component, sysroot: string): string {
  const artifact = installedArtifact(component);
  return path.join(sysroot, artifact.kind === "library" ? "lib" : "bin", artifact.file);
}

/** Name the build tool knows the component by. */
export function packageName(component: Component): string {
  const a = component.authority;
  return a.kind === "registry" ? (a.package ?? component.name) : a.crateName;
}

export function stepsEqual(a: AliasStep[], b: AliasStep[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((step, i) => {
    const other = b[i];
    switch (step.kind) {
      case "resolve":
        return other.kind === "resolve" && other.component === step.component;
      case "verbatim":
        return other.kind === "verbatim" && other.value === step.value;
      default:
        return other.kind === step.kind;
    }
  });
}

function listsEqual(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function aliasesEqual(a: Record<string, AliasStep[]>, b: Record<string, AliasStep[]>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((k) => Object.hasOwn(b, k) && stepsEqual(a[k], b[k]));
}

/** Structural equality. `initialized` is local bookkeeping and is not compared. */
export function componentsEqual(a: Component, b: Component): boolean {
  return (
    a.name === b.name &&
    authoritiesEqual(a.authority, b.authority) &&
    listsEqual(a.features, b.features) &&
    listsEqual(a.requires, b.requires) &&
    a.toolchainSelector === b.toolchainSelector &&
    a.artifact?.kind === b.artifact?.kind &&
    a.artifact?.file === b.artifact?.file &&
    aliasesEqual(a.aliases, b.aliases) &&
    stepsEqual(a.callFormat, b.callFormat) &&
    listsEqual(a.initialization, b.initialization)
  );
}

export function cloneComponent(c: Component): Component {
  const aliases: Record<string, AliasStep[]> = {};
  for (const [name, steps] of Object.entries(c.aliases)) aliases[name] = steps.map((s) => ({ ...s }));
  const authority: Authority =
    c.authority.kind === "git" ? { ...c.authority, target: { ...c.authority.target } } : { ...c.authority };
  return {
    ...c,
    authority,
    features: [...c.features],
    requires: [...c.requires],
    artifact: c.artifact ? { ...c.artifact } : undefined,
    aliases,
    callFormat: c.callFormat.map((s) => ({ ...s })),
    initialization: [...c.initialization],
  };
}
