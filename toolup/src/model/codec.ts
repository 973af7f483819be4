import { ToolupError } from "../errors.js";
import type { AliasStepJson, ChannelJson, ComponentJson, GitTargetJson, ManifestJson } from "../types/manifest.js";
import { DEFAULT_BRANCH, type Authority, type GitTarget } from "./authority.js";
import { Channel, formatChannelAlias, parseChannelAlias } from "./channel.js";
import { createComponent, type AliasStep, type Component, type InstalledArtifact } from "./component.js";
import { Manifest } from "./manifest.js";
import { formatVersion, parseVersion } from "./version.js";

// Decoders take schema-checked JSON (see schema/registry.ts) and enforce the
// rules a JSON Schema cannot express: semver names and the authority shape.

function invalid(message: string, details?: Record<string, unknown>): ToolupError {
  return new ToolupError("MANIFEST_INVALID", message, details);
}

function version(raw: string, where: string) {
  const v = parseVersion(raw);
  if (!v) throw invalid(`${where}: "${raw}" is not a valid semantic version`);
  return v;
}

function crateName(json: ComponentJson): string {
  if (json.crate_name === undefined) throw invalid(`component ${json.name}: missing crate_name`);
  return json.crate_name;
}

function decodeTarget(json: GitTargetJson | undefined): GitTarget {
  if (json === undefined) return { kind: "branch", name: DEFAULT_BRANCH };
  if (json.branch !== undefined) return { kind: "branch", name: json.branch, latestRevision: json.latest_revision };
  if (json.rev !== undefined) return { kind: "revision", hash: json.rev };
  if (json.tag !== undefined) return { kind: "tag", name: json.tag };
  throw invalid("git target needs one of branch, rev or tag");
}

type AuthorityProbe = (json: ComponentJson) => Authority | undefined;

const probePath: AuthorityProbe = (json) =>
  json.path === undefined
    ? undefined
    : { kind: "path", path: json.path, crateName: crateName(json), lastModification: json.last_modification };

const probeGit: AuthorityProbe = (json) =>
  json.repository_url === undefined
    ? undefined
    : {
        kind: "git",
        repositoryUrl: json.repository_url,
        crateName: crateName(json),
        target: decodeTarget(json.target),
      };

const probeRegistry: AuthorityProbe = (json) =>
  json.version === undefined
    ? undefined
    : { kind: "registry", package: json.package, version: version(json.version, `component ${json.name}`) };

/** Tried in order: the first shape that matches decides the authority. */
const AUTHORITY_PROBES: AuthorityProbe[] = [probePath, probeGit, probeRegistry];

function decodeAuthority(json: ComponentJson): Authority {
  for (const probe of AUTHORITY_PROBES) {
    const authority = probe(json);
    if (authority) return authority;
  }
  throw invalid(`component ${json.name}: expected one of path, repository_url or version`);
}

function decodeStep(json: AliasStepJson): AliasStep {
  if (json === "lib_path" || json === "var_path") return { kind: json };
  if ("resolve" in json) return { kind: "resolve", component: json.resolve };
  return { kind: "verbatim", value: json.verbatim };
}

function decodeSteps(json: AliasStepJson[], where: string): AliasStep[] {
  const steps = json.map(decodeStep);
  steps.forEach((step, i) => {
    if (step.kind === "var_path" && steps[i + 1]?.kind !== "verbatim") {
      throw invalid(`${where}: var_path must be followed by a verbatim file name`);
    }
  });
  return steps;
}

function decodeArtifact(json: ComponentJson): InstalledArtifact | undefined {
  if (json.installed_library !== undefined) return { kind: "library", file: json.installed_library };
  const executable = json.installed_executable ?? json.installed_file;
  return executable === undefined ? undefined : { kind: "executable", file: executable };
}

export function decodeComponent(json: ComponentJson): Component {
  const aliases: Record<string, AliasStep[]> = {};
  for (const [alias, steps] of Object.entries(json.aliases ?? {})) {
    aliases[alias] = decodeSteps(steps, `component ${json.name}, alias ${alias}`);
  }
  return createComponent(json.name, decodeAuthority(json), {
    features: json.features,
    requires: json.requires,
    toolchainSelector: json.rustup_channel,
    artifact: decodeArtifact(json),
    aliases,
    callFormat: json.call_format && decodeSteps(json.call_format, `component ${json.name}, call_format`),
    initialization: json.initialization,
    initialized: json.initialized,
  });
}

export function decodeChannel(json: ChannelJson): Channel {
  const names = new Set<string>();
  for (const c of json.components) {
    if (names.has(c.name)) throw invalid(`channel ${json.name}: duplicate component ${c.name}`);
    names.add(c.name);
  }
  return new Channel(
    version(json.name, "channel name"),
    json.components.map(decodeComponent),
    json.alias === undefined ? undefined : parseChannelAlias(json.alias),
    json.tags ?? [],
  );
}

export function decodeManifest(json: ManifestJson): Manifest {
  // Duplicate names collapse the way addChannel would: the later entry wins
  // and takes the later position.
  const channels = new Map<string, Channel>();
  for (const c of json.channels.map(decodeChannel)) {
    const key = formatVersion(c.name);
    channels.delete(key);
    channels.set(key, c);
  }
  return new Manifest(json.manifest_version, json.date, [...channels.values()]);
}

function encodeTarget(target: GitTarget): GitTargetJson {
  switch (target.kind) {
    case "branch":
      return target.latestRevision === undefined
        ? { branch: target.name }
        : { branch: target.name, latest_revision: target.latestRevision };
    case "revision":
      return { rev: target.hash };
    case "tag":
      return { tag: target.name };
  }
}

type AuthorityJson = Pick<
  ComponentJson,
  "version" | "package" | "repository_url" | "crate_name" | "target" | "path" | "last_modification"
>;

function encodeAuthority(authority: Authority): AuthorityJson {
  switch (authority.kind) {
    case "registry":
      return { version: formatVersion(authority.version), package: authority.package };
    case "git":
      return {
        repository_url: authority.repositoryUrl,
        crate_name: authority.crateName,
        target: encodeTarget(authority.target),
      };
    case "path":
      return {
        path: authority.path,
        crate_name: authority.crateName,
        last_modification: authority.lastModification,
      };
  }
}

function encodeStep(step: AliasStep): AliasStepJson {
  switch (step.kind) {
    case "resolve":
      return { resolve: step.component };
    case "verbatim":
      return { verbatim: step.value };
    default:
      return step.kind;
  }
}

export function encodeComponent(c: Component): ComponentJson {
  const aliases: Record<string, AliasStepJson[]> = {};
  for (const [alias, steps] of Object.entries(c.aliases)) aliases[alias] = steps.map(encodeStep);
  const isDefaultCallFormat =
    c.callFormat.length === 1 && c.callFormat[0].kind === "resolve" && c.callFormat[0].component === c.name;

  // Undefined members are dropped by JSON.stringify.
  return {
    name: c.name,
    ...encodeAuthority(c.authority),
    features: c.features.length > 0 ? [...c.features] : undefined,
    requires: c.requires.length > 0 ? [...c.requires] : undefined,
    rustup_channel: c.toolchainSelector,
    installed_file: c.artifact?.kind === "executable" ? c.artifact.file : undefined,
    installed_library: c.artifact?.kind === "library" ? c.artifact.file : undefined,
    aliases: Object.keys(aliases).length > 0 ? aliases : undefined,
    call_format: isDefaultCallFormat ? undefined : c.callFormat.map(encodeStep),
    initialization: c.initialization.length > 0 ? [...c.initialization] : undefined,
    initialized: c.initialized,
  };
}

export function encodeChannel(channel: Channel): ChannelJson {
  return {
    name: formatVersion(channel.name),
    alias: channel.alias ? formatChannelAlias(channel.alias) : undefined,
    tags: channel.tags.length > 0 ? [...channel.tags] : undefined,
    components: channel.components.map(encodeComponent),
  };
}

export function encodeManifest(manifest: Manifest): ManifestJson {
  return {
    manifest_version: manifest.manifestVersion,
    date: manifest.date,
    channels: manifest.getChannels().map(encodeChannel),
  };
}
