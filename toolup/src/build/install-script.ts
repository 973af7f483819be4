import { gitTargetFlag } from "../model/authority.js";
import type { Channel } from "../model/channel.js";
import { installedArtifact, packageName, type Component } from "../model/component.js";
import { formatVersion } from "../model/version.js";
import { COMPLETION_MARKER, PROGRESS_LOG } from "../lifecycle/layout.js";

export type InstallScriptOptions = {
  /** Executable that installs packages, e.g. `cargo`. */
  buildTool: string;
};

/** POSIX single-quote quoting. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_.,:/=+-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Arguments after `install` that select the component's source. */
export function installArgs(component: Component): string[] {
  const a = component.authority;
  const args: string[] = [];
  switch (a.kind) {
    case "registry":
      args.push(packageName(component), "--version", formatVersion(a.version));
      break;
    case "git":
      args.push("--git", a.repositoryUrl, ...gitTargetFlag(a.target), a.crateName);
      break;
    case "path":
      args.push("--path", a.path);
      break;
  }
  if (component.features.length > 0) args.push("--features", component.features.join(","));
  return args;
}

function componentBlock(component: Component, tool: string): string[] {
  const artifact = installedArtifact(component);
  const dir = artifact.kind === "library" ? "lib" : "bin";
  const target = `"$SYSROOT"/${dir}/${shellQuote(artifact.file)}`;
  const selector = component.toolchainSelector ? [`+${component.toolchainSelector}`] : [];
  const command = [tool, ...selector, "install", ...installArgs(component)].map(shellQuote).join(" ");
  const env = artifact.kind === "library" ? `TOOLUP_ARTIFACT=${target} ` : "";

  return [
    `# ${component.name}`,
    `if [ -e ${target} ]; then`,
    `  echo ${shellQuote(`${component.name} is already installed, skipping`)}`,
    "else",
    `  ${env}${command} --root "$SYSROOT"`,
    "fi",
    `grep -qxF ${shellQuote(component.name)} "$PROGRESS" || echo ${shellQuote(component.name)} >> "$PROGRESS"`,
  ];
}

/**
 * Renders the script the build tool runs for `channel`. Its only contract with
 * toolup: it reads `TOOLUP_SYSROOT`, appends each finished component to the
 * progress log once (a log left by an interrupted install or update is kept)
 * and renames the log to the completion marker at the end.
 */
export function renderInstallScript(channel: Channel, opts: InstallScriptOptions): string {
  const lines = [
    "#!/bin/sh",
    `# ${channel.describe()}`,
    "set -eu",
    ': "${TOOLUP_SYSROOT:?TOOLUP_SYSROOT must be set}"',
    'SYSROOT="$TOOLUP_SYSROOT"',
    `PROGRESS="$SYSROOT/${PROGRESS_LOG}"`,
    'touch "$PROGRESS"',
    "",
  ];
  for (const component of channel.components) {
    lines.push(...componentBlock(component, opts.buildTool), "");
  }
  lines.push(`mv "$PROGRESS" "$SYSROOT/${COMPLETION_MARKER}"`);
  return lines.join("\n") + "\n";
}
