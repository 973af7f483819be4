import type { ToolchainEnvironment } from "../toolchain/environment.js";

export const TOOLUP_VERSION = "0.1.0";

const USAGE = "Usage: toolup run <ALIAS|COMPONENT> [ARGS...]";

const HELP_SECTION = [
  "Help:",
  "  help                   Print this help message",
  "  help toolchain         Print the aliases and components of the current toolchain *",
  "  help <COMPONENT>       Print <COMPONENT>'s help message *",
  "  --version              Print the toolup and toolchain versions",
  "",
  "*: These commands install the current toolchain if it is not installed.",
];

/** `toolup run help`: needs no installed toolchain. */
export function defaultHelp(): string[] {
  return [USAGE, "", ...HELP_SECTION];
}

/** `toolup run help toolchain`: what the active toolchain can run. */
export function toolchainHelp(env: ToolchainEnvironment): string[] {
  return [USAGE, "", ...env.helpListing().split("\n"), "", ...HELP_SECTION];
}

export function versionReport(toolchainVersion: string | undefined, nodeVersion: string = process.version): string[] {
  return [
    `toolup version: ${TOOLUP_VERSION}`,
    `active toolchain version: ${toolchainVersion ?? "unknown"}`,
    `node version: ${nodeVersion}`,
  ];
}
