import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ToolupError, errorMessage } from "../errors.js";
import type { Channel } from "../model/channel.js";
import { formatUserChannel, parseUserChannel, type UserChannel } from "../model/user-channel.js";
import type { HomeLayout } from "../lifecycle/layout.js";
import { readPointer } from "../lifecycle/pointers.js";
import { atomicWriteFile } from "../fs/atomic-write.js";
import type { SchemaRegistry } from "../schema/registry.js";

export const TOOLCHAIN_FILE = "toolup-toolchain.yaml";

/** The active selection: a channel and the components in use (empty means all of them). */
export type Toolchain = {
  channel: UserChannel;
  components: string[];
};

/** Where the active toolchain came from. */
export type ToolchainJustification =
  | { kind: "project-file"; path: string }
  | { kind: "system-default"; pointer: string }
  | { kind: "built-in" };

export type CurrentToolchain = { toolchain: Toolchain; justification: ToolchainJustification };

export type ToolchainSources = {
  workingDirectory: string;
  layout: HomeLayout;
  registry: SchemaRegistry;
  defaultComponents: string[];
};

function readToolchainFile(registry: SchemaRegistry, file: string): Toolchain {
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new ToolupError("TOOLCHAIN_FILE_INVALID", `${file}: ${errorMessage(e)}`, { path: file });
  }
  const json = registry.parse("toolchain-file", parsed, "TOOLCHAIN_FILE_INVALID", file);
  return {
    channel: parseUserChannel(json.toolchain.channel),
    components: json.toolchain.components ?? [],
  };
}

/**
 * Project file in the working directory, then the `toolchains/default`
 * pointer, then stable with the configured default components.
 */
export async function currentToolchain(sources: ToolchainSources): Promise<CurrentToolchain> {
  const file = path.join(sources.workingDirectory, TOOLCHAIN_FILE);
  if (fs.existsSync(file)) {
    return { toolchain: readToolchainFile(sources.registry, file), justification: { kind: "project-file", path: file } };
  }

  const target = await readPointer(sources.layout.defaultPointer);
  if (target !== undefined) {
    // The pointer names either a version directory or the `stable` pointer.
    return {
      toolchain: { channel: parseUserChannel(path.basename(target)), components: [...sources.defaultComponents] },
      justification: { kind: "system-default", pointer: sources.layout.defaultPointer },
    };
  }

  return {
    toolchain: { channel: { kind: "stable" }, components: [...sources.defaultComponents] },
    justification: { kind: "built-in" },
  };
}

export function describeJustification(j: ToolchainJustification): string {
  switch (j.kind) {
    case "project-file":
      return `set by ${j.path}`;
    case "system-default":
      return `default set by ${j.pointer}`;
    case "built-in":
      return "built-in default";
  }
}

/** The view of `installed` restricted to the toolchain's components, if it names any. */
export function activeSelection(installed: Channel, toolchain: Toolchain): Channel | undefined {
  return installed.createSubset(toolchain.components)?.channel;
}

export async function writeToolchainFile(dir: string, toolchain: Toolchain): Promise<string> {
  const file = path.join(dir, TOOLCHAIN_FILE);
  const doc = { toolchain: { channel: formatUserChannel(toolchain.channel), components: toolchain.components } };
  await atomicWriteFile(file, YAML.stringify(doc));
  return file;
}
