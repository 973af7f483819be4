import type { BuildTool } from "../build/build-tool.js";
import type { LocalManifestStore } from "../manifest/local-store.js";
import type { Manifest } from "../model/manifest.js";
import type { Reporter } from "../report/reporter.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ToolupConfig } from "../types/config.js";
import type { ChangeProbe } from "./change-probe.js";
import type { HomeLayout } from "./layout.js";

/**
 * Everything a lifecycle operation reads or calls out to. The local manifest
 * is passed separately because operations mutate it.
 */
export type ToolupContext = {
  config: ToolupConfig;
  layout: HomeLayout;
  workingDirectory: string;
  env: NodeJS.ProcessEnv;
  registry: SchemaRegistry;
  /** Published catalog: what exists. */
  upstream: Manifest;
  store: LocalManifestStore;
  reporter: Reporter;
  buildTool: BuildTool;
  probe: ChangeProbe;
};
