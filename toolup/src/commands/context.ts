import { ProcessBuildTool, type BuildTool } from "../build/build-tool.js";
import { resolveConfig } from "../config/validator.js";
import { ToolupError, errorMessage, type ErrorCode } from "../errors.js";
import { GitOperations } from "../git/operations.js";
import { LiveChangeProbe, type ChangeProbe } from "../lifecycle/change-probe.js";
import type { ToolupContext } from "../lifecycle/context.js";
import { HomeLayout } from "../lifecycle/layout.js";
import { LocalManifestStore } from "../manifest/local-store.js";
import { loadManifest, type FetchLike } from "../manifest/source.js";
import type { Manifest } from "../model/manifest.js";
import { Reporter } from "../report/reporter.js";
import { createRegistry } from "../schema/registry.js";

export type CommandError = {
  code: ErrorCode | "INTERNAL";
  message: string;
  details?: Record<string, unknown>;
};

export type CommandResult<T extends object> = ({ ok: true } & T) | { ok: false; error: CommandError };

/** Runs a command body, turning thrown errors into a failed result. */
export async function toResult<T extends object>(body: () => Promise<T>): Promise<CommandResult<T>> {
  try {
    return Object.assign({ ok: true as const }, await body());
  } catch (e) {
    if (e instanceof ToolupError) {
      return { ok: false, error: { code: e.code, message: e.message, details: e.details } };
    }
    return { ok: false, error: { code: "INTERNAL", message: errorMessage(e) } };
  }
}

export type ContextOptions = {
  home?: string;
  /** Overrides `manifest_uri` from the config. */
  manifestUri?: string;
  workingDirectory?: string;
  env?: NodeJS.ProcessEnv;
  reporter?: Reporter;
  fetchImpl?: FetchLike;
  buildTool?: BuildTool;
  probe?: ChangeProbe;
};

export type Session = { ctx: ToolupContext; local: Manifest };

/** Loads config, the upstream manifest and the local manifest for one command. */
export async function openSession(opts: ContextOptions = {}): Promise<Session> {
  const env = opts.env ?? process.env;
  const registry = await createRegistry();
  const loaded = resolveConfig(registry, { home: opts.home, env });
  const config = { ...loaded, manifest_uri: opts.manifestUri ?? loaded.manifest_uri };
  const reporter = opts.reporter ?? new Reporter();
  const layout = new HomeLayout(config.home);
  const store = new LocalManifestStore(layout.localManifestPath, registry);

  const upstream = await loadManifest(registry, config.manifest_uri, opts.fetchImpl);
  const local = await store.load();

  const ctx: ToolupContext = {
    config,
    layout,
    workingDirectory: opts.workingDirectory ?? process.cwd(),
    env,
    registry,
    upstream,
    store,
    reporter,
    buildTool: opts.buildTool ?? new ProcessBuildTool(config.build_tool),
    probe: opts.probe ?? new LiveChangeProbe(new GitOperations(), reporter),
  };
  return { ctx, local };
}
