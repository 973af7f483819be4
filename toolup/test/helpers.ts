import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BuildTool, InstallRequest, ProcessOutcome } from "../src/build/build-tool.js";
import { openSession, type Session } from "../src/commands/context.js";
import type { ChangeProbe } from "../src/lifecycle/change-probe.js";
import { COMPLETION_MARKER, PROGRESS_LOG, SysrootLayout } from "../src/lifecycle/layout.js";
import { readSnapshot } from "../src/lifecycle/markers.js";
import { Channel, type ChannelAlias } from "../src/model/channel.js";
import { createComponent, type Component } from "../src/model/component.js";
import { parseVersion, type SemVer } from "../src/model/version.js";
import { ToolupError } from "../src/errors.js";
import { Reporter, silentSink } from "../src/report/reporter.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import type { ChannelJson, ManifestJson } from "../src/types/manifest.js";

export const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

const created: string[] = [];

export function tempDir(prefix = "toolup-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  created.push(dir);
  return dir;
}

/** Removes every directory handed out by `tempDir`. */
export function removeTempDirs(): void {
  for (const dir of created.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
}

/** The ToolupError `p` rejects with; fails the test on success or any other error. */
export async function toolupFailure(p: Promise<unknown>): Promise<ToolupError> {
  try {
    await p;
  } catch (e) {
    if (e instanceof ToolupError) return e;
    throw e;
  }
  throw new Error("expected a ToolupError");
}

export function v(raw: string): SemVer {
  const parsed = parseVersion(raw);
  if (!parsed) throw new Error(`bad test version ${raw}`);
  return parsed;
}

export function registryComponent(
  name: string,
  version: string,
  extra: Partial<Omit<Component, "name" | "authority">> = {},
): Component {
  return createComponent(name, { kind: "registry", version: v(version) }, extra);
}

export function channel(name: string, components: Component[] = [], alias?: ChannelAlias): Channel {
  return new Channel(v(name), components, alias);
}

export function quietReporter(): Reporter {
  return new Reporter("human", silentSink);
}

/** `0.15.0`, aliased stable: an aliased executable, a dependent one with a setup command, and a library. */
export function stableChannelJson(forcVersion = "0.50.0"): ChannelJson {
  return {
    name: "0.15.0",
    alias: "stable",
    components: [
      { name: "forc", version: forcVersion, aliases: { build: [{ resolve: "forc" }, { verbatim: "build" }] } },
      { name: "fmt", version: "0.50.0", requires: ["forc"], initialization: ["init"] },
      { name: "std", version: "0.50.0", installed_library: "libstd.a" },
    ],
  };
}

export const OLD_CHANNEL: ChannelJson = { name: "0.14.0", components: [{ name: "forc", version: "0.49.0" }] };

export const NIGHTLY_CHANNEL: ChannelJson = {
  name: "0.16.0",
  alias: "nightly",
  components: [{ name: "forc", version: "0.51.0" }],
};

export function manifestJson(...channels: ChannelJson[]): ManifestJson {
  return { manifest_version: "1.0.0", date: 1700000000, channels };
}

/** Writes `json` as a manifest file and returns its file:// URI. */
export function writeManifest(dir: string, json: ManifestJson, name = "channel-manifest.json"): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(json, null, 2));
  return `file://${file}`;
}

type FakeInstallBehavior = {
  /** Exit with this status right before installing the named component. */
  failBefore?: { component: string; exitCode: number };
  /** Exit 0 without renaming the progress log. */
  skipCompletion?: boolean;
};

/**
 * In-process stand-in for `sh install.sh`: follows the script's contract using
 * the snapshot written before the run.
 */
export class FakeBuildTool implements BuildTool {
  readonly installed: string[] = [];
  readonly uninstalled: string[] = [];
  readonly commands: string[][] = [];
  readonly installRuns: InstallRequest[] = [];
  commandExitCodes = new Map<string, number>();

  constructor(
    private readonly registry: SchemaRegistry,
    public behavior: FakeInstallBehavior = {},
  ) {}

  async runInstall(req: InstallRequest): Promise<ProcessOutcome> {
    this.installRuns.push(req);
    const sysroot = new SysrootLayout(req.sysroot);
    const channel = await readSnapshot(this.registry, sysroot);
    const progress = path.join(req.sysroot, PROGRESS_LOG);
    if (!fs.existsSync(progress)) fs.writeFileSync(progress, "");

    for (const component of channel.components) {
      if (this.behavior.failBefore?.component === component.name) {
        return { exitCode: this.behavior.failBefore.exitCode };
      }
      const artifact = sysroot.artifact(component);
      if (!fs.existsSync(artifact)) {
        fs.writeFileSync(artifact, `${component.name}\n`);
        this.installed.push(component.name);
      }
      if (!fs.readFileSync(progress, "utf8").split("\n").includes(component.name)) {
        fs.appendFileSync(progress, `${component.name}\n`);
      }
    }
    if (!this.behavior.skipCompletion) {
      fs.renameSync(progress, path.join(req.sysroot, COMPLETION_MARKER));
    }
    return { exitCode: 0 };
  }

  async uninstall(packageName: string): Promise<void> {
    this.uninstalled.push(packageName);
  }

  async runCommand(argv: string[]): Promise<ProcessOutcome> {
    this.commands.push(argv);
    return { exitCode: this.commandExitCodes.get(argv[argv.length - 1]) ?? 0 };
  }
}

/** Change probe answering from fixed tables; missing entries mean "could not observe". */
export class FakeProbe implements ChangeProbe {
  revisions = new Map<string, string>();
  modifications = new Map<string, number>();

  async latestRevision(repositoryUrl: string, branch: string): Promise<string | undefined> {
    return this.revisions.get(`${repositoryUrl}#${branch}`);
  }

  async latestModification(root: string): Promise<number | undefined> {
    return this.modifications.get(root);
  }
}

export type TestSession = Session & {
  home: string;
  cwd: string;
  reporter: Reporter;
  buildTool: FakeBuildTool;
  probe: FakeProbe;
  registry: SchemaRegistry;
};

/** A session over a temp home, a file:// upstream manifest and the fakes above. */
export async function testSession(
  upstream: ManifestJson,
  opts: { home?: string; cwd?: string; behavior?: FakeInstallBehavior } = {},
): Promise<TestSession> {
  const root = tempDir();
  const home = opts.home ?? path.join(root, "home");
  const cwd = opts.cwd ?? path.join(root, "project");
  fs.mkdirSync(cwd, { recursive: true });

  const registry = await createRegistry(SCHEMA_DIR);
  const reporter = quietReporter();
  const buildTool = new FakeBuildTool(registry, opts.behavior);
  const probe = new FakeProbe();
  const session = await openSession({
    home,
    manifestUri: writeManifest(root, upstream),
    workingDirectory: cwd,
    env: {},
    reporter,
    buildTool,
    probe,
  });
  return { ...session, home, cwd, reporter, buildTool, probe, registry };
}
