#!/usr/bin/env node

import { Command, Option } from "commander";
import { errorMessage } from "./errors.js";
import { openSession, toResult, type CommandError, type Session } from "./commands/context.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { bumpManifestCommand } from "./commands/bump-manifest.js";
import { TOOLUP_VERSION } from "./commands/help.js";
import { init } from "./commands/init.js";
import { installCommand } from "./commands/install.js";
import { overrideCommand } from "./commands/override.js";
import { runTool, syncOpt } from "./commands/run.js";
import { setCommand } from "./commands/set.js";
import { showActiveToolchain, showHome, showList } from "./commands/show.js";
import { uninstallCommand } from "./commands/uninstall.js";
import { updateCommand } from "./commands/update.js";
import { DEFAULT_INDEX_URL, SparseIndex } from "./manifest/registry-index.js";
import { Reporter, type OutputFormat } from "./report/reporter.js";
import type { PathUpdatePolicy } from "./types/config.js";

type GlobalOpts = { home?: string; manifest?: string; format: OutputFormat };

const program = new Command();

program
  .name("toolup")
  .description("Install, update and run toolchain channels")
  .version(TOOLUP_VERSION)
  .enablePositionalOptions()
  .option("--home <path>", "toolup home (default: $TOOLUP_HOME or $XDG_DATA_HOME/toolup)")
  .option("--manifest <uri>", "upstream manifest URI (file:// or https://)")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));

function fail(reporter: Reporter, error: CommandError): never {
  reporter.error(error.code, error.message, { details: error.details });
  const help = error.details?.help;
  if (reporter.format === "human" && typeof help === "string") process.stderr.write(`\n${help}\n`);
  const toolExit = error.details?.exitCode;
  process.exit(error.code === "COMMAND_FAILED" && typeof toolExit === "number" ? toolExit : exitCodeFor(error.code));
}

/**
 * Opens a session, runs `body`, re-syncs the opt pointer and prints the result:
 * `human` lines from `render`, or one RESULT record in `jsonl`.
 */
async function execute<T extends Record<string, unknown>>(
  body: (session: Session) => Promise<T>,
  render: (value: T) => string[] = () => [],
): Promise<void> {
  const g = program.opts<GlobalOpts>();
  const reporter = new Reporter(g.format);

  const opened = await toResult(() => openSession({ home: g.home, manifestUri: g.manifest, reporter }));
  if (!opened.ok) fail(reporter, opened.error);
  const session: Session = { ctx: opened.ctx, local: opened.local };

  const res = await toResult(() => body(session));
  try {
    await syncOpt(session);
  } catch (e) {
    reporter.warn("OPT_SYNC_FAILED", `could not update ${session.ctx.layout.optPointer}: ${errorMessage(e)}`);
  }
  if (!res.ok) fail(reporter, res.error);

  if (g.format === "jsonl") {
    reporter.info("RESULT", "OK", { details: res });
  } else {
    for (const line of render(res)) reporter.info("RESULT", line);
  }
}

program
  .command("init")
  .description("Create the toolup home and install the stable toolchain")
  .action(() => execute(init));

program
  .command("install")
  .description("Install a channel: stable, nightly, nightly-<tag>, a version or a custom tag")
  .argument("<channel>", "Channel to install")
  .action((channel: string) => execute((s) => installCommand(s, channel)));

program
  .command("update")
  .description("Update one installed channel, or all of them")
  .argument("[channel]", "stable or a version (default: every installed channel)")
  .addOption(new Option("--path-update <policy>", "Reinstall path components when their files changed").choices(["off", "all"]))
  .action((channel: string | undefined, opts: { pathUpdate?: PathUpdatePolicy }) =>
    execute(
      (s) => updateCommand(s, channel, opts),
      (r) => r.outcomes.filter((o) => o.status === "updated").map((o) => `Updated ${o.channel}: ${o.components.join(", ")}`),
    ),
  );

program
  .command("uninstall")
  .description("Uninstall a channel")
  .argument("<channel>", "Channel to uninstall")
  .action((channel: string) => execute((s) => uninstallCommand(s, channel)));

program
  .command("set")
  .description("Pin the current directory to an installed channel (writes toolup-toolchain.yaml)")
  .argument("<channel>", "Installed channel")
  .action((channel: string) => execute((s) => setCommand(s, channel)));

program
  .command("override")
  .description("Set the system default toolchain")
  .argument("<channel>", "Channel to use by default")
  .action((channel: string) => execute((s) => overrideCommand(s, channel)));

program
  .command("run")
  .description("Run a component or alias of the active toolchain ('run help' lists the help topics)")
  .argument("<token>", "Component name, alias, help or --version")
  .argument("[args...]", "Arguments passed to the tool")
  .passThroughOptions()
  .allowUnknownOption()
  .action((token: string, args: string[]) =>
    execute(
      (s) => runTool(s, token, args),
      (r) => r.output ?? [],
    ),
  );

const show = program.command("show").description("Show toolchain information");

show
  .command("active-toolchain")
  .description("Show the active toolchain and where it comes from")
  .action(() =>
    execute(showActiveToolchain, (r) => [
      `${r.channel}${r.installed ? ` (${r.installed})` : " (not installed)"}: ${r.justification}`,
    ]),
  );

show
  .command("home")
  .description("Show the toolup home directory")
  .action(() => {
    const g = program.opts<GlobalOpts>();
    const { home } = showHome({ home: g.home });
    const reporter = new Reporter(g.format);
    if (g.format === "jsonl") reporter.info("RESULT", "OK", { details: { home } });
    else reporter.info("RESULT", home);
  });

show
  .command("list")
  .description("List installed toolchains")
  .action(() =>
    execute(showList, (r) =>
      r.toolchains.length === 0
        ? ["No toolchains installed."]
        : r.toolchains.map(
            (t) =>
              `${t.name}${t.alias ? ` (${t.alias})` : ""}${t.partial ? " [partial]" : ""}${t.isDefault ? " (default)" : ""}`,
          ),
    ),
  );

program
  .command("bump-manifest")
  .description("Move registry components of a manifest file to their newest patch releases")
  .argument("<file>", "Manifest file to rewrite")
  .option("--index <url>", "Sparse registry index", DEFAULT_INDEX_URL)
  .action(async (file: string, opts: { index: string }) => {
    const g = program.opts<GlobalOpts>();
    const reporter = new Reporter(g.format);
    const res = await toResult(() => bumpManifestCommand(file, { index: new SparseIndex(opts.index), reporter }));
    if (!res.ok) fail(reporter, res.error);
    if (g.format === "jsonl") reporter.info("RESULT", "OK", { details: res });
    else if (res.changedPackages.length > 0) reporter.info("RESULT", `Bumped ${res.changedPackages.join(", ")}`);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  process.stderr.write(`error: ${errorMessage(e)}\n`);
  process.exit(EXIT.FAILURE);
});
