import { execFile, spawn, type StdioOptions } from "node:child_process";
import os from "node:os";
import { promisify } from "node:util";
import { ToolupError, errorMessage } from "../errors.js";

const pExecFile = promisify(execFile);

export type InstallRequest = {
  sysroot: string;
  scriptPath: string;
  verbose: boolean;
};

export type ProcessOutcome = { exitCode: number };

/** Everything toolup asks of the outside world's package builder. */
export interface BuildTool {
  /** Runs the rendered install script with `TOOLUP_SYSROOT` exported. */
  runInstall(req: InstallRequest): Promise<ProcessOutcome>;
  /** Removes an executable package installed under `root`. Throws `UNINSTALL_FAILED`. */
  uninstall(packageName: string, root: string): Promise<void>;
  /** Runs an installed tool in the foreground. */
  runCommand(argv: string[], opts: { env: NodeJS.ProcessEnv; cwd: string }): Promise<ProcessOutcome>;
}

function waitFor(command: string, args: string[], opts: { env: NodeJS.ProcessEnv; cwd: string; stdio: StdioOptions }) {
  return new Promise<ProcessOutcome>((resolve, reject) => {
    const child = spawn(command, args, { ...opts, shell: false });
    child.once("error", reject);
    child.once("close", (code, signal) => {
      // Killed by a signal: 128 + signal number, as shells report it.
      resolve({ exitCode: code ?? (signal ? 128 + os.constants.signals[signal] : 1) });
    });
  });
}

/** Default build tool: `sh` for install scripts, `<tool> uninstall` for removals. */
export class ProcessBuildTool implements BuildTool {
  constructor(private readonly tool: string) {}

  async runInstall(req: InstallRequest): Promise<ProcessOutcome> {
    return waitFor("sh", [req.scriptPath], {
      cwd: req.sysroot,
      env: { ...process.env, TOOLUP_SYSROOT: req.sysroot },
      stdio: ["ignore", req.verbose ? "inherit" : "ignore", "inherit"],
    });
  }

  async uninstall(packageName: string, root: string): Promise<void> {
    try {
      await pExecFile(this.tool, ["uninstall", packageName, "--root", root], { timeout: 300000 });
    } catch (e) {
      throw new ToolupError("UNINSTALL_FAILED", `${this.tool} uninstall ${packageName} failed: ${errorMessage(e)}`, {
        package: packageName,
        root,
      });
    }
  }

  async runCommand(argv: string[], opts: { env: NodeJS.ProcessEnv; cwd: string }): Promise<ProcessOutcome> {
    const [command, ...args] = argv;
    if (command === undefined) throw new ToolupError("COMMAND_FAILED", "nothing to run");
    return waitFor(command, args, { ...opts, stdio: "inherit" });
  }
}
