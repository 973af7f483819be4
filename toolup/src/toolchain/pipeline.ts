import path from "node:path";
import { ToolupError } from "../errors.js";
import type { AliasStep, Component } from "../model/component.js";
import type { SysrootLayout } from "../lifecycle/layout.js";
import type { Resolution, ToolchainEnvironment } from "./environment.js";

export type Invocation = { command: string; args: string[] };

/**
 * Turns alias steps into an argv: `resolve` becomes the component's installed
 * artifact path, `lib_path` the sysroot's `lib/`, `var_path <file>` a file in
 * its `var/`, and `verbatim` stays as written.
 */
export function expandSteps(steps: AliasStep[], lookup: (name: string) => Component, sysroot: SysrootLayout): string[] {
  const argv: string[] = [];
  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    switch (step.kind) {
      case "resolve":
        argv.push(sysroot.artifact(lookup(step.component)));
        break;
      case "verbatim":
        argv.push(step.value);
        break;
      case "lib_path":
        argv.push(sysroot.lib);
        break;
      case "var_path": {
        const file = steps[i + 1];
        if (file?.kind !== "verbatim") {
          throw new ToolupError("INVALID_ALIAS", "var_path must be followed by a verbatim file name");
        }
        argv.push(path.join(sysroot.var, file.value));
        i++;
        break;
      }
    }
  }
  return argv;
}

function toInvocation(argv: string[], extraArgs: string[], what: string): Invocation {
  const [command, ...args] = argv;
  if (command === undefined) throw new ToolupError("INVALID_ALIAS", `${what} expands to an empty command`);
  return { command, args: [...args, ...extraArgs] };
}

/** Command line for a resolved token. Each `resolve` step prefers the resolution's origin. */
export function expandResolution(
  resolution: Resolution,
  env: ToolchainEnvironment,
  sysroot: SysrootLayout,
  extraArgs: string[] = [],
): Invocation {
  const lookup = (name: string) => env.resolveComponentForStep(name, resolution.origin).component;
  if (resolution.kind === "alias") {
    return toInvocation(expandSteps(resolution.steps, lookup, sysroot), extraArgs, `alias ${resolution.name}`);
  }
  const { component } = resolution;
  return toInvocation(expandSteps(component.callFormat, lookup, sysroot), extraArgs, `component ${component.name}`);
}

/** Environment for tools run from a sysroot: `<sysroot>/opt` first on PATH. */
export function toolEnvironment(home: string, sysroot: SysrootLayout, base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return {
    ...base,
    TOOLUP_HOME: home,
    TOOLUP_SYSROOT: sysroot.root,
    PATH: base.PATH ? `${sysroot.opt}${path.delimiter}${base.PATH}` : sysroot.opt,
  };
}
