import type { SemVer } from "semver";
import { formatVersion, sameVersion } from "./version.js";

export type GitTarget =
  | { kind: "branch"; name: string; latestRevision?: string }
  | { kind: "revision"; hash: string }
  | { kind: "tag"; name: string };

/**
 * Where a component's code comes from.
 *
 * `git.branch.latestRevision` and `path.lastModification` are change-detection
 * caches filled in after an install; they take part in equality.
 */
export type Authority =
  | { kind: "registry"; package?: string; version: SemVer }
  | { kind: "git"; repositoryUrl: string; crateName: string; target: GitTarget }
  | { kind: "path"; path: string; crateName: string; lastModification?: number };

export const DEFAULT_BRANCH = "main";

function targetsEqual(a: GitTarget, b: GitTarget): boolean {
  switch (a.kind) {
    case "branch":
      return b.kind === "branch" && a.name === b.name && a.latestRevision === b.latestRevision;
    case "revision":
      return b.kind === "revision" && a.hash === b.hash;
    case "tag":
      return b.kind === "tag" && a.name === b.name;
  }
}

export function authoritiesEqual(a: Authority, b: Authority): boolean {
  switch (a.kind) {
    case "registry":
      return b.kind === "registry" && a.package === b.package && sameVersion(a.version, b.version);
    case "git":
      return (
        b.kind === "git" &&
        a.repositoryUrl === b.repositoryUrl &&
        a.crateName === b.crateName &&
        targetsEqual(a.target, b.target)
      );
    case "path":
      return (
        b.kind === "path" &&
        a.path === b.path &&
        a.crateName === b.crateName &&
        a.lastModification === b.lastModification
      );
  }
}

/** Build-tool flag selecting the git target, e.g. `["--branch", "main"]`. */
export function gitTargetFlag(target: GitTarget): [string, string] {
  switch (target.kind) {
    case "branch":
      return ["--branch", target.name];
    case "revision":
      return ["--rev", target.hash];
    case "tag":
      return ["--tag", target.name];
  }
}

export function describeAuthority(authority: Authority): string {
  switch (authority.kind) {
    case "registry":
      return formatVersion(authority.version);
    case "git": {
      const [flag, value] = gitTargetFlag(authority.target);
      return `${authority.repositoryUrl}:${flag.slice(2)} = ${value}`;
    }
    case "path":
      return authority.path;
  }
}
