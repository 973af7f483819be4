import semver from "semver";
import type { SemVer } from "semver";

export type { SemVer };

/** Strict SemVer parse (build metadata kept). Returns undefined for anything else. */
export function parseVersion(raw: string): SemVer | undefined {
  return semver.parse(raw) ?? undefined;
}

/** Renders `major.minor.patch[-pre][+build]`; `SemVer.version` drops the build part. */
export function formatVersion(v: SemVer): string {
  return v.build.length > 0 ? `${v.version}+${v.build.join(".")}` : v.version;
}

/** SemVer precedence: pre-releases sort below their release, build metadata is ignored. */
export function comparePrecedence(a: SemVer, b: SemVer): number {
  return semver.compare(a, b);
}

/** Identity of a channel name, build metadata included. */
export function sameVersion(a: SemVer, b: SemVer): boolean {
  return semver.compareBuild(a, b) === 0;
}
