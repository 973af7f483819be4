import path from "node:path";
import type { SemVer } from "semver";
import { artifactPath, type Component } from "../model/component.js";
import { formatVersion } from "../model/version.js";

export const INSTALL_SCRIPT = "install.sh";
export const CHANNEL_SNAPSHOT = ".installed_channel.json";
export const PROGRESS_LOG = ".installation-in-progress";
export const COMPLETION_MARKER = "installation-successful";
export const LOCAL_MANIFEST = "manifest.json";

/** Files and pointers under the toolup home. */
export class HomeLayout {
  constructor(readonly home: string) {}

  get toolchainsDir(): string {
    return path.join(this.home, "toolchains");
  }

  get localManifestPath(): string {
    return path.join(this.home, LOCAL_MANIFEST);
  }

  /** `<home>/opt` → `<active sysroot>/opt`. */
  get optPointer(): string {
    return path.join(this.home, "opt");
  }

  get stablePointer(): string {
    return path.join(this.toolchainsDir, "stable");
  }

  get defaultPointer(): string {
    return path.join(this.toolchainsDir, "default");
  }

  sysroot(version: SemVer): SysrootLayout {
    return new SysrootLayout(path.join(this.toolchainsDir, formatVersion(version)));
  }
}

/** `toolchains/<version>/`: one installed channel. */
export class SysrootLayout {
  constructor(readonly root: string) {}

  get bin(): string {
    return path.join(this.root, "bin");
  }
  get lib(): string {
    return path.join(this.root, "lib");
  }
  get var(): string {
    return path.join(this.root, "var");
  }
  get opt(): string {
    return path.join(this.root, "opt");
  }
  get script(): string {
    return path.join(this.root, INSTALL_SCRIPT);
  }
  get snapshot(): string {
    return path.join(this.root, CHANNEL_SNAPSHOT);
  }
  get progressLog(): string {
    return path.join(this.root, PROGRESS_LOG);
  }
  get completionMarker(): string {
    return path.join(this.root, COMPLETION_MARKER);
  }

  artifact(component: Component): string {
    return artifactPath(component, this.root);
  }
}
