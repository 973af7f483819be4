/** Configuration types for the layered config system. */

/** Whether `update` probes path components for modifications. */
export type PathUpdatePolicy = "off" | "all";

export type ToolupConfig = {
  schema_version: string;
  /** Root of toolchains, the local manifest and `config.yaml`. */
  home: string;
  /** `file://` or `https://` location of the upstream manifest. */
  manifest_uri: string;
  /** Build tool driven by install scripts and uninstalls. */
  build_tool: string;
  /** Components of the built-in toolchain when no project file or default applies. */
  default_components: string[];
  verbose: boolean;
  path_update: PathUpdatePolicy;
};
