/** Manifest wire format. Authority fields are flattened into the component object. */
export type GitTargetJson = {
  branch?: string;
  latest_revision?: string;
  rev?: string;
  tag?: string;
};

export type AliasStepJson = "lib_path" | "var_path" | { resolve: string } | { verbatim: string };

export type ComponentJson = {
  name: string;
  // registry
  version?: string;
  package?: string;
  // git
  repository_url?: string;
  target?: GitTargetJson;
  // git + path
  crate_name?: string;
  // path
  path?: string;
  /** Unix milliseconds. */
  last_modification?: number;

  features?: string[];
  requires?: string[];
  rustup_channel?: string;
  installed_file?: string;
  installed_executable?: string;
  installed_library?: string;
  aliases?: Record<string, AliasStepJson[]>;
  call_format?: AliasStepJson[];
  initialization?: string[];
  initialized?: boolean;
};

export type ChannelJson = {
  name: string;
  alias?: string;
  tags?: "partial"[];
  components: ComponentJson[];
};

export type ManifestJson = {
  manifest_version: string;
  /** Unix seconds. */
  date: number;
  channels: ChannelJson[];
};

/** `toolup-toolchain.yaml` in a project directory. */
export type ToolchainFileJson = {
  toolchain: {
    channel: string;
    components?: string[];
  };
};
