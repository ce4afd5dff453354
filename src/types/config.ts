/** Configuration types for the layered config system. */
export type HashMode = "compute" | "placeholder";

export type ConditionMode = "passthrough" | "evaluate";

export type RootConfig = {
  /** Checkout path of the root repository, e.g. "src". */
  path: string;
  url: string;
  deps_file: string;
};

export type HashConfig = {
  mode: HashMode;
  placeholder: string;
};

export type ConditionValue = string | boolean;

export type ConditionsConfig = {
  mode: ConditionMode;
  /** Target variables (checkout_linux, host_os, ...) layered over each DEPS file's vars. */
  vars: Record<string, ConditionValue>;
};

export type NetworkConfig = {
  timeout_ms: number;
  retries: number;
  backoff_ms: number;
  concurrency: number;
};

export type FixHashesConfig = {
  build_command: string;
  max_iterations: number;
};

export type PinConfig = {
  schema_version: string;
  manifest_path: string;
  product_key: string;
  deps_key: string;
  version_fields: string[];
  root: RootConfig;
  hash: HashConfig;
  conditions: ConditionsConfig;
  recurse: boolean;
  exclude: string[];
  network: NetworkConfig;
  fix_hashes: FixHashesConfig;
};
