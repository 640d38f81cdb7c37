import { DEFAULT_CONFIG } from "@gpubench/shared";

// Config file lookup
export const CONFIG_ENV_VAR = "GPUBENCH_CONFIG";
export const DEFAULT_CONFIG_FILE = "/etc/gpubench/config.toml";

// Metadata server
export const METADATA_HOST_ENV_VAR = "GCE_METADATA_HOST";
export const METADATA_FLAVOR_HEADER = { "Metadata-Flavor": "Google" } as const;
export const METADATA_ATTRIBUTES_PATH = "attributes";
export const DEFAULT_METADATA_ENDPOINT = DEFAULT_CONFIG.metadata.endpoint;

// Object store
export const GCS_SCHEME = "gs://";

// Message for the one required metadata key
export const BENCHMARK_HOME_REQUIRED = "Please set --metadata benchmark-home";

// Shell conventions for processes that never produced an exit code
export const EXIT_COMMAND_NOT_FOUND = 127;
export const EXIT_SIGNAL_BASE = 128;
