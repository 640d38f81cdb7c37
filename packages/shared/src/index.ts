export {
  METADATA_KEYS,
  UNSET,
  DEFAULT_RAPIDS_VERSION,
  PHASE_TITLES,
  DEFAULT_CONFIG,
} from "./constants.ts";
export type {
  MetadataSource,
  Phase,
  Step,
  ProvisionResult,
  ProvisionConfig,
} from "./types.ts";
