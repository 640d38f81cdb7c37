import type { Phase, ProvisionConfig } from "./types.ts";

/** Instance metadata keys read by the provisioner. */
export const METADATA_KEYS = {
  rapidsVersion: "rapids-version",
  benchmarkHome: "benchmark-home",
} as const;

/** Default for settings that have no usable fallback; must be caught explicitly. */
export const UNSET = "UNSET";

export const DEFAULT_RAPIDS_VERSION = "23.02";

export const PHASE_TITLES: Record<Phase, string> = {
  patch: "Patching conda packages",
  install: "Installing RAPIDS",
  fetch: "Fetching benchmark artifacts",
  unpack: "Unpacking into site-packages",
};

export const DEFAULT_CONFIG: ProvisionConfig = {
  metadata: {
    endpoint: "http://metadata.google.internal/computeMetadata/v1/instance",
    timeout_ms: 5000,
  },
  conda: {
    installer: "mamba",
    pins: ["llvmlite<0.40,>=0.39.0dev0", "numba>=0.56.2"],
  },
  rapids: {
    default_version: DEFAULT_RAPIDS_VERSION,
    cuda_suffix: "cu11",
    packages: ["cudf", "cuml", "pylibraft", "rmm"],
    extra_index_url: "https://pypi.nvidia.com",
  },
  benchmark: {
    runner: "benchmark_runner.py",
    archives: ["spark_rapids_ml.zip", "benchmark.zip"],
    site_packages: "/opt/conda/miniconda3/lib/python3.8/site-packages",
    work_dir: ".",
  },
};
