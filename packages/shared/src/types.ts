// --- Instance metadata ---

export interface MetadataSource {
  /** Returns the attribute's value, or null when it is absent or unreachable. */
  getAttribute(name: string): Promise<string | null>;
}

// --- Pipeline steps ---

export type Phase = "patch" | "install" | "fetch" | "unpack";

export interface Step {
  phase: Phase;
  label: string;
  command: string;
  args: string[];
  cwd?: string;
}

export interface ProvisionResult {
  rapidsVersion: string;
  benchmarkHome: string;
  steps: Step[];
}

// --- Config ---

export interface ProvisionConfig {
  metadata: {
    endpoint: string;
    timeout_ms: number;
  };
  conda: {
    installer: string;
    pins: string[];
  };
  rapids: {
    default_version: string;
    cuda_suffix: string;
    packages: string[];
    extra_index_url: string;
  };
  benchmark: {
    runner: string;
    archives: string[];
    site_packages: string;
    work_dir: string;
  };
}
