import type { ProvisionConfig, Step } from "@gpubench/shared";
import { GCS_SCHEME } from "@/lib/constants.ts";

/** Conda pins, pip upgrade, then the RAPIDS libraries at one version. */
export function buildInstallSteps(
  config: ProvisionConfig,
  rapidsVersion: string,
): Step[] {
  const { conda, rapids } = config;
  const steps: Step[] = [];

  if (conda.pins.length > 0) {
    steps.push({
      phase: "patch",
      label: `${conda.installer} install`,
      command: conda.installer,
      args: ["install", ...conda.pins],
    });
  }

  steps.push({
    phase: "install",
    label: "pip upgrade",
    command: "pip",
    args: ["install", "--upgrade", "pip"],
  });

  steps.push({
    phase: "install",
    label: "RAPIDS install",
    command: "pip",
    args: [
      "install",
      ...rapidsRequirements(config, rapidsVersion),
      `--extra-index-url=${rapids.extra_index_url}`,
    ],
  });

  return steps;
}

export function rapidsRequirements(
  config: ProvisionConfig,
  rapidsVersion: string,
): string[] {
  const { packages, cuda_suffix } = config.rapids;
  return packages.map((name) => `${name}-${cuda_suffix}==${rapidsVersion}`);
}

export function artifactUrl(benchmarkHome: string, name: string): string {
  const home = benchmarkHome.replace(/^gs:\/\//, "").replace(/\/+$/, "");
  return `${GCS_SCHEME}${home}/${name}`;
}

/** Runner script first, then each archive, all into the work dir. */
export function buildFetchSteps(
  config: ProvisionConfig,
  benchmarkHome: string,
): Step[] {
  const { runner, archives, work_dir } = config.benchmark;
  return [runner, ...archives].map((name): Step => ({
    phase: "fetch",
    label: `download ${name}`,
    command: "gsutil",
    args: ["cp", artifactUrl(benchmarkHome, name), "."],
    cwd: work_dir,
  }));
}

/** `-o` overwrites, so extracting over an earlier run is not an error. */
export function buildUnpackSteps(config: ProvisionConfig): Step[] {
  const { archives, site_packages, work_dir } = config.benchmark;
  return archives.map((name): Step => ({
    phase: "unpack",
    label: `unzip ${name}`,
    command: "unzip",
    args: ["-o", name, "-d", site_packages],
    cwd: work_dir,
  }));
}

/**
 * Whole pipeline for known values. With no benchmark home the plan ends
 * after the install phase, where a real run would stop.
 */
export function buildPlan(
  config: ProvisionConfig,
  rapidsVersion: string,
  benchmarkHome: string | null,
): Step[] {
  const install = buildInstallSteps(config, rapidsVersion);
  if (benchmarkHome === null) return install;
  return [
    ...install,
    ...buildFetchSteps(config, benchmarkHome),
    ...buildUnpackSteps(config),
  ];
}
