import {
  METADATA_KEYS,
  UNSET,
  type MetadataSource,
  type Phase,
  type ProvisionConfig,
  type ProvisionResult,
  type Step,
} from "@gpubench/shared";
import { getMetadataAttribute } from "@/core/metadata.ts";
import {
  buildFetchSteps,
  buildInstallSteps,
  buildUnpackSteps,
} from "@/core/plan.ts";
import type { CommandRunner } from "@/core/runner.ts";
import { BENCHMARK_HOME_REQUIRED } from "@/lib/constants.ts";
import { MissingSettingError } from "@/lib/errors.ts";

export interface ProvisionReporter {
  lookup?(key: string): void;
  resolved?(key: string, value: string): void;
  phase?(phase: Phase): void;
}

export interface ProvisionDeps {
  config: ProvisionConfig;
  metadata: MetadataSource;
  runner: CommandRunner;
  reporter?: ProvisionReporter;
}

/** Throws when a required setting still holds its sentinel default. */
export function requireSetting(
  value: string,
  sentinel: string,
  message: string,
): void {
  if (value === sentinel) {
    throw new MissingSettingError(message);
  }
}

/**
 * Install, then fetch and unpack the benchmark. Stops at the first failing
 * step; benchmark-home is only read once the install phase has finished.
 */
export async function provisionNode(
  deps: ProvisionDeps,
): Promise<ProvisionResult> {
  const { config, metadata, runner, reporter = {} } = deps;
  const executed: Step[] = [];
  let currentPhase: Phase | null = null;

  const execute = async (steps: Step[]) => {
    for (const step of steps) {
      if (step.phase !== currentPhase) {
        currentPhase = step.phase;
        reporter.phase?.(step.phase);
      }
      await runner.run(step);
      executed.push(step);
    }
  };

  const resolve = async (key: string, defaultValue: string) => {
    reporter.lookup?.(key);
    const value = await getMetadataAttribute(metadata, key, defaultValue);
    reporter.resolved?.(key, value);
    return value;
  };

  const rapidsVersion = await resolve(
    METADATA_KEYS.rapidsVersion,
    config.rapids.default_version,
  );
  await execute(buildInstallSteps(config, rapidsVersion));

  const benchmarkHome = await resolve(METADATA_KEYS.benchmarkHome, UNSET);
  requireSetting(benchmarkHome, UNSET, BENCHMARK_HOME_REQUIRED);

  await execute(buildFetchSteps(config, benchmarkHome));
  await execute(buildUnpackSteps(config));

  return { rapidsVersion, benchmarkHome, steps: executed };
}
