import type { Command } from "commander";
import { PHASE_TITLES, UNSET, type Step } from "@gpubench/shared";
import { loadConfig } from "@/core/config.ts";
import { buildPlan } from "@/core/plan.ts";
import { BENCHMARK_HOME_REQUIRED } from "@/lib/constants.ts";
import { exitCodeFor } from "@/lib/errors.ts";
import { formatCommandLine } from "@/lib/shell-quote.ts";
import { formatCommand, formatSectionHeader, theme } from "@/lib/theme.ts";

interface PlanOptions {
  config?: string;
  rapidsVersion?: string;
  benchmarkHome: string;
  json?: boolean;
}

export function registerPlanCommand(program: Command) {
  program
    .command("plan")
    .description("Show the provisioning steps without reading metadata")
    .option("-c, --config <path>", "config file (TOML)")
    .option("--rapids-version <version>", "RAPIDS version to install")
    .option("--benchmark-home <path>", "bucket path holding the artifacts", UNSET)
    .option("--json", "output as JSON")
    .action((options: PlanOptions) => {
      try {
        runPlan(options);
      } catch (error) {
        if (options.json) {
          console.log(
            JSON.stringify({
              error: error instanceof Error ? error.message : String(error),
            }),
          );
        } else if (error instanceof Error) {
          console.error(theme.error(`Error: ${error.message}`));
        }
        process.exit(exitCodeFor(error));
      }
    });
}

function runPlan(options: PlanOptions) {
  const config = loadConfig(options.config);
  const rapidsVersion = options.rapidsVersion ?? config.rapids.default_version;
  const home = options.benchmarkHome === UNSET ? null : options.benchmarkHome;
  const steps = buildPlan(config, rapidsVersion, home);

  if (options.json) {
    console.log(JSON.stringify({ rapidsVersion, benchmarkHome: home, steps }, null, 2));
    return;
  }

  printSteps(steps);
  if (home === null) {
    console.log(theme.warning(`\n${BENCHMARK_HOME_REQUIRED}; a real run stops here.`));
  }
}

function printSteps(steps: Step[]) {
  let phase: Step["phase"] | null = null;
  for (const step of steps) {
    if (step.phase !== phase) {
      phase = step.phase;
      console.log(formatSectionHeader(PHASE_TITLES[step.phase]));
    }
    console.log(formatCommand(formatCommandLine(step.command, step.args)));
  }
}
