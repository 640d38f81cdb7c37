import type { Command } from "commander";
import ora, { type Ora } from "ora";
import { PHASE_TITLES } from "@gpubench/shared";
import { loadConfig } from "@/core/config.ts";
import { GceMetadataSource } from "@/core/metadata.ts";
import { provisionNode, type ProvisionReporter } from "@/core/provision.ts";
import {
  DryRunRunner,
  ProcessRunner,
  type CommandRunner,
} from "@/core/runner.ts";
import { artifactUrl } from "@/core/plan.ts";
import { exitCodeFor } from "@/lib/errors.ts";
import { formatDetail, formatSectionHeader, theme } from "@/lib/theme.ts";

interface ProvisionOptions {
  config?: string;
  dryRun?: boolean;
}

export function registerProvisionCommand(program: Command) {
  program
    .command("provision")
    .description("Install RAPIDS and the benchmark files on this node")
    .option("-c, --config <path>", "config file (TOML)")
    .option("--dry-run", "print the steps without running them")
    .action(async (options: ProvisionOptions) => {
      try {
        await runProvision(options);
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(error.message));
        }
        process.exit(exitCodeFor(error));
      }
    });
}

function spinnerReporter(): ProvisionReporter {
  let spinner: Ora | null = null;
  return {
    lookup(key) {
      spinner = ora(`Reading metadata attribute ${key}...`).start();
    },
    resolved(key, value) {
      spinner?.succeed(`${key}: ${theme.accent(value)}`);
      spinner = null;
    },
    phase(phase) {
      console.log(formatSectionHeader(PHASE_TITLES[phase]));
    },
  };
}

async function runProvision(options: ProvisionOptions) {
  const config = loadConfig(options.config);
  const metadata = GceMetadataSource.fromConfig(config);
  const dryRun = options.dryRun ? new DryRunRunner() : null;
  const runner: CommandRunner = dryRun ?? new ProcessRunner();

  const result = await provisionNode({
    config,
    metadata,
    runner,
    reporter: spinnerReporter(),
  });

  if (dryRun) {
    console.log(
      theme.warning(`\nDry run: ${dryRun.steps.length} steps, nothing executed.`),
    );
    return;
  }

  console.log(theme.success("\n✓ Node provisioned"));
  console.log(formatDetail("RAPIDS", result.rapidsVersion));
  console.log(formatDetail("Benchmark", artifactUrl(result.benchmarkHome, "")));
  console.log(formatDetail("Installed to", config.benchmark.site_packages));
}
