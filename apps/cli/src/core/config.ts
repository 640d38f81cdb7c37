import { existsSync, readFileSync } from "fs";
import { parse as parseTOML } from "smol-toml";
import { z } from "zod";
import { DEFAULT_CONFIG, type ProvisionConfig } from "@gpubench/shared";
import { CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";

const nonEmpty = z.string().min(1);

export const ProvisionConfigSchema = z.object({
  metadata: z
    .object({
      endpoint: z.string().url().default(DEFAULT_CONFIG.metadata.endpoint),
      timeout_ms: z
        .number()
        .int()
        .positive()
        .default(DEFAULT_CONFIG.metadata.timeout_ms),
    })
    .default({}),
  conda: z
    .object({
      installer: nonEmpty.default(DEFAULT_CONFIG.conda.installer),
      pins: z.array(nonEmpty).default(DEFAULT_CONFIG.conda.pins),
    })
    .default({}),
  rapids: z
    .object({
      default_version: nonEmpty.default(DEFAULT_CONFIG.rapids.default_version),
      cuda_suffix: nonEmpty.default(DEFAULT_CONFIG.rapids.cuda_suffix),
      packages: z.array(nonEmpty).min(1).default(DEFAULT_CONFIG.rapids.packages),
      extra_index_url: z
        .string()
        .url()
        .default(DEFAULT_CONFIG.rapids.extra_index_url),
    })
    .default({}),
  benchmark: z
    .object({
      runner: nonEmpty.default(DEFAULT_CONFIG.benchmark.runner),
      archives: z.array(nonEmpty).default(DEFAULT_CONFIG.benchmark.archives),
      site_packages: nonEmpty.default(DEFAULT_CONFIG.benchmark.site_packages),
      work_dir: nonEmpty.default(DEFAULT_CONFIG.benchmark.work_dir),
    })
    .default({}),
});

export function parseConfig(raw: string, source: string): ProvisionConfig {
  let parsed: unknown;
  try {
    parsed = parseTOML(raw);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = ProvisionConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config at ${source}: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join(", ")}`,
    );
  }
  return result.data;
}

/**
 * --config wins, then $GPUBENCH_CONFIG, then the system-wide file.
 * Only the system-wide file may be missing; defaults apply then.
 */
export function loadConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): ProvisionConfig {
  const named = explicitPath ?? env[CONFIG_ENV_VAR];
  const path = named ?? DEFAULT_CONFIG_FILE;

  if (!existsSync(path)) {
    if (named) throw new ConfigError(`Config file not found: ${path}`);
    return ProvisionConfigSchema.parse({});
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config: ${error}`);
  }
  return parseConfig(raw, path);
}
