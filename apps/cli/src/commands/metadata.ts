import type { Command } from "commander";
import { loadConfig } from "@/core/config.ts";
import { GceMetadataSource, getMetadataAttribute } from "@/core/metadata.ts";
import { exitCodeFor } from "@/lib/errors.ts";
import { theme } from "@/lib/theme.ts";

export function registerMetadataCommand(program: Command) {
  program
    .command("metadata")
    .description("Print one instance metadata attribute")
    .argument("<attribute>", "attribute name, e.g. rapids-version")
    .option("-d, --default <value>", "value to print when it is not set", "")
    .option("-c, --config <path>", "config file (TOML)")
    .action(
      async (attribute: string, options: { default: string; config?: string }) => {
        try {
          const config = loadConfig(options.config);
          const source = GceMetadataSource.fromConfig(config);
          const value = await getMetadataAttribute(
            source,
            attribute,
            options.default,
          );
          process.stdout.write(value);
          if (!value.endsWith("\n")) process.stdout.write("\n");
        } catch (error) {
          if (error instanceof Error) {
            console.error(theme.error(`Error: ${error.message}`));
          }
          process.exit(exitCodeFor(error));
        }
      },
    );
}
