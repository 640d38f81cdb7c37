#!/usr/bin/env tsx
import { Command } from "commander";
import { registerProvisionCommand } from "./src/commands/provision.ts";
import { registerMetadataCommand } from "./src/commands/metadata.ts";
import { registerPlanCommand } from "./src/commands/plan.ts";
import pkg from "./package.json";

async function main() {
  const program = new Command();

  program
    .version(pkg.version)
    .name("gpubench")
    .description("provision a GPU node for the RAPIDS benchmark")
    .addHelpText(
      "after",
      "\nMetadata:  rapids-version (default 23.02), benchmark-home (required)",
    );

  registerProvisionCommand(program);
  registerMetadataCommand(program);
  registerPlanCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
