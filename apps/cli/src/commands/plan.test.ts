import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { afterAll, afterEach, describe, expect, it, vi } from "vitest";
import { registerPlanCommand } from "./plan.ts";

const TEST_DIR = mkdtempSync(join(tmpdir(), "gpubench-plan-"));
const CONFIG_PATH = join(TEST_DIR, "config.toml");
writeFileSync(CONFIG_PATH, '[benchmark]\nwork_dir = "/var/tmp/bench"\n');

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function runPlan(args: string[]): Promise<string[]> {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((line: unknown) => {
    lines.push(String(line));
  });
  const program = new Command();
  registerPlanCommand(program);
  await program.parseAsync(["plan", "--config", CONFIG_PATH, ...args], {
    from: "user",
  });
  return lines;
}

describe("gpubench plan", () => {
  it("prints the full plan as JSON", async () => {
    const lines = await runPlan([
      "--json",
      "--rapids-version",
      "23.04",
      "--benchmark-home",
      "bucket/bench",
    ]);

    expect(lines).toHaveLength(1);
    const plan = JSON.parse(lines[0] ?? "");
    expect(plan.rapidsVersion).toBe("23.04");
    expect(plan.benchmarkHome).toBe("bucket/bench");
    expect(plan.steps).toHaveLength(8);
    expect(plan.steps[3]).toEqual({
      phase: "fetch",
      label: "download benchmark_runner.py",
      command: "gsutil",
      args: ["cp", "gs://bucket/bench/benchmark_runner.py", "."],
      cwd: "/var/tmp/bench",
    });
  });

  it("stops after the install phase without a benchmark home", async () => {
    const lines = await runPlan(["--json"]);

    const plan = JSON.parse(lines[0] ?? "");
    expect(plan.rapidsVersion).toBe("23.02");
    expect(plan.benchmarkHome).toBeNull();
    expect(plan.steps.map((s: { command: string }) => s.command)).toEqual([
      "mamba",
      "pip",
      "pip",
    ]);
  });
});
