import { createServer, type Server } from "node:http";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from "vitest";
import { registerProvisionCommand } from "./provision.ts";
import { registerMetadataCommand } from "./metadata.ts";

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

const TEST_DIR = mkdtempSync(join(tmpdir(), "gpubench-provision-"));
const ATTRIBUTE_PREFIX = "/computeMetadata/v1/instance/attributes/";
const stripAnsi = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, "");

let attributes: Record<string, string> = {};
let server: Server;
let endpoint: string;

beforeAll(async () => {
  server = createServer((req, res) => {
    const url = req.url ?? "";
    const value = url.startsWith(ATTRIBUTE_PREFIX)
      ? attributes[url.slice(ATTRIBUTE_PREFIX.length)]
      : undefined;
    if (value === undefined) {
      res.writeHead(404).end("not found");
      return;
    }
    res.writeHead(200).end(value);
  });
  const port = await new Promise<number>((resolve, reject) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") resolve(address.port);
      else reject(new Error("server has no TCP address"));
    });
  });
  endpoint = `http://127.0.0.1:${port}/computeMetadata/v1/instance`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  rmSync(TEST_DIR, { recursive: true, force: true });
});

let logs: string[];
let errors: string[];

beforeEach(() => {
  attributes = {};
  logs = [];
  errors = [];
  vi.spyOn(console, "log").mockImplementation((line: unknown) => {
    logs.push(stripAnsi(String(line)));
  });
  vi.spyOn(console, "error").mockImplementation((line: unknown) => {
    errors.push(stripAnsi(String(line)));
  });
  vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new ExitCalled(code);
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

function writeConfig(name: string, extra = ""): string {
  const path = join(TEST_DIR, name);
  writeFileSync(
    path,
    `[metadata]\nendpoint = "${endpoint}"\ntimeout_ms = 2000\n${extra}`,
  );
  return path;
}

async function run(
  register: (program: Command) => void,
  args: string[],
): Promise<unknown> {
  const program = new Command();
  register(program);
  return program.parseAsync(args, { from: "user" }).catch((e: unknown) => e);
}

describe("gpubench provision", () => {
  it("exits 1 with the setup message when benchmark-home is unset", async () => {
    const config = writeConfig("unset.toml");

    const result = await run(registerProvisionCommand, [
      "provision",
      "--config",
      config,
      "--dry-run",
    ]);

    expect(result).toBeInstanceOf(ExitCalled);
    expect(result).toMatchObject({ code: 1 });
    expect(errors).toEqual(["Please set --metadata benchmark-home"]);
    expect(logs.some((line) => line.startsWith("+ gsutil"))).toBe(false);
  });

  it("exits with the code of the first failing command", async () => {
    const installer = join(TEST_DIR, "failing-installer.sh");
    writeFileSync(installer, "#!/bin/sh\nexit 7\n", { mode: 0o755 });
    const config = writeConfig(
      "failing.toml",
      `[conda]\ninstaller = "${installer}"\n`,
    );
    attributes = { "benchmark-home": "bucket/bench" };

    const result = await run(registerProvisionCommand, [
      "provision",
      "--config",
      config,
    ]);

    expect(result).toMatchObject({ code: 7 });
    expect(errors).toEqual([`${installer} install failed (exit 7)`]);
    expect(logs.filter((line) => line.startsWith("+ "))).toHaveLength(1);
  });

  it("uses metadata values without their trailing newlines", async () => {
    const config = writeConfig("dry.toml");
    attributes = {
      "rapids-version": "23.04\n",
      "benchmark-home": "bucket/bench\n",
    };

    const result = await run(registerProvisionCommand, [
      "provision",
      "--config",
      config,
      "--dry-run",
    ]);

    expect(result).toBeUndefined();
    expect(process.exit).not.toHaveBeenCalled();
    expect(logs).toContain(
      "+ pip install cudf-cu11==23.04 cuml-cu11==23.04 pylibraft-cu11==23.04 rmm-cu11==23.04 --extra-index-url=https://pypi.nvidia.com",
    );
    expect(logs).toContain("+ gsutil cp gs://bucket/bench/benchmark_runner.py .");
    expect(logs).toContain("\nDry run: 8 steps, nothing executed.");
  });
});

describe("gpubench metadata", () => {
  async function printed(args: string[]): Promise<string> {
    const chunks: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((...data: unknown[]) => {
      chunks.push(String(data[0]));
      return true;
    });
    await run(registerMetadataCommand, args);
    return chunks.join("");
  }

  it("prints the --default value when the attribute is absent", async () => {
    const config = writeConfig("metadata-default.toml");

    const output = await printed([
      "metadata",
      "rapids-version",
      "--default",
      "23.02",
      "--config",
      config,
    ]);

    expect(output).toBe("23.02\n");
  });

  it("prints the attribute value", async () => {
    const config = writeConfig("metadata-set.toml");
    attributes = { "benchmark-home": "bucket/bench\n" };

    const output = await printed(["metadata", "benchmark-home", "--config", config]);

    expect(output).toBe("bucket/bench\n");
  });
});
