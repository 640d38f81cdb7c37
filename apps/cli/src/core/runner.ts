import { spawn } from "child_process";
import { constants } from "os";
import type { Step } from "@gpubench/shared";
import { formatCommandLine } from "@/lib/shell-quote.ts";
import { formatTrace } from "@/lib/theme.ts";
import { CommandFailedError } from "@/lib/errors.ts";
import {
  EXIT_COMMAND_NOT_FOUND,
  EXIT_SIGNAL_BASE,
} from "@/lib/constants.ts";

export interface CommandRunner {
  run(step: Step): Promise<void>;
}

export interface ProcessRunnerOptions {
  env?: NodeJS.ProcessEnv;
  stdio?: "inherit" | "ignore";
  log?: (line: string) => void;
}

/** Spawns each step without a shell and waits for it to exit. */
export class ProcessRunner implements CommandRunner {
  private env: NodeJS.ProcessEnv;
  private stdio: "inherit" | "ignore";
  private log: (line: string) => void;

  constructor(options: ProcessRunnerOptions = {}) {
    this.env = options.env ?? process.env;
    this.stdio = options.stdio ?? "inherit";
    this.log = options.log ?? ((line) => console.log(line));
  }

  run(step: Step): Promise<void> {
    this.log(formatTrace(formatCommandLine(step.command, step.args)));

    return new Promise((resolve, reject) => {
      const proc = spawn(step.command, step.args, {
        cwd: step.cwd,
        env: this.env,
        stdio: this.stdio,
      });

      proc.on("error", (err) => {
        reject(new CommandFailedError(step, EXIT_COMMAND_NOT_FOUND, err.message));
      });

      proc.on("close", (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        if (code !== null) {
          reject(new CommandFailedError(step, code));
          return;
        }
        reject(
          new CommandFailedError(
            step,
            signalExitCode(signal),
            `terminated by ${signal ?? "unknown signal"}`,
          ),
        );
      });
    });
  }
}

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals),
);

/** Shell convention: 128 + signal number. */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return EXIT_SIGNAL_BASE;
  return EXIT_SIGNAL_BASE + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/** Prints and records steps instead of running them. */
export class DryRunRunner implements CommandRunner {
  readonly steps: Step[] = [];
  private log: (line: string) => void;

  constructor(log: (line: string) => void = (line) => console.log(line)) {
    this.log = log;
  }

  async run(step: Step): Promise<void> {
    this.steps.push(step);
    this.log(formatTrace(formatCommandLine(step.command, step.args)));
  }
}
