import type { Step } from "@gpubench/shared";

export class GpubenchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends GpubenchError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class MissingSettingError extends GpubenchError {
  constructor(message: string) {
    super(message, "MISSING_SETTING");
  }
}

export class CommandFailedError extends GpubenchError {
  constructor(
    public readonly step: Step,
    exitCode: number,
    detail?: string,
  ) {
    super(
      `${step.label} failed (exit ${exitCode})${detail ? `: ${detail}` : ""}`,
      "COMMAND_FAILED",
      exitCode,
    );
  }
}

/** Exit status for anything thrown out of a command action. */
export function exitCodeFor(error: unknown): number {
  return error instanceof GpubenchError ? error.exitCode : 1;
}
