export class CvError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends CvError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class SlurmCommandError extends CvError {
  constructor(
    command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    const status = exitCode === null ? "" : ` (exit ${exitCode})`;
    super(
      `${command} failed${status}: ${stderr.trim() || "no output"}`,
      "SLURM_COMMAND_ERROR",
    );
  }
}

export class DiscoveryError extends CvError {
  constructor(message: string) {
    super(message, "DISCOVERY_ERROR");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
