import { spawn } from "child_process";
import { SlurmCommandError, errorMessage } from "@/lib/errors.ts";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs argv (no shell) and collects its output. Resolves on exit whatever
 * the exit code; rejects only when the program cannot be started.
 */
export type CommandRunner = (
  args: string[],
  options?: RunOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (args, options) =>
  new Promise((resolve, reject) => {
    const [file, ...rest] = args;
    if (!file) {
      reject(new Error("Cannot run an empty command"));
      return;
    }

    const proc = spawn(file, rest, {
      env: options?.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", reject);

    proc.on("close", (exitCode) => {
      resolve({
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        exitCode,
      });
    });
  });

/** Like the runner, but a spawn failure or nonzero exit throws SlurmCommandError. */
export async function execChecked(
  runner: CommandRunner,
  args: string[],
  options?: RunOptions,
): Promise<string> {
  const command = args[0] ?? "";
  let result: CommandResult;
  try {
    result = await runner(args, options);
  } catch (error) {
    throw new SlurmCommandError(command, null, errorMessage(error));
  }

  if (result.exitCode !== 0) {
    throw new SlurmCommandError(command, result.exitCode, result.stderr);
  }
  return result.stdout;
}
