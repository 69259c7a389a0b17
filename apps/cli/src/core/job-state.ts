import type { JobState } from "@cvslurm/shared";
import { EPILOG_CONTEXT, PROLOG_CONTEXT } from "@/lib/constants.ts";

export interface ExitStatus {
  /** SLURM_JOB_EXIT_CODE, e.g. "0" or "256". */
  exitCode?: string;
  /** SLURM_JOB_EXIT_CODE2, "<exit>:<signal>", e.g. "0:9". */
  exitCode2?: string;
}

export interface ParsedExit {
  exitCode: number | null;
  signal: number | null;
}

function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : null;
}

/** The exit:signal pair wins over the plain exit code when both are set. */
export function parseExitStatus(status: ExitStatus): ParsedExit {
  const { exitCode, exitCode2 } = status;

  if (exitCode2 && exitCode2.includes(":")) {
    const sep = exitCode2.indexOf(":");
    return {
      exitCode: parseInteger(exitCode2.slice(0, sep)),
      signal: parseInteger(exitCode2.slice(sep + 1)),
    };
  }

  if (exitCode !== undefined) {
    return { exitCode: parseInteger(exitCode), signal: null };
  }

  return { exitCode: null, signal: null };
}

/**
 * Map a PrologSlurmctld/EpilogSlurmctld invocation to a job state.
 *
 * Prolog is always RUNNING. In the epilog a zero exit code with a nonzero
 * signal is CANCELLED, any nonzero exit code is FAILED, and everything
 * else (including no usable code) is COMPLETED. Other contexts are UNKNOWN.
 */
export function classifyJobState(context: string, status: ExitStatus = {}): JobState {
  if (context === PROLOG_CONTEXT) return "JOB_STATE_RUNNING";
  if (context !== EPILOG_CONTEXT) return "JOB_STATE_UNKNOWN";

  const { exitCode, signal } = parseExitStatus(status);
  if (exitCode === 0 && signal) return "JOB_STATE_CANCELLED";
  if (exitCode !== null && exitCode !== 0) return "JOB_STATE_FAILED";
  return "JOB_STATE_COMPLETED";
}

/**
 * Convert a Unix timestamp string to ISO 8601 UTC without fractional
 * seconds ("2023-11-14T22:13:20Z"). Returns null when it does not parse.
 */
export function convertTimestamp(raw: string | undefined): string | null {
  if (raw === undefined) return null;
  const seconds = parseInteger(raw);
  if (seconds === null) return null;

  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) return null;
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
