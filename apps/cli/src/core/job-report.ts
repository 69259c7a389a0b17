import type { AppConfig } from "@cvslurm/shared";
import { TERMINAL_STATES } from "@cvslurm/shared";
import { expandNodeList } from "@/parsers/index.ts";
import { EPILOG_CONTEXT, SLURM_ENV } from "@/lib/constants.ts";
import { errorMessage } from "@/lib/errors.ts";
import type { Logger } from "@/lib/logger.ts";
import type { JobConfigInput } from "./cloudvision.ts";
import { classifyJobState, convertTimestamp } from "./job-state.ts";

export interface JobEnvironment {
  jobId: string;
  clusterName: string;
  partition: string;
  startTime: string;
  endTime: string;
  jobName: string;
  nodeList: string;
  context: string;
  exitCode?: string;
  exitCode2?: string;
  derivedExitCode?: string;
}

export function readJobEnvironment(env: NodeJS.ProcessEnv): JobEnvironment {
  return {
    jobId: env[SLURM_ENV.jobId] ?? "",
    clusterName: env[SLURM_ENV.clusterName] ?? "",
    partition: env[SLURM_ENV.partition] ?? "",
    startTime: env[SLURM_ENV.startTime] ?? "",
    endTime: env[SLURM_ENV.endTime] ?? "",
    jobName: env[SLURM_ENV.jobName] ?? "",
    nodeList: env[SLURM_ENV.nodeList] ?? "",
    context: env[SLURM_ENV.context] ?? "",
    exitCode: env[SLURM_ENV.exitCode],
    exitCode2: env[SLURM_ENV.exitCode2],
    derivedExitCode: env[SLURM_ENV.derivedExitCode],
  };
}

export type JobReportResult =
  | { ok: true; input: JobConfigInput }
  | { ok: false; reason: "missing-fields" | "filtered" | "missing-end-time" };

/**
 * Compile the job-name filter. Like a prefix match, the pattern is anchored
 * at the start of the name. An invalid pattern disables filtering.
 */
export function compileNameFilter(pattern: string, logger: Logger): RegExp | null {
  if (!pattern) return null;
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch (error) {
    logger.error(`Invalid job_name_filter pattern '${pattern}': ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Turn the hook's Slurm environment into a JobConfig request, or explain
 * (through the logger) why nothing should be sent.
 */
export function buildJobReport(
  job: JobEnvironment,
  config: AppConfig["job_hook"],
  logger: Logger,
): JobReportResult {
  const startIso = convertTimestamp(job.startTime);
  const state = classifyJobState(job.context, {
    exitCode: job.exitCode,
    exitCode2: job.exitCode2,
  });
  if (job.context === EPILOG_CONTEXT) {
    logger.info(
      `Job exit_code=${job.exitCode ?? "none"} exit_code2=${job.exitCode2 ?? "none"} derived_ec=${job.derivedExitCode ?? "none"} -> state=${state}`,
    );
  }
  const nodes = expandNodeList(job.nodeList);
  // Location is just the cluster name
  const location = job.clusterName;

  const missing: string[] = [];
  if (!job.jobId) missing.push("job_id");
  if (!location) missing.push("location");
  if (!job.jobName) missing.push("job_name");
  if (!startIso) missing.push("start_time");
  if (nodes.length === 0) missing.push("nodes");
  if (state === "JOB_STATE_UNKNOWN") missing.push("state (invalid context)");

  const label = `Job ${job.jobId || "unknown"} (${job.jobName || "unknown"})`;
  if (missing.length > 0 || !startIso) {
    logger.error(`${label}: Missing or invalid required fields: ${missing.join(", ")}`);
    return { ok: false, reason: "missing-fields" };
  }

  const nameFilter = compileNameFilter(config.job_name_filter, logger);
  if (nameFilter && !nameFilter.test(job.jobName)) {
    logger.info(`${label}: Filtered out - name does not match filter`);
    return { ok: false, reason: "filtered" };
  }

  if (
    config.partition_filter.length > 0 &&
    job.partition &&
    !config.partition_filter.includes(job.partition)
  ) {
    logger.info(
      `${label}: Filtered out - partition '${job.partition}' not in filter: ${config.partition_filter.join(", ")}`,
    );
    return { ok: false, reason: "filtered" };
  }

  const endIso = job.endTime ? convertTimestamp(job.endTime) : null;
  if (TERMINAL_STATES.has(state) && !endIso) {
    logger.error(`${label}: Missing end_time for terminal state: ${state}`);
    return { ok: false, reason: "missing-end-time" };
  }

  return {
    ok: true,
    input: {
      // Job ids are only unique per cluster
      id: `${job.jobId}@${location}`,
      name: job.partition ? `${job.jobName}@${job.partition}` : job.jobName,
      location,
      state,
      startTime: startIso,
      // A running job's end time is its expiration, not an end
      endTime: TERMINAL_STATES.has(state) ? endIso : null,
      allocation: { mode: "node", nodes },
      tenant: config.tenant_job,
    },
  };
}
