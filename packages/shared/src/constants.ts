import type { JobState, NodeBaseState } from "./types.ts";

/**
 * Job states that close out a job. CloudVision requires an end_time for
 * these; RUNNING jobs must not carry one (Slurm's end time is then the
 * expiration time, not a real end).
 */
export const TERMINAL_STATES = new Set<JobState>([
  "JOB_STATE_COMPLETED",
  "JOB_STATE_FAILED",
  "JOB_STATE_CANCELLED",
]);

/** Base states in which a node can run jobs. */
export const AVAILABLE_NODE_STATES = new Set<NodeBaseState>([
  "idle",
  "allocated",
  "mixed",
  "completing",
]);

export const CLOUDVISION_ENDPOINTS = {
  jobConfig: "/api/resources/computejob/v1/JobConfig",
  nodeConfig: "/api/resources/computejob/v1/NodeConfig",
} as const;

export const API_TIMEOUTS_MS = {
  jobConfig: 30_000,
  nodeConfig: 10_000,
} as const;

export const DEFAULTS = {
  configFile: "/etc/slurm/cvslurm.toml",
  jobLogFile: "/var/log/slurm/cvjob.log",
  pollIntervalSeconds: 60,
  // Excludes our own jobs (cv-interface-discovery et al.)
  jobNameFilter: "^(?!cv-)",
  ifaceNameRegex: "^(eth|eno|ens|enp|em).*",
  discoveryJobName: "cv-interface-discovery",
  workerCommand: ["cvslurm"],
  clusterFallback: "slurm",
} as const;
