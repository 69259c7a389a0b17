// Slurm command format strings
export const SINFO_NODE_STATE_FORMAT = "%n %T";

// Slurm context values passed to PrologSlurmctld / EpilogSlurmctld
export const PROLOG_CONTEXT = "prolog_slurmctld";
export const EPILOG_CONTEXT = "epilog_slurmctld";

// Environment variables read by the job hook
export const SLURM_ENV = {
  jobId: "SLURM_JOB_ID",
  clusterName: "SLURM_CLUSTER_NAME",
  partition: "SLURM_JOB_PARTITION",
  startTime: "SLURM_JOB_START_TIME",
  endTime: "SLURM_JOB_END_TIME",
  jobName: "SLURM_JOB_NAME",
  nodeList: "SLURM_JOB_NODELIST",
  context: "SLURM_SCRIPT_CONTEXT",
  exitCode: "SLURM_JOB_EXIT_CODE",
  exitCode2: "SLURM_JOB_EXIT_CODE2",
  derivedExitCode: "SLURM_JOB_DERIVED_EC",
} as const;

// Environment variables handed to the discovery worker through srun
export const WORKER_ENV = {
  nodeName: "SLURMD_NODENAME",
  clusterName: "SLURM_CLUSTER_NAME",
  logLevel: "LOG_LEVEL",
  ifaceNameRegex: "IFACE_NAME_REGEX",
} as const;

// Config file and overrides
export const CONFIG_FILE_ENV = "CVSLURM_CONFIG";
export const CONFIG_ENV_OVERRIDES = {
  server: "CV_API_SERVER",
  token: "CV_API_TOKEN",
  logFile: "CV_LOG_FILE",
} as const;

// Interface discovery
export const SYSFS_NET_PATH = "/sys/class/net";
export const SKIPPED_INTERFACES = new Set(["lo", "docker0", "cni0"]);
export const VIRTUAL_INTERFACE_PREFIXES = ["veth"];
export const DEFAULT_INTERFACE_PREFIXES = ["eth", "eno", "ens", "enp", "em"];
export const INVALID_MAC = "00:00:00:00:00:00";
export const IGNORED_IPV4 = new Set(["127.0.0.1", "0.0.0.0"]);
