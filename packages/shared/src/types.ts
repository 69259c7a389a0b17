// --- CloudVision job states ---

export type JobState =
  | "JOB_STATE_RUNNING"
  | "JOB_STATE_COMPLETED"
  | "JOB_STATE_FAILED"
  | "JOB_STATE_CANCELLED"
  | "JOB_STATE_UNKNOWN";

export type JobType = "JOB_TYPE_TENANT";

// --- Slurm node states ---

/**
 * Base node states `sinfo %T` can print, lowercased, with flag suffixes
 * stripped. Anything else maps to "unknown".
 * Source: https://slurm.schedmd.com/sinfo.html#SECTION_NODE-STATE-CODES
 */
export type NodeBaseState =
  | "idle"
  | "allocated"
  | "mixed"
  | "completing"
  | "planned"
  | "draining"
  | "drained"
  | "down"
  | "fail"
  | "failing"
  | "future"
  | "inval"
  | "maint"
  | "reboot"
  | "reserved"
  | "power_down"
  | "power_up"
  | "unknown";

/** Single-character suffixes sinfo appends to a node state. */
export type NodeStateFlag = "*" | "~" | "#" | "!" | "%" | "$" | "@" | "^" | "-";

export interface NodeAvailability {
  state: NodeBaseState;
  flags: NodeStateFlag[];
  available: boolean;
}

export interface NodeStatus {
  name: string;
  raw: string;
  availability: NodeAvailability;
}

// --- Interface discovery ---

export interface InterfaceRecord {
  name: string;
  mac_address: string;
  ip_addresses: string[];
}

/** One line of worker output: the interfaces found on a single node. */
export interface NodeDiscoveryReport {
  node_name: string;
  hostname: string;
  location: string;
  interfaces: InterfaceRecord[];
}

// --- CloudVision resource payloads ---

export interface ResourceKey {
  id: string;
}

export interface RepeatedValues<T> {
  values: T[];
}

export interface JobConfigPayload {
  key: ResourceKey;
  name: string;
  state: JobState;
  start_time: string;
  location: string;
  end_time?: string;
  type?: JobType;
  nodes?: RepeatedValues<string>;
  interfaces?: RepeatedValues<string>;
}

export interface NodeConfigInterface {
  name: string;
  mac_address: string;
  ip_addresses: RepeatedValues<string>;
}

export interface NodeConfigPayload {
  key: ResourceKey;
  location: string;
  hostname: string;
  data_interfaces: RepeatedValues<NodeConfigInterface>;
}

// --- Config types ---

export interface AppConfig {
  api: {
    server: string;
    token: string;
  };
  job_hook: {
    log_file: string;
    log_level: LogLevel;
    job_name_filter: string;
    partition_filter: string[];
    tenant_job: boolean;
  };
  inventory: {
    poll_interval: number;
    iface_name_regex: string;
    discovery_job_name: string;
    worker_command: string[];
  };
}

export type LogLevel = "debug" | "info" | "warn" | "error";
