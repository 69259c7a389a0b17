export {
  TERMINAL_STATES,
  AVAILABLE_NODE_STATES,
  CLOUDVISION_ENDPOINTS,
  API_TIMEOUTS_MS,
  DEFAULTS,
} from "./constants.ts";
export type {
  JobState,
  JobType,
  NodeBaseState,
  NodeStateFlag,
  NodeAvailability,
  NodeStatus,
  InterfaceRecord,
  NodeDiscoveryReport,
  ResourceKey,
  RepeatedValues,
  JobConfigPayload,
  NodeConfigInterface,
  NodeConfigPayload,
  AppConfig,
  LogLevel,
} from "./types.ts";
