export { expandNodeList } from "./nodelist.ts";
export { classifyNodeState, parseNodeStatus } from "./sinfo.ts";
export { parseScontrolConfig, parseClusterName } from "./scontrol.ts";
export { parseDiscoveryOutput } from "./discovery.ts";
