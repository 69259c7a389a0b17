import type {
  NodeAvailability,
  NodeBaseState,
  NodeStateFlag,
  NodeStatus,
} from "@cvslurm/shared";
import { AVAILABLE_NODE_STATES } from "@cvslurm/shared";

const STATE_MAP: Record<string, NodeBaseState> = {
  IDLE: "idle",
  ALLOCATED: "allocated",
  ALLOC: "allocated",
  MIXED: "mixed",
  MIX: "mixed",
  COMPLETING: "completing",
  COMP: "completing",
  PLANNED: "planned",
  DRAINING: "draining",
  DRNG: "draining",
  DRAINED: "drained",
  DRAIN: "drained",
  DOWN: "down",
  FAIL: "fail",
  FAILING: "failing",
  FAILG: "failing",
  FUTURE: "future",
  FUTR: "future",
  INVAL: "inval",
  MAINT: "maint",
  REBOOT: "reboot",
  REBOOT_ISSUED: "reboot",
  REBOOT_REQUESTED: "reboot",
  RESERVED: "reserved",
  RESV: "reserved",
  POWER_DOWN: "power_down",
  POWERED_DOWN: "power_down",
  POWERING_DOWN: "power_down",
  POWER_UP: "power_up",
  POWERING_UP: "power_up",
};

const FLAG_CHARS = new Set<string>(["*", "~", "#", "!", "%", "$", "@", "^", "-"]);

function isFlag(char: string): char is NodeStateFlag {
  return FLAG_CHARS.has(char);
}

/**
 * Classify one `sinfo %T` state token, e.g. "idle", "mixed-", "down*".
 * Matching is case-insensitive. Only a bare idle, allocated, mixed or
 * completing token is available; unrecognised states are "unknown".
 */
export function classifyNodeState(raw: string): NodeAvailability {
  let base = raw.trim();
  const flags: NodeStateFlag[] = [];

  // Strip suffixes like *, ~, #, $, @
  while (base.length > 0) {
    const last = base.charAt(base.length - 1);
    if (!isFlag(last)) break;
    flags.unshift(last);
    base = base.slice(0, -1);
  }

  const state = STATE_MAP[base.toUpperCase()] ?? "unknown";
  // Any flag suffix takes the node out of the available set
  const available = AVAILABLE_NODE_STATES.has(state) && flags.length === 0;

  return { state, flags, available };
}

/**
 * Parse sinfo output.
 * Expected format: `sinfo -h -N -o "%n %T"`
 * Fields: HOSTNAME STATE
 *
 *   gpu-a01 idle
 *   gpu-a02 mixed-
 *   gpu-a03 down*
 *
 * Nodes appear once per partition; later duplicates are dropped.
 */
export function parseNodeStatus(output: string): NodeStatus[] {
  const nodes = new Map<string, NodeStatus>();

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const [name, stateRaw] = trimmed.split(/\s+/);
    if (!name || !stateRaw) continue;
    if (nodes.has(name)) continue;

    nodes.set(name, {
      name,
      raw: stateRaw,
      availability: classifyNodeState(stateRaw),
    });
  }

  return [...nodes.values()];
}
