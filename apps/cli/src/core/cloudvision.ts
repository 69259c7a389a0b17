import type {
  AppConfig,
  InterfaceRecord,
  JobConfigPayload,
  JobState,
  NodeConfigPayload,
} from "@cvslurm/shared";
import {
  API_TIMEOUTS_MS,
  CLOUDVISION_ENDPOINTS,
  TERMINAL_STATES,
} from "@cvslurm/shared";
import { errorMessage } from "@/lib/errors.ts";
import type { Logger } from "@/lib/logger.ts";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Resources a job runs on. Node mode reports whole nodes (exclusive
 * allocation); interface mode reports interface MAC addresses when only
 * some interfaces of a node belong to the job.
 */
export type JobAllocation =
  | { mode: "node"; nodes: string[] }
  | { mode: "interface"; interfaces: string[] };

export interface JobConfigInput {
  id: string;
  name: string;
  location: string;
  state: JobState;
  startTime: string;
  endTime?: string | null;
  allocation: JobAllocation;
  tenant?: boolean;
}

export interface NodeConfigInput {
  nodeName: string;
  location: string;
  interfaces: InterfaceRecord[];
}

export function buildJobConfigPayload(
  input: JobConfigInput,
  endTime: string | undefined,
): JobConfigPayload {
  const payload: JobConfigPayload = {
    key: { id: input.id },
    name: input.name,
    state: input.state,
    start_time: input.startTime,
    location: input.location,
  };

  if (input.allocation.mode === "interface") {
    payload.interfaces = { values: input.allocation.interfaces };
  } else {
    payload.nodes = { values: input.allocation.nodes };
  }

  if (endTime) payload.end_time = endTime;
  if (input.tenant) payload.type = "JOB_TYPE_TENANT";

  return payload;
}

export function buildNodeConfigPayload(input: NodeConfigInput): NodeConfigPayload {
  return {
    key: { id: input.nodeName },
    location: input.location,
    hostname: input.nodeName,
    data_interfaces: {
      values: input.interfaces.map((iface) => ({
        name: iface.name,
        mac_address: iface.mac_address,
        ip_addresses: { values: iface.ip_addresses },
      })),
    },
  };
}

function allocationSize(allocation: JobAllocation): number {
  return allocation.mode === "interface"
    ? allocation.interfaces.length
    : allocation.nodes.length;
}

/**
 * Client for the CloudVision JobConfig and NodeConfig resources.
 *
 * Every call returns true on HTTP 2xx and false otherwise. Failures are
 * logged with the request payload and the response, and never retried.
 */
export class CloudVisionClient {
  private server: string;
  private token: string;
  private logger: Logger;
  private fetchImpl: FetchLike;

  constructor(api: AppConfig["api"], logger: Logger, fetchImpl: FetchLike = fetch) {
    this.server = api.server;
    this.token = api.token;
    this.logger = logger;
    this.fetchImpl = fetchImpl;
  }

  get configured(): boolean {
    return this.server !== "" && this.token !== "";
  }

  private url(path: string): string {
    return `https://${this.server}${path}`;
  }

  private get headers(): Record<string, string> {
    return {
      accept: "application/json",
      "Content-Type": "application/json",
      Authorization: `Bearer ${this.token}`,
    };
  }

  async sendJobConfig(input: JobConfigInput): Promise<boolean> {
    if (!this.configured) {
      this.logger.debug("JobConfig API not configured, skipping API call");
      return false;
    }

    if (allocationSize(input.allocation) === 0) {
      const what = input.allocation.mode === "interface" ? "interfaces" : "nodes";
      this.logger.info(`[CV-API] Skipping JobConfig for job ${input.id}: no ${what} found`);
      return false;
    }

    let endTime: string | undefined;
    if (TERMINAL_STATES.has(input.state)) {
      if (!input.endTime) {
        this.logger.error(
          `[CV-API] Missing end_time for job ${input.id} in terminal state ${input.state}`,
        );
        return false;
      }
      endTime = input.endTime;
    }

    const payload = buildJobConfigPayload(input, endTime);
    const countInfo =
      input.allocation.mode === "interface"
        ? `interfaces=${input.allocation.interfaces.length}`
        : `nodes=${input.allocation.nodes.length}`;
    this.logger.info(
      `[CV-API] Sending JobConfig: key=${input.id}, name=${input.name}, state=${input.state}, ${countInfo}, start_time=${input.startTime}, end_time=${endTime ?? "none"}`,
    );

    return this.request({
      method: "POST",
      path: CLOUDVISION_ENDPOINTS.jobConfig,
      payload,
      timeoutMs: API_TIMEOUTS_MS.jobConfig,
      action: "send job data to API",
    });
  }

  async sendNodeConfig(input: NodeConfigInput): Promise<boolean> {
    if (!this.configured) {
      this.logger.debug(
        `NodeConfig API not configured, skipping NodeConfig call for node ${input.nodeName}`,
      );
      return false;
    }

    const payload = buildNodeConfigPayload(input);
    const macs = input.interfaces.map((i) => i.mac_address).sort();
    this.logger.info(
      `[CV-API] Sending NodeConfig for node ${input.nodeName} with ${input.interfaces.length} interfaces: ${macs.join(", ")}`,
    );

    return this.request({
      method: "POST",
      path: CLOUDVISION_ENDPOINTS.nodeConfig,
      payload,
      timeoutMs: API_TIMEOUTS_MS.nodeConfig,
      action: `send NodeConfig to API for node ${input.nodeName}`,
    });
  }

  async deleteNodeConfig(nodeName: string): Promise<boolean> {
    if (!this.configured) {
      this.logger.debug(
        `NodeConfig API not configured, skipping NodeConfig delete for node ${nodeName}`,
      );
      return false;
    }

    this.logger.info(`[CV-API] Deleting NodeConfig for node ${nodeName}`);
    return this.request({
      method: "DELETE",
      path: `${CLOUDVISION_ENDPOINTS.nodeConfig}?key.id=${encodeURIComponent(nodeName)}`,
      timeoutMs: API_TIMEOUTS_MS.nodeConfig,
      action: `delete NodeConfig from API for node ${nodeName}`,
    });
  }

  private async request(options: {
    method: "POST" | "DELETE";
    path: string;
    payload?: JobConfigPayload | NodeConfigPayload;
    timeoutMs: number;
    action: string;
  }): Promise<boolean> {
    const { method, path, payload, timeoutMs, action } = options;
    const body = payload ? JSON.stringify(payload) : undefined;
    if (body) this.logger.debug(`API Request Payload: ${body}`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.url(path), {
        method,
        headers: this.headers,
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      this.logger.error(`Failed to ${action}: ${errorMessage(error)}`);
      if (body) this.logger.error(`Failed API Request Payload: ${body}`);
      return false;
    }

    const text = await readBody(response);
    if (!response.ok) {
      this.logger.error(
        `Failed to ${action}: HTTP ${response.status} ${response.statusText}`.trimEnd(),
      );
      if (body) this.logger.error(`Failed API Request Payload: ${body}`);
      this.logger.error(`Response status: ${response.status}`);
      this.logger.error(`Response body: ${text}`);
      return false;
    }

    this.logger.debug(`Successful ${method} ${path}. Response: ${response.status}`);
    this.logger.debug(`API Response Body: ${text}`);
    return true;
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable: ${errorMessage(error)}>`;
  }
}
