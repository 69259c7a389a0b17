import type { NodeStatus } from "@cvslurm/shared";
import { parseClusterName, parseNodeStatus } from "@/parsers/index.ts";
import { SINFO_NODE_STATE_FORMAT } from "@/lib/constants.ts";
import { ConfigError, SlurmCommandError } from "@/lib/errors.ts";
import type { Logger } from "@/lib/logger.ts";
import { execChecked, type CommandRunner, type RunOptions } from "./exec.ts";
import type { NodeSnapshot } from "./inventory-diff.ts";

export interface SrunOptions {
  jobName: string;
  nodes: string[];
  command: string[];
  env?: NodeJS.ProcessEnv;
}

export class SlurmClient {
  private runner: CommandRunner;
  private logger: Logger;

  constructor(runner: CommandRunner, logger: Logger) {
    this.runner = runner;
    this.logger = logger;
  }

  // --- Query methods ---

  /**
   * ClusterName from `scontrol show config`. Throws ConfigError when
   * scontrol fails or the key is absent; the inventory cannot run without it.
   */
  async getClusterName(): Promise<string> {
    let output: string;
    try {
      output = await execChecked(this.runner, ["scontrol", "show", "config"]);
    } catch (error) {
      if (error instanceof SlurmCommandError) {
        throw new ConfigError(
          `Failed to get cluster name from scontrol: ${error.message}. Make sure Slurm is configured and scontrol is available.`,
        );
      }
      throw error;
    }

    const name = parseClusterName(output);
    if (!name) {
      throw new ConfigError(
        "ClusterName not found in 'scontrol show config' output. Set ClusterName in slurm.conf.",
      );
    }
    this.logger.debug(`Found cluster name from scontrol: ${name}`);
    return name;
  }

  /** Node states from one sinfo sweep. A failing sinfo yields no nodes. */
  async getNodeStatus(): Promise<NodeStatus[]> {
    let output: string;
    try {
      output = await execChecked(this.runner, [
        "sinfo",
        "-h",
        "-N",
        "-o",
        SINFO_NODE_STATE_FORMAT,
      ]);
    } catch (error) {
      if (!(error instanceof SlurmCommandError)) throw error;
      this.logger.error(`Failed to run sinfo: ${error.message}`);
      return [];
    }

    this.logger.debug(`sinfo output:\n${output.trimEnd()}`);
    const nodes = parseNodeStatus(output);

    for (const node of nodes) {
      this.logger.debug(
        `Node: ${node.name}, State: '${node.raw}' (${node.availability.state})`,
      );
      if (!node.availability.available) {
        this.logger.warn(`Node ${node.name} has state '${node.raw}' (not available)`);
      }
    }
    return nodes;
  }

  /** All nodes and the schedulable subset, taken from the same sweep. */
  async getNodeSnapshot(): Promise<NodeSnapshot> {
    const nodes = await this.getNodeStatus();
    return {
      all: new Set(nodes.map((n) => n.name)),
      available: new Set(
        nodes.filter((n) => n.availability.available).map((n) => n.name),
      ),
    };
  }

  // --- Action methods ---

  /**
   * Run one task per node in parallel through srun and return its stdout.
   * Throws SlurmCommandError when srun fails.
   */
  async srun(options: SrunOptions): Promise<string> {
    const count = String(options.nodes.length);
    const args = [
      "srun",
      "--job-name",
      options.jobName,
      "--nodes",
      count,
      "--ntasks",
      count,
      "--ntasks-per-node",
      "1",
      "--nodelist",
      options.nodes.join(","),
      "--oversubscribe",
      "--immediate",
      ...options.command,
    ];

    const runOptions: RunOptions = { env: options.env };
    this.logger.debug(`Running: ${args.join(" ")}`);
    return execChecked(this.runner, args, runOptions);
  }
}
