import type { AppConfig, NodeDiscoveryReport } from "@cvslurm/shared";
import { parseDiscoveryOutput } from "@/parsers/index.ts";
import { WORKER_ENV } from "@/lib/constants.ts";
import { SlurmCommandError } from "@/lib/errors.ts";
import type { Logger } from "@/lib/logger.ts";
import type { SlurmClient } from "./slurm.ts";

export interface InterfaceCollector {
  collect(nodes: string[], clusterName: string): Promise<NodeDiscoveryReport[]>;
}

/**
 * Collects interface reports by running `<worker command> discover` on
 * every requested node at once through srun.
 */
export class SrunInterfaceCollector implements InterfaceCollector {
  constructor(
    private readonly slurm: SlurmClient,
    private readonly config: AppConfig["inventory"],
    private readonly logger: Logger,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async collect(
    nodes: string[],
    clusterName: string,
  ): Promise<NodeDiscoveryReport[]> {
    if (nodes.length === 0) {
      this.logger.warn("No nodes to collect from");
      return [];
    }

    this.logger.info(`Collecting interface data from ${nodes.length} node(s)...`);

    let output: string;
    try {
      output = await this.slurm.srun({
        jobName: this.config.discovery_job_name,
        nodes,
        command: [...this.config.worker_command, "discover"],
        env: {
          ...this.env,
          [WORKER_ENV.logLevel]: this.logger.isEnabled("debug") ? "DEBUG" : "INFO",
          [WORKER_ENV.ifaceNameRegex]: this.config.iface_name_regex,
          [WORKER_ENV.clusterName]: clusterName,
        },
      });
    } catch (error) {
      if (!(error instanceof SlurmCommandError)) throw error;
      this.logger.error(`srun failed: ${error.message}`);
      return [];
    }

    const { reports, skipped } = parseDiscoveryOutput(output);
    for (const { line, reason } of skipped) {
      this.logger.warn(`Failed to parse JSON from node: ${reason}`);
      this.logger.debug(`Line: ${line}`);
    }

    this.logger.info(`Successfully collected data from ${reports.length} node(s)`);
    return reports;
  }
}
