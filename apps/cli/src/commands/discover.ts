import type { Command } from "commander";
import { hostname } from "os";
import type { NodeDiscoveryReport } from "@cvslurm/shared";
import { DEFAULTS } from "@cvslurm/shared";
import { discoverInterfaces, type InterfaceScanOptions } from "@/core/interfaces.ts";
import { WORKER_ENV } from "@/lib/constants.ts";
import { DiscoveryError, errorMessage } from "@/lib/errors.ts";
import { createLogger, parseLogLevel, type Logger } from "@/lib/logger.ts";

export function registerDiscoverCommand(program: Command) {
  program
    .command("discover")
    .description(
      "Print this node's network interfaces as one JSON line (run on compute nodes by srun)",
    )
    .action(() => {
      // stdout carries the report; logs go to stderr
      const logger = createLogger({
        level: parseLogLevel(process.env[WORKER_ENV.logLevel], "info"),
        stream: process.stderr,
      });
      try {
        const report = buildDiscoveryReport(process.env, { logger });
        process.stdout.write(`${JSON.stringify(report)}\n`);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

export interface DiscoveryReportOptions extends Omit<InterfaceScanOptions, "nameRegex"> {
  hostname?: () => string;
}

/** Describe the local node from the environment srun hands the worker. */
export function buildDiscoveryReport(
  env: NodeJS.ProcessEnv,
  options: DiscoveryReportOptions,
): NodeDiscoveryReport {
  const { logger } = options;

  const nodeName = env[WORKER_ENV.nodeName];
  if (!nodeName) {
    throw new DiscoveryError(`${WORKER_ENV.nodeName} environment variable not set`);
  }

  const location = env[WORKER_ENV.clusterName] || DEFAULTS.clusterFallback;
  const host = (options.hostname ?? hostname)().split(".")[0] ?? nodeName;

  logger.info(`Discovering network interfaces on ${nodeName} (cluster: ${location})`);
  const interfaces = discoverInterfaces({
    ...options,
    nameRegex: env[WORKER_ENV.ifaceNameRegex],
  });
  logInterfaces(interfaces, logger);

  return { node_name: nodeName, hostname: host, location, interfaces };
}

function logInterfaces(interfaces: NodeDiscoveryReport["interfaces"], logger: Logger) {
  if (interfaces.length === 0) {
    logger.warn("No usable interfaces found");
    return;
  }
  logger.info(`Found ${interfaces.length} interface(s)`);
  for (const iface of interfaces) {
    logger.info(
      `  ${iface.name}: MAC=${iface.mac_address}, IP=${iface.ip_addresses.join(", ") || "none"}`,
    );
  }
}
