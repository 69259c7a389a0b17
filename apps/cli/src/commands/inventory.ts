import { InvalidArgumentError, type Command } from "commander";
import { loadConfig, isApiConfigured, configPath } from "@/core/config.ts";
import { CloudVisionClient } from "@/core/cloudvision.ts";
import { SrunInterfaceCollector } from "@/core/discovery.ts";
import { runCommand } from "@/core/exec.ts";
import {
  InventoryMonitor,
  NodeInventory,
  type NodeSnapshotSource,
} from "@/core/inventory-monitor.ts";
import { IntervalTicker, type TickSource } from "@/core/scheduler.ts";
import { SlurmClient } from "@/core/slurm.ts";
import { createLogger, type Logger } from "@/lib/logger.ts";
import { errorMessage } from "@/lib/errors.ts";
import { theme } from "@/lib/theme.ts";

interface InventoryOptions {
  debug?: boolean;
  monitor?: boolean;
  pollInterval?: number;
}

function parsePollInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("must be a positive number of seconds");
  }
  return seconds;
}

export function registerInventoryCommand(program: Command) {
  program
    .command("inventory")
    .description("Collect Slurm node inventory and update CloudVision NodeConfig")
    .option("-v, --debug", "enable debug logging")
    .option(
      "--monitor",
      "run in continuous monitoring mode (node add/delete and availability changes)",
    )
    .option(
      "--poll-interval <seconds>",
      "seconds between node checks in monitor mode (default: config, else 60)",
      parsePollInterval,
    )
    .action(async (options: InventoryOptions) => {
      try {
        process.exitCode = await runInventory(options);
      } catch (error) {
        console.error(theme.error(`\nError: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}

async function runInventory(options: InventoryOptions): Promise<number> {
  const config = loadConfig();
  const logger = createLogger({ level: options.debug ? "debug" : "info" });

  if (!isApiConfigured(config)) {
    logger.error("api.server and api.token must be configured");
    logger.error(
      `Set them in ${configPath()} (see "cvslurm init"), or export CV_API_SERVER and CV_API_TOKEN`,
    );
    return 1;
  }

  const slurm = new SlurmClient(runCommand, logger);
  const clusterName = await slurm.getClusterName();
  logger.info(`Cluster name: ${clusterName}`);

  const inventory = new NodeInventory(
    new SrunInterfaceCollector(slurm, config.inventory, logger),
    new CloudVisionClient(config.api, logger),
    clusterName,
    logger,
  );

  if (!options.monitor) {
    return runOnce(slurm, inventory, logger);
  }

  const controller = new AbortController();
  const shutdown = () => {
    logger.info("Received interrupt signal, shutting down...");
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  const pollInterval = options.pollInterval ?? config.inventory.poll_interval;
  await monitorNodes(
    slurm,
    inventory,
    new IntervalTicker(pollInterval * 1000, controller.signal),
    pollInterval,
    logger,
  );
  return 0;
}

/**
 * Inventory every available node once. Fails (1) only when every node
 * that was attempted failed.
 */
export async function runOnce(
  source: NodeSnapshotSource,
  inventory: NodeInventory,
  logger: Logger,
): Promise<number> {
  logger.info("Running one-time node inventory collection...");

  const snapshot = await source.getNodeSnapshot();
  const unavailable = [...snapshot.all].filter((n) => !snapshot.available.has(n)).sort();
  if (unavailable.length > 0) {
    logger.info(`Unavailable nodes (${unavailable.length}): ${unavailable.join(", ")}`);
  }

  const available = [...snapshot.available].sort();
  if (available.length === 0) {
    logger.warn("No available nodes found");
    return 0;
  }

  logger.info(`Collecting from ${available.length} available nodes...`);
  const result = await inventory.refresh(available);
  logger.info(`Inventory complete: ${result.succeeded} succeeded, ${result.failed} failed`);

  return result.failed > 0 && result.succeeded === 0 ? 1 : 0;
}

export async function monitorNodes(
  source: NodeSnapshotSource,
  inventory: NodeInventory,
  ticks: TickSource,
  pollInterval: number,
  logger: Logger,
): Promise<InventoryMonitor> {
  logger.info(`Starting Slurm node monitor (poll interval: ${pollInterval} seconds)`);

  const monitor = new InventoryMonitor(source, inventory, logger);
  await monitor.seed();
  await monitor.run(ticks);
  return monitor;
}
