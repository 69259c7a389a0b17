import type { Logger } from "@/lib/logger.ts";
import type { InterfaceCollector } from "./discovery.ts";
import type { CloudVisionClient } from "./cloudvision.ts";
import {
  diffInventory,
  EMPTY_SNAPSHOT,
  type InventoryDiff,
  type NodeSnapshot,
} from "./inventory-diff.ts";
import type { TickSource } from "./scheduler.ts";

export interface BatchResult {
  succeeded: number;
  failed: number;
}

export interface TickResult {
  diff: InventoryDiff;
  refreshed: BatchResult;
  deleted: BatchResult;
}

export interface NodeSnapshotSource {
  getNodeSnapshot(): Promise<NodeSnapshot>;
}

export type NodeConfigSink = Pick<
  CloudVisionClient,
  "sendNodeConfig" | "deleteNodeConfig"
>;

const NO_WORK: BatchResult = { succeeded: 0, failed: 0 };

/**
 * Discovers interfaces on nodes and pushes NodeConfig upserts and deletes.
 * Per-node outcomes are counted, never retried.
 */
export class NodeInventory {
  constructor(
    private readonly collector: InterfaceCollector,
    private readonly api: NodeConfigSink,
    private readonly clusterName: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Collect interface data from `nodes` and upsert one NodeConfig each.
   * A requested node that sent back no report counts as a failure.
   */
  async refresh(nodes: string[]): Promise<BatchResult> {
    if (nodes.length === 0) return NO_WORK;

    const reports = await this.collector.collect(nodes, this.clusterName);
    const result: BatchResult = { succeeded: 0, failed: 0 };

    const reported = new Set(reports.map((r) => r.node_name));
    for (const node of nodes) {
      if (!reported.has(node)) {
        this.logger.warn(`No interface data received from node ${node}`);
        result.failed++;
      }
    }

    for (const report of reports) {
      const ok = await this.api.sendNodeConfig({
        nodeName: report.node_name,
        location: report.location,
        interfaces: report.interfaces,
      });
      if (ok) result.succeeded++;
      else result.failed++;
    }

    return result;
  }

  async remove(nodes: string[]): Promise<BatchResult> {
    const result: BatchResult = { succeeded: 0, failed: 0 };
    for (const node of nodes) {
      if (await this.api.deleteNodeConfig(node)) result.succeeded++;
      else result.failed++;
    }
    return result;
  }
}

/**
 * Polls node state and keeps CloudVision in step with it. Holds exactly
 * one previous snapshot; it is replaced after every tick whatever the
 * per-node outcome, so a failed upsert waits for the node's next
 * availability change.
 */
export class InventoryMonitor {
  private previous: NodeSnapshot = EMPTY_SNAPSHOT;

  constructor(
    private readonly source: NodeSnapshotSource,
    private readonly inventory: NodeInventory,
    private readonly logger: Logger,
  ) {}

  get snapshot(): NodeSnapshot {
    return this.previous;
  }

  /** Initial full poll, and inventory of every node available right now. */
  async seed(): Promise<BatchResult> {
    const current = await this.source.getNodeSnapshot();
    this.previous = current;

    if (current.all.size === 0) {
      this.logger.warn("No nodes found in initial scan");
      return NO_WORK;
    }

    this.logger.info(`Initial node count: ${current.all.size}`);
    this.logger.debug(`Initial nodes: ${[...current.all].sort().join(", ")}`);

    const unavailable = [...current.all].filter((n) => !current.available.has(n)).sort();
    if (unavailable.length > 0) {
      this.logger.info(`Unavailable nodes (${unavailable.length}): ${unavailable.join(", ")}`);
    }

    const available = [...current.available].sort();
    if (available.length === 0) return NO_WORK;

    this.logger.info(`Running initial node inventory for ${available.length} available nodes...`);
    const result = await this.inventory.refresh(available);
    this.logger.info(`Initial inventory: ${result.succeeded} succeeded, ${result.failed} failed`);
    return result;
  }

  async tick(): Promise<TickResult> {
    const current = await this.source.getNodeSnapshot();
    const diff = diffInventory(this.previous, current);
    this.previous = current;

    if (!diff.changed) {
      this.logger.debug("No node or state changes detected");
      return { diff, refreshed: NO_WORK, deleted: NO_WORK };
    }

    if (diff.added.length > 0) {
      this.logger.info(`Detected ${diff.added.length} new node(s): ${diff.added.join(", ")}`);
    }
    if (diff.newlyAvailable.length > 0) {
      this.logger.info(
        `Detected ${diff.newlyAvailable.length} node(s) became available: ${diff.newlyAvailable.join(", ")}`,
      );
    }

    let refreshed = NO_WORK;
    if (diff.toRefresh.length > 0) {
      this.logger.info(`Updating ${diff.toRefresh.length} node(s)...`);
      refreshed = await this.inventory.refresh(diff.toRefresh);
      this.logger.info(`Updated nodes: ${refreshed.succeeded} succeeded, ${refreshed.failed} failed`);
    }

    let deleted = NO_WORK;
    if (diff.removed.length > 0) {
      this.logger.info(`Detected ${diff.removed.length} removed node(s): ${diff.removed.join(", ")}`);
      deleted = await this.inventory.remove(diff.removed);
      this.logger.info(`Deleted nodes: ${deleted.succeeded} succeeded, ${deleted.failed} failed`);
    }

    return { diff, refreshed, deleted };
  }

  /** Tick once per value of `ticks`; ticks never overlap. */
  async run(ticks: TickSource): Promise<void> {
    for await (const _tick of ticks) {
      await this.tick();
    }
  }
}
