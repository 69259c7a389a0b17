import { describe, it, expect } from "vitest";
import { monitorNodes, runOnce } from "./inventory.ts";
import { NodeInventory } from "@/core/inventory-monitor.ts";
import {
  fakeCollector,
  fakeSink,
  recordingLogger,
  snapshotSequence,
  ticks,
} from "@/test/fakes.ts";

function inventoryWith(silent: string[] = [], ok = true) {
  const { collector, calls } = fakeCollector(silent);
  const { logger, messages } = recordingLogger();
  const inventory = new NodeInventory(collector, fakeSink(ok), "c", logger);
  return { inventory, calls, logger, messages };
}

describe("runOnce", () => {
  it("inventories the available nodes and exits 0", async () => {
    const { inventory, calls, logger, messages } = inventoryWith();

    const code = await runOnce(snapshotSequence([["n1", "n2", "n3"], ["n3", "n1"]]), inventory, logger);

    expect(code).toBe(0);
    expect(calls).toEqual([["n1", "n3"]]);
    expect(messages("info")).toContain("Unavailable nodes (1): n2");
    expect(messages("info")).toContain("Inventory complete: 2 succeeded, 0 failed");
  });

  it("exits 0 when some nodes fail", async () => {
    const { inventory, logger } = inventoryWith(["n2"]);
    expect(await runOnce(snapshotSequence([["n1", "n2"], ["n1", "n2"]]), inventory, logger)).toBe(0);
  });

  it("exits 1 when every node fails", async () => {
    const { inventory, logger } = inventoryWith([], false);
    expect(await runOnce(snapshotSequence([["n1", "n2"], ["n1", "n2"]]), inventory, logger)).toBe(1);
  });

  it("exits 0 with a warning when no node is available", async () => {
    const { inventory, calls, logger, messages } = inventoryWith();

    expect(await runOnce(snapshotSequence([["n1"], []]), inventory, logger)).toBe(0);
    expect(calls).toEqual([]);
    expect(messages("warn")).toEqual(["No available nodes found"]);
  });
});

describe("monitorNodes", () => {
  it("seeds, then follows changes until the ticks end", async () => {
    const { inventory, calls, logger } = inventoryWith();

    const monitor = await monitorNodes(
      snapshotSequence([["n1"], ["n1"]], [["n1", "n2"], ["n1", "n2"]]),
      inventory,
      ticks(2),
      60,
      logger,
    );

    expect(calls).toEqual([["n1"], ["n2"]]);
    expect([...monitor.snapshot.available]).toEqual(["n1", "n2"]);
  });
});
