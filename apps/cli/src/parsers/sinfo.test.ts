import { describe, it, expect } from "vitest";
import { classifyNodeState, parseNodeStatus } from "./sinfo.ts";

describe("classifyNodeState", () => {
  it("treats schedulable base states as available", () => {
    for (const raw of ["idle", "allocated", "mixed", "completing"]) {
      expect(classifyNodeState(raw).available).toBe(true);
    }
  });

  it("matches case-insensitively and maps short forms", () => {
    expect(classifyNodeState("MIX")).toEqual({ state: "mixed", flags: [], available: true });
    expect(classifyNodeState("Alloc").state).toBe("allocated");
  });

  it("marks not-responding and power flags unavailable", () => {
    expect(classifyNodeState("idle*")).toEqual({
      state: "idle",
      flags: ["*"],
      available: false,
    });
    expect(classifyNodeState("idle~").available).toBe(false);
    expect(classifyNodeState("idle#").available).toBe(false);
    expect(classifyNodeState("mixed!").available).toBe(false);
    expect(classifyNodeState("mixed%").available).toBe(false);
  });

  it("marks any other flag unavailable too", () => {
    expect(classifyNodeState("mixed-")).toEqual({
      state: "mixed",
      flags: ["-"],
      available: false,
    });
    expect(classifyNodeState("allocated$@")).toEqual({
      state: "allocated",
      flags: ["$", "@"],
      available: false,
    });
    expect(
      ["idle", "mixed-", "idle@", "idle$", "allocated^"].map(
        (raw) => classifyNodeState(raw).available,
      ),
    ).toEqual([true, false, false, false, false]);
  });

  it("never makes down or drained nodes available", () => {
    expect(classifyNodeState("down*").available).toBe(false);
    expect(classifyNodeState("drained").available).toBe(false);
    expect(classifyNodeState("draining").state).toBe("draining");
  });

  it("reports unrecognised states as unknown", () => {
    expect(classifyNodeState("sleepy")).toEqual({
      state: "unknown",
      flags: [],
      available: false,
    });
  });
});

describe("parseNodeStatus", () => {
  it("parses one node per line and drops partition duplicates", () => {
    const output = [
      "gpu-a01 idle",
      "gpu-a02 mixed-",
      "",
      "gpu-a03 down*",
      "gpu-a01 allocated",
      "broken",
    ].join("\n");

    const nodes = parseNodeStatus(output);

    expect(nodes.map((n) => n.name)).toEqual(["gpu-a01", "gpu-a02", "gpu-a03"]);
    expect(nodes[0]?.raw).toBe("idle");
    expect(nodes[2]?.availability.available).toBe(false);
  });

  it("returns nothing for empty output", () => {
    expect(parseNodeStatus("")).toEqual([]);
  });
});
