import { describe, it, expect } from "vitest";
import { parseClusterName, parseScontrolConfig } from "./scontrol.ts";

const OUTPUT = `Configuration data as of 2024-01-01T00:00:00
AccountingStorageType   = accounting_storage/none
ClusterName             = gpu-cluster
SlurmctldHost[0]        = head01
`;

describe("parseScontrolConfig", () => {
  it("splits key = value lines and ignores the header", () => {
    const config = parseScontrolConfig(OUTPUT);
    expect(config.get("ClusterName")).toBe("gpu-cluster");
    expect(config.get("SlurmctldHost[0]")).toBe("head01");
    expect(config.size).toBe(3);
  });

  it("keeps everything after the first equals sign", () => {
    expect(parseScontrolConfig("Opts = a=b").get("Opts")).toBe("a=b");
  });
});

describe("parseClusterName", () => {
  it("returns the ClusterName value", () => {
    expect(parseClusterName(OUTPUT)).toBe("gpu-cluster");
  });

  it("returns null when the key is missing or empty", () => {
    expect(parseClusterName("SlurmUser = slurm")).toBeNull();
    expect(parseClusterName("ClusterName =")).toBeNull();
  });
});
