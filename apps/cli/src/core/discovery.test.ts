import { describe, it, expect } from "vitest";
import { SrunInterfaceCollector } from "./discovery.ts";
import { SlurmClient } from "./slurm.ts";
import { fakeRunner, recordingLogger, testConfig } from "@/test/fakes.ts";

const line = (node: string) =>
  JSON.stringify({ node_name: node, hostname: node, location: "c", interfaces: [] });

describe("SrunInterfaceCollector", () => {
  it("runs the worker on every node and parses one report per line", async () => {
    const runner = fakeRunner({ srun: { stdout: `${line("n1")}\nnot json\n${line("n2")}\n` } });
    const { logger, messages } = recordingLogger();
    const collector = new SrunInterfaceCollector(
      new SlurmClient(runner, logger),
      testConfig().inventory,
      logger,
      { PATH: "/usr/bin" },
    );

    const reports = await collector.collect(["n1", "n2"], "gpu-cluster");

    expect(reports.map((r) => r.node_name)).toEqual(["n1", "n2"]);
    expect(messages("warn")).toHaveLength(1);
    expect(messages("warn")[0]).toMatch(/^Failed to parse JSON from node: /);

    const [args, options] = runner.mock.calls[0] ?? [];
    expect(args?.slice(-2)).toEqual(["cvslurm", "discover"]);
    expect(options?.env).toEqual({
      PATH: "/usr/bin",
      LOG_LEVEL: "DEBUG",
      IFACE_NAME_REGEX: "^(eth|eno|ens|enp|em).*",
      SLURM_CLUSTER_NAME: "gpu-cluster",
    });
  });

  it("uses the configured worker command", async () => {
    const runner = fakeRunner({ srun: {} });
    const { logger } = recordingLogger("info");
    const collector = new SrunInterfaceCollector(
      new SlurmClient(runner, logger),
      testConfig({ inventory: { worker_command: ["/opt/cvslurm/bin/cvslurm"] } }).inventory,
      logger,
      {},
    );

    await collector.collect(["n1"], "c");

    const [args, options] = runner.mock.calls[0] ?? [];
    expect(args?.slice(-2)).toEqual(["/opt/cvslurm/bin/cvslurm", "discover"]);
    expect(options?.env?.LOG_LEVEL).toBe("INFO");
  });

  it("returns no reports when srun fails", async () => {
    const { logger, messages } = recordingLogger();
    const collector = new SrunInterfaceCollector(
      new SlurmClient(fakeRunner({ srun: { exitCode: 1, stderr: "Unable to allocate" } }), logger),
      testConfig().inventory,
      logger,
      {},
    );

    expect(await collector.collect(["n1"], "c")).toEqual([]);
    expect(messages("error")).toEqual(["srun failed: srun failed (exit 1): Unable to allocate"]);
  });

  it("does not run srun for an empty node list", async () => {
    const runner = fakeRunner({});
    const { logger } = recordingLogger();
    const collector = new SrunInterfaceCollector(
      new SlurmClient(runner, logger),
      testConfig().inventory,
      logger,
      {},
    );

    expect(await collector.collect([], "c")).toEqual([]);
    expect(runner).not.toHaveBeenCalled();
  });
});
