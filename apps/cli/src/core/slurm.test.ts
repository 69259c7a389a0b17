import { describe, it, expect } from "vitest";
import { SlurmClient } from "./slurm.ts";
import { ConfigError } from "@/lib/errors.ts";
import { fakeRunner, recordingLogger } from "@/test/fakes.ts";

describe("SlurmClient", () => {
  describe("getClusterName", () => {
    it("reads ClusterName from scontrol", async () => {
      const runner = fakeRunner({ scontrol: { stdout: "ClusterName = gpu-cluster\n" } });
      const slurm = new SlurmClient(runner, recordingLogger().logger);

      expect(await slurm.getClusterName()).toBe("gpu-cluster");
      expect(runner).toHaveBeenCalledWith(["scontrol", "show", "config"], undefined);
    });

    it("throws ConfigError when scontrol fails", async () => {
      const slurm = new SlurmClient(
        fakeRunner({ scontrol: { exitCode: 1, stderr: "cannot connect" } }),
        recordingLogger().logger,
      );
      await expect(slurm.getClusterName()).rejects.toThrow(ConfigError);
    });

    it("throws ConfigError when ClusterName is not set", async () => {
      const slurm = new SlurmClient(
        fakeRunner({ scontrol: { stdout: "SlurmUser = slurm\n" } }),
        recordingLogger().logger,
      );
      await expect(slurm.getClusterName()).rejects.toThrow(/ClusterName not found/);
    });
  });

  describe("getNodeSnapshot", () => {
    it("splits one sinfo sweep into all and available nodes", async () => {
      const runner = fakeRunner({ sinfo: { stdout: "n1 idle\nn2 down*\nn3 mixed\n" } });
      const { logger, messages } = recordingLogger();
      const slurm = new SlurmClient(runner, logger);

      const snapshot = await slurm.getNodeSnapshot();

      expect([...snapshot.all]).toEqual(["n1", "n2", "n3"]);
      expect([...snapshot.available]).toEqual(["n1", "n3"]);
      expect(runner).toHaveBeenCalledTimes(1);
      expect(runner).toHaveBeenCalledWith(["sinfo", "-h", "-N", "-o", "%n %T"], undefined);
      expect(messages("warn")).toEqual(["Node n2 has state 'down*' (not available)"]);
    });

    it("returns no nodes when sinfo fails", async () => {
      const { logger, messages } = recordingLogger();
      const slurm = new SlurmClient(
        fakeRunner({ sinfo: { exitCode: 1, stderr: "slurm_load_node error" } }),
        logger,
      );

      const snapshot = await slurm.getNodeSnapshot();

      expect(snapshot.all.size).toBe(0);
      expect(messages("error")).toEqual([
        "Failed to run sinfo: sinfo failed (exit 1): slurm_load_node error",
      ]);
    });
  });

  describe("srun", () => {
    it("runs one task per node without queueing", async () => {
      const runner = fakeRunner({ srun: { stdout: "ok\n" } });
      const slurm = new SlurmClient(runner, recordingLogger().logger);

      const output = await slurm.srun({
        jobName: "cv-interface-discovery",
        nodes: ["n1", "n2"],
        command: ["cvslurm", "discover"],
        env: { LOG_LEVEL: "INFO" },
      });

      expect(output).toBe("ok\n");
      expect(runner).toHaveBeenCalledWith(
        [
          "srun",
          "--job-name",
          "cv-interface-discovery",
          "--nodes",
          "2",
          "--ntasks",
          "2",
          "--ntasks-per-node",
          "1",
          "--nodelist",
          "n1,n2",
          "--oversubscribe",
          "--immediate",
          "cvslurm",
          "discover",
        ],
        { env: { LOG_LEVEL: "INFO" } },
      );
    });
  });
});
