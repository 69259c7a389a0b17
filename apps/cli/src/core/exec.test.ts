import { describe, it, expect } from "vitest";
import { execChecked } from "./exec.ts";
import { SlurmCommandError } from "@/lib/errors.ts";
import { fakeRunner } from "@/test/fakes.ts";

describe("execChecked", () => {
  it("returns stdout on success", async () => {
    const runner = fakeRunner({ sinfo: { stdout: "n1 idle\n" } });
    expect(await execChecked(runner, ["sinfo", "-h"])).toBe("n1 idle\n");
    expect(runner).toHaveBeenCalledWith(["sinfo", "-h"], undefined);
  });

  it("throws SlurmCommandError with stderr on a nonzero exit", async () => {
    const runner = fakeRunner({ sinfo: { exitCode: 1, stderr: "slurm_load_node error\n" } });

    const error = await execChecked(runner, ["sinfo"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SlurmCommandError);
    expect(error).toMatchObject({
      exitCode: 1,
      message: "sinfo failed (exit 1): slurm_load_node error",
    });
  });

  it("throws SlurmCommandError when the program cannot start", async () => {
    const runner = fakeRunner({});

    await expect(execChecked(runner, ["srun"])).rejects.toThrow(
      "srun failed: spawn srun ENOENT",
    );
  });
});
