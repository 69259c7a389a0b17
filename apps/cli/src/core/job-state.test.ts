import { describe, it, expect } from "vitest";
import { classifyJobState, convertTimestamp, parseExitStatus } from "./job-state.ts";

const EPILOG = "epilog_slurmctld";

describe("classifyJobState", () => {
  it("reports the prolog as running", () => {
    expect(classifyJobState("prolog_slurmctld")).toBe("JOB_STATE_RUNNING");
    expect(classifyJobState("prolog_slurmctld", { exitCode: "1" })).toBe("JOB_STATE_RUNNING");
  });

  it("reports a clean epilog as completed", () => {
    expect(classifyJobState(EPILOG, { exitCode: "0" })).toBe("JOB_STATE_COMPLETED");
    expect(classifyJobState(EPILOG, { exitCode2: "0:0" })).toBe("JOB_STATE_COMPLETED");
  });

  it("reports a signal with exit 0 as cancelled", () => {
    expect(classifyJobState(EPILOG, { exitCode: "0", exitCode2: "0:9" })).toBe(
      "JOB_STATE_CANCELLED",
    );
  });

  it("reports any nonzero exit code as failed", () => {
    expect(classifyJobState(EPILOG, { exitCode: "256" })).toBe("JOB_STATE_FAILED");
    expect(classifyJobState(EPILOG, { exitCode2: "1:0" })).toBe("JOB_STATE_FAILED");
    expect(classifyJobState(EPILOG, { exitCode2: "2:15" })).toBe("JOB_STATE_FAILED");
  });

  it("treats missing or garbled exit codes as completed", () => {
    expect(classifyJobState(EPILOG)).toBe("JOB_STATE_COMPLETED");
    expect(classifyJobState(EPILOG, { exitCode: "abc" })).toBe("JOB_STATE_COMPLETED");
  });

  it("reports any other context as unknown", () => {
    expect(classifyJobState("")).toBe("JOB_STATE_UNKNOWN");
    expect(classifyJobState("prolog")).toBe("JOB_STATE_UNKNOWN");
  });
});

describe("parseExitStatus", () => {
  it("prefers the exit:signal pair", () => {
    expect(parseExitStatus({ exitCode: "3", exitCode2: "0:9" })).toEqual({
      exitCode: 0,
      signal: 9,
    });
  });

  it("falls back to the plain exit code", () => {
    expect(parseExitStatus({ exitCode: "3", exitCode2: "" })).toEqual({
      exitCode: 3,
      signal: null,
    });
  });
});

describe("convertTimestamp", () => {
  it("converts Unix seconds to ISO 8601 UTC without milliseconds", () => {
    expect(convertTimestamp("1700000000")).toBe("2023-11-14T22:13:20Z");
    expect(convertTimestamp("0")).toBe("1970-01-01T00:00:00Z");
  });

  it("returns null for values that do not parse", () => {
    expect(convertTimestamp("abc")).toBeNull();
    expect(convertTimestamp("")).toBeNull();
    expect(convertTimestamp(undefined)).toBeNull();
    expect(convertTimestamp("1.5")).toBeNull();
  });

  it("returns null for timestamps out of range", () => {
    expect(convertTimestamp("99999999999999999")).toBeNull();
  });
});
