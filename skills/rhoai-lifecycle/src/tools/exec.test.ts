import { COMMAND_NOT_FOUND, execCmd, parseTimeoutFlag } from "./exec.js";
import { isNotFound, run } from "./shell.js";

describe("parseTimeoutFlag", () => {
  it("reads --timeout=<n>s", () => {
    expect(parseTimeoutFlag(["delete", "namespace", "test-ns", "--timeout=300s"])).toBe(300_000);
  });

  it("reads a separate value with units", () => {
    expect(parseTimeoutFlag(["wait", "--timeout", "5m"])).toBe(300_000);
    expect(parseTimeoutFlag(["wait", "--timeout", "1h"])).toBe(3_600_000);
    expect(parseTimeoutFlag(["wait", "--timeout=250ms"])).toBe(250);
  });

  it("treats a bare number as seconds", () => {
    expect(parseTimeoutFlag(["--timeout=60"])).toBe(60_000);
  });

  it("returns undefined without a timeout or with one it cannot read", () => {
    expect(parseTimeoutFlag(["get", "pods"])).toBeUndefined();
    expect(parseTimeoutFlag(["--timeout=soon"])).toBeUndefined();
    expect(parseTimeoutFlag(["--timeout"])).toBeUndefined();
  });
});

describe("execCmd", () => {
  it("reports a binary that cannot be started as COMMAND_NOT_FOUND", async () => {
    await expect(execCmd("./no-such-oc-binary", ["get", "pods"])).resolves.toEqual({
      code: COMMAND_NOT_FOUND,
      stdout: "",
      stderr: "Command not found: ./no-such-oc-binary. Install it and make sure it is on your PATH.",
    });
  });

  it("never classifies a missing binary as a missing object", async () => {
    const result = await run("./no-such-oc-binary", ["get", "namespace", "test-ns"]);

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(127);
    expect(isNotFound(result)).toBe(false);
  });
});
