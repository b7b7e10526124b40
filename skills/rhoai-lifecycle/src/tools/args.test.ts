import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("takes the first positional as the command", () => {
    expect(parseArgs(["install", "quay.io/test/catalog:1"])).toEqual({
      command: "install",
      positionals: ["quay.io/test/catalog:1"],
      flags: {},
    });
  });

  it("reads value flags in both spellings", () => {
    expect(parseArgs(["cleanup", "--version", "3.x"]).flags).toEqual({ version: "3.x" });
    expect(parseArgs(["cleanup", "--version=2.x"]).flags).toEqual({ version: "2.x" });
  });

  it("maps short flags", () => {
    expect(parseArgs(["hardware-profiles", "-n", "test-ns", "-y"]).flags).toEqual({ namespace: "test-ns", yes: "true" });
  });

  it("never lets a boolean flag swallow the next positional", () => {
    expect(parseArgs(["install", "--yes", "quay.io/test/catalog:1"])).toEqual({
      command: "install",
      positionals: ["quay.io/test/catalog:1"],
      flags: { yes: "true" },
    });
  });

  it("keeps a value flag without a value as empty", () => {
    expect(parseArgs(["hardware-profiles", "-n", "--dry-run"]).flags).toEqual({ namespace: "", "dry-run": "true" });
    expect(parseArgs(["capture", "--stage"]).flags).toEqual({ stage: "" });
  });

  it("returns no command for an empty argv", () => {
    expect(parseArgs([])).toEqual({ command: undefined, positionals: [], flags: {} });
  });
});
