import {
  CaptureInputSchema,
  CleanupInputSchema,
  HardwareProfilesInputSchema,
  InstallInputSchema,
  PrepareUpgradeInputSchema,
} from "./schema.js";

describe("input schemas", () => {
  it("requires a namespace for hardware-profiles", () => {
    const missing = HardwareProfilesInputSchema.safeParse({});
    expect(missing.success).toBe(false);
    if (!missing.success) {
      expect(missing.error.issues[0].message).toBe("Namespace is required. Use -n or --namespace");
    }

    const empty = HardwareProfilesInputSchema.safeParse({ namespace: "" });
    expect(empty.success).toBe(false);
  });

  it("turns flag strings into booleans", () => {
    expect(HardwareProfilesInputSchema.parse({ namespace: "test-ns", dryRun: "true" })).toEqual({
      namespace: "test-ns",
      dryRun: true,
    });
    expect(HardwareProfilesInputSchema.parse({ namespace: "test-ns" }).dryRun).toBe(false);
    expect(InstallInputSchema.parse({ yes: true })).toEqual({ yes: true });
  });

  it("normalises cleanup version spellings", () => {
    expect(CleanupInputSchema.parse({ version: "2" }).version).toBe("2.x");
    expect(CleanupInputSchema.parse({ version: "3.X" }).version).toBe("3.x");
    expect(CleanupInputSchema.parse({}).version).toBeUndefined();
    expect(CleanupInputSchema.safeParse({ version: "4.x" }).success).toBe(false);
  });

  it("normalises capture stage and defaults the output directory", () => {
    expect(CaptureInputSchema.parse({ stage: "PRE" })).toEqual({ stage: "pre", outputDir: "pre-post-cluster-state" });
    expect(CaptureInputSchema.safeParse({ stage: "during" }).success).toBe(false);
  });

  it("rejects fields a command does not take", () => {
    const result = HardwareProfilesInputSchema.safeParse({ namespace: "test-ns", dryrun: "true" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].code).toBe("unrecognized_keys");
    }
    expect(CaptureInputSchema.safeParse({ stage: "pre", yes: "true" }).success).toBe(false);
  });

  it("defaults the settle delay for prepare-upgrade", () => {
    expect(PrepareUpgradeInputSchema.parse({})).toEqual({ yes: false, settleSeconds: 10 });
  });
});
