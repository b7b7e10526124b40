import { z } from "zod";

const flag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((v) => v === true || v === "true");

export const HardwareProfilesInputSchema = z.object({
  namespace: z
    .string({ required_error: "Namespace is required. Use -n or --namespace" })
    .min(1, "Namespace is required. Use -n or --namespace"),
  dryRun: flag,
}).strict();

export type HardwareProfilesInput = z.infer<typeof HardwareProfilesInputSchema>;

export const InstallInputSchema = z.object({
  catalogImage: z.string().min(1).optional(),
  yes: flag,
}).strict();

export type InstallInput = z.infer<typeof InstallInputSchema>;

export const PrepareUpgradeInputSchema = z.object({
  yes: flag,
  // Seconds to let the operator react to a spec change before waiting on its status.
  settleSeconds: z.number().int().nonnegative().default(10),
}).strict();

export type PrepareUpgradeInput = z.infer<typeof PrepareUpgradeInputSchema>;

export const ApproveUpgradeInputSchema = z.object({
  yes: flag,
}).strict();

export type ApproveUpgradeInput = z.infer<typeof ApproveUpgradeInputSchema>;

export const CleanupVersionSchema = z
  .enum(["2.x", "2.X", "2", "3.x", "3.X", "3"])
  .transform((v): "2.x" | "3.x" => (v.startsWith("2") ? "2.x" : "3.x"));

export type CleanupVersion = z.output<typeof CleanupVersionSchema>;

export const CleanupInputSchema = z.object({
  version: CleanupVersionSchema.optional(),
  yes: flag,
}).strict();

export type CleanupInput = z.infer<typeof CleanupInputSchema>;

export const CaptureStageSchema = z
  .enum(["pre", "PRE", "post", "POST"])
  .transform((v): "pre" | "post" => (v.toLowerCase() === "pre" ? "pre" : "post"));

export type CaptureStage = z.output<typeof CaptureStageSchema>;

export const CaptureInputSchema = z.object({
  stage: CaptureStageSchema.optional(),
  outputDir: z.string().min(1).default("pre-post-cluster-state"),
}).strict();

export type CaptureInput = z.infer<typeof CaptureInputSchema>;

export const StatusInputSchema = z.object({
  json: flag,
}).strict();

export type StatusInput = z.infer<typeof StatusInputSchema>;
