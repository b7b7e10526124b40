import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { CaptureInput, CaptureStage } from "./schema.js";
import { Oc } from "./tools/oc.js";
import { Issue, banner, logInfo, logWarn } from "./tools/log.js";
import { Ask, choose } from "./tools/prompt.js";
import { validateClusterSession } from "./steps/auth.js";
import { LifecycleOptions, askFrom } from "./steps/confirm.js";

export type CaptureEntry = {
  label: string;
  /** File name part after `<stage>-upgrade-`, without extension. */
  suffix: string;
  args: string[];
};

const ISVC_LABEL = "serving.kserve.io/inferenceservice";

const yaml = (...args: string[]): string[] => ["get", ...args, "-oyaml"];

const DSC_ENTRY: CaptureEntry = {
  label: "DataScienceCluster",
  suffix: "dsc",
  args: yaml("datascienceclusters.datasciencecluster.opendatahub.io", "default-dsc"),
};
const DSCI_ENTRY: CaptureEntry = {
  label: "DSCInitialization",
  suffix: "dsci",
  args: yaml("dscinitializations.dscinitialization.opendatahub.io", "default-dsci"),
};
const HWP_ENTRY: CaptureEntry = {
  label: "HardwareProfiles",
  suffix: "hwps",
  args: yaml("hardwareprofiles.infrastructure.opendatahub.io", "-A"),
};

const WORKLOAD_ENTRIES: CaptureEntry[] = [
  { label: "AcceleratorProfiles", suffix: "aps", args: yaml("acceleratorprofiles.dashboard.opendatahub.io", "-A") },
  { label: "ServingRuntimes", suffix: "servingruntimes", args: yaml("servingruntimes.serving.kserve.io", "-A") },
  { label: "InferenceServices", suffix: "isvcs", args: yaml("inferenceservices.serving.kserve.io", "-A") },
  { label: "InferenceService Pods", suffix: "isvc-pods", args: yaml("pods", "-A", "-l", ISVC_LABEL) },
  { label: "InferenceService ReplicaSets", suffix: "isvc-replicasets", args: yaml("replicasets", "-A", "-l", ISVC_LABEL) },
  { label: "InferenceService Deployments", suffix: "isvc-deployments", args: yaml("deployments", "-A", "-l", ISVC_LABEL) },
  { label: "Notebooks", suffix: "notebooks", args: yaml("notebooks", "-A") },
  { label: "Notebook Pods", suffix: "notebook-pods", args: yaml("pods", "-A", "-l", "opendatahub.io/workbenches") },
  {
    label: "Notebook StatefulSets",
    suffix: "notebook-statefulsets",
    args: [
      "get",
      "statefulsets",
      "-A",
      "-o",
      "custom-columns=NAMESPACE:.metadata.namespace,NAME:.metadata.name,OWNER_KIND:.metadata.ownerReferences[0].kind",
    ],
  },
];

/** What each stage captures, in order. Post adds HardwareProfiles, which only exist after the upgrade. */
export const CAPTURE_CATALOG: Record<CaptureStage, CaptureEntry[]> = {
  pre: [DSC_ENTRY, DSCI_ENTRY, ...WORKLOAD_ENTRIES],
  post: [DSC_ENTRY, DSCI_ENTRY, HWP_ENTRY, ...WORKLOAD_ENTRIES],
};

export function captureFileName(stage: CaptureStage, entry: CaptureEntry): string {
  return `${stage}-upgrade-${entry.suffix}.yaml`;
}

export type CaptureResult = {
  status: "completed" | "error";
  stage?: CaptureStage;
  outputDir?: string;
  written: string[];
  skipped: string[];
  blockers: Issue[];
  warnings: Issue[];
};

export async function askCaptureStage(ask: Ask): Promise<CaptureStage> {
  return choose<CaptureStage>(
    ask,
    "Do you want to capture pre or post upgrade state? (pre/post): ",
    [
      { value: "pre", accepted: ["pre", "PRE"] },
      { value: "post", accepted: ["post", "POST"] },
    ],
    "Invalid input. Please enter either 'pre' or 'post'"
  );
}

/**
 * Saves the RHOAI-related resources to YAML files, one per resource kind,
 * so the state before and after an upgrade can be compared.
 */
export async function runCapture(input: CaptureInput, oc: Oc, opts: LifecycleOptions = {}): Promise<CaptureResult> {
  const written: string[] = [];
  const skipped: string[] = [];
  const warnings: Issue[] = [];

  const session = await validateClusterSession(oc);
  if (!session.ok) return { status: "error", written, skipped, blockers: session.blockers, warnings };
  logInfo(`Logged in as: ${session.user}`);
  logInfo(`Current cluster: ${session.server}`);

  console.error("");
  banner("RHOAI Cluster State Capture");
  console.error("");

  const outputDir = resolve(input.outputDir);
  if (existsSync(outputDir)) {
    logInfo(`Directory already exists: ${input.outputDir}`);
  } else {
    logInfo(`Creating directory: ${input.outputDir}`);
    await mkdir(outputDir, { recursive: true });
  }
  logInfo(`Saving cluster state to: ${outputDir}`);
  console.error("");

  const stage = input.stage ?? (await askCaptureStage(askFrom(opts)));
  logInfo(`Selected ${stage}-upgrade state capture`);

  const title = stage === "pre" ? "Pre-Upgrade" : "Post-Upgrade";
  banner(`Starting ${title} State Capture`);

  const entries = CAPTURE_CATALOG[stage];
  for (const [i, entry] of entries.entries()) {
    const file = captureFileName(stage, entry);
    logInfo(`Step ${i + 1}: Capturing ${entry.label}...`);
    const result = await oc(entry.args);
    if (!result.ok) {
      skipped.push(file);
      const warning = { code: "CAPTURE_FAILED", message: `Could not read ${entry.label}, ${file} not written: ${result.stderr}` };
      warnings.push(warning);
      logWarn(`  ${warning.message}`);
      continue;
    }
    await writeFile(join(outputDir, file), result.stdout + "\n", "utf8");
    written.push(file);
    logInfo(`  ✓ Saved to ${file}`);
  }

  banner(`${title} State Capture Completed`, [
    `Files saved in: ${outputDir}`,
    ...written.map((f) => `  - ${f}`),
    ...(skipped.length > 0 ? [`Skipped (read failed): ${skipped.join(", ")}`] : []),
  ]);

  return { status: "completed", stage, outputDir, written, skipped, blockers: [], warnings };
}
