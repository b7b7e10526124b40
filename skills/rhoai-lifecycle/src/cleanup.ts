import { CleanupInput, CleanupVersion } from "./schema.js";
import { Oc, deleteAllOfKind, listNames } from "./tools/oc.js";
import { Issue, banner, logInfo, logWarn } from "./tools/log.js";
import { Ask, choose } from "./tools/prompt.js";
import { countReader, waitFor } from "./tools/wait.js";
import { validateClusterSession } from "./steps/auth.js";
import { LifecycleOptions, askFrom, confirmPlan } from "./steps/confirm.js";
import { DeleteTally, deleteAndRecord, deleteMatchingCsvs, emptyTally, record, uninstallOperator } from "./steps/teardown.js";
import cleanupCrds from "../data/cleanup-crds.json";
import {
  AUTHORINO,
  AUTHORINO_DEPENDENCY,
  CATALOG_SOURCE,
  CONNECTIVITY_LINK,
  DNS_DEPENDENCY,
  DSC,
  DSCI,
  LIMITADOR_DEPENDENCY,
  OperatorSpec,
  PLATFORM_NAMESPACES,
  RHOAI_OPERATOR_GROUP,
  RHOAI_OPERATOR_NAMESPACE,
  RHOAI_SUBSCRIPTION,
  SERVERLESS,
  SERVICE_MESH_2,
  SERVICE_MESH_3,
  WORKLOAD_KINDS,
} from "./catalog.js";

export type CleanupResult = {
  status: "completed" | "cancelled" | "error";
  version?: CleanupVersion;
  evidence: DeleteTally;
  blockers: Issue[];
  warnings: Issue[];
};

/** How one major version's install is torn down. */
export type CleanupProfile = {
  /** Per-kind timeout for the cluster-wide workload deletes. */
  workloadTimeoutSeconds?: number;
  /** Delete every DataScienceCluster after default-dsc, not just the default one. */
  deleteRemainingDscs: boolean;
  dscKind: string;
  dsciKind: string;
  operators: OperatorSpec[];
  crds: string[];
};

export const CLEANUP_PROFILES: Record<CleanupVersion, CleanupProfile> = {
  "2.x": {
    deleteRemainingDscs: false,
    dscKind: "datascienceclusters.datasciencecluster.opendatahub.io",
    dsciKind: "dscinitializations.dscinitialization.opendatahub.io",
    operators: [SERVICE_MESH_2, SERVERLESS, AUTHORINO],
    crds: cleanupCrds["2.x"],
  },
  "3.x": {
    workloadTimeoutSeconds: 60,
    deleteRemainingDscs: true,
    dscKind: "datasciencecluster",
    dsciKind: "dscinitializations.dscinitialization.opendatahub.io",
    operators: [CONNECTIVITY_LINK, AUTHORINO_DEPENDENCY, DNS_DEPENDENCY, LIMITADOR_DEPENDENCY, SERVICE_MESH_3],
    crds: cleanupCrds["3.x"],
  },
};

export async function askCleanupVersion(ask: Ask): Promise<CleanupVersion> {
  return choose<CleanupVersion>(
    ask,
    "Which version of RHOAI do you want to clean up? (2.x/3.x): ",
    [
      { value: "2.x", accepted: ["2.x", "2.X", "2"] },
      { value: "3.x", accepted: ["3.x", "3.X", "3"] },
    ],
    "Invalid input. Please enter either '2.x' or '3.x'"
  );
}

function renderCleanupPlan(version: CleanupVersion, profile: CleanupProfile): string[] {
  return [
    `You are about to tear down RHOAI ${version} installation`,
    "This will remove:",
    "  - RHOAI operator and all its resources",
    "  - DataScienceCluster (if exists)",
    `  - Prerequisite operators (${profile.operators.map((o) => o.displayName).join(", ")})`,
    "  - Associated namespaces and configurations",
    "  - CatalogSources",
    `  - ${profile.crds.length} RHOAI Custom Resource Definitions`,
  ];
}

/**
 * Removes a RHOAI 2.x or 3.x install and its prerequisite operators.
 * Every step runs even if an earlier one failed; failures end up as warnings
 * and in the tally, and the command still completes.
 */
export async function runCleanup(input: CleanupInput, oc: Oc, opts: LifecycleOptions = {}): Promise<CleanupResult> {
  const tally = emptyTally();
  const ask = askFrom(opts);

  const session = await validateClusterSession(oc);
  if (!session.ok) return { status: "error", evidence: tally, blockers: session.blockers, warnings: [] };
  logInfo(`Logged in as: ${session.user}`);
  logInfo(`Current cluster: ${session.server}`);

  console.error("");
  banner("RHOAI Cleanup");
  console.error("");

  const version = input.version ?? (await askCleanupVersion(ask));
  logInfo(`Selected RHOAI ${version} for cleanup`);
  const profile = CLEANUP_PROFILES[version];

  const proceed = await confirmPlan(
    ask,
    {
      title: "WARNING: DESTRUCTIVE OPERATION",
      lines: renderCleanupPlan(version, profile),
      question: "Do you want to proceed with the cleanup?",
      proceedMessage: "Proceeding with cleanup...",
      cancelMessage: "Cleanup cancelled by user",
    },
    session,
    input.yes
  );
  if (!proceed) return { status: "cancelled", version, evidence: tally, blockers: [], warnings: [] };

  banner(`Starting RHOAI ${version} cleanup`);

  logInfo("Step 1: Deleting RHOAI custom resources...");
  for (const { kind, label } of WORKLOAD_KINDS) {
    logInfo(`  - Deleting ${label}...`);
    const result = await deleteAllOfKind(oc, kind, { allNamespaces: true, timeoutSeconds: profile.workloadTimeoutSeconds });
    if (!result.ok) {
      record(tally, label, { status: "failed", error: `No ${label} found or deletion timed out: ${result.stderr}` });
    }
  }
  logInfo("Custom resources deleted");

  logInfo("Step 2: Deleting DataScienceCluster and DSCInitialization...");
  await deleteAndRecord(oc, tally, { kind: profile.dscKind, name: DSC.name }, { timeoutSeconds: 300 });
  if (profile.deleteRemainingDscs) {
    const remaining = await listNames(oc, profile.dscKind);
    if (remaining && remaining.length > 0) {
      logInfo("  - Deleting remaining DataScienceClusters...");
      const result = await deleteAllOfKind(oc, profile.dscKind, { timeoutSeconds: 300 });
      if (!result.ok) {
        record(tally, "remaining DataScienceClusters", { status: "failed", error: result.stderr });
      }
    }
  }
  await deleteAndRecord(oc, tally, { kind: profile.dsciKind, name: DSCI.name }, { timeoutSeconds: 300 });

  logInfo("Waiting for DataScienceCluster and DSCI to be fully deleted...");
  for (const [kind, label] of [
    [profile.dscKind, "DSC"],
    [profile.dsciKind, "DSCI"],
  ]) {
    const gone = await waitFor(countReader(oc, kind), "0", {
      timeoutSeconds: 300,
      pollIntervalSeconds: opts.pollIntervalSeconds,
      description: `${label} deletion`,
      verbose: false,
    });
    if (gone.state !== "Ready") {
      const warning = { code: "DELETE_TIMEOUT", message: `${label} deletion wait timed out` };
      tally.warnings.push(warning);
      logWarn(warning.message);
    }
  }

  logInfo("Step 3: Deleting RHOAI operator subscription...");
  await deleteAndRecord(oc, tally, RHOAI_SUBSCRIPTION);

  logInfo("Step 4: Deleting RHOAI operator CSV...");
  await deleteMatchingCsvs(oc, tally, RHOAI_OPERATOR_NAMESPACE, /rhods/i, "RHOAI");

  logInfo("Step 5: Deleting RHOAI operator OperatorGroup...");
  await deleteAndRecord(oc, tally, RHOAI_OPERATOR_GROUP);

  logInfo("Step 6: Deleting RHOAI CatalogSource...");
  await deleteAndRecord(oc, tally, CATALOG_SOURCE);

  logInfo("Step 7: Deleting prerequisite operators...");
  for (const operator of profile.operators) {
    await uninstallOperator(oc, tally, operator);
  }
  logInfo("Prerequisite operators deleted");

  logInfo("Step 8: Deleting namespaces...");
  for (const name of PLATFORM_NAMESPACES) {
    await deleteAndRecord(oc, tally, { kind: "namespace", name }, { timeoutSeconds: 300 });
  }
  logInfo("Namespaces deleted");

  logInfo("Step 9: Deleting RHOAI Custom Resource Definitions...");
  for (const crd of profile.crds) {
    await deleteAndRecord(oc, tally, { kind: "crd", name: crd }, { timeoutSeconds: 60 });
  }
  logInfo("Custom Resource Definitions deleted");

  banner(`RHOAI ${version} cleanup completed`);
  banner("Cleanup Summary", [
    `Version cleaned: ${version}`,
    `Cluster: ${session.server}`,
    `Deleted: ${tally.deleted.length}`,
    `Not found: ${tally.absent.length}`,
    `Failed: ${tally.failed.length}`,
  ]);

  return { status: "completed", version, evidence: tally, blockers: [], warnings: tally.warnings };
}
