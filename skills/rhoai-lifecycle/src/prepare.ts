import { ApproveUpgradeInput, PrepareUpgradeInput } from "./schema.js";
import { Oc, ResourceRef, applyManifest, exists, jsonPath, mergePatch } from "./tools/oc.js";
import { Issue, banner, logInfo, logWarn } from "./tools/log.js";
import { jsonPathReader, waitFor } from "./tools/wait.js";
import { validateClusterSession } from "./steps/auth.js";
import { LifecycleOptions, askFrom, confirmPlan } from "./steps/confirm.js";
import { subscriptionManifest } from "./steps/operators.js";
import { DeleteTally, emptyTally, uninstallOperator } from "./steps/teardown.js";
import {
  AUTHORINO,
  CONNECTIVITY_LINK,
  CONNECTIVITY_LINK_STARTING_CSV,
  DSC,
  DSCI,
  RHOAI_OPERATOR_NAMESPACE,
  RHOAI_SUBSCRIPTION,
  SERVERLESS,
  SERVICE_MESH_2,
  UPGRADE_CHANNEL,
} from "./catalog.js";

export type PrepareUpgradeResult = {
  status: "completed" | "cancelled" | "error";
  phase?: "components" | "operators" | "subscription";
  evidence: {
    kserveServing?: "patched" | "unchanged";
    serviceMesh?: "patched" | "unchanged";
    operators?: DeleteTally;
    connectivityLinkState?: string;
    subscriptionState?: string;
    installPlan?: string;
  };
  /** Command the operator runs to start the upgrade. */
  approvalCommand?: string;
  blockers: Issue[];
  warnings: Issue[];
};

export type ApproveUpgradeResult = {
  status: "completed" | "cancelled" | "error";
  installPlan?: string;
  subscriptionState?: string;
  blockers: Issue[];
  warnings: Issue[];
};

const PREPARE_PLAN_LINES = [
  "This will prepare your cluster for RHOAI upgrade:",
  "",
  "Phase 1 - Disable incompatible components:",
  "  - Set DSC KServe serving managementState to Removed",
  "  - Set DSCI Service Mesh managementState to Removed",
  "",
  "Phase 2 - Uninstall incompatible operators and install new dependencies:",
  `  - Uninstall: ${AUTHORINO.displayName} Operator`,
  `  - Uninstall: ${SERVERLESS.displayName}`,
  `  - Uninstall: ${SERVICE_MESH_2.displayName}`,
  `  - Install: ${CONNECTIVITY_LINK.displayName} v1.2.1`,
  "",
  "Phase 3 - Prepare RHOAI subscription:",
  "  - Change installPlanApproval to Manual",
  `  - Update channel to ${UPGRADE_CHANNEL}`,
  "  - Provide command to manually approve upgrade",
];

export function approvalCommand(installPlan?: string): string {
  return `oc patch installplan ${installPlan || "<INSTALL_PLAN_NAME>"} -n ${RHOAI_OPERATOR_NAMESPACE} --type=merge -p '{"spec":{"approved":true}}'`;
}

type FieldUpdate = {
  ref: ResourceRef;
  path: string;
  desired: string;
  patch: Record<string, unknown>;
  label: string;
};

/** Reads a spec field and merge-patches it to `desired` unless it already is. */
async function setField(oc: Oc, update: FieldUpdate): Promise<{ ok: true; changed: boolean } | { ok: false; error: string }> {
  const current = await jsonPath(oc, update.ref, update.path);
  if (current === update.desired) {
    logWarn(`${update.label} is already set to ${update.desired}, skipping`);
    return { ok: true, changed: false };
  }
  logInfo(`Current ${update.label}: ${current ?? ""}`);
  const result = await mergePatch(oc, update.ref, update.patch);
  if (!result.ok) return { ok: false, error: result.stderr };
  logInfo(`${update.label} set to ${update.desired}`);
  return { ok: true, changed: true };
}

async function waitReady(oc: Oc, ref: ResourceRef, label: string, poll?: number): Promise<string> {
  const outcome = await waitFor(jsonPathReader(oc, ref, "{.status.phase}"), "Ready", {
    timeoutSeconds: 600,
    pollIntervalSeconds: poll,
    description: `${label} to be ready`,
  });
  return outcome.observed || "Unknown";
}

function sleep(seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

/**
 * Prepares a RHOAI 2.25 cluster for the move to 3.3: turns off KServe serving
 * and Service Mesh, swaps the 2.x prerequisite operators for Connectivity Link,
 * and points the RHOAI subscription at the 3.3 channel with manual approval,
 * so the upgrade waits for an operator to approve its InstallPlan.
 */
export async function runPrepareUpgrade(
  input: PrepareUpgradeInput,
  oc: Oc,
  opts: LifecycleOptions = {}
): Promise<PrepareUpgradeResult> {
  const evidence: PrepareUpgradeResult["evidence"] = {};
  const blockers: Issue[] = [];
  const warnings: Issue[] = [];
  const poll = opts.pollIntervalSeconds;

  const session = await validateClusterSession(oc);
  if (!session.ok) return { status: "error", evidence, blockers: session.blockers, warnings };
  logInfo(`Logged in as: ${session.user}`);
  logInfo(`Current cluster: ${session.server}`);

  const proceed = await confirmPlan(
    askFrom(opts),
    {
      title: "RHOAI 2.25 to 3.3 Upgrade Preparation",
      lines: PREPARE_PLAN_LINES,
      question: "Do you want to proceed with the upgrade preparation?",
      proceedMessage: "Proceeding with upgrade preparation...",
      cancelMessage: "Operation cancelled by user",
    },
    session,
    input.yes
  );
  if (!proceed) return { status: "cancelled", evidence, blockers, warnings };

  // Phase 1
  banner("Phase 1: Disable incompatible components");

  logInfo("Step 1: Checking DataScienceCluster status...");
  if ((await waitReady(oc, DSC, "DataScienceCluster", poll)) !== "Ready") {
    warnings.push({ code: "NOT_READY", message: "DataScienceCluster did not reach Ready state within timeout" });
    logWarn("DataScienceCluster did not reach Ready state within timeout");
  }

  logInfo("Step 2: Checking DSCInitialization status...");
  if ((await waitReady(oc, DSCI, "DSCInitialization", poll)) !== "Ready") {
    warnings.push({ code: "NOT_READY", message: "DSCInitialization did not reach Ready state within timeout" });
    logWarn("DSCInitialization did not reach Ready state within timeout");
  }

  logInfo("Step 3: Setting KServe serving managementState to Removed...");
  const serving = await setField(oc, {
    ref: DSC,
    path: "{.spec.components.kserve.serving.managementState}",
    desired: "Removed",
    patch: { spec: { components: { kserve: { serving: { managementState: "Removed" } } } } },
    label: "KServe serving managementState",
  });
  if (!serving.ok) {
    blockers.push({ code: "PATCH_REJECTED", message: `Failed to update DataScienceCluster: ${serving.error}` });
    return { status: "error", phase: "components", evidence, blockers, warnings };
  }
  evidence.kserveServing = serving.changed ? "patched" : "unchanged";

  logInfo("Step 4: Setting Service Mesh managementState to Removed...");
  const mesh = await setField(oc, {
    ref: DSCI,
    path: "{.spec.serviceMesh.managementState}",
    desired: "Removed",
    patch: { spec: { serviceMesh: { managementState: "Removed" } } },
    label: "Service Mesh managementState",
  });
  if (!mesh.ok) {
    blockers.push({ code: "PATCH_REJECTED", message: `Failed to update DSCInitialization: ${mesh.error}` });
    return { status: "error", phase: "components", evidence, blockers, warnings };
  }
  evidence.serviceMesh = mesh.changed ? "patched" : "unchanged";

  logInfo("Step 5: Waiting for DSCInitialization to reconcile...");
  await sleep(input.settleSeconds);
  const dsciPhase = await waitReady(oc, DSCI, "DSCInitialization", poll);
  if (dsciPhase !== "Ready") {
    logWarn(`Current DSCI phase: ${dsciPhase}`);
    blockers.push({
      code: "DSCI_NOT_READY",
      message: "DSCInitialization did not reach Ready state after disabling Service Mesh",
    });
    return { status: "error", phase: "components", evidence, blockers, warnings };
  }
  logInfo("DSCInitialization is Ready");

  logInfo("Step 6: Waiting for DataScienceCluster to reconcile...");
  await sleep(input.settleSeconds);
  const dscPhase = await waitReady(oc, DSC, "DataScienceCluster", poll);
  if (dscPhase !== "Ready") {
    logWarn(`Current DSC phase: ${dscPhase}`);
    blockers.push({
      code: "DSC_NOT_READY",
      message: "DataScienceCluster did not reach Ready state after disabling components",
    });
    return { status: "error", phase: "components", evidence, blockers, warnings };
  }
  logInfo("DataScienceCluster is Ready");
  logInfo("Phase 1 completed: DSC and DSCI are Ready for upgrade");

  // Phase 2
  banner("Phase 2: Manage operator dependencies");
  const tally = emptyTally();
  evidence.operators = tally;

  logInfo(`Step 7: Uninstalling ${AUTHORINO.displayName} operator...`);
  await uninstallOperator(oc, tally, AUTHORINO);
  logInfo(`Step 8: Uninstalling ${SERVERLESS.displayName} operator...`);
  await uninstallOperator(oc, tally, SERVERLESS, { deleteOwnNamespace: true });
  logInfo(`Step 9: Uninstalling ${SERVICE_MESH_2.displayName} operator...`);
  await uninstallOperator(oc, tally, SERVICE_MESH_2);
  warnings.push(...tally.warnings);

  logInfo(`Step 10: Installing ${CONNECTIVITY_LINK.displayName} operator...`);
  const rhcl = await applyManifest(
    oc,
    subscriptionManifest({
      name: CONNECTIVITY_LINK.subscription.name,
      namespace: CONNECTIVITY_LINK.subscription.namespace ?? "",
      channel: "stable",
      source: "redhat-operators",
      startingCSV: CONNECTIVITY_LINK_STARTING_CSV,
    })
  );
  if (!rhcl.ok) {
    blockers.push({ code: "APPLY_FAILED", message: `Failed to create Connectivity Link subscription: ${rhcl.stderr}` });
    return { status: "error", phase: "operators", evidence, blockers, warnings };
  }
  logInfo(`${CONNECTIVITY_LINK.displayName} subscription created`);

  const rhclState = await waitFor(jsonPathReader(oc, CONNECTIVITY_LINK.subscription, "{.status.state}"), "AtLatestKnown", {
    timeoutSeconds: 300,
    pollIntervalSeconds: poll,
    description: "Connectivity Link operator to be ready",
  });
  evidence.connectivityLinkState = rhclState.observed || "Unknown";
  if (rhclState.state !== "Ready") {
    const warning = {
      code: "NOT_READY",
      message: "Connectivity Link subscription did not reach AtLatestKnown state within timeout",
    };
    warnings.push(warning);
    logWarn(warning.message);
  }
  logInfo("Phase 2 completed: Incompatible operators uninstalled and Connectivity Link installed");

  // Phase 3
  banner("Phase 3: Prepare RHOAI subscription");

  logInfo("Step 11: Setting RHOAI subscription installPlanApproval to Manual...");
  if (!(await exists(oc, RHOAI_SUBSCRIPTION))) {
    blockers.push({
      code: "SUBSCRIPTION_NOT_FOUND",
      message: `RHOAI subscription '${RHOAI_SUBSCRIPTION.name}' not found in ${RHOAI_OPERATOR_NAMESPACE} namespace`,
    });
    return { status: "error", phase: "subscription", evidence, blockers, warnings };
  }

  const approval = await setField(oc, {
    ref: RHOAI_SUBSCRIPTION,
    path: "{.spec.installPlanApproval}",
    desired: "Manual",
    patch: { spec: { installPlanApproval: "Manual" } },
    label: "installPlanApproval",
  });
  if (!approval.ok) {
    blockers.push({ code: "PATCH_REJECTED", message: `Failed to set installPlanApproval: ${approval.error}` });
    return { status: "error", phase: "subscription", evidence, blockers, warnings };
  }

  logInfo(`Step 12: Updating RHOAI subscription channel to ${UPGRADE_CHANNEL}...`);
  const channel = await setField(oc, {
    ref: RHOAI_SUBSCRIPTION,
    path: "{.spec.channel}",
    desired: UPGRADE_CHANNEL,
    patch: { spec: { channel: UPGRADE_CHANNEL } },
    label: "channel",
  });
  if (!channel.ok) {
    blockers.push({ code: "PATCH_REJECTED", message: `Failed to update channel: ${channel.error}` });
    return { status: "error", phase: "subscription", evidence, blockers, warnings };
  }

  const upgrade = await waitFor(jsonPathReader(oc, RHOAI_SUBSCRIPTION, "{.status.state}"), "UpgradePending", {
    timeoutSeconds: 120,
    pollIntervalSeconds: poll,
    description: "subscription to reach UpgradePending state",
  });
  evidence.subscriptionState = upgrade.observed || "Unknown";
  if (upgrade.state !== "Ready") {
    const warning = { code: "NOT_READY", message: "Subscription did not reach UpgradePending state within timeout" };
    warnings.push(warning);
    logWarn(warning.message);
  }
  logInfo(`Subscription state: ${evidence.subscriptionState}`);

  const installPlan = await jsonPath(oc, RHOAI_SUBSCRIPTION, "{.status.installplan.name}");
  if (installPlan) {
    evidence.installPlan = installPlan;
    logInfo(`Pending InstallPlan: ${installPlan}`);
  } else {
    logWarn("InstallPlan reference not yet available in subscription status");
  }
  logInfo("Phase 3 completed: RHOAI subscription prepared for upgrade");

  banner("Upgrade Preparation Complete!", [
    "",
    "Summary of changes:",
    "  ✓ KServe serving managementState: Removed",
    "  ✓ Service Mesh managementState: Removed",
    "  ✓ Authorino operator: Uninstalled",
    "  ✓ Serverless operator: Uninstalled",
    "  ✓ Service Mesh 2 operator: Uninstalled",
    "  ✓ Connectivity Link operator: Installed (v1.2.1)",
    "  ✓ RHOAI subscription: Manual approval",
    `  ✓ RHOAI channel: ${UPGRADE_CHANNEL}`,
  ]);

  return {
    status: "completed",
    evidence,
    approvalCommand: approvalCommand(installPlan),
    blockers,
    warnings,
  };
}

/**
 * Approves the InstallPlan the RHOAI subscription is waiting on and follows
 * the subscription until it reports AtLatestKnown.
 */
export async function runApproveUpgrade(
  input: ApproveUpgradeInput,
  oc: Oc,
  opts: LifecycleOptions = {}
): Promise<ApproveUpgradeResult> {
  const blockers: Issue[] = [];
  const warnings: Issue[] = [];

  const session = await validateClusterSession(oc);
  if (!session.ok) return { status: "error", blockers: session.blockers, warnings };

  const installPlan = await jsonPath(oc, RHOAI_SUBSCRIPTION, "{.status.installplan.name}");
  if (!installPlan) {
    blockers.push({
      code: "NO_PENDING_INSTALLPLAN",
      message: `Subscription '${RHOAI_SUBSCRIPTION.name}' has no InstallPlan to approve. Run prepare-upgrade first.`,
    });
    return { status: "error", blockers, warnings };
  }
  const planRef: ResourceRef = { kind: "installplan", name: installPlan, namespace: RHOAI_OPERATOR_NAMESPACE };

  if ((await jsonPath(oc, planRef, "{.spec.approved}")) === "true") {
    logWarn(`InstallPlan ${installPlan} is already approved`);
  } else {
    const proceed = await confirmPlan(
      askFrom(opts),
      {
        title: "RHOAI Upgrade Approval",
        lines: [`This will approve InstallPlan ${installPlan} in ${RHOAI_OPERATOR_NAMESPACE}`, "and start the RHOAI upgrade."],
        question: "Do you want to approve the upgrade?",
        proceedMessage: "Approving upgrade...",
        cancelMessage: "Operation cancelled by user",
      },
      session,
      input.yes
    );
    if (!proceed) return { status: "cancelled", installPlan, blockers, warnings };

    const patched = await mergePatch(oc, planRef, { spec: { approved: true } });
    if (!patched.ok) {
      blockers.push({ code: "PATCH_REJECTED", message: `Failed to approve InstallPlan ${installPlan}: ${patched.stderr}` });
      return { status: "error", installPlan, blockers, warnings };
    }
    logInfo(`InstallPlan ${installPlan} approved`);
  }

  const upgraded = await waitFor(jsonPathReader(oc, RHOAI_SUBSCRIPTION, "{.status.state}"), "AtLatestKnown", {
    timeoutSeconds: 1200,
    pollIntervalSeconds: opts.pollIntervalSeconds,
    description: "RHOAI subscription to reach AtLatestKnown",
  });
  if (upgraded.state !== "Ready") {
    const warning = { code: "NOT_READY", message: "Subscription did not reach AtLatestKnown state within timeout" };
    warnings.push(warning);
    logWarn(warning.message);
  } else {
    logInfo("RHOAI upgrade completed");
  }

  return { status: "completed", installPlan, subscriptionState: upgraded.observed || "Unknown", blockers, warnings };
}
