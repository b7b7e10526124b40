import { z } from "zod";
import { InstallInput } from "./schema.js";
import { Oc, KubeObject, ResourceRef, applyManifest, jsonPath } from "./tools/oc.js";
import { Issue, banner, logInfo, logWarn } from "./tools/log.js";
import { conditionReader, jsonPathReader, waitFor } from "./tools/wait.js";
import { validateClusterSession } from "./steps/auth.js";
import { LifecycleOptions, askFrom, confirmPlan } from "./steps/confirm.js";
import { catalogSourceManifest, ensureNamespace, ensureOperatorGroup, subscriptionManifest } from "./steps/operators.js";
import { reconcileHardwareProfiles, ReconcileResult } from "./hardware-profiles.js";
import {
  AUTHORINO,
  CATALOG_IMAGES,
  CATALOG_SOURCE,
  DSC,
  DSCI,
  FALLBACK_CATALOG_VERSION,
  INSTALL_CHANNEL,
  RHOAI_APPLICATIONS_NAMESPACE,
  RHOAI_OPERATOR_GROUP,
  RHOAI_OPERATOR_NAMESPACE,
  RHOAI_SUBSCRIPTION,
  SERVERLESS,
  SERVERLESS_NAMESPACE,
  SERVICE_MESH_2,
} from "./catalog.js";

export type InstallResult = {
  status: "completed" | "cancelled" | "error";
  evidence: {
    openshiftVersion?: string;
    catalogImage?: string;
    installPlan?: string;
    dsciPhase?: string;
    dscPhase?: string;
    hardwareProfiles?: ReconcileResult;
  };
  blockers: Issue[];
  warnings: Issue[];
};

const OcVersionSchema = z.object({
  openshiftVersion: z.string().optional(),
  serverVersion: z.object({ gitVersion: z.string().optional() }).optional(),
});

/**
 * `major.minor` of the cluster from `oc version -o json`: the OpenShift version
 * when reported, else the Kubernetes server version.
 */
export function parseClusterVersion(raw: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const version = OcVersionSchema.safeParse(parsed);
  if (!version.success) return undefined;

  const full = version.data.openshiftVersion || version.data.serverVersion?.gitVersion;
  if (!full) return undefined;
  const minor = full.replace(/^v/, "").split(".").slice(0, 2).join(".");
  return minor || undefined;
}

export async function detectClusterVersion(oc: Oc): Promise<string | undefined> {
  const result = await oc(["version", "-o", "json"]);
  if (!result.ok) return undefined;
  return parseClusterVersion(result.stdout);
}

export type CatalogImageChoice = { image: string; warning?: Issue };

/** The override if given, else the image pinned for this OpenShift minor version. */
export function selectCatalogImage(version: string, override?: string): CatalogImageChoice {
  if (override) return { image: override };
  const pinned = CATALOG_IMAGES[version];
  if (pinned) return { image: pinned };
  return {
    image: CATALOG_IMAGES[FALLBACK_CATALOG_VERSION],
    warning: {
      code: "UNKNOWN_OPENSHIFT_VERSION",
      message: `Unknown OpenShift version: ${version}. Using default for ${FALLBACK_CATALOG_VERSION}`,
    },
  };
}

export function dsciManifest(): KubeObject {
  return {
    apiVersion: "dscinitialization.opendatahub.io/v1",
    kind: "DSCInitialization",
    metadata: {
      name: DSCI.name,
      labels: {
        "app.kubernetes.io/name": "dscinitialization",
        "app.kubernetes.io/instance": DSCI.name,
        "app.kubernetes.io/part-of": "rhods-operator",
        "app.kubernetes.io/managed-by": "kustomize",
        "app.kubernetes.io/created-by": "rhods-operator",
      },
    },
    spec: {
      monitoring: { managementState: "Managed", namespace: "redhat-ods-monitoring" },
      applicationsNamespace: RHOAI_APPLICATIONS_NAMESPACE,
      serviceMesh: {
        controlPlane: { metricsCollection: "Istio", name: "data-science-smcp", namespace: "istio-system" },
        managementState: "Managed",
      },
      trustedCABundle: { managementState: "Managed", customCABundle: "" },
    },
  };
}

export function dscManifest(): KubeObject {
  return {
    apiVersion: "datasciencecluster.opendatahub.io/v1",
    kind: "DataScienceCluster",
    metadata: {
      name: DSC.name,
      labels: {
        "app.kubernetes.io/created-by": "rhods-operator",
        "app.kubernetes.io/instance": DSC.name,
        "app.kubernetes.io/managed-by": "kustomize",
        "app.kubernetes.io/name": "datasciencecluster",
        "app.kubernetes.io/part-of": "rhods-operator",
      },
    },
    spec: {
      components: {
        dashboard: { managementState: "Managed" },
        kserve: {
          managementState: "Managed",
          nim: { managementState: "Managed" },
          serving: {
            ingressGateway: { certificate: { type: "OpenshiftDefaultIngress" } },
            managementState: "Managed",
            name: "knative-serving",
          },
        },
        workbenches: { managementState: "Managed" },
      },
    },
  };
}

const INSTALL_PLAN_LINES = [
  "This will install the following on your cluster:",
  "  - Red Hat Authorino Operator (stable channel)",
  "  - Red Hat OpenShift Serverless (stable channel)",
  "  - Red Hat OpenShift Service Mesh (stable channel)",
  `  - Red Hat OpenShift AI 2.25 (${INSTALL_CHANNEL} channel)`,
  "  - DataScienceCluster with dashboard, kserve, and workbenches",
  "",
  "This will create/modify:",
  "  - CatalogSource in openshift-marketplace",
  "  - Operator subscriptions and installations",
  `  - Namespaces: ${SERVERLESS_NAMESPACE}, ${RHOAI_OPERATOR_NAMESPACE}`,
  "  - OperatorGroups in custom namespaces",
];

async function apply(oc: Oc, manifest: KubeObject, blockers: Issue[]): Promise<boolean> {
  const result = await applyManifest(oc, manifest);
  if (result.ok) return true;
  blockers.push({
    code: "APPLY_FAILED",
    message: `Failed to apply ${manifest.kind} ${manifest.metadata.name}: ${result.stderr}`,
  });
  return false;
}

/**
 * Installs RHOAI 2.25 with its prerequisite operators, creates the
 * DSCInitialization and DataScienceCluster, then configures the
 * hardware-profile ignore list.
 */
export async function runInstall(input: InstallInput, oc: Oc, opts: LifecycleOptions = {}): Promise<InstallResult> {
  const evidence: InstallResult["evidence"] = {};
  const blockers: Issue[] = [];
  const warnings: Issue[] = [];
  const poll = opts.pollIntervalSeconds;
  const fail = (): InstallResult => ({ status: "error", evidence, blockers, warnings });

  const session = await validateClusterSession(oc);
  if (!session.ok) {
    return { status: "error", evidence, blockers: session.blockers, warnings };
  }
  logInfo(`Logged in as: ${session.user}`);
  logInfo(`Current cluster: ${session.server}`);

  const proceed = await confirmPlan(
    askFrom(opts),
    {
      title: "RHOAI 2.25 Installation",
      lines: INSTALL_PLAN_LINES,
      question: "Do you want to proceed with the installation?",
      proceedMessage: "Proceeding with installation...",
      cancelMessage: "Installation cancelled by user",
    },
    session,
    input.yes
  );
  if (!proceed) return { status: "cancelled", evidence, blockers, warnings };

  logInfo("Detecting OpenShift version...");
  const version = await detectClusterVersion(oc);
  if (!version) {
    blockers.push({ code: "VERSION_DETECTION_FAILED", message: "Failed to detect OpenShift version" });
    return fail();
  }
  evidence.openshiftVersion = version;
  logInfo(`Detected OpenShift version: ${version}`);

  const choice = selectCatalogImage(version, input.catalogImage);
  if (choice.warning) {
    warnings.push(choice.warning);
    logWarn(choice.warning.message);
  }
  evidence.catalogImage = choice.image;
  logInfo(`Using catalog source image: ${choice.image}`);

  const ns = await ensureNamespace(oc, RHOAI_OPERATOR_NAMESPACE);
  if (ns && !ns.ok) {
    blockers.push({ code: "APPLY_FAILED", message: `Failed to create namespace ${RHOAI_OPERATOR_NAMESPACE}: ${ns.stderr}` });
    return fail();
  }

  logInfo(`Creating CatalogSource: ${CATALOG_SOURCE.name}`);
  if (!(await apply(oc, catalogSourceManifest(CATALOG_SOURCE, choice.image), blockers))) return fail();
  logInfo("CatalogSource created successfully");

  const catalog = await waitFor(
    jsonPathReader(oc, CATALOG_SOURCE, "{.status.connectionState.lastObservedState}"),
    "READY",
    { timeoutSeconds: 300, pollIntervalSeconds: poll, description: `CatalogSource ${CATALOG_SOURCE.name} to be READY` }
  );
  if (catalog.state !== "Ready") {
    blockers.push({
      code: "CATALOG_NOT_READY",
      message: `CatalogSource ${CATALOG_SOURCE.name} did not become READY (last state: ${catalog.observed || "unknown"})`,
    });
    return fail();
  }
  logInfo(`CatalogSource ${CATALOG_SOURCE.name} is READY`);

  banner("Installing prerequisite operators...");

  logInfo(`Installing ${AUTHORINO.displayName} Operator...`);
  if (!(await apply(oc, prerequisiteSubscription(AUTHORINO.subscription), blockers))) return fail();
  logInfo("Authorino Operator subscription created");

  const serverlessNs = await ensureNamespace(oc, SERVERLESS_NAMESPACE);
  if (serverlessNs && !serverlessNs.ok) {
    blockers.push({ code: "APPLY_FAILED", message: `Failed to create namespace ${SERVERLESS_NAMESPACE}: ${serverlessNs.stderr}` });
    return fail();
  }
  if (SERVERLESS.operatorGroup) {
    const og = await ensureOperatorGroup(oc, SERVERLESS.operatorGroup);
    if (og && !og.ok) {
      blockers.push({ code: "APPLY_FAILED", message: `Failed to create OperatorGroup in ${SERVERLESS_NAMESPACE}: ${og.stderr}` });
      return fail();
    }
  }

  logInfo(`Installing ${SERVERLESS.displayName}...`);
  if (!(await apply(oc, prerequisiteSubscription(SERVERLESS.subscription), blockers))) return fail();
  logInfo("OpenShift Serverless subscription created");

  logInfo("Installing Red Hat OpenShift Service Mesh...");
  if (!(await apply(oc, prerequisiteSubscription(SERVICE_MESH_2.subscription), blockers))) return fail();
  logInfo("OpenShift Service Mesh subscription created");

  banner("Prerequisite operators installation initiated");

  const rhoaiOg = await ensureOperatorGroup(oc, RHOAI_OPERATOR_GROUP);
  if (rhoaiOg && !rhoaiOg.ok) {
    blockers.push({ code: "APPLY_FAILED", message: `Failed to create OperatorGroup in ${RHOAI_OPERATOR_NAMESPACE}: ${rhoaiOg.stderr}` });
    return fail();
  }

  logInfo("Creating Subscription for RHOAI operator");
  const rhoaiSub = subscriptionManifest({
    name: RHOAI_SUBSCRIPTION.name,
    namespace: RHOAI_OPERATOR_NAMESPACE,
    channel: INSTALL_CHANNEL,
    source: CATALOG_SOURCE.name,
  });
  if (!(await apply(oc, rhoaiSub, blockers))) return fail();
  logInfo("Subscription created successfully");

  banner("Waiting for RHOAI operator installation...");

  logInfo("Step 1/4: Waiting for InstallPlan to be created...");
  const pending = await waitFor(conditionReader(oc, RHOAI_SUBSCRIPTION, "InstallPlanPending"), "True", {
    timeoutSeconds: 300,
    pollIntervalSeconds: poll,
    description: "InstallPlan to be created",
  });
  if (pending.state !== "Ready") {
    blockers.push({ code: "INSTALLPLAN_TIMEOUT", message: "No InstallPlan was created for the RHOAI subscription" });
    return fail();
  }

  logInfo("Step 2/4: Getting InstallPlan name...");
  const installPlan = await jsonPath(oc, RHOAI_SUBSCRIPTION, "{.status.installplan.name}");
  if (!installPlan) {
    blockers.push({ code: "INSTALLPLAN_TIMEOUT", message: "RHOAI subscription does not reference an InstallPlan" });
    return fail();
  }
  evidence.installPlan = installPlan;
  logInfo(`InstallPlan: ${installPlan}`);

  logInfo("Step 3/4: Waiting for InstallPlan to be installed...");
  const planRef: ResourceRef = { kind: "installplan", name: installPlan, namespace: RHOAI_OPERATOR_NAMESPACE };
  const installed = await waitFor(conditionReader(oc, planRef, "Installed"), "True", {
    timeoutSeconds: 300,
    pollIntervalSeconds: poll,
    description: `InstallPlan ${installPlan} to be installed`,
  });
  if (installed.state !== "Ready") {
    blockers.push({ code: "INSTALLPLAN_TIMEOUT", message: `InstallPlan ${installPlan} was not installed in time` });
    return fail();
  }

  logInfo("Step 4/4: Waiting for rhods-operator deployment to be available...");
  const operatorDeployment: ResourceRef = { kind: "deployment", name: "rhods-operator", namespace: RHOAI_OPERATOR_NAMESPACE };
  const available = await waitFor(conditionReader(oc, operatorDeployment, "Available"), "True", {
    timeoutSeconds: 300,
    pollIntervalSeconds: poll,
    description: "rhods-operator deployment to be available",
  });
  if (available.state !== "Ready") {
    blockers.push({ code: "OPERATOR_NOT_AVAILABLE", message: "rhods-operator deployment did not become available" });
    return fail();
  }
  logInfo("RHOAI operator is ready!");

  banner("Creating DSCInitialization...");
  if (!(await apply(oc, dsciManifest(), blockers))) return fail();
  logInfo("DSCInitialization created successfully");
  evidence.dsciPhase = await waitForPhase(oc, DSCI, 300, "DSCInitialization", warnings, poll);
  logInfo(`DSCInitialization phase: ${evidence.dsciPhase}`);

  banner("Creating DataScienceCluster...");
  if (!(await apply(oc, dscManifest(), blockers))) return fail();
  logInfo("DataScienceCluster created successfully");
  logInfo("Waiting for DataScienceCluster to be ready (this may take several minutes)...");
  evidence.dscPhase = await waitForPhase(oc, DSC, 1200, "DataScienceCluster", warnings, poll);
  if (evidence.dscPhase === "Ready") {
    logInfo("DataScienceCluster is Ready!");
  } else {
    logWarn(`Current DSC phase: ${evidence.dscPhase}`);
  }

  banner("RHOAI 2.25 setup completed successfully!", [
    "",
    "Installed Operators:",
    `  - ${AUTHORINO.displayName} Operator (${AUTHORINO.subscription.namespace})`,
    `  - ${SERVERLESS.displayName} (${SERVERLESS_NAMESPACE})`,
    `  - ${SERVICE_MESH_2.displayName.replace(/ 2$/, "")} (${SERVICE_MESH_2.subscription.namespace})`,
    `  - Red Hat OpenShift AI (${RHOAI_OPERATOR_NAMESPACE})`,
    "",
    "RHOAI Configuration:",
    `  - DSCInitialization: ${DSCI.name} (Phase: ${evidence.dsciPhase})`,
    `  - DataScienceCluster: ${DSC.name} (Phase: ${evidence.dscPhase})`,
  ]);

  banner("Configuring hardware profiles ignorelist...");
  const profiles = await reconcileHardwareProfiles(
    { namespace: RHOAI_APPLICATIONS_NAMESPACE, dryRun: false, pollIntervalSeconds: poll },
    oc
  );
  evidence.hardwareProfiles = profiles;
  if (profiles.ok) {
    warnings.push(...profiles.warnings);
    logInfo("Hardware profiles ignorelist configured successfully");
  } else {
    logWarn("Hardware profiles ignorelist configuration failed or was skipped");
    for (const b of profiles.blockers) {
      warnings.push(b);
      logWarn(`  ${b.code}: ${b.message}`);
    }
  }

  return { status: "completed", evidence, blockers, warnings };
}

function prerequisiteSubscription(ref: ResourceRef): KubeObject {
  return subscriptionManifest({
    name: ref.name,
    namespace: ref.namespace ?? "",
    channel: "stable",
    source: "redhat-operators",
  });
}

/** Waits for `.status.phase` = Ready; a timeout is a warning. Returns the last phase seen. */
async function waitForPhase(
  oc: Oc,
  ref: ResourceRef,
  timeoutSeconds: number,
  label: string,
  warnings: Issue[],
  pollIntervalSeconds?: number
): Promise<string> {
  const outcome = await waitFor(jsonPathReader(oc, ref, "{.status.phase}"), "Ready", {
    timeoutSeconds,
    pollIntervalSeconds,
    description: `${label} to be ready`,
  });
  if (outcome.state !== "Ready") {
    const warning = { code: "NOT_READY", message: `${label} did not reach Ready state within timeout` };
    warnings.push(warning);
    logWarn(warning.message);
  }
  return outcome.observed || "Unknown";
}
