import { Oc, ResourceRef, jsonPath } from "./tools/oc.js";
import { GREEN, Issue, NC, RED, YELLOW } from "./tools/log.js";
import { validateClusterSession } from "./steps/auth.js";
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
  RHOAI_SUBSCRIPTION,
  SERVERLESS,
  SERVICE_MESH_2,
  SERVICE_MESH_3,
} from "./catalog.js";

export type ComponentStatus = "ready" | "progressing" | "missing";

export type SubscriptionStatus = {
  name: string;
  displayName: string;
  namespace: string;
  status: ComponentStatus;
  state?: string;
};

export type StatusResult =
  | {
      ok: true;
      timestamp: string;
      cluster: { server: string; user: string };
      platform: {
        dsc: { status: ComponentStatus; phase?: string };
        dsci: { status: ComponentStatus; phase?: string };
      };
      catalogSource: { status: ComponentStatus; state?: string };
      rhoai: {
        status: ComponentStatus;
        channel?: string;
        installPlanApproval?: string;
        state?: string;
        installedCSV?: string;
      };
      operators: SubscriptionStatus[];
    }
  | { ok: false; blockers: Issue[] };

/** Every prerequisite a 2.x or 3.x install may have, in display order. */
const PREREQUISITES: OperatorSpec[] = [
  AUTHORINO,
  SERVERLESS,
  SERVICE_MESH_2,
  CONNECTIVITY_LINK,
  AUTHORINO_DEPENDENCY,
  DNS_DEPENDENCY,
  LIMITADOR_DEPENDENCY,
  SERVICE_MESH_3,
];

function classify(value: string | undefined, readyValue: string): ComponentStatus {
  if (value === undefined) return "missing";
  return value === readyValue ? "ready" : "progressing";
}

// jsonPath gives "" for an unset field on an existing object.
function orUndefined(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

async function phaseOf(oc: Oc, ref: ResourceRef): Promise<{ status: ComponentStatus; phase?: string }> {
  const phase = await jsonPath(oc, ref, "{.status.phase}");
  return { status: classify(phase, "Ready"), phase: orUndefined(phase) };
}

async function subscriptionState(oc: Oc, ref: ResourceRef): Promise<string | undefined> {
  return jsonPath(oc, ref, "{.status.state}");
}

/**
 * Read-only summary of the RHOAI install: platform phases, the RHOAI
 * subscription and which prerequisite operators are subscribed.
 */
export async function runStatus(oc: Oc): Promise<StatusResult> {
  const session = await validateClusterSession(oc);
  if (!session.ok) return { ok: false, blockers: session.blockers };

  const [dsc, dsci] = [await phaseOf(oc, DSC), await phaseOf(oc, DSCI)];

  const catalogState = await jsonPath(oc, CATALOG_SOURCE, "{.status.connectionState.lastObservedState}");

  const rhoaiState = await subscriptionState(oc, RHOAI_SUBSCRIPTION);
  const rhoai: Extract<StatusResult, { ok: true }>["rhoai"] = { status: classify(rhoaiState, "AtLatestKnown") };
  if (rhoaiState !== undefined) {
    rhoai.state = orUndefined(rhoaiState);
    rhoai.channel = orUndefined(await jsonPath(oc, RHOAI_SUBSCRIPTION, "{.spec.channel}"));
    rhoai.installPlanApproval = orUndefined(await jsonPath(oc, RHOAI_SUBSCRIPTION, "{.spec.installPlanApproval}"));
    rhoai.installedCSV = orUndefined(await jsonPath(oc, RHOAI_SUBSCRIPTION, "{.status.installedCSV}"));
  }

  const operators: SubscriptionStatus[] = [];
  for (const operator of PREREQUISITES) {
    const state = await subscriptionState(oc, operator.subscription);
    operators.push({
      name: operator.subscription.name,
      displayName: operator.displayName,
      namespace: operator.subscription.namespace ?? "",
      status: classify(state, "AtLatestKnown"),
      state: orUndefined(state),
    });
  }

  return {
    ok: true,
    timestamp: new Date().toISOString(),
    cluster: { server: session.server, user: session.user },
    platform: { dsc, dsci },
    catalogSource: { status: classify(catalogState, "READY"), state: orUndefined(catalogState) },
    rhoai,
    operators,
  };
}

function colored(status: ComponentStatus, text: string): string {
  const color = status === "ready" ? GREEN : status === "progressing" ? YELLOW : RED;
  return `${color}${text}${NC}`;
}

function row(label: string, status: ComponentStatus, detail?: string): string {
  const text = status === "missing" ? "NOT FOUND" : detail || status.toUpperCase();
  return `  ${label.padEnd(43)} ${colored(status, text)}`;
}

/** The status table, one line per entry. */
export function formatStatusOutput(result: Extract<StatusResult, { ok: true }>): string[] {
  const lines: string[] = [];
  lines.push("");
  lines.push("=".repeat(80));
  lines.push(`RHOAI Status: ${result.cluster.server}`);
  lines.push("=".repeat(80));
  lines.push(`${"COMPONENT".padEnd(45)} STATUS`);
  lines.push("-".repeat(80));

  lines.push("[Platform]");
  lines.push(row(`DataScienceCluster (${DSC.name})`, result.platform.dsc.status, result.platform.dsc.phase));
  lines.push(row(`DSCInitialization (${DSCI.name})`, result.platform.dsci.status, result.platform.dsci.phase));
  lines.push(row(`CatalogSource (${CATALOG_SOURCE.name})`, result.catalogSource.status, result.catalogSource.state));

  lines.push("");
  lines.push("[RHOAI Operator]");
  lines.push(row(`Subscription (${RHOAI_SUBSCRIPTION.name})`, result.rhoai.status, result.rhoai.state));
  if (result.rhoai.status !== "missing") {
    lines.push(`  ${"Channel".padEnd(43)} ${result.rhoai.channel ?? "-"}`);
    lines.push(`  ${"Install plan approval".padEnd(43)} ${result.rhoai.installPlanApproval ?? "-"}`);
    lines.push(`  ${"Installed CSV".padEnd(43)} ${result.rhoai.installedCSV ?? "-"}`);
  }

  lines.push("");
  lines.push("[Prerequisite Operators]");
  for (const op of result.operators) {
    lines.push(row(`${op.displayName} (${op.name})`, op.status, op.state));
  }

  lines.push("=".repeat(80));
  lines.push("");
  return lines;
}
