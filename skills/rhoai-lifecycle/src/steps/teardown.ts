import { Oc, ResourceRef, DeleteOutcome, deleteIfPresent, deleteNamed, describeRef, findCsvs } from "../tools/oc.js";
import { Issue, logInfo, logWarn } from "../tools/log.js";
import { OperatorSpec } from "../catalog.js";

export type DeleteTally = {
  deleted: string[];
  absent: string[];
  failed: string[];
  warnings: Issue[];
};

export function emptyTally(): DeleteTally {
  return { deleted: [], absent: [], failed: [], warnings: [] };
}

/** Logs one delete outcome and adds it to the tally. */
export function record(tally: DeleteTally, label: string, outcome: DeleteOutcome, indent = "  "): void {
  switch (outcome.status) {
    case "deleted":
      tally.deleted.push(label);
      break;
    case "absent":
      tally.absent.push(label);
      logWarn(`${indent}- ${label} not found, skipping`);
      break;
    case "failed": {
      tally.failed.push(label);
      const warning = { code: "DELETE_FAILED", message: `Failed to delete ${label}: ${outcome.error}` };
      tally.warnings.push(warning);
      logWarn(warning.message);
      break;
    }
  }
}

export async function deleteAndRecord(
  oc: Oc,
  tally: DeleteTally,
  ref: ResourceRef,
  opts: { timeoutSeconds?: number; indent?: string } = {}
): Promise<DeleteOutcome> {
  const indent = opts.indent ?? "  ";
  const outcome = await deleteIfPresent(oc, ref, { timeoutSeconds: opts.timeoutSeconds });
  if (outcome.status === "deleted") logInfo(`${indent}- Deleted ${describeRef(ref)}`);
  record(tally, describeRef(ref), outcome, indent);
  return outcome;
}

/** Deletes every CSV in `namespace` matching `pattern`. Nothing matching is a warning. */
export async function deleteMatchingCsvs(
  oc: Oc,
  tally: DeleteTally,
  namespace: string,
  pattern: RegExp,
  label: string,
  indent = "  "
): Promise<void> {
  const csvs = await findCsvs(oc, namespace, pattern);
  if (csvs.length === 0) {
    record(tally, `${label} CSV`, { status: "absent" }, indent);
    return;
  }
  logInfo(`${indent}- Deleting ${label} CSV: ${csvs.join(" ")}`);
  const result = await deleteNamed(oc, csvs, namespace);
  const outcome: DeleteOutcome = result.ok ? { status: "deleted" } : { status: "failed", error: result.stderr };
  record(tally, `${label} CSV`, outcome, indent);
}

export type UninstallOptions = {
  /** Also delete the operator's own namespace, e.g. openshift-serverless. */
  deleteOwnNamespace?: boolean;
  indent?: string;
};

/**
 * Removes an OLM-installed operator: subscription, then its CSVs. The CSV lookup
 * only runs when the subscription was there, so an operator installed some other
 * way is left alone. The operator group and own namespace go regardless.
 */
export async function uninstallOperator(
  oc: Oc,
  tally: DeleteTally,
  operator: OperatorSpec,
  opts: UninstallOptions = {}
): Promise<void> {
  const indent = opts.indent ?? "  ";
  const namespace = operator.subscription.namespace ?? "";
  logInfo(`${indent}- Uninstalling ${operator.displayName} operator...`);

  const sub = await deleteAndRecord(oc, tally, operator.subscription, { indent: `${indent}  ` });
  if (sub.status !== "absent") {
    await deleteMatchingCsvs(oc, tally, namespace, operator.csvPattern, operator.displayName, `${indent}  `);
  }

  if (operator.operatorGroup) {
    await deleteAndRecord(oc, tally, operator.operatorGroup, { indent: `${indent}  ` });
  }
  if (opts.deleteOwnNamespace && operator.ownNamespace) {
    await deleteAndRecord(
      oc,
      tally,
      { kind: "namespace", name: operator.ownNamespace },
      { timeoutSeconds: 300, indent: `${indent}  ` }
    );
  }
}
