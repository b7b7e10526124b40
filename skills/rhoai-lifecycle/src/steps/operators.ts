import { Oc, KubeObject, ResourceRef, applyManifest, createNamespace, exists, listNames } from "../tools/oc.js";
import { ShellResult } from "../tools/shell.js";
import { MARKETPLACE_NAMESPACE } from "../catalog.js";
import { logInfo, logWarn } from "../tools/log.js";

export type SubscriptionParams = {
  name: string;
  namespace: string;
  channel: string;
  source: string;
  installPlanApproval?: "Automatic" | "Manual";
  startingCSV?: string;
};

export function subscriptionManifest(params: SubscriptionParams): KubeObject {
  const spec: Record<string, unknown> = {
    channel: params.channel,
    installPlanApproval: params.installPlanApproval ?? "Automatic",
    name: params.name,
    source: params.source,
    sourceNamespace: MARKETPLACE_NAMESPACE,
  };
  if (params.startingCSV) spec.startingCSV = params.startingCSV;

  return {
    apiVersion: "operators.coreos.com/v1alpha1",
    kind: "Subscription",
    metadata: { name: params.name, namespace: params.namespace },
    spec,
  };
}

export function operatorGroupManifest(ref: ResourceRef): KubeObject {
  return {
    apiVersion: "operators.coreos.com/v1",
    kind: "OperatorGroup",
    metadata: { name: ref.name, namespace: ref.namespace },
    spec: { upgradeStrategy: "Default" },
  };
}

export function catalogSourceManifest(ref: ResourceRef, image: string): KubeObject {
  return {
    apiVersion: "operators.coreos.com/v1alpha1",
    kind: "CatalogSource",
    metadata: { name: ref.name, namespace: ref.namespace },
    spec: {
      displayName: "Red Hat OpenShift AI",
      grpcPodConfig: { securityContextConfig: "restricted" },
      image,
      publisher: "RHOAI Development Catalog",
      sourceType: "grpc",
    },
  };
}

/** Creates the namespace unless it exists. */
export async function ensureNamespace(oc: Oc, name: string): Promise<ShellResult | undefined> {
  logInfo(`Creating namespace: ${name}`);
  if (await exists(oc, { kind: "namespace", name })) {
    logWarn(`Namespace ${name} already exists, skipping creation`);
    return undefined;
  }
  const result = await createNamespace(oc, name);
  if (result.ok) logInfo(`Namespace ${name} created successfully`);
  return result;
}

/**
 * Creates the OperatorGroup unless the namespace already has one,
 * of any name, since OLM allows only one per namespace.
 */
export async function ensureOperatorGroup(oc: Oc, ref: ResourceRef): Promise<ShellResult | undefined> {
  const namespace = ref.namespace ?? "";
  const existing = await listNames(oc, "operatorgroup", namespace);
  if (existing && existing.length > 0) {
    logInfo(`OperatorGroup already exists in ${namespace} namespace, skipping creation`);
    return undefined;
  }
  logInfo(`Creating OperatorGroup in ${namespace} namespace`);
  const result = await applyManifest(oc, operatorGroupManifest(ref));
  if (result.ok) logInfo("OperatorGroup created successfully");
  return result;
}
