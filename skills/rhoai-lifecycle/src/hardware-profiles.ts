import { z } from "zod";
import { Oc, ResourceRef, exists, getObject, mergePatch } from "./tools/oc.js";
import { Issue, logInfo, logWarn } from "./tools/log.js";
import { rolloutReader, waitFor } from "./tools/wait.js";
import { validateClusterSession } from "./steps/auth.js";
import { HardwareProfilesInput } from "./schema.js";

export const INFERENCE_SERVICE_CONFIG = "inferenceservice-config";
export const MANAGED_ANNOTATION = "opendatahub.io/managed";
export const PAYLOAD_KEY = "inferenceService";
export const DISALLOWED_LIST_FIELD = "serviceAnnotationDisallowedList";
export const CONTROLLER_DEPLOYMENT = "kserve-controller-manager";

/** Appended to the disallowed list in this order. */
export const HARDWARE_PROFILE_ANNOTATIONS: readonly string[] = [
  "opendatahub.io/hardware-profile-name",
  "opendatahub.io/hardware-profile-namespace",
];

const ConfigMapSchema = z.object({
  metadata: z.object({
    name: z.string(),
    annotations: z.record(z.string()).nullish(),
  }),
  data: z.record(z.string()).nullish(),
});

type ConfigMap = z.infer<typeof ConfigMapSchema>;

const PayloadSchema = z.record(z.unknown());
const DisallowedListSchema = z.array(z.string());

export type ReconcileInput = {
  namespace: string;
  dryRun: boolean;
  restartTimeoutSeconds?: number;
  pollIntervalSeconds?: number;
};

export type AnnotationState = "satisfied" | "patched" | "would-patch";
export type RestartState = "not-needed" | "ready" | "timed-out" | "would-restart";

export type ReconcileResult =
  | {
      ok: true;
      dryRun: boolean;
      /** Something was written, or would be in dry-run. */
      changed: boolean;
      annotation: AnnotationState;
      added: string[];
      writes: number;
      restart: RestartState;
      warnings: Issue[];
    }
  | { ok: false; blockers: Issue[]; writes: number };

type Payload = { document: Record<string, unknown>; list: string[] };

/**
 * Entries of `desired` missing from `existing`, in `desired` order, each once.
 */
export function planDisallowedListAdditions(existing: readonly string[], desired: readonly string[]): string[] {
  return desired.filter((entry, i) => !existing.includes(entry) && desired.indexOf(entry) === i);
}

/**
 * Reads the embedded document from the ConfigMap. A missing data key or a `null`
 * document is an empty document; a missing or null list is an empty list.
 */
export function readPayload(configMap: ConfigMap): { ok: true; payload: Payload } | { ok: false; error: Issue } {
  const raw = configMap.data?.[PAYLOAD_KEY] ?? "{}";

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return {
      ok: false,
      error: {
        code: "MALFORMED_PAYLOAD",
        message: `Failed to parse data.${PAYLOAD_KEY} as JSON: ${e instanceof Error ? e.message : String(e)}`,
      },
    };
  }

  const document = PayloadSchema.safeParse(parsed ?? {});
  if (!document.success) {
    return {
      ok: false,
      error: { code: "MALFORMED_PAYLOAD", message: `data.${PAYLOAD_KEY} is not a JSON object` },
    };
  }

  const rawList = document.data[DISALLOWED_LIST_FIELD] ?? [];
  const list = DisallowedListSchema.safeParse(rawList);
  if (!list.success) {
    return {
      ok: false,
      error: {
        code: "MALFORMED_PAYLOAD",
        message: `${DISALLOWED_LIST_FIELD} in data.${PAYLOAD_KEY} is not a list of strings`,
      },
    };
  }

  return { ok: true, payload: { document: document.data, list: list.data } };
}

/**
 * The document with `additions` appended to the list. Other keys keep their
 * values and order; a list field that did not exist is added last.
 */
export function withAdditions(payload: Payload, additions: readonly string[]): Record<string, unknown> {
  return { ...payload.document, [DISALLOWED_LIST_FIELD]: [...payload.list, ...additions] };
}

async function fetchConfigMap(oc: Oc, ref: ResourceRef): Promise<{ ok: true; configMap: ConfigMap } | { ok: false; error: Issue }> {
  const got = await getObject(oc, ref);
  if (!got.ok) {
    return {
      ok: false,
      error: {
        code: "RESOURCE_FETCH_ERROR",
        message: `Failed to retrieve ConfigMap '${ref.name}' from namespace '${ref.namespace}': ${got.error}`,
      },
    };
  }
  const parsed = ConfigMapSchema.safeParse(got.object);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        code: "RESOURCE_FETCH_ERROR",
        message: `ConfigMap '${ref.name}' in namespace '${ref.namespace}' has an unexpected shape`,
      },
    };
  }
  return { ok: true, configMap: parsed.data };
}

/**
 * Makes the KServe inference service config ignore hardware-profile annotations:
 * sets `opendatahub.io/managed=false` on the ConfigMap so the platform operator stops
 * reverting it, and appends the hardware-profile annotations to the disallowed list.
 *
 * Each write happens only if needed, so a second run writes nothing. When something
 * was written the KServe controller is restarted to pick up the change; a rollout that
 * does not finish in time is a warning, since the ConfigMap is already reconciled.
 */
export async function reconcileHardwareProfiles(input: ReconcileInput, oc: Oc): Promise<ReconcileResult> {
  const { namespace, dryRun } = input;
  const ref: ResourceRef = { kind: "configmap", name: INFERENCE_SERVICE_CONFIG, namespace };
  const warnings: Issue[] = [];
  let writes = 0;

  if (!(await exists(oc, { kind: "namespace", name: namespace }))) {
    return { ok: false, writes, blockers: [{ code: "NOT_FOUND", message: `Namespace '${namespace}' does not exist` }] };
  }

  if (dryRun) logInfo("DRY-RUN MODE");

  const first = await fetchConfigMap(oc, ref);
  if (!first.ok) return { ok: false, writes, blockers: [first.error] };

  // Validate the embedded document before any write.
  const initial = readPayload(first.configMap);
  if (!initial.ok) return { ok: false, writes, blockers: [initial.error] };

  let configMap = first.configMap;
  let payload = initial.payload;
  let annotation: AnnotationState;

  const current = configMap.metadata.annotations?.[MANAGED_ANNOTATION];
  if (current === "false") {
    logInfo(`Annotation '${MANAGED_ANNOTATION}=false' already exists`);
    annotation = "satisfied";
  } else {
    logInfo(`Annotation '${MANAGED_ANNOTATION}' is '${current ?? "not-set"}', will set to 'false'`);
    if (dryRun) {
      logInfo(`[DRY-RUN] Would add annotation: ${MANAGED_ANNOTATION}=false`);
      annotation = "would-patch";
    } else {
      const patched = await mergePatch(oc, ref, { metadata: { annotations: { [MANAGED_ANNOTATION]: "false" } } });
      if (!patched.ok) {
        return {
          ok: false,
          writes,
          blockers: [{ code: "PATCH_REJECTED", message: `Failed to add managed annotation: ${patched.stderr}` }],
        };
      }
      writes++;
      annotation = "patched";
      logInfo(`Added annotation: ${MANAGED_ANNOTATION}=false`);

      const refetched = await fetchConfigMap(oc, ref);
      if (!refetched.ok) return { ok: false, writes, blockers: [refetched.error] };
      configMap = refetched.configMap;
      const reread = readPayload(configMap);
      if (!reread.ok) return { ok: false, writes, blockers: [reread.error] };
      payload = reread.payload;
    }
  }

  for (const entry of HARDWARE_PROFILE_ANNOTATIONS) {
    if (payload.list.includes(entry)) {
      logInfo(`Annotation '${entry}' already in disallowed list`);
    }
  }
  const added = planDisallowedListAdditions(payload.list, HARDWARE_PROFILE_ANNOTATIONS);

  if (added.length === 0) {
    logInfo("No annotations need to be added");
  } else if (dryRun) {
    logInfo("[DRY-RUN] Would add to disallowed list:");
    added.forEach((a) => logInfo(`  - ${a}`));
  } else {
    const document = JSON.stringify(withAdditions(payload, added), null, 2);
    const patched = await mergePatch(oc, ref, { data: { [PAYLOAD_KEY]: document } });
    if (!patched.ok) {
      return {
        ok: false,
        writes,
        blockers: [{ code: "PATCH_REJECTED", message: `Failed to patch ConfigMap: ${patched.stderr}` }],
      };
    }
    writes++;
    logInfo("Added to disallowed list:");
    added.forEach((a) => logInfo(`  - ${a}`));
  }

  const changed = annotation !== "satisfied" || added.length > 0;
  let restart: RestartState = "not-needed";

  if (changed && dryRun) {
    logInfo(`[DRY-RUN] Would restart ${CONTROLLER_DEPLOYMENT} deployment`);
    restart = "would-restart";
  } else if (changed) {
    const deployment: ResourceRef = { kind: "deployment", name: CONTROLLER_DEPLOYMENT, namespace };
    logInfo(`Restarting ${CONTROLLER_DEPLOYMENT} deployment...`);
    const restarted = await oc(["rollout", "restart", "deployment", CONTROLLER_DEPLOYMENT, "-n", namespace]);
    if (!restarted.ok) {
      return {
        ok: false,
        writes,
        blockers: [
          { code: "PATCH_REJECTED", message: `Failed to restart ${CONTROLLER_DEPLOYMENT} deployment: ${restarted.stderr}` },
        ],
      };
    }

    const timeoutSeconds = input.restartTimeoutSeconds ?? 120;
    const rollout = await waitFor(rolloutReader(oc, deployment), "Complete", {
      timeoutSeconds,
      pollIntervalSeconds: input.pollIntervalSeconds,
      description: `${CONTROLLER_DEPLOYMENT} rollout to complete`,
    });
    if (rollout.state === "Ready") {
      restart = "ready";
      logInfo("Controller restarted successfully");
    } else {
      restart = "timed-out";
      const warning = {
        code: "RESTART_TIMEOUT",
        message: `Rollout of ${CONTROLLER_DEPLOYMENT} did not complete within ${timeoutSeconds}s`,
      };
      warnings.push(warning);
      logWarn(warning.message);
    }
  } else {
    logInfo("ConfigMap already reconciled, no change");
  }

  return { ok: true, dryRun, changed, annotation, added, writes, restart, warnings };
}

/** Session check, then the reconcile itself. */
export async function runHardwareProfiles(input: HardwareProfilesInput, oc: Oc): Promise<ReconcileResult> {
  const session = await validateClusterSession(oc);
  if (!session.ok) return { ok: false, writes: 0, blockers: session.blockers };
  logInfo(`Logged in as: ${session.user}`);
  logInfo(`Target namespace: ${input.namespace}`);
  return reconcileHardwareProfiles({ namespace: input.namespace, dryRun: input.dryRun }, oc);
}
