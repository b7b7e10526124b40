import { z } from "zod";
import { Oc, ResourceRef, getObject, jsonPath } from "./oc.js";
import { isNotFound } from "./shell.js";

export type WaitState = "Pending" | "Ready" | "Failed" | "TimedOut";

export type WaitOutcome = {
  state: Exclude<WaitState, "Pending">;
  /** Last value the reader returned; undefined if the resource could not be read. */
  observed?: string;
  elapsedSeconds: number;
};

/** Reads the current value of the watched field. undefined = not readable yet. */
export type Reader = () => Promise<string | undefined>;

export type WaitOptions = {
  timeoutSeconds: number;
  pollIntervalSeconds?: number;
  /** Observed values that end the wait as Failed instead of polling on. */
  failedValues?: string[];
  description?: string;
  verbose?: boolean;
};

function step(observed: string | undefined, target: string, failedValues: string[]): WaitState {
  if (observed === target) return "Ready";
  if (observed !== undefined && failedValues.includes(observed)) return "Failed";
  return "Pending";
}

/**
 * Polls `reader` until it reports `target`, a failed value, or the timeout passes.
 * Whether TimedOut is fatal is the caller's decision.
 */
export async function waitFor(reader: Reader, target: string, options: WaitOptions): Promise<WaitOutcome> {
  const pollIntervalSeconds = options.pollIntervalSeconds ?? 5;
  const failedValues = options.failedValues ?? [];
  const verbose = options.verbose ?? true;
  const description = options.description ?? `resource to reach '${target}'`;
  const startTime = Date.now();
  let lastObserved: string | undefined;

  if (verbose) {
    console.error(`⏳ Waiting for ${description} (max ${options.timeoutSeconds}s)...`);
  }

  while (true) {
    const observed = await reader();
    const elapsedSeconds = Math.floor((Date.now() - startTime) / 1000);
    const state = step(observed, target, failedValues);

    if (verbose && observed !== lastObserved && observed !== undefined && observed !== "") {
      console.error(`   [${Math.floor(elapsedSeconds / 60)}m ${elapsedSeconds % 60}s] observed: ${observed}`);
    }
    lastObserved = observed;

    if (state === "Ready" || state === "Failed") {
      return { state, observed, elapsedSeconds };
    }
    if (elapsedSeconds >= options.timeoutSeconds) {
      return { state: "TimedOut", observed, elapsedSeconds };
    }

    await new Promise((resolve) => setTimeout(resolve, pollIntervalSeconds * 1000));
  }
}

export function jsonPathReader(oc: Oc, ref: ResourceRef, path: string): Reader {
  return () => jsonPath(oc, ref, path);
}

/** Status ("True"/"False"/"Unknown") of the condition of the given type. */
export function conditionReader(oc: Oc, ref: ResourceRef, conditionType: string): Reader {
  return jsonPathReader(oc, ref, `{.status.conditions[?(@.type=="${conditionType}")].status}`);
}

const DeploymentSchema = z.object({
  metadata: z.object({ generation: z.number().optional() }),
  spec: z.object({ replicas: z.number().optional() }).optional(),
  status: z
    .object({
      observedGeneration: z.number().optional(),
      replicas: z.number().optional(),
      updatedReplicas: z.number().optional(),
      availableReplicas: z.number().optional(),
    })
    .optional(),
});

/**
 * "Complete" once the deployment's latest generation is fully rolled out
 * (observed, every replica updated and available, no old replicas left), else "Progressing".
 */
export function rolloutReader(oc: Oc, ref: ResourceRef): Reader {
  return async () => {
    const got = await getObject(oc, ref);
    if (!got.ok) return undefined;
    const parsed = DeploymentSchema.safeParse(got.object);
    if (!parsed.success) return undefined;

    const { metadata, spec, status } = parsed.data;
    const desired = spec?.replicas ?? 1;
    const complete =
      (status?.observedGeneration ?? 0) >= (metadata.generation ?? 0) &&
      (status?.updatedReplicas ?? 0) === desired &&
      (status?.replicas ?? 0) === desired &&
      (status?.availableReplicas ?? 0) === desired;
    return complete ? "Complete" : "Progressing";
  };
}

/**
 * Number of objects of a kind, as a string. Wait on "0" for deletion.
 * A kind the server no longer serves (its CRD is gone) counts as "0".
 */
export function countReader(oc: Oc, kind: string, namespace?: string): Reader {
  return async () => {
    const result = await oc(["get", kind, ...(namespace ? ["-n", namespace] : []), "-o", "name"]);
    if (!result.ok) return isNotFound(result) ? "0" : undefined;
    return String(result.stdout.split("\n").filter((l) => l.trim().length > 0).length);
  };
}
