import { run, ShellResult, isNotFound } from "./shell.js";

export type OcOptions = { input?: string };

/** Runs one `oc` invocation. Injected everywhere so tests can stand in for the cluster. */
export type Oc = (args: string[], opts?: OcOptions) => Promise<ShellResult>;

export function createOc(bin = "oc"): Oc {
  return (args, opts) => run(bin, args, opts);
}

export type ResourceRef = {
  kind: string;
  name: string;
  namespace?: string;
};

export type KubeObject = {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  spec?: Record<string, unknown>;
};

export type DeleteOutcome =
  | { status: "deleted" }
  | { status: "absent" }
  | { status: "failed"; error: string };

function nsArgs(namespace?: string): string[] {
  return namespace ? ["-n", namespace] : [];
}

export function describeRef(ref: ResourceRef): string {
  return ref.namespace ? `${ref.kind}/${ref.name} (${ref.namespace})` : `${ref.kind}/${ref.name}`;
}

export async function exists(oc: Oc, ref: ResourceRef): Promise<boolean> {
  const result = await oc(["get", ref.kind, ref.name, ...nsArgs(ref.namespace)]);
  return result.ok;
}

/**
 * Reads a single field with `-o jsonpath`. Returns undefined when the read fails,
 * and "" when the object exists but the field is unset.
 */
export async function jsonPath(oc: Oc, ref: ResourceRef, path: string): Promise<string | undefined> {
  const result = await oc(["get", ref.kind, ref.name, ...nsArgs(ref.namespace), "-o", `jsonpath=${path}`]);
  return result.ok ? result.stdout : undefined;
}

export type GetObjectResult =
  | { ok: true; object: unknown }
  | { ok: false; notFound: boolean; error: string };

/** `oc get -o json`, parsed. A body that is not JSON is reported as a failed read. */
export async function getObject(oc: Oc, ref: ResourceRef): Promise<GetObjectResult> {
  const result = await oc(["get", ref.kind, ref.name, ...nsArgs(ref.namespace), "-o", "json"]);
  if (!result.ok) {
    return { ok: false, notFound: isNotFound(result), error: result.stderr || `oc get exited with ${result.exitCode}` };
  }
  try {
    const object: unknown = JSON.parse(result.stdout);
    return { ok: true, object };
  } catch (e) {
    return { ok: false, notFound: false, error: `Unparsable response for ${describeRef(ref)}: ${e instanceof Error ? e.message : String(e)}` };
  }
}

/** `oc get <kind> -o name`, one entry per object (e.g. "operatorgroup.operators.coreos.com/foo"). */
export async function listNames(oc: Oc, kind: string, namespace?: string): Promise<string[] | undefined> {
  const result = await oc(["get", kind, ...nsArgs(namespace), "-o", "name"]);
  if (!result.ok) return undefined;
  return result.stdout
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

export async function applyManifest(oc: Oc, manifest: KubeObject): Promise<ShellResult> {
  return oc(["apply", "-f", "-"], { input: JSON.stringify(manifest, null, 2) });
}

export async function mergePatch(oc: Oc, ref: ResourceRef, patch: Record<string, unknown>): Promise<ShellResult> {
  return oc(["patch", ref.kind, ref.name, ...nsArgs(ref.namespace), "--type=merge", "-p", JSON.stringify(patch)]);
}

export async function createNamespace(oc: Oc, name: string): Promise<ShellResult> {
  return oc(["create", "namespace", name]);
}

/**
 * Deletes an object, telling "already gone" apart from a failed read or delete.
 */
export async function deleteIfPresent(
  oc: Oc,
  ref: ResourceRef,
  opts: { timeoutSeconds?: number } = {}
): Promise<DeleteOutcome> {
  const get = await oc(["get", ref.kind, ref.name, ...nsArgs(ref.namespace)]);
  if (!get.ok) {
    if (isNotFound(get)) return { status: "absent" };
    return { status: "failed", error: get.stderr || `oc get exited with ${get.exitCode}` };
  }

  const args = ["delete", ref.kind, ref.name, ...nsArgs(ref.namespace)];
  if (opts.timeoutSeconds !== undefined) args.push(`--timeout=${opts.timeoutSeconds}s`);
  const del = await oc(args);
  if (del.ok) return { status: "deleted" };
  if (isNotFound(del)) return { status: "absent" };
  return { status: "failed", error: del.stderr || `oc delete exited with ${del.exitCode}` };
}

/** Deletes every object of a kind, cluster-wide when allNamespaces is set. */
export async function deleteAllOfKind(
  oc: Oc,
  kind: string,
  opts: { allNamespaces?: boolean; timeoutSeconds?: number } = {}
): Promise<ShellResult> {
  const args = ["delete", kind, "--all"];
  if (opts.allNamespaces) args.push("-A");
  if (opts.timeoutSeconds !== undefined) args.push(`--timeout=${opts.timeoutSeconds}s`);
  return oc(args);
}

/**
 * Names of ClusterServiceVersions in a namespace whose name matches `pattern`,
 * in the `clusterserviceversion.operators.coreos.com/<name>` form `oc delete` accepts.
 */
export async function findCsvs(oc: Oc, namespace: string, pattern: RegExp): Promise<string[]> {
  const names = await listNames(oc, "csv", namespace);
  return (names ?? []).filter((n) => pattern.test(n));
}

export async function deleteNamed(oc: Oc, names: string[], namespace?: string): Promise<ShellResult> {
  return oc(["delete", ...names, ...nsArgs(namespace)]);
}
