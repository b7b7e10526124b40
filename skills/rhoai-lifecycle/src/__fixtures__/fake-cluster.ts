import { Oc, OcOptions } from "../tools/oc.js";
import { ShellResult } from "../tools/shell.js";

type Json = Record<string, unknown>;

type Stored = { kind: string; namespace: string; name: string; object: Json };

export type Call = { args: string[]; input?: string };

type Failure = { match: (args: string[]) => boolean; stderr: string; exitCode: number; once: boolean };

const KIND_ALIASES: Record<string, string> = {
  csv: "clusterserviceversion",
  crd: "customresourcedefinition",
  ns: "namespace",
  cm: "configmap",
  deploy: "deployment",
};

/** "datascienceclusters.datasciencecluster.opendatahub.io" and "DataScienceCluster" are the same kind. */
export function canonicalKind(kind: string): string {
  const base = kind.split(".")[0].toLowerCase();
  const aliased = KIND_ALIASES[base] ?? base;
  return aliased.endsWith("s") ? aliased.slice(0, -1) : aliased;
}

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON merge patch: null deletes, objects merge, everything else replaces. */
export function mergePatchJson(target: unknown, patch: unknown): unknown {
  if (!isObject(patch)) return patch;
  const result: Json = isObject(target) ? { ...target } : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      result[key] = mergePatchJson(result[key], value);
    }
  }
  return result;
}

function format(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * The jsonpath forms the tool uses: `{.a.b.c}` and
 * `{.status.conditions[?(@.type=="X")].status}`.
 */
export function evalJsonPath(object: unknown, expr: string): string {
  const path = expr.replace(/^\{/, "").replace(/\}$/, "");
  const tokens = path.match(/\.[^.[]+|\[\?\(@\.[^)]+\)\]/g) ?? [];
  let current: unknown = object;

  for (const token of tokens) {
    if (token.startsWith(".")) {
      current = isObject(current) ? current[token.slice(1)] : undefined;
      continue;
    }
    const filter = token.match(/^\[\?\(@\.(\w+)=="([^"]*)"\)\]$/);
    if (!filter || !Array.isArray(current)) return "";
    const [, field, value] = filter;
    current = current.find((item: unknown) => isObject(item) && item[field] === value);
  }
  return format(current);
}

type Flags = {
  namespace?: string;
  allNamespaces: boolean;
  all: boolean;
  output?: string;
  patch?: string;
  rest: string[];
};

function splitFlags(args: string[]): Flags {
  const flags: Flags = { allNamespaces: false, all: false, rest: [] };
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === "-n") flags.namespace = args[++i];
    else if (a === "-A") flags.allNamespaces = true;
    else if (a === "--all") flags.all = true;
    else if (a === "-o") flags.output = args[++i];
    else if (a.startsWith("-o") && a.length > 2) flags.output = a.slice(2);
    else if (a === "-p") flags.patch = args[++i];
    else if (a === "-l" || a === "-f") i++;
    else if (a.startsWith("--")) continue;
    else flags.rest.push(a);
  }
  return flags;
}

/**
 * In-memory stand-in for a cluster behind `oc`. Objects keep whatever status
 * the test seeds; `apply` merges into an existing object, so a seeded status
 * survives the tool applying its manifest.
 */
export class FakeCluster {
  private objects = new Map<string, Stored>();
  private failures: Failure[] = [];
  readonly calls: Call[] = [];

  user = "test-user";
  server = "https://api.test.example:6443";
  loggedIn = true;
  versionJson: Json = { openshiftVersion: "4.20.4", serverVersion: { gitVersion: "v1.33.5" } };
  /** Whether `rollout restart` leaves the deployment fully rolled out. */
  rolloutCompletes = true;

  readonly oc: Oc = async (args: string[], opts?: OcOptions) => this.handle(args, opts);

  private key(kind: string, namespace: string | undefined, name: string): string {
    return `${canonicalKind(kind)}|${namespace ?? ""}|${name}`;
  }

  add(kind: string, name: string, object: Json = {}, namespace?: string): this {
    const metadata = isObject(object.metadata) ? object.metadata : {};
    this.objects.set(this.key(kind, namespace, name), {
      kind: canonicalKind(kind),
      namespace: namespace ?? "",
      name,
      object: { ...object, metadata: { ...metadata, name, ...(namespace ? { namespace } : {}) } },
    });
    return this;
  }

  get(kind: string, name: string, namespace?: string): Json | undefined {
    return this.objects.get(this.key(kind, namespace, name))?.object;
  }

  has(kind: string, name: string, namespace?: string): boolean {
    return this.objects.has(this.key(kind, namespace, name));
  }

  count(kind: string): number {
    const k = canonicalKind(kind);
    return [...this.objects.values()].filter((s) => s.kind === k).length;
  }

  /** The next matching call fails with `stderr` (every matching call when `once` is false). */
  failWhen(match: (args: string[]) => boolean, stderr: string, opts: { once?: boolean; exitCode?: number } = {}): this {
    this.failures.push({ match, stderr, exitCode: opts.exitCode ?? 1, once: opts.once ?? false });
    return this;
  }

  callsTo(verb: string): Call[] {
    return this.calls.filter((c) => c.args[0] === verb);
  }

  private ok(stdout = ""): ShellResult {
    return { ok: true, exitCode: 0, stdout, stderr: "" };
  }

  private fail(stderr: string, exitCode = 1): ShellResult {
    return { ok: false, exitCode, stdout: "", stderr };
  }

  private notFound(kind: string, name: string): ShellResult {
    return this.fail(`Error from server (NotFound): ${canonicalKind(kind)}s "${name}" not found`);
  }

  private async handle(args: string[], opts?: OcOptions): Promise<ShellResult> {
    this.calls.push({ args, input: opts?.input });

    const failure = this.failures.find((f) => f.match(args));
    if (failure) {
      if (failure.once) this.failures.splice(this.failures.indexOf(failure), 1);
      return this.fail(failure.stderr, failure.exitCode);
    }

    const [verb, ...rest] = args;
    if (verb === "version") {
      return rest.includes("--client") ? this.ok("Client Version: 4.20.0") : this.ok(JSON.stringify(this.versionJson));
    }
    if (verb === "whoami") {
      if (!this.loggedIn) return this.fail("error: You must be logged in to the server (Unauthorized)");
      return this.ok(rest.includes("--show-server") ? this.server : this.user);
    }
    if (!this.loggedIn) return this.fail("error: You must be logged in to the server (Unauthorized)");

    const flags = splitFlags(rest);
    switch (verb) {
      case "get":
        return this.doGet(flags);
      case "apply":
        return this.doApply(opts?.input ?? "");
      case "patch":
        return this.doPatch(flags);
      case "delete":
        return this.doDelete(flags);
      case "create":
        return this.doCreate(flags);
      case "rollout":
        return this.doRollout(flags);
      default:
        return this.fail(`unknown command "${verb}"`);
    }
  }

  private list(kind: string, flags: Flags): Stored[] {
    const k = canonicalKind(kind);
    return [...this.objects.values()].filter(
      (s) => s.kind === k && (flags.allNamespaces || flags.namespace === undefined || s.namespace === flags.namespace)
    );
  }

  private doGet(flags: Flags): ShellResult {
    const [kind, name] = flags.rest;
    if (name === undefined) {
      const items = this.list(kind, flags);
      if (flags.output === "name") return this.ok(items.map((s) => `${s.kind}/${s.name}`).join("\n"));
      return this.ok(JSON.stringify({ kind: "List", items: items.map((s) => s.object) }));
    }

    const stored = this.objects.get(this.key(kind, flags.namespace, name));
    if (!stored) return this.notFound(kind, name);
    if (flags.output === "json") return this.ok(JSON.stringify(stored.object));
    if (flags.output?.startsWith("jsonpath=")) return this.ok(evalJsonPath(stored.object, flags.output.slice(9)));
    return this.ok(`${stored.kind}/${name}`);
  }

  private doApply(input: string): ShellResult {
    const manifest: unknown = JSON.parse(input);
    if (!isObject(manifest) || typeof manifest.kind !== "string" || !isObject(manifest.metadata)) {
      return this.fail("error: invalid manifest");
    }
    const name = format(manifest.metadata.name);
    const namespace = typeof manifest.metadata.namespace === "string" ? manifest.metadata.namespace : undefined;
    const existing = this.get(manifest.kind, name, namespace);
    const merged = mergePatchJson(existing ?? {}, manifest);
    this.add(manifest.kind, name, isObject(merged) ? merged : {}, namespace);
    return this.ok(`${canonicalKind(manifest.kind)}/${name} ${existing ? "configured" : "created"}`);
  }

  private doPatch(flags: Flags): ShellResult {
    const [kind, name] = flags.rest;
    const stored = this.objects.get(this.key(kind, flags.namespace, name));
    if (!stored) return this.notFound(kind, name);
    const patched = mergePatchJson(stored.object, JSON.parse(flags.patch ?? "{}"));
    stored.object = isObject(patched) ? patched : {};
    return this.ok(`${stored.kind}/${name} patched`);
  }

  private doDelete(flags: Flags): ShellResult {
    if (flags.all) {
      for (const s of this.list(flags.rest[0], { ...flags, allNamespaces: true })) {
        this.objects.delete(this.key(s.kind, s.namespace, s.name));
      }
      return this.ok();
    }

    // Either `delete kind name` or `delete kind/name kind/name ...`
    const targets = flags.rest[0]?.includes("/")
      ? flags.rest.map((r) => r.split("/"))
      : [[flags.rest[0], flags.rest[1]]];
    for (const [kind, name] of targets) {
      const key = this.key(kind, flags.namespace, name);
      if (!this.objects.has(key)) return this.notFound(kind, name);
      this.objects.delete(key);
    }
    return this.ok();
  }

  private doCreate(flags: Flags): ShellResult {
    const [kind, name] = flags.rest;
    if (this.has(kind, name, flags.namespace)) {
      return this.fail(`Error from server (AlreadyExists): ${canonicalKind(kind)}s "${name}" already exists`);
    }
    this.add(kind, name, {}, flags.namespace);
    return this.ok(`${canonicalKind(kind)}/${name} created`);
  }

  private doRollout(flags: Flags): ShellResult {
    const [action, kind, name] = flags.rest;
    const stored = this.objects.get(this.key(kind, flags.namespace, name));
    if (action !== "restart" || !stored) return this.notFound(kind, name);

    const generation = isObject(stored.object.metadata) && typeof stored.object.metadata.generation === "number"
      ? stored.object.metadata.generation + 1
      : 2;
    const replicas = isObject(stored.object.spec) && typeof stored.object.spec.replicas === "number"
      ? stored.object.spec.replicas
      : 1;
    const patched = mergePatchJson(stored.object, {
      metadata: { generation },
      status: this.rolloutCompletes
        ? { observedGeneration: generation, replicas, updatedReplicas: replicas, availableReplicas: replicas }
        : { observedGeneration: generation, replicas: replicas + 1, updatedReplicas: 0, availableReplicas: replicas },
    });
    stored.object = isObject(patched) ? patched : {};
    return this.ok(`deployment.apps/${name} restarted`);
  }
}
