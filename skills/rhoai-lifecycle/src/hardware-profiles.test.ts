import { FakeCluster } from "./__fixtures__/fake-cluster.js";
import {
  HARDWARE_PROFILE_ANNOTATIONS,
  planDisallowedListAdditions,
  reconcileHardwareProfiles,
  runHardwareProfiles,
} from "./hardware-profiles.js";

const NS = "test-apps";
const NAME_ANNOTATION = "opendatahub.io/hardware-profile-name";
const NAMESPACE_ANNOTATION = "opendatahub.io/hardware-profile-namespace";

function seed(
  cluster: FakeCluster,
  opts: { annotations?: Record<string, string>; payload?: string } = {}
): FakeCluster {
  cluster.add("namespace", NS);
  cluster.add(
    "configmap",
    "inferenceservice-config",
    {
      metadata: { annotations: opts.annotations ?? {} },
      data: opts.payload === undefined ? {} : { inferenceService: opts.payload },
    },
    NS
  );
  cluster.add(
    "deployment",
    "kserve-controller-manager",
    {
      metadata: { generation: 1 },
      spec: { replicas: 1 },
      status: { observedGeneration: 1, replicas: 1, updatedReplicas: 1, availableReplicas: 1 },
    },
    NS
  );
  return cluster;
}

function storedDocument(cluster: FakeCluster): unknown {
  const cm = cluster.get("configmap", "inferenceservice-config", NS);
  const data = cm?.data;
  if (typeof data !== "object" || data === null || !("inferenceService" in data)) return undefined;
  return JSON.parse(String(data.inferenceService));
}

function storedAnnotations(cluster: FakeCluster): unknown {
  const cm = cluster.get("configmap", "inferenceservice-config", NS);
  const metadata = cm?.metadata;
  return typeof metadata === "object" && metadata !== null && "annotations" in metadata ? metadata.annotations : undefined;
}

describe("planDisallowedListAdditions", () => {
  it("returns every desired entry for an empty list, in order", () => {
    expect(planDisallowedListAdditions([], HARDWARE_PROFILE_ANNOTATIONS)).toEqual([NAME_ANNOTATION, NAMESPACE_ANNOTATION]);
  });

  it("skips entries already present", () => {
    expect(planDisallowedListAdditions(["other", NAME_ANNOTATION], HARDWARE_PROFILE_ANNOTATIONS)).toEqual([
      NAMESPACE_ANNOTATION,
    ]);
  });

  it("returns nothing when all are present, whatever their position", () => {
    expect(planDisallowedListAdditions([NAMESPACE_ANNOTATION, "x", NAME_ANNOTATION], HARDWARE_PROFILE_ANNOTATIONS)).toEqual(
      []
    );
  });

  it("does not repeat a desired entry listed twice", () => {
    expect(planDisallowedListAdditions([], ["a", "b", "a"])).toEqual(["a", "b"]);
  });
});

describe("reconcileHardwareProfiles", () => {
  let cluster: FakeCluster;

  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    cluster = new FakeCluster();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("sets the annotation and appends both entries when neither is present", async () => {
    seed(cluster, { payload: JSON.stringify({ serviceAnnotationDisallowedList: [] }) });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result).toEqual({
      ok: true,
      dryRun: false,
      changed: true,
      annotation: "patched",
      added: [NAME_ANNOTATION, NAMESPACE_ANNOTATION],
      writes: 2,
      restart: "ready",
      warnings: [],
    });

    const patches = cluster.callsTo("patch");
    expect(patches).toHaveLength(2);
    expect(patches[0].args).toEqual([
      "patch",
      "configmap",
      "inferenceservice-config",
      "-n",
      NS,
      "--type=merge",
      "-p",
      '{"metadata":{"annotations":{"opendatahub.io/managed":"false"}}}',
    ]);
    expect(storedAnnotations(cluster)).toEqual({ "opendatahub.io/managed": "false" });
    expect(storedDocument(cluster)).toEqual({ serviceAnnotationDisallowedList: [NAME_ANNOTATION, NAMESPACE_ANNOTATION] });
    expect(cluster.callsTo("rollout")[0].args).toEqual(["rollout", "restart", "deployment", "kserve-controller-manager", "-n", NS]);
  });

  it("only appends the missing entry when the annotation is already false", async () => {
    seed(cluster, {
      annotations: { "opendatahub.io/managed": "false" },
      payload: JSON.stringify({ serviceAnnotationDisallowedList: [NAME_ANNOTATION] }),
    });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.annotation).toBe("satisfied");
    expect(result.added).toEqual([NAMESPACE_ANNOTATION]);
    expect(result.writes).toBe(1);

    const patches = cluster.callsTo("patch");
    expect(patches).toHaveLength(1);
    expect(patches[0].args[patches[0].args.length - 1]).toContain('"data"');
    expect(storedDocument(cluster)).toEqual({ serviceAnnotationDisallowedList: [NAME_ANNOTATION, NAMESPACE_ANNOTATION] });
  });

  it("writes nothing and skips the restart when already reconciled", async () => {
    seed(cluster, {
      annotations: { "opendatahub.io/managed": "false" },
      payload: JSON.stringify({ serviceAnnotationDisallowedList: [NAME_ANNOTATION, NAMESPACE_ANNOTATION] }),
    });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result).toEqual({
      ok: true,
      dryRun: false,
      changed: false,
      annotation: "satisfied",
      added: [],
      writes: 0,
      restart: "not-needed",
      warnings: [],
    });
    expect(cluster.callsTo("patch")).toHaveLength(0);
    expect(cluster.callsTo("rollout")).toHaveLength(0);
  });

  it("is idempotent: a second run writes nothing", async () => {
    seed(cluster, { payload: JSON.stringify({ serviceAnnotationDisallowedList: ["keep-me"] }) });

    await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);
    const second = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(second.ok && second.changed).toBe(false);
    expect(cluster.callsTo("patch")).toHaveLength(2);
    expect(storedDocument(cluster)).toEqual({
      serviceAnnotationDisallowedList: ["keep-me", NAME_ANNOTATION, NAMESPACE_ANNOTATION],
    });
  });

  it("keeps the other keys and their order in the embedded document", async () => {
    seed(cluster, {
      annotations: { "opendatahub.io/managed": "false" },
      payload: '{"image":"kserve-test","serviceAnnotationDisallowedList":["x"],"nested":{"depth":2}}',
    });

    await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    const cm = cluster.get("configmap", "inferenceservice-config", NS);
    expect(cm?.data).toEqual({
      inferenceService: JSON.stringify(
        { image: "kserve-test", serviceAnnotationDisallowedList: ["x", NAME_ANNOTATION, NAMESPACE_ANNOTATION], nested: { depth: 2 } },
        null,
        2
      ),
    });
  });

  it("creates the list when the data key is missing", async () => {
    seed(cluster, { annotations: { "opendatahub.io/managed": "false" } });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok).toBe(true);
    expect(storedDocument(cluster)).toEqual({ serviceAnnotationDisallowedList: [NAME_ANNOTATION, NAMESPACE_ANNOTATION] });
  });

  it("treats a null document as empty", async () => {
    seed(cluster, { annotations: { "opendatahub.io/managed": "false" }, payload: "null" });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok && result.added).toEqual([NAME_ANNOTATION, NAMESPACE_ANNOTATION]);
    expect(storedDocument(cluster)).toEqual({ serviceAnnotationDisallowedList: [NAME_ANNOTATION, NAMESPACE_ANNOTATION] });
  });

  it("rewrites a managed annotation set to true", async () => {
    seed(cluster, {
      annotations: { "opendatahub.io/managed": "true" },
      payload: JSON.stringify({ serviceAnnotationDisallowedList: [NAME_ANNOTATION, NAMESPACE_ANNOTATION] }),
    });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok && result.annotation).toBe("patched");
    expect(result.ok && result.added).toEqual([]);
    expect(cluster.callsTo("patch")).toHaveLength(1);
    expect(cluster.callsTo("rollout")).toHaveLength(1);
  });

  it("reports the change set in dry-run without writing or restarting", async () => {
    seed(cluster, { payload: JSON.stringify({ serviceAnnotationDisallowedList: [] }) });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: true }, cluster.oc);

    expect(result).toEqual({
      ok: true,
      dryRun: true,
      changed: true,
      annotation: "would-patch",
      added: [NAME_ANNOTATION, NAMESPACE_ANNOTATION],
      writes: 0,
      restart: "would-restart",
      warnings: [],
    });
    expect(cluster.callsTo("patch")).toHaveLength(0);
    expect(cluster.callsTo("rollout")).toHaveLength(0);
    expect(storedAnnotations(cluster)).toEqual({});
  });

  it("fails on malformed JSON before any write", async () => {
    seed(cluster, { payload: "{not json" });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.blockers.map((b) => b.code)).toEqual(["MALFORMED_PAYLOAD"]);
    expect(result.writes).toBe(0);
    expect(cluster.callsTo("patch")).toHaveLength(0);
  });

  it("fails when the list field is not a list of strings", async () => {
    seed(cluster, { payload: JSON.stringify({ serviceAnnotationDisallowedList: "not-a-list" }) });

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok || result.blockers[0].code).toBe("MALFORMED_PAYLOAD");
    expect(cluster.callsTo("patch")).toHaveLength(0);
  });

  it("fails with NOT_FOUND for a missing namespace", async () => {
    const result = await reconcileHardwareProfiles({ namespace: "missing-ns", dryRun: false }, cluster.oc);

    expect(result).toEqual({
      ok: false,
      writes: 0,
      blockers: [{ code: "NOT_FOUND", message: "Namespace 'missing-ns' does not exist" }],
    });
  });

  it("fails with RESOURCE_FETCH_ERROR when the ConfigMap is missing", async () => {
    cluster.add("namespace", NS);

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok || result.blockers[0].code).toBe("RESOURCE_FETCH_ERROR");
  });

  it("fails with PATCH_REJECTED when the data write is refused", async () => {
    seed(cluster, { payload: JSON.stringify({ serviceAnnotationDisallowedList: [] }) });
    cluster.failWhen(
      (args) => args[0] === "patch" && args[args.length - 1].includes('"data"'),
      "Error from server (Forbidden): configmaps is forbidden"
    );

    const result = await reconcileHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.writes).toBe(1);
    expect(result.blockers[0].code).toBe("PATCH_REJECTED");
    expect(cluster.callsTo("rollout")).toHaveLength(0);
  });

  it("warns when the controller rollout does not finish in time", async () => {
    seed(cluster, { payload: JSON.stringify({ serviceAnnotationDisallowedList: [] }) });
    cluster.rolloutCompletes = false;

    const result = await reconcileHardwareProfiles(
      { namespace: NS, dryRun: false, restartTimeoutSeconds: 0, pollIntervalSeconds: 0 },
      cluster.oc
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.restart).toBe("timed-out");
    expect(result.warnings.map((w) => w.code)).toEqual(["RESTART_TIMEOUT"]);
  });
});

describe("runHardwareProfiles", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("stops before touching the cluster without a session", async () => {
    const cluster = seed(new FakeCluster());
    cluster.loggedIn = false;

    const result = await runHardwareProfiles({ namespace: NS, dryRun: false }, cluster.oc);

    expect(result.ok || result.blockers[0].code).toBe("UNAUTHENTICATED");
    expect(cluster.callsTo("get")).toHaveLength(0);
  });
});
