import { FakeCluster } from "./__fixtures__/fake-cluster.js";
import { scriptedAsk } from "./__fixtures__/answers.js";
import { CLEANUP_PROFILES, runCleanup } from "./cleanup.js";
import { PLATFORM_NAMESPACES } from "./catalog.js";

function seedRhoai(cluster: FakeCluster): FakeCluster {
  cluster
    .add("inferenceservices.serving.kserve.io", "test-isvc", {}, "user-ns")
    .add("notebooks.kubeflow.org", "test-notebook", {}, "user-ns")
    .add("datasciencecluster", "default-dsc")
    .add("dscinitialization", "default-dsci")
    .add("subscription", "rhods-operator", {}, "redhat-ods-operator")
    .add("clusterserviceversion", "rhods-operator.2.25.0", {}, "redhat-ods-operator")
    .add("operatorgroup", "redhat-ods-operator", {}, "redhat-ods-operator")
    .add("catalogsource", "rhoai-catalog-dev", {}, "openshift-marketplace")
    .add("customresourcedefinition", "datascienceclusters.datasciencecluster.opendatahub.io")
    .add("customresourcedefinition", "dscinitializations.dscinitialization.opendatahub.io");
  for (const ns of PLATFORM_NAMESPACES) cluster.add("namespace", ns);
  return cluster;
}

describe("CLEANUP_PROFILES", () => {
  it("loads both CRD lists", () => {
    expect(CLEANUP_PROFILES["2.x"].crds).toContain("datascienceclusters.datasciencecluster.opendatahub.io");
    expect(CLEANUP_PROFILES["3.x"].crds).toContain("datascienceclusters.datasciencecluster.opendatahub.io");
  });

  it("removes the prerequisites each major version installs", () => {
    expect(CLEANUP_PROFILES["2.x"].operators.map((o) => o.subscription.name)).toEqual([
      "servicemeshoperator",
      "serverless-operator",
      "authorino-operator",
    ]);
    expect(CLEANUP_PROFILES["3.x"].operators.map((o) => o.subscription.name)).toEqual([
      "rhcl-operator",
      "authorino-operator-stable-redhat-operators-openshift-marketplace",
      "dns-operator-stable-redhat-operators-openshift-marketplace",
      "limitador-operator-stable-redhat-operators-openshift-marketplace",
      "servicemeshoperator3",
    ]);
  });
});

describe("runCleanup", () => {
  let cluster: FakeCluster;

  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    cluster = seedRhoai(new FakeCluster());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("tears down a 2.x install", async () => {
    cluster
      .add("subscription", "servicemeshoperator", {}, "openshift-operators")
      .add("clusterserviceversion", "servicemeshoperator.v2.6.5", {}, "openshift-operators")
      .add("subscription", "serverless-operator", {}, "openshift-serverless")
      .add("clusterserviceversion", "serverless-operator.v1.35.0", {}, "openshift-serverless")
      .add("operatorgroup", "openshift-serverless", {}, "openshift-serverless")
      .add("subscription", "authorino-operator", {}, "openshift-operators")
      .add("clusterserviceversion", "authorino-operator.v1.0.0", {}, "openshift-operators");

    const result = await runCleanup({ version: "2.x", yes: true }, cluster.oc, { pollIntervalSeconds: 0 });

    expect(result.status).toBe("completed");
    expect(result.version).toBe("2.x");
    expect(result.warnings).toEqual([]);
    expect(result.evidence.failed).toEqual([]);
    for (const kind of [
      "inferenceservice",
      "notebook",
      "datasciencecluster",
      "dscinitialization",
      "subscription",
      "clusterserviceversion",
      "operatorgroup",
      "catalogsource",
      "namespace",
      "customresourcedefinition",
    ]) {
      expect(cluster.count(kind)).toBe(0);
    }
    expect(result.evidence.deleted).toEqual(
      expect.arrayContaining(["subscription/rhods-operator (redhat-ods-operator)", "RHOAI CSV", "namespace/redhat-ods-applications"])
    );
    expect(cluster.callsTo("delete")[0].args).toEqual(["delete", "inferenceservices.serving.kserve.io", "--all", "-A"]);
  });

  it("removes every DataScienceCluster on 3.x and bounds workload deletes", async () => {
    cluster.add("datasciencecluster", "extra-dsc").add("subscription", "servicemeshoperator3", {}, "openshift-operators");

    const result = await runCleanup({ version: "3.x", yes: true }, cluster.oc, { pollIntervalSeconds: 0 });

    expect(result.status).toBe("completed");
    expect(cluster.count("datasciencecluster")).toBe(0);
    expect(cluster.count("subscription")).toBe(0);
    const deletes = cluster.callsTo("delete").map((c) => c.args);
    expect(deletes[0]).toEqual(["delete", "inferenceservices.serving.kserve.io", "--all", "-A", "--timeout=60s"]);
    expect(deletes).toContainEqual(["delete", "datasciencecluster", "--all", "--timeout=300s"]);
  });

  it("keeps going after a failed delete and reports it", async () => {
    cluster.failWhen(
      (args) => args[0] === "delete" && args[1] === "namespace" && args[2] === "redhat-ods-monitoring",
      "error: timed out waiting for the condition"
    );

    const result = await runCleanup({ version: "2.x", yes: true }, cluster.oc, { pollIntervalSeconds: 0 });

    expect(result.status).toBe("completed");
    expect(result.evidence.failed).toEqual(["namespace/redhat-ods-monitoring"]);
    expect(result.warnings).toEqual([
      {
        code: "DELETE_FAILED",
        message: "Failed to delete namespace/redhat-ods-monitoring: error: timed out waiting for the condition",
      },
    ]);
    expect(cluster.count("customresourcedefinition")).toBe(0);
  });

  it("records a failed workload delete by its label", async () => {
    cluster.failWhen((args) => args[0] === "delete" && args[1] === "notebooks.kubeflow.org", "error: the server is busy");

    const result = await runCleanup({ version: "2.x", yes: true }, cluster.oc, { pollIntervalSeconds: 0 });

    expect(result.status).toBe("completed");
    expect(result.evidence.failed).toEqual(["Notebooks"]);
  });

  it("asks for the version until it gets a valid one", async () => {
    const ask = scriptedAsk("4", "3", "y");

    const result = await runCleanup({ yes: false }, cluster.oc, { ask, pollIntervalSeconds: 0 });

    expect(result.version).toBe("3.x");
    expect(ask.questions).toEqual([
      "Which version of RHOAI do you want to clean up? (2.x/3.x): ",
      "Which version of RHOAI do you want to clean up? (2.x/3.x): ",
      "Do you want to proceed with the cleanup? (y/n): ",
    ]);
  });

  it("deletes nothing when the user declines", async () => {
    const result = await runCleanup({ version: "2.x", yes: false }, cluster.oc, {
      ask: scriptedAsk("n"),
      pollIntervalSeconds: 0,
    });

    expect(result.status).toBe("cancelled");
    expect(cluster.callsTo("delete")).toHaveLength(0);
  });
});
