import { FakeCluster } from "../__fixtures__/fake-cluster.js";
import { conditionReader, countReader, Reader, rolloutReader, waitFor } from "./wait.js";

function sequence(...values: Array<string | undefined>): Reader {
  let i = 0;
  return async () => values[Math.min(i++, values.length - 1)];
}

describe("waitFor", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("is Ready as soon as the reader reports the target", async () => {
    const outcome = await waitFor(sequence("Installing", undefined, "Ready"), "Ready", {
      timeoutSeconds: 10,
      pollIntervalSeconds: 0,
    });

    expect(outcome.state).toBe("Ready");
    expect(outcome.observed).toBe("Ready");
  });

  it("stops early on a failed value", async () => {
    const outcome = await waitFor(sequence("Pending", "Failed"), "Ready", {
      timeoutSeconds: 10,
      pollIntervalSeconds: 0,
      failedValues: ["Failed"],
    });

    expect(outcome).toMatchObject({ state: "Failed", observed: "Failed" });
  });

  it("times out with the last observed value", async () => {
    const outcome = await waitFor(sequence("Progressing"), "Ready", { timeoutSeconds: 0, pollIntervalSeconds: 0 });

    expect(outcome).toMatchObject({ state: "TimedOut", observed: "Progressing" });
  });

  it("reports an unreadable resource as undefined on timeout", async () => {
    const outcome = await waitFor(sequence(undefined), "Ready", { timeoutSeconds: 0 });

    expect(outcome.state).toBe("TimedOut");
    expect(outcome.observed).toBeUndefined();
  });
});

describe("readers", () => {
  let cluster: FakeCluster;

  beforeEach(() => {
    cluster = new FakeCluster();
  });

  it("conditionReader reads the status of one condition type", async () => {
    cluster.add(
      "subscription",
      "test-sub",
      {
        status: {
          conditions: [
            { type: "CatalogSourcesUnhealthy", status: "False" },
            { type: "InstallPlanPending", status: "True" },
          ],
        },
      },
      "test-ns"
    );
    const ref = { kind: "subscription", name: "test-sub", namespace: "test-ns" };

    await expect(conditionReader(cluster.oc, ref, "InstallPlanPending")()).resolves.toBe("True");
    await expect(conditionReader(cluster.oc, ref, "InstallPlanMissing")()).resolves.toBe("");
    await expect(conditionReader(cluster.oc, { ...ref, name: "other" }, "InstallPlanPending")()).resolves.toBeUndefined();
  });

  it("rolloutReader waits for every replica of the latest generation", async () => {
    const ref = { kind: "deployment", name: "test-deploy", namespace: "test-ns" };
    cluster.add(
      "deployment",
      "test-deploy",
      {
        metadata: { generation: 3 },
        spec: { replicas: 2 },
        status: { observedGeneration: 3, replicas: 3, updatedReplicas: 2, availableReplicas: 2 },
      },
      "test-ns"
    );
    await expect(rolloutReader(cluster.oc, ref)()).resolves.toBe("Progressing");

    cluster.add(
      "deployment",
      "test-deploy",
      {
        metadata: { generation: 3 },
        spec: { replicas: 2 },
        status: { observedGeneration: 3, replicas: 2, updatedReplicas: 2, availableReplicas: 2 },
      },
      "test-ns"
    );
    await expect(rolloutReader(cluster.oc, ref)()).resolves.toBe("Complete");
  });

  it("countReader counts objects and treats an unknown kind as none", async () => {
    cluster.add("datasciencecluster", "dsc-a").add("datasciencecluster", "dsc-b");

    await expect(countReader(cluster.oc, "datasciencecluster")()).resolves.toBe("2");

    cluster.failWhen(
      (args) => args[1] === "gone.example.io",
      'error: the server doesn\'t have a resource type "gone.example.io"'
    );
    await expect(countReader(cluster.oc, "gone.example.io")()).resolves.toBe("0");
  });

  it("countReader reports an unusable client as unreadable, not as zero", async () => {
    cluster.failWhen(() => true, "Command not found: oc. Install it and make sure it is on your PATH.", { exitCode: 127 });

    await expect(countReader(cluster.oc, "datasciencecluster")()).resolves.toBeUndefined();
  });
});
