import { describe, it, expect } from "@jest/globals";
import { Deprovisioner } from "../../../src/services/deprovisioner";
import { InMemoryStoreRegistry } from "../../../src/services/storeRegistry";
import { NotFoundError } from "../../../src/errors";
import { CallLog, FakeCluster, FakeDeployer, createCapturingLogger, fail } from "../../__support__/fakes";
import { provisioningRecord } from "../../__support__/records";

function setup() {
  const log = new CallLog();
  const cluster = new FakeCluster(log);
  const deployer = new FakeDeployer(log);
  const registry = new InMemoryStoreRegistry();
  const deprovisioner = new Deprovisioner({
    registry,
    cluster,
    deployer,
    maxDetailLength: 1000,
    logger: createCapturingLogger()
  });
  return { log, cluster, deployer, registry, deprovisioner };
}

describe("Deprovisioner", () => {
  it("throws NotFound for an unknown id without touching the cluster", async () => {
    const { log, deprovisioner } = setup();

    await expect(deprovisioner.deprovision("missing1")).rejects.toBeInstanceOf(NotFoundError);
    expect(log.calls).toEqual([]);
  });

  it("uninstalls, deletes the namespace and drops the record", async () => {
    const { log, registry, deprovisioner } = setup();
    registry.put(provisioningRecord({ status: "Ready" }));

    const result = await deprovisioner.deprovision("1a2b3c4d");

    expect(result).toEqual({ status: "deleted", release: "acme-1a2b3c4d", namespace: "acme-1a2b3c4d" });
    expect(log.calls).toEqual([
      { name: "uninstall", args: ["acme-1a2b3c4d", "acme-1a2b3c4d"] },
      { name: "deleteNamespace", args: ["acme-1a2b3c4d"] }
    ]);
    expect(registry.get("1a2b3c4d")).toBeUndefined();
  });

  it("reports a partial failure when uninstall fails but still deletes and removes", async () => {
    const { log, deployer, registry, deprovisioner } = setup();
    registry.put(provisioningRecord({ status: "Ready" }));
    deployer.results.uninstall = fail("Error: uninstall: Release not loaded: acme-1a2b3c4d: release: not found");

    const result = await deprovisioner.deprovision("1a2b3c4d");

    expect(result).toEqual({
      status: "uninstall-error",
      helm_err: "Error: uninstall: Release not loaded: acme-1a2b3c4d: release: not found",
      kubectl: { rc: 0, out: 'namespace "acme-1a2b3c4d" deleted', err: "" }
    });
    expect(log.count("deleteNamespace")).toBe(1);
    expect(registry.has("1a2b3c4d")).toBe(false);
  });

  it("removes the record even when namespace deletion fails", async () => {
    const { cluster, registry, deprovisioner } = setup();
    registry.put(provisioningRecord({ status: "Failed" }));
    cluster.results.deleteNamespace = fail('Error from server (NotFound): namespaces "acme-1a2b3c4d" not found');

    const result = await deprovisioner.deprovision("1a2b3c4d");

    expect(result.status).toBe("deleted");
    expect(registry.list()).toEqual([]);
  });

  it("truncates captured output to the detail bound", async () => {
    const { cluster, deployer, registry } = setup();
    const deprovisioner = new Deprovisioner({
      registry,
      cluster,
      deployer,
      maxDetailLength: 10,
      logger: createCapturingLogger()
    });
    registry.put(provisioningRecord());
    deployer.results.uninstall = fail("x".repeat(50));
    cluster.results.deleteNamespace = { code: 1, stdout: "y".repeat(50), stderr: "z".repeat(50) };

    const result = await deprovisioner.deprovision("1a2b3c4d");

    expect(result).toEqual({
      status: "uninstall-error",
      helm_err: "x".repeat(10),
      kubectl: { rc: 1, out: "y".repeat(10), err: "z".repeat(10) }
    });
  });
});
