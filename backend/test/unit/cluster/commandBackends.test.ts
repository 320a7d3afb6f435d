import { describe, it, expect } from "@jest/globals";
import { CommandExecutor, ExecuteOptions } from "../../../src/exec/commandExecutor";
import { KubectlControlPlane } from "../../../src/cluster/kubectlControlPlane";
import { HelmDeployer } from "../../../src/cluster/packageDeployer";
import { CommandResult } from "../../../src/types/store";

class RecordingExecutor implements CommandExecutor {
  readonly calls: Array<{ command: readonly string[]; options?: ExecuteOptions }> = [];

  constructor(private readonly result: CommandResult = { code: 0, stdout: "", stderr: "" }) {}

  async execute(command: readonly string[], options?: ExecuteOptions): Promise<CommandResult> {
    this.calls.push({ command, options });
    return this.result;
  }
}

describe("KubectlControlPlane", () => {
  const options = { kubectlBin: "kubectl", timeoutMs: 120_000 };

  it("creates and deletes namespaces", async () => {
    const executor = new RecordingExecutor();
    const cluster = new KubectlControlPlane(executor, options);

    await cluster.createNamespace("acme-1a2b3c4d");
    await cluster.deleteNamespace("acme-1a2b3c4d");

    expect(executor.calls.map(c => c.command)).toEqual([
      ["kubectl", "create", "namespace", "acme-1a2b3c4d"],
      ["kubectl", "delete", "namespace", "acme-1a2b3c4d"]
    ]);
    expect(executor.calls[0].options?.timeoutMs).toBe(120_000);
  });

  it("creates a generic secret from literals and redacts the values", async () => {
    const executor = new RecordingExecutor();
    const cluster = new KubectlControlPlane(executor, options);

    await cluster.createSecret("acme-1a2b3c4d-db-secret", "acme-1a2b3c4d", {
      "root-password": "test-root",
      "user-password": "test-user"
    });

    expect(executor.calls[0].command).toEqual([
      "kubectl",
      "create",
      "secret",
      "generic",
      "acme-1a2b3c4d-db-secret",
      "--from-literal=root-password=test-root",
      "--from-literal=user-password=test-user",
      "--namespace=acme-1a2b3c4d"
    ]);
    expect(executor.calls[0].options?.redact).toEqual(["test-root", "test-user"]);
  });

  it("lists ingresses across all namespaces as JSON", async () => {
    const executor = new RecordingExecutor({ code: 0, stdout: '{"items":[]}', stderr: "" });
    const cluster = new KubectlControlPlane(executor, { kubectlBin: "/usr/local/bin/kubectl", timeoutMs: 5000 });

    const result = await cluster.listAllRoutes();

    expect(result.stdout).toBe('{"items":[]}');
    expect(executor.calls[0].command).toEqual(["/usr/local/bin/kubectl", "get", "ingress", "-A", "-o", "json"]);
  });
});

describe("HelmDeployer", () => {
  it("builds the install command with values, overrides, wait and timeout", async () => {
    const executor = new RecordingExecutor();
    const helm = new HelmDeployer(executor, { helmBin: "helm", timeoutMs: 120_000 });

    await helm.install({
      releaseName: "acme-1a2b3c4d",
      chart: "/repo/helm/woocommerce",
      namespace: "acme-1a2b3c4d",
      valuesFile: "/repo/values-local.yaml",
      set: { "ingress.host": "acme.example.com", storeName: "acme-1a2b3c4d" },
      wait: true,
      timeoutSeconds: 600,
      cwd: "/repo"
    });

    expect(executor.calls[0].command).toEqual([
      "helm",
      "install",
      "acme-1a2b3c4d",
      "/repo/helm/woocommerce",
      "--namespace",
      "acme-1a2b3c4d",
      "--values",
      "/repo/values-local.yaml",
      "--set",
      "ingress.host=acme.example.com",
      "--set",
      "storeName=acme-1a2b3c4d",
      "--wait",
      "--timeout",
      "600s"
    ]);
    expect(executor.calls[0].options).toEqual({ cwd: "/repo", timeoutMs: 630_000 });
  });

  it("omits --wait when not requested", async () => {
    const executor = new RecordingExecutor();
    const helm = new HelmDeployer(executor, { helmBin: "helm", timeoutMs: 1000 });

    await helm.install({
      releaseName: "r",
      chart: "c",
      namespace: "n",
      valuesFile: "v.yaml",
      set: {},
      wait: false,
      timeoutSeconds: 30
    });

    expect(executor.calls[0].command).toEqual(["helm", "install", "r", "c", "--namespace", "n", "--values", "v.yaml", "--timeout", "30s"]);
  });

  it("uninstalls a release from its namespace", async () => {
    const executor = new RecordingExecutor();
    const helm = new HelmDeployer(executor, { helmBin: "helm", timeoutMs: 120_000 });

    await helm.uninstall("acme-1a2b3c4d", "acme-1a2b3c4d");

    expect(executor.calls[0]).toEqual({
      command: ["helm", "uninstall", "acme-1a2b3c4d", "-n", "acme-1a2b3c4d"],
      options: { timeoutMs: 120_000 }
    });
  });
});
