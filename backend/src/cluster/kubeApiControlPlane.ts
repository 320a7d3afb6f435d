import { HttpError, V1IngressList, V1Namespace, V1Secret } from "@kubernetes/client-node";
import { CommandResult } from "../types/store";
import { LAUNCH_FAILURE_CODE } from "../exec/commandExecutor";
import { ClusterControlPlane } from "./controlPlane";

// The subset of CoreV1Api / NetworkingV1Api used here; the generated clients satisfy it.
export interface KubeApiClients {
  core: {
    createNamespace(body: V1Namespace): Promise<unknown>;
    deleteNamespace(name: string): Promise<unknown>;
    createNamespacedSecret(namespace: string, body: V1Secret): Promise<unknown>;
  };
  networking: {
    listIngressForAllNamespaces(): Promise<{ body: V1IngressList }>;
  };
}

function statusMessage(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return undefined;
}

/** Maps an API failure onto the same result shape kubectl would give. */
export function apiErrorToResult(err: unknown, what: string): CommandResult {
  if (err instanceof HttpError) {
    const status = err.statusCode ?? err.response?.statusCode;
    const message = statusMessage(err.body) ?? err.message;
    if (status === 409) {
      return { code: 1, stdout: "", stderr: `Error from server (AlreadyExists): ${what} already exists` };
    }
    return { code: 1, stdout: "", stderr: `Error from server (${status ?? "unknown"}): ${message}` };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: LAUNCH_FAILURE_CODE, stdout: "", stderr: message };
}

/**
 * Talks to the API server directly instead of shelling out to kubectl.
 * Responses are folded into CommandResult so callers see no difference.
 */
export class KubeApiControlPlane implements ClusterControlPlane {
  constructor(private readonly clients: KubeApiClients) {}

  async createNamespace(name: string): Promise<CommandResult> {
    const ns: V1Namespace = { apiVersion: "v1", kind: "Namespace", metadata: { name } };
    try {
      await this.clients.core.createNamespace(ns);
      return { code: 0, stdout: `namespace/${name} created`, stderr: "" };
    } catch (err) {
      return apiErrorToResult(err, `namespaces "${name}"`);
    }
  }

  async deleteNamespace(name: string): Promise<CommandResult> {
    try {
      await this.clients.core.deleteNamespace(name);
      return { code: 0, stdout: `namespace "${name}" deleted`, stderr: "" };
    } catch (err) {
      return apiErrorToResult(err, `namespaces "${name}"`);
    }
  }

  async createSecret(name: string, namespace: string, literals: Record<string, string>): Promise<CommandResult> {
    const secret: V1Secret = {
      apiVersion: "v1",
      kind: "Secret",
      metadata: { name, namespace },
      type: "Opaque",
      stringData: { ...literals }
    };
    try {
      await this.clients.core.createNamespacedSecret(namespace, secret);
      return { code: 0, stdout: `secret/${name} created`, stderr: "" };
    } catch (err) {
      return apiErrorToResult(err, `secrets "${name}"`);
    }
  }

  async listAllRoutes(): Promise<CommandResult> {
    try {
      const res = await this.clients.networking.listIngressForAllNamespaces();
      const items = res.body.items.map(ing => ({
        metadata: { namespace: ing.metadata?.namespace ?? "", name: ing.metadata?.name ?? "" },
        spec: { rules: (ing.spec?.rules ?? []).map(rule => ({ host: rule.host })) }
      }));
      return { code: 0, stdout: JSON.stringify({ items }), stderr: "" };
    } catch (err) {
      return apiErrorToResult(err, "ingresses");
    }
  }
}
