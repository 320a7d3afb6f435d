import { CommandResult } from "../types/store";

/** Cluster operations the orchestrator needs. Every call resolves; failures are data. */
export interface ClusterControlPlane {
  createNamespace(name: string): Promise<CommandResult>;
  deleteNamespace(name: string): Promise<CommandResult>;
  createSecret(name: string, namespace: string, literals: Record<string, string>): Promise<CommandResult>;
  /** JSON in the shape of `kubectl get ingress -A -o json` on stdout. */
  listAllRoutes(): Promise<CommandResult>;
}
