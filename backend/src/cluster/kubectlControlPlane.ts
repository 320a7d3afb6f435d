import { CommandExecutor } from "../exec/commandExecutor";
import { CommandResult } from "../types/store";
import { ClusterControlPlane } from "./controlPlane";

export interface KubectlOptions {
  kubectlBin: string;
  timeoutMs: number;
}

export class KubectlControlPlane implements ClusterControlPlane {
  constructor(private readonly executor: CommandExecutor, private readonly options: KubectlOptions) {}

  createNamespace(name: string): Promise<CommandResult> {
    return this.run(["create", "namespace", name]);
  }

  deleteNamespace(name: string): Promise<CommandResult> {
    return this.run(["delete", "namespace", name]);
  }

  createSecret(name: string, namespace: string, literals: Record<string, string>): Promise<CommandResult> {
    const fromLiteral = Object.entries(literals).map(([key, value]) => `--from-literal=${key}=${value}`);
    return this.run(["create", "secret", "generic", name, ...fromLiteral, `--namespace=${namespace}`], Object.values(literals));
  }

  listAllRoutes(): Promise<CommandResult> {
    return this.run(["get", "ingress", "-A", "-o", "json"]);
  }

  private run(args: string[], redact: readonly string[] = []): Promise<CommandResult> {
    return this.executor.execute([this.options.kubectlBin, ...args], { timeoutMs: this.options.timeoutMs, redact });
  }
}
