import { CommandExecutor } from "../exec/commandExecutor";
import { CommandResult } from "../types/store";

export interface InstallOptions {
  releaseName: string;
  chart: string;
  namespace: string;
  valuesFile: string;
  set: Record<string, string>;
  wait: boolean;
  timeoutSeconds: number;
  cwd?: string;
}

export interface PackageDeployer {
  install(options: InstallOptions): Promise<CommandResult>;
  uninstall(releaseName: string, namespace: string): Promise<CommandResult>;
}

/** Helm reports its own deadline first; the executor only kills a hung process. */
export const INSTALL_KILL_GRACE_SECONDS = 30;

export interface HelmOptions {
  helmBin: string;
  /** Timeout for uninstall; install uses its own timeoutSeconds. */
  timeoutMs: number;
}

export class HelmDeployer implements PackageDeployer {
  constructor(private readonly executor: CommandExecutor, private readonly options: HelmOptions) {}

  install(opts: InstallOptions): Promise<CommandResult> {
    const setArgs = Object.entries(opts.set).flatMap(([key, value]) => ["--set", `${key}=${value}`]);
    const cmd = [
      this.options.helmBin,
      "install",
      opts.releaseName,
      opts.chart,
      "--namespace",
      opts.namespace,
      "--values",
      opts.valuesFile,
      ...setArgs,
      ...(opts.wait ? ["--wait"] : []),
      "--timeout",
      `${opts.timeoutSeconds}s`
    ];
    return this.executor.execute(cmd, {
      cwd: opts.cwd,
      timeoutMs: (opts.timeoutSeconds + INSTALL_KILL_GRACE_SECONDS) * 1000
    });
  }

  uninstall(releaseName: string, namespace: string): Promise<CommandResult> {
    return this.executor.execute([this.options.helmBin, "uninstall", releaseName, "-n", namespace], {
      timeoutMs: this.options.timeoutMs
    });
  }
}
