import { ClusterControlPlane } from "../cluster/controlPlane";
import { PackageDeployer } from "../cluster/packageDeployer";
import { CommandResult, ProvisionOutcome, ProvisionStep, RollbackOutcome, RollbackStep, StoreRecord } from "../types/store";
import { diagnosticText, isCreatedOrExists, isSuccess } from "../lib/text";
import { createLogger, Logger } from "../lib/logger";
import { RoutingConflictChecker } from "./routingConflictChecker";
import { generatePassword, secretNameFor } from "./credentials";

export interface ChartSettings {
  repoRoot: string;
  chartPath: string;
  valuesLocal: string;
  valuesProd: string;
  helmTimeoutSeconds: number;
}

export interface ResourceProvisionerDeps {
  cluster: ClusterControlPlane;
  deployer: PackageDeployer;
  conflictChecker: RoutingConflictChecker;
  chart: ChartSettings;
  logger?: Logger;
  passwordFactory?: () => string;
}

export function valuesFileFor(environment: string, chart: ChartSettings): string {
  return environment === "local" ? chart.valuesLocal : chart.valuesProd;
}

/**
 * Creates namespace, credential secret and chart release in that order.
 * Only a release failure triggers cleanup; earlier failures leave whatever
 * partial namespace exists in place.
 */
export class ResourceProvisioner {
  private readonly cluster: ClusterControlPlane;
  private readonly deployer: PackageDeployer;
  private readonly conflictChecker: RoutingConflictChecker;
  private readonly chart: ChartSettings;
  private readonly logger: Logger;
  private readonly passwordFactory: () => string;

  constructor(deps: ResourceProvisionerDeps) {
    this.cluster = deps.cluster;
    this.deployer = deps.deployer;
    this.conflictChecker = deps.conflictChecker;
    this.chart = deps.chart;
    this.logger = deps.logger ?? createLogger("provisioner");
    this.passwordFactory = deps.passwordFactory ?? generatePassword;
  }

  async provision(record: StoreRecord): Promise<ProvisionOutcome> {
    const check = await this.conflictChecker.check(record.domain);
    if (check.kind === "conflict") {
      return { kind: "conflict", conflict: check.conflict };
    }
    if (check.kind === "unavailable" && this.conflictChecker.policy === "fail-closed") {
      return failed("conflict-check", check.reason);
    }

    const nsResult = await this.cluster.createNamespace(record.namespace);
    if (!isCreatedOrExists(nsResult)) {
      return failed("namespace", diagnosticText(nsResult));
    }

    const secretResult = await this.cluster.createSecret(secretNameFor(record.namespace), record.namespace, {
      "root-password": this.passwordFactory(),
      "user-password": this.passwordFactory()
    });
    if (!isCreatedOrExists(secretResult)) {
      return failed("secret", diagnosticText(secretResult));
    }

    const valuesFile = valuesFileFor(record.environment, this.chart);
    this.logger.debug(`Using values file: ${valuesFile}`);

    const installResult = await this.deployer.install({
      releaseName: record.helm_release,
      chart: this.chart.chartPath,
      namespace: record.namespace,
      valuesFile,
      set: { "ingress.host": record.domain, storeName: record.namespace },
      wait: true,
      timeoutSeconds: this.chart.helmTimeoutSeconds,
      cwd: this.chart.repoRoot
    });
    if (!isSuccess(installResult)) {
      const diagnostic = diagnosticText(installResult);
      this.logger.error(`Helm install failed: ${diagnostic.slice(0, 1000)}`);
      const rollback = await this.rollback(record);
      return failed("release", diagnostic, rollback);
    }

    return { kind: "ready" };
  }

  /** Both steps always run; their failures are recorded, never thrown. */
  async rollback(record: StoreRecord): Promise<RollbackOutcome[]> {
    const uninstall = await this.attempt("uninstall-release", () =>
      this.deployer.uninstall(record.helm_release, record.namespace)
    );
    const deleteNs = await this.attempt("delete-namespace", () => this.cluster.deleteNamespace(record.namespace));
    return [uninstall, deleteNs];
  }

  private async attempt(step: RollbackStep, run: () => Promise<CommandResult>): Promise<RollbackOutcome> {
    try {
      const result = await run();
      const succeeded = isSuccess(result);
      if (!succeeded) {
        this.logger.warn(`Rollback step ${step} failed: ${diagnosticText(result).slice(0, 200)}`);
      }
      return { step, attempted: true, succeeded, diagnostic: diagnosticText(result) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Rollback step ${step} threw: ${message}`);
      return { step, attempted: true, succeeded: false, diagnostic: message };
    }
  }
}

function failed(step: ProvisionStep, diagnostic: string, rollback: RollbackOutcome[] = []): ProvisionOutcome {
  return { kind: "failed", step, diagnostic, rollback };
}
