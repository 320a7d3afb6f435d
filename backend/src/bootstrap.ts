import { AppConfig } from "./config";
import { ChildProcessExecutor, CommandExecutor } from "./exec/commandExecutor";
import { ClusterControlPlane } from "./cluster/controlPlane";
import { KubectlControlPlane } from "./cluster/kubectlControlPlane";
import { KubeApiControlPlane } from "./cluster/kubeApiControlPlane";
import { HelmDeployer, PackageDeployer } from "./cluster/packageDeployer";
import { getK8sClients } from "./k8s/client";
import { InMemoryStoreRegistry, StoreRegistry } from "./services/storeRegistry";
import { RoutingConflictChecker } from "./services/routingConflictChecker";
import { ResourceProvisioner } from "./services/resourceProvisioner";
import { Deprovisioner } from "./services/deprovisioner";
import { StoreService } from "./services/storeService";
import { AuditLog } from "./services/auditLogger";
import { MetricsService } from "./services/metricsService";
import { createLogger } from "./lib/logger";

export interface Services {
  registry: StoreRegistry;
  stores: StoreService;
  audit: AuditLog;
  metrics: MetricsService;
}

export interface Capabilities {
  cluster: ClusterControlPlane;
  deployer: PackageDeployer;
}

export function createCapabilities(
  cfg: AppConfig,
  executor: CommandExecutor = new ChildProcessExecutor(createLogger("exec", cfg.logLevel))
): Capabilities {
  const timeoutMs = cfg.commandTimeoutSeconds * 1000;
  const cluster =
    cfg.clusterBackend === "api"
      ? new KubeApiControlPlane(getK8sClients())
      : new KubectlControlPlane(executor, { kubectlBin: cfg.kubectlBin, timeoutMs });
  const deployer = new HelmDeployer(executor, { helmBin: cfg.helmBin, timeoutMs });
  return { cluster, deployer };
}

export function createServices(cfg: AppConfig, capabilities: Capabilities): Services {
  const { cluster, deployer } = capabilities;
  const registry = new InMemoryStoreRegistry();
  const audit = new AuditLog(createLogger("audit", cfg.logLevel));
  const metrics = new MetricsService(registry);

  const conflictChecker = new RoutingConflictChecker(
    cluster,
    cfg.conflictCheckPolicy,
    createLogger("conflict-check", cfg.logLevel)
  );
  const provisioner = new ResourceProvisioner({
    cluster,
    deployer,
    conflictChecker,
    logger: createLogger("provisioner", cfg.logLevel),
    chart: {
      repoRoot: cfg.repoRoot,
      chartPath: cfg.chartPath,
      valuesLocal: cfg.valuesLocal,
      valuesProd: cfg.valuesProd,
      helmTimeoutSeconds: cfg.helmTimeoutSeconds
    }
  });
  const deprovisioner = new Deprovisioner({
    registry,
    cluster,
    deployer,
    maxDetailLength: cfg.maxDetailLength,
    logger: createLogger("deprovisioner", cfg.logLevel)
  });
  const stores = new StoreService({
    registry,
    provisioner,
    deprovisioner,
    audit,
    metrics,
    maxDetailLength: cfg.maxDetailLength,
    logger: createLogger("stores", cfg.logLevel)
  });

  return { registry, stores, audit, metrics };
}
