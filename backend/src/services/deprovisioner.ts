import { ClusterControlPlane } from "../cluster/controlPlane";
import { PackageDeployer } from "../cluster/packageDeployer";
import { DeprovisionOutcome } from "../types/store";
import { NotFoundError } from "../errors";
import { diagnosticText, isSuccess, truncate } from "../lib/text";
import { createLogger, Logger } from "../lib/logger";
import { StoreRegistry } from "./storeRegistry";

export interface DeprovisionerDeps {
  registry: StoreRegistry;
  cluster: ClusterControlPlane;
  deployer: PackageDeployer;
  maxDetailLength: number;
  logger?: Logger;
}

export class Deprovisioner {
  private readonly logger: Logger;

  constructor(private readonly deps: DeprovisionerDeps) {
    this.logger = deps.logger ?? createLogger("deprovisioner");
  }

  /**
   * Uninstalls the release, then deletes the namespace whatever the uninstall
   * returned. The registry entry is dropped in every case.
   */
  async deprovision(id: string): Promise<DeprovisionOutcome> {
    const { registry, cluster, deployer, maxDetailLength } = this.deps;
    const record = registry.get(id);
    if (!record) {
      throw new NotFoundError();
    }

    const { namespace, helm_release: release } = record;
    this.logger.info(`DELETE_REQUEST id=${id} namespace=${namespace}`);

    try {
      const uninstall = await deployer.uninstall(release, namespace);
      this.logger.info(`STORE_DELETE id=${id} namespace=${namespace}`);
      const deleteNs = await cluster.deleteNamespace(namespace);

      if (!isSuccess(uninstall)) {
        this.logger.warn(`Uninstall of ${release} failed: ${diagnosticText(uninstall).slice(0, 200)}`);
        return {
          status: "uninstall-error",
          helm_err: truncate(diagnosticText(uninstall), maxDetailLength),
          kubectl: {
            rc: deleteNs.code,
            out: truncate(deleteNs.stdout, maxDetailLength),
            err: truncate(deleteNs.stderr, maxDetailLength)
          }
        };
      }
      return { status: "deleted", release, namespace };
    } finally {
      registry.remove(id);
    }
  }
}
