import { v4 as uuidv4 } from "uuid";
import { ProvisionOutcome, ProvisionRequest, StoreRecord, DeprovisionOutcome } from "../types/store";
import { InvalidInputError, ProvisioningFailureError, RoutingConflictError, StoreBusyError, StoreError } from "../errors";
import { truncate } from "../lib/text";
import { createLogger, Logger } from "../lib/logger";
import { StoreRegistry } from "./storeRegistry";
import { ResourceProvisioner } from "./resourceProvisioner";
import { Deprovisioner } from "./deprovisioner";
import { AuditLog } from "./auditLogger";
import { MetricsService } from "./metricsService";

const MAX_ID_ATTEMPTS = 5;

export function generateStoreId(): string {
  return uuidv4().split("-")[0];
}

export function namespaceForStore(storeName: string, id: string): string {
  return `${storeName}-${id}`;
}

function nowIso(): string {
  return new Date().toISOString();
}

export interface NormalizedRequest {
  storeName: string;
  domain: string;
  environment: string;
}

export function normalizeRequest(input: ProvisionRequest): NormalizedRequest {
  const storeName = input.store_name.trim().toLowerCase();
  const domain = input.domain.trim();
  const environment = (input.environment || "local").trim().toLowerCase() || "local";
  if (!storeName || !domain) {
    throw new InvalidInputError("store_name and domain are required");
  }
  return { storeName, domain, environment };
}

export interface StoreServiceDeps {
  registry: StoreRegistry;
  provisioner: ResourceProvisioner;
  deprovisioner: Deprovisioner;
  audit: AuditLog;
  metrics: MetricsService;
  maxDetailLength: number;
  logger?: Logger;
  idFactory?: () => string;
}

export class StoreService {
  private readonly logger: Logger;
  private readonly idFactory: () => string;

  constructor(private readonly deps: StoreServiceDeps) {
    this.logger = deps.logger ?? createLogger("stores");
    this.idFactory = deps.idFactory ?? generateStoreId;
  }

  listStores(): StoreRecord[] {
    return this.deps.registry.list();
  }

  getStore(id: string): StoreRecord | undefined {
    return this.deps.registry.get(id);
  }

  async createStore(input: ProvisionRequest, clientIp?: string): Promise<StoreRecord> {
    const { storeName, domain, environment } = normalizeRequest(input);
    const { registry } = this.deps;

    const id = this.reserveId();
    const namespace = namespaceForStore(storeName, id);
    const record: StoreRecord = {
      id,
      store_name: storeName,
      namespace,
      domain,
      status: "Provisioning",
      helm_release: namespace,
      environment,
      created_at: nowIso()
    };
    registry.put(record);
    this.logger.info(
      `STORE_CREATE id=${id} name=${storeName} namespace=${namespace} release=${record.helm_release} domain=${domain}`
    );

    let outcome: ProvisionOutcome;
    try {
      outcome = await this.deps.provisioner.provision(record);
    } catch (err) {
      // A record must never be left in Provisioning.
      const message = err instanceof Error ? err.message : String(err);
      outcome = { kind: "failed", step: "release", diagnostic: message, rollback: [] };
    }

    if (outcome.kind === "ready") {
      const ready = registry.updateStatus(id, "Ready");
      this.deps.metrics.incrementStoresCreated();
      this.deps.audit.record({ action: "store.created", storeId: id, storeName, namespace, domain, ip: clientIp });
      this.logger.info(`Provisioned store ${storeName} -> namespace=${namespace}`);
      return ready;
    }

    registry.updateStatus(id, "Failed");
    this.deps.metrics.incrementStoresFailed();
    const error = this.toError(outcome, domain);
    this.logger.error(error.message);
    this.deps.audit.record({
      action: "store.provisioning.failed",
      storeId: id,
      storeName,
      namespace,
      domain,
      reason: error.message,
      ip: clientIp
    });
    throw error;
  }

  async deleteStore(id: string, clientIp?: string): Promise<DeprovisionOutcome> {
    const record = this.deps.registry.get(id);
    if (record?.status === "Provisioning") {
      throw new StoreBusyError(id);
    }
    const result = await this.deps.deprovisioner.deprovision(id);
    this.deps.metrics.incrementStoresDeleted();
    this.deps.audit.record({
      action: result.status === "deleted" ? "store.deleted" : "store.deletion.partial",
      storeId: id,
      storeName: record?.store_name,
      namespace: record?.namespace,
      reason: result.status === "deleted" ? undefined : result.helm_err,
      ip: clientIp
    });
    return result;
  }

  private reserveId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const candidate = this.idFactory();
      if (this.deps.registry.reserveId(candidate)) return candidate;
    }
    throw new ProvisioningFailureError("could not allocate a unique store id");
  }

  private toError(outcome: Exclude<ProvisionOutcome, { kind: "ready" }>, domain: string): StoreError {
    const max = this.deps.maxDetailLength;
    if (outcome.kind === "conflict") {
      const { namespace, routeName } = outcome.conflict;
      return new RoutingConflictError(`ingress host conflict: host '${domain}' already used in ${namespace}/${routeName}`);
    }
    const text = truncate(outcome.diagnostic, max);
    switch (outcome.step) {
      case "conflict-check":
        return new ProvisioningFailureError(`ingress conflict check unavailable: ${text}`);
      case "namespace":
        return new ProvisioningFailureError(`Namespace creation failed: ${text}`);
      case "secret":
        return new ProvisioningFailureError(`Secret creation failed: ${text}`);
      case "release":
        return new ProvisioningFailureError(`helm install failed: ${text}`);
    }
  }
}
