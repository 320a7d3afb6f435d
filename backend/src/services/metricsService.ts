import { StoreRegistry } from "./storeRegistry";

export interface Metrics {
  stores_total: number;
  stores_ready: number;
  stores_provisioning: number;
  stores_failed: number;
  stores_created_total: number;
  stores_failed_total: number;
  stores_deleted_total: number;
}

export class MetricsService {
  private storesCreatedTotal = 0;
  private storesFailedTotal = 0;
  private storesDeletedTotal = 0;

  constructor(private readonly registry: StoreRegistry) {}

  incrementStoresCreated(): void {
    this.storesCreatedTotal++;
  }

  incrementStoresFailed(): void {
    this.storesFailedTotal++;
  }

  incrementStoresDeleted(): void {
    this.storesDeletedTotal++;
  }

  getMetrics(): Metrics {
    let storesReady = 0;
    let storesProvisioning = 0;
    let storesFailed = 0;

    const records = this.registry.list();
    for (const record of records) {
      if (record.status === "Ready") storesReady++;
      else if (record.status === "Provisioning") storesProvisioning++;
      else if (record.status === "Failed") storesFailed++;
    }

    return {
      stores_total: records.length,
      stores_ready: storesReady,
      stores_provisioning: storesProvisioning,
      stores_failed: storesFailed,
      stores_created_total: this.storesCreatedTotal,
      stores_failed_total: this.storesFailedTotal,
      stores_deleted_total: this.storesDeletedTotal
    };
  }
}
