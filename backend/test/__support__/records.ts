import { StoreRecord } from "../../src/types/store";

export function provisioningRecord(overrides: Partial<StoreRecord> = {}): StoreRecord {
  return {
    id: "1a2b3c4d",
    store_name: "acme",
    namespace: "acme-1a2b3c4d",
    domain: "acme.example.com",
    helm_release: "acme-1a2b3c4d",
    environment: "local",
    status: "Provisioning",
    created_at: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}

export const chartSettings = {
  repoRoot: "/srv/orchestrator",
  chartPath: "/srv/orchestrator/helm/woocommerce",
  valuesLocal: "/srv/orchestrator/values-local.yaml",
  valuesProd: "/srv/orchestrator/values-prod.yaml",
  helmTimeoutSeconds: 600
};
