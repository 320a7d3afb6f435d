import { CreateStoreInput, DeleteResult, StoreStatus } from "./api";

export function domainUrl(domain: string): string {
  if (!domain) return "#";
  if (domain.startsWith("http://") || domain.startsWith("https://")) return domain;
  return `http://${domain}`;
}

export function statusColor(status: StoreStatus): string {
  switch (status) {
    case "Ready":
      return "green";
    case "Failed":
      return "red";
    case "Provisioning":
      return "orange";
  }
}

// Mirrors the server's own check so a blank form never reaches the API.
export function validateCreateInput(input: CreateStoreInput): string | null {
  if (!input.store_name.trim() || !input.domain.trim()) {
    return "Store name and domain are required.";
  }
  return null;
}

export function deleteSummary(result: DeleteResult): string | null {
  if (result.status === "deleted") return null;
  return `Release uninstall failed (${result.helm_err}); namespace delete exited ${result.kubectl.rc}`;
}

export function actionLabel(action: string): string {
  switch (action) {
    case "store.created":
      return "Store Created";
    case "store.deleted":
      return "Store Deleted";
    case "store.deletion.partial":
      return "Store Deleted (partial)";
    case "store.provisioning.failed":
      return "Provisioning Failed";
    default:
      return action;
  }
}
