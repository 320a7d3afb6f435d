import axios from "axios";

export type StoreStatus = "Provisioning" | "Ready" | "Failed";

export interface Store {
  id: string;
  store_name: string;
  namespace: string;
  domain: string;
  helm_release: string;
  environment: string;
  status: StoreStatus;
  created_at: string;
}

export interface CreateStoreInput {
  store_name: string;
  domain: string;
  environment: string;
}

export type DeleteResult =
  | { status: "deleted"; release: string; namespace: string }
  | { status: "uninstall-error"; helm_err: string; kubectl: { rc: number; out: string; err: string } };

export interface AuditEvent {
  timestamp: string;
  action: "store.created" | "store.deleted" | "store.deletion.partial" | "store.provisioning.failed";
  storeId?: string;
  storeName?: string;
  namespace?: string;
  domain?: string;
  reason?: string;
  ip?: string;
}

export interface StoresApi {
  list(): Promise<Store[]>;
  create(input: CreateStoreInput): Promise<Store>;
  remove(id: string): Promise<DeleteResult>;
  audit(limit?: number): Promise<AuditEvent[]>;
}

export const DEFAULT_API_BASE = "http://localhost:8000";

export function createStoresApi(baseURL: string = DEFAULT_API_BASE): StoresApi {
  const api = axios.create({ baseURL });

  return {
    async list() {
      const res = await api.get<Store[]>("/stores");
      return res.data;
    },
    async create(input) {
      const res = await api.post<Store>("/stores", input);
      return res.data;
    },
    async remove(id) {
      const res = await api.delete<DeleteResult>(`/stores/${encodeURIComponent(id)}`);
      return res.data;
    },
    async audit(limit = 20) {
      const res = await api.get<AuditEvent[]>("/stores/audit", { params: { limit } });
      return res.data;
    }
  };
}

/** The server's `{ detail }` when it sent one, else the transport error. */
export function errorDetail(err: unknown): string {
  if (axios.isAxiosError<unknown>(err)) {
    const data = err.response?.data;
    if (typeof data === "object" && data !== null && "detail" in data && typeof data.detail === "string") {
      return data.detail;
    }
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
