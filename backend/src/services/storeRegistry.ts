import { StoreRecord, StoreStatus } from "../types/store";
import { InvalidStatusTransitionError } from "../errors";

export interface StoreRegistry {
  /** Claims an id for a new record; false if the id was ever handed out before. */
  reserveId(id: string): boolean;
  put(record: StoreRecord): void;
  get(id: string): StoreRecord | undefined;
  has(id: string): boolean;
  list(): StoreRecord[];
  remove(id: string): boolean;
  updateStatus(id: string, status: StoreStatus): StoreRecord;
}

const ALLOWED_TRANSITIONS: Record<StoreStatus, readonly StoreStatus[]> = {
  Provisioning: ["Ready", "Failed"],
  Ready: [],
  Failed: []
};

export function canTransition(from: StoreStatus, to: StoreStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

// In-memory tracking; contents are lost on restart.
export class InMemoryStoreRegistry implements StoreRegistry {
  private readonly records = new Map<string, StoreRecord>();
  private readonly issuedIds = new Set<string>();

  reserveId(id: string): boolean {
    if (this.issuedIds.has(id)) return false;
    this.issuedIds.add(id);
    return true;
  }

  put(record: StoreRecord): void {
    this.issuedIds.add(record.id);
    this.records.set(record.id, { ...record });
  }

  get(id: string): StoreRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  list(): StoreRecord[] {
    return Array.from(this.records.values(), record => ({ ...record }));
  }

  remove(id: string): boolean {
    return this.records.delete(id);
  }

  updateStatus(id: string, status: StoreStatus): StoreRecord {
    const current = this.records.get(id);
    if (!current) {
      throw new InvalidStatusTransitionError(id, "<missing>", status);
    }
    if (!canTransition(current.status, status)) {
      throw new InvalidStatusTransitionError(id, current.status, status);
    }
    const updated = { ...current, status };
    this.records.set(id, updated);
    return { ...updated };
  }
}
