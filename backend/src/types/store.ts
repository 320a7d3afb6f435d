export type StoreStatus = "Provisioning" | "Ready" | "Failed";

export interface StoreRecord {
  id: string;
  store_name: string;
  namespace: string;
  domain: string;
  helm_release: string;
  environment: string;
  status: StoreStatus;
  created_at: string; // ISO string
}

export interface ProvisionRequest {
  store_name: string;
  domain: string;
  environment: string;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface ConflictInfo {
  namespace: string;
  routeName: string;
}

export type RollbackStep = "uninstall-release" | "delete-namespace";

export interface RollbackOutcome {
  step: RollbackStep;
  attempted: boolean;
  succeeded: boolean;
  diagnostic: string;
}

export type ProvisionStep = "conflict-check" | "namespace" | "secret" | "release";

export type ProvisionOutcome =
  | { kind: "ready" }
  | { kind: "conflict"; conflict: ConflictInfo }
  | { kind: "failed"; step: ProvisionStep; diagnostic: string; rollback: RollbackOutcome[] };

export type DeprovisionOutcome =
  | { status: "deleted"; release: string; namespace: string }
  | {
      status: "uninstall-error";
      helm_err: string;
      kubectl: { rc: number; out: string; err: string };
    };
