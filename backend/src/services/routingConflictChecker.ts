import { ClusterControlPlane } from "../cluster/controlPlane";
import { ConflictCheckPolicy } from "../config";
import { ConflictInfo } from "../types/store";
import { diagnosticText } from "../lib/text";
import { createLogger, Logger } from "../lib/logger";

export type ConflictCheckResult =
  | { kind: "clear" }
  | { kind: "conflict"; conflict: ConflictInfo }
  | { kind: "unavailable"; reason: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(value: unknown, key: string): string {
  if (!isObject(value)) return "";
  const field = value[key];
  return typeof field === "string" ? field : "";
}

/** Returns the `items` array of a `kubectl get ingress -A -o json` payload, or null if malformed. */
export function parseIngressItems(raw: string): unknown[] | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isObject(payload)) return null;
  if (payload.items === undefined || payload.items === null) return [];
  return Array.isArray(payload.items) ? payload.items : null;
}

/**
 * Exact, case-sensitive host lookup across every ingress in the listing.
 * First match in listing order wins.
 */
export function findHostInIngresses(items: readonly unknown[], host: string): ConflictInfo | null {
  for (const item of items) {
    if (!isObject(item)) continue;
    const spec = item.spec;
    const rules: unknown[] = isObject(spec) && Array.isArray(spec.rules) ? spec.rules : [];
    for (const rule of rules) {
      if (stringField(rule, "host") === host) {
        return { namespace: stringField(item.metadata, "namespace"), routeName: stringField(item.metadata, "name") };
      }
    }
  }
  return null;
}

export class RoutingConflictChecker {
  constructor(
    private readonly cluster: ClusterControlPlane,
    readonly policy: ConflictCheckPolicy = "fail-open",
    private readonly logger: Logger = createLogger("conflict-check")
  ) {}

  async check(host: string): Promise<ConflictCheckResult> {
    const result = await this.cluster.listAllRoutes();
    if (result.code !== 0 || !result.stdout) {
      const reason = `could not list ingresses: rc=${result.code} err=${diagnosticText(result).slice(0, 200)}`;
      this.logger.warn(reason);
      return { kind: "unavailable", reason };
    }

    const items = parseIngressItems(result.stdout);
    if (!items) {
      const reason = "failed to parse ingress listing";
      this.logger.warn(reason);
      return { kind: "unavailable", reason };
    }

    const conflict = findHostInIngresses(items, host);
    return conflict ? { kind: "conflict", conflict } : { kind: "clear" };
  }

  /**
   * Null means no conflict was seen. When the listing itself failed this is
   * also null, so it is not proof the host is free.
   */
  async findHostConflict(host: string): Promise<ConflictInfo | null> {
    const outcome = await this.check(host);
    return outcome.kind === "conflict" ? outcome.conflict : null;
  }
}
