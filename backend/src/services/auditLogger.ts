import { createLogger, Logger } from "../lib/logger";

export type AuditAction = "store.created" | "store.deleted" | "store.deletion.partial" | "store.provisioning.failed";

export interface AuditEvent {
  timestamp: string;
  action: AuditAction;
  storeId?: string;
  storeName?: string;
  namespace?: string;
  domain?: string;
  reason?: string;
  ip?: string;
}

const MAX_AUDIT_LOG_SIZE = 1000; // Keep last 1000 events

export class AuditLog {
  private readonly events: AuditEvent[] = [];

  constructor(private readonly logger: Logger = createLogger("audit"), private readonly maxSize = MAX_AUDIT_LOG_SIZE) {}

  record(event: Omit<AuditEvent, "timestamp">): AuditEvent {
    const auditEvent: AuditEvent = {
      ...event,
      timestamp: new Date().toISOString()
    };

    this.events.push(auditEvent);
    if (this.events.length > this.maxSize) {
      this.events.shift();
    }

    this.logger.info(`[AUDIT] ${auditEvent.timestamp} ${auditEvent.action}`, {
      storeId: auditEvent.storeId,
      storeName: auditEvent.storeName,
      namespace: auditEvent.namespace,
      reason: auditEvent.reason,
      ip: auditEvent.ip
    });
    return auditEvent;
  }

  /** Most recent first. */
  recent(limit: number = 100): AuditEvent[] {
    if (limit <= 0) return [];
    return this.events.slice(-limit).reverse();
  }

  forStore(storeId: string): AuditEvent[] {
    return this.events.filter(e => e.storeId === storeId).reverse();
  }
}
