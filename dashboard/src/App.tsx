import React, { useCallback, useEffect, useState } from "react";
import { AuditEvent, Store, StoresApi, errorDetail } from "./api";
import { actionLabel, deleteSummary, domainUrl, statusColor, validateCreateInput } from "./storeView";

const REFRESH_INTERVAL_MS = 5000;

export const App: React.FC<{ api: StoresApi }> = ({ api }) => {
  const [stores, setStores] = useState<Store[]>([]);
  const [creating, setCreating] = useState(false);
  const [storeName, setStoreName] = useState("");
  const [domain, setDomain] = useState("");
  const [environment, setEnvironment] = useState("local");
  const [deletingId, setDeletingId] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [auditLog, setAuditLog] = useState<AuditEvent[]>([]);
  const [showActivityLog, setShowActivityLog] = useState(false);

  const refresh = useCallback(async () => {
    try {
      const [list, events] = await Promise.all([api.list(), api.audit(20)]);
      setStores(list);
      setAuditLog(events);
    } catch (err) {
      console.error("Failed to fetch stores:", err);
      setError(errorDetail(err));
    }
  }, [api]);

  useEffect(() => {
    void refresh();
    const id = window.setInterval(() => {
      void refresh();
    }, REFRESH_INTERVAL_MS);
    return () => window.clearInterval(id);
  }, [refresh]);

  async function handleCreate(e: React.FormEvent) {
    e.preventDefault();
    const input = { store_name: storeName, domain, environment };
    const invalid = validateCreateInput(input);
    if (invalid) {
      setError(invalid);
      return;
    }
    setCreating(true);
    setError(null);
    try {
      await api.create(input);
      setStoreName("");
      setDomain("");
      setEnvironment("local");
    } catch (err) {
      setError(errorDetail(err));
    } finally {
      setCreating(false);
      await refresh();
    }
  }

  async function handleDelete(store: Store) {
    if (!window.confirm(`Delete this store and all resources?\n\n${store.domain}`)) return;
    setDeletingId(store.id);
    setError(null);
    try {
      const result = await api.remove(store.id);
      setError(deleteSummary(result));
    } catch (err) {
      setError(errorDetail(err));
    } finally {
      setDeletingId(null);
      await refresh();
    }
  }

  return (
    <div style={{ fontFamily: "system-ui", padding: "2rem", maxWidth: 1200, margin: "0 auto" }}>
      <div style={{ display: "flex", justifyContent: "space-between", alignItems: "center", marginBottom: "1.5rem" }}>
        <h1 style={{ margin: 0 }}>Store Provisioning Dashboard</h1>
        <button onClick={() => setShowActivityLog(!showActivityLog)}>
          {showActivityLog ? "Hide" : "Show"} Activity Log
        </button>
      </div>

      {error && (
        <div
          role="alert"
          style={{ marginBottom: "1rem", padding: "0.75rem", backgroundColor: "#fdecea", color: "#d32f2f", borderRadius: "4px" }}
        >
          {error}
        </div>
      )}

      <form onSubmit={handleCreate} style={{ marginBottom: "1.5rem", display: "flex", gap: "0.5rem" }}>
        <input placeholder="Store name (e.g. demo)" value={storeName} onChange={e => setStoreName(e.target.value)} />
        <input placeholder="Domain (e.g. store1.localhost)" value={domain} onChange={e => setDomain(e.target.value)} />
        <select value={environment} onChange={e => setEnvironment(e.target.value)}>
          <option value="local">local</option>
          <option value="prod">prod</option>
        </select>
        <button type="submit" disabled={creating}>
          {creating ? "Creating..." : "Create Store"}
        </button>
      </form>

      <table style={{ width: "100%", borderCollapse: "collapse" }}>
        <thead>
          <tr>
            <th align="left">Name</th>
            <th align="left">Status</th>
            <th align="left">Namespace</th>
            <th align="left">Domain</th>
            <th align="left">Created</th>
            <th align="left">Actions</th>
          </tr>
        </thead>
        <tbody>
          {stores.map(s => (
            <tr key={s.id}>
              <td>{s.store_name}</td>
              <td>
                <span style={{ color: statusColor(s.status) }}>{s.status}</span>
              </td>
              <td>{s.namespace}</td>
              <td>
                <a href={domainUrl(s.domain)} target="_blank" rel="noreferrer">
                  {s.domain}
                </a>
              </td>
              <td>{new Date(s.created_at).toLocaleString()}</td>
              <td>
                <button onClick={() => void handleDelete(s)} disabled={deletingId !== null || s.status === "Provisioning"}>
                  {deletingId === s.id ? "Deleting..." : "Delete"}
                </button>
              </td>
            </tr>
          ))}
          {stores.length === 0 && (
            <tr>
              <td colSpan={6}>No stores yet.</td>
            </tr>
          )}
        </tbody>
      </table>

      {showActivityLog && (
        <div style={{ marginTop: "2rem" }}>
          <h2>Activity Log</h2>
          <div style={{ border: "1px solid #ddd", borderRadius: "4px", padding: "1rem", maxHeight: "400px", overflowY: "auto" }}>
            {auditLog.length === 0 ? (
              <p>No activity yet.</p>
            ) : (
              <table style={{ width: "100%", borderCollapse: "collapse", fontSize: "0.9em" }}>
                <thead>
                  <tr>
                    <th align="left">Time</th>
                    <th align="left">Action</th>
                    <th align="left">Store</th>
                    <th align="left">Details</th>
                  </tr>
                </thead>
                <tbody>
                  {auditLog.map((event, idx) => (
                    <tr key={idx} style={{ borderTop: "1px solid #eee" }}>
                      <td>{new Date(event.timestamp).toLocaleString()}</td>
                      <td>{actionLabel(event.action)}</td>
                      <td>{event.storeName || event.storeId || "N/A"}</td>
                      <td>
                        {event.reason && <span style={{ color: "#d32f2f" }}>{event.reason}</span>}
                        {!event.reason && event.storeId && (
                          <span style={{ color: "#666", fontSize: "0.85em" }}>ID: {event.storeId}</span>
                        )}
                      </td>
                    </tr>
                  ))}
                </tbody>
              </table>
            )}
          </div>
        </div>
      )}
    </div>
  );
};
