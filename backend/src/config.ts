import path from "path";
import { z } from "zod";

const repoRoot = path.resolve(process.env.REPO_ROOT || process.cwd());

export const clusterBackendSchema = z.enum(["kubectl", "api"]);
export const conflictPolicySchema = z.enum(["fail-open", "fail-closed"]);
export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type ClusterBackend = z.infer<typeof clusterBackendSchema>;
export type ConflictCheckPolicy = z.infer<typeof conflictPolicySchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;

export function readEnum<T extends string>(name: string, schema: z.ZodType<T>, fallback: T): T {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = schema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`Invalid ${name} "${raw}": ${parsed.error.issues[0]?.message ?? "unsupported value"}`);
  }
  return parsed.data;
}

export const config = {
  port: Number(process.env.PORT || 8000),
  repoRoot,
  chartPath: path.resolve(process.env.CHART_PATH || path.join(repoRoot, "helm", "woocommerce")),
  valuesLocal: path.resolve(process.env.VALUES_LOCAL || path.join(repoRoot, "values-local.yaml")),
  valuesProd: path.resolve(process.env.VALUES_PROD || path.join(repoRoot, "values-prod.yaml")),
  kubectlBin: process.env.KUBECTL_BIN || "kubectl",
  helmBin: process.env.HELM_BIN || "helm",
  clusterBackend: readEnum("CLUSTER_BACKEND", clusterBackendSchema, "kubectl"),
  conflictCheckPolicy: readEnum("CONFLICT_CHECK_POLICY", conflictPolicySchema, "fail-open"),
  commandTimeoutSeconds: Number(process.env.COMMAND_TIMEOUT_SECONDS || 120),
  helmTimeoutSeconds: Number(process.env.HELM_TIMEOUT_SECONDS || 600),
  corsOrigin: process.env.CORS_ORIGIN || "http://localhost:3000",
  rateLimitWindowMinutes: Number(process.env.RATE_LIMIT_WINDOW_MINUTES || 15),
  rateLimitMax: Number(process.env.RATE_LIMIT_MAX || 100),
  logLevel: readEnum("LOG_LEVEL", logLevelSchema, "info"),
  maxDetailLength: 1000
};

export type AppConfig = typeof config;
