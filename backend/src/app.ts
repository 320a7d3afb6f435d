import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createStoresRouter } from "./routes/stores";
import { createMetricsRouter } from "./routes/metrics";
import { StoreService } from "./services/storeService";
import { AuditLog } from "./services/auditLogger";
import { MetricsService } from "./services/metricsService";
import { StoreError } from "./errors";
import { truncate } from "./lib/text";
import { createLogger, Logger } from "./lib/logger";

export interface AppDeps {
  stores: StoreService;
  audit: AuditLog;
  metrics: MetricsService;
  corsOrigin: string;
  rateLimit: { windowMinutes: number; max: number };
  maxDetailLength: number;
  info: Record<string, string>;
  logger?: Logger;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function createApp(deps: AppDeps): express.Express {
  const logger = deps.logger ?? createLogger("http");
  const app = express();

  app.use(cors({ origin: deps.corsOrigin, credentials: true }));
  app.use(express.json());

  const apiLimiter = rateLimit({
    windowMs: deps.rateLimit.windowMinutes * 60 * 1000,
    max: deps.rateLimit.max,
    message: { detail: "Too many requests from this IP, please try again later." },
    standardHeaders: true,
    legacyHeaders: false
  });

  app.use("/stores", apiLimiter);
  app.use("/stores", createStoresRouter(deps.stores, deps.audit));
  app.use("/metrics", createMetricsRouter(deps.metrics));

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (_req, res) => {
    res.json({ message: "orchestrator up", ...deps.info });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof StoreError) {
      res.status(err.statusCode).json({ detail: truncate(err.message, deps.maxDetailLength) });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ detail: "request body is not valid JSON" });
      return;
    }
    logger.error("Unhandled error:", err);
    res.status(500).json({ detail: "Internal Server Error" });
  });

  return app;
}
