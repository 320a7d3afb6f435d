import { Router } from "express";
import { MetricsService } from "../services/metricsService";

export function createMetricsRouter(metrics: MetricsService): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(metrics.getMetrics());
  });

  return router;
}
