import { Router } from "express";
import { z } from "zod";
import { StoreService } from "../services/storeService";
import { AuditLog } from "../services/auditLogger";
import { InvalidInputError, NotFoundError } from "../errors";

const provisionRequestSchema = z.object({
  store_name: z.string({ required_error: "store_name is required" }),
  domain: z.string({ required_error: "domain is required" }),
  environment: z.string().default("local")
});

function clientIpOf(req: { ip?: string; socket: { remoteAddress?: string } }): string | undefined {
  return req.ip || req.socket.remoteAddress || undefined;
}

export function createStoresRouter(stores: StoreService, audit: AuditLog): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(stores.listStores());
  });

  router.post("/", async (req, res, next) => {
    try {
      const parsed = provisionRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new InvalidInputError(parsed.error.issues.map(i => i.message).join("; "));
      }
      const store = await stores.createStore(parsed.data, clientIpOf(req));
      res.json(store);
    } catch (err) {
      next(err);
    }
  });

  router.get("/audit", (req, res) => {
    const limit = typeof req.query.limit === "string" ? Number(req.query.limit) : 100;
    const storeId = typeof req.query.storeId === "string" ? req.query.storeId : undefined;

    res.json(storeId ? audit.forStore(storeId) : audit.recent(Number.isFinite(limit) ? limit : 100));
  });

  router.get("/:id", (req, res, next) => {
    const store = stores.getStore(req.params.id);
    if (!store) {
      next(new NotFoundError());
      return;
    }
    res.json(store);
  });

  router.delete("/:id", async (req, res, next) => {
    try {
      const result = await stores.deleteStore(req.params.id, clientIpOf(req));
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
