import { Router } from "express";
import { vendorQuerySchema } from "../core/schemas.js";
import { asyncRoute, badRequest } from "../middleware/errors.js";
import type { ApiDeps } from "../server/deps.js";
import { listVendors } from "../services/vendorRecommender.js";
import { loadSeedVendors, seedVendors } from "../services/vendorSeed.js";

export function vendorsRouter(deps: ApiDeps) {
  const router = Router();

  router.get(
    "/vendors",
    asyncRoute(async (req, res) => {
      const parsed = vendorQuerySchema.safeParse(req.query);
      if (!parsed.success) throw badRequest(parsed.error);

      const { limit, ...filter } = parsed.data;
      const items = await listVendors({ store: deps.store, rates: deps.tables.rates }, filter, limit);
      return res.json({ items });
    })
  );

  router.post(
    "/seed/vendors",
    asyncRoute(async (_req, res) => {
      const samples = await loadSeedVendors();
      return res.json(await seedVendors(deps.store, samples));
    })
  );

  return router;
}
