import { Router } from "express";
import { normalizeLocale } from "../i18n/locale.js";
import { assistRequestSchema, recommendRequestSchema, userPreferenceSchema } from "../core/schemas.js";
import { asyncRoute, badRequest } from "../middleware/errors.js";
import type { ApiDeps } from "../server/deps.js";
import { advise } from "../services/assistant.js";
import { composePlan } from "../services/planComposer.js";
import { recommendVendors } from "../services/vendorRecommender.js";

export function planRouter(deps: ApiDeps) {
  const router = Router();

  router.post(
    "/plan",
    asyncRoute(async (req, res) => {
      const parsed = userPreferenceSchema.safeParse(req.body);
      if (!parsed.success) throw badRequest(parsed.error);

      const locale = normalizeLocale(req.query.lang || req.headers["accept-language"]);
      const result = await composePlan(
        { store: deps.store, tables: deps.tables, limitPerCategory: deps.limitPerCategory },
        parsed.data,
        locale
      );
      return res.json(result);
    })
  );

  router.post(
    "/recommendations",
    asyncRoute(async (req, res) => {
      const parsed = recommendRequestSchema.safeParse(req.body);
      if (!parsed.success) throw badRequest(parsed.error);

      const { region, categories, limit } = parsed.data;
      const vendors = await recommendVendors(
        { store: deps.store, rates: deps.tables.rates },
        region,
        categories,
        limit ?? deps.limitPerCategory
      );
      return res.json({ vendors });
    })
  );

  router.post("/assist", (req, res) => {
    const parsed = assistRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw badRequest(parsed.error);
    res.json(advise(parsed.data, deps.tables));
  });

  return router;
}
