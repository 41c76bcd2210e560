import { Router } from "express";
import { inquirySchema, userPreferenceSchema } from "../core/schemas.js";
import { asyncRoute, badRequest } from "../middleware/errors.js";
import type { ApiDeps } from "../server/deps.js";

export function recordsRouter(deps: ApiDeps) {
  const router = Router();

  router.post(
    "/preferences",
    asyncRoute(async (req, res) => {
      const parsed = userPreferenceSchema.safeParse(req.body);
      if (!parsed.success) throw badRequest(parsed.error);
      const id = await deps.store.insertPreference(parsed.data);
      return res.status(201).json({ id });
    })
  );

  router.post(
    "/inquiries",
    asyncRoute(async (req, res) => {
      const parsed = inquirySchema.safeParse(req.body);
      if (!parsed.success) throw badRequest(parsed.error);
      const id = await deps.store.insertInquiry(parsed.data);
      return res.status(201).json({ id });
    })
  );

  return router;
}
