import express from "express";
import cors from "cors";
import helmet from "helmet";

import { config } from "./config.js";
import type { ApiDeps } from "./deps.js";
import { asyncRoute, errorHandler, notFound } from "../middleware/errors.js";
import { planRouter } from "../routes/plan.js";
import { recordsRouter } from "../routes/preferences.js";
import { vendorsRouter } from "../routes/vendors.js";

export const API_VERSION = "1.0.0";

export function createApp(deps: ApiDeps) {
  const app = express();

  app.use(helmet());

  const allowedOrigins = new Set(
    (config.corsOrigins || []).map((x) => String(x || "").trim().replace(/\/+$/, ""))
  );

  app.use(
    cors({
      origin(origin, callback) {
        const normalized = String(origin || "").trim().replace(/\/+$/, "");
        if (!origin) {
          // Non-browser clients / same-origin server requests
          return callback(null, true);
        }
        if (config.corsAllowAll || allowedOrigins.size === 0) {
          return callback(null, true);
        }
        if (allowedOrigins.has(normalized)) {
          return callback(null, true);
        }
        return callback(new Error(`CORS blocked origin: ${origin}`));
      },
      credentials: false,
      allowedHeaders: ["Content-Type", "Accept-Language"],
      methods: ["GET", "POST", "OPTIONS"],
    })
  );

  app.use(express.json({ limit: "2mb" }));

  app.get("/", (_req, res) => res.json({ message: "Wedding planner backend running", version: API_VERSION }));
  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  app.get(
    "/api/status",
    asyncRoute(async (_req, res) => {
      const db = await deps.store.status();
      return res.json({
        backend: "running",
        database: db.connected ? (db.error ? "error" : "connected") : "not connected",
        database_name: db.database,
        collections: db.collections,
        error: db.error,
      });
    })
  );

  app.use("/api", planRouter(deps));
  app.use("/api", vendorsRouter(deps));
  app.use("/api", recordsRouter(deps));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
