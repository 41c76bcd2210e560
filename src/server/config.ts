function parseCsv(raw: string): string[] {
  return Array.from(
    new Set(
      String(raw || "")
        .split(",")
        .map((x) => x.trim().replace(/\/+$/, ""))
        .filter(Boolean)
    )
  );
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.floor(n);
}

export const config = {
  port: Number(process.env.PORT || 3001),
  mongoUri: process.env.MONGO_URI || "mongodb://127.0.0.1:27017",
  mongoDb: process.env.MONGO_DB || "wedding_planner",
  corsOrigins: parseCsv(process.env.CORS_ORIGINS || ""),
  corsAllowAll: String(process.env.CORS_ALLOW_ALL || "1") !== "0",
  vendorLimitPerCategory: parsePositiveInt(process.env.VENDOR_LIMIT_PER_CATEGORY, 3),
  debug: process.env.PLANNER_DEBUG === "1",
};
