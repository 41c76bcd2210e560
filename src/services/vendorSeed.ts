import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { vendorSchema, type VendorInput } from "../core/schemas.js";
import type { PlannerStore } from "../db/store.js";

export const SEED_VENDORS_PATH = fileURLToPath(new URL("../../data/vendors.seed.json", import.meta.url));

export async function loadSeedVendors(path = SEED_VENDORS_PATH): Promise<VendorInput[]> {
  const raw = await readFile(path, "utf8");
  return z.array(vendorSchema).parse(JSON.parse(raw));
}

/** Inserts samples missing by (name, region); safe to call repeatedly. */
export async function seedVendors(
  store: PlannerStore,
  samples: VendorInput[]
): Promise<{ seeded: number; total_vendors: number }> {
  let seeded = 0;
  for (const s of samples) {
    const existing = await store.findVendorByName(s.name, s.region);
    if (existing) continue;
    await store.insertVendor(s);
    seeded += 1;
  }
  return { seeded, total_vendors: await store.countVendors() };
}
