import { priceInAllCurrencies, type CurrencyRates } from "../core/currency.js";
import type { Currency, Region, Vendor, VendorCategory } from "../core/schemas.js";
import type { PlannerStore, VendorFilter } from "../db/store.js";
import { config } from "../server/config.js";

export type RecommendedVendor = Vendor & {
  price_by_currency?: Record<Currency, number>;
};

export type VendorRecommendations = Record<string, RecommendedVendor[]>;

export type RecommenderDeps = {
  store: PlannerStore;
  rates: CurrencyRates;
};

export const DEFAULT_LIMIT_PER_CATEGORY = 3;
export const MAX_LIST_LIMIT = 200;

function dlog(...args: unknown[]) {
  if (config.debug) console.log("[planner][vendors]", ...args);
}

function annotate(vendor: Vendor, rates: CurrencyRates): RecommendedVendor {
  if (typeof vendor.average_price_usd !== "number") return { ...vendor };
  return { ...vendor, price_by_currency: priceInAllCurrencies(vendor.average_price_usd, rates) };
}

/**
 * Up to `limitPerCategory` vendors per category, region first.
 * A category with no vendors in the region is filled from any region, so the
 * result is best effort: callers must not assume every vendor is local.
 */
export async function recommendVendors(
  deps: RecommenderDeps,
  region: Region,
  categories: readonly VendorCategory[],
  limitPerCategory = DEFAULT_LIMIT_PER_CATEGORY
): Promise<VendorRecommendations> {
  const limit = Math.max(1, Math.floor(limitPerCategory));
  const recs: VendorRecommendations = {};

  for (const cat of categories) {
    let docs = await deps.store.findVendors({ region, category: cat }, limit);
    if (!docs.length) {
      dlog(`no ${cat} vendors in ${region}, widening to all regions`);
      docs = await deps.store.findVendors({ category: cat }, limit);
    }
    recs[cat] = docs.slice(0, limit).map((v) => annotate(v, deps.rates));
  }

  return recs;
}

export async function listVendors(
  deps: RecommenderDeps,
  filter: VendorFilter,
  limit = 50
): Promise<RecommendedVendor[]> {
  const capped = Math.max(1, Math.min(Math.floor(limit), MAX_LIST_LIMIT));
  const docs = await deps.store.findVendors(filter, capped);
  return docs.map((v) => annotate(v, deps.rates));
}
