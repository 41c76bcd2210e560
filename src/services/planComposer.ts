import type { AppLocale } from "../i18n/locale.js";
import { buildBudget } from "../core/budget.js";
import { checklistFor } from "../core/checklist.js";
import type { CurrencyRates } from "../core/currency.js";
import type { BudgetItem, ChecklistItem, Currency, Region, UserPreference, VendorCategory } from "../core/schemas.js";
import type { PlannerTables } from "../core/tables.js";
import type { PlannerStore } from "../db/store.js";
import { DEFAULT_LIMIT_PER_CATEGORY, recommendVendors, type VendorRecommendations } from "./vendorRecommender.js";

export const PLAN_VENDOR_CATEGORIES: readonly VendorCategory[] = Object.freeze([
  "venue",
  "photography",
  "florals",
  "zaffe",
  "dj",
]);

export const PLAN_MESSAGE = "Plan generated using regional best-practice heuristics";

export type Plan = {
  preference_id: string;
  region: Region;
  currency: Currency;
  guest_count: number;
  total_budget: number;
  timeline: ChecklistItem[];
  categories: VendorCategory[];
  currency_rates: CurrencyRates;
};

export type PlanResponse = {
  plan: Plan;
  budget: BudgetItem[];
  vendors: VendorRecommendations;
  message: string;
};

export type PlanComposerDeps = {
  store: PlannerStore;
  tables: PlannerTables;
  limitPerCategory?: number;
};

// Not transactional: the preference stays stored if a later vendor lookup fails.
export async function composePlan(
  deps: PlanComposerDeps,
  pref: UserPreference,
  locale: AppLocale = "ar"
): Promise<PlanResponse> {
  const preferenceId = await deps.store.insertPreference(pref);

  const timeline = checklistFor(pref.guest_count, locale);
  const budget = buildBudget(pref.budget, pref.currency, pref.region, deps.tables);

  const vendors = await recommendVendors(
    { store: deps.store, rates: deps.tables.rates },
    pref.region,
    PLAN_VENDOR_CATEGORIES,
    deps.limitPerCategory ?? DEFAULT_LIMIT_PER_CATEGORY
  );

  return {
    plan: {
      preference_id: preferenceId,
      region: pref.region,
      currency: pref.currency,
      guest_count: pref.guest_count,
      total_budget: pref.budget,
      timeline,
      categories: [...PLAN_VENDOR_CATEGORIES],
      currency_rates: deps.tables.rates,
    },
    budget,
    vendors,
    message: PLAN_MESSAGE,
  };
}
